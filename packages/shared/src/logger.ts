export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
  /** Logger whose messages carry a `[scope]` prefix. */
  child(scope: string): Logger;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVELS, value);
}

export function createLogger(level: LogLevel = 'info', scope?: string): Logger {
  const threshold = LEVELS[level];
  const ts = () => new Date().toISOString();
  const prefix = scope ? `[${scope}] ` : '';

  return {
    debug(msg, ...args) {
      if (threshold <= LEVELS.debug) console.debug(`[${ts()}] DEBUG ${prefix}${msg}`, ...args);
    },
    info(msg, ...args) {
      if (threshold <= LEVELS.info) console.log(`[${ts()}]  INFO ${prefix}${msg}`, ...args);
    },
    warn(msg, ...args) {
      if (threshold <= LEVELS.warn) console.warn(`[${ts()}]  WARN ${prefix}${msg}`, ...args);
    },
    error(msg, ...args) {
      if (threshold <= LEVELS.error) console.error(`[${ts()}] ERROR ${prefix}${msg}`, ...args);
    },
    child(childScope) {
      return createLogger(level, scope ? `${scope}:${childScope}` : childScope);
    },
  };
}
