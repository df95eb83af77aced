import { DiscordAPIError, RESTJSONErrorCodes } from 'discord.js';
import type { PlatformError } from '@safeguard/shared';

const NOT_FOUND_CODES = new Set<number | string>([
  RESTJSONErrorCodes.UnknownMember,
  RESTJSONErrorCodes.UnknownUser,
  RESTJSONErrorCodes.UnknownBan,
  RESTJSONErrorCodes.UnknownMessage,
  RESTJSONErrorCodes.UnknownChannel,
  RESTJSONErrorCodes.UnknownRole,
]);

/** Map a rejected discord.js call onto the platform failure variants. */
export function toPlatformError(err: unknown): PlatformError {
  if (err instanceof DiscordAPIError) {
    if (err.status === 403 || err.code === RESTJSONErrorCodes.MissingPermissions) {
      return { ok: false, reason: 'forbidden', error: err.message };
    }
    if (err.status === 404 || NOT_FOUND_CODES.has(err.code)) {
      return { ok: false, reason: 'not_found', error: err.message };
    }
    return { ok: false, reason: 'transport_error', error: err.message };
  }
  return {
    ok: false,
    reason: 'transport_error',
    error: err instanceof Error ? err.message : String(err),
  };
}
