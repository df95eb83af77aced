export * from './constants.js';
export * from './types.js';
export * from './errors.js';
export * from './crypto.js';
export * from './webhooks.js';
export * from './logger.js';
