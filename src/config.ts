/**
 * Client configuration defaults.
 */

import type { ClientOptions, ResolvedClientOptions } from './types';
import { DEFAULT_LOG_PREFIX, createLogger } from './logger';

/** AMQP 0-9-1 default port. */
export const DEFAULT_PORT = 5672;

/** Fixed delay between automatic recovery attempts. */
export const DEFAULT_RECOVERY_INTERVAL = 5000;

/**
 * Applies defaults to client options.
 *
 * @param options - Options supplied by the caller
 * @returns Options with every field set
 */
export const resolveOptions = (options: ClientOptions = {}): ResolvedClientOptions => ({
  host: 'localhost',
  port: DEFAULT_PORT,
  username: 'guest',
  password: 'guest',
  vhost: '/',
  heartbeat: 0,
  recoveryInterval: DEFAULT_RECOVERY_INTERVAL,
  logPrefix: options.logPrefix ?? DEFAULT_LOG_PREFIX,
  logger: options.logger ?? createLogger(options.logPrefix),
  ...withoutUndefined(options),
});

// Spreading `{ port: undefined }` would erase the default.
const withoutUndefined = (options: ClientOptions): ClientOptions => {
  const result: ClientOptions = {};
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) {
      Object.assign(result, { [key]: value });
    }
  }
  return result;
};
