/**
 * Logger for AMQP client lifecycle events.
 * Provides a simple, framework-agnostic interface for logging.
 */

export interface Logger {
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, err?: Error | Record<string, unknown>): void;
  debug(msg: string, data?: Record<string, unknown>): void;
}

export const DEFAULT_LOG_PREFIX = '[AmqpClient]';

const format = (data?: Record<string, unknown>): string => (data ? JSON.stringify(data) : '');

/**
 * Creates a logger that uses console for output.
 * Debug lines are written only while the DEBUG environment variable mentions `amqp`.
 *
 * @param prefix - Tag put in front of every line, usually one per client
 */
export const createLogger = (prefix: string = DEFAULT_LOG_PREFIX): Logger => ({
  info: (msg, data) => {
    console.log(`${prefix} ${msg}`, format(data));
  },
  warn: (msg, data) => {
    console.warn(`${prefix} ${msg}`, format(data));
  },
  error: (msg, err) => {
    if (err instanceof Error) {
      console.error(`${prefix} ${msg}:`, err.message);
    } else {
      console.error(`${prefix} ${msg}`, format(err));
    }
  },
  debug: (msg, data) => {
    if (process.env.DEBUG?.includes('amqp')) {
      console.debug(`${prefix} ${msg}`, format(data));
    }
  },
});

/**
 * Normalizes a thrown value into an Error.
 */
export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));
