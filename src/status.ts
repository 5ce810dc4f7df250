/**
 * Status stream: renders raw lifecycle events into status strings and fans
 * them out to subscribers.
 */

import type { LifecycleEvent, ShutdownReason, StatusEvent, StatusHandler } from './types';
import { type Logger, toError } from './logger';

const formatReason = ({ code, text, initiator }: ShutdownReason): string =>
  code === undefined
    ? `${text} (initiated by ${initiator})`
    : `${text} (code ${code}, initiated by ${initiator})`;

/**
 * Maps a raw lifecycle event to its status category and description.
 *
 * @param event - Event reported by the supervisor or channel manager
 * @returns Status event
 */
export const describeEvent = (event: LifecycleEvent): StatusEvent => {
  switch (event.kind) {
    case 'connected':
      return { category: 'Connected', description: `Connection established to ${event.host}:${event.port}` };
    case 'connection-failed':
      return { category: 'ConnectionFailed', description: event.error.message };
    case 'connection-shutdown':
      return { category: 'ConnectionShutdown', description: `Connection shutdown: ${formatReason(event.reason)}` };
    case 'connection-blocked':
      return { category: 'ConnectionBlocked', description: `Connection blocked: ${event.reason}` };
    case 'connection-unblocked':
      return { category: 'ConnectionUnblocked', description: 'Connection unblocked' };
    case 'callback-error':
      return { category: 'CallbackError', description: `Callback error: ${event.error.message}` };
    case 'channel-shutdown':
      return { category: 'ChannelShutdown', description: `Channel shutdown: ${formatReason(event.reason)}` };
  }
};

/**
 * Broadcasts status events synchronously, in subscription order.
 * A throwing subscriber is logged and skipped.
 */
export class StatusNotifier {
  private handlers: StatusHandler[] = [];
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  /**
   * Registers a handler.
   *
   * @returns Function removing the handler
   */
  subscribe(handler: StatusHandler): () => void {
    this.handlers.push(handler);
    return () => {
      this.handlers = this.handlers.filter(h => h !== handler);
    };
  }

  /**
   * Renders a raw lifecycle event and delivers it.
   *
   * @returns The delivered status event
   */
  publish(event: LifecycleEvent): StatusEvent {
    const status = describeEvent(event);
    this.emit(status);
    return status;
  }

  emit(status: StatusEvent): void {
    for (const handler of [...this.handlers]) {
      try {
        handler(status.description, status);
      } catch (error) {
        this.logger.error('Status subscriber failed', toError(error));
      }
    }
  }

  /**
   * Number of registered handlers.
   */
  get size(): number {
    return this.handlers.length;
  }

  clear(): void {
    this.handlers = [];
  }
}
