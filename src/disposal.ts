/**
 * Ordered teardown: channel first, then connection.
 */

import { ChannelManager } from './channel';
import { ConnectionSupervisor } from './supervisor';
import type { CloseRequest } from './handles';
import { HandleMutex } from './mutex';
import { type Logger, toError } from './logger';

export const CHANNEL_CLOSE_REQUEST: CloseRequest = { code: 200, text: 'Closing channel via dispose' };
export const CONNECTION_CLOSE_REQUEST: CloseRequest = { code: 200, text: 'Closing connection via dispose' };

export class DisposalCoordinator {
  private channels: ChannelManager;
  private supervisor: ConnectionSupervisor;
  private mutex: HandleMutex;
  private logger: Logger;
  private disposal: Promise<void> | null = null;

  constructor(channels: ChannelManager, supervisor: ConnectionSupervisor, mutex: HandleMutex, logger: Logger) {
    this.channels = channels;
    this.supervisor = supervisor;
    this.mutex = mutex;
    this.logger = logger;
  }

  /**
   * Whether dispose() has been requested.
   */
  get isDisposed(): boolean {
    return this.disposal !== null;
  }

  /**
   * Tears down channel then connection once any in-flight (re)initialization settles.
   * Repeated calls share the same promise. Never rejects.
   */
  dispose(): Promise<void> {
    if (! this.disposal) {
      this.disposal = this.mutex.runExclusive(() => this.teardown());
    }
    return this.disposal;
  }

  private async teardown(): Promise<void> {
    this.logger.debug('Disposing AMQP client');

    try {
      await this.channels.close(CHANNEL_CLOSE_REQUEST);
      this.logger.info('Channel disposed');
    } catch (error) {
      this.logger.error('Failed to close channel during dispose', toError(error));
    }

    try {
      await this.supervisor.close(CONNECTION_CLOSE_REQUEST);
      this.logger.info('Connection disposed');
    } catch (error) {
      this.logger.error('Failed to close connection during dispose', toError(error));
    }
  }
}
