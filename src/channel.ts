/**
 * Owns the single publishing channel derived from the live connection.
 */

import type { LifecycleEventSink, RawMessage, ReturnedMessage } from './types';
import { createChannel, closeChannel } from './connection';
import { ChannelHandle, type CloseRequest, ConnectionHandle } from './handles';
import { ChannelUnavailableError } from './errors';
import { type Logger, toError } from './logger';

/**
 * Extracts the broker's reply from a returned message.
 * amqplib puts replyCode and replyText on the fields of a 'return' event.
 */
export const toReturnedMessage = (message: RawMessage): ReturnedMessage => {
  const fields: object = message.fields;
  const replyCode = 'replyCode' in fields && typeof fields.replyCode === 'number' ? fields.replyCode : 0;
  const replyText = 'replyText' in fields && typeof fields.replyText === 'string' ? fields.replyText : '';

  return {
    exchange: message.fields.exchange,
    routingKey: message.fields.routingKey,
    replyCode,
    replyText,
    content: message.content,
    properties: message.properties,
  };
};

export class ChannelManager {
  private logger: Logger;
  private sink: LifecycleEventSink;
  private onReturn: (message: ReturnedMessage) => void;
  private handle: ChannelHandle | null = null;

  constructor(logger: Logger, sink: LifecycleEventSink, onReturn: (message: ReturnedMessage) => void) {
    this.logger = logger;
    this.sink = sink;
    this.onReturn = onReturn;
  }

  /**
   * Creates a channel on a live connection and makes it the current one.
   *
   * @param connection - Connection handle the channel is derived from
   * @returns The new channel handle
   * @throws ChannelUnavailableError if the connection is not live or the broker refuses the channel
   */
  async createChannel(connection: ConnectionHandle | null): Promise<ChannelHandle> {
    if (! connection?.isOpen) {
      throw new ChannelUnavailableError('Cannot create a channel without a live connection');
    }

    let handle: ChannelHandle;
    try {
      handle = new ChannelHandle(await createChannel(connection.raw), connection);
    } catch (error) {
      throw new ChannelUnavailableError('Failed to create channel', { cause: toError(error) });
    }

    this.watch(handle);
    this.handle = handle;
    this.logger.info('Channel created');
    return handle;
  }

  /**
   * Gets the current channel handle, live or not.
   */
  getHandle(): ChannelHandle | null {
    return this.handle;
  }

  /**
   * Whether the current channel is usable on the broker side.
   */
  isOpen(): boolean {
    return this.handle?.isOpen ?? false;
  }

  /**
   * Closes the current channel if open, then releases the handle.
   * Errors from the transport propagate.
   */
  async close(request: CloseRequest): Promise<void> {
    const handle = this.handle;
    if (! handle) {
      return;
    }

    try {
      if (handle.isOpen) {
        this.logger.debug('Closing channel', { code: request.code, text: request.text });
        handle.beginClose(request);
        await closeChannel(handle.raw);
        handle.markClosed();
      }
    } finally {
      if (this.handle === handle) {
        this.handle = null;
      }
    }
  }

  private watch(handle: ChannelHandle): void {
    const channel = handle.raw;
    let lastError: Error | null = null;

    // Channel errors are always followed by 'close'; the error only explains it.
    channel.on('error', (err: Error) => {
      lastError = err;
      this.logger.error('Channel error', err);
    });

    channel.once('close', () => {
      const reason = handle.reasonFor(lastError, 'Channel closed');
      this.logger.warn('Channel shutdown', { ...reason });
      this.sink({ kind: 'channel-shutdown', reason });
      handle.markClosed();
    });

    channel.on('return', (message: RawMessage) => {
      const returned = toReturnedMessage(message);
      this.logger.warn('Message returned by broker', {
        exchange: returned.exchange,
        routingKey: returned.routingKey,
        replyCode: returned.replyCode,
        replyText: returned.replyText,
      });
      this.onReturn(returned);
    });
  }
}
