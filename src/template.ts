/**
 * Publishing client.
 * Guards every publish with a channel health check and one reinitialization attempt.
 */

import type amqp from 'amqplib';
import type { ClientOptions, InfrastructureAccess, ReturnHandler, StatusHandler } from './types';
import { type Lifecycle, LifecycleManager } from './lifecycle';
import type { ChannelHandle } from './handles';
import { ChannelUnavailableError, ClientDisposedError, PublishFailedError } from './errors';
import { toError } from './logger';

/**
 * Message body accepted by send().
 */
export type MessageBody = Buffer | Uint8Array | string;

const toBuffer = (body: MessageBody): Buffer => {
  if (Buffer.isBuffer(body)) return body;
  if (typeof body === 'string') return Buffer.from(body, 'utf-8');
  return Buffer.from(body.buffer, body.byteOffset, body.byteLength);
};

export class AmqpTemplate {
  private lifecycle: Lifecycle;

  constructor(lifecycle: Lifecycle) {
    this.lifecycle = lifecycle;
  }

  /**
   * Settles once the first connection attempt has finished, successful or not.
   */
  get ready(): Promise<void> {
    return this.lifecycle.ready;
  }

  get isDisposed(): boolean {
    return this.lifecycle.isDisposed;
  }

  /**
   * Publishes a persistent message.
   * If the channel is down, one reinitialization is attempted first.
   * An unroutable mandatory message is reported through onReturned(), not here.
   *
   * @param exchange - Exchange name
   * @param routingKey - Routing key
   * @param body - Message content
   * @param mandatory - Ask the broker to return the message if it cannot be routed
   * @returns true if sent (buffer not full), false otherwise
   * @throws ChannelUnavailableError if no channel is usable after the reinitialization attempt
   * @throws PublishFailedError if the transport rejects the publish
   * @throws ClientDisposedError after dispose()
   */
  async send(exchange: string, routingKey: string, body: MessageBody, mandatory = false): Promise<boolean> {
    return this.guardedPublish(exchange, routingKey, toBuffer(body), { persistent: true, mandatory });
  }

  /**
   * Publishes a value serialized to JSON.
   * Same guarantees as send().
   */
  async sendJson(exchange: string, routingKey: string, message: unknown, mandatory = false): Promise<boolean> {
    const buffer = Buffer.from(JSON.stringify(message), 'utf-8');

    return this.guardedPublish(exchange, routingKey, buffer, {
      persistent: true,
      mandatory,
      contentType: 'application/json',
      contentEncoding: 'utf-8',
    });
  }

  /**
   * Subscribes to status changes.
   *
   * @returns Function removing the handler
   */
  onStatusChanged(handler: StatusHandler): () => void {
    return this.lifecycle.onStatusChanged(handler);
  }

  /**
   * Subscribes to returned (unroutable mandatory) messages.
   *
   * @returns Function removing the handler
   */
  onReturned(handler: ReturnHandler): () => void {
    return this.lifecycle.onReturned(handler);
  }

  /**
   * Raw connection and channel, for exchange/queue declaration only.
   */
  infrastructure(): InfrastructureAccess {
    return this.lifecycle.infrastructure();
  }

  /**
   * Closes channel then connection. Safe to call more than once.
   */
  async dispose(): Promise<void> {
    await this.lifecycle.dispose();
  }

  private async guardedPublish(
    exchange: string,
    routingKey: string,
    content: Buffer,
    options: amqp.Options.Publish
  ): Promise<boolean> {
    if (this.lifecycle.isDisposed) {
      throw new ClientDisposedError();
    }

    const channel = await this.usableChannel(exchange, routingKey);

    try {
      const sent = channel.raw.publish(exchange, routingKey, content, options);
      this.lifecycle.logger.debug('Message sent', { exchange, routingKey, mandatory: options.mandatory });
      return sent;
    } catch (error) {
      const failure = new PublishFailedError(exchange, routingKey, toError(error));
      this.lifecycle.logger.error('Failed to send message', failure);
      throw failure;
    }
  }

  private async usableChannel(exchange: string, routingKey: string): Promise<ChannelHandle> {
    const current = this.lifecycle.currentChannel();
    if (current?.isOpen) {
      return current;
    }

    this.lifecycle.logger.warn('Channel is not open, attempting to re-initialize connection and channel');
    await this.lifecycle.reinitialize();

    const channel = this.lifecycle.currentChannel();
    if (! channel?.isOpen) {
      this.lifecycle.logger.error('Failed to re-establish channel, message not sent', { exchange, routingKey });
      throw new ChannelUnavailableError();
    }
    return channel;
  }
}

/**
 * Creates a publishing client and starts connecting in the background.
 *
 * @param options - Client options
 * @returns Client instance (await `ready` to wait for the first attempt)
 */
export const createTemplate = (options: ClientOptions = {}): AmqpTemplate => {
  return new AmqpTemplate(new LifecycleManager(options));
};
