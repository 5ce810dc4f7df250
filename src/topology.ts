/**
 * Infrastructure setup through the client's escape hatch.
 * Declares on a short-lived channel so the publishing channel is never
 * closed by a declaration error. The setup channel always has an 'error'
 * listener: amqplib emits 'error' when the server rejects a declaration, and
 * an unhandled emit there drops the whole connection.
 */

import type { DirectRouteSpec, InfrastructureAccess } from './types';
import { createChannel, closeChannel } from './connection';
import { ChannelUnavailableError } from './errors';
import { type Logger, createLogger, toError } from './logger';

/**
 * Declares a durable direct exchange and a durable queue bound to it.
 *
 * @param access - Infrastructure access from the client
 * @param spec - Exchange, queue and routing key
 * @param logger - Logger for the setup steps
 * @throws ChannelUnavailableError if the client holds no connection or no channel can be opened on it
 */
export const declareDirectRoute = async (
  access: InfrastructureAccess,
  spec: DirectRouteSpec,
  logger: Logger = createLogger()
): Promise<void> => {
  const connection = access.getConnection();
  if (! connection) {
    throw new ChannelUnavailableError('Cannot declare topology without a connection');
  }

  const channel = await createChannel(connection).catch((error: unknown) => {
    throw new ChannelUnavailableError('Failed to create setup channel', { cause: toError(error) });
  });
  channel.on('error', (err: Error) => {
    logger.warn('Setup channel error', { error: err.message });
  });

  try {
    await channel.assertExchange(spec.exchange, 'direct', { durable: true, autoDelete: false });
    await channel.assertQueue(spec.queue, { durable: true, exclusive: false, autoDelete: false });
    await channel.bindQueue(spec.queue, spec.exchange, spec.routingKey);
    logger.info(`Declared exchange '${spec.exchange}' and queue '${spec.queue}'`, { routingKey: spec.routingKey });
  } finally {
    await closeChannel(channel).catch((error: unknown) => {
      logger.warn('Failed to close setup channel', { error: toError(error).message });
    });
  }
};
