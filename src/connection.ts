/**
 * Thin transport helpers over amqplib.
 * Opening and closing of raw connections and channels lives here so the
 * lifecycle can be exercised against a mocked transport.
 */

import amqp from 'amqplib';
import type { RawConnection, RawChannel, ResolvedClientOptions } from './types';

/**
 * Builds amqplib connect options from client options.
 *
 * @param options - Resolved client options
 * @returns amqplib connection options
 */
export const connectOptionsFor = (options: ResolvedClientOptions): amqp.Options.Connect => ({
  protocol: 'amqp',
  hostname: options.host,
  port: options.port,
  username: options.username,
  password: options.password,
  vhost: options.vhost,
  heartbeat: options.heartbeat,
});

/**
 * Opens a single connection, without retries.
 *
 * @param options - Resolved client options
 * @returns Promise resolving to the connection
 * @throws Error if the broker cannot be reached or refuses the credentials
 */
export const openConnection = async (options: ResolvedClientOptions): Promise<RawConnection> => {
  return amqp.connect(connectOptionsFor(options));
};

/**
 * Creates a channel from a connection.
 *
 * @param connection - RabbitMQ connection
 * @returns Promise resolving to the channel
 */
export const createChannel = async (connection: RawConnection): Promise<RawChannel> => {
  const channel = await connection.createChannel();
  channel.setMaxListeners(100);
  return channel;
};

/**
 * Gracefully closes a channel. Errors propagate to the caller.
 *
 * @param channel - RabbitMQ channel to close
 */
export const closeChannel = async (channel: RawChannel): Promise<void> => {
  await channel.close();
};

/**
 * Gracefully closes a connection. Errors propagate to the caller.
 *
 * @param connection - RabbitMQ connection to close
 */
export const closeConnection = async (connection: RawConnection): Promise<void> => {
  await connection.close();
};
