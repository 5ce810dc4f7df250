/**
 * Error taxonomy of the AMQP client.
 */

export class AmqpClientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A connection attempt failed. Reported through status events, never thrown to callers.
 */
export class ConnectionInitError extends AmqpClientError {
  readonly host: string;
  readonly port: number;

  constructor(host: string, port: number, cause: Error) {
    super(`Failed to establish connection to ${host}:${port}: ${cause.message}`, { cause });
    this.host = host;
    this.port = port;
  }
}

/**
 * No usable channel could be obtained.
 */
export class ChannelUnavailableError extends AmqpClientError {
  constructor(message = 'AMQP channel is not available', options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * The transport rejected a publish.
 */
export class PublishFailedError extends AmqpClientError {
  readonly exchange: string;
  readonly routingKey: string;

  constructor(exchange: string, routingKey: string, cause: Error) {
    super(`Failed to publish to exchange '${exchange}' with routing key '${routingKey}': ${cause.message}`, {
      cause,
    });
    this.exchange = exchange;
    this.routingKey = routingKey;
  }
}

/**
 * The client was used after dispose().
 */
export class ClientDisposedError extends AmqpClientError {
  constructor() {
    super('AMQP client has been disposed');
  }
}
