/**
 * Owns the single broker connection: opens it, watches it, closes it.
 */

import type { LifecycleEventSink, ResolvedClientOptions } from './types';
import { openConnection, closeConnection } from './connection';
import { type CloseRequest, ConnectionHandle } from './handles';
import { ConnectionInitError } from './errors';
import { type Logger, toError } from './logger';

export class ConnectionSupervisor {
  private options: ResolvedClientOptions;
  private sink: LifecycleEventSink;
  private logger: Logger;
  private handle: ConnectionHandle | null = null;

  constructor(options: ResolvedClientOptions, sink: LifecycleEventSink) {
    this.options = options;
    this.sink = sink;
    this.logger = options.logger;
  }

  /**
   * Opens a connection and registers its notifications.
   * Never rejects: a failure is logged and reported as a 'connection-failed' event.
   * No-op while the current connection is still open.
   */
  async initialize(): Promise<void> {
    if (this.handle?.isOpen) {
      this.logger.debug('Connection already open, skipping initialization');
      return;
    }

    const { host, port } = this.options;
    this.logger.debug('Opening connection', { host, port });

    let handle: ConnectionHandle;
    try {
      handle = new ConnectionHandle(await openConnection(this.options));
    } catch (error) {
      const initError = new ConnectionInitError(host, port, toError(error));
      this.handle = null;
      this.logger.error('Failed to establish connection', initError);
      this.sink({ kind: 'connection-failed', error: initError });
      return;
    }

    this.handle = handle;
    this.logger.info(`Connection established to ${host}:${port}`);
    this.sink({ kind: 'connected', host, port });
    this.watch(handle);
  }

  /**
   * Gets the current connection handle, live or not.
   */
  getHandle(): ConnectionHandle | null {
    return this.handle;
  }

  /**
   * Whether a live connection exists.
   */
  isOpen(): boolean {
    return this.handle?.isOpen ?? false;
  }

  /**
   * Closes the current connection if open, then releases the handle.
   * Errors from the transport propagate.
   */
  async close(request: CloseRequest): Promise<void> {
    const handle = this.handle;
    if (! handle) {
      return;
    }

    try {
      if (handle.isOpen) {
        this.logger.debug('Closing connection', { code: request.code, text: request.text });
        handle.beginClose(request);
        await closeConnection(handle.raw);
        handle.markClosed();
      }
    } finally {
      if (this.handle === handle) {
        this.handle = null;
      }
    }
  }

  private watch(handle: ConnectionHandle): void {
    const connection = handle.raw;
    let lastError: Error | null = null;

    // amqplib follows every connection error with 'close'; the error only explains it.
    connection.on('error', (err: Error) => {
      lastError = err;
      this.logger.error('Connection error', err);
    });

    connection.once('close', (err?: Error) => {
      const reason = handle.reasonFor(err ?? lastError, 'Connection closed');
      this.logger.warn('Connection shutdown', { ...reason });
      this.sink({ kind: 'connection-shutdown', reason });
      handle.markClosed();
    });

    connection.on('blocked', (reason: string) => {
      this.logger.warn('Connection blocked', { reason });
      this.sink({ kind: 'connection-blocked', reason });
    });

    connection.on('unblocked', () => {
      this.logger.info('Connection unblocked');
      this.sink({ kind: 'connection-unblocked' });
    });
  }
}
