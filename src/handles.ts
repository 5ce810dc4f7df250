/**
 * Handles wrapping the raw amqplib connection and channel.
 * A handle tracks whether its broker-side counterpart is still usable.
 */

import type { RawChannel, RawConnection, ShutdownReason } from './types';

/**
 * Fixed close request: AMQP reply code plus reason text.
 */
export interface CloseRequest {
  code: number;
  text: string;
}

/**
 * Derives a shutdown reason from the error amqplib attaches to a close event.
 *
 * @param err - Error passed to (or recorded before) the 'close' event
 * @param fallbackText - Text used when the close carried no error
 */
export const shutdownReasonFrom = (err: Error | null | undefined, fallbackText: string): ShutdownReason => {
  if (! err) {
    return { code: 200, text: fallbackText, initiator: 'peer' };
  }

  const code = 'code' in err && typeof err.code === 'number' ? err.code : undefined;
  return { code, text: err.message, initiator: 'peer' };
};

/**
 * Tracks the live state of a handle and the reason of an application-initiated close.
 */
abstract class Handle {
  private open = true;
  private closeRequest: CloseRequest | null = null;

  /**
   * Whether the broker-side resource is still open.
   */
  get isOpen(): boolean {
    return this.selfOpen();
  }

  protected selfOpen(): boolean {
    return this.open;
  }

  /**
   * Records that the application asked for a close.
   */
  beginClose(request: CloseRequest): void {
    this.closeRequest = request;
  }

  /**
   * Resolves the reason to report for a close event.
   */
  reasonFor(err: Error | null | undefined, fallbackText: string): ShutdownReason {
    if (this.closeRequest) {
      return { ...this.closeRequest, initiator: 'application' };
    }
    return shutdownReasonFrom(err, fallbackText);
  }

  /**
   * Marks the handle dead. Never reopened.
   */
  markClosed(): void {
    this.open = false;
  }
}

/**
 * One broker connection.
 */
export class ConnectionHandle extends Handle {
  readonly raw: RawConnection;

  constructor(raw: RawConnection) {
    super();
    this.raw = raw;
  }
}

/**
 * One publishing channel. Only valid while its connection is live; the back
 * reference is weak so a channel never keeps a dead connection around.
 */
export class ChannelHandle extends Handle {
  readonly raw: RawChannel;
  private readonly connection: WeakRef<ConnectionHandle>;

  constructor(raw: RawChannel, connection: ConnectionHandle) {
    super();
    this.raw = raw;
    this.connection = new WeakRef(connection);
  }

  override get isOpen(): boolean {
    return this.selfOpen() && (this.connection.deref()?.isOpen ?? false);
  }
}
