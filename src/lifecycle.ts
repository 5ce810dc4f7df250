/**
 * Connection and channel lifecycle: initialization, automatic recovery,
 * status notifications and ordered disposal.
 */

import type {
  ClientOptions,
  InfrastructureAccess,
  LifecycleEvent,
  ResolvedClientOptions,
  ReturnedMessage,
  ReturnHandler,
  StatusHandler,
} from './types';
import { resolveOptions } from './config';
import { ConnectionSupervisor } from './supervisor';
import { ChannelManager } from './channel';
import type { ChannelHandle } from './handles';
import { StatusNotifier } from './status';
import { DisposalCoordinator } from './disposal';
import { HandleMutex } from './mutex';
import { ClientDisposedError } from './errors';
import { type Logger, toError } from './logger';

/**
 * What a publishing (or future consuming) client needs from the lifecycle.
 */
export interface Lifecycle {
  /** Settles once the first initialization attempt has finished. Never rejects. */
  readonly ready: Promise<void>;
  readonly isDisposed: boolean;
  readonly logger: Logger;
  currentChannel(): ChannelHandle | null;
  reinitialize(): Promise<void>;
  onStatusChanged(handler: StatusHandler): () => void;
  onReturned(handler: ReturnHandler): () => void;
  infrastructure(): InfrastructureAccess;
  dispose(): Promise<void>;
}

export class LifecycleManager implements Lifecycle {
  readonly ready: Promise<void>;
  readonly logger: Logger;
  private options: ResolvedClientOptions;
  private notifier: StatusNotifier;
  private supervisor: ConnectionSupervisor;
  private channels: ChannelManager;
  private mutex = new HandleMutex();
  private disposal: DisposalCoordinator;
  private returnHandlers: ReturnHandler[] = [];
  private recoveryTimer: NodeJS.Timeout | null = null;

  constructor(options: ClientOptions = {}) {
    this.options = resolveOptions(options);
    this.logger = this.options.logger;
    this.notifier = new StatusNotifier(this.logger);
    this.supervisor = new ConnectionSupervisor(this.options, event => this.handleEvent(event));
    this.channels = new ChannelManager(
      this.logger,
      event => this.handleEvent(event),
      message => this.deliverReturn(message)
    );
    this.disposal = new DisposalCoordinator(this.channels, this.supervisor, this.mutex, this.logger);

    // Starts without blocking the constructor; failures only reach the status stream.
    this.ready = this.mutex.runExclusive(() => this.establish());
  }

  get isDisposed(): boolean {
    return this.disposal.isDisposed;
  }

  /**
   * Gets the current channel handle, live or not.
   */
  currentChannel(): ChannelHandle | null {
    return this.channels.getHandle();
  }

  /**
   * Reopens whatever is down: the connection if needed, then the channel.
   * Serialized against every other handle replacement. A failed attempt
   * resolves anyway; callers check the channel afterwards.
   *
   * @throws ClientDisposedError if the client has been disposed
   */
  async reinitialize(): Promise<void> {
    this.assertNotDisposed();
    return this.mutex.runExclusive(async () => {
      this.assertNotDisposed();
      await this.establish();
    });
  }

  /**
   * Subscribes to status changes.
   *
   * @returns Function removing the handler
   */
  onStatusChanged(handler: StatusHandler): () => void {
    this.assertNotDisposed();
    return this.notifier.subscribe(handler);
  }

  /**
   * Subscribes to mandatory messages the broker could not route.
   *
   * @returns Function removing the handler
   */
  onReturned(handler: ReturnHandler): () => void {
    this.assertNotDisposed();
    this.returnHandlers.push(handler);
    return () => {
      this.returnHandlers = this.returnHandlers.filter(h => h !== handler);
    };
  }

  /**
   * Raw handle access for infrastructure setup (exchange and queue declaration).
   */
  infrastructure(): InfrastructureAccess {
    this.assertNotDisposed();
    return {
      getConnection: () => {
        this.assertNotDisposed();
        return this.supervisor.getHandle()?.raw ?? null;
      },
      getChannel: () => {
        this.assertNotDisposed();
        return this.channels.getHandle()?.raw ?? null;
      },
    };
  }

  /**
   * Stops recovery, then closes channel and connection in order.
   * Idempotent; never rejects.
   */
  async dispose(): Promise<void> {
    this.cancelRecovery();
    await this.disposal.dispose();
    this.notifier.clear();
    this.returnHandlers = [];
  }

  private async establish(): Promise<void> {
    if (this.disposal.isDisposed) {
      return;
    }

    if (! this.supervisor.isOpen()) {
      await this.supervisor.initialize();
    }

    const connection = this.supervisor.getHandle();
    if (! connection?.isOpen) {
      this.scheduleRecovery();
      return;
    }
    this.cancelRecovery();

    if (this.channels.isOpen()) {
      return;
    }

    try {
      await this.channels.createChannel(connection);
    } catch (error) {
      this.logger.error('Failed to create channel', toError(error));
    }
  }

  private handleEvent(event: LifecycleEvent): void {
    this.notifier.publish(event);

    if (event.kind === 'connection-shutdown' && event.reason.initiator === 'peer') {
      this.scheduleRecovery();
    }
  }

  private deliverReturn(message: ReturnedMessage): void {
    for (const handler of [...this.returnHandlers]) {
      try {
        handler(message);
      } catch (error) {
        const err = toError(error);
        this.logger.error('Return handler failed', err);
        this.handleEvent({ kind: 'callback-error', error: err });
      }
    }
  }

  private scheduleRecovery(): void {
    if (this.recoveryTimer || this.disposal.isDisposed) {
      return;
    }

    const delay = this.options.recoveryInterval;
    this.logger.debug('Recovery scheduled', { delay });
    this.recoveryTimer = setTimeout(() => {
      this.recoveryTimer = null;
      if (this.disposal.isDisposed) {
        return;
      }
      this.logger.info('Attempting to recover connection');
      void this.reinitialize().catch((error: unknown) => {
        this.logger.error('Connection recovery failed', toError(error));
      });
    }, delay);
  }

  private cancelRecovery(): void {
    if (this.recoveryTimer) {
      clearTimeout(this.recoveryTimer);
      this.recoveryTimer = null;
    }
  }

  private assertNotDisposed(): void {
    if (this.disposal.isDisposed) {
      throw new ClientDisposedError();
    }
  }
}
