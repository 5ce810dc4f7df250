/**
 * Type definitions for the AMQP publishing client.
 * Keeps amqplib's shapes at the edges and exposes a small, typed surface.
 */

import type amqp from 'amqplib';
import type { Logger } from './logger';

/**
 * Options recognized when constructing a client.
 */
export interface ClientOptions {
  /** Broker host name. Default: 'localhost'. */
  host?: string;
  /** Broker port. Default: 5672 (AMQP default). */
  port?: number;
  /** Username. Default: 'guest'. */
  username?: string;
  /** Password. Default: 'guest'. */
  password?: string;
  /** Virtual host. Default: '/'. */
  vhost?: string;
  /** Heartbeat interval in seconds. Default: 0 (server decides). */
  heartbeat?: number;
  /** Delay between automatic recovery attempts in milliseconds. Default: 5000ms. */
  recoveryInterval?: number;
  /** Logger for lifecycle events. Default: console-backed logger. */
  logger?: Logger;
  /** Line prefix for the default console logger. Ignored when `logger` is given. Default: '[AmqpClient]'. */
  logPrefix?: string;
}

/**
 * Client options with every default applied.
 */
export type ResolvedClientOptions = Required<ClientOptions>;

/**
 * Categories a status event can carry.
 */
export type StatusCategory =
  | 'Connected'
  | 'ConnectionFailed'
  | 'ConnectionShutdown'
  | 'ConnectionBlocked'
  | 'ConnectionUnblocked'
  | 'CallbackError'
  | 'ChannelShutdown';

/**
 * Human-readable notification about the client's connectivity.
 */
export interface StatusEvent {
  category: StatusCategory;
  description: string;
}

export type StatusHandler = (description: string, event: StatusEvent) => void;

/**
 * Who initiated a close.
 */
export type ShutdownInitiator = 'application' | 'peer';

/**
 * Reason attached to a connection or channel shutdown.
 */
export interface ShutdownReason {
  /** AMQP reply code, when the transport reported one. */
  code?: number;
  text: string;
  initiator: ShutdownInitiator;
}

/**
 * Raw lifecycle notifications produced by the supervisor and the channel manager,
 * before they are rendered into status events.
 */
export type LifecycleEvent =
  | { kind: 'connected'; host: string; port: number }
  | { kind: 'connection-failed'; error: Error }
  | { kind: 'connection-shutdown'; reason: ShutdownReason }
  | { kind: 'connection-blocked'; reason: string }
  | { kind: 'connection-unblocked' }
  | { kind: 'callback-error'; error: Error }
  | { kind: 'channel-shutdown'; reason: ShutdownReason };

/**
 * Receiver of raw lifecycle notifications.
 */
export type LifecycleEventSink = (event: LifecycleEvent) => void;

/**
 * A mandatory message the broker could not route.
 */
export interface ReturnedMessage {
  exchange: string;
  routingKey: string;
  replyCode: number;
  replyText: string;
  content: Buffer;
  properties: amqp.MessageProperties;
}

export type ReturnHandler = (message: ReturnedMessage) => void;

/**
 * Raw connection from amqplib (for reference).
 */
export type RawConnection = Awaited<ReturnType<typeof amqp.connect>>;

/**
 * Raw channel from amqplib (for reference).
 */
export type RawChannel = amqp.Channel;

/**
 * Raw message from amqplib (for reference).
 */
export type RawMessage = amqp.Message;

/**
 * Escape hatch onto the live handles, reserved for infrastructure setup
 * (exchange and queue declaration).
 */
export interface InfrastructureAccess {
  getConnection(): RawConnection | null;
  getChannel(): RawChannel | null;
}

/**
 * Direct route declared by the topology collaborator.
 */
export interface DirectRouteSpec {
  exchange: string;
  queue: string;
  routingKey: string;
}
