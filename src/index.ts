/**
 * Resilient AMQP publishing client.
 *
 * One long-lived handle that publishes persistent messages, reconnects on its
 * own and reports connectivity through a status stream.
 *
 * @example
 * ```typescript
 * import { createTemplate, declareDirectRoute } from 'amqp-resilient-publisher';
 *
 * const template = createTemplate({ host: 'localhost', username: 'guest', password: 'guest' });
 *
 * template.onStatusChanged(status => console.log(`[status] ${status}`));
 * template.onReturned(msg => console.warn(`returned: ${msg.replyText}`));
 *
 * await template.ready;
 * await declareDirectRoute(template.infrastructure(), {
 *   exchange: 'orders',
 *   queue: 'orders.created',
 *   routingKey: 'created',
 * });
 *
 * await template.send('orders', 'created', Buffer.from('hello'));
 * await template.sendJson('orders', 'missing.key', { id: 1 }, true); // comes back through onReturned
 *
 * await template.dispose();
 * ```
 */

// Core exports
export { AmqpTemplate, createTemplate } from './template';
export type { MessageBody } from './template';
export { LifecycleManager } from './lifecycle';
export type { Lifecycle } from './lifecycle';
export { declareDirectRoute } from './topology';
export { StatusNotifier, describeEvent } from './status';
export { ChannelHandle, ConnectionHandle } from './handles';
export type { CloseRequest } from './handles';
export { resolveOptions, DEFAULT_PORT, DEFAULT_RECOVERY_INTERVAL } from './config';
export { createLogger, DEFAULT_LOG_PREFIX } from './logger';
export type { Logger } from './logger';

// Errors
export {
  AmqpClientError,
  ConnectionInitError,
  ChannelUnavailableError,
  PublishFailedError,
  ClientDisposedError,
} from './errors';

// Types
export type {
  ClientOptions,
  ResolvedClientOptions,
  StatusCategory,
  StatusEvent,
  StatusHandler,
  ShutdownInitiator,
  ShutdownReason,
  LifecycleEvent,
  ReturnedMessage,
  ReturnHandler,
  InfrastructureAccess,
  DirectRouteSpec,
  RawConnection,
  RawChannel,
  RawMessage,
} from './types';
