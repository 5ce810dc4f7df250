/**
 * Tests for the publishing client against a mocked amqplib transport.
 */

import { vi } from 'vitest';
import amqp from 'amqplib';
import { AmqpTemplate, createTemplate } from '../src/template';
import { ChannelUnavailableError, ClientDisposedError, PublishFailedError } from '../src/errors';
import type { ClientOptions, ReturnedMessage, StatusEvent } from '../src/types';
import { FakeConnection, asConnection, createTestLogger, deferred } from './fakes';

vi.mock('amqplib', () => ({
  default: { connect: vi.fn() },
}));

const connect = vi.mocked(amqp.connect);

describe('AmqpTemplate', () => {
  let logger: ReturnType<typeof createTestLogger>;
  let fake: FakeConnection;
  let template: AmqpTemplate;
  let statuses: StatusEvent[];

  const start = (options: ClientOptions = {}): AmqpTemplate => {
    template = createTemplate({ logger, recoveryInterval: 60_000, ...options });
    statuses = [];
    template.onStatusChanged((_, event) => statuses.push(event));
    return template;
  };

  const categories = () => statuses.map(s => s.category);

  beforeEach(() => {
    connect.mockReset();
    logger = createTestLogger();
    fake = new FakeConnection();
    connect.mockResolvedValue(asConnection(fake));
  });

  afterEach(async () => {
    await template.dispose();
  });

  describe('initialization', () => {
    it('should connect with the configured endpoint and credentials', async () => {
      start({ host: 'rabbit.internal', port: 5673, username: 'app', password: 'test-secret' });
      await template.ready;

      expect(connect).toHaveBeenCalledWith({
        protocol: 'amqp',
        hostname: 'rabbit.internal',
        port: 5673,
        username: 'app',
        password: 'test-secret',
        vhost: '/',
        heartbeat: 0,
      });
      expect(fake.createChannel).toHaveBeenCalledTimes(1);
    });

    it('should emit exactly one Connected event', async () => {
      start();
      await template.ready;

      expect(statuses).toEqual([
        { category: 'Connected', description: 'Connection established to localhost:5672' },
      ]);
    });

    it('should not block the constructor', async () => {
      const pending = deferred<ReturnType<typeof asConnection>>();
      connect.mockReturnValueOnce(pending.promise);

      start();

      expect(connect).toHaveBeenCalledTimes(0);
      expect(statuses).toEqual([]);

      pending.resolve(asConnection(fake));
      await template.ready;

      expect(categories()).toEqual(['Connected']);
    });

    it('should report an unreachable broker through the status stream only', async () => {
      connect.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:5672'));

      start();
      await expect(template.ready).resolves.toBeUndefined();

      expect(statuses).toEqual([
        {
          category: 'ConnectionFailed',
          description: 'Failed to establish connection to localhost:5672: connect ECONNREFUSED 127.0.0.1:5672',
        },
      ]);
    });
  });

  describe('send', () => {
    it('should publish a persistent message after Connected', async () => {
      start();
      await template.ready;

      const sent = await template.send('ex', 'key', Buffer.from('hello'));

      expect(sent).toBe(true);
      expect(categories()).toEqual(['Connected']);
      expect(fake.channels[0].publish).toHaveBeenCalledWith('ex', 'key', Buffer.from('hello'), {
        persistent: true,
        mandatory: false,
      });
    });

    it('should accept string bodies', async () => {
      start();
      await template.ready;

      await template.send('ex', 'key', 'hello');

      expect(fake.channels[0].publish).toHaveBeenCalledWith('ex', 'key', Buffer.from('hello', 'utf-8'), {
        persistent: true,
        mandatory: false,
      });
    });

    it('should serialize JSON messages', async () => {
      start();
      await template.ready;

      await template.sendJson('ex', 'key', { id: 7 });

      expect(fake.channels[0].publish).toHaveBeenCalledWith('ex', 'key', Buffer.from('{"id":7}', 'utf-8'), {
        persistent: true,
        mandatory: false,
        contentType: 'application/json',
        contentEncoding: 'utf-8',
      });
    });

    it('should wait for an in-flight initialization instead of failing', async () => {
      const pending = deferred<ReturnType<typeof asConnection>>();
      connect.mockReturnValueOnce(pending.promise);
      start();

      const sending = template.send('ex', 'key', 'early');
      pending.resolve(asConnection(fake));

      await expect(sending).resolves.toBe(true);
      expect(connect).toHaveBeenCalledTimes(1);
      expect(fake.channels).toHaveLength(1);
    });

    it('should raise ChannelUnavailableError after one failed reinitialization', async () => {
      connect.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:5672'));
      start();
      await template.ready;

      await expect(template.send('ex', 'key', 'hello')).rejects.toBeInstanceOf(ChannelUnavailableError);

      expect(connect).toHaveBeenCalledTimes(2);
      expect(categories()).toEqual(['ConnectionFailed', 'ConnectionFailed']);
      expect(categories()).not.toContain('Connected');
    });

    it('should reopen the connection after the broker forced it closed', async () => {
      start();
      await template.ready;
      const replacement = new FakeConnection();
      connect.mockResolvedValueOnce(asConnection(replacement));

      fake.forceClose(320, "CONNECTION_FORCED - broker forced connection closure with reason 'shutdown'");
      await template.send('ex', 'key', 'after restart');

      expect(statuses).toContainEqual({
        category: 'ConnectionShutdown',
        description:
          "Connection shutdown: CONNECTION_FORCED - broker forced connection closure with reason 'shutdown' (code 320, initiated by peer)",
      });
      expect(connect).toHaveBeenCalledTimes(2);
      expect(fake.channels[0].publish).not.toHaveBeenCalled();
      expect(replacement.channels[0].publish).toHaveBeenCalledWith('ex', 'key', Buffer.from('after restart'), {
        persistent: true,
        mandatory: false,
      });
      expect(categories()).toEqual(['Connected', 'ChannelShutdown', 'ConnectionShutdown', 'Connected']);
    });

    it('should recreate only the channel when the connection is still open', async () => {
      start();
      await template.ready;

      fake.channels[0].failWith(404, "NOT_FOUND - no exchange 'missing' in vhost '/'");
      await template.send('ex', 'key', 'hello');

      expect(statuses[1]).toEqual({
        category: 'ChannelShutdown',
        description: "Channel shutdown: NOT_FOUND - no exchange 'missing' in vhost '/' (code 404, initiated by peer)",
      });
      expect(connect).toHaveBeenCalledTimes(1);
      expect(fake.createChannel).toHaveBeenCalledTimes(2);
      expect(fake.channels[1].publish).toHaveBeenCalledTimes(1);
    });

    it('should reinitialize once for concurrent sends', async () => {
      start();
      await template.ready;
      fake.channels[0].failWith(406, 'PRECONDITION_FAILED');

      await Promise.all([template.send('ex', 'a', 'one'), template.send('ex', 'b', 'two')]);

      expect(fake.createChannel).toHaveBeenCalledTimes(2);
      expect(fake.channels[1].publish).toHaveBeenCalledTimes(2);
    });

    it('should wrap and rethrow transport publish errors', async () => {
      start();
      await template.ready;
      fake.channels[0].publish.mockImplementationOnce(() => {
        throw new Error('Channel closed');
      });

      const sending = template.send('ex', 'key', 'hello');

      await expect(sending).rejects.toBeInstanceOf(PublishFailedError);
      await expect(sending).rejects.toThrow("Failed to publish to exchange 'ex' with routing key 'key': Channel closed");
      expect(logger.error).toHaveBeenCalledWith('Failed to send message', expect.any(PublishFailedError));
    });

    it('should pass the transport flow-control result through', async () => {
      start();
      await template.ready;
      fake.channels[0].publish.mockReturnValueOnce(false);

      await expect(template.send('ex', 'key', 'hello')).resolves.toBe(false);
    });
  });

  describe('mandatory messages', () => {
    it('should report unroutable messages through onReturned, not as an error', async () => {
      start();
      await template.ready;
      const returned: ReturnedMessage[] = [];
      template.onReturned(message => returned.push(message));

      await expect(template.send('ex', 'non.existent.key', 'lost', true)).resolves.toBe(true);
      expect(fake.channels[0].publish).toHaveBeenCalledWith('ex', 'non.existent.key', Buffer.from('lost'), {
        persistent: true,
        mandatory: true,
      });

      fake.channels[0].emit('return', {
        fields: { exchange: 'ex', routingKey: 'non.existent.key', replyCode: 312, replyText: 'NO_ROUTE' },
        content: Buffer.from('lost'),
        properties: { headers: {} },
      });

      expect(returned).toEqual([
        {
          exchange: 'ex',
          routingKey: 'non.existent.key',
          replyCode: 312,
          replyText: 'NO_ROUTE',
          content: Buffer.from('lost'),
          properties: { headers: {} },
        },
      ]);
    });

    it('should report a throwing return handler as a callback error', async () => {
      start();
      await template.ready;
      const after = vi.fn();
      template.onReturned(() => {
        throw new Error('boom');
      });
      template.onReturned(after);

      fake.channels[0].emit('return', {
        fields: { exchange: 'ex', routingKey: 'k', replyCode: 312, replyText: 'NO_ROUTE' },
        content: Buffer.from('x'),
        properties: {},
      });

      expect(after).toHaveBeenCalledTimes(1);
      expect(statuses[statuses.length - 1]).toEqual({ category: 'CallbackError', description: 'Callback error: boom' });
    });
  });

  describe('status notifications', () => {
    it('should report blocked and unblocked connections', async () => {
      start();
      await template.ready;

      fake.emit('blocked', 'low on memory');
      fake.emit('unblocked');

      expect(statuses.slice(1)).toEqual([
        { category: 'ConnectionBlocked', description: 'Connection blocked: low on memory' },
        { category: 'ConnectionUnblocked', description: 'Connection unblocked' },
      ]);
    });

    it('should keep delivering when a subscriber throws', async () => {
      start();
      const received: string[] = [];
      template.onStatusChanged(() => {
        throw new Error('subscriber broke');
      });
      template.onStatusChanged(description => received.push(description));

      await template.ready;

      expect(received).toEqual(['Connection established to localhost:5672']);
      expect(logger.error).toHaveBeenCalledWith('Status subscriber failed', expect.any(Error));
    });

    it('should stop delivering after unsubscribe', async () => {
      start();
      const handler = vi.fn();
      const unsubscribe = template.onStatusChanged(handler);
      unsubscribe();

      await template.ready;

      expect(handler).not.toHaveBeenCalled();
      expect(categories()).toEqual(['Connected']);
    });
  });

  describe('automatic recovery', () => {
    it('should retry a failed initial connection on the recovery interval', async () => {
      connect.mockRejectedValueOnce(new Error('connect ECONNREFUSED 127.0.0.1:5672'));
      start({ recoveryInterval: 10 });

      await vi.waitFor(() => expect(fake.channels).toHaveLength(1));

      expect(categories()).toEqual(['ConnectionFailed', 'Connected']);
      expect(connect).toHaveBeenCalledTimes(2);
    });

    it('should reconnect after the broker closes the connection', async () => {
      start({ recoveryInterval: 10 });
      await template.ready;
      const replacement = new FakeConnection();
      connect.mockResolvedValueOnce(asConnection(replacement));

      fake.forceClose(320, 'CONNECTION_FORCED');

      await vi.waitFor(() => expect(replacement.channels).toHaveLength(1));
      expect(categories()).toEqual(['Connected', 'ChannelShutdown', 'ConnectionShutdown', 'Connected']);
    });
  });

  describe('infrastructure', () => {
    it('should expose the live raw handles', async () => {
      start();
      await template.ready;

      const access = template.infrastructure();

      expect(access.getConnection()).toBe(fake);
      expect(access.getChannel()).toBe(fake.channels[0]);
    });

    it('should return null handles before any connection exists', async () => {
      connect.mockRejectedValue(new Error('unreachable'));
      start();
      await template.ready;

      const access = template.infrastructure();

      expect(access.getConnection()).toBeNull();
      expect(access.getChannel()).toBeNull();
    });
  });

  describe('dispose', () => {
    it('should close the channel before the connection', async () => {
      start();
      await template.ready;
      const channel = fake.channels[0];

      await template.dispose();

      expect(channel.close).toHaveBeenCalledTimes(1);
      expect(fake.close).toHaveBeenCalledTimes(1);
      expect(channel.close.mock.invocationCallOrder[0]).toBeLessThan(fake.close.mock.invocationCallOrder[0]);
      expect(statuses.slice(1)).toEqual([
        {
          category: 'ChannelShutdown',
          description: 'Channel shutdown: Closing channel via dispose (code 200, initiated by application)',
        },
        {
          category: 'ConnectionShutdown',
          description: 'Connection shutdown: Closing connection via dispose (code 200, initiated by application)',
        },
      ]);
    });

    it('should be idempotent', async () => {
      start();
      await template.ready;

      await Promise.all([template.dispose(), template.dispose()]);
      await template.dispose();

      expect(fake.channels[0].close).toHaveBeenCalledTimes(1);
      expect(fake.close).toHaveBeenCalledTimes(1);
      expect(template.isDisposed).toBe(true);
    });

    it('should never raise and still close the connection when the channel close fails', async () => {
      start();
      await template.ready;
      fake.channels[0].close.mockRejectedValueOnce(new Error('channel already closing'));

      await expect(template.dispose()).resolves.toBeUndefined();

      expect(fake.close).toHaveBeenCalledTimes(1);
      expect(logger.error).toHaveBeenCalledWith('Failed to close channel during dispose', expect.any(Error));
    });

    it('should never raise when the connection close fails', async () => {
      start();
      await template.ready;
      fake.close.mockRejectedValueOnce(new Error('socket hang up'));

      await expect(template.dispose()).resolves.toBeUndefined();

      expect(logger.error).toHaveBeenCalledWith('Failed to close connection during dispose', expect.any(Error));
    });

    it('should wait for an in-flight initialization and close what it opened', async () => {
      const pending = deferred<ReturnType<typeof asConnection>>();
      connect.mockReturnValueOnce(pending.promise);
      start();
      await Promise.resolve();

      const disposing = template.dispose();
      pending.resolve(asConnection(fake));
      await disposing;

      expect(fake.channels[0].close).toHaveBeenCalledTimes(1);
      expect(fake.close).toHaveBeenCalledTimes(1);
    });

    it('should not schedule recovery for its own close', async () => {
      start({ recoveryInterval: 10 });
      await template.ready;

      await template.dispose();
      await new Promise(resolve => setTimeout(resolve, 30));

      expect(connect).toHaveBeenCalledTimes(1);
    });

    it('should reject every operation afterwards', async () => {
      start();
      await template.ready;
      await template.dispose();

      await expect(template.send('ex', 'key', 'late')).rejects.toBeInstanceOf(ClientDisposedError);
      await expect(template.sendJson('ex', 'key', {})).rejects.toBeInstanceOf(ClientDisposedError);
      expect(() => template.onStatusChanged(vi.fn())).toThrow(ClientDisposedError);
      expect(() => template.onReturned(vi.fn())).toThrow(ClientDisposedError);
      expect(() => template.infrastructure()).toThrow(ClientDisposedError);
    });
  });
});
