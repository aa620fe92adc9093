import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { MemoryConnection } from './channel/memory.js';
import { PendingWait, ReplyCorrelator } from './correlator.js';
import { ChannelUnavailable, SendRejected } from './errors.js';
import type { ResponderIdentity } from './types.js';

const bot: ResponderIdentity = { id: '1001', username: 'a_bot' };
const otherBot: ResponderIdentity = { id: '2002', username: 'b_bot' };

describe('PendingWait', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test('only the first fulfillment counts', async () => {
    const wait = new PendingWait(bot, 5_000);
    const first = { sender: { id: '1001' }, chatId: '1001', text: 'first', timestamp: 0, messageId: 1 };
    const second = { sender: { id: '1001' }, chatId: '1001', text: 'second', timestamp: 0, messageId: 2 };

    expect(wait.fulfill(first)).toBe(true);
    expect(wait.fulfill(second)).toBe(false);
    await expect(wait.wait()).resolves.toBe(first);
  });

  test('resolves with null at the deadline', async () => {
    const wait = new PendingWait(bot, 5_000);
    const outcome = wait.wait();

    await vi.advanceTimersByTimeAsync(5_000);

    await expect(outcome).resolves.toBeNull();
    expect(wait.settled).toBe(true);
  });

  test('ignores fulfillment after dispose', async () => {
    const wait = new PendingWait(bot, 5_000);
    wait.dispose();

    expect(wait.fulfill({ sender: { id: '1001' }, chatId: '1001', text: 'late', timestamp: 0, messageId: 1 })).toBe(false);
    await expect(wait.wait()).resolves.toBeNull();
  });
});

describe('ReplyCorrelator', () => {
  let connection: MemoryConnection;
  let correlator: ReplyCorrelator;

  beforeEach(async () => {
    vi.useFakeTimers();
    connection = new MemoryConnection();
    await connection.start();
    correlator = new ReplyCorrelator(connection);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test('returns the reply that arrives before the deadline', async () => {
    const unsubscribe = vi.spyOn(connection, 'unsubscribe');
    const pending = correlator.sendAndAwaitReply(bot, '+15551234567', 12);

    await vi.advanceTimersByTimeAsync(2_000);
    expect(connection.emit('1001', '+15551234567 is registered')).toBe(1);

    await expect(pending).resolves.toEqual({ sent: true, reply: '+15551234567 is registered' });
    expect(unsubscribe).toHaveBeenCalledTimes(1);
    expect(connection.listenerCount).toBe(0);
    expect(connection.sent).toEqual([{ destination: bot, text: '+15551234567' }]);
  });

  test('times out no earlier than the requested wait', async () => {
    const start = Date.now();
    let settled = false;
    const pending = correlator.sendAndAwaitReply(bot, 'hello', 12).then((result) => {
      settled = true;
      return result;
    });

    await vi.advanceTimersByTimeAsync(11_999);
    expect(settled).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await expect(pending).resolves.toEqual({ sent: true });
    expect(Date.now() - start).toBeGreaterThanOrEqual(12_000);
    expect(connection.listenerCount).toBe(0);
  });

  test('catches a reply delivered while the send is still in flight', async () => {
    connection.onSend = ({ destination }) => {
      connection.emit(destination.id, 'instant');
    };

    await expect(correlator.sendAndAwaitReply(bot, 'hello', 12)).resolves.toEqual({ sent: true, reply: 'instant' });
    expect(connection.listenerCount).toBe(0);
  });

  test('reports a rejected send without waiting', async () => {
    const failure = new SendRejected('flood wait: 30s', 30);
    connection.sendFailure = failure;

    const result = await correlator.sendAndAwaitReply(bot, 'hello', 12);

    expect(result).toEqual({ sent: false, error: failure });
    expect(connection.listenerCount).toBe(0);
  });

  test('reports an unavailable channel', async () => {
    const idle = new MemoryConnection();

    const result = await new ReplyCorrelator(idle).sendAndAwaitReply(bot, 'hello', 12);

    expect(result.sent).toBe(false);
    expect(!result.sent && result.error).toBeInstanceOf(ChannelUnavailable);
    expect(idle.listenerCount).toBe(0);
  });

  test('wraps unknown send errors as SendRejected', async () => {
    vi.spyOn(connection, 'send').mockRejectedValue(new Error('socket closed'));

    const result = await correlator.sendAndAwaitReply(bot, 'hello', 12);

    expect(result.sent).toBe(false);
    if (!result.sent) {
      expect(result.error).toBeInstanceOf(SendRejected);
      expect(result.error.message).toBe('socket closed');
    }
  });

  test('a reply from one bot never fulfills a wait on another', async () => {
    const waitA = correlator.sendAndAwaitReply(bot, 'to a', 12);
    const waitB = correlator.sendAndAwaitReply(otherBot, 'to b', 12);
    await vi.advanceTimersByTimeAsync(100);

    connection.emit('1001', 'from a');

    await expect(waitA).resolves.toEqual({ sent: true, reply: 'from a' });
    expect(connection.listenerCount).toBe(1);

    await vi.advanceTimersByTimeAsync(12_000);
    await expect(waitB).resolves.toEqual({ sent: true });
    expect(connection.listenerCount).toBe(0);
  });

  test('ignores what the bot posts outside the private dialog', async () => {
    const pending = correlator.sendAndAwaitReply(bot, 'hello', 12);
    await vi.advanceTimersByTimeAsync(10);

    expect(connection.emit('1001', 'posted in a group', '-100500')).toBe(0);
    connection.emit('1001', 'direct answer');

    await expect(pending).resolves.toEqual({ sent: true, reply: 'direct answer' });
  });

  test('the first reply wins and later ones stay visible to other listeners', async () => {
    const observed: string[] = [];
    connection.subscribe(
      (event) => event.sender.id === '1001',
      (event) => {
        observed.push(event.text);
      }
    );
    const pending = correlator.sendAndAwaitReply(bot, 'hello', 12);
    await vi.advanceTimersByTimeAsync(10);

    connection.emit('1001', 'first');
    connection.emit('1001', 'second');

    await expect(pending).resolves.toEqual({ sent: true, reply: 'first' });
    expect(observed).toEqual(['first', 'second']);
  });

  test('still sends when the timeout is zero and returns at once', async () => {
    const result = await correlator.sendAndAwaitReply(bot, 'hello', 0);

    expect(result).toEqual({ sent: true });
    expect(connection.sent).toEqual([{ destination: bot, text: 'hello' }]);
    expect(connection.listenerCount).toBe(0);
  });

  test('results are frozen', async () => {
    const result = await correlator.sendAndAwaitReply(bot, 'hello', 0);

    expect(Object.isFrozen(result)).toBe(true);
  });

  test('unsubscribing again after the wait resolved is harmless', async () => {
    const unsubscribe = vi.spyOn(connection, 'unsubscribe');
    await correlator.sendAndAwaitReply(bot, 'hello', 0);

    const [handle] = unsubscribe.mock.calls[0];
    expect(() => connection.unsubscribe(handle)).not.toThrow();
    expect(connection.listenerCount).toBe(0);
  });
});
