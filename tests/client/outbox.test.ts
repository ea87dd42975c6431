import '../support/env';
import { describe, it } from 'node:test';
import * as assert from 'node:assert';
import { ApiError, isTransient, Outbox, type LocalMessage, type ServerMessage } from '@huddle/client';
import { ids } from '../support/fakes';

const CONV_A = '00000000-0000-4000-8000-0000000000c1';
const CONV_B = '00000000-0000-4000-8000-0000000000c2';

const build = (maxAttempts?: number) => {
  let n = 0;
  return new Outbox({
    senderId: ids.alice,
    maxAttempts,
    now: () => new Date('2026-01-01T00:00:00.000Z'),
    newId: () => `client-${(n += 1)}`,
  });
};

const echo = (m: LocalMessage, seq = 1): ServerMessage => ({
  id: `server-${m.client_id}`,
  conversation_id: m.conversation_id,
  sender_id: m.sender_id,
  client_id: m.client_id,
  body: m.body,
  seq,
  created_at: m.created_at,
});

describe('isTransient', () => {
  it('retries network, throttling and server failures', () => {
    assert.strictEqual(isTransient(new ApiError(0, 'network_error')), true);
    assert.strictEqual(isTransient(new ApiError(408, 'timeout')), true);
    assert.strictEqual(isTransient(new ApiError(429, 'rate_limited')), true);
    assert.strictEqual(isTransient(new ApiError(503, 'unavailable')), true);
    assert.strictEqual(isTransient(new Error('socket hang up')), true);
  });

  it('does not retry client errors', () => {
    assert.strictEqual(isTransient(new ApiError(400, 'invalid_request')), false);
    assert.strictEqual(isTransient(new ApiError(404, 'not_found')), false);
  });
});

describe('Outbox', () => {
  it('queues messages as pending', () => {
    const outbox = build();
    const message = outbox.enqueue(CONV_A, 'hello');
    assert.deepStrictEqual(message, {
      client_id: 'client-1',
      conversation_id: CONV_A,
      sender_id: ids.alice,
      body: 'hello',
      created_at: '2026-01-01T00:00:00.000Z',
      status: 'pending',
      attempts: 0,
      retryable: false,
      error: null,
      server_id: null,
    });
  });

  it('lists in creation order and filters by conversation', () => {
    const outbox = build();
    outbox.enqueue(CONV_A, 'one');
    outbox.enqueue(CONV_B, 'two');
    outbox.enqueue(CONV_A, 'three');
    assert.deepStrictEqual(
      outbox.list().map((m) => m.body),
      ['one', 'two', 'three'],
    );
    assert.deepStrictEqual(
      outbox.list(CONV_A).map((m) => m.body),
      ['one', 'three'],
    );
  });

  it('stops retrying after the attempt limit', () => {
    const outbox = build(2);
    const { client_id } = outbox.enqueue(CONV_A, 'hello');
    outbox.markFailed(client_id, new ApiError(503, 'unavailable'));
    assert.strictEqual(outbox.get(client_id)?.retryable, true);
    assert.strictEqual(outbox.get(client_id)?.error, 'unavailable');
    outbox.markFailed(client_id, new ApiError(503, 'unavailable'));
    assert.strictEqual(outbox.get(client_id)?.attempts, 2);
    assert.strictEqual(outbox.get(client_id)?.retryable, false);
  });

  it('never retries a rejected message', () => {
    const outbox = build();
    const { client_id } = outbox.enqueue(CONV_A, 'hello');
    outbox.markFailed(client_id, new ApiError(403, 'forbidden'));
    assert.strictEqual(outbox.get(client_id)?.status, 'failed');
    assert.strictEqual(outbox.get(client_id)?.retryable, false);
  });

  it('flushes pending and retryable messages', async () => {
    const outbox = build();
    const ok = outbox.enqueue(CONV_A, 'ok');
    const flaky = outbox.enqueue(CONV_A, 'flaky');
    const rejected = outbox.enqueue(CONV_A, 'rejected');
    outbox.markFailed(rejected.client_id, new ApiError(400, 'invalid_request'));

    const first = await outbox.flush(async (m) => {
      if (m.body === 'flaky') throw new ApiError(0, 'network_error');
      return echo(m);
    });
    assert.deepStrictEqual(first, { sent: 1, failed: 1 });
    assert.strictEqual(outbox.get(ok.client_id)?.status, 'sent');
    assert.strictEqual(outbox.get(ok.client_id)?.server_id, 'server-client-1');

    const attempted: string[] = [];
    const second = await outbox.flush(async (m) => {
      attempted.push(m.body);
      return echo(m, 2);
    });
    assert.deepStrictEqual(attempted, ['flaky']);
    assert.deepStrictEqual(second, { sent: 1, failed: 0 });
    assert.strictEqual(outbox.get(flaky.client_id)?.status, 'sent');
    assert.strictEqual(outbox.get(rejected.client_id)?.status, 'failed');
  });

  it('returns copies', () => {
    const outbox = build();
    const message = outbox.enqueue(CONV_A, 'hello');
    message.body = 'changed';
    assert.strictEqual(outbox.get(message.client_id)?.body, 'hello');
  });
});
