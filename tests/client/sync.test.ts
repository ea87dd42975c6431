import '../support/env';
import { describe, it } from 'node:test';
import * as assert from 'node:assert';
import {
  ApiError,
  ConversationSync,
  Outbox,
  type ServerMessage,
  type SyncApi,
  type TimelineItem,
} from '@huddle/client';
import { ids } from '../support/fakes';

const CONV = '00000000-0000-4000-8000-0000000000c1';

const row = (seq: number, body: string, clientId: string | null = null, sender = ids.bob): ServerMessage => ({
  id: `s${seq}`,
  conversation_id: CONV,
  sender_id: sender,
  client_id: clientId,
  body,
  seq,
  created_at: '2026-01-01T00:00:00.000Z',
});

type Page = { messages: ServerMessage[]; next_cursor: number | null };

const fakeApi = (handlers: {
  list?: (after: number | undefined) => Promise<Page>;
  send?: (body: string, clientId: string | undefined) => Promise<{ message: ServerMessage; deduped: boolean }>;
}) => {
  const afters: Array<number | undefined> = [];
  const api: SyncApi = {
    async listMessages(_id: string, page: { after?: number; limit?: number } = {}) {
      afters.push(page.after);
      if (!handlers.list) return { messages: [], next_cursor: page.after ?? null };
      return handlers.list(page.after);
    },
    async sendMessage(_id: string, body: string, clientId?: string) {
      if (!handlers.send) throw new Error('unexpected send');
      return handlers.send(body, clientId);
    },
  };
  return { api, afters };
};

const build = (
  api: SyncApi,
  options: { intervalMs?: number; maxIntervalMs?: number } = {},
  maxAttempts?: number,
) => {
  let n = 0;
  const outbox = new Outbox({
    senderId: ids.alice,
    maxAttempts,
    now: () => new Date('2026-01-01T00:00:00.000Z'),
    newId: () => `client-${(n += 1)}`,
  });
  const timelines: TimelineItem[][] = [];
  const errors: unknown[] = [];
  const sync = new ConversationSync({
    api,
    conversationId: CONV,
    outbox,
    onChange: (timeline) => timelines.push(timeline),
    onError: (err) => errors.push(err),
    ...options,
  });
  const latest = () =>
    (timelines[timelines.length - 1] ?? []).map((i) =>
      i.kind === 'server' ? `server:${i.message.seq}` : `local:${i.message.client_id}:${i.message.status}`,
    );
  return { sync, outbox, timelines, errors, latest };
};

describe('ConversationSync', () => {
  it('polls forward from the last seq', async () => {
    const pages: Page[] = [
      { messages: [row(1, 'hi'), row(2, 'there')], next_cursor: 2 },
      { messages: [], next_cursor: 2 },
    ];
    const { api, afters } = fakeApi({ list: async () => pages.shift() ?? { messages: [], next_cursor: null } });
    const { sync, latest } = build(api);

    await sync.poll();
    await sync.poll();
    assert.deepStrictEqual(afters, [undefined, 2]);
    assert.strictEqual(sync.lastSeq, 2);
    assert.deepStrictEqual(latest(), ['server:1', 'server:2']);
  });

  it('shows a message optimistically and drops it once confirmed', async () => {
    const { api } = fakeApi({
      send: async (body, clientId) => ({ message: row(1, body, clientId ?? null, ids.alice), deduped: false }),
    });
    const { sync, outbox, timelines, latest } = build(api);

    const sent = await sync.send('hello');
    assert.strictEqual(sent?.status, 'sent');
    assert.strictEqual(sent?.server_id, 's1');
    assert.deepStrictEqual(
      timelines[0].map((i) => i.kind),
      ['local'],
    );
    assert.deepStrictEqual(latest(), ['server:1']);
    assert.deepStrictEqual(outbox.list(), []);
  });

  it('keeps failed messages visible and retries them', async () => {
    let fail = true;
    const { api } = fakeApi({
      send: async (body, clientId) => {
        if (fail) throw new ApiError(503, 'unavailable');
        return { message: row(1, body, clientId ?? null, ids.alice), deduped: false };
      },
    });
    const { sync, outbox, latest } = build(api);

    const failed = await sync.send('hello');
    assert.strictEqual(failed?.status, 'failed');
    assert.strictEqual(failed?.retryable, true);
    assert.deepStrictEqual(latest(), ['local:client-1:failed']);

    fail = false;
    await sync.retry();
    assert.deepStrictEqual(latest(), ['server:1']);
    assert.deepStrictEqual(outbox.list(), []);
  });

  it('does not duplicate a message the server stored before the client heard back', async () => {
    let sends = 0;
    const stored = row(1, 'hello', 'client-1', ids.alice);
    const { api } = fakeApi({
      list: async () => ({ messages: [stored], next_cursor: 1 }),
      send: async () => {
        sends += 1;
        if (sends === 1) throw new ApiError(0, 'network_error');
        return { message: stored, deduped: true };
      },
    });
    const { sync, outbox, latest } = build(api);

    const failed = await sync.send('hello');
    assert.strictEqual(failed?.status, 'failed');
    await sync.poll();
    assert.deepStrictEqual(latest(), ['server:1']);
    assert.strictEqual(outbox.get('client-1'), undefined);

    await sync.retry();
    assert.deepStrictEqual(latest(), ['server:1']);
    assert.strictEqual(sends, 1);
  });

  it('confirms an exhausted failed message once the server row shows up', async () => {
    const stored = row(1, 'hello', 'client-1', ids.alice);
    let listed: ServerMessage[] = [];
    const { api } = fakeApi({
      list: async () => ({ messages: listed, next_cursor: listed.length ? 1 : null }),
      send: async () => {
        throw new ApiError(504, 'http_504');
      },
    });
    const { sync, outbox, latest } = build(api, {}, 1);

    const failed = await sync.send('hello');
    assert.strictEqual(failed?.status, 'failed');
    assert.strictEqual(failed?.retryable, false);
    assert.deepStrictEqual(latest(), ['local:client-1:failed']);

    listed = [stored];
    await sync.poll();
    await sync.retry();
    assert.deepStrictEqual(latest(), ['server:1']);
    assert.deepStrictEqual(outbox.list(), []);
  });

  it('backs off while polls fail and resets after a success', async () => {
    let down = true;
    const { api } = fakeApi({
      list: async () => {
        if (down) throw new ApiError(0, 'network_error');
        return { messages: [], next_cursor: null };
      },
    });
    const { sync, errors } = build(api, { intervalMs: 1000, maxIntervalMs: 3000 });

    assert.strictEqual(await sync.refresh(), false);
    assert.strictEqual(sync.delayMs, 2000);
    await sync.refresh();
    assert.strictEqual(sync.delayMs, 3000);
    await sync.refresh();
    assert.strictEqual(sync.delayMs, 3000);
    assert.strictEqual(errors.length, 3);

    down = false;
    assert.strictEqual(await sync.refresh(), true);
    assert.strictEqual(sync.delayMs, 1000);
  });

  it('does not poll after being stopped', async () => {
    const { api, afters } = fakeApi({});
    const { sync } = build(api);
    sync.start();
    sync.stop();
    await new Promise((resolve) => setTimeout(resolve, 10));
    assert.deepStrictEqual(afters, []);
  });
});
