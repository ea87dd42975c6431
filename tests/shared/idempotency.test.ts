import '../support/env';
import { describe, it } from 'node:test';
import * as assert from 'node:assert';
import { memoryIdempotencyStore, withIdempotency } from '@huddle/shared';

const isCount = (body: unknown): body is { count: number } =>
  typeof body === 'object' && body !== null && 'count' in body && typeof body.count === 'number';

describe('withIdempotency', () => {
  it('replays the first response for a repeated key', async () => {
    const store = memoryIdempotencyStore();
    let calls = 0;
    const action = async () => ({ count: ++calls });
    assert.deepStrictEqual(await withIdempotency(store, 'key-1', isCount, action), { count: 1 });
    assert.deepStrictEqual(await withIdempotency(store, 'key-1', isCount, action), { count: 1 });
    assert.deepStrictEqual(await withIdempotency(store, 'key-2', isCount, action), { count: 2 });
    assert.strictEqual(calls, 2);
  });

  it('runs every time without a key', async () => {
    const store = memoryIdempotencyStore();
    let calls = 0;
    const action = async () => ({ count: ++calls });
    await withIdempotency(store, undefined, isCount, action);
    await withIdempotency(store, undefined, isCount, action);
    assert.strictEqual(calls, 2);
  });

  it('ignores a stored body of the wrong shape', async () => {
    const store = memoryIdempotencyStore();
    await store.save('key-1', { unrelated: true });
    assert.deepStrictEqual(await withIdempotency(store, 'key-1', isCount, async () => ({ count: 7 })), { count: 7 });
  });
});
