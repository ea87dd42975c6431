import '../support/env';
import { describe, it } from 'node:test';
import * as assert from 'node:assert';
import { reconcile, type LocalMessage, type ServerMessage } from '@huddle/client';
import { ids } from '../support/fakes';

const CONV = '00000000-0000-4000-8000-0000000000c1';
const at = (sec: number) => new Date(Date.UTC(2026, 0, 1, 0, 0, sec)).toISOString();

const local = (clientId: string, body: string, sec: number): LocalMessage => ({
  client_id: clientId,
  conversation_id: CONV,
  sender_id: ids.alice,
  body,
  created_at: at(sec),
  status: 'pending',
  attempts: 0,
  retryable: false,
  error: null,
  server_id: null,
});

const server = (seq: number, body: string, sec: number, clientId: string | null = null, sender = ids.alice): ServerMessage => ({
  id: `s${seq}`,
  conversation_id: CONV,
  sender_id: sender,
  client_id: clientId,
  body,
  seq,
  created_at: at(sec),
});

const shape = (items: ReturnType<typeof reconcile>['timeline']) =>
  items.map((i) => (i.kind === 'server' ? `server:${i.message.seq}` : `local:${i.message.client_id}`));

const pairs = (result: ReturnType<typeof reconcile>) => result.confirmed.map((c) => `${c.client_id}->${c.message.id}`);

describe('reconcile', () => {
  it('matches by client id and orders server rows by seq', () => {
    const result = reconcile([local('c1', 'hi', 0)], [server(2, 'later', 5), server(1, 'hi', 1, 'c1')]);
    assert.deepStrictEqual(shape(result.timeline), ['server:1', 'server:2']);
    assert.deepStrictEqual(pairs(result), ['c1->s1']);
  });

  it('falls back to the nearest row with the same sender and body', () => {
    const result = reconcile([local('c1', 'hi', 10)], [server(1, 'hi', 0), server(2, 'hi', 12)]);
    assert.deepStrictEqual(pairs(result), ['c1->s2']);
    assert.deepStrictEqual(shape(result.timeline), ['server:1', 'server:2']);
  });

  it('leaves messages outside the window unconfirmed', () => {
    const result = reconcile([local('c1', 'hi', 0)], [server(1, 'hi', 30)]);
    assert.deepStrictEqual(result.confirmed, []);
    assert.deepStrictEqual(shape(result.timeline), ['server:1', 'local:c1']);
  });

  it('lets each server row stand in for one local message', () => {
    const result = reconcile([local('c1', 'hi', 0), local('c2', 'hi', 1)], [server(1, 'hi', 1)]);
    assert.deepStrictEqual(pairs(result), ['c1->s1']);
    assert.deepStrictEqual(shape(result.timeline), ['server:1', 'local:c2']);
  });

  it('ignores rows from other senders', () => {
    const result = reconcile([local('c1', 'hi', 0)], [server(1, 'hi', 0, null, ids.bob)]);
    assert.deepStrictEqual(result.confirmed, []);
  });

  it('appends unconfirmed messages in creation order', () => {
    const result = reconcile([local('c2', 'second', 5), local('c1', 'first', 2), local('c3', 'tie', 5)], []);
    assert.deepStrictEqual(shape(result.timeline), ['local:c1', 'local:c2', 'local:c3']);
  });

  it('honours a custom window', () => {
    const result = reconcile([local('c1', 'hi', 0)], [server(1, 'hi', 3)], { windowMs: 2000 });
    assert.deepStrictEqual(result.confirmed, []);
  });
});
