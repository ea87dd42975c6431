import '../support/env';
import { describe, it } from 'node:test';
import * as assert from 'node:assert';
import { createMemoryRateLimiter, memoryIdempotencyStore } from '@huddle/shared';
import { buildIdentityApp } from '../../services/identity/src/app';
import { createMemoryIdentityStore } from '../../services/identity/src/memory-store';
import type { IdentityStore } from '../../services/identity/src/store';
import { bearer, ids, recordingSink } from '../support/fakes';

const DAY_MS = 24 * 60 * 60 * 1000;

const build = (options: { wrap?: (store: IdentityStore) => IdentityStore; now?: () => Date } = {}) => {
  const store = createMemoryIdentityStore();
  const events = recordingSink();
  const app = buildIdentityApp({
    store: options.wrap ? options.wrap(store) : store,
    now: options.now,
    events,
    limiter: createMemoryRateLimiter(),
    idempotency: memoryIdempotencyStore(),
    logger: false,
    docs: false,
    random: () => 0,
  });
  return { app, store, events };
};

type App = ReturnType<typeof build>['app'];

const register = async (app: App, body: Record<string, unknown>, headers: Record<string, string> = {}) =>
  app.inject({ method: 'POST', url: '/auth/register', payload: { password: 'test-password', ...body }, headers });

const auth = (token: string) => ({ authorization: `Bearer ${token}` });

describe('identity: registration and sessions', () => {
  it('registers with a normalized, unique username', async () => {
    const { app, events } = build();
    const first = await register(app, { preferred_username: 'Alice' });
    assert.strictEqual(first.statusCode, 201);
    const body = first.json();
    assert.strictEqual(body.profile.username, 'alice');
    assert.strictEqual(body.profile.full_name, null);
    assert.strictEqual(typeof body.access_token, 'string');
    assert.strictEqual(typeof body.refresh_token, 'string');

    const second = await register(app, { preferred_username: 'alice' });
    assert.strictEqual(second.json().profile.username, 'alice2');
    assert.deepStrictEqual(events.types(), ['identity.user_registered', 'identity.user_registered']);
  });

  it('picks the next handle when a concurrent registration takes the first', async () => {
    // another account claims the handle between the availability check and the insert
    const racing = (inner: IdentityStore): IdentityStore => {
      let raced = false;
      return {
        ...inner,
        async createUser(user) {
          if (!raced) {
            raced = true;
            await inner.createUser({ ...user, id: ids.carol, email: null });
          }
          return inner.createUser(user);
        },
      };
    };
    const { app, store, events } = build({ wrap: racing });
    const res = await register(app, { preferred_username: 'alice' });
    assert.strictEqual(res.statusCode, 201);
    assert.strictEqual(res.json().profile.username, 'alice2');
    assert.strictEqual((await store.getUserByUsername('alice'))?.id, ids.carol);
    assert.deepStrictEqual(events.types(), ['identity.user_registered']);
  });

  it('replays a registration with the same idempotency key', async () => {
    const { app, events } = build();
    const headers = { 'x-idempotency-key': 'register-1' };
    const first = await register(app, { preferred_username: 'bob' }, headers);
    const again = await register(app, { preferred_username: 'bob' }, headers);
    assert.strictEqual(again.statusCode, 201);
    assert.strictEqual(again.json().profile.id, first.json().profile.id);
    assert.strictEqual(events.events.length, 1);
  });

  it('rejects short passwords', async () => {
    const { app } = build();
    const res = await app.inject({ method: 'POST', url: '/auth/register', payload: { password: 'short' } });
    assert.strictEqual(res.statusCode, 400);
    assert.strictEqual(res.json().error, 'invalid_request');
  });

  it('logs in case-insensitively and rejects bad passwords', async () => {
    const { app } = build();
    await register(app, { preferred_username: 'alice' });
    const ok = await app.inject({
      method: 'POST',
      url: '/auth/login',
      payload: { username: 'ALICE', password: 'test-password' },
    });
    assert.strictEqual(ok.statusCode, 200);
    assert.strictEqual(typeof ok.json().access_token, 'string');

    const bad = await app.inject({ method: 'POST', url: '/auth/login', payload: { username: 'alice', password: 'nope' } });
    assert.strictEqual(bad.statusCode, 401);
    assert.strictEqual(bad.json().error, 'invalid_credentials');
  });

  it('rotates refresh tokens and refuses the old one', async () => {
    const { app } = build();
    const { refresh_token } = (await register(app, { preferred_username: 'alice' })).json();
    const rotated = await app.inject({ method: 'POST', url: '/auth/refresh', payload: { refresh_token } });
    assert.strictEqual(rotated.statusCode, 200);
    assert.notStrictEqual(rotated.json().refresh_token, refresh_token);

    const replay = await app.inject({ method: 'POST', url: '/auth/refresh', payload: { refresh_token } });
    assert.strictEqual(replay.statusCode, 401);
    assert.strictEqual(replay.json().error, 'invalid_token');
  });

  it('refuses a refresh token whose session has expired', async () => {
    let clock = new Date();
    const { app } = build({ now: () => clock });
    const { refresh_token } = (await register(app, { preferred_username: 'alice' })).json();
    clock = new Date(clock.getTime() + 31 * DAY_MS);
    const res = await app.inject({ method: 'POST', url: '/auth/refresh', payload: { refresh_token } });
    assert.strictEqual(res.statusCode, 401);
    assert.strictEqual(res.json().error, 'expired');
  });

  it('binds refresh to the registering device', async () => {
    const { app } = build();
    const { refresh_token } = (await register(app, { preferred_username: 'alice' }, { 'x-device-id': 'device-1' })).json();
    const res = await app.inject({
      method: 'POST',
      url: '/auth/refresh',
      payload: { refresh_token },
      headers: { 'x-device-id': 'device-2' },
    });
    assert.strictEqual(res.statusCode, 401);
    assert.strictEqual(res.json().error, 'device_mismatch');
  });

  it('logout revokes the session', async () => {
    const { app } = build();
    const { access_token, refresh_token } = (await register(app, { preferred_username: 'alice' })).json();
    const out = await app.inject({ method: 'POST', url: '/auth/logout', headers: auth(access_token) });
    assert.deepStrictEqual(out.json(), { ok: true });

    const refreshed = await app.inject({ method: 'POST', url: '/auth/refresh', payload: { refresh_token } });
    assert.strictEqual(refreshed.json().error, 'invalid_token');
  });

  it('reports session state to internal callers only', async () => {
    const { app } = build();
    const { access_token } = (await register(app, { preferred_username: 'alice' })).json();
    const sid = JSON.parse(Buffer.from(access_token.split('.')[1], 'base64url').toString()).sid;

    const external = await app.inject({ method: 'GET', url: `/internal/session/active/${sid}` });
    assert.strictEqual(external.statusCode, 401);
    assert.strictEqual(external.json().error, 'internal_only');

    const headers = { 'x-internal-call': 'true' };
    const before = await app.inject({ method: 'GET', url: `/internal/session/active/${sid}`, headers });
    assert.deepStrictEqual(before.json(), { active: true });
    await app.inject({ method: 'POST', url: '/auth/logout_all', headers: auth(access_token) });
    const after = await app.inject({ method: 'GET', url: `/internal/session/active/${sid}`, headers });
    assert.deepStrictEqual(after.json(), { active: false });
  });
});

describe('identity: profiles', () => {
  it('updates the profile and validates usernames', async () => {
    const { app, events } = build();
    const alice = (await register(app, { preferred_username: 'alice' })).json();
    await register(app, { preferred_username: 'bob' });
    const headers = auth(alice.access_token);

    const invalid = await app.inject({ method: 'PATCH', url: '/me', headers, payload: { username: 'Bad Name' } });
    assert.strictEqual(invalid.statusCode, 400);
    assert.strictEqual(invalid.json().error, 'invalid_username');

    const taken = await app.inject({ method: 'PATCH', url: '/me', headers, payload: { username: 'bob' } });
    assert.strictEqual(taken.statusCode, 409);
    assert.strictEqual(taken.json().error, 'username_taken');

    const ok = await app.inject({
      method: 'PATCH',
      url: '/me',
      headers,
      payload: { username: 'alice_new', full_name: 'Alice N' },
    });
    assert.deepStrictEqual(ok.json().profile, {
      id: alice.profile.id,
      username: 'alice_new',
      full_name: 'Alice N',
      avatar_url: null,
    });
    const updated = events.events[events.events.length - 1];
    assert.strictEqual(updated.event_type, 'identity.profile_updated');
    assert.deepStrictEqual(updated.payload, { user_id: alice.profile.id, fields: ['username', 'full_name'] });
  });

  it('assigns a username on first read when the account has none', async () => {
    const { app, store } = build();
    const id = '0000aaaa-0000-4000-8000-000000000001';
    await store.createUser({
      id,
      username: '',
      password_hash: 'unused',
      email: 'carol.x@example.com',
      full_name: null,
      avatar_url: null,
    });
    const res = await app.inject({ method: 'GET', url: '/me', headers: bearer(id, '') });
    assert.strictEqual(res.json().profile.username, 'carolx');
  });

  it('searches by username or full name, excluding the caller', async () => {
    const { app } = build();
    await register(app, { preferred_username: 'alice' });
    await register(app, { preferred_username: 'bob', full_name: 'Alison Park' });
    const carol = (await register(app, { preferred_username: 'carol' })).json();
    const headers = auth(carol.access_token);

    const res = await app.inject({ method: 'GET', url: '/profiles/search?q=ALI', headers });
    assert.deepStrictEqual(
      res.json().profiles.map((p: { username: string }) => p.username),
      ['alice', 'bob'],
    );
    const blank = await app.inject({ method: 'GET', url: '/profiles/search?q=%20', headers });
    assert.deepStrictEqual(blank.json(), { profiles: [] });
  });

  it('looks up profiles by username', async () => {
    const { app } = build();
    const alice = (await register(app, { preferred_username: 'alice' })).json();
    const found = await app.inject({ method: 'GET', url: '/profiles/alice', headers: auth(alice.access_token) });
    assert.strictEqual(found.json().profile.id, alice.profile.id);
    const missing = await app.inject({ method: 'GET', url: '/profiles/nobody', headers: auth(alice.access_token) });
    assert.strictEqual(missing.statusCode, 404);
  });

  it('serves profiles to internal callers by id and username', async () => {
    const { app } = build();
    const alice = (await register(app, { preferred_username: 'alice' })).json();
    const headers = { 'x-internal-call': 'true' };
    const byIds = await app.inject({ method: 'GET', url: `/internal/profiles?ids=${alice.profile.id},nope`, headers });
    assert.deepStrictEqual(byIds.json(), { profiles: [alice.profile] });
    const byName = await app.inject({ method: 'GET', url: '/internal/profiles/by-username/alice', headers });
    assert.deepStrictEqual(byName.json(), { profile: alice.profile });
  });

  it('deletes the account and ends its sessions', async () => {
    const { app, events } = build();
    const alice = (await register(app, { preferred_username: 'alice' })).json();
    const del = await app.inject({ method: 'DELETE', url: '/me', headers: auth(alice.access_token) });
    assert.deepStrictEqual(del.json(), { ok: true });
    assert.strictEqual(events.events[events.events.length - 1].event_type, 'identity.account_deleted');

    const refreshed = await app.inject({
      method: 'POST',
      url: '/auth/refresh',
      payload: { refresh_token: alice.refresh_token },
    });
    assert.strictEqual(refreshed.statusCode, 401);
    assert.strictEqual(refreshed.json().error, 'account_deleted');

    const me = await app.inject({ method: 'GET', url: '/me', headers: auth(alice.access_token) });
    assert.strictEqual(me.statusCode, 404);
  });
});
