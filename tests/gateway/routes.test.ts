import '../support/env';
import { describe, it } from 'node:test';
import * as assert from 'node:assert';
import { createMemoryRateLimiter, type RateLimiter } from '@huddle/shared';
import { buildGatewayApp, normalizePath, SessionCache } from '../../services/gateway/src/app';
import { bearer, ids } from '../support/fakes';
import { fakeUpstream, jsonResponse, type UpstreamCall } from '../support/upstream';

const targets = {
  identity: 'http://identity.test',
  social: 'http://social.test',
  messaging: 'http://messaging.test',
};

const isSessionCheck = (call: UpstreamCall) => call.url.startsWith(`${targets.identity}/internal/session/active/`);

const build = (
  respond: (call: UpstreamCall) => Response | Promise<Response>,
  options: { limiter?: RateLimiter; now?: () => number } = {},
) => {
  const upstream = fakeUpstream(respond);
  const app = buildGatewayApp({
    targets,
    limiter: options.limiter ?? createMemoryRateLimiter(() => 1_000_000),
    fetch: upstream.fetch,
    now: options.now,
    logger: false,
    docs: false,
  });
  return { app, calls: upstream.calls };
};

describe('normalizePath', () => {
  it('collapses ids and numbers so one route shares a bucket', () => {
    assert.strictEqual(
      normalizePath(`/messaging/conversations/${ids.alice}/messages?after=10`),
      '/messaging/conversations/:uuid/messages',
    );
    assert.strictEqual(normalizePath('/identity/profiles/12345'), '/identity/profiles/:num');
    assert.strictEqual(normalizePath('/identity/profiles/a1'), '/identity/profiles/a1');
  });
});

describe('gateway: proxying', () => {
  it('strips the prefix and relays the upstream response', async () => {
    const { app, calls } = build(() => jsonResponse({ friends: [] }, 200, { 'x-upstream': 'social' }));
    const res = await app.inject({ method: 'GET', url: '/social/friends?direction=incoming' });
    assert.strictEqual(res.statusCode, 200);
    assert.deepStrictEqual(res.json(), { friends: [] });
    assert.strictEqual(res.headers['x-upstream'], 'social');
    assert.strictEqual(res.headers['x-rate-limit'], 'ok');

    assert.strictEqual(calls.length, 1);
    assert.strictEqual(calls[0].url, 'http://social.test/friends?direction=incoming');
    assert.strictEqual(calls[0].method, 'GET');
    assert.strictEqual(calls[0].body, null);
  });

  it('forwards JSON bodies and caller headers', async () => {
    const { app, calls } = build(() => jsonResponse({ ok: true }, 201));
    const res = await app.inject({
      method: 'POST',
      url: '/identity/auth/register',
      payload: { password: 'test-password' },
      headers: { 'x-device-id': 'device-1', 'x-correlation-id': 'corr-1' },
    });
    assert.strictEqual(res.statusCode, 201);
    assert.strictEqual(calls[0].url, 'http://identity.test/auth/register');
    assert.strictEqual(calls[0].body, JSON.stringify({ password: 'test-password' }));
    assert.strictEqual(calls[0].headers.get('x-device-id'), 'device-1');
    assert.strictEqual(calls[0].headers.get('x-correlation-id'), 'corr-1');
    assert.strictEqual(calls[0].headers.get('host'), null);
  });

  it('relays upstream errors as they are', async () => {
    const { app } = build(() => jsonResponse({ error: 'not_found' }, 404));
    const res = await app.inject({ method: 'GET', url: '/messaging/conversations/abc' });
    assert.strictEqual(res.statusCode, 404);
    assert.deepStrictEqual(res.json(), { error: 'not_found' });
  });

  it('never exposes internal service routes at the edge', async () => {
    const { app, calls } = build(() => jsonResponse({ profiles: [] }));
    for (const url of [
      `/identity/internal/profiles?ids=${ids.bob}`,
      '/identity/internal/session/active/session-1',
      `/social/internal/friendships/check?a=${ids.alice}&b=${ids.bob}`,
    ]) {
      const res = await app.inject({ method: 'GET', url, headers: { 'x-internal-call': 'true' } });
      assert.strictEqual(res.statusCode, 404, url);
      assert.strictEqual(res.json().error, 'not_found');
    }
    assert.strictEqual(calls.length, 0);
  });

  it('drops the internal-call marker from caller headers', async () => {
    const { app, calls } = build(() => jsonResponse({ friends: [] }));
    await app.inject({ method: 'GET', url: '/social/friends', headers: { 'x-internal-call': 'true' } });
    assert.strictEqual(calls.length, 1);
    assert.strictEqual(calls[0].headers.get('x-internal-call'), null);
  });

  it('answers 503 when a service is unreachable', async () => {
    const { app } = build(() => {
      throw new TypeError('fetch failed');
    });
    const res = await app.inject({ method: 'GET', url: '/social/friends' });
    assert.strictEqual(res.statusCode, 503);
    assert.strictEqual(res.json().error, 'unavailable');
    assert.strictEqual(res.json().detail, 'social unreachable');
  });
});

describe('gateway: session checks', () => {
  const token = bearer(ids.alice, 'alice', 'session-1');

  it('rejects tokens whose session was revoked', async () => {
    const { app, calls } = build((call) => (isSessionCheck(call) ? jsonResponse({ active: false }) : jsonResponse({})));
    const res = await app.inject({ method: 'GET', url: '/social/friends', headers: token });
    assert.strictEqual(res.statusCode, 401);
    assert.strictEqual(res.json().error, 'session_revoked');
    assert.deepStrictEqual(
      calls.map((c) => c.url),
      ['http://identity.test/internal/session/active/session-1'],
    );
    assert.strictEqual(calls[0].headers.get('x-internal-call'), 'true');
  });

  it('caches active sessions briefly', async () => {
    let clock = 0;
    const { app, calls } = build(
      (call) => (isSessionCheck(call) ? jsonResponse({ active: true }) : jsonResponse({ friends: [] })),
      { now: () => clock },
    );
    await app.inject({ method: 'GET', url: '/social/friends', headers: token });
    clock = 4_000;
    await app.inject({ method: 'GET', url: '/social/friends', headers: token });
    assert.strictEqual(calls.filter(isSessionCheck).length, 1);

    clock = 6_000;
    await app.inject({ method: 'GET', url: '/social/friends', headers: token });
    assert.strictEqual(calls.filter(isSessionCheck).length, 2);
    assert.strictEqual(calls.length, 5);
  });

  it('lets requests through when identity cannot answer', async () => {
    const { app } = build((call) => {
      if (isSessionCheck(call)) throw new TypeError('fetch failed');
      return jsonResponse({ friends: [] });
    });
    const res = await app.inject({ method: 'GET', url: '/social/friends', headers: token });
    assert.strictEqual(res.statusCode, 200);
  });

  it('skips the check on public auth routes', async () => {
    const { app, calls } = build(() => jsonResponse({ ok: true }));
    await app.inject({ method: 'POST', url: '/identity/auth/login', headers: token, payload: { username: 'alice' } });
    assert.strictEqual(calls.filter(isSessionCheck).length, 0);
  });

  it('does not check tokens without a session id', async () => {
    const { app, calls } = build(() => jsonResponse({ friends: [] }));
    await app.inject({ method: 'GET', url: '/social/friends', headers: bearer(ids.alice, 'alice') });
    assert.strictEqual(calls.filter(isSessionCheck).length, 0);
  });
});

describe('gateway: edge rate limit', () => {
  it('blocks callers over the limit', async () => {
    const limiter: RateLimiter = { check: async () => ({ allowed: false, cooled: true }) };
    const { app, calls } = build(() => jsonResponse({}), { limiter });
    const res = await app.inject({ method: 'GET', url: '/social/friends' });
    assert.strictEqual(res.statusCode, 429);
    assert.strictEqual(res.json().error, 'rate_limited');
    assert.strictEqual(res.json().detail, 'Cooldown applied');
    assert.strictEqual(calls.length, 0);
  });

  it('keys the limit by caller, method and route shape', async () => {
    const keys: string[] = [];
    const limiter: RateLimiter = {
      check: async (key) => {
        keys.push(key);
        return { allowed: true, cooled: false };
      },
    };
    const { app } = build(() => jsonResponse({}), { limiter });
    await app.inject({
      method: 'GET',
      url: `/messaging/conversations/${ids.bob}`,
      headers: { 'x-forwarded-for': '203.0.113.9' },
    });
    assert.deepStrictEqual(keys, ['edge:203.0.113.9:GET:/messaging/conversations/:uuid']);
  });

  it('fails open when the limiter is down', async () => {
    const limiter: RateLimiter = {
      check: async () => {
        throw new Error('redis unavailable');
      },
    };
    const { app } = build(() => jsonResponse({ friends: [] }), { limiter });
    const res = await app.inject({ method: 'GET', url: '/social/friends' });
    assert.strictEqual(res.statusCode, 200);
    assert.strictEqual(res.headers['x-rate-limit'], 'skip');
  });
});

describe('SessionCache', () => {
  it('drops entries read after they expire', () => {
    let clock = 0;
    const cache = new SessionCache(() => clock);
    cache.set('active-1', true);
    cache.set('revoked-1', false);
    assert.strictEqual(cache.get('active-1'), true);
    assert.strictEqual(cache.size, 2);

    clock = 5_000;
    assert.strictEqual(cache.get('active-1'), undefined);
    assert.strictEqual(cache.get('revoked-1'), false);
    assert.strictEqual(cache.size, 1);

    clock = 15_000;
    assert.strictEqual(cache.get('revoked-1'), undefined);
    assert.strictEqual(cache.size, 0);
  });
});
