import { FastifyInstance, FastifyRequest } from 'fastify';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import {
  BadRequestError,
  ConflictError,
  compareHash,
  compareToken,
  correlationIdOf,
  createServiceApp,
  deviceIdOf,
  enforceRateLimit,
  hashToken,
  hashValue,
  idempotencyKeyOf,
  IdempotencyStore,
  LoggerConfig,
  NotFoundError,
  parseWith,
  rateLimitKey,
  RateLimiter,
  REFRESH_TOKEN_TTL_MS,
  requireAuth,
  requireInternal,
  signTokens,
  UnauthorizedError,
  verifyRefresh,
  withIdempotency,
  type Profile,
} from '@huddle/shared';
import type { EventSink } from '@huddle/events';
import { IdentityStore, toProfile, UserRecord } from './store';
import { baseUsername, isValidUsername, nextAvailableUsername, USERNAME_MAX } from './usernames';

export type IdentityDeps = {
  store: IdentityStore;
  events: EventSink;
  limiter: RateLimiter;
  idempotency: IdempotencyStore;
  logger?: boolean | LoggerConfig;
  docs?: boolean;
  random?: () => number;
  now?: () => Date;
};

const SEARCH_LIMIT = 20;

const optionalText = (max: number) =>
  z
    .string()
    .trim()
    .max(max)
    .nullish()
    .transform((v) => (v ? v : null));

const RegisterBody = z.object({
  password: z.string().min(8).max(128),
  preferred_username: z.string().max(64).nullish(),
  user_name: z.string().max(64).nullish(),
  email: z.string().email().max(254).nullish(),
  full_name: optionalText(80),
  avatar_url: z.string().url().max(2048).nullish().transform((v) => v ?? null),
});

const LoginBody = z.object({
  username: z.string().trim().min(1).max(USERNAME_MAX).toLowerCase(),
  password: z.string().min(1).max(128),
});

const RefreshBody = z.object({ refresh_token: z.string().min(1) });

const PatchMeBody = z
  .object({
    username: z.string().trim().optional(),
    full_name: z.string().trim().max(80).nullable().optional(),
    avatar_url: z.string().url().max(2048).nullable().optional(),
  })
  .strict();

const SearchQuery = z.object({ q: z.string().max(64).optional() });
const UsernameParams = z.object({ username: z.string().min(1).max(64) });
const IdsQuery = z.object({ ids: z.string().optional() });
const SidParams = z.object({ sid: z.string().min(1) });

type TokenPair = { access_token: string; refresh_token: string };
type RegisterResponse = TokenPair & { profile: Profile };

const isRegisterResponse = (body: unknown): body is RegisterResponse =>
  typeof body === 'object' &&
  body !== null &&
  'profile' in body &&
  'access_token' in body &&
  typeof body.access_token === 'string' &&
  'refresh_token' in body &&
  typeof body.refresh_token === 'string';

export const buildIdentityApp = (deps: IdentityDeps): FastifyInstance => {
  const { store, events, limiter } = deps;
  const random = deps.random ?? Math.random;
  const now = deps.now ?? (() => new Date());
  const app = createServiceApp({ title: 'Identity Service', logger: deps.logger, docs: deps.docs });

  const fingerprintOf = (request: FastifyRequest): string | null => {
    const device = deviceIdOf(request);
    return device === 'unknown' ? null : device;
  };

  const openSession = async (user: Profile, deviceFingerprint: string | null): Promise<TokenPair> => {
    const sessionId = uuidv4();
    const tokens = signTokens({ sub: user.id, username: user.username, sid: sessionId });
    await store.createSession({
      id: sessionId,
      user_id: user.id,
      refresh_token_hash: await hashToken(tokens.refreshToken),
      device_fingerprint: deviceFingerprint,
      expires_at: new Date(now().getTime() + REFRESH_TOKEN_TTL_MS),
    });
    return { access_token: tokens.accessToken, refresh_token: tokens.refreshToken };
  };

  const ensureUsername = async (user: UserRecord): Promise<Profile> => {
    if (user.username.trim()) return toProfile(user);
    const handle = await nextAvailableUsername(
      baseUsername({ email: user.email }, user.id),
      (c) => store.isUsernameAvailable(c),
      random,
    );
    const updated = await store.updateProfile(user.id, { username: handle });
    if (!updated) throw new NotFoundError();
    return updated;
  };

  const currentUser = async (userId: string): Promise<UserRecord> => {
    const user = await store.getUser(userId);
    if (!user) throw new NotFoundError();
    return user;
  };

  app.get('/internal/session/active/:sid', async (request) => {
    requireInternal(request);
    const { sid } = parseWith(SidParams, request.params);
    return { active: await store.isSessionActive(sid, now()) };
  });

  app.get('/internal/profiles', async (request) => {
    requireInternal(request);
    const { ids } = parseWith(IdsQuery, request.query);
    const list = (ids ?? '')
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean);
    return { profiles: await store.getProfiles([...new Set(list)]) };
  });

  app.get('/internal/profiles/by-username/:username', async (request) => {
    requireInternal(request);
    const { username } = parseWith(UsernameParams, request.params);
    const user = await store.getUserByUsername(username);
    if (!user) throw new NotFoundError();
    return { profile: toProfile(user) };
  });

  app.post('/auth/register', async (request, reply) => {
    await enforceRateLimit(limiter, rateLimitKey(request, 'identity', 'register'), {
      limit: 10,
      windowSec: 600,
      cooldownSec: 1800,
      cooldownThreshold: 20,
    });
    const body = parseWith(RegisterBody, request.body);
    const correlationId = correlationIdOf(request);
    const idempotencyKey = idempotencyKeyOf(request);

    const result = await withIdempotency(deps.idempotency, idempotencyKey, isRegisterResponse, async () => {
      const id = uuidv4();
      const base = baseUsername(body, id);
      const passwordHash = await hashValue(body.password);
      const create = async () => {
        const username = await nextAvailableUsername(base, (c) => store.isUsernameAvailable(c), random);
        return store.createUser({
          id,
          username,
          password_hash: passwordHash,
          email: body.email ? body.email.toLowerCase() : null,
          full_name: body.full_name,
          avatar_url: body.avatar_url,
        });
      };
      let user: UserRecord;
      try {
        user = await create();
      } catch (err) {
        // lost a race for the handle; recompute once
        if (!(err instanceof ConflictError)) throw err;
        user = await create();
      }
      const profile = toProfile(user);
      await events.emit(
        'identity.user_registered',
        { user_id: user.id, username: user.username },
        { actorId: user.id, correlationId, idempotencyKey },
      );
      const tokens = await openSession(profile, fingerprintOf(request));
      return { profile, ...tokens };
    });
    reply.status(201);
    return result;
  });

  app.post('/auth/login', async (request) => {
    await enforceRateLimit(limiter, rateLimitKey(request, 'identity', 'login'), {
      limit: 10,
      windowSec: 60,
      cooldownSec: 300,
      cooldownThreshold: 20,
    });
    const body = parseWith(LoginBody, request.body);
    const user = await store.getUserByUsername(body.username);
    if (!user || !(await compareHash(body.password, user.password_hash))) {
      throw new UnauthorizedError('invalid_credentials');
    }
    return openSession(toProfile(user), fingerprintOf(request));
  });

  app.post('/auth/refresh', async (request) => {
    const body = parseWith(RefreshBody, request.body);
    const payload = verifyRefresh(body.refresh_token);
    if (!payload || !payload.sid) throw new UnauthorizedError('invalid_token');
    const session = await store.getSession(payload.sid);
    if (!session || session.user_id !== payload.sub) throw new UnauthorizedError('invalid_token');
    if (session.user_deleted) {
      await store.revokeSession(session.id, session.user_id);
      throw new UnauthorizedError('account_deleted');
    }
    if (session.revoked_at) throw new UnauthorizedError('invalid_token');
    if (!(await compareToken(body.refresh_token, session.refresh_token_hash))) {
      throw new UnauthorizedError('invalid_token');
    }
    if (now().getTime() > session.expires_at.getTime()) {
      throw new UnauthorizedError('expired');
    }
    const device = fingerprintOf(request);
    if (session.device_fingerprint && device && session.device_fingerprint !== device) {
      throw new UnauthorizedError('device_mismatch');
    }
    const user = await currentUser(payload.sub);
    // single active refresh token per session
    const tokens = signTokens({ sub: user.id, username: user.username, sid: session.id });
    await store.rotateSession(
      session.id,
      await hashToken(tokens.refreshToken),
      new Date(now().getTime() + REFRESH_TOKEN_TTL_MS),
    );
    return { access_token: tokens.accessToken, refresh_token: tokens.refreshToken };
  });

  app.post('/auth/logout', async (request) => {
    const auth = requireAuth(request);
    if (!auth.sid) throw new BadRequestError('missing_sid');
    await store.revokeSession(auth.sid, auth.sub);
    return { ok: true };
  });

  app.post('/auth/logout_all', async (request) => {
    const auth = requireAuth(request);
    await store.revokeAllSessions(auth.sub);
    return { ok: true };
  });

  app.get('/me', async (request) => {
    const auth = requireAuth(request);
    return { profile: await ensureUsername(await currentUser(auth.sub)) };
  });

  app.patch('/me', async (request) => {
    const auth = requireAuth(request);
    const body = parseWith(PatchMeBody, request.body);
    const user = await currentUser(auth.sub);
    const patch: { username?: string; full_name?: string | null; avatar_url?: string | null } = {};
    if (body.username !== undefined && body.username !== user.username) {
      if (!isValidUsername(body.username)) {
        throw new BadRequestError(
          'invalid_username',
          `3-${USERNAME_MAX} characters, lowercase letters, digits and single underscores`,
        );
      }
      if (!(await store.isUsernameAvailable(body.username))) throw new ConflictError('username_taken');
      patch.username = body.username;
    }
    if (body.full_name !== undefined) patch.full_name = body.full_name || null;
    if (body.avatar_url !== undefined) patch.avatar_url = body.avatar_url;
    if (!Object.keys(patch).length) return { profile: toProfile(user) };

    const profile = await store.updateProfile(auth.sub, patch);
    if (!profile) throw new NotFoundError();
    await events.emit(
      'identity.profile_updated',
      { user_id: auth.sub, fields: Object.keys(patch) },
      { actorId: auth.sub, correlationId: correlationIdOf(request) },
    );
    return { profile };
  });

  app.delete('/me', async (request) => {
    const auth = requireAuth(request);
    await currentUser(auth.sub);
    await store.softDeleteUser(auth.sub);
    await store.revokeAllSessions(auth.sub);
    await events.emit(
      'identity.account_deleted',
      { user_id: auth.sub },
      { actorId: auth.sub, correlationId: correlationIdOf(request) },
    );
    return { ok: true };
  });

  app.get('/profiles/search', async (request) => {
    const auth = requireAuth(request);
    const q = (parseWith(SearchQuery, request.query).q ?? '').trim();
    if (!q) return { profiles: [] };
    return { profiles: await store.searchProfiles(q, auth.sub, SEARCH_LIMIT) };
  });

  app.get('/profiles/:username', async (request) => {
    requireAuth(request);
    const { username } = parseWith(UsernameParams, request.params);
    const user = await store.getUserByUsername(username);
    if (!user) throw new NotFoundError();
    return { profile: toProfile(user) };
  });

  return app;
};
