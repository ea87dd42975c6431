import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import {
  BadRequestError,
  ConflictError,
  correlationIdOf,
  createServiceApp,
  Directory,
  enforceRateLimit,
  indexProfiles,
  LoggerConfig,
  NotFoundError,
  parseWith,
  Profile,
  rateLimitKey,
  RateLimiter,
  requireAuth,
  requireInternal,
} from '@huddle/shared';
import type { EventSink } from '@huddle/events';
import {
  ACTION_STATUS,
  assertTransition,
  decideUpsert,
  FriendRequest,
  RequestAction,
  relationshipStatus,
} from './friendships';
import { SocialStore } from './store';

export type SocialDeps = {
  store: SocialStore;
  directory: Directory;
  events: EventSink;
  limiter: RateLimiter;
  logger?: boolean | LoggerConfig;
  docs?: boolean;
};

const SendRequestBody = z
  .object({
    username: z.string().trim().min(1).max(64).optional(),
    user_id: z.string().uuid().optional(),
  })
  .refine((b) => Boolean(b.username || b.user_id), { message: 'username or user_id required' });

const DirectionQuery = z.object({ direction: z.enum(['incoming', 'outgoing']).default('incoming') });
const IdParams = z.object({ id: z.string().uuid() });
const UserParams = z.object({ userId: z.string().uuid() });
const CheckQuery = z.object({ a: z.string().min(1), b: z.string().min(1) });

export type FriendRequestView = {
  id: string;
  sender_id: string;
  recipient_id: string;
  status: FriendRequest['status'];
  created_at: string;
  responded_at: string | null;
  user: Profile | null;
};

export const toRequestView = (request: FriendRequest, other: Profile | null): FriendRequestView => ({
  id: request.id,
  sender_id: request.sender_id,
  recipient_id: request.recipient_id,
  status: request.status,
  created_at: request.created_at.toISOString(),
  responded_at: request.responded_at ? request.responded_at.toISOString() : null,
  user: other,
});

export const buildSocialApp = (deps: SocialDeps): FastifyInstance => {
  const { store, directory, events, limiter } = deps;
  const app = createServiceApp({ title: 'Social Service', logger: deps.logger, docs: deps.docs });

  const otherParty = (request: FriendRequest, viewerId: string) =>
    request.sender_id === viewerId ? request.recipient_id : request.sender_id;

  const pairState = async (a: string, b: string) => ({
    friends: await store.areFriends(a, b),
    pending: await store.findPendingBetween(a, b),
  });

  const resolveTarget = async (body: z.infer<typeof SendRequestBody>): Promise<Profile | null> => {
    if (body.user_id) {
      const [profile] = await directory.getProfiles([body.user_id]);
      return profile ?? null;
    }
    return body.username ? directory.findByUsername(body.username.toLowerCase()) : null;
  };

  const upsertRequest = async (callerId: string, target: Profile, correlationId: string) => {
    const decision = decideUpsert(callerId, target.id, await pairState(callerId, target.id));
    switch (decision.kind) {
      case 'self':
        throw new BadRequestError('cannot_friend_self');
      case 'already_friends':
        return { statusCode: 200, body: { status: 'already_friends' as const } };
      case 'existing_outgoing':
        return { statusCode: 200, body: { status: 'pending' as const, request: toRequestView(decision.request, target) } };
      case 'accept_incoming': {
        const accepted = await store.acceptRequest(decision.request.id);
        if (!accepted) return null;
        await events.emit(
          'social.friend_request_accepted',
          { request_id: accepted.id, sender_id: accepted.sender_id, recipient_id: accepted.recipient_id },
          { actorId: callerId, correlationId },
        );
        return { statusCode: 200, body: { status: 'accepted' as const, request: toRequestView(accepted, target) } };
      }
      case 'create': {
        let created: FriendRequest;
        try {
          created = await store.createRequest(callerId, target.id);
        } catch (err) {
          if (err instanceof ConflictError) return null;
          throw err;
        }
        await events.emit(
          'social.friend_request_sent',
          { request_id: created.id, sender_id: callerId, recipient_id: target.id },
          { actorId: callerId, correlationId },
        );
        return { statusCode: 201, body: { status: 'pending' as const, request: toRequestView(created, target) } };
      }
    }
  };

  app.get('/internal/friendships/check', async (request) => {
    requireInternal(request);
    const { a, b } = parseWith(CheckQuery, request.query);
    return { friends: a !== b && (await store.areFriends(a, b)) };
  });

  app.post('/friends/requests', async (request, reply) => {
    const auth = requireAuth(request);
    await enforceRateLimit(limiter, rateLimitKey(request, 'social', 'request', auth.sub), {
      limit: 20,
      windowSec: 60,
      cooldownSec: 300,
      cooldownThreshold: 40,
    });
    const body = parseWith(SendRequestBody, request.body);
    const target = await resolveTarget(body);
    if (!target) throw new NotFoundError('user_not_found');

    const correlationId = correlationIdOf(request);
    // A concurrent request for the same pair changes the decision; decide again once.
    const outcome =
      (await upsertRequest(auth.sub, target, correlationId)) ?? (await upsertRequest(auth.sub, target, correlationId));
    if (!outcome) throw new ConflictError('request_exists');
    reply.status(outcome.statusCode);
    return outcome.body;
  });

  app.get('/friends/requests', async (request) => {
    const auth = requireAuth(request);
    const { direction } = parseWith(DirectionQuery, request.query);
    const pending = await store.listPending(auth.sub, direction);
    const profiles = indexProfiles(await directory.getProfiles(pending.map((r) => otherParty(r, auth.sub))));
    return {
      requests: pending.flatMap((r) => {
        const other = profiles.get(otherParty(r, auth.sub));
        return other ? [toRequestView(r, other)] : [];
      }),
    };
  });

  const transition = (action: RequestAction) =>
    app.post(`/friends/requests/:id/${action}`, async (request) => {
      const auth = requireAuth(request);
      const { id } = parseWith(IdParams, request.params);
      const existing = await store.getRequest(id);
      if (!existing) throw new NotFoundError();
      assertTransition(existing, auth.sub, action);

      const updated =
        action === 'accept' ? await store.acceptRequest(id) : await store.closeRequest(id, action === 'decline' ? 'declined' : 'cancelled');
      if (!updated) throw new ConflictError('request_not_pending');

      await events.emit(
        `social.friend_request_${ACTION_STATUS[action]}`,
        { request_id: id, sender_id: updated.sender_id, recipient_id: updated.recipient_id },
        { actorId: auth.sub, correlationId: correlationIdOf(request) },
      );
      const [other] = await directory.getProfiles([otherParty(updated, auth.sub)]);
      return { request: toRequestView(updated, other ?? null) };
    });

  transition('accept');
  transition('decline');
  transition('cancel');

  app.get('/friends', async (request) => {
    const auth = requireAuth(request);
    const ids = await store.listFriendIds(auth.sub);
    const profiles = await directory.getProfiles(ids);
    return { friends: [...profiles].sort((a, b) => a.username.localeCompare(b.username)) };
  });

  app.delete('/friends/:userId', async (request) => {
    const auth = requireAuth(request);
    const { userId } = parseWith(UserParams, request.params);
    const removed = await store.removeFriendship(auth.sub, userId);
    if (!removed) throw new NotFoundError();
    await events.emit(
      'social.friend_removed',
      { user_id: auth.sub, friend_id: userId },
      { actorId: auth.sub, correlationId: correlationIdOf(request) },
    );
    return { ok: true };
  });

  app.get('/friends/status/:userId', async (request) => {
    const auth = requireAuth(request);
    const { userId } = parseWith(UserParams, request.params);
    if (userId === auth.sub) return { status: 'self' };
    return { status: relationshipStatus(auth.sub, userId, await pairState(auth.sub, userId)) };
  });

  return app;
};
