import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import {
  BadRequestError,
  ConflictError,
  correlationIdOf,
  createServiceApp,
  Directory,
  enforceRateLimit,
  ForbiddenError,
  idempotencyKeyOf,
  IdempotencyStore,
  indexProfiles,
  LoggerConfig,
  NotFoundError,
  parseWith,
  Profile,
  rateLimitKey,
  RateLimiter,
  requireAuth,
  withIdempotency,
} from '@huddle/shared';
import type { EventSink } from '@huddle/events';
import { Conversation, directKey, Member, Message, nextCursor, otherMemberIds, pageLimit } from './conversations';
import { MessagingStore } from './store';

export type MessagingDeps = {
  store: MessagingStore;
  directory: Directory;
  events: EventSink;
  limiter: RateLimiter;
  idempotency: IdempotencyStore;
  requireFriendship: boolean;
  logger?: boolean | LoggerConfig;
  docs?: boolean;
};

export const BODY_MAX = 4000;
export const TITLE_MAX = 80;

const DirectBody = z.object({ user_id: z.string().uuid() });
const GroupBody = z.object({
  title: z.string().trim().min(1).max(TITLE_MAX),
  member_ids: z.array(z.string().uuid()).max(100),
});
const TitleBody = z.object({ title: z.string().trim().min(1).max(TITLE_MAX) });
const MembersBody = z.object({ user_ids: z.array(z.string().uuid()).min(1).max(100) });
const SendBody = z.object({
  // counted in code points, as the database counts them
  body: z
    .string()
    .trim()
    .min(1)
    .max(BODY_MAX * 2)
    .refine((s) => [...s].length <= BODY_MAX, { message: `at most ${BODY_MAX} characters` }),
  client_id: z.string().trim().min(1).max(64).optional(),
});
const ReadBody = z.object({ seq: z.number().int().min(0).optional() });
const PageQuery = z.object({
  after: z.coerce.number().int().min(0).optional(),
  limit: z.coerce.number().int().min(1).optional(),
});
const IdParams = z.object({ id: z.string().uuid() });

export type MessageView = {
  id: string;
  conversation_id: string;
  sender_id: string;
  client_id: string | null;
  body: string;
  seq: number;
  created_at: string;
};

export type ConversationSummary = {
  id: string;
  kind: Conversation['kind'];
  title: string | null;
  role: Member['role'];
  members: Profile[];
  last_message: MessageView | null;
  unread: number;
  updated_at: string;
};

export const toMessageView = (m: Message): MessageView => ({
  id: m.id,
  conversation_id: m.conversation_id,
  sender_id: m.sender_id,
  client_id: m.client_id,
  body: m.body,
  seq: m.seq,
  created_at: m.created_at.toISOString(),
});

const isSummaryResponse = (body: unknown): body is { conversation: ConversationSummary } =>
  typeof body === 'object' &&
  body !== null &&
  'conversation' in body &&
  typeof body.conversation === 'object' &&
  body.conversation !== null &&
  'id' in body.conversation;

export const buildMessagingApp = (deps: MessagingDeps): FastifyInstance => {
  const { store, directory, events, limiter } = deps;
  const app = createServiceApp({ title: 'Messaging Service', logger: deps.logger, docs: deps.docs });

  const summarize = async (
    conversations: Conversation[],
    viewerId: string,
  ): Promise<ConversationSummary[]> => {
    const memberLists = await Promise.all(conversations.map((c) => store.getMembers(c.id)));
    const profiles = indexProfiles(await directory.getProfiles(memberLists.flat().map((m) => m.user_id)));
    return Promise.all(
      conversations.map(async (c, i) => {
        const members = memberLists[i];
        const viewer = members.find((m) => m.user_id === viewerId);
        const memberProfiles = members.flatMap((m) => {
          const p = profiles.get(m.user_id);
          return p ? [p] : [];
        });
        const other = memberProfiles.find((p) => p.id !== viewerId);
        const last = await store.lastMessage(c.id);
        return {
          id: c.id,
          kind: c.kind,
          title: c.kind === 'direct' ? (other?.username ?? null) : c.title,
          role: viewer?.role ?? 'member',
          members: memberProfiles,
          last_message: last ? toMessageView(last) : null,
          unread: viewer ? await store.unreadCount(c.id, viewerId, viewer.last_read_seq) : 0,
          updated_at: c.updated_at.toISOString(),
        };
      }),
    );
  };

  const summaryFor = async (conversation: Conversation, viewerId: string) =>
    (await summarize([conversation], viewerId))[0];

  // Non-members see the conversation as missing.
  const membership = async (conversationId: string, userId: string) => {
    const conversation = await store.getConversation(conversationId);
    const member = conversation ? await store.getMember(conversationId, userId) : null;
    if (!conversation || !member) throw new NotFoundError();
    return { conversation, member };
  };

  const ownedGroup = async (conversationId: string, userId: string) => {
    const found = await membership(conversationId, userId);
    if (found.conversation.kind !== 'group') throw new BadRequestError('not_a_group');
    if (found.member.role !== 'owner') throw new ForbiddenError('forbidden', 'only the owner can change the group');
    return found;
  };

  const assertReachable = async (callerId: string, userIds: string[]) => {
    const found = indexProfiles(await directory.getProfiles(userIds));
    const missing = userIds.filter((id) => !found.has(id));
    if (missing.length) throw new NotFoundError('user_not_found', missing.join(','));
    if (!deps.requireFriendship) return;
    for (const id of userIds) {
      if (!(await directory.areFriends(callerId, id))) throw new ForbiddenError('not_friends', id);
    }
  };

  app.post('/conversations/direct', async (request, reply) => {
    const auth = requireAuth(request);
    const { user_id } = parseWith(DirectBody, request.body);
    if (user_id === auth.sub) throw new BadRequestError('cannot_message_self');

    const key = directKey(auth.sub, user_id);
    const existing = await store.findDirect(key);
    if (existing) return { conversation: await summaryFor(existing, auth.sub), created: false };

    await assertReachable(auth.sub, [user_id]);
    let conversation: Conversation;
    try {
      conversation = await store.createConversation({
        kind: 'direct',
        title: null,
        direct_key: key,
        created_by: auth.sub,
        members: [
          { user_id: auth.sub, role: 'member' },
          { user_id, role: 'member' },
        ],
      });
    } catch (err) {
      if (!(err instanceof ConflictError)) throw err;
      // created concurrently by the other side
      const raced = await store.findDirect(key);
      if (!raced) throw err;
      return { conversation: await summaryFor(raced, auth.sub), created: false };
    }
    await events.emit(
      'messaging.conversation_created',
      { conversation_id: conversation.id, kind: 'direct', member_ids: [auth.sub, user_id] },
      { actorId: auth.sub, correlationId: correlationIdOf(request) },
    );
    reply.status(201);
    return { conversation: await summaryFor(conversation, auth.sub), created: true };
  });

  app.post('/conversations/group', async (request, reply) => {
    const auth = requireAuth(request);
    const body = parseWith(GroupBody, request.body);
    const memberIds = otherMemberIds(auth.sub, body.member_ids);
    if (!memberIds.length) throw new BadRequestError('invalid_request', 'member_ids: at least one other member required');
    const idempotencyKey = idempotencyKeyOf(request);

    const result = await withIdempotency(
      deps.idempotency,
      idempotencyKey ? `group:${auth.sub}:${idempotencyKey}` : undefined,
      isSummaryResponse,
      async () => {
        await assertReachable(auth.sub, memberIds);
        const conversation = await store.createConversation({
          kind: 'group',
          title: body.title,
          direct_key: null,
          created_by: auth.sub,
          members: [
            { user_id: auth.sub, role: 'owner' },
            ...memberIds.map((user_id) => ({ user_id, role: 'member' as const })),
          ],
        });
        await events.emit(
          'messaging.conversation_created',
          { conversation_id: conversation.id, kind: 'group', member_ids: [auth.sub, ...memberIds] },
          { actorId: auth.sub, correlationId: correlationIdOf(request), idempotencyKey },
        );
        return { conversation: await summaryFor(conversation, auth.sub) };
      },
    );
    reply.status(201);
    return result;
  });

  app.get('/conversations', async (request) => {
    const auth = requireAuth(request);
    return { conversations: await summarize(await store.listForUser(auth.sub), auth.sub) };
  });

  app.get('/conversations/:id', async (request) => {
    const auth = requireAuth(request);
    const { id } = parseWith(IdParams, request.params);
    const { conversation } = await membership(id, auth.sub);
    return { conversation: await summaryFor(conversation, auth.sub) };
  });

  app.get('/conversations/:id/messages', async (request) => {
    const auth = requireAuth(request);
    const { id } = parseWith(IdParams, request.params);
    const query = parseWith(PageQuery, request.query);
    await membership(id, auth.sub);
    const page = await store.listMessages(id, { after: query.after, limit: pageLimit(query.limit) });
    return { messages: page.map(toMessageView), next_cursor: nextCursor(page, query.after) };
  });

  app.post('/conversations/:id/messages', async (request, reply) => {
    const auth = requireAuth(request);
    const { id } = parseWith(IdParams, request.params);
    await enforceRateLimit(limiter, rateLimitKey(request, 'messaging', 'send', auth.sub), {
      limit: 30,
      windowSec: 60,
      cooldownSec: 300,
      cooldownThreshold: 45,
    });
    const body = parseWith(SendBody, request.body);
    await membership(id, auth.sub);

    const { message, deduped } = await store.appendMessage({
      conversation_id: id,
      sender_id: auth.sub,
      client_id: body.client_id ?? null,
      body: body.body,
    });
    if (!deduped) {
      await events.emit(
        'messaging.message_sent',
        { conversation_id: id, message_id: message.id, seq: message.seq, sender_id: auth.sub },
        { actorId: auth.sub, correlationId: correlationIdOf(request) },
      );
    }
    reply.status(deduped ? 200 : 201);
    return { message: toMessageView(message), deduped };
  });

  app.post('/conversations/:id/read', async (request) => {
    const auth = requireAuth(request);
    const { id } = parseWith(IdParams, request.params);
    const { seq } = parseWith(ReadBody, request.body);
    await membership(id, auth.sub);
    return { last_read_seq: await store.markRead(id, auth.sub, seq) };
  });

  app.patch('/conversations/:id', async (request) => {
    const auth = requireAuth(request);
    const { id } = parseWith(IdParams, request.params);
    const { title } = parseWith(TitleBody, request.body);
    await ownedGroup(id, auth.sub);
    const updated = await store.setTitle(id, title);
    if (!updated) throw new NotFoundError();
    await events.emit(
      'messaging.conversation_renamed',
      { conversation_id: id, title },
      { actorId: auth.sub, correlationId: correlationIdOf(request) },
    );
    return { conversation: await summaryFor(updated, auth.sub) };
  });

  app.post('/conversations/:id/members', async (request) => {
    const auth = requireAuth(request);
    const { id } = parseWith(IdParams, request.params);
    const { user_ids } = parseWith(MembersBody, request.body);
    const { conversation } = await ownedGroup(id, auth.sub);
    const existing = new Set((await store.getMembers(id)).map((m) => m.user_id));
    const candidates = otherMemberIds(auth.sub, user_ids).filter((uid) => !existing.has(uid));
    if (candidates.length) await assertReachable(auth.sub, candidates);

    const added = await store.addMembers(id, candidates);
    if (added.length) {
      await events.emit(
        'messaging.members_added',
        { conversation_id: id, member_ids: added },
        { actorId: auth.sub, correlationId: correlationIdOf(request) },
      );
    }
    const current = (await store.getConversation(id)) ?? conversation;
    return { added, conversation: await summaryFor(current, auth.sub) };
  });

  app.delete('/conversations/:id/members/me', async (request) => {
    const auth = requireAuth(request);
    const { id } = parseWith(IdParams, request.params);
    const { conversation } = await membership(id, auth.sub);
    if (conversation.kind === 'direct') throw new BadRequestError('cannot_leave_direct');
    const result = await store.leave(id, auth.sub);
    if (!result) throw new NotFoundError();
    await events.emit(
      'messaging.member_left',
      { conversation_id: id, user_id: auth.sub, new_owner_id: result.newOwnerId, deleted: result.deleted },
      { actorId: auth.sub, correlationId: correlationIdOf(request) },
    );
    return { ok: true, deleted: result.deleted, new_owner_id: result.newOwnerId };
  });

  return app;
};
