import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { TtlCache } from './cache';
import { SessionStore } from './session';
import {
  conversationSchema,
  friendRequestSchema,
  messageSchema,
  Profile,
  profileSchema,
  RelationshipStatus,
  tokensSchema,
} from './types';

export class ApiError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(status: number, code: string) {
    super(code);
    this.name = 'ApiError';
    this.status = status;
    this.code = code;
  }
}

// status 0 means the request never got a response
export const NETWORK_ERROR = 'network_error';

export type ApiClientOptions = {
  baseUrl: string;
  session: SessionStore;
  fetch?: typeof fetch;
  deviceId?: string;
  now?: () => number;
};

type Method = 'GET' | 'POST' | 'PATCH' | 'DELETE';
type Query = Record<string, string | number | undefined>;
type CallOptions = { body?: unknown; query?: Query; auth?: boolean; idempotencyKey?: string };

export const SEARCH_TTL_MS = 10_000;

const okSchema = z.object({ ok: z.boolean() });
const profileBody = z.object({ profile: profileSchema });
const profilesBody = z.object({ profiles: z.array(profileSchema) });
const registerBody = tokensSchema.extend({ profile: profileSchema });
const requestOutcome = z.object({
  status: z.enum(['pending', 'accepted', 'already_friends']),
  request: friendRequestSchema.optional(),
});
const conversationBody = z.object({ conversation: conversationSchema });
const messagePage = z.object({ messages: z.array(messageSchema), next_cursor: z.number().nullable() });
const sentMessage = z.object({ message: messageSchema, deduped: z.boolean() });

const withQuery = (path: string, query?: Query) => {
  const params = Object.entries(query ?? {}).flatMap(([k, v]) =>
    v === undefined ? [] : [`${encodeURIComponent(k)}=${encodeURIComponent(String(v))}`],
  );
  return params.length ? `${path}?${params.join('&')}` : path;
};

const errorCodeFrom = async (res: Response): Promise<string | null> => {
  try {
    const json: unknown = await res.json();
    return typeof json === 'object' && json !== null && 'error' in json && typeof json.error === 'string'
      ? json.error
      : null;
  } catch {
    return null;
  }
};

export const createApiClient = (options: ApiClientOptions) => {
  const doFetch = options.fetch ?? fetch;
  const deviceId = options.deviceId ?? uuidv4();
  const { session } = options;
  const searchCache = new TtlCache<Profile[]>(SEARCH_TTL_MS, options.now);

  const headersFor = (token: string | null, hasBody: boolean, idempotencyKey?: string): Record<string, string> => ({
    ...(hasBody ? { 'content-type': 'application/json' } : {}),
    'x-correlation-id': uuidv4(),
    'x-device-id': deviceId,
    ...(token ? { authorization: `Bearer ${token}` } : {}),
    ...(idempotencyKey ? { 'x-idempotency-key': idempotencyKey } : {}),
  });

  const rawFetch = async (url: string, init: RequestInit): Promise<Response> => {
    try {
      return await doFetch(url, init);
    } catch {
      throw new ApiError(0, NETWORK_ERROR);
    }
  };

  const refreshTokens = async (): Promise<boolean> => {
    const refreshToken = await session.getRefreshToken();
    if (!refreshToken) return false;
    const res = await rawFetch(`${options.baseUrl}/identity/auth/refresh`, {
      method: 'POST',
      headers: headersFor(null, true),
      body: JSON.stringify({ refresh_token: refreshToken }),
    });
    if (!res.ok) {
      if (res.status === 401) await session.clear();
      return false;
    }
    const parsed = tokensSchema.safeParse(await res.json());
    if (!parsed.success) return false;
    await session.save(parsed.data.access_token, parsed.data.refresh_token);
    return true;
  };

  // Concurrent 401s share one refresh.
  let refreshInFlight: Promise<boolean> | null = null;
  const sharedRefresh = (): Promise<boolean> => {
    if (!refreshInFlight) {
      refreshInFlight = refreshTokens().finally(() => {
        refreshInFlight = null;
      });
    }
    return refreshInFlight;
  };

  const send = async (method: Method, path: string, opts: CallOptions): Promise<Response> => {
    const url = `${options.baseUrl}${withQuery(path, opts.query)}`;
    const body = opts.body === undefined ? undefined : JSON.stringify(opts.body);
    const auth = opts.auth ?? true;
    const token = auth ? await session.getAccessToken() : null;
    const hasBody = body !== undefined;
    const res = await rawFetch(url, { method, headers: headersFor(token, hasBody, opts.idempotencyKey), body });
    if (res.status !== 401 || !token) return res;
    if (!(await sharedRefresh())) return res;
    const retryToken = await session.getAccessToken();
    return rawFetch(url, { method, headers: headersFor(retryToken, hasBody, opts.idempotencyKey), body });
  };

  const call = async <S extends z.ZodTypeAny>(
    schema: S,
    method: Method,
    path: string,
    callOptions: CallOptions = {},
  ): Promise<z.output<S>> => {
    const res = await send(method, path, callOptions);
    if (!res.ok) throw new ApiError(res.status, (await errorCodeFrom(res)) ?? `http_${res.status}`);
    return schema.parse(await res.json());
  };

  const conversationPath = (id: string) => `/messaging/conversations/${encodeURIComponent(id)}`;

  return {
    deviceId,

    async register(input: {
      password: string;
      preferred_username?: string;
      email?: string;
      full_name?: string;
      avatar_url?: string;
    }) {
      const result = await call(registerBody, 'POST', '/identity/auth/register', { body: input, auth: false });
      await session.save(result.access_token, result.refresh_token);
      return result.profile;
    },

    async login(username: string, password: string) {
      const tokens = await call(tokensSchema, 'POST', '/identity/auth/login', {
        body: { username, password },
        auth: false,
      });
      await session.save(tokens.access_token, tokens.refresh_token);
    },

    async logout() {
      try {
        await call(okSchema, 'POST', '/identity/auth/logout', { body: {} });
      } finally {
        await session.clear();
        searchCache.clear();
      }
    },

    async logoutAll() {
      try {
        await call(okSchema, 'POST', '/identity/auth/logout_all', { body: {} });
      } finally {
        await session.clear();
        searchCache.clear();
      }
    },

    async me() {
      return (await call(profileBody, 'GET', '/identity/me')).profile;
    },

    async updateMe(patch: { username?: string; full_name?: string | null; avatar_url?: string | null }) {
      const result = await call(profileBody, 'PATCH', '/identity/me', { body: patch });
      searchCache.clear();
      return result.profile;
    },

    async deleteAccount() {
      await call(okSchema, 'DELETE', '/identity/me');
      await session.clear();
    },

    async searchProfiles(q: string) {
      const key = q.trim().toLowerCase();
      if (!key) return [];
      const cached = searchCache.get(key);
      if (cached) return cached;
      const { profiles } = await call(profilesBody, 'GET', '/identity/profiles/search', { query: { q: key } });
      searchCache.set(key, profiles);
      return profiles;
    },

    async getProfile(username: string) {
      return (await call(profileBody, 'GET', `/identity/profiles/${encodeURIComponent(username)}`)).profile;
    },

    async sendFriendRequest(target: { username: string } | { user_id: string }) {
      return call(requestOutcome, 'POST', '/social/friends/requests', { body: target });
    },

    async listFriendRequests(direction: 'incoming' | 'outgoing' = 'incoming') {
      const body = z.object({ requests: z.array(friendRequestSchema) });
      return (await call(body, 'GET', '/social/friends/requests', { query: { direction } })).requests;
    },

    async respondToFriendRequest(id: string, action: 'accept' | 'decline' | 'cancel') {
      const body = z.object({ request: friendRequestSchema });
      return (await call(body, 'POST', `/social/friends/requests/${encodeURIComponent(id)}/${action}`, { body: {} }))
        .request;
    },

    async listFriends() {
      return (await call(z.object({ friends: z.array(profileSchema) }), 'GET', '/social/friends')).friends;
    },

    async removeFriend(userId: string) {
      await call(okSchema, 'DELETE', `/social/friends/${encodeURIComponent(userId)}`);
    },

    async friendshipStatus(userId: string): Promise<RelationshipStatus> {
      const body = z.object({ status: z.enum(['self', 'friends', 'outgoing', 'incoming', 'none']) });
      return (await call(body, 'GET', `/social/friends/status/${encodeURIComponent(userId)}`)).status;
    },

    async openDirect(userId: string) {
      const body = conversationBody.extend({ created: z.boolean() });
      return call(body, 'POST', '/messaging/conversations/direct', { body: { user_id: userId } });
    },

    async createGroup(title: string, memberIds: string[], idempotencyKey: string = uuidv4()) {
      return (
        await call(conversationBody, 'POST', '/messaging/conversations/group', {
          body: { title, member_ids: memberIds },
          idempotencyKey,
        })
      ).conversation;
    },

    async listConversations() {
      return (await call(z.object({ conversations: z.array(conversationSchema) }), 'GET', '/messaging/conversations'))
        .conversations;
    },

    async getConversation(id: string) {
      return (await call(conversationBody, 'GET', conversationPath(id))).conversation;
    },

    async listMessages(id: string, page: { after?: number; limit?: number } = {}) {
      return call(messagePage, 'GET', `${conversationPath(id)}/messages`, { query: page });
    },

    async sendMessage(id: string, body: string, clientId?: string) {
      return call(sentMessage, 'POST', `${conversationPath(id)}/messages`, { body: { body, client_id: clientId } });
    },

    async markRead(id: string, seq?: number) {
      const body = z.object({ last_read_seq: z.number() });
      return (await call(body, 'POST', `${conversationPath(id)}/read`, { body: seq === undefined ? {} : { seq } }))
        .last_read_seq;
    },

    async renameGroup(id: string, title: string) {
      return (await call(conversationBody, 'PATCH', conversationPath(id), { body: { title } })).conversation;
    },

    async addMembers(id: string, userIds: string[]) {
      const body = conversationBody.extend({ added: z.array(z.string()) });
      return call(body, 'POST', `${conversationPath(id)}/members`, { body: { user_ids: userIds } });
    },

    async leaveGroup(id: string) {
      const body = z.object({ ok: z.boolean(), deleted: z.boolean(), new_owner_id: z.string().nullable() });
      return call(body, 'DELETE', `${conversationPath(id)}/members/me`);
    },
  };
};

export type ApiClient = ReturnType<typeof createApiClient>;
