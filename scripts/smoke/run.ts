/* eslint-disable no-console */
import { randomUUID } from 'node:crypto';
import { ApiError, createApiClient, memorySessionStore, type ApiClient } from '@huddle/client';

/**
 * End-to-end pass through the gateway against running services:
 * two accounts become friends, talk in a direct conversation and in a group.
 * Usage: GATEWAY_URL=http://localhost:4000 npm run smoke
 */

type Result = { name: string; ok: boolean; detail?: string };

const GATEWAY_URL = process.env.GATEWAY_URL || 'http://localhost:4000';
const PASSWORD = 'smoke-test-password';

const results: Result[] = [];
const check = (ok: boolean, name: string, detail?: string) => results.push({ name, ok, detail });

const describeError = (err: unknown) =>
  err instanceof ApiError ? `${err.status} ${err.code}` : err instanceof Error ? err.message : String(err);

const step = async <T>(name: string, action: () => Promise<T>): Promise<T | null> => {
  try {
    const value = await action();
    check(true, name);
    return value;
  } catch (err) {
    check(false, name, describeError(err));
    return null;
  }
};

const newClient = (): ApiClient => createApiClient({ baseUrl: GATEWAY_URL, session: memorySessionStore() });

const run = async () => {
  const ready = await fetch(`${GATEWAY_URL}/readyz`).then(
    (res) => res.ok,
    () => false,
  );
  check(ready, 'gateway ready');
  if (!ready) return;

  const suffix = randomUUID().slice(0, 6);
  const alice = newClient();
  const bob = newClient();

  const aliceProfile = await step('register alice', () =>
    alice.register({ password: PASSWORD, preferred_username: `smoke_a_${suffix}` }),
  );
  const bobProfile = await step('register bob', () =>
    bob.register({ password: PASSWORD, preferred_username: `smoke_b_${suffix}` }),
  );
  if (!aliceProfile || !bobProfile) return;

  const found = await step('search finds bob', () => alice.searchProfiles(bobProfile.username));
  check(Boolean(found?.some((p) => p.id === bobProfile.id)), 'search result contains bob');

  const sent = await step('send friend request', () => alice.sendFriendRequest({ username: bobProfile.username }));
  check(sent?.status === 'pending', 'request is pending', sent?.status);

  const incoming = await step('bob lists incoming', () => bob.listFriendRequests('incoming'));
  const request = incoming?.find((r) => r.sender_id === aliceProfile.id);
  if (!request) {
    check(false, 'incoming request visible');
    return;
  }
  await step('bob accepts', () => bob.respondToFriendRequest(request.id, 'accept'));
  check((await bob.friendshipStatus(aliceProfile.id)) === 'friends', 'status is friends');

  const direct = await step('open direct conversation', () => alice.openDirect(bobProfile.id));
  if (!direct) return;
  const conversationId = direct.conversation.id;

  const clientId = randomUUID();
  const first = await step('send message', () => alice.sendMessage(conversationId, 'hello from smoke', clientId));
  const retry = await step('resend same client id', () => alice.sendMessage(conversationId, 'hello from smoke', clientId));
  check(retry?.deduped === true && retry.message.id === first?.message.id, 'retry deduplicated');

  const page = await step('bob reads messages', () => bob.listMessages(conversationId));
  check(page?.messages.length === 1, 'one message delivered', String(page?.messages.length));
  const [summary] = (await step('bob lists conversations', () => bob.listConversations())) ?? [];
  check(summary?.unread === 1, 'bob has one unread', String(summary?.unread));
  await step('bob marks read', () => bob.markRead(conversationId));

  const group = await step('create group', () => alice.createGroup(`smoke ${suffix}`, [bobProfile.id]));
  if (group) {
    const left = await step('alice leaves group', () => alice.leaveGroup(group.id));
    check(left?.new_owner_id === bobProfile.id, 'bob owns the group');
  }

  await step('alice deletes account', () => alice.deleteAccount());
  await step('bob logs out', () => bob.logout());
};

run()
  .catch((err: unknown) => check(false, 'smoke run', describeError(err)))
  .finally(() => {
    for (const r of results) {
      console.log(`${r.ok ? '\x1b[32m✓\x1b[0m' : '\x1b[31m✗\x1b[0m'} ${r.name}${r.detail ? ` (${r.detail})` : ''}`);
    }
    const failed = results.filter((r) => !r.ok).length;
    console.log(`\n${results.length - failed}/${results.length} checks passed`);
    process.exitCode = failed ? 1 : 0;
  });
