import { v4 as uuidv4 } from 'uuid';
import { ConflictError } from '@huddle/shared';
import { Conversation, countUnread, Member, Message, planLeave, selectPage } from './conversations';
import { MessagingStore } from './store';

// Single-process store for local runs (STORE_BACKEND=memory) and tests.
export const createMemoryMessagingStore = (now: () => Date = () => new Date()): MessagingStore => {
  const conversations = new Map<string, Conversation>();
  const members = new Map<string, Member[]>();
  const messages = new Map<string, Message[]>();

  const membersOf = (conversationId: string) =>
    [...(members.get(conversationId) ?? [])].sort((a, b) => a.joined_at.getTime() - b.joined_at.getTime());
  const memberOf = (conversationId: string, userId: string) =>
    (members.get(conversationId) ?? []).find((m) => m.user_id === userId) ?? null;

  const drop = (conversationId: string) => {
    conversations.delete(conversationId);
    members.delete(conversationId);
    messages.delete(conversationId);
  };

  const leave = (conversationId: string, userId: string) => {
    const current = members.get(conversationId) ?? [];
    const plan = planLeave(current, userId);
    if (plan.kind === 'not_member') return null;
    if (plan.kind === 'delete') {
      drop(conversationId);
      return { deleted: true, newOwnerId: null };
    }
    const remaining = current.filter((m) => m.user_id !== userId);
    for (const m of remaining) if (m.user_id === plan.newOwnerId) m.role = 'owner';
    members.set(conversationId, remaining);
    const conversation = conversations.get(conversationId);
    if (conversation) conversation.updated_at = now();
    return { deleted: false, newOwnerId: plan.newOwnerId };
  };

  return {
    async getConversation(id) {
      const found = conversations.get(id);
      return found ? { ...found } : null;
    },

    async findDirect(directKey) {
      const found = [...conversations.values()].find((c) => c.direct_key === directKey);
      return found ? { ...found } : null;
    },

    async createConversation(input) {
      if (input.direct_key && [...conversations.values()].some((c) => c.direct_key === input.direct_key)) {
        throw new ConflictError('conversation_exists');
      }
      const at = now();
      const conversation: Conversation = {
        id: uuidv4(),
        kind: input.kind,
        title: input.title,
        direct_key: input.direct_key,
        created_by: input.created_by,
        created_at: at,
        updated_at: at,
        last_seq: 0,
      };
      conversations.set(conversation.id, conversation);
      members.set(
        conversation.id,
        input.members.map((m) => ({
          conversation_id: conversation.id,
          user_id: m.user_id,
          role: m.role,
          joined_at: at,
          last_read_seq: 0,
        })),
      );
      messages.set(conversation.id, []);
      return { ...conversation };
    },

    async listForUser(userId) {
      return [...conversations.values()]
        .filter((c) => memberOf(c.id, userId))
        .sort((a, b) => b.updated_at.getTime() - a.updated_at.getTime())
        .map((c) => ({ ...c }));
    },

    async setTitle(id, title) {
      const conversation = conversations.get(id);
      if (!conversation) return null;
      conversation.title = title;
      conversation.updated_at = now();
      return { ...conversation };
    },

    async getMembers(conversationId) {
      return membersOf(conversationId).map((m) => ({ ...m }));
    },

    async getMember(conversationId, userId) {
      const found = memberOf(conversationId, userId);
      return found ? { ...found } : null;
    },

    async addMembers(conversationId, userIds) {
      const current = members.get(conversationId);
      if (!current) return [];
      const added: string[] = [];
      for (const userId of new Set(userIds)) {
        if (current.some((m) => m.user_id === userId)) continue;
        current.push({ conversation_id: conversationId, user_id: userId, role: 'member', joined_at: now(), last_read_seq: 0 });
        added.push(userId);
      }
      const conversation = conversations.get(conversationId);
      if (conversation && added.length) conversation.updated_at = now();
      return added;
    },

    async leave(conversationId, userId) {
      return leave(conversationId, userId);
    },

    async appendMessage(input) {
      const conversation = conversations.get(input.conversation_id);
      const log = messages.get(input.conversation_id);
      if (!conversation || !log) throw new Error(`unknown conversation ${input.conversation_id}`);
      if (input.client_id) {
        const existing = log.find((m) => m.sender_id === input.sender_id && m.client_id === input.client_id);
        if (existing) return { message: { ...existing }, deduped: true };
      }
      conversation.last_seq += 1;
      conversation.updated_at = now();
      const message: Message = {
        id: uuidv4(),
        conversation_id: input.conversation_id,
        sender_id: input.sender_id,
        client_id: input.client_id,
        body: input.body,
        seq: conversation.last_seq,
        created_at: conversation.updated_at,
      };
      log.push(message);
      const sender = memberOf(input.conversation_id, input.sender_id);
      if (sender) sender.last_read_seq = Math.max(sender.last_read_seq, message.seq);
      return { message: { ...message }, deduped: false };
    },

    async listMessages(conversationId, page) {
      return selectPage(messages.get(conversationId) ?? [], page.after, page.limit).map((m) => ({ ...m }));
    },

    async lastMessage(conversationId) {
      const log = messages.get(conversationId) ?? [];
      const last = log[log.length - 1];
      return last ? { ...last } : null;
    },

    async unreadCount(conversationId, userId, lastReadSeq) {
      return countUnread(messages.get(conversationId) ?? [], userId, lastReadSeq);
    },

    async markRead(conversationId, userId, seq) {
      const member = memberOf(conversationId, userId);
      const conversation = conversations.get(conversationId);
      if (!member || !conversation) return 0;
      const target = Math.min(seq ?? conversation.last_seq, conversation.last_seq);
      member.last_read_seq = Math.max(member.last_read_seq, target);
      return member.last_read_seq;
    },

    async purgeUser(userId) {
      for (const conversation of [...conversations.values()]) {
        if (!memberOf(conversation.id, userId)) continue;
        if (conversation.kind === 'direct') drop(conversation.id);
        else leave(conversation.id, userId);
      }
    },
  };
};
