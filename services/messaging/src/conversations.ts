export type ConversationKind = 'direct' | 'group';
export type MemberRole = 'owner' | 'member';

export type Conversation = {
  id: string;
  kind: ConversationKind;
  title: string | null;
  direct_key: string | null;
  created_by: string;
  created_at: Date;
  updated_at: Date;
  last_seq: number;
};

export type Member = {
  conversation_id: string;
  user_id: string;
  role: MemberRole;
  joined_at: Date;
  last_read_seq: number;
};

export type Message = {
  id: string;
  conversation_id: string;
  sender_id: string;
  client_id: string | null;
  body: string;
  seq: number;
  created_at: Date;
};

export type LeavePlan =
  | { kind: 'not_member' }
  | { kind: 'delete' }
  | { kind: 'remove'; newOwnerId: string | null };

export const DEFAULT_PAGE = 50;
export const MAX_PAGE = 200;

// One direct conversation per unordered pair.
export const directKey = (a: string, b: string): string => (a < b ? `${a}:${b}` : `${b}:${a}`);

export const otherMemberIds = (creatorId: string, ids: string[]): string[] =>
  [...new Set(ids)].filter((id) => id !== creatorId);

const byJoinOrder = (a: Member, b: Member) =>
  a.joined_at.getTime() - b.joined_at.getTime() || a.user_id.localeCompare(b.user_id);

/**
 * What happens when `userId` leaves. The last member out deletes the conversation; an
 * owner leaving hands ownership to the earliest-joined remaining member.
 */
export const planLeave = (members: Member[], userId: string): LeavePlan => {
  const leaving = members.find((m) => m.user_id === userId);
  if (!leaving) return { kind: 'not_member' };
  const remaining = members.filter((m) => m.user_id !== userId).sort(byJoinOrder);
  if (!remaining.length) return { kind: 'delete' };
  const ownerRemains = remaining.some((m) => m.role === 'owner');
  return { kind: 'remove', newOwnerId: ownerRemains ? null : remaining[0].user_id };
};

export const pageLimit = (limit: number | undefined): number =>
  Math.min(Math.max(limit ?? DEFAULT_PAGE, 1), MAX_PAGE);

// Ascending by seq: the first `limit` after the cursor, or the latest `limit` without one.
export const selectPage = (messages: Message[], after: number | undefined, limit: number): Message[] => {
  const sorted = [...messages].sort((a, b) => a.seq - b.seq);
  if (after !== undefined) return sorted.filter((m) => m.seq > after).slice(0, limit);
  return sorted.slice(Math.max(sorted.length - limit, 0));
};

export const nextCursor = (page: Message[], after: number | undefined): number | null =>
  page.length ? page[page.length - 1].seq : (after ?? null);

export const countUnread = (messages: Message[], viewerId: string, lastReadSeq: number): number =>
  messages.filter((m) => m.seq > lastReadSeq && m.sender_id !== viewerId).length;
