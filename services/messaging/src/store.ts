import type { Conversation, ConversationKind, Member, MemberRole, Message } from './conversations';

export type NewConversation = {
  kind: ConversationKind;
  title: string | null;
  direct_key: string | null;
  created_by: string;
  members: { user_id: string; role: MemberRole }[];
};

export type NewMessage = {
  conversation_id: string;
  sender_id: string;
  client_id: string | null;
  body: string;
};

export type AppendResult = { message: Message; deduped: boolean };

export type LeaveResult = { deleted: boolean; newOwnerId: string | null };

export type MessagePage = { after?: number; limit: number };

export interface MessagingStore {
  getConversation(id: string): Promise<Conversation | null>;
  findDirect(directKey: string): Promise<Conversation | null>;
  /** Throws ConflictError('conversation_exists') when the direct key is already taken. */
  createConversation(input: NewConversation): Promise<Conversation>;
  /** Conversations the user belongs to, most recently updated first. */
  listForUser(userId: string): Promise<Conversation[]>;
  setTitle(id: string, title: string): Promise<Conversation | null>;

  /** Members in join order. */
  getMembers(conversationId: string): Promise<Member[]>;
  getMember(conversationId: string, userId: string): Promise<Member | null>;
  /** Adds the users as plain members, skipping existing ones. Returns the ids actually added. */
  addMembers(conversationId: string, userIds: string[]): Promise<string[]>;
  /** Null when the user is not a member. */
  leave(conversationId: string, userId: string): Promise<LeaveResult | null>;

  /**
   * Assigns the next seq, bumps the conversation and marks it read for the sender.
   * A client id the sender already used in this conversation returns the stored message.
   */
  appendMessage(input: NewMessage): Promise<AppendResult>;
  listMessages(conversationId: string, page: MessagePage): Promise<Message[]>;
  lastMessage(conversationId: string): Promise<Message | null>;
  unreadCount(conversationId: string, userId: string, lastReadSeq: number): Promise<number>;
  /** Moves the read cursor forward to `seq`, or to the latest message. Returns the resulting cursor. */
  markRead(conversationId: string, userId: string, seq?: number): Promise<number>;

  /** Removes the user from every group and deletes their direct conversations. */
  purgeUser(userId: string): Promise<void>;
}
