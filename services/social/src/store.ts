import type { FriendRequest } from './friendships';

export type RequestDirection = 'incoming' | 'outgoing';

export interface SocialStore {
  findPendingBetween(a: string, b: string): Promise<FriendRequest | null>;
  getRequest(id: string): Promise<FriendRequest | null>;
  /** Throws ConflictError('request_exists') when the pair already has a pending request. */
  createRequest(senderId: string, recipientId: string): Promise<FriendRequest>;
  /** Marks a pending request accepted and records the friendship. Null when it was not pending. */
  acceptRequest(id: string): Promise<FriendRequest | null>;
  closeRequest(id: string, status: 'declined' | 'cancelled'): Promise<FriendRequest | null>;
  listPending(userId: string, direction: RequestDirection): Promise<FriendRequest[]>;
  areFriends(a: string, b: string): Promise<boolean>;
  listFriendIds(userId: string): Promise<string[]>;
  removeFriendship(a: string, b: string): Promise<boolean>;
  /** Drops every friendship of the user and cancels their pending requests. */
  purgeUser(userId: string): Promise<void>;
}
