import { ConflictError, ForbiddenError, NotFoundError } from '@huddle/shared';

export type FriendRequestStatus = 'pending' | 'accepted' | 'declined' | 'cancelled';

export type FriendRequest = {
  id: string;
  sender_id: string;
  recipient_id: string;
  status: FriendRequestStatus;
  created_at: Date;
  responded_at: Date | null;
};

export type RelationshipStatus = 'self' | 'friends' | 'outgoing' | 'incoming' | 'none';

export type PairState = {
  friends: boolean;
  // the pending request between the two users, in either direction
  pending: FriendRequest | null;
};

export type UpsertDecision =
  | { kind: 'self' }
  | { kind: 'already_friends' }
  | { kind: 'existing_outgoing'; request: FriendRequest }
  | { kind: 'accept_incoming'; request: FriendRequest }
  | { kind: 'create' };

export type RequestAction = 'accept' | 'decline' | 'cancel';

// Friendship rows are stored once per pair, smaller id first.
export const orderedPair = (a: string, b: string): [string, string] => (a < b ? [a, b] : [b, a]);

export const decideUpsert = (callerId: string, targetId: string, state: PairState): UpsertDecision => {
  if (callerId === targetId) return { kind: 'self' };
  if (state.friends) return { kind: 'already_friends' };
  const pending = state.pending;
  if (pending && pending.sender_id === callerId) return { kind: 'existing_outgoing', request: pending };
  if (pending && pending.sender_id === targetId) return { kind: 'accept_incoming', request: pending };
  return { kind: 'create' };
};

export const relationshipStatus = (callerId: string, targetId: string, state: PairState): RelationshipStatus => {
  if (callerId === targetId) return 'self';
  if (state.friends) return 'friends';
  if (state.pending?.sender_id === callerId) return 'outgoing';
  if (state.pending?.sender_id === targetId) return 'incoming';
  return 'none';
};

/**
 * Recipients accept or decline, senders cancel, and only while the request is pending.
 * Someone outside the pair sees the request as missing.
 */
export const assertTransition = (request: FriendRequest, actorId: string, action: RequestAction): void => {
  if (request.sender_id !== actorId && request.recipient_id !== actorId) {
    throw new NotFoundError();
  }
  const allowed = action === 'cancel' ? request.sender_id === actorId : request.recipient_id === actorId;
  if (!allowed) {
    throw new ForbiddenError('forbidden', `only the ${action === 'cancel' ? 'sender' : 'recipient'} can ${action}`);
  }
  if (request.status !== 'pending') {
    throw new ConflictError('request_not_pending', `request is ${request.status}`);
  }
};

export const ACTION_STATUS: Record<RequestAction, FriendRequestStatus> = {
  accept: 'accepted',
  decline: 'declined',
  cancel: 'cancelled',
};
