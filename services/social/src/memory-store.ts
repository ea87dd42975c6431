import { v4 as uuidv4 } from 'uuid';
import { ConflictError } from '@huddle/shared';
import { FriendRequest, orderedPair } from './friendships';
import { SocialStore } from './store';

// Single-process store for local runs (STORE_BACKEND=memory) and tests.
export const createMemorySocialStore = (now: () => Date = () => new Date()): SocialStore => {
  const requests = new Map<string, FriendRequest>();
  const friendships = new Map<string, { user_a: string; user_b: string; created_at: Date }>();

  const pairKey = (a: string, b: string) => orderedPair(a, b).join(':');
  const pendingBetween = (a: string, b: string) =>
    [...requests.values()].find(
      (r) => r.status === 'pending' && pairKey(r.sender_id, r.recipient_id) === pairKey(a, b),
    ) ?? null;

  return {
    async findPendingBetween(a, b) {
      const found = pendingBetween(a, b);
      return found ? { ...found } : null;
    },

    async getRequest(id) {
      const found = requests.get(id);
      return found ? { ...found } : null;
    },

    async createRequest(senderId, recipientId) {
      if (pendingBetween(senderId, recipientId)) throw new ConflictError('request_exists');
      const request: FriendRequest = {
        id: uuidv4(),
        sender_id: senderId,
        recipient_id: recipientId,
        status: 'pending',
        created_at: now(),
        responded_at: null,
      };
      requests.set(request.id, request);
      return { ...request };
    },

    async acceptRequest(id) {
      const request = requests.get(id);
      if (!request || request.status !== 'pending') return null;
      request.status = 'accepted';
      request.responded_at = now();
      const [user_a, user_b] = orderedPair(request.sender_id, request.recipient_id);
      const key = pairKey(user_a, user_b);
      if (!friendships.has(key)) friendships.set(key, { user_a, user_b, created_at: now() });
      return { ...request };
    },

    async closeRequest(id, status) {
      const request = requests.get(id);
      if (!request || request.status !== 'pending') return null;
      request.status = status;
      request.responded_at = now();
      return { ...request };
    },

    async listPending(userId, direction) {
      return [...requests.values()]
        .filter((r) => r.status === 'pending' && (direction === 'incoming' ? r.recipient_id : r.sender_id) === userId)
        .sort((a, b) => b.created_at.getTime() - a.created_at.getTime())
        .map((r) => ({ ...r }));
    },

    async areFriends(a, b) {
      return friendships.has(pairKey(a, b));
    },

    async listFriendIds(userId) {
      return [...friendships.values()]
        .filter((f) => f.user_a === userId || f.user_b === userId)
        .sort((x, y) => x.created_at.getTime() - y.created_at.getTime())
        .map((f) => (f.user_a === userId ? f.user_b : f.user_a));
    },

    async removeFriendship(a, b) {
      return friendships.delete(pairKey(a, b));
    },

    async purgeUser(userId) {
      for (const [key, f] of friendships) {
        if (f.user_a === userId || f.user_b === userId) friendships.delete(key);
      }
      for (const r of requests.values()) {
        if (r.status === 'pending' && (r.sender_id === userId || r.recipient_id === userId)) {
          r.status = 'cancelled';
          r.responded_at = now();
        }
      }
    },
  };
};
