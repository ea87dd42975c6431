import { ConflictError } from '@huddle/shared';
import { IdentityStore, SessionRecord, toProfile, UserRecord } from './store';

type StoredUser = UserRecord & { deleted_at: Date | null };
type StoredSession = Omit<SessionRecord, 'user_deleted'>;

// Single-process store for local runs (STORE_BACKEND=memory) and tests.
export const createMemoryIdentityStore = (now: () => Date = () => new Date()): IdentityStore => {
  const users = new Map<string, StoredUser>();
  const sessions = new Map<string, StoredSession>();

  const live = (id: string) => {
    const user = users.get(id);
    return user && !user.deleted_at ? user : null;
  };
  const usernameOwner = (username: string) => [...users.values()].find((u) => u.username === username) ?? null;
  const publicUser = (u: StoredUser): UserRecord => ({
    id: u.id,
    username: u.username,
    full_name: u.full_name,
    avatar_url: u.avatar_url,
    email: u.email,
    password_hash: u.password_hash,
    created_at: u.created_at,
  });

  return {
    async isUsernameAvailable(username) {
      return usernameOwner(username) === null;
    },

    async createUser(user) {
      if (usernameOwner(user.username)) throw new ConflictError('username_taken');
      const stored: StoredUser = { ...user, created_at: now(), deleted_at: null };
      users.set(user.id, stored);
      return publicUser(stored);
    },

    async getUser(id) {
      const user = live(id);
      return user ? publicUser(user) : null;
    },

    async getUserByUsername(username) {
      const owner = usernameOwner(username.toLowerCase());
      return owner && !owner.deleted_at ? publicUser(owner) : null;
    },

    async getProfiles(ids) {
      return ids.flatMap((id) => {
        const user = live(id);
        return user ? [toProfile(user)] : [];
      });
    },

    async updateProfile(id, patch) {
      const user = live(id);
      if (!user) return null;
      if (patch.username !== undefined) {
        const owner = usernameOwner(patch.username);
        if (owner && owner.id !== id) throw new ConflictError('username_taken');
        user.username = patch.username;
      }
      if (patch.full_name !== undefined) user.full_name = patch.full_name;
      if (patch.avatar_url !== undefined) user.avatar_url = patch.avatar_url;
      return toProfile(user);
    },

    async searchProfiles(query, excludeId, limit) {
      const needle = query.toLowerCase();
      return [...users.values()]
        .filter((u) => !u.deleted_at && u.id !== excludeId)
        .filter((u) => u.username.includes(needle) || (u.full_name ?? '').toLowerCase().includes(needle))
        .sort((a, b) => a.username.localeCompare(b.username))
        .slice(0, limit)
        .map(toProfile);
    },

    async softDeleteUser(id) {
      const user = live(id);
      if (user) user.deleted_at = now();
    },

    async createSession(session) {
      sessions.set(session.id, { ...session, revoked_at: null });
    },

    async getSession(id) {
      const session = sessions.get(id);
      if (!session) return null;
      const user = users.get(session.user_id);
      return { ...session, user_deleted: !user || user.deleted_at !== null };
    },

    async rotateSession(id, refreshTokenHash, expiresAt) {
      const session = sessions.get(id);
      if (!session || session.revoked_at) return;
      session.refresh_token_hash = refreshTokenHash;
      session.expires_at = expiresAt;
    },

    async revokeSession(id, userId) {
      const session = sessions.get(id);
      if (session && session.user_id === userId && !session.revoked_at) session.revoked_at = now();
    },

    async revokeAllSessions(userId) {
      for (const session of sessions.values()) {
        if (session.user_id === userId && !session.revoked_at) session.revoked_at = now();
      }
    },

    async isSessionActive(id, at) {
      const session = sessions.get(id);
      if (!session || session.revoked_at) return false;
      if (session.expires_at.getTime() <= at.getTime()) return false;
      return live(session.user_id) !== null;
    },
  };
};
