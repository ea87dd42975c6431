import type { Profile } from '@huddle/shared';

export type UserRecord = Profile & {
  email: string | null;
  password_hash: string;
  created_at: Date;
};

export type NewUser = {
  id: string;
  username: string;
  password_hash: string;
  email: string | null;
  full_name: string | null;
  avatar_url: string | null;
};

export type ProfilePatch = {
  username?: string;
  full_name?: string | null;
  avatar_url?: string | null;
};

export type SessionRecord = {
  id: string;
  user_id: string;
  refresh_token_hash: string;
  device_fingerprint: string | null;
  expires_at: Date;
  revoked_at: Date | null;
  user_deleted: boolean;
};

export type NewSession = Omit<SessionRecord, 'revoked_at' | 'user_deleted'>;

export interface IdentityStore {
  isUsernameAvailable(username: string): Promise<boolean>;
  /** Throws ConflictError('username_taken') when the username is already in use. */
  createUser(user: NewUser): Promise<UserRecord>;
  getUser(id: string): Promise<UserRecord | null>;
  getUserByUsername(username: string): Promise<UserRecord | null>;
  getProfiles(ids: string[]): Promise<Profile[]>;
  /** Throws ConflictError('username_taken') when the new username is already in use. */
  updateProfile(id: string, patch: ProfilePatch): Promise<Profile | null>;
  searchProfiles(query: string, excludeId: string, limit: number): Promise<Profile[]>;
  softDeleteUser(id: string): Promise<void>;

  createSession(session: NewSession): Promise<void>;
  getSession(id: string): Promise<SessionRecord | null>;
  rotateSession(id: string, refreshTokenHash: string, expiresAt: Date): Promise<void>;
  revokeSession(id: string, userId: string): Promise<void>;
  revokeAllSessions(userId: string): Promise<void>;
  isSessionActive(id: string, now: Date): Promise<boolean>;
}

export const toProfile = (user: Profile): Profile => ({
  id: user.id,
  username: user.username,
  full_name: user.full_name,
  avatar_url: user.avatar_url,
});
