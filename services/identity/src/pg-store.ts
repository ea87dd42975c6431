import { Pool } from 'pg';
import { ConflictError, isUniqueViolation, type Profile } from '@huddle/shared';
import { IdentityStore, SessionRecord, UserRecord } from './store';

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

const USER_COLUMNS = 'id, username, full_name, avatar_url, email, password_hash, created_at';
const PROFILE_COLUMNS = 'id, username, full_name, avatar_url';

const escapeLike = (s: string) => s.replace(/[\\%_]/g, (m) => `\\${m}`);

export const createPgIdentityStore = (pool: Pool): IdentityStore => ({
  async isUsernameAvailable(username) {
    const res = await pool.query('select 1 from users where username=$1 limit 1', [username]);
    return res.rowCount === 0;
  },

  async createUser(user) {
    try {
      const res = await pool.query<UserRecord>(
        `insert into users (id, username, password_hash, email, full_name, avatar_url)
         values ($1,$2,$3,$4,$5,$6)
         returning ${USER_COLUMNS}`,
        [user.id, user.username, user.password_hash, user.email, user.full_name, user.avatar_url],
      );
      return res.rows[0];
    } catch (err) {
      if (isUniqueViolation(err)) throw new ConflictError('username_taken');
      throw err;
    }
  },

  async getUser(id) {
    if (!UUID_RE.test(id)) return null;
    const res = await pool.query<UserRecord>(`select ${USER_COLUMNS} from users where id=$1 and deleted_at is null`, [id]);
    return res.rows[0] ?? null;
  },

  async getUserByUsername(username) {
    const res = await pool.query<UserRecord>(
      `select ${USER_COLUMNS} from users where username=$1 and deleted_at is null`,
      [username.toLowerCase()],
    );
    return res.rows[0] ?? null;
  },

  async getProfiles(ids) {
    const valid = ids.filter((id) => UUID_RE.test(id));
    if (!valid.length) return [];
    const res = await pool.query<Profile>(
      `select ${PROFILE_COLUMNS} from users where id = any($1::uuid[]) and deleted_at is null`,
      [valid],
    );
    return res.rows;
  },

  async updateProfile(id, patch) {
    const sets: string[] = [];
    const values: unknown[] = [id];
    if (patch.username !== undefined) {
      values.push(patch.username);
      sets.push(`username=$${values.length}`);
    }
    if (patch.full_name !== undefined) {
      values.push(patch.full_name);
      sets.push(`full_name=$${values.length}`);
    }
    if (patch.avatar_url !== undefined) {
      values.push(patch.avatar_url);
      sets.push(`avatar_url=$${values.length}`);
    }
    sets.push('updated_at=now()');
    try {
      const res = await pool.query<Profile>(
        `update users set ${sets.join(', ')} where id=$1 and deleted_at is null returning ${PROFILE_COLUMNS}`,
        values,
      );
      return res.rows[0] ?? null;
    } catch (err) {
      if (isUniqueViolation(err)) throw new ConflictError('username_taken');
      throw err;
    }
  },

  async searchProfiles(query, excludeId, limit) {
    const pattern = `%${escapeLike(query)}%`;
    const res = await pool.query<Profile>(
      `select ${PROFILE_COLUMNS} from users
       where deleted_at is null and id <> $2 and (username ilike $1 or full_name ilike $1)
       order by username asc
       limit $3`,
      [pattern, excludeId, limit],
    );
    return res.rows;
  },

  async softDeleteUser(id) {
    await pool.query('update users set deleted_at=now(), updated_at=now() where id=$1 and deleted_at is null', [id]);
  },

  async createSession(session) {
    await pool.query(
      `insert into sessions (id, user_id, refresh_token_hash, device_fingerprint, last_active_at, expires_at)
       values ($1,$2,$3,$4,now(),$5)`,
      [session.id, session.user_id, session.refresh_token_hash, session.device_fingerprint, session.expires_at],
    );
  },

  async getSession(id) {
    if (!UUID_RE.test(id)) return null;
    const res = await pool.query<SessionRecord>(
      `select s.id, s.user_id, s.refresh_token_hash, s.device_fingerprint, s.expires_at, s.revoked_at,
              (u.deleted_at is not null) as user_deleted
       from sessions s
       join users u on u.id = s.user_id
       where s.id=$1`,
      [id],
    );
    return res.rows[0] ?? null;
  },

  async rotateSession(id, refreshTokenHash, expiresAt) {
    await pool.query(
      'update sessions set refresh_token_hash=$2, last_active_at=now(), expires_at=$3 where id=$1 and revoked_at is null',
      [id, refreshTokenHash, expiresAt],
    );
  },

  async revokeSession(id, userId) {
    await pool.query('update sessions set revoked_at=now() where id=$1 and user_id=$2 and revoked_at is null', [id, userId]);
  },

  async revokeAllSessions(userId) {
    await pool.query('update sessions set revoked_at=now() where user_id=$1 and revoked_at is null', [userId]);
  },

  async isSessionActive(id, now) {
    if (!UUID_RE.test(id)) return false;
    const res = await pool.query(
      `select 1
       from sessions s
       join users u on u.id = s.user_id
       where s.id=$1 and s.revoked_at is null and s.expires_at > $2 and u.deleted_at is null`,
      [id, now],
    );
    return (res.rowCount ?? 0) > 0;
  },
});
