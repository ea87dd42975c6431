import { Pool } from 'pg';
import { ConflictError, isUniqueViolation, withTransaction } from '@huddle/shared';
import { FriendRequest, orderedPair } from './friendships';
import { SocialStore } from './store';

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const REQUEST_COLUMNS = 'id, sender_id, recipient_id, status, created_at, responded_at';

export const createPgSocialStore = (pool: Pool): SocialStore => ({
  async findPendingBetween(a, b) {
    const res = await pool.query<FriendRequest>(
      `select ${REQUEST_COLUMNS} from friend_requests
       where status='pending'
         and least(sender_id, recipient_id)=least($1::uuid, $2::uuid)
         and greatest(sender_id, recipient_id)=greatest($1::uuid, $2::uuid)
       limit 1`,
      [a, b],
    );
    return res.rows[0] ?? null;
  },

  async getRequest(id) {
    if (!UUID_RE.test(id)) return null;
    const res = await pool.query<FriendRequest>(`select ${REQUEST_COLUMNS} from friend_requests where id=$1`, [id]);
    return res.rows[0] ?? null;
  },

  async createRequest(senderId, recipientId) {
    try {
      const res = await pool.query<FriendRequest>(
        `insert into friend_requests (sender_id, recipient_id, status) values ($1,$2,'pending') returning ${REQUEST_COLUMNS}`,
        [senderId, recipientId],
      );
      return res.rows[0];
    } catch (err) {
      if (isUniqueViolation(err)) throw new ConflictError('request_exists');
      throw err;
    }
  },

  async acceptRequest(id) {
    return withTransaction(pool, async (client) => {
      const res = await client.query<FriendRequest>(
        `update friend_requests set status='accepted', responded_at=now(), updated_at=now()
         where id=$1 and status='pending'
         returning ${REQUEST_COLUMNS}`,
        [id],
      );
      const request = res.rows[0];
      if (!request) return null;
      const [a, b] = orderedPair(request.sender_id, request.recipient_id);
      await client.query('insert into friendships (user_a, user_b) values ($1,$2) on conflict do nothing', [a, b]);
      return request;
    });
  },

  async closeRequest(id, status) {
    const res = await pool.query<FriendRequest>(
      `update friend_requests set status=$2, responded_at=now(), updated_at=now()
       where id=$1 and status='pending'
       returning ${REQUEST_COLUMNS}`,
      [id, status],
    );
    return res.rows[0] ?? null;
  },

  async listPending(userId, direction) {
    const column = direction === 'incoming' ? 'recipient_id' : 'sender_id';
    const res = await pool.query<FriendRequest>(
      `select ${REQUEST_COLUMNS} from friend_requests
       where ${column}=$1 and status='pending'
       order by created_at desc
       limit 200`,
      [userId],
    );
    return res.rows;
  },

  async areFriends(a, b) {
    if (!UUID_RE.test(a) || !UUID_RE.test(b)) return false;
    const [x, y] = orderedPair(a, b);
    const res = await pool.query('select 1 from friendships where user_a=$1 and user_b=$2', [x, y]);
    return (res.rowCount ?? 0) > 0;
  },

  async listFriendIds(userId) {
    const res = await pool.query<{ friend_id: string }>(
      `select case when user_a=$1 then user_b else user_a end as friend_id
       from friendships
       where user_a=$1 or user_b=$1
       order by created_at asc`,
      [userId],
    );
    return res.rows.map((r) => r.friend_id);
  },

  async removeFriendship(a, b) {
    const [x, y] = orderedPair(a, b);
    const res = await pool.query('delete from friendships where user_a=$1 and user_b=$2', [x, y]);
    return (res.rowCount ?? 0) > 0;
  },

  async purgeUser(userId) {
    await withTransaction(pool, async (client) => {
      await client.query('delete from friendships where user_a=$1 or user_b=$1', [userId]);
      await client.query(
        `update friend_requests set status='cancelled', responded_at=now(), updated_at=now()
         where status='pending' and (sender_id=$1 or recipient_id=$1)`,
        [userId],
      );
    });
  },
});
