import { Pool, PoolClient } from 'pg';
import { ConflictError, isUniqueViolation, withTransaction } from '@huddle/shared';
import { Conversation, Member, Message, planLeave } from './conversations';
import { LeaveResult, MessagingStore } from './store';

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

const CONVERSATION_COLUMNS = 'id, kind, title, direct_key, created_by, created_at, updated_at, last_seq';
const MEMBER_COLUMNS = 'conversation_id, user_id, role, joined_at, last_read_seq';
const MESSAGE_COLUMNS = 'id, conversation_id, sender_id, client_id, body, seq, created_at';

// bigint columns come back from pg as strings
type SeqRow<T> = Omit<T, 'seq' | 'last_seq' | 'last_read_seq'> & { seq?: string; last_seq?: string; last_read_seq?: string };

const toConversation = (row: SeqRow<Conversation>): Conversation => ({
  id: row.id,
  kind: row.kind,
  title: row.title,
  direct_key: row.direct_key,
  created_by: row.created_by,
  created_at: row.created_at,
  updated_at: row.updated_at,
  last_seq: Number(row.last_seq ?? 0),
});

const toMember = (row: SeqRow<Member>): Member => ({
  conversation_id: row.conversation_id,
  user_id: row.user_id,
  role: row.role,
  joined_at: row.joined_at,
  last_read_seq: Number(row.last_read_seq ?? 0),
});

const toMessage = (row: SeqRow<Message>): Message => ({
  id: row.id,
  conversation_id: row.conversation_id,
  sender_id: row.sender_id,
  client_id: row.client_id,
  body: row.body,
  seq: Number(row.seq ?? 0),
  created_at: row.created_at,
});

const findByClientId = async (db: Pool | PoolClient, conversationId: string, senderId: string, clientId: string) => {
  const res = await db.query<SeqRow<Message>>(
    `select ${MESSAGE_COLUMNS} from messages where conversation_id=$1 and sender_id=$2 and client_id=$3`,
    [conversationId, senderId, clientId],
  );
  return res.rows[0] ? toMessage(res.rows[0]) : null;
};

const leaveWith = async (client: PoolClient, conversationId: string, userId: string): Promise<LeaveResult | null> => {
  const res = await client.query<SeqRow<Member>>(
    `select ${MEMBER_COLUMNS} from conversation_members where conversation_id=$1 for update`,
    [conversationId],
  );
  const plan = planLeave(res.rows.map(toMember), userId);
  if (plan.kind === 'not_member') return null;
  if (plan.kind === 'delete') {
    await client.query('delete from conversations where id=$1', [conversationId]);
    return { deleted: true, newOwnerId: null };
  }
  await client.query('delete from conversation_members where conversation_id=$1 and user_id=$2', [conversationId, userId]);
  if (plan.newOwnerId) {
    await client.query(`update conversation_members set role='owner' where conversation_id=$1 and user_id=$2`, [
      conversationId,
      plan.newOwnerId,
    ]);
  }
  await client.query('update conversations set updated_at=now() where id=$1', [conversationId]);
  return { deleted: false, newOwnerId: plan.newOwnerId };
};

export const createPgMessagingStore = (pool: Pool): MessagingStore => ({
  async getConversation(id) {
    if (!UUID_RE.test(id)) return null;
    const res = await pool.query<SeqRow<Conversation>>(`select ${CONVERSATION_COLUMNS} from conversations where id=$1`, [id]);
    return res.rows[0] ? toConversation(res.rows[0]) : null;
  },

  async findDirect(directKey) {
    const res = await pool.query<SeqRow<Conversation>>(
      `select ${CONVERSATION_COLUMNS} from conversations where direct_key=$1`,
      [directKey],
    );
    return res.rows[0] ? toConversation(res.rows[0]) : null;
  },

  async createConversation(input) {
    try {
      return await withTransaction(pool, async (client) => {
        const res = await client.query<SeqRow<Conversation>>(
          `insert into conversations (kind, title, direct_key, created_by) values ($1,$2,$3,$4)
           returning ${CONVERSATION_COLUMNS}`,
          [input.kind, input.title, input.direct_key, input.created_by],
        );
        const conversation = toConversation(res.rows[0]);
        for (const member of input.members) {
          await client.query('insert into conversation_members (conversation_id, user_id, role) values ($1,$2,$3)', [
            conversation.id,
            member.user_id,
            member.role,
          ]);
        }
        return conversation;
      });
    } catch (err) {
      if (isUniqueViolation(err)) throw new ConflictError('conversation_exists');
      throw err;
    }
  },

  async listForUser(userId) {
    const res = await pool.query<SeqRow<Conversation>>(
      `select ${CONVERSATION_COLUMNS.split(', ')
        .map((c) => `c.${c}`)
        .join(', ')}
       from conversations c
       join conversation_members m on m.conversation_id = c.id
       where m.user_id=$1
       order by c.updated_at desc
       limit 200`,
      [userId],
    );
    return res.rows.map(toConversation);
  },

  async setTitle(id, title) {
    const res = await pool.query<SeqRow<Conversation>>(
      `update conversations set title=$2, updated_at=now() where id=$1 returning ${CONVERSATION_COLUMNS}`,
      [id, title],
    );
    return res.rows[0] ? toConversation(res.rows[0]) : null;
  },

  async getMembers(conversationId) {
    const res = await pool.query<SeqRow<Member>>(
      `select ${MEMBER_COLUMNS} from conversation_members where conversation_id=$1 order by joined_at asc, user_id asc`,
      [conversationId],
    );
    return res.rows.map(toMember);
  },

  async getMember(conversationId, userId) {
    if (!UUID_RE.test(conversationId)) return null;
    const res = await pool.query<SeqRow<Member>>(
      `select ${MEMBER_COLUMNS} from conversation_members where conversation_id=$1 and user_id=$2`,
      [conversationId, userId],
    );
    return res.rows[0] ? toMember(res.rows[0]) : null;
  },

  async addMembers(conversationId, userIds) {
    const added: string[] = [];
    await withTransaction(pool, async (client) => {
      for (const userId of new Set(userIds)) {
        const res = await client.query(
          `insert into conversation_members (conversation_id, user_id, role) values ($1,$2,'member')
           on conflict (conversation_id, user_id) do nothing`,
          [conversationId, userId],
        );
        if (res.rowCount) added.push(userId);
      }
      if (added.length) await client.query('update conversations set updated_at=now() where id=$1', [conversationId]);
    });
    return added;
  },

  async leave(conversationId, userId) {
    return withTransaction(pool, (client) => leaveWith(client, conversationId, userId));
  },

  async appendMessage(input) {
    if (input.client_id) {
      const existing = await findByClientId(pool, input.conversation_id, input.sender_id, input.client_id);
      if (existing) return { message: existing, deduped: true };
    }
    try {
      const message = await withTransaction(pool, async (client) => {
        const seqRes = await client.query<{ last_seq: string }>(
          'update conversations set last_seq=last_seq+1, updated_at=now() where id=$1 returning last_seq',
          [input.conversation_id],
        );
        if (!seqRes.rows[0]) throw new Error(`unknown conversation ${input.conversation_id}`);
        const res = await client.query<SeqRow<Message>>(
          `insert into messages (conversation_id, sender_id, client_id, body, seq) values ($1,$2,$3,$4,$5)
           returning ${MESSAGE_COLUMNS}`,
          [input.conversation_id, input.sender_id, input.client_id, input.body, seqRes.rows[0].last_seq],
        );
        await client.query(
          `update conversation_members set last_read_seq=greatest(last_read_seq, $3)
           where conversation_id=$1 and user_id=$2`,
          [input.conversation_id, input.sender_id, seqRes.rows[0].last_seq],
        );
        return toMessage(res.rows[0]);
      });
      return { message, deduped: false };
    } catch (err) {
      // a concurrent send with the same client id won
      if (input.client_id && isUniqueViolation(err)) {
        const existing = await findByClientId(pool, input.conversation_id, input.sender_id, input.client_id);
        if (existing) return { message: existing, deduped: true };
      }
      throw err;
    }
  },

  async listMessages(conversationId, page) {
    if (page.after !== undefined) {
      const res = await pool.query<SeqRow<Message>>(
        `select ${MESSAGE_COLUMNS} from messages where conversation_id=$1 and seq > $2 order by seq asc limit $3`,
        [conversationId, page.after, page.limit],
      );
      return res.rows.map(toMessage);
    }
    const res = await pool.query<SeqRow<Message>>(
      `select ${MESSAGE_COLUMNS} from messages where conversation_id=$1 order by seq desc limit $2`,
      [conversationId, page.limit],
    );
    return res.rows.map(toMessage).reverse();
  },

  async lastMessage(conversationId) {
    const res = await pool.query<SeqRow<Message>>(
      `select ${MESSAGE_COLUMNS} from messages where conversation_id=$1 order by seq desc limit 1`,
      [conversationId],
    );
    return res.rows[0] ? toMessage(res.rows[0]) : null;
  },

  async unreadCount(conversationId, userId, lastReadSeq) {
    const res = await pool.query<{ c: number }>(
      'select count(*)::int as c from messages where conversation_id=$1 and seq > $2 and sender_id <> $3',
      [conversationId, lastReadSeq, userId],
    );
    return res.rows[0]?.c ?? 0;
  },

  async markRead(conversationId, userId, seq) {
    const res = await pool.query<{ last_read_seq: string }>(
      `update conversation_members m
       set last_read_seq = greatest(m.last_read_seq, least(coalesce($3::bigint, c.last_seq), c.last_seq))
       from conversations c
       where c.id = m.conversation_id and m.conversation_id=$1 and m.user_id=$2
       returning m.last_read_seq`,
      [conversationId, userId, seq ?? null],
    );
    return Number(res.rows[0]?.last_read_seq ?? 0);
  },

  async purgeUser(userId) {
    await withTransaction(pool, async (client) => {
      await client.query(
        `delete from conversations
         where kind='direct' and id in (select conversation_id from conversation_members where user_id=$1)`,
        [userId],
      );
      const groups = await client.query<{ conversation_id: string }>(
        'select conversation_id from conversation_members where user_id=$1',
        [userId],
      );
      for (const row of groups.rows) {
        await leaveWith(client, row.conversation_id, userId);
      }
    });
  },
});
