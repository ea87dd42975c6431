import { Pool, PoolClient, PoolConfig } from 'pg';
import { readConfig } from './config';

const pools: Record<string, Pool> = {};

export const getPool = (service: string, config?: PoolConfig): Pool => {
  const existing = pools[service];
  if (existing) return existing;
  const connectionString = config?.connectionString || readConfig().databaseUrl;
  const pool = new Pool({ connectionString, ...config });
  pools[service] = pool;
  return pool;
};

export const closePools = async (): Promise<void> => {
  const all = Object.entries(pools);
  for (const [name, pool] of all) {
    delete pools[name];
    await pool.end();
  }
};

export const withTransaction = async <T>(pool: Pool, action: (client: PoolClient) => Promise<T>): Promise<T> => {
  const client = await pool.connect();
  try {
    await client.query('begin');
    const result = await action(client);
    await client.query('commit');
    return result;
  } catch (err) {
    await client.query('rollback');
    throw err;
  } finally {
    client.release();
  }
};

export type IdempotencyStore = {
  find(key: string): Promise<unknown>;
  save(key: string, responseBody: unknown): Promise<void>;
};

export const pgIdempotencyStore = (pool: Pool): IdempotencyStore => ({
  async find(key) {
    const existing = await pool.query<{ response_body: unknown }>(
      'select response_body from idempotency_keys where idempotency_key=$1',
      [key],
    );
    return existing.rows[0]?.response_body;
  },
  async save(key, responseBody) {
    await pool.query(
      'insert into idempotency_keys (idempotency_key, response_body) values ($1, $2) on conflict (idempotency_key) do nothing',
      [key, JSON.stringify(responseBody)],
    );
  },
});

export const memoryIdempotencyStore = (): IdempotencyStore => {
  const entries = new Map<string, unknown>();
  return {
    async find(key) {
      return entries.get(key);
    },
    async save(key, responseBody) {
      if (!entries.has(key)) entries.set(key, responseBody);
    },
  };
};

// Replays the first stored response for a key. Callers narrow the replayed body with `isReplay`.
export const withIdempotency = async <T>(
  store: IdempotencyStore,
  key: string | undefined,
  isReplay: (body: unknown) => body is T,
  action: () => Promise<T>,
): Promise<T> => {
  if (!key) {
    return action();
  }
  const existing = await store.find(key);
  if (existing !== undefined && isReplay(existing)) {
    return existing;
  }
  const result = await action();
  await store.save(key, result);
  return result;
};

export const recordOutbox = async (pool: Pool, topic: string, eventId: string, payload: unknown): Promise<void> => {
  await pool.query(
    `insert into outbox (id, event_id, topic, payload_json, attempts, next_attempt_at)
     values (gen_random_uuid(), $1, $2, $3, 0, now())`,
    [eventId, topic, JSON.stringify(payload)],
  );
};

type OutboxRow = { id: string; topic: string; payload_json: unknown; attempts: number };

export const dispatchOutbox = async (
  pool: Pool,
  publisher: (topic: string, payload: unknown) => Promise<void>,
): Promise<number> => {
  const rows = await pool.query<OutboxRow>(
    'select id, topic, payload_json, attempts from outbox where next_attempt_at <= now() order by next_attempt_at asc limit 50',
  );
  let delivered = 0;
  for (const row of rows.rows) {
    try {
      await publisher(row.topic, row.payload_json);
      await pool.query('delete from outbox where id=$1', [row.id]);
      delivered += 1;
    } catch (err) {
      const backoffMs = Math.min(5_000 * 2 ** row.attempts, 5 * 60_000);
      const next = new Date(Date.now() + backoffMs);
      await pool.query('update outbox set attempts=attempts+1, last_error=$2, next_attempt_at=$3 where id=$1', [
        row.id,
        err instanceof Error ? err.message : 'publish failed',
        next,
      ]);
    }
  }
  return delivered;
};

// Tables every service schema carries: idempotency replay, outbox, event log.
export const platformTablesSql = `
create table if not exists idempotency_keys (
  idempotency_key text primary key,
  response_body jsonb,
  created_at timestamptz not null default now()
);

create table if not exists outbox (
  id uuid primary key default gen_random_uuid(),
  event_id uuid not null,
  topic text not null,
  payload_json jsonb not null,
  attempts int not null default 0,
  next_attempt_at timestamptz not null default now(),
  last_error text
);

create table if not exists events (
  event_id uuid primary key,
  event_type text not null,
  occurred_at timestamptz not null,
  actor_id uuid,
  correlation_id text,
  idempotency_key text,
  context jsonb,
  payload jsonb,
  created_at timestamptz not null default now()
);
`;
