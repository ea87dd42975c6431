import { getPool, platformTablesSql } from '@huddle/shared';
import { logger } from '@huddle/observability';

const pool = getPool('social');

// Schema expected by pg-store.ts. User ids come from identity; no cross-database foreign keys.
const sql = `
create extension if not exists "pgcrypto";

create table if not exists friend_requests (
  id uuid primary key default gen_random_uuid(),
  sender_id uuid not null,
  recipient_id uuid not null,
  status text not null default 'pending',
  created_at timestamptz not null default now(),
  updated_at timestamptz not null default now(),
  responded_at timestamptz,
  constraint friend_requests_status check (status in ('pending','accepted','declined','cancelled')),
  constraint friend_requests_not_self check (sender_id <> recipient_id)
);

create unique index if not exists idx_friend_requests_pending_pair
  on friend_requests (least(sender_id, recipient_id), greatest(sender_id, recipient_id))
  where status = 'pending';
create index if not exists idx_friend_requests_recipient on friend_requests (recipient_id, status, created_at desc);
create index if not exists idx_friend_requests_sender on friend_requests (sender_id, status, created_at desc);

create table if not exists friendships (
  user_a uuid not null,
  user_b uuid not null,
  created_at timestamptz not null default now(),
  primary key (user_a, user_b),
  constraint friendships_ordered check (user_a < user_b)
);

create index if not exists idx_friendships_user_b on friendships (user_b);

${platformTablesSql}
`;

const run = async () => {
  await pool.query(sql);
  logger.info('social migrations applied');
  await pool.end();
};

run().catch((err) => {
  logger.error('social migrations failed', { err: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
