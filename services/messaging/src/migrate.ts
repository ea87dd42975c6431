import { getPool, platformTablesSql } from '@huddle/shared';
import { logger } from '@huddle/observability';

const pool = getPool('messaging');

// Schema expected by pg-store.ts.
const sql = `
create extension if not exists "pgcrypto";

create table if not exists conversations (
  id uuid primary key default gen_random_uuid(),
  kind text not null,
  title text,
  direct_key text,
  created_by uuid not null,
  created_at timestamptz not null default now(),
  updated_at timestamptz not null default now(),
  last_seq bigint not null default 0,
  constraint conversations_kind check (kind in ('direct','group')),
  constraint conversations_direct_key check ((kind = 'direct') = (direct_key is not null))
);

create unique index if not exists idx_conversations_direct_key on conversations (direct_key) where direct_key is not null;
create index if not exists idx_conversations_updated_at on conversations (updated_at desc);

create table if not exists conversation_members (
  conversation_id uuid not null references conversations(id) on delete cascade,
  user_id uuid not null,
  role text not null default 'member',
  joined_at timestamptz not null default now(),
  last_read_seq bigint not null default 0,
  primary key (conversation_id, user_id),
  constraint conversation_members_role check (role in ('owner','member'))
);

create index if not exists idx_conversation_members_user on conversation_members (user_id);

create table if not exists messages (
  id uuid primary key default gen_random_uuid(),
  conversation_id uuid not null references conversations(id) on delete cascade,
  sender_id uuid not null,
  client_id text,
  body text not null,
  seq bigint not null,
  created_at timestamptz not null default now(),
  constraint messages_body_length check (char_length(body) between 1 and 4000)
);

create unique index if not exists idx_messages_conversation_seq on messages (conversation_id, seq);
create unique index if not exists idx_messages_client_id
  on messages (conversation_id, sender_id, client_id) where client_id is not null;

${platformTablesSql}
`;

const run = async () => {
  await pool.query(sql);
  logger.info('messaging migrations applied');
  await pool.end();
};

run().catch((err) => {
  logger.error('messaging migrations failed', { err: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
