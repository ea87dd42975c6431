import { getPool, platformTablesSql } from '@huddle/shared';
import { logger } from '@huddle/observability';

const pool = getPool('identity');

// Schema expected by pg-store.ts.
const sql = `
create extension if not exists "pgcrypto";

create table if not exists users (
  id uuid primary key default gen_random_uuid(),
  username text not null,
  password_hash text not null,
  email text,
  full_name text,
  avatar_url text,
  created_at timestamptz not null default now(),
  updated_at timestamptz not null default now(),
  deleted_at timestamptz
);

create unique index if not exists idx_users_username_unique on users (username);
create index if not exists idx_users_deleted_at on users (deleted_at);
create index if not exists idx_users_full_name_lower on users (lower(full_name));

create table if not exists sessions (
  id uuid primary key default gen_random_uuid(),
  user_id uuid references users(id),
  refresh_token_hash text not null,
  device_fingerprint text,
  created_at timestamptz not null default now(),
  last_active_at timestamptz not null default now(),
  revoked_at timestamptz,
  expires_at timestamptz not null
);

create index if not exists idx_sessions_user_active on sessions (user_id) where revoked_at is null;
create index if not exists idx_sessions_expires_at on sessions (expires_at);

${platformTablesSql}
`;

const run = async () => {
  await pool.query(sql);
  logger.info('identity migrations applied');
  await pool.end();
};

run().catch((err) => {
  logger.error('identity migrations failed', { err: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
