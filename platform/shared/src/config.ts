import { z } from 'zod';

const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  NODE_ENV: z.string().default('production'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  DATABASE_URL: z.string().optional(),
  POSTGRES_USER: z.string().default('huddle_local'),
  POSTGRES_PASSWORD: z.string().default('huddle_local_password'),
  POSTGRES_HOST: z.string().default('localhost'),
  POSTGRES_PORT: z.coerce.number().int().positive().default(5433),
  POSTGRES_DB: z.string().default('huddle_local'),

  REDIS_URL: z.string().optional(),
  REDIS_HOST: z.string().default('localhost'),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  REDIS_PASSWORD: z.string().default(''),

  REDPANDA_BROKERS: z.string().default('localhost:9092'),

  ACCESS_TOKEN_SECRET: z.string().min(1).default('access_secret'),
  REFRESH_TOKEN_SECRET: z.string().min(1).default('refresh_secret'),

  STORE_BACKEND: z.enum(['postgres', 'memory']).default('postgres'),
  RATE_LIMIT_BACKEND: z.enum(['redis', 'memory']).default('redis'),
  EVENTS_BACKEND: z.enum(['kafka', 'log']).default('kafka'),

  IDENTITY_URL: z.string().url().default('http://localhost:4001'),
  SOCIAL_URL: z.string().url().default('http://localhost:4002'),
  MESSAGING_URL: z.string().url().default('http://localhost:4003'),

  DM_REQUIRE_FRIENDSHIP: flag.default('true'),
  GATEWAY_BODY_LIMIT: z.coerce.number().int().positive().default(1024 * 1024),
});

export type Config = z.infer<typeof envSchema> & {
  databaseUrl: string;
  redisUrl: string;
  brokers: string[];
};

let cached: Config | null = null;

export const parseConfig = (env: Record<string, string | undefined>): Config => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`invalid configuration: ${issues}`);
  }
  const c = parsed.data;
  return {
    ...c,
    databaseUrl:
      c.DATABASE_URL ??
      `postgresql://${c.POSTGRES_USER}:${c.POSTGRES_PASSWORD}@${c.POSTGRES_HOST}:${c.POSTGRES_PORT}/${c.POSTGRES_DB}`,
    redisUrl: c.REDIS_URL ?? `redis://:${c.REDIS_PASSWORD}@${c.REDIS_HOST}:${c.REDIS_PORT}`,
    brokers: c.REDPANDA_BROKERS.split(',')
      .map((b) => b.trim())
      .filter(Boolean),
  };
};

export const readConfig = (): Config => {
  if (!cached) cached = parseConfig(process.env);
  return cached;
};

export const servicePort = (fallback: number): number => {
  const port = Number(process.env.PORT ?? fallback);
  return Number.isInteger(port) && port > 0 ? port : fallback;
};
