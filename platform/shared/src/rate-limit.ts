import { createClient } from 'redis';
import { readConfig } from './config';
import { RateLimitedError } from './errors';

export type RateLimitRule = {
  limit: number;
  windowSec: number;
  cooldownSec?: number;
  cooldownThreshold?: number;
};

export type RateLimitResult = { allowed: boolean; cooled: boolean };

export interface RateLimiter {
  check(key: string, rule: RateLimitRule): Promise<RateLimitResult>;
}

const cooldownKey = (key: string) => `rl:cooldown:${key}`;
const bucketKey = (key: string, windowSec: number, nowMs: number) =>
  `${key}:${Math.floor(Math.floor(nowMs / 1000) / windowSec)}`;

type RedisClient = ReturnType<typeof createClient>;

export const createRedisRateLimiter = (url: string = readConfig().redisUrl): RateLimiter => {
  let client: RedisClient | null = null;
  const getRedis = async () => {
    if (!client) {
      const next = createClient({ url });
      await next.connect();
      client = next;
    }
    return client;
  };
  return {
    async check(key, rule) {
      const redis = await getRedis();
      const isCooling = await redis.exists(cooldownKey(key));
      if (isCooling) return { allowed: false, cooled: true };
      const bucket = bucketKey(key, rule.windowSec, Date.now());
      const count = await redis.incr(bucket);
      if (count === 1) {
        await redis.expire(bucket, rule.windowSec);
      }
      if (count > rule.limit) {
        if (rule.cooldownSec && rule.cooldownThreshold && count >= rule.cooldownThreshold) {
          await redis.setEx(cooldownKey(key), rule.cooldownSec, '1');
        }
        return { allowed: false, cooled: false };
      }
      return { allowed: true, cooled: false };
    },
  };
};

// Same fixed-window semantics as the redis limiter, for single-process runs and tests.
export const createMemoryRateLimiter = (now: () => number = Date.now): RateLimiter => {
  const counts = new Map<string, { count: number; expiresAtMs: number }>();
  const cooldowns = new Map<string, number>();
  return {
    async check(key, rule) {
      const nowMs = now();
      const coolUntil = cooldowns.get(key);
      if (coolUntil !== undefined) {
        if (coolUntil > nowMs) return { allowed: false, cooled: true };
        cooldowns.delete(key);
      }
      const bucket = bucketKey(key, rule.windowSec, nowMs);
      const entry = counts.get(bucket);
      const count = entry && entry.expiresAtMs > nowMs ? entry.count + 1 : 1;
      counts.set(bucket, { count, expiresAtMs: entry?.expiresAtMs ?? nowMs + rule.windowSec * 1000 });
      if (count > rule.limit) {
        if (rule.cooldownSec && rule.cooldownThreshold && count >= rule.cooldownThreshold) {
          cooldowns.set(key, nowMs + rule.cooldownSec * 1000);
        }
        return { allowed: false, cooled: false };
      }
      return { allowed: true, cooled: false };
    },
  };
};

export const createRateLimiter = (): RateLimiter =>
  readConfig().RATE_LIMIT_BACKEND === 'memory' ? createMemoryRateLimiter() : createRedisRateLimiter();

export const enforceRateLimit = async (limiter: RateLimiter, key: string, rule: RateLimitRule): Promise<void> => {
  const result = await limiter.check(key, rule);
  if (!result.allowed) {
    throw new RateLimitedError(result.cooled);
  }
};
