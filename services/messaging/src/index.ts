import {
  closePools,
  createHttpDirectory,
  createRateLimiter,
  getPool,
  memoryIdempotencyStore,
  pgIdempotencyStore,
  readConfig,
  servicePort,
} from '@huddle/shared';
import {
  createEventSink,
  createLogEventSink,
  disconnectProducer,
  startOutboxDispatcher,
  TOPICS,
} from '@huddle/events';
import { initOtel, loggerConfig } from '@huddle/observability';
import { buildMessagingApp } from './app';
import { createMemoryMessagingStore } from './memory-store';
import { createPgMessagingStore } from './pg-store';

const config = readConfig();
const pool = config.STORE_BACKEND === 'memory' ? null : getPool('messaging');

const app = buildMessagingApp({
  store: pool ? createPgMessagingStore(pool) : createMemoryMessagingStore(),
  directory: createHttpDirectory({ identityUrl: config.IDENTITY_URL, socialUrl: config.SOCIAL_URL }),
  events:
    pool && config.EVENTS_BACKEND === 'kafka' ? createEventSink(pool, TOPICS.messaging) : createLogEventSink(TOPICS.messaging),
  limiter: createRateLimiter(),
  idempotency: pool ? pgIdempotencyStore(pool) : memoryIdempotencyStore(),
  requireFriendship: config.DM_REQUIRE_FRIENDSHIP,
  logger: loggerConfig(),
});

let stopDispatcher: (() => void) | null = null;

const start = async () => {
  initOtel();
  const port = servicePort(4003);
  await app.ready();
  await app.listen({ port, host: '0.0.0.0' });
  if (pool && config.EVENTS_BACKEND === 'kafka') stopDispatcher = startOutboxDispatcher(pool);
  app.log.info(`messaging running on ${port} (store: ${config.STORE_BACKEND})`);
};

const shutdown = () => {
  stopDispatcher?.();
  app
    .close()
    .then(() => disconnectProducer())
    .then(() => closePools())
    .catch((err: unknown) => app.log.error({ err }, 'shutdown failed'));
};

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);

start().catch((err) => {
  app.log.error(err, 'failed to start messaging');
  process.exit(1);
});
