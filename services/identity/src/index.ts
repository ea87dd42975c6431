import {
  closePools,
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
import { buildIdentityApp } from './app';
import { createMemoryIdentityStore } from './memory-store';
import { createPgIdentityStore } from './pg-store';

const config = readConfig();
const inMemory = config.STORE_BACKEND === 'memory';
const pool = inMemory ? null : getPool('identity');

const app = buildIdentityApp({
  store: pool ? createPgIdentityStore(pool) : createMemoryIdentityStore(),
  events: pool && config.EVENTS_BACKEND === 'kafka' ? createEventSink(pool, TOPICS.identity) : createLogEventSink(TOPICS.identity),
  limiter: createRateLimiter(),
  idempotency: pool ? pgIdempotencyStore(pool) : memoryIdempotencyStore(),
  logger: loggerConfig(),
});

let stopDispatcher: (() => void) | null = null;

const start = async () => {
  initOtel();
  const port = servicePort(4001);
  await app.ready();
  await app.listen({ port, host: '0.0.0.0' });
  if (pool && config.EVENTS_BACKEND === 'kafka') stopDispatcher = startOutboxDispatcher(pool);
  app.log.info(`identity running on ${port} (store: ${config.STORE_BACKEND})`);
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
  app.log.error(err, 'failed to start identity');
  process.exit(1);
});
