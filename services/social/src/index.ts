import { closePools, createHttpDirectory, createRateLimiter, getPool, readConfig, servicePort } from '@huddle/shared';
import {
  createEventSink,
  createLogEventSink,
  disconnectProducer,
  startOutboxDispatcher,
  TOPICS,
} from '@huddle/events';
import { initOtel, loggerConfig } from '@huddle/observability';
import { buildSocialApp } from './app';
import { createMemorySocialStore } from './memory-store';
import { createPgSocialStore } from './pg-store';

const config = readConfig();
const pool = config.STORE_BACKEND === 'memory' ? null : getPool('social');

const app = buildSocialApp({
  store: pool ? createPgSocialStore(pool) : createMemorySocialStore(),
  directory: createHttpDirectory({ identityUrl: config.IDENTITY_URL, socialUrl: config.SOCIAL_URL }),
  events: pool && config.EVENTS_BACKEND === 'kafka' ? createEventSink(pool, TOPICS.social) : createLogEventSink(TOPICS.social),
  limiter: createRateLimiter(),
  logger: loggerConfig(),
});

let stopDispatcher: (() => void) | null = null;

const start = async () => {
  initOtel();
  const port = servicePort(4002);
  await app.ready();
  await app.listen({ port, host: '0.0.0.0' });
  if (pool && config.EVENTS_BACKEND === 'kafka') stopDispatcher = startOutboxDispatcher(pool);
  app.log.info(`social running on ${port} (store: ${config.STORE_BACKEND})`);
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
  app.log.error(err, 'failed to start social');
  process.exit(1);
});
