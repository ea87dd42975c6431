import { createRateLimiter, readConfig, servicePort } from '@huddle/shared';
import { initOtel, loggerConfig } from '@huddle/observability';
import { buildGatewayApp } from './app';

const config = readConfig();

const app = buildGatewayApp({
  targets: { identity: config.IDENTITY_URL, social: config.SOCIAL_URL, messaging: config.MESSAGING_URL },
  limiter: createRateLimiter(),
  logger: loggerConfig(),
  bodyLimit: config.GATEWAY_BODY_LIMIT,
});

const start = async () => {
  initOtel();
  const port = servicePort(4000);
  await app.ready();
  await app.listen({ port, host: '0.0.0.0' });
  app.log.info(`gateway running on ${port}`);
};

const shutdown = () => {
  app.close().catch((err: unknown) => app.log.error({ err }, 'shutdown failed'));
};

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);

start().catch((err) => {
  app.log.error(err, 'failed to start gateway');
  process.exit(1);
});
