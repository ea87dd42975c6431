import Fastify, { FastifyInstance, FastifyRequest } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { z } from 'zod';
import { bearerToken, JwtPayload, verifyAccess } from './auth';
import { BadRequestError, HttpError, UnauthorizedError } from './errors';
import { ensureCorrelationId } from './correlation';

export type LoggerConfig = {
  level: string;
  transport?: { target: string; options: Record<string, unknown> };
};

export type ServiceAppOptions = {
  title: string;
  logger?: boolean | LoggerConfig;
  docs?: boolean;
  bodyLimit?: number;
};

export const correlationIdOf = (request: FastifyRequest): string =>
  ensureCorrelationId(request.headers['x-correlation-id']);

export const createServiceApp = (options: ServiceAppOptions): FastifyInstance => {
  const app = Fastify({
    logger: options.logger ?? true,
    ...(options.bodyLimit ? { bodyLimit: options.bodyLimit } : {}),
  });

  app.addHook('onRequest', (request, reply, done) => {
    const correlationId = correlationIdOf(request);
    request.headers['x-correlation-id'] = correlationId;
    request.log = request.log.child({ correlationId });
    reply.header('x-correlation-id', correlationId);
    done();
  });

  app.setErrorHandler((error, request, reply) => {
    const correlationId = correlationIdOf(request);
    if (error instanceof HttpError) {
      if (error.status >= 500) request.log.error({ err: error }, error.code);
      return reply.status(error.status).send(error.toBody(correlationId));
    }
    if (error.validation) {
      return reply.status(400).send(new BadRequestError('invalid_request', error.message).toBody(correlationId));
    }
    if (typeof error.statusCode === 'number' && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send(new HttpError(error.statusCode, 'invalid_request', error.message).toBody(correlationId));
    }
    request.log.error({ err: error }, 'unhandled error');
    return reply.status(500).send(new HttpError(500, 'internal_error').toBody(correlationId));
  });

  if (options.docs !== false) {
    app.register(swagger, { openapi: { info: { title: options.title, version: '0.1.0' } } });
    app.register(swaggerUi, { routePrefix: '/docs', uiConfig: { docExpansion: 'list', deepLinking: false } });
  }

  app.get('/healthz', async () => ({ ok: true }));
  app.get('/readyz', async () => ({ ready: true }));

  return app;
};

export const requireAuth = (request: FastifyRequest): JwtPayload => {
  const token = bearerToken(request.headers.authorization);
  const payload = token ? verifyAccess(token) : null;
  if (!payload) throw new UnauthorizedError();
  return payload;
};

export const requireInternal = (request: FastifyRequest): void => {
  if (!request.headers['x-internal-call']) {
    throw new UnauthorizedError('internal_only');
  }
};

export const parseWith = <S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> => {
  const result = schema.safeParse(value ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length ? `${issue.path.join('.')}: ` : '';
    throw new BadRequestError('invalid_request', issue ? `${where}${issue.message}` : undefined);
  }
  return result.data;
};

const headerValue = (value: string | string[] | undefined): string | undefined =>
  Array.isArray(value) ? value[0] : value;

export const deviceIdOf = (request: FastifyRequest): string =>
  headerValue(request.headers['x-device-id']) ?? headerValue(request.headers['x-device-fingerprint']) ?? 'unknown';

export const idempotencyKeyOf = (request: FastifyRequest): string | undefined =>
  headerValue(request.headers['x-idempotency-key']);

export const rateLimitKey = (request: FastifyRequest, service: string, action: string, userId?: string): string => {
  const ip = headerValue(request.headers['x-forwarded-for']) ?? request.ip;
  return `${service}:${action}:${userId ?? 'anon'}:${deviceIdOf(request)}:${ip}`;
};
