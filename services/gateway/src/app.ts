import { FastifyInstance, FastifyRequest } from 'fastify';
import {
  bearerToken,
  correlationIdOf,
  createServiceApp,
  LoggerConfig,
  NotFoundError,
  RateLimitedError,
  RateLimiter,
  RateLimitResult,
  ServiceUnavailableError,
  UnauthorizedError,
  verifyAccess,
} from '@huddle/shared';

export type GatewayTargets = { identity: string; social: string; messaging: string };

export type GatewayDeps = {
  targets: GatewayTargets;
  limiter: RateLimiter;
  fetch?: typeof fetch;
  now?: () => number;
  logger?: boolean | LoggerConfig;
  docs?: boolean;
  bodyLimit?: number;
};

export const EDGE_RULE = { limit: 600, windowSec: 60 };
const SESSION_TTL_ACTIVE_MS = 5_000;
const SESSION_TTL_INACTIVE_MS = 15_000;

// Hop-by-hop and length headers are recomputed for each leg; the internal marker is only set service to service.
const SKIP_REQUEST_HEADERS = new Set([
  'host',
  'connection',
  'content-length',
  'transfer-encoding',
  'x-internal-call',
]);
const SKIP_RESPONSE_HEADERS = new Set(['connection', 'content-length', 'content-encoding', 'transfer-encoding']);

export const normalizePath = (url: string): string =>
  url
    .split('?')[0]
    .replace(/[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/gi, ':uuid')
    .replace(/\/\d{2,}/g, '/:num')
    .slice(0, 160);

const isPublicPath = (url: string) =>
  url === '/healthz' ||
  url === '/readyz' ||
  url.startsWith('/docs') ||
  url.startsWith('/identity/auth/login') ||
  url.startsWith('/identity/auth/register') ||
  url.startsWith('/identity/auth/refresh');

const isInternalPath = (path: string) => /^\/internal(\/|\?|$)/.test(path);

/** Session check results keyed by session id; expired entries are dropped when read. */
export class SessionCache {
  private readonly entries = new Map<string, { active: boolean; expiresAtMs: number }>();

  constructor(private readonly now: () => number = Date.now) {}

  get size(): number {
    return this.entries.size;
  }

  get(sid: string): boolean | undefined {
    const entry = this.entries.get(sid);
    if (!entry) return undefined;
    if (entry.expiresAtMs <= this.now()) {
      this.entries.delete(sid);
      return undefined;
    }
    return entry.active;
  }

  set(sid: string, active: boolean): void {
    const ttl = active ? SESSION_TTL_ACTIVE_MS : SESSION_TTL_INACTIVE_MS;
    this.entries.set(sid, { active, expiresAtMs: this.now() + ttl });
  }
}

const forwardHeaders = (request: FastifyRequest): Record<string, string> => {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(request.headers)) {
    if (value === undefined || SKIP_REQUEST_HEADERS.has(name)) continue;
    headers[name] = Array.isArray(value) ? value.join(', ') : value;
  }
  return headers;
};

const forwardBody = (request: FastifyRequest): string | Buffer | undefined => {
  if (request.method === 'GET' || request.method === 'HEAD' || request.body === undefined) return undefined;
  if (typeof request.body === 'string' || Buffer.isBuffer(request.body)) return request.body;
  return JSON.stringify(request.body);
};

export const buildGatewayApp = (deps: GatewayDeps): FastifyInstance => {
  const doFetch = deps.fetch ?? fetch;
  const now = deps.now ?? Date.now;
  const app = createServiceApp({ title: 'Gateway', logger: deps.logger, docs: deps.docs, bodyLimit: deps.bodyLimit });
  const sessionCache = new SessionCache(now);

  const isSessionActive = async (sid: string, correlationId: string): Promise<boolean> => {
    const cached = sessionCache.get(sid);
    if (cached !== undefined) return cached;
    try {
      const res = await doFetch(`${deps.targets.identity}/internal/session/active/${encodeURIComponent(sid)}`, {
        headers: { 'x-internal-call': 'true', 'x-correlation-id': correlationId },
      });
      if (!res.ok) return true;
      const json: unknown = await res.json();
      const active = typeof json === 'object' && json !== null && 'active' in json && json.active === true;
      sessionCache.set(sid, active);
      return active;
    } catch (err) {
      // identity down: services still verify the token itself
      app.log.warn({ err }, 'session check unavailable');
      return true;
    }
  };

  // Tokens carrying a session id must belong to a live session.
  app.addHook('preHandler', async (request) => {
    if (isPublicPath(request.url)) return;
    const token = bearerToken(request.headers.authorization);
    const payload = token ? verifyAccess(token) : null;
    if (!payload || !payload.sid) return;
    if (!(await isSessionActive(payload.sid, correlationIdOf(request)))) {
      throw new UnauthorizedError('session_revoked');
    }
  });

  app.addHook('preHandler', async (request, reply) => {
    const ip = request.headers['x-forwarded-for'] ?? request.ip;
    const key = `edge:${String(ip)}:${request.method}:${normalizePath(request.url)}`;
    let result: RateLimitResult;
    try {
      result = await deps.limiter.check(key, EDGE_RULE);
    } catch (err) {
      request.log.warn({ err }, 'edge rate limiter unavailable');
      reply.header('x-rate-limit', 'skip');
      return;
    }
    reply.header('x-rate-limit', result.allowed ? 'ok' : 'blocked');
    if (!result.allowed) throw new RateLimitedError(result.cooled);
  });

  const registerProxy = (prefix: string, target: string) => {
    app.all(`${prefix}/*`, async (request, reply) => {
      const path = request.url.slice(prefix.length);
      if (isInternalPath(path)) throw new NotFoundError();
      let res: Response;
      try {
        res = await doFetch(`${target}${path}`, {
          method: request.method,
          headers: forwardHeaders(request),
          body: forwardBody(request),
        });
      } catch (err) {
        request.log.error({ err, prefix }, 'upstream unreachable');
        throw new ServiceUnavailableError('unavailable', `${prefix.slice(1)} unreachable`);
      }
      if (res.status >= 500) request.log.warn({ prefix, status: res.status }, 'upstream error');
      reply.status(res.status);
      res.headers.forEach((value, name) => {
        if (!SKIP_RESPONSE_HEADERS.has(name.toLowerCase())) reply.header(name, value);
      });
      return reply.send(Buffer.from(await res.arrayBuffer()));
    });
  };

  registerProxy('/identity', deps.targets.identity);
  registerProxy('/social', deps.targets.social);
  registerProxy('/messaging', deps.targets.messaging);

  return app;
};
