export type ProblemDetails = {
  type: string;
  title: string;
  status: number;
  detail?: string;
  instance?: string;
  correlationId?: string;
};

export type ErrorBody = ProblemDetails & { error: string };

export const createProblemDetails = (
  status: number,
  title: string,
  detail?: string,
  type = 'about:blank',
  correlationId?: string,
): ProblemDetails => ({
  type,
  title,
  status,
  detail,
  correlationId,
});

const TITLES: Record<number, string> = {
  400: 'Bad Request',
  401: 'Unauthorized',
  403: 'Forbidden',
  404: 'Not Found',
  409: 'Conflict',
  429: 'Rate limit exceeded',
  500: 'Internal Server Error',
  503: 'Service Unavailable',
};

export class HttpError extends Error {
  readonly status: number;
  readonly code: string;
  readonly detail?: string;

  constructor(status: number, code: string, detail?: string) {
    super(detail ?? code);
    this.name = 'HttpError';
    this.status = status;
    this.code = code;
    this.detail = detail;
  }

  toBody(correlationId?: string): ErrorBody {
    return {
      error: this.code,
      ...createProblemDetails(this.status, TITLES[this.status] ?? 'Error', this.detail, 'about:blank', correlationId),
    };
  }
}

export class BadRequestError extends HttpError {
  constructor(code = 'invalid_request', detail?: string) {
    super(400, code, detail);
  }
}

export class UnauthorizedError extends HttpError {
  constructor(code = 'unauthorized', detail?: string) {
    super(401, code, detail);
  }
}

export class ForbiddenError extends HttpError {
  constructor(code = 'forbidden', detail?: string) {
    super(403, code, detail);
  }
}

export class NotFoundError extends HttpError {
  constructor(code = 'not_found', detail?: string) {
    super(404, code, detail);
  }
}

export class ConflictError extends HttpError {
  constructor(code = 'conflict', detail?: string) {
    super(409, code, detail);
  }
}

export class RateLimitedError extends HttpError {
  constructor(cooled: boolean) {
    super(429, 'rate_limited', cooled ? 'Cooldown applied' : 'Too many requests');
  }
}

export class ServiceUnavailableError extends HttpError {
  constructor(code = 'unavailable', detail?: string) {
    super(503, code, detail);
  }
}

export const isUniqueViolation = (err: unknown): boolean =>
  typeof err === 'object' && err !== null && 'code' in err && err.code === '23505';
