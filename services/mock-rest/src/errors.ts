import type { FastifyReply } from 'fastify';

export interface ErrorBody {
  error: {
    code: string;
    message: string;
    detail?: string;
  };
}

/**
 * Base class for every failure that maps to a client-visible status code.
 * Anything that is not an `ApiError` is reported as a sanitized 500.
 */
export class ApiError extends Error {
  constructor(
    readonly statusCode: number,
    readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }

  get headers(): Record<string, string> {
    return {};
  }

  toBody(): ErrorBody {
    return { error: { code: this.code, message: this.message } };
  }
}

export class ValidationError extends ApiError {
  constructor(message: string, code = 'validation_error') {
    super(400, code, message);
  }
}

export class UnauthorizedError extends ApiError {
  constructor(code: string, message: string) {
    super(401, code, message);
  }

  override get headers(): Record<string, string> {
    return { 'WWW-Authenticate': 'Bearer' };
  }
}

export class NotFoundError extends ApiError {
  constructor(message = 'Resource not found', code = 'not_found') {
    super(404, code, message);
  }
}

export class MethodNotAllowedError extends ApiError {
  constructor(
    readonly allow: readonly string[],
    method: string,
  ) {
    super(405, 'method_not_allowed', `Method ${method} is not allowed on this resource`);
  }

  override get headers(): Record<string, string> {
    return { Allow: this.allow.join(', ') };
  }
}

export class PayloadTooLargeError extends ApiError {
  constructor(message = 'Request entity too large') {
    super(413, 'payload_too_large', message);
  }
}

export class UnsupportedMediaTypeError extends ApiError {
  constructor(message: string) {
    super(415, 'unsupported_media_type', message);
  }
}

// Fastify client errors (body parsing, limits) carry a statusCode and an FST_ code
interface FrameworkError {
  statusCode?: number;
  code?: string;
  message: string;
}

function isFrameworkError(err: unknown): err is FrameworkError {
  return err instanceof Error && 'statusCode' in err && typeof err.statusCode === 'number';
}

/** Maps any thrown value to an `ApiError`, or `null` when it is an internal failure. */
export function toApiError(err: unknown): ApiError | null {
  if (err instanceof ApiError) return err;
  if (!isFrameworkError(err)) return null;

  const status = err.statusCode ?? 500;
  if (status >= 500) return null;

  if (err instanceof SyntaxError || err.code === 'FST_ERR_CTP_EMPTY_JSON_BODY') {
    return new ValidationError('Invalid JSON format', 'invalid_json');
  }
  if (status === 413) return new PayloadTooLargeError();
  if (status === 415) return new UnsupportedMediaTypeError(err.message);
  return new ApiError(status, 'bad_request', err.message);
}

export function internalErrorBody(err: unknown, exposeDetail: boolean): ErrorBody {
  const body: ErrorBody = { error: { code: 'internal_error', message: 'Internal server error' } };
  if (exposeDetail) {
    body.error.detail = err instanceof Error ? err.message : String(err);
  }
  return body;
}

export function sendApiError(reply: FastifyReply, err: ApiError) {
  return reply.code(err.statusCode).headers(err.headers).send(err.toBody());
}
