/**
 * Error Type Definitions
 */

/**
 * Base application error
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public cause?: Error
  ) {
    super(message);
    this.name = 'AppError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AppError);
    }
  }
}

export const API_ERROR_KINDS = [
  'validation',
  'unauthorized',
  'not_found',
  'no_active_session',
  'active_session_exists',
  'rate_limited',
  'network',
  'invalid_response',
  'server',
] as const;

/**
 * Tagged failure kinds shared by the backend's error body and the client.
 * `network` and `invalid_response` are produced client-side only.
 */
export type ApiErrorKind = (typeof API_ERROR_KINDS)[number];

export function isApiErrorKind(value: unknown): value is ApiErrorKind {
  return typeof value === 'string' && API_ERROR_KINDS.some((kind) => kind === value);
}

const STATUS_BY_KIND: Record<ApiErrorKind, number> = {
  validation: 400,
  unauthorized: 401,
  not_found: 404,
  no_active_session: 404,
  active_session_exists: 409,
  rate_limited: 429,
  network: 0,
  invalid_response: 502,
  server: 500,
};

export function statusForKind(kind: ApiErrorKind): number {
  return STATUS_BY_KIND[kind];
}

/**
 * Fallback when a response carries no structured error body.
 */
export function kindForStatus(status: number): ApiErrorKind {
  switch (status) {
    case 400:
    case 422:
      return 'validation';
    case 401:
    case 403:
      return 'unauthorized';
    case 404:
      return 'not_found';
    case 409:
      return 'active_session_exists';
    case 429:
      return 'rate_limited';
    default:
      return 'server';
  }
}

/**
 * Failure of a backend call (or of the backend operation itself, server-side).
 */
export class ApiError extends AppError {
  constructor(
    public kind: ApiErrorKind,
    message: string,
    status: number = statusForKind(kind),
    cause?: Error
  ) {
    super(message, kind.toUpperCase(), status, cause);
    this.name = 'ApiError';
  }

  get status(): number {
    return this.statusCode;
  }
}

export function isApiError(error: unknown, kind?: ApiErrorKind): error is ApiError {
  return error instanceof ApiError && (kind === undefined || error.kind === kind);
}
