import { apiUrl } from '../config/api';
import { ApiError, isApiErrorKind, kindForStatus } from '../errors/error-types';
import { logger } from '../lib/logger';
import { isRecord } from './validation';

const log = logger.scope('api');

/**
 * Explicit per-call connection state. Passed in by the caller (usually from
 * `AppStateProvider`) rather than read from module globals.
 */
export interface ApiContext {
  baseUrl: string;
  token?: string | null;
}

type Method = 'GET' | 'POST' | 'PUT' | 'DELETE';

interface RequestOptions {
  method?: Method;
  /** JSON body, sent as-is (callers build snake_case payloads) */
  json?: unknown;
  form?: FormData;
}

export interface BinaryResponse {
  bytes: Uint8Array;
  contentType: string;
  filename: string | null;
  headers: Headers;
}

/**
 * Turn a non-ok response into a tagged ApiError. Prefers the structured
 * `{ error: { kind, message } }` body; falls back to the status code.
 */
export async function errorFromResponse(res: Response): Promise<ApiError> {
  const raw = await res.text().catch(() => '');
  let parsed: unknown = null;
  try {
    parsed = raw ? JSON.parse(raw) : null;
  } catch {
    parsed = null;
  }

  if (isRecord(parsed) && isRecord(parsed.error) && isApiErrorKind(parsed.error.kind)) {
    const message = typeof parsed.error.message === 'string' ? parsed.error.message : raw;
    return new ApiError(parsed.error.kind, message, res.status);
  }
  // FastAPI-style `{ detail }` bodies from older deployments
  if (isRecord(parsed) && typeof parsed.detail === 'string') {
    return new ApiError(kindForStatus(res.status), parsed.detail, res.status);
  }
  return new ApiError(kindForStatus(res.status), raw || `Request failed with status ${res.status}`, res.status);
}

async function send(ctx: ApiContext, path: string, opts: RequestOptions = {}): Promise<Response> {
  const method = opts.method || 'GET';
  const headers: Record<string, string> = {};
  if (ctx.token) headers.Authorization = `Bearer ${ctx.token}`;

  let body: string | FormData | undefined;
  if (opts.json !== undefined) {
    headers['Content-Type'] = 'application/json';
    body = JSON.stringify(opts.json);
  } else if (opts.form) {
    body = opts.form;
  }

  const url = apiUrl(ctx.baseUrl, path);
  let res: Response;
  try {
    res = await fetch(url, { method, headers, body });
  } catch (e) {
    log.warn(`${method} ${path} failed`, e);
    throw new ApiError('network', e instanceof Error ? e.message : String(e), 0, e instanceof Error ? e : undefined);
  }

  if (!res.ok) {
    const error = await errorFromResponse(res);
    log.warn(`${method} ${path} non-ok`, res.status, error.kind, error.message);
    throw error;
  }
  log.debug(`${method} ${path}`, res.status);
  return res;
}

/**
 * Send a request and return the decoded JSON body (`null` for an empty body).
 */
export async function requestJson(ctx: ApiContext, path: string, opts?: RequestOptions): Promise<unknown> {
  const res = await send(ctx, path, opts);
  const raw = await res.text();
  if (!raw) return null;
  try {
    return JSON.parse(raw);
  } catch (e) {
    throw new ApiError('invalid_response', `Malformed JSON from ${path}`, res.status, e instanceof Error ? e : undefined);
  }
}

export async function requestBinary(ctx: ApiContext, path: string, opts?: RequestOptions): Promise<BinaryResponse> {
  const res = await send(ctx, path, opts);
  const bytes = new Uint8Array(await res.arrayBuffer());
  return {
    bytes,
    contentType: res.headers.get('Content-Type') || 'application/octet-stream',
    filename: filenameFromDisposition(res.headers.get('Content-Disposition')),
    headers: res.headers,
  };
}

export function filenameFromDisposition(header: string | null): string | null {
  if (!header) return null;
  const encoded = /filename\*=UTF-8''([^;]+)/i.exec(header);
  if (encoded) return decodeURIComponent(encoded[1]);
  const plain = /filename="?([^";]+)"?/i.exec(header);
  return plain ? plain[1] : null;
}

/**
 * Validate a payload with a schema parser, raising `invalid_response` when it does not match.
 */
export function expectPayload<T>(value: T | null, what: string): T {
  if (value === null) {
    throw new ApiError('invalid_response', `Unexpected ${what} payload from server`);
  }
  return value;
}

export function fileBlob(bytes: Uint8Array, contentType?: string): Blob {
  return new Blob([new Uint8Array(bytes)], { type: contentType || 'application/octet-stream' });
}
