/**
 * JSON over HTTP for the external resolver services.
 * Retries with exponential backoff; 429 and 5xx use a longer floor and an
 * optional Retry-After header is honoured.
 */

import type { z } from 'zod';

import { debug, debugTimedAsync } from '../shared/debug.js';
import { HttpError, PayloadError } from '../shared/errors.js';

const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_INITIAL_MS = 500;
const RATE_LIMIT_BACKOFF_MS = 2000;
const SERVER_ERROR_BACKOFF_MS = 1000;

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface HttpOptions {
  maxRetries?: number;
  initialBackoffMs?: number;
  /** Replaces global fetch; tests pass a stub. */
  fetch?: FetchLike;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Query strings may carry API keys; logs show the path only. */
function displayUrl(url: string): string {
  return url.split('?')[0];
}

function isRetryable(status: number): boolean {
  return status === 429 || (status >= 500 && status < 600);
}

/**
 * Fetch with retries. Returns the last response once it is ok, not
 * retryable, or retries are exhausted; throws the last network error when
 * every attempt failed before a response arrived.
 */
export async function fetchWithRetry(
  url: string,
  init: RequestInit = {},
  options: HttpOptions = {},
): Promise<Response> {
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
  const initialMs = options.initialBackoffMs ?? DEFAULT_INITIAL_MS;
  const doFetch = options.fetch ?? fetch;
  let lastError: Error | null = null;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    let delay = initialMs * Math.pow(2, attempt);
    try {
      const res = await doFetch(url, init);
      if (res.ok || !isRetryable(res.status) || attempt === maxRetries) {
        return res;
      }
      delay = Math.max(delay, res.status === 429 ? RATE_LIMIT_BACKOFF_MS : SERVER_ERROR_BACKOFF_MS);
      const retryAfter = res.headers.get('Retry-After');
      if (retryAfter) {
        const sec = parseInt(retryAfter, 10);
        if (!Number.isNaN(sec)) delay = Math.max(delay, sec * 1000);
      }
      lastError = new HttpError(res.status, displayUrl(url));
      // Unread bodies hold the connection open
      await res.body?.cancel();
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));
    }
    if (attempt < maxRetries) {
      debug('http', 'Retrying request', { url: displayUrl(url), attempt: attempt + 1, delay, error: lastError?.message });
      await sleep(delay);
    }
  }
  throw lastError ?? new Error(`fetch failed: ${displayUrl(url)}`);
}

/**
 * Sends a request and validates the JSON body against `schema`.
 * 404 is expected absence and yields null; any other non-2xx status raises
 * HttpError, and a body that does not match raises PayloadError.
 */
export async function requestJson<S extends z.ZodTypeAny>(
  url: string,
  schema: S,
  init: RequestInit = {},
  options: HttpOptions = {},
): Promise<z.infer<S> | null> {
  const res = await debugTimedAsync('http', `${init.method ?? 'GET'} ${displayUrl(url)}`, () =>
    fetchWithRetry(url, init, options),
  );
  if (res.status === 404) {
    return null;
  }
  if (!res.ok) {
    throw new HttpError(res.status, displayUrl(url));
  }

  let body: unknown;
  try {
    body = await res.json();
  } catch {
    throw new PayloadError(displayUrl(url), 'body is not JSON');
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new PayloadError(displayUrl(url), parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '));
  }
  return parsed.data;
}

export function getJson<S extends z.ZodTypeAny>(
  url: string,
  schema: S,
  options: HttpOptions = {},
): Promise<z.infer<S> | null> {
  return requestJson(url, schema, { method: 'GET', headers: { Accept: 'application/json' } }, options);
}

export function postJson<S extends z.ZodTypeAny>(
  url: string,
  body: unknown,
  schema: S,
  options: HttpOptions = {},
): Promise<z.infer<S> | null> {
  return requestJson(
    url,
    schema,
    {
      method: 'POST',
      headers: { Accept: 'application/json', 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    },
    options,
  );
}

/**
 * Joins a base URL and a path with query parameters. Null parameters are dropped.
 */
export function buildUrl(
  base: string,
  path: string,
  params: Record<string, string | number | null> = {},
): string {
  const url = new URL(path, base.endsWith('/') ? base : `${base}/`);
  for (const [key, value] of Object.entries(params)) {
    if (value !== null) url.searchParams.set(key, String(value));
  }
  return url.toString();
}
