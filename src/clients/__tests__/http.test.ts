import { describe, it, expect, afterEach, vi } from 'vitest';
import { z } from 'zod';

import { HttpError, PayloadError } from '../../shared/errors.js';
import { buildUrl, fetchWithRetry, getJson, postJson, type FetchLike } from '../http.js';
import { jsonResponse, stubFetch } from './stub-fetch.js';

const Schema = z.object({ value: z.number() });

describe('fetchWithRetry', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('retries network errors until a response arrives', async () => {
    const fetch = vi
      .fn<FetchLike>()
      .mockRejectedValueOnce(new Error('ECONNRESET'))
      .mockRejectedValueOnce(new Error('ECONNRESET'))
      .mockResolvedValueOnce(jsonResponse({ value: 1 }));

    const res = await fetchWithRetry('http://example.test/a', {}, { fetch, initialBackoffMs: 0 });

    expect(res.status).toBe(200);
    expect(fetch).toHaveBeenCalledTimes(3);
  });

  it('throws the last network error once retries run out', async () => {
    const fetch = vi.fn<FetchLike>().mockRejectedValue(new Error('ECONNREFUSED'));

    await expect(
      fetchWithRetry('http://example.test/a', {}, { fetch, maxRetries: 1, initialBackoffMs: 0 }),
    ).rejects.toThrow('ECONNREFUSED');
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it('does not retry client errors', async () => {
    const fetch = stubFetch({ error: 'bad' }, 400);
    const res = await fetchWithRetry('http://example.test/a', {}, { fetch, initialBackoffMs: 0 });
    expect(res.status).toBe(400);
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('waits at least a second before retrying a server error', async () => {
    vi.useFakeTimers();
    const fetch = vi
      .fn<FetchLike>()
      .mockResolvedValueOnce(jsonResponse({}, 503))
      .mockResolvedValueOnce(jsonResponse({ value: 2 }));

    const pending = fetchWithRetry('http://example.test/a', {}, { fetch, maxRetries: 1, initialBackoffMs: 0 });
    const started = Date.now();
    await vi.runAllTimersAsync();

    const res = await pending;
    expect(Date.now() - started).toBe(1000);
    expect(res.status).toBe(200);
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it('discards the body of a response it retries', async () => {
    vi.useFakeTimers();
    const rejected = jsonResponse({ error: 'busy' }, 429);
    const fetch = vi
      .fn<FetchLike>()
      .mockResolvedValueOnce(rejected)
      .mockResolvedValueOnce(jsonResponse({ value: 3 }));

    const pending = fetchWithRetry('http://example.test/a', {}, { fetch, maxRetries: 1, initialBackoffMs: 0 });
    await vi.runAllTimersAsync();

    expect((await pending).bodyUsed).toBe(false);
    expect(rejected.bodyUsed).toBe(true);
  });

  it('returns the last retryable response when retries run out', async () => {
    vi.useFakeTimers();
    const fetch = stubFetch({}, 503);

    const pending = fetchWithRetry('http://example.test/a', {}, { fetch, maxRetries: 1, initialBackoffMs: 0 });
    await vi.runAllTimersAsync();

    expect((await pending).status).toBe(503);
  });
});

describe('JSON requests', () => {
  it('validates the body against the schema', async () => {
    const fetch = stubFetch({ value: 42 });
    await expect(getJson('http://example.test/a', Schema, { fetch })).resolves.toEqual({ value: 42 });
    expect(fetch.mock.calls[0][1]?.method).toBe('GET');
  });

  it('treats 404 as absence', async () => {
    await expect(getJson('http://example.test/a', Schema, { fetch: stubFetch({}, 404) })).resolves.toBeNull();
  });

  it('raises HttpError for other failures', async () => {
    const error = await getJson('http://example.test/a', Schema, { fetch: stubFetch({}, 401) }).catch(
      (err: unknown) => err,
    );
    expect(error).toBeInstanceOf(HttpError);
    expect(error instanceof HttpError ? error.status : null).toBe(401);
  });

  it('raises PayloadError for a body of the wrong shape', async () => {
    await expect(
      getJson('http://example.test/a', Schema, { fetch: stubFetch({ value: 'nope' }) }),
    ).rejects.toBeInstanceOf(PayloadError);
  });

  it('raises PayloadError for a body that is not JSON', async () => {
    const fetch = vi.fn<FetchLike>(async () => new Response('<html>', { status: 200 }));
    await expect(getJson('http://example.test/a', Schema, { fetch })).rejects.toThrow(
      'Unexpected payload from http://example.test/a: body is not JSON',
    );
  });

  it('posts a JSON body', async () => {
    const fetch = stubFetch({ value: 1 });
    await postJson('http://example.test/a', { q: 'x' }, Schema, { fetch });
    const init = fetch.mock.calls[0][1];
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"q":"x"}');
  });
});

describe('buildUrl', () => {
  it('joins base, path and non-null parameters', () => {
    expect(buildUrl('https://example.test/api', 'items/1', { a: 'x y', b: 2, c: null })).toBe(
      'https://example.test/api/items/1?a=x+y&b=2',
    );
  });
});
