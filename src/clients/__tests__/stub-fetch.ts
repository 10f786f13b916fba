import { vi } from 'vitest';

import type { FetchLike } from '../http.js';

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/**
 * A fetch stub that answers every request with `body`, built fresh per call.
 */
export function stubFetch(body: unknown, status = 200) {
  return vi.fn<FetchLike>(async () => jsonResponse(body, status));
}

export function requestedUrl(fetch: ReturnType<typeof stubFetch>, call = 0): URL {
  return new URL(fetch.mock.calls[call][0]);
}
