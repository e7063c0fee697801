/**
 * In-process stand-in for the network. Maps URLs to canned responses and
 * records every request.
 */

import type { FetchCapability, FetchOptions } from '../../src/types';

export interface StubResponse {
  status?: number;
  body?: string;
  headers?: Record<string, string>;
  /** Milliseconds before the response arrives; abort cuts it short */
  delayMs?: number;
  /** Reject instead of responding */
  error?: Error;
}

export interface StubFetcher {
  fetch: FetchCapability;
  requests: string[];
  set(url: string, response: StubResponse): void;
}

function abortError(): Error {
  const error = new Error('The operation was aborted');
  error.name = 'AbortError';
  return error;
}

/**
 * Unknown URLs answer 404. `elapsedMs` reports the configured delay so
 * timing assertions do not depend on the wall clock.
 */
export function createStubFetcher(routes: Record<string, StubResponse> = {}): StubFetcher {
  const table = new Map(Object.entries(routes));
  const requests: string[] = [];

  const fetch: FetchCapability = (url: string, { signal }: FetchOptions) => {
    requests.push(url);
    const route = table.get(url) ?? { status: 404, body: 'Not found' };

    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(abortError());
        return;
      }

      const settle = () => {
        signal?.removeEventListener('abort', onAbort);
        if (route.error) {
          reject(route.error);
          return;
        }
        resolve({
          status: route.status ?? 200,
          headers: route.headers ?? {},
          body: route.body ?? '',
          elapsedMs: route.delayMs ?? 0,
        });
      };

      const timer = route.delayMs ? setTimeout(settle, route.delayMs) : undefined;
      const onAbort = () => {
        clearTimeout(timer);
        reject(abortError());
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      if (timer === undefined) settle();
    });
  };

  return {
    fetch,
    requests,
    set: (url, response) => {
      table.set(url, response);
    },
  };
}
