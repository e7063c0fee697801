/**
 * Fetch capability over Node's global fetch
 *
 * No retries, no robots.txt, no rate limiting: hosts that need those wrap
 * or replace this capability.
 */

import { TransportError, describeError, isAbortError, isAnalyzerError, toError } from '../errors';
import type { FetchCapability, FetchOptions, FetchResponse } from '../types';

const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; ContentLens/0.1)';

/** Statuses that mean access was refused rather than the resource failing */
const BLOCKED_STATUSES = new Set([401, 403, 451]);

export interface HttpFetcherOptions {
  userAgent?: string;
  /** Extra request headers */
  headers?: Record<string, string>;
}

export function createHttpFetcher(options: HttpFetcherOptions = {}): FetchCapability {
  const userAgent = options.userAgent ?? DEFAULT_USER_AGENT;

  return async (url: string, { timeoutMs, signal }: FetchOptions): Promise<FetchResponse> => {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    const onAbort = () => controller.abort();
    if (signal?.aborted) controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    const startTime = Date.now();
    try {
      const response = await fetch(url, {
        headers: {
          'User-Agent': userAgent,
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,application/json;q=0.9,*/*;q=0.8',
          ...options.headers,
        },
        signal: controller.signal,
        redirect: 'follow',
      });
      const body = await response.text();

      const headers: Record<string, string> = {};
      response.headers.forEach((value, name) => {
        headers[name.toLowerCase()] = value;
      });

      return { status: response.status, headers, body, elapsedMs: Date.now() - startTime };
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  };
}

/**
 * Call a fetch capability and turn failures into TransportError: rejections,
 * refused access (blocked) and other 4xx/5xx statuses.
 */
export async function fetchResource(
  fetchCapability: FetchCapability,
  url: string,
  options: FetchOptions
): Promise<FetchResponse> {
  let response: FetchResponse;
  try {
    response = await fetchCapability(url, options);
  } catch (error) {
    if (isAnalyzerError(error)) throw error;
    const message = isAbortError(error) ? 'Request aborted' : `Fetch failed: ${describeError(error)}`;
    throw new TransportError(message, { url, cause: toError(error) });
  }

  if (BLOCKED_STATUSES.has(response.status)) {
    throw new TransportError(`Access blocked (HTTP ${response.status})`, {
      url,
      statusCode: response.status,
      blocked: true,
    });
  }
  if (response.status >= 400) {
    throw new TransportError(`HTTP ${response.status}`, { url, statusCode: response.status });
  }

  return response;
}
