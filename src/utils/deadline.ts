import { AnalysisTimeoutError } from '../errors';

/**
 * Race an operation against a deadline. On expiry the controller is aborted
 * (cancelling the in-flight fetch) and AnalysisTimeoutError is thrown.
 */
export async function withDeadline<T>(
  operation: Promise<T>,
  timeoutMs: number,
  options: { controller?: AbortController; url?: string } = {}
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      options.controller?.abort();
      reject(new AnalysisTimeoutError(`Analysis exceeded ${timeoutMs}ms deadline`, { timeoutMs, url: options.url }));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Throw if the signal has already been aborted
 */
export function checkAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    const error = new Error('Analysis was aborted');
    error.name = 'AbortError';
    throw error;
  }
}
