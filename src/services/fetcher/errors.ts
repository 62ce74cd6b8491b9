import { FetchError } from '../../errors/app-error.js';

function parseRetryAfter(header: unknown): number {
  if (header === undefined || header === null || header === '') return 60;
  const parsed =
    typeof header === 'string' ? Number.parseInt(header, 10) : Number(header);
  return Number.isNaN(parsed) ? 60 : parsed;
}

export function createCanceledError(url: string): FetchError {
  return new FetchError('Request was canceled', url, 499, {
    reason: 'aborted',
  });
}

export function createTimeoutError(url: string, timeoutMs: number): FetchError {
  return new FetchError(`Request timeout after ${timeoutMs}ms`, url, 504, {
    timeout: timeoutMs,
  });
}

export function createRateLimitError(
  url: string,
  headerValue: unknown
): FetchError {
  const retryAfter = parseRetryAfter(headerValue);
  return new FetchError('Too many requests', url, 429, { retryAfter });
}

export function createHttpError(
  url: string,
  status: number,
  statusText: string
): FetchError {
  const suffix = statusText ? `: ${statusText}` : '';
  return new FetchError(`HTTP ${status}${suffix}`, url, status);
}

export function createNetworkError(url: string, code?: string): FetchError {
  return new FetchError(
    `Network error: Could not reach ${url}`,
    url,
    undefined,
    code ? { code } : {}
  );
}

/**
 * Normalizes anything a request can throw into a `FetchError`.
 */
export function mapFetchError(error: unknown, url: string): FetchError {
  if (error instanceof FetchError) return error;
  if (error instanceof Error) {
    if (error.name === 'AbortError' || error.name === 'CanceledError') {
      return createCanceledError(url);
    }
    return new FetchError(`Unexpected error: ${error.message}`, url);
  }
  return new FetchError('Unexpected error: Unknown', url);
}
