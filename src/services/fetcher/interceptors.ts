import { randomUUID } from 'node:crypto';
import { performance } from 'node:perf_hooks';

import type {
  AxiosError,
  AxiosResponse,
  InternalAxiosRequestConfig,
} from 'axios';
import { isCancel } from 'axios';

import { config } from '../../config/index.js';

import type { FetchError } from '../../errors/app-error.js';

import { logDebug, logError, logWarn } from '../logger.js';

import {
  createCanceledError,
  createHttpError,
  createNetworkError,
  createRateLimitError,
  createTimeoutError,
} from './errors.js';

interface RequestTiming {
  requestId: string;
  startTime: number;
}

const timings = new WeakMap<InternalAxiosRequestConfig, RequestTiming>();

function takeTiming(
  requestConfig: InternalAxiosRequestConfig | undefined
): { requestId: string | undefined; duration: number } {
  const timing = requestConfig ? timings.get(requestConfig) : undefined;
  if (!timing || !requestConfig) return { requestId: undefined, duration: 0 };
  timings.delete(requestConfig);
  return {
    requestId: timing.requestId,
    duration: Math.round(performance.now() - timing.startTime),
  };
}

function readHeader(response: AxiosResponse, name: string): unknown {
  const value: unknown = response.headers[name];
  return value;
}

export function handleRequest(
  requestConfig: InternalAxiosRequestConfig
): InternalAxiosRequestConfig {
  const requestId = randomUUID().substring(0, 8);
  timings.set(requestConfig, { requestId, startTime: performance.now() });

  logDebug('HTTP Request', {
    requestId,
    method: requestConfig.method?.toUpperCase(),
    url: requestConfig.url,
  });
  return requestConfig;
}

export function handleResponse(response: AxiosResponse): AxiosResponse {
  const { requestId, duration } = takeTiming(response.config);
  const url = response.config.url ?? 'unknown';

  logDebug('HTTP Response', {
    requestId,
    status: response.status,
    url,
    contentType: readHeader(response, 'content-type'),
    duration: `${duration}ms`,
  });

  if (duration > config.fetcher.slowRequestMs) {
    logWarn('Slow HTTP request detected', {
      requestId,
      url,
      duration: `${duration}ms`,
    });
  }
  return response;
}

/**
 * The status check for responses axios resolved. Rate limiting keeps its
 * `Retry-After` hint for the retry policy.
 */
export function assertSuccessStatus(
  response: AxiosResponse,
  url: string
): void {
  const { status, statusText } = response;
  if (status >= 200 && status < 300) return;

  if (status === 429) {
    const error = createRateLimitError(url, readHeader(response, 'retry-after'));
    logWarn('Rate limited by server', {
      url,
      retryAfter: `${String(error.details.retryAfter)}s`,
    });
    throw error;
  }

  logWarn('HTTP Error Response', { url, status, statusText });
  throw createHttpError(url, status, statusText);
}

function mapAxiosError(error: AxiosError): FetchError {
  const url = error.config?.url ?? 'unknown';

  if (
    isCancel(error) ||
    error.name === 'AbortError' ||
    error.name === 'CanceledError'
  ) {
    logDebug('HTTP Request Aborted/Canceled', { url });
    return createCanceledError(url);
  }

  if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
    const timeout = error.config?.timeout ?? 0;
    logError('HTTP Timeout', { url, timeout });
    return createTimeoutError(url, timeout);
  }

  if (error.response) {
    const { status, statusText } = error.response;
    if (status === 429) {
      return createRateLimitError(url, readHeader(error.response, 'retry-after'));
    }
    logError('HTTP Error Response', { url, status, statusText });
    return createHttpError(url, status, statusText);
  }

  logError('HTTP Network Error', { url, code: error.code });
  return createNetworkError(url, error.code);
}

export function handleResponseError(error: AxiosError): Promise<never> {
  takeTiming(error.config);
  return Promise.reject(mapAxiosError(error));
}
