import { setTimeout } from 'node:timers/promises';

import { RETRY } from '../../config/constants.js';

import { FetchError } from '../../errors/app-error.js';

import { logDebug, logWarn } from '../logger.js';

const MAX_RATE_LIMIT_WAIT_MS = 30000;

type AttemptResult<T> = { done: true; value: T } | { done: false; error: Error };

function readNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value)
    ? value
    : undefined;
}

/**
 * Retries an operation with exponential backoff and jitter. Aborts and
 * client errors fail at once; 429 waits for the server's `Retry-After`.
 */
export class RetryPolicy {
  constructor(
    private readonly maxRetries: number,
    private readonly url: string,
    private readonly baseDelayMs: number = RETRY.BASE_DELAY_MS
  ) {}

  async execute<T>(
    operation: () => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> {
    let lastError: Error = new Error(`Failed to fetch ${this.url}`);
    const retries = this.normalizeRetries();

    for (let attempt = 1; attempt <= retries; attempt++) {
      const result = await this.runAttempt(operation, attempt, retries, signal);
      if (result.done) return result.value;
      lastError = result.error;
    }

    throw lastError;
  }

  private async runAttempt<T>(
    operation: () => Promise<T>,
    attempt: number,
    retries: number,
    signal?: AbortSignal
  ): Promise<AttemptResult<T>> {
    if (signal?.aborted) {
      throw new FetchError('Request was aborted before execution', this.url);
    }

    try {
      const value = await operation();
      return { done: true, value };
    } catch (error) {
      const normalizedError =
        error instanceof Error ? error : new Error(String(error));
      if (!this.shouldRetry(attempt, retries, normalizedError)) {
        throw normalizedError;
      }
      await this.wait(attempt, normalizedError, signal);
      return { done: false, error: normalizedError };
    }
  }

  private shouldRetry(
    attempt: number,
    maxRetries: number,
    error: Error
  ): boolean {
    if (attempt >= maxRetries) return false;
    if (!(error instanceof FetchError)) return true;
    if (error.details.reason === 'aborted') return false;
    if (error.httpStatus === 429) return true;
    return !this.isClientError(error);
  }

  private isClientError(error: FetchError): boolean {
    const status = error.httpStatus;
    return status !== undefined && status >= 400 && status < 500;
  }

  private async wait(
    attempt: number,
    error: Error,
    signal?: AbortSignal
  ): Promise<void> {
    const delay = this.calculateDelay(attempt, error);

    if (error instanceof FetchError && error.httpStatus === 429) {
      logWarn('Rate limited, waiting before retry', {
        url: this.url,
        attempt,
        waitTime: `${delay}ms`,
      });
    } else {
      logDebug('Retrying request', {
        url: this.url,
        attempt,
        delay: `${delay}ms`,
      });
    }

    await this.sleep(delay, signal);
  }

  private calculateDelay(attempt: number, error: Error): number {
    if (error instanceof FetchError && error.httpStatus === 429) {
      const retryAfter = readNumber(error.details.retryAfter) ?? 60;
      return Math.min(retryAfter * 1000, MAX_RATE_LIMIT_WAIT_MS);
    }

    const exponentialDelay = Math.min(
      this.baseDelayMs * Math.pow(2, attempt - 1),
      RETRY.MAX_DELAY_MS
    );
    const jitter =
      exponentialDelay * RETRY.JITTER_FACTOR * (Math.random() * 2 - 1);
    return Math.max(0, Math.round(exponentialDelay + jitter));
  }

  private normalizeRetries(): number {
    return Math.min(Math.max(1, this.maxRetries), 10);
  }

  private async sleep(delay: number, signal?: AbortSignal): Promise<void> {
    try {
      await setTimeout(delay, undefined, { signal });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new FetchError(
          'Request was aborted during retry wait',
          this.url,
          499,
          { reason: 'aborted' }
        );
      }
      throw error;
    }
  }
}
