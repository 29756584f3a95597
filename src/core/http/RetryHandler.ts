// src/core/http/RetryHandler.ts

import { isAxiosError } from 'axios';
import type { RetryConfig } from './types';
import type { Logger } from '../../observability/Logger';

export type RetryPredicate = (error: unknown) => boolean;

const RETRYABLE_NETWORK_CODES = ['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'ECONNABORTED', 'EAI_AGAIN'];

export class RetryHandler {
  constructor(
    private config: RetryConfig,
    private logger: Logger
  ) {}

  /**
   * Runs `task` up to `maxRetries + 1` times. Only errors accepted by
   * `shouldRetry` are retried; the last error is rethrown once attempts
   * are exhausted.
   */
  async execute<T>(
    task: (attempt: number) => Promise<T>,
    scope: string,
    shouldRetry: RetryPredicate = (error) => this.isRetryableResponse(error)
  ): Promise<T> {
    let lastError: unknown;

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      try {
        return await task(attempt);
      } catch (error: unknown) {
        lastError = error;

        if (!shouldRetry(error) || attempt === this.config.maxRetries) {
          throw error;
        }

        const retryAfter = this.retryAfterMs(error);
        const delay = retryAfter ?? this.backoffDelay(attempt);

        this.logger.warn('Retrying request', {
          scope,
          attempt: attempt + 1,
          delay,
          status: isAxiosError(error) ? error.response?.status : undefined,
          retryAfter: retryAfter !== undefined,
        });

        await new Promise((resolve) => setTimeout(resolve, delay));
      }
    }

    throw lastError;
  }

  /**
   * Default classification: a retryable HTTP status, or a connection
   * failure that never produced a response.
   */
  isRetryableResponse(error: unknown): boolean {
    if (!isAxiosError(error)) {
      return false;
    }
    if (error.response) {
      return this.config.retryableStatusCodes.includes(error.response.status);
    }
    return error.code !== undefined && RETRYABLE_NETWORK_CODES.includes(error.code);
  }

  /**
   * Exponential backoff with jitter, capped at maxDelay
   */
  backoffDelay(attempt: number): number {
    return Math.min(
      this.config.baseDelay * Math.pow(2, attempt) + Math.random() * this.config.baseDelay,
      this.config.maxDelay
    );
  }

  // Retry-After is either seconds or an HTTP date
  private retryAfterMs(error: unknown): number | undefined {
    if (!isAxiosError(error)) {
      return undefined;
    }
    const header: unknown = error.response?.headers?.['retry-after'];
    if (typeof header !== 'string') {
      return undefined;
    }

    const seconds = parseInt(header, 10);
    const delay = !isNaN(seconds)
      ? seconds * 1000
      : Math.max(0, new Date(header).getTime() - Date.now());

    return Number.isNaN(delay) ? undefined : Math.min(delay, this.config.maxDelay);
  }
}
