// src/core/http/RetryHandler.ts

import axios from 'axios';
import { setTimeout as sleep } from 'timers/promises';
import type { RetryConfig } from './types';
import type { Logger } from '../../observability/Logger';

export class RetryHandler {
  constructor(
    private config: RetryConfig,
    private logger: Logger
  ) {}

  /**
   * Retries only on the configured status codes. Timeouts and network
   * failures are never retried here. Aborting `signal` ends a pending wait.
   */
  async execute<T>(task: () => Promise<T>, source: string, signal?: AbortSignal): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await task();
      } catch (error: unknown) {
        const response = axios.isAxiosError(error) ? error.response : undefined;
        const status = response?.status;
        const isRetryable =
          status !== undefined && this.config.retryableStatusCodes.includes(status);

        if (!isRetryable || attempt >= this.config.maxRetries || signal?.aborted) {
          throw error;
        }

        const retryAfter = headerValue(response?.headers, 'retry-after');
        const delay = retryAfter !== undefined ? this.retryAfterDelay(retryAfter) : this.backoffDelay(attempt);

        this.logger.warn('Retrying request', {
          source,
          attempt: attempt + 1,
          delay,
          status,
          retryAfter,
        });

        // Rejects with an AbortError as soon as the signal fires
        await sleep(delay, undefined, { signal });
      }
    }
  }

  private retryAfterDelay(retryAfter: string): number {
    const seconds = parseInt(retryAfter, 10);
    if (!isNaN(seconds)) {
      return Math.min(seconds * 1000, this.config.maxDelay);
    }
    // HTTP date form
    const retryDate = new Date(retryAfter);
    return Math.min(Math.max(0, retryDate.getTime() - Date.now()), this.config.maxDelay);
  }

  private backoffDelay(attempt: number): number {
    // Exponential backoff with jitter
    return Math.min(
      this.config.baseDelay * Math.pow(2, attempt) + Math.random() * 1000,
      this.config.maxDelay
    );
  }
}

export function headerValue(headers: unknown, name: string): string | undefined {
  if (!headers || typeof headers !== 'object') return undefined;
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== name) continue;
    if (typeof value === 'string') return value;
    if (typeof value === 'number') return String(value);
  }
  return undefined;
}
