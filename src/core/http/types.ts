// src/core/http/types.ts

import type { SourceName } from '../result/types';

export interface HttpRequestConfig {
  url: string;
  source: SourceName;
  method?: 'GET';
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean>;
  timeout?: number;
  responseType?: 'json' | 'text';
  signal?: AbortSignal;
  skipRateLimit?: boolean;
}

export type HttpGetConfig = Omit<HttpRequestConfig, 'url' | 'method'>;

export interface HttpResponse<T = unknown> {
  data: T;
  status: number;
  headers: Record<string, string>;
}

/**
 * The slice of the transport adapters depend on
 */
export interface HttpClient {
  get(url: string, config: HttpGetConfig): Promise<HttpResponse<unknown>>;
}

export interface RateLimitConfig {
  qps: number; // Queries per second
  concurrency: number; // Max concurrent requests
}

export interface RetryConfig {
  maxRetries: number;
  baseDelay: number; // milliseconds
  maxDelay: number;
  retryableStatusCodes: number[];
}

export interface HttpConfig {
  timeout?: number;
  userAgent?: string;
  retry: RetryConfig;
}
