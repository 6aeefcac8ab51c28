// src/core/http/HttpCore.ts

import axios, { AxiosInstance } from 'axios';
import * as http from 'http';
import * as https from 'https';
import PQueue from 'p-queue';
import type {
  HttpClient,
  HttpConfig,
  HttpGetConfig,
  HttpRequestConfig,
  HttpResponse,
  RateLimitConfig,
} from './types';
import { SOURCE_NAMES, type SourceName } from '../result/types';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import { RetryHandler, headerValue } from './RetryHandler';
import {
  ApiClientError,
  ApiServerError,
  FetchCancelledError,
  NetworkTimeoutError,
  NetworkError,
  RateLimitError,
} from '../../utils/errors';
import { withHttpSpan } from '../../observability/tracing';

export const DEFAULT_USER_AGENT = 'smartlist-external-sources/1.0';
const DEFAULT_TIMEOUT_MS = 30000;

export class HttpCore implements HttpClient {
  private axiosInstance: AxiosInstance;
  private rateLimiters: Map<SourceName, PQueue> = new Map();
  private retryHandler: RetryHandler;

  constructor(
    private config: HttpConfig,
    private rateLimits: Partial<Record<SourceName, RateLimitConfig>>,
    private metrics: MetricsCollector,
    private logger: Logger
  ) {
    this.retryHandler = new RetryHandler(config.retry, logger);

    this.axiosInstance = axios.create({
      timeout: config.timeout ?? DEFAULT_TIMEOUT_MS,
      httpAgent: new http.Agent({ keepAlive: true }),
      httpsAgent: new https.Agent({ keepAlive: true }),
    });

    this.initializeRateLimiters();
  }

  async get<T = unknown>(url: string, config: HttpGetConfig): Promise<HttpResponse<T>> {
    return this.request<T>({ ...config, url, method: 'GET' });
  }

  async request<T = unknown>(config: HttpRequestConfig): Promise<HttpResponse<T>> {
    const { source } = config;
    const method = config.method ?? 'GET';
    const requestId = this.generateRequestId();

    if (config.signal?.aborted) {
      throw new FetchCancelledError('Request cancelled before sending', { source, url: config.url });
    }

    this.metrics.incrementCounter('http_requests_total', {
      source,
      method,
      status: 'initiated',
    });

    this.logger.debug('HTTP request', {
      requestId,
      source,
      url: config.url,
      method,
      query: config.query,
      headerKeys: Object.keys(config.headers ?? {}),
    });

    const headers: Record<string, string> = {
      'X-Request-ID': requestId,
      'User-Agent': this.config.userAgent ?? DEFAULT_USER_AGENT,
      'Accept-Encoding': 'gzip, deflate',
      ...config.headers,
    };

    const execute = async (): Promise<HttpResponse<T>> => {
      return withHttpSpan(method, config.url, async () => {
        const startTime = Date.now();

        try {
          const axiosResponse = await this.retryHandler.execute(
            () =>
              this.axiosInstance.request<T>({
                url: config.url,
                method,
                headers,
                params: config.query,
                timeout: config.timeout,
                responseType: config.responseType ?? 'json',
                signal: config.signal,
                validateStatus: (status) => status >= 200 && status < 300,
              }),
            source,
            config.signal
          );

          this.metrics.incrementCounter('http_requests_total', {
            source,
            method,
            status: axiosResponse.status.toString(),
          });
          this.metrics.recordLatency('http_request_duration', Date.now() - startTime, {
            source,
            status: axiosResponse.status,
          });

          return {
            data: axiosResponse.data,
            status: axiosResponse.status,
            headers: this.toHeaderRecord(axiosResponse.headers),
          };
        } catch (error: unknown) {
          const status = axios.isAxiosError(error) ? error.response?.status : undefined;
          const statusLabel = status?.toString() ?? 'error';

          this.metrics.incrementCounter('http_requests_total', {
            source,
            method,
            status: statusLabel,
          });
          this.metrics.incrementCounter('http_errors', { source, status: statusLabel });

          throw this.transformError(error, source, config);
        }
      });
    };

    return this.runThroughRateLimiter(config, execute);
  }

  private async runThroughRateLimiter<T>(
    config: HttpRequestConfig,
    task: () => Promise<T>
  ): Promise<T> {
    const { source, signal } = config;
    const queue = this.rateLimiters.get(source);

    if (!queue || config.skipRateLimit) {
      return task();
    }

    const wrappedTask = async () => {
      try {
        return await task();
      } finally {
        this.metrics.recordGauge('rate_limit_queue_size', queue.size, { source });
      }
    };

    this.metrics.recordGauge('rate_limit_queue_size', queue.size + 1, { source });

    try {
      // Queued requests whose signal has fired are never sent
      return await queue.add<T>(wrappedTask, { throwOnTimeout: true, signal });
    } catch (error: unknown) {
      if (signal?.aborted && !(error instanceof FetchCancelledError)) {
        throw new FetchCancelledError('Request cancelled while queued', { source, url: config.url });
      }
      throw error;
    }
  }

  private initializeRateLimiters(): void {
    for (const source of SOURCE_NAMES) {
      const config = this.rateLimits[source];
      if (!config) continue;

      let intervalCap: number;
      let interval: number;

      if (config.qps >= 1) {
        intervalCap = Math.floor(config.qps);
        interval = 1000;
      } else {
        // e.g. 0.5 QPS = 1 request per 2000ms
        intervalCap = 1;
        interval = Math.floor(1000 / config.qps);
      }

      this.rateLimiters.set(
        source,
        new PQueue({
          intervalCap,
          interval,
          concurrency: config.concurrency,
        })
      );

      this.logger.debug('Rate limiter initialized', {
        source,
        originalQps: config.qps,
        intervalCap,
        interval,
        concurrency: config.concurrency,
      });
    }
  }

  private generateRequestId(): string {
    return `req_${Date.now()}_${Math.random().toString(36).substring(7)}`;
  }

  private toHeaderRecord(headers: unknown): Record<string, string> {
    const record: Record<string, string> = {};
    if (!headers || typeof headers !== 'object') return record;
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === 'string') {
        record[key.toLowerCase()] = value;
      }
    }
    return record;
  }

  private transformError(error: unknown, source: SourceName, config: HttpRequestConfig): Error {
    if (axios.isCancel(error) || config.signal?.aborted) {
      return new FetchCancelledError('Request cancelled', { source, url: config.url });
    }

    if (!axios.isAxiosError(error)) {
      return error instanceof Error ? error : new NetworkError(String(error), { source });
    }

    const response = error.response;
    if (response) {
      const status = response.status;

      this.logger.debug('HTTP error response', {
        source,
        status,
        statusText: response.statusText,
        url: config.url,
      });

      if (status === 429) {
        const retryAfter = headerValue(response.headers, 'retry-after');
        const seconds = retryAfter !== undefined ? parseInt(retryAfter, 10) : NaN;
        return new RateLimitError(
          `Rate limited by ${source}`,
          isNaN(seconds) ? undefined : seconds,
          { source, url: config.url }
        );
      }
      if (status >= 500) {
        return new ApiServerError(`Server error: ${status}`, { source, status, url: config.url });
      }
      return new ApiClientError(`Client error: ${status}`, { source, status, url: config.url });
    }

    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new NetworkTimeoutError('Request timeout', { source, url: config.url });
    }
    return new NetworkError(`Network error: ${error.message}`, { source, url: config.url });
  }
}
