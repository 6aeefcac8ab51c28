// tests/unit/RetryHandler.test.ts

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AxiosError, AxiosHeaders, type InternalAxiosRequestConfig } from 'axios';
import { RetryHandler, headerValue } from '../../src/core/http/RetryHandler';
import { Logger } from '../../src/observability/Logger';

function httpError(status: number, headers: Record<string, string> = {}): AxiosError {
  const config: InternalAxiosRequestConfig = { headers: new AxiosHeaders() };
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, undefined, {
    data: null,
    status,
    statusText: '',
    headers,
    config,
  });
}

describe('RetryHandler', () => {
  let logger: Logger;
  let handler: RetryHandler;

  beforeEach(() => {
    logger = new Logger({ level: 'error' });
    handler = new RetryHandler(
      { maxRetries: 2, baseDelay: 5, maxDelay: 20, retryableStatusCodes: [429] },
      logger
    );
  });

  it('should return the first successful result', async () => {
    const task = vi.fn().mockResolvedValue('ok');

    await expect(handler.execute(task, 'tmdb')).resolves.toBe('ok');
    expect(task).toHaveBeenCalledTimes(1);
  });

  it('should retry a rate-limited request', async () => {
    const task = vi.fn().mockRejectedValueOnce(httpError(429)).mockResolvedValueOnce('ok');

    await expect(handler.execute(task, 'tmdb')).resolves.toBe('ok');
    expect(task).toHaveBeenCalledTimes(2);
  });

  it('should give up after maxRetries', async () => {
    const error = httpError(429);
    const task = vi.fn().mockRejectedValue(error);

    await expect(handler.execute(task, 'trakt')).rejects.toBe(error);
    expect(task).toHaveBeenCalledTimes(3);
  });

  it('should not retry statuses outside the retryable list', async () => {
    const task = vi.fn().mockRejectedValue(httpError(503));

    await expect(handler.execute(task, 'mdblist')).rejects.toThrow('status code 503');
    expect(task).toHaveBeenCalledTimes(1);
  });

  it('should not retry errors without a response', async () => {
    const task = vi.fn().mockRejectedValue(new Error('socket hang up'));

    await expect(handler.execute(task, 'imdb')).rejects.toThrow('socket hang up');
    expect(task).toHaveBeenCalledTimes(1);
  });

  it('should not retry once the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const task = vi.fn().mockRejectedValue(httpError(429));

    await expect(handler.execute(task, 'trakt', controller.signal)).rejects.toThrow();
    expect(task).toHaveBeenCalledTimes(1);
  });

  it('should stop waiting as soon as the signal is aborted', async () => {
    const patient = new RetryHandler(
      { maxRetries: 2, baseDelay: 5, maxDelay: 10000, retryableStatusCodes: [429] },
      logger
    );
    const controller = new AbortController();
    const task = vi.fn().mockRejectedValue(httpError(429, { 'retry-after': '5' }));
    setTimeout(() => controller.abort(), 20);
    const startedAt = Date.now();

    await expect(patient.execute(task, 'tmdb', controller.signal)).rejects.toMatchObject({
      name: 'AbortError',
    });
    expect(Date.now() - startedAt).toBeLessThan(1000);
    expect(task).toHaveBeenCalledTimes(1);
  });

  it('should honor Retry-After capped at maxDelay', async () => {
    const warn = vi.spyOn(logger, 'warn');
    const task = vi
      .fn()
      .mockRejectedValueOnce(httpError(429, { 'retry-after': '1' }))
      .mockResolvedValueOnce('ok');

    await handler.execute(task, 'trakt');

    expect(warn).toHaveBeenCalledWith('Retrying request', {
      source: 'trakt',
      attempt: 1,
      delay: 20,
      status: 429,
      retryAfter: '1',
    });
  });
});

describe('headerValue', () => {
  it('should match header names without regard to case', () => {
    expect(headerValue({ 'X-Pagination-Page-Count': '4' }, 'x-pagination-page-count')).toBe('4');
  });

  it('should stringify numeric values', () => {
    expect(headerValue({ 'retry-after': 30 }, 'retry-after')).toBe('30');
  });

  it('should return undefined when absent or not an object', () => {
    expect(headerValue({}, 'retry-after')).toBeUndefined();
    expect(headerValue(undefined, 'retry-after')).toBeUndefined();
  });
});
