// tests/unit/ImdbListAdapter.test.ts

import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import {
  BROWSER_USER_AGENT,
  ImdbListAdapter,
  extractTitleIds,
} from '../../src/adapters/imdb/ImdbListAdapter';
import type { HttpClient, HttpResponse } from '../../src/core/http/types';
import { Logger } from '../../src/observability/Logger';
import {
  ApiClientError,
  FetchCancelledError,
  MalformedResponseError,
  UnsupportedListUrlError,
} from '../../src/utils/errors';

const LIST_HTML = `
  <ul>
    <li><a href="/title/tt0000101/?ref_=ls_t_1">First</a></li>
    <li><a href="/title/tt0000202/?ref_=ls_t_2">Second</a></li>
    <li><a href="/title/tt0000101/">First again</a></li>
    <li><a href="/title/tt12345678/">Third</a></li>
    <li><a href="/title/tt123/">Too short</a></li>
  </ul>
`;

function html(body: unknown): HttpResponse<unknown> {
  return { data: body, status: 200, headers: { 'content-type': 'text/html' } };
}

describe('ImdbListAdapter', () => {
  let get: Mock<HttpClient['get']>;
  let adapter: ImdbListAdapter;

  beforeEach(() => {
    get = vi.fn<HttpClient['get']>();
    adapter = new ImdbListAdapter({ http: { get }, logger: new Logger({ level: 'error' }) });
  });

  it('should handle imdb.com hosts', () => {
    expect(adapter.canHandle('https://www.imdb.com/list/ls000000001/')).toBe(true);
    expect(adapter.canHandle('https://m.imdb.com/chart/top')).toBe(true);
    expect(adapter.canHandle('https://www.themoviedb.org/list/1')).toBe(false);
  });

  it('should collect distinct title IDs with dense positions', async () => {
    get.mockResolvedValueOnce(html(LIST_HTML));

    const result = await adapter.fetchList('https://www.imdb.com/list/ls000000001/');

    expect([...result.imdbIds]).toEqual([
      ['tt0000101', 0],
      ['tt0000202', 1],
      ['tt12345678', 2],
    ]);
    expect(result.totalItems).toBe(3);
    expect(result.tmdbIds.size).toBe(0);
    expect(result.tvdbIds.size).toBe(0);
  });

  it('should request the page once with browser headers and a trailing slash', async () => {
    get.mockResolvedValueOnce(html(''));

    await adapter.fetchList('https://www.imdb.com/chart/top');

    expect(get).toHaveBeenCalledTimes(1);
    expect(get).toHaveBeenCalledWith('https://www.imdb.com/chart/top/', {
      source: 'imdb',
      headers: {
        'User-Agent': BROWSER_USER_AGENT,
        'Accept-Language': 'en-US,en;q=0.9',
        Accept: 'text/html,application/xhtml+xml',
      },
      responseType: 'text',
      signal: undefined,
    });
  });

  it('should keep the query string when adding the trailing slash', async () => {
    get.mockResolvedValueOnce(html(''));

    await adapter.fetchList('https://www.imdb.com/list/ls000000001?sort=list_order');

    expect(get.mock.calls[0][0]).toBe('https://www.imdb.com/list/ls000000001/?sort=list_order');
  });

  it('should use a configured user agent', async () => {
    const custom = new ImdbListAdapter(
      { http: { get }, logger: new Logger({ level: 'error' }) },
      { userAgent: 'custom-agent/1.0' }
    );
    get.mockResolvedValueOnce(html(''));

    await custom.fetchList('https://www.imdb.com/chart/top/');

    expect(get.mock.calls[0][1].headers?.['User-Agent']).toBe('custom-agent/1.0');
  });

  it('should return an empty result for a page without titles', async () => {
    get.mockResolvedValueOnce(html('<html><body>Nothing here</body></html>'));

    const result = await adapter.fetchList('https://www.imdb.com/list/ls000000002/');

    expect(result.totalItems).toBe(0);
    expect(result.imdbIds.size).toBe(0);
  });

  it('should propagate a non-success response', async () => {
    get.mockRejectedValueOnce(new ApiClientError('Client error: 404', { status: 404 }));

    await expect(adapter.fetchList('https://www.imdb.com/list/ls000000003/')).rejects.toThrow(
      ApiClientError
    );
  });

  it('should reject a non-text body', async () => {
    get.mockResolvedValueOnce(html({ unexpected: true }));

    await expect(adapter.fetchList('https://www.imdb.com/chart/top/')).rejects.toThrow(
      MalformedResponseError
    );
  });

  it('should reject IMDb pages that are not lists or charts', async () => {
    await expect(adapter.fetchList('https://www.imdb.com/title/tt0000101/')).rejects.toThrow(
      UnsupportedListUrlError
    );
    expect(get).not.toHaveBeenCalled();
  });

  it('should not request anything once cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      adapter.fetchList('https://www.imdb.com/chart/top/', controller.signal)
    ).rejects.toThrow(FetchCancelledError);
    expect(get).not.toHaveBeenCalled();
  });
});

describe('extractTitleIds', () => {
  it('should require seven or more digits', () => {
    const builder = extractTitleIds('<a href="/title/tt123456/">x</a><a href="/title/tt1234567/">y</a>');

    expect([...builder.build(builder.size('imdb')).imdbIds]).toEqual([['tt1234567', 0]]);
  });

  it('should require the trailing slash after the ID', () => {
    const builder = extractTitleIds('<a href="/title/tt7654321?ref=x">x</a>');

    expect(builder.size('imdb')).toBe(0);
  });
});
