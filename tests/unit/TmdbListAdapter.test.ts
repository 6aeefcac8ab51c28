// tests/unit/TmdbListAdapter.test.ts

import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import {
  TMDB_API_BASE_URL,
  TMDB_MAX_CHART_PAGES,
  TmdbListAdapter,
  resolveTmdbRoute,
} from '../../src/adapters/tmdb/TmdbListAdapter';
import type { HttpClient, HttpResponse } from '../../src/core/http/types';
import { Logger } from '../../src/observability/Logger';
import {
  MissingCredentialError,
  NetworkTimeoutError,
  UnsupportedListUrlError,
} from '../../src/utils/errors';

function ok(data: unknown): HttpResponse<unknown> {
  return { data, status: 200, headers: {} };
}

describe('TmdbListAdapter', () => {
  let get: Mock<HttpClient['get']>;
  let adapter: TmdbListAdapter;
  const logger = new Logger({ level: 'error' });

  beforeEach(() => {
    get = vi.fn<HttpClient['get']>();
    adapter = new TmdbListAdapter({ http: { get }, logger }, { apiKey: 'test-key' });
  });

  it('should handle themoviedb.org URLs', () => {
    expect(adapter.canHandle('https://www.themoviedb.org/list/8136')).toBe(true);
    expect(adapter.canHandle('https://api.themoviedb.org/3/list/8136')).toBe(true);
    expect(adapter.canHandle('https://mdblist.com/lists/a/b')).toBe(false);
  });

  it('should page through a user list until total_pages', async () => {
    get
      .mockResolvedValueOnce(ok({ items: [{ id: 550 }, { id: 13 }], total_pages: 2 }))
      .mockResolvedValueOnce(ok({ items: [{ id: 680 }, { id: 550 }], total_pages: 2 }));

    const result = await adapter.fetchList('https://www.themoviedb.org/list/8136');

    expect(get).toHaveBeenCalledTimes(2);
    expect(get).toHaveBeenNthCalledWith(1, `${TMDB_API_BASE_URL}/list/8136`, {
      source: 'tmdb',
      query: { api_key: 'test-key', page: 1 },
      signal: undefined,
    });
    expect([...result.tmdbIds]).toEqual([
      ['550', 0],
      ['13', 1],
      ['680', 2],
    ]);
    expect(result.totalItems).toBe(4);
    expect(result.imdbIds.size).toBe(0);
  });

  it('should stop a user list after one page when total_pages is missing', async () => {
    get.mockResolvedValueOnce(ok({ items: [{ id: 1 }] }));

    const result = await adapter.fetchList('https://www.themoviedb.org/list/42');

    expect(get).toHaveBeenCalledTimes(1);
    expect(result.totalItems).toBe(1);
  });

  it('should map a bare /movie URL to the popular chart', async () => {
    get.mockResolvedValueOnce(ok({ results: [{ id: 7 }], page: 1, total_pages: 1 }));

    const result = await adapter.fetchList('https://www.themoviedb.org/movie');

    expect(get.mock.calls[0][0]).toBe(`${TMDB_API_BASE_URL}/movie/popular`);
    expect(result.tmdbIds.get('7')).toBe(0);
  });

  it('should keep paging a chart without total_pages until an empty page', async () => {
    get
      .mockResolvedValueOnce(ok({ results: [{ id: 1 }] }))
      .mockResolvedValueOnce(ok({ results: [{ id: 2 }] }))
      .mockResolvedValueOnce(ok({ results: [] }));

    const result = await adapter.fetchList('https://www.themoviedb.org/tv/top-rated');

    expect(get).toHaveBeenCalledTimes(3);
    expect(get.mock.calls[0][0]).toBe(`${TMDB_API_BASE_URL}/tv/top_rated`);
    expect(result.totalItems).toBe(2);
  });

  it('should stop a chart at the page cap', async () => {
    get.mockImplementation(async (_url, config) =>
      ok({ results: [{ id: Number(config.query?.page) }], total_pages: 1000 })
    );

    const result = await adapter.fetchList('https://www.themoviedb.org/movie/popular');

    expect(get).toHaveBeenCalledTimes(TMDB_MAX_CHART_PAGES);
    expect(result.totalItems).toBe(500);
    expect(result.tmdbIds.get('500')).toBe(499);
  });

  it('should keep collected pages when a later page times out', async () => {
    get
      .mockResolvedValueOnce(ok({ results: [{ id: 1 }, { id: 2 }], total_pages: 3 }))
      .mockRejectedValueOnce(new NetworkTimeoutError());

    const result = await adapter.fetchList('https://www.themoviedb.org/trending/all/week');

    expect(get.mock.calls[0][0]).toBe(`${TMDB_API_BASE_URL}/trending/all/week`);
    expect(result.totalItems).toBe(2);
    expect(result.incomplete).toBe('Request timeout');
  });

  it('should require an API key', async () => {
    const keyless = new TmdbListAdapter({ http: { get }, logger }, { apiKey: '' });

    await expect(keyless.fetchList('https://www.themoviedb.org/list/1')).rejects.toThrow(
      'TMDB API key is not configured'
    );
    await expect(keyless.fetchList('https://www.themoviedb.org/list/1')).rejects.toThrow(
      MissingCredentialError
    );
  });

  it('should reject unsupported pages', async () => {
    await expect(adapter.fetchList('https://www.themoviedb.org/person/287')).rejects.toThrow(
      UnsupportedListUrlError
    );
    expect(get).not.toHaveBeenCalled();
  });
});

describe('resolveTmdbRoute', () => {
  it.each([
    ['https://www.themoviedb.org/list/8136-favourites', '/list/8136', 'userList'],
    ['https://www.themoviedb.org/trending/TV/Day', '/trending/tv/day', 'chart'],
    ['https://www.themoviedb.org/movie/now-playing', '/movie/now_playing', 'chart'],
    ['https://www.themoviedb.org/movie/upcoming?page=3', '/movie/upcoming', 'chart'],
    ['https://www.themoviedb.org/tv/airing-today', '/tv/airing_today', 'chart'],
    ['https://www.themoviedb.org/tv/on-the-air', '/tv/on_the_air', 'chart'],
    ['https://www.themoviedb.org/tv/', '/tv/popular', 'chart'],
  ])('should map %s', (url, apiPath, kind) => {
    expect(resolveTmdbRoute(url)).toEqual({ apiPath, kind });
  });

  it('should not map a single title page', () => {
    expect(resolveTmdbRoute('https://www.themoviedb.org/movie/550-fight-club')).toBeUndefined();
  });
});
