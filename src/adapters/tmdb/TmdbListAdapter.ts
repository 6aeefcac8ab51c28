import { BaseAdapter } from '../BaseAdapter';
import type { AdapterDeps } from '../types';
import type { ExternalListResult, SourceName } from '../../core/result/types';
import { ListResultBuilder } from '../../core/result/ListResultBuilder';
import { MalformedResponseError } from '../../utils/errors';
import {
  TmdbListResponseSchema,
  TmdbPageResponseSchema,
  type TmdbItem,
  type TmdbListOptions,
  type TmdbRoute,
  type TmdbRouteKind,
} from './types';

export const TMDB_API_BASE_URL = 'https://api.themoviedb.org/3';
export const TMDB_MAX_CHART_PAGES = 500;

const USER_LIST_PATTERN = /^\/list\/(\d+)/i;
const TRENDING_PATTERN = /^\/trending\/(movie|tv|all)\/(day|week)/i;
const MOVIE_CHART_PATTERN = /^\/movie\/(popular|top-rated|now-playing|upcoming)/i;
const TV_CHART_PATTERN = /^\/tv\/(popular|top-rated|airing-today|on-the-air)/i;
const BARE_MEDIA_PATTERN = /^\/(movie|tv)\/?$/i;

const SUPPORTED_FORMATS = [
  'https://www.themoviedb.org/list/{id}',
  'https://www.themoviedb.org/movie/popular',
  'https://www.themoviedb.org/tv/top-rated',
  'https://www.themoviedb.org/trending/movie/week',
];

interface TmdbPage {
  items: TmdbItem[];
  totalPages?: number;
}

interface PagingStrategy {
  maxPages: number;
  // User lists stop when the total is missing; charts keep going until the cap
  stopWithoutTotal: boolean;
  readPage(data: unknown): TmdbPage;
}

const PAGING: Record<TmdbRouteKind, PagingStrategy> = {
  userList: {
    maxPages: Number.POSITIVE_INFINITY,
    stopWithoutTotal: true,
    readPage(data) {
      const parsed = TmdbListResponseSchema.safeParse(data);
      if (!parsed.success) throw new MalformedResponseError('Unrecognized TMDB list response body');
      return { items: parsed.data.items ?? [], totalPages: parsed.data.total_pages ?? undefined };
    },
  },
  chart: {
    maxPages: TMDB_MAX_CHART_PAGES,
    stopWithoutTotal: false,
    readPage(data) {
      const parsed = TmdbPageResponseSchema.safeParse(data);
      if (!parsed.success) throw new MalformedResponseError('Unrecognized TMDB page response body');
      return { items: parsed.data.results ?? [], totalPages: parsed.data.total_pages ?? undefined };
    },
  },
};

/**
 * TMDB user lists, charts and trending feeds. Only TMDB IDs are produced.
 */
export class TmdbListAdapter extends BaseAdapter {
  readonly name: SourceName = 'tmdb';
  protected readonly domain = 'themoviedb.org';

  constructor(
    deps: AdapterDeps,
    private readonly options: TmdbListOptions = {}
  ) {
    super(deps);
  }

  async fetchList(url: string, signal?: AbortSignal): Promise<ExternalListResult> {
    const apiKey = this.requireCredential(this.options.apiKey, 'TMDB API key');

    const route = resolveTmdbRoute(url);
    if (!route) {
      throw this.unsupportedUrl(url, SUPPORTED_FORMATS);
    }

    this.deps.logger.info('Fetching TMDB list', { url, apiPath: route.apiPath, kind: route.kind });

    const strategy = PAGING[route.kind];
    const builder = new ListResultBuilder();
    let position = 0;
    let page = 1;

    for (; page <= strategy.maxPages; page++) {
      this.throwIfCancelled(signal, url);

      let current: TmdbPage;
      try {
        const response = await this.deps.http.get(`${TMDB_API_BASE_URL}${route.apiPath}`, {
          source: this.name,
          query: { api_key: apiKey, page },
          signal,
        });
        current = strategy.readPage(response.data);
      } catch (error: unknown) {
        this.handlePageFailure(error, position, builder, { url, page });
        break;
      }

      if (current.items.length === 0) {
        break;
      }

      for (const item of current.items) {
        builder.addNumeric('tmdb', item.id, position);
        position++;
      }

      if (current.totalPages === undefined) {
        if (strategy.stopWithoutTotal) break;
      } else if (page >= current.totalPages) {
        break;
      }
    }

    if (page > strategy.maxPages) {
      this.deps.logger.warn('TMDB page cap reached', { url, maxPages: strategy.maxPages });
    }

    this.logFetched(url, position, builder);
    return builder.build(position);
  }
}

/**
 * Maps a themoviedb.org page URL to an API path. The first matching shape
 * wins; a bare /movie or /tv means the popular chart.
 */
export function resolveTmdbRoute(url: string): TmdbRoute | undefined {
  let pathname: string;
  try {
    pathname = new URL(url.trim()).pathname;
  } catch {
    return undefined;
  }

  const list = USER_LIST_PATTERN.exec(pathname);
  if (list) {
    return { apiPath: `/list/${list[1]}`, kind: 'userList' };
  }

  const trending = TRENDING_PATTERN.exec(pathname);
  if (trending) {
    return {
      apiPath: `/trending/${trending[1].toLowerCase()}/${trending[2].toLowerCase()}`,
      kind: 'chart',
    };
  }

  const movieChart = MOVIE_CHART_PATTERN.exec(pathname);
  if (movieChart) {
    return { apiPath: `/movie/${toApiChart(movieChart[1])}`, kind: 'chart' };
  }

  const tvChart = TV_CHART_PATTERN.exec(pathname);
  if (tvChart) {
    return { apiPath: `/tv/${toApiChart(tvChart[1])}`, kind: 'chart' };
  }

  const bare = BARE_MEDIA_PATTERN.exec(pathname);
  if (bare) {
    return { apiPath: `/${bare[1].toLowerCase()}/popular`, kind: 'chart' };
  }

  return undefined;
}

// "top-rated" on the site is "top_rated" in the API
function toApiChart(chart: string): string {
  return chart.toLowerCase().replace(/-/g, '_');
}
