import { BaseAdapter, decodeSegment } from '../BaseAdapter';
import type { AdapterDeps } from '../types';
import type { ExternalListResult, SourceName } from '../../core/result/types';
import { ListResultBuilder } from '../../core/result/ListResultBuilder';
import { MalformedResponseError } from '../../utils/errors';
import {
  TraktListItemArraySchema,
  type TraktIds,
  type TraktListItem,
  type TraktListOptions,
} from './types';

export const TRAKT_API_BASE_URL = 'https://api.trakt.tv';
export const TRAKT_PAGE_SIZE = 100;
export const TRAKT_USER_AGENT = 'SmartListExternalSources/1.0';

const PAGE_COUNT_HEADER = 'x-pagination-page-count';

const USER_LIST_PATTERN = /^\/users\/([^/]+)\/lists\/([^/]+)/i;
const WATCHLIST_PATTERN = /^\/users\/([^/]+)\/watchlist/i;
const CHART_PATTERN =
  /^\/(movies|shows)\/(trending|popular|watched|played|collected|anticipated|boxoffice)/i;

const SUPPORTED_FORMATS = [
  'https://trakt.tv/users/{user}/lists/{list}',
  'https://trakt.tv/users/{user}/watchlist',
  'https://trakt.tv/movies/trending',
  'https://trakt.tv/shows/popular',
];

/**
 * Trakt user lists, watchlists and charts.
 */
export class TraktListAdapter extends BaseAdapter {
  readonly name: SourceName = 'trakt';
  protected readonly domain = 'trakt.tv';

  constructor(
    deps: AdapterDeps,
    private readonly options: TraktListOptions = {}
  ) {
    super(deps);
  }

  async fetchList(url: string, signal?: AbortSignal): Promise<ExternalListResult> {
    const clientId = this.requireCredential(this.options.clientId, 'Trakt client ID');

    const apiPath = resolveTraktPath(url);
    if (!apiPath) {
      throw this.unsupportedUrl(url, SUPPORTED_FORMATS);
    }

    this.deps.logger.info('Fetching Trakt list', { url, apiPath });

    const builder = new ListResultBuilder();
    let position = 0;

    for (let page = 1; ; page++) {
      this.throwIfCancelled(signal, url);

      let items: TraktListItem[];
      let pageCount: number;
      try {
        const response = await this.deps.http.get(`${TRAKT_API_BASE_URL}${apiPath}`, {
          source: this.name,
          query: { page, limit: TRAKT_PAGE_SIZE, extended: 'full' },
          headers: {
            Accept: 'application/json',
            'trakt-api-version': '2',
            'trakt-api-key': clientId,
            'User-Agent': this.options.userAgent ?? TRAKT_USER_AGENT,
          },
          signal,
        });

        const parsed = TraktListItemArraySchema.safeParse(response.data);
        if (!parsed.success) {
          throw new MalformedResponseError('Unrecognized Trakt response body', { page });
        }
        items = parsed.data;
        pageCount = parseInt(response.headers[PAGE_COUNT_HEADER] ?? '', 10);
      } catch (error: unknown) {
        this.handlePageFailure(error, position, builder, { url, page });
        break;
      }

      if (items.length === 0) {
        break;
      }

      for (const item of items) {
        addItemIds(builder, item, position);
        position++;
      }

      // Without a page-count header, a short page is the last one
      if (!isNaN(pageCount)) {
        if (page >= pageCount) break;
      } else if (items.length < TRAKT_PAGE_SIZE) {
        break;
      }
    }

    this.logFetched(url, position, builder);
    return builder.build(position);
  }
}

/**
 * Maps a trakt.tv page URL to an API path with escaped segments
 */
export function resolveTraktPath(url: string): string | undefined {
  let pathname: string;
  try {
    pathname = new URL(url.trim()).pathname;
  } catch {
    return undefined;
  }

  const userList = USER_LIST_PATTERN.exec(pathname);
  if (userList) {
    const user = decodeSegment(userList[1]);
    const list = decodeSegment(userList[2]);
    if (!user || !list) return undefined;
    return `/users/${encodeURIComponent(user)}/lists/${encodeURIComponent(list)}/items`;
  }

  const watchlist = WATCHLIST_PATTERN.exec(pathname);
  if (watchlist) {
    const user = decodeSegment(watchlist[1]);
    if (!user) return undefined;
    return `/users/${encodeURIComponent(user)}/watchlist`;
  }

  const chart = CHART_PATTERN.exec(pathname);
  if (chart) {
    const mediaType = chart[1].toLowerCase();
    switch (chart[2].toLowerCase()) {
      case 'trending':
        return `/${mediaType}/trending`;
      case 'popular':
        return `/${mediaType}/popular`;
      case 'anticipated':
        return `/${mediaType}/anticipated`;
      case 'watched':
        return `/${mediaType}/watched/weekly`;
      case 'played':
        return `/${mediaType}/played/weekly`;
      case 'collected':
        return `/${mediaType}/collected/weekly`;
      case 'boxoffice':
        return mediaType === 'movies' ? '/movies/boxoffice' : undefined;
    }
  }

  return undefined;
}

function addItemIds(builder: ListResultBuilder, item: TraktListItem, position: number): void {
  const ids: TraktIds | null | undefined = item.movie?.ids ?? item.show?.ids ?? item.ids;
  if (!ids) return;

  builder.add('imdb', ids.imdb, position);
  builder.addNumeric('tmdb', ids.tmdb, position);
  builder.addNumeric('tvdb', ids.tvdb, position);
}
