import { BaseAdapter, decodeSegment } from '../BaseAdapter';
import type { AdapterDeps } from '../types';
import type { ExternalListResult, SourceName } from '../../core/result/types';
import { ListResultBuilder } from '../../core/result/ListResultBuilder';
import { MalformedResponseError } from '../../utils/errors';
import {
  MdbListItemArraySchema,
  MdbListResponseSchema,
  type MdbListItem,
  type MdbListOptions,
} from './types';

export const MDBLIST_API_BASE_URL = 'https://api.mdblist.com';
export const MDBLIST_PAGE_SIZE = 1000;

const LIST_PATH_PATTERN = /^\/lists\/([^/]+)\/([^/]+)/i;

/**
 * MDBList aggregator lists (https://mdblist.com/lists/{username}/{listname}).
 *
 * Pages through the items endpoint by offset until a short page comes back.
 */
export class MdbListAdapter extends BaseAdapter {
  readonly name: SourceName = 'mdblist';
  protected readonly domain = 'mdblist.com';

  constructor(
    deps: AdapterDeps,
    private readonly options: MdbListOptions = {}
  ) {
    super(deps);
  }

  async fetchList(url: string, signal?: AbortSignal): Promise<ExternalListResult> {
    const apiKey = this.requireCredential(this.options.apiKey, 'MDBList API key');

    const target = parseMdbListUrl(url);
    if (!target) {
      throw this.unsupportedUrl(url, ['https://mdblist.com/lists/{username}/{listname}']);
    }

    const { username, listName } = target;
    const endpoint = `${MDBLIST_API_BASE_URL}/lists/${encodeURIComponent(username)}/${encodeURIComponent(listName)}/items`;

    this.deps.logger.info('Fetching MDBList list', { username, listName });

    const builder = new ListResultBuilder();
    let offset = 0;
    let position = 0;
    let totalFetched = 0;

    while (true) {
      this.throwIfCancelled(signal, url);

      let items: MdbListItem[];
      try {
        const response = await this.deps.http.get(endpoint, {
          source: this.name,
          query: { apikey: apiKey, limit: MDBLIST_PAGE_SIZE, offset },
          signal,
        });
        items = parseItemsPage(response.data);
      } catch (error: unknown) {
        this.handlePageFailure(error, totalFetched, builder, { url, offset });
        break;
      }

      for (const item of items) {
        addItemIds(builder, item, position);
        position++;
      }
      totalFetched += items.length;

      if (items.length < MDBLIST_PAGE_SIZE) {
        break;
      }

      offset += MDBLIST_PAGE_SIZE;
    }

    this.logFetched(url, totalFetched, builder);
    return builder.build(totalFetched);
  }
}

export function parseMdbListUrl(url: string): { username: string; listName: string } | undefined {
  let pathname: string;
  try {
    pathname = new URL(url.trim()).pathname;
  } catch {
    return undefined;
  }

  const match = LIST_PATH_PATTERN.exec(pathname);
  if (!match) return undefined;

  const username = decodeSegment(match[1]);
  const listName = decodeSegment(match[2]);
  if (!username || !listName) return undefined;

  return { username, listName };
}

/**
 * Tries the movies/shows wrapper first, then a bare array. Movies come
 * before shows.
 */
function parseItemsPage(data: unknown): MdbListItem[] {
  const wrapper = MdbListResponseSchema.safeParse(data);
  if (wrapper.success) {
    return [...(wrapper.data.movies ?? []), ...(wrapper.data.shows ?? [])];
  }

  const items = MdbListItemArraySchema.safeParse(data);
  if (items.success) {
    return items.data;
  }

  throw new MalformedResponseError('Unrecognized MDBList response body', {
    issues: items.error.issues.slice(0, 3).map((issue) => issue.message),
  });
}

function addItemIds(builder: ListResultBuilder, item: MdbListItem, position: number): void {
  // Top-level fields win over the nested ids object
  builder.add('imdb', item.imdb_id ?? item.ids?.imdb, position);
  builder.addNumeric('tmdb', item.ids?.tmdb, position);
  builder.addNumeric('tvdb', item.tvdb_id ?? item.ids?.tvdb, position);
}
