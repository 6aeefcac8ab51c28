import { BaseAdapter } from '../BaseAdapter';
import type { AdapterDeps } from '../types';
import type { ExternalListResult, SourceName } from '../../core/result/types';
import { ListResultBuilder } from '../../core/result/ListResultBuilder';
import { MalformedResponseError } from '../../utils/errors';

// IMDb serves a truncated page to clients that don't look like a browser
export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

const LIST_URL_PATTERN = /imdb\.com\/(list\/ls\d+|chart\/\w+)/i;
const TITLE_ID_PATTERN = /\/title\/(tt\d{7,})\//g;

export interface ImdbListOptions {
  userAgent?: string;
}

/**
 * Public IMDb list and chart pages, e.g. https://www.imdb.com/list/ls123456789/
 * or https://www.imdb.com/chart/top/.
 *
 * Title IDs are pulled out of the server-rendered HTML in document order.
 * A title linked several times keeps the position of its first link.
 */
export class ImdbListAdapter extends BaseAdapter {
  readonly name: SourceName = 'imdb';
  protected readonly domain = 'imdb.com';

  constructor(
    deps: AdapterDeps,
    private readonly options: ImdbListOptions = {}
  ) {
    super(deps);
  }

  async fetchList(url: string, signal?: AbortSignal): Promise<ExternalListResult> {
    if (!LIST_URL_PATTERN.test(url)) {
      throw this.unsupportedUrl(url, [
        'https://www.imdb.com/list/ls123456789/',
        'https://www.imdb.com/chart/top/',
      ]);
    }

    const listUrl = withTrailingSlash(url);
    this.deps.logger.info('Fetching IMDb list', { url: listUrl });
    this.throwIfCancelled(signal, url);

    // Single request; a non-success status propagates as a fetch failure
    const response = await this.deps.http.get(listUrl, {
      source: this.name,
      headers: {
        'User-Agent': this.options.userAgent ?? BROWSER_USER_AGENT,
        'Accept-Language': 'en-US,en;q=0.9',
        Accept: 'text/html,application/xhtml+xml',
      },
      responseType: 'text',
      signal,
    });

    if (typeof response.data !== 'string') {
      throw new MalformedResponseError('IMDb returned a non-text body', { url: listUrl });
    }

    const builder = extractTitleIds(response.data);
    const totalItems = builder.size('imdb');

    this.logFetched(listUrl, totalItems, builder);
    return builder.build(totalItems);
  }
}

/**
 * Positions are dense: a repeated title neither moves nor advances the counter
 */
export function extractTitleIds(html: string): ListResultBuilder {
  const builder = new ListResultBuilder();
  for (const match of html.matchAll(TITLE_ID_PATTERN)) {
    builder.add('imdb', match[1], builder.size('imdb'));
  }
  return builder;
}

function withTrailingSlash(url: string): string {
  const parsed = new URL(url.trim());
  parsed.pathname = `${parsed.pathname.replace(/\/+$/, '')}/`;
  return parsed.toString();
}
