// src/core/aggregator/ListAggregator.ts

import type { ListAdapter } from '../../adapters/types';
import { FetchCache } from '../cache/FetchCache';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { emptyListResult } from '../result/ListResultBuilder';
import { FetchCancelledError } from '../../utils/errors';
import { generateCorrelationId, withListFetchSpan } from '../../observability/tracing';

export class ListAggregator {
  private readonly adapters: readonly ListAdapter[];

  /**
   * @param adapters - Tried in order; the first whose canHandle accepts a URL fetches it
   */
  constructor(
    adapters: readonly ListAdapter[],
    private logger: Logger,
    private metrics: MetricsCollector
  ) {
    this.adapters = [...adapters];
  }

  get registeredSources(): string[] {
    return this.adapters.map((adapter) => adapter.name);
  }

  resolveAdapter(url: string): ListAdapter | undefined {
    return this.adapters.find((adapter) => adapter.canHandle(url));
  }

  /**
   * Fetches every URL not yet in `cache`, one at a time.
   *
   * A URL that matches no adapter or fails to fetch is stored as an empty
   * result with a warning on the cache. Only cancellation escapes; whatever
   * was cached before it stays cached.
   */
  async preFetch(urls: Iterable<string>, cache: FetchCache, signal?: AbortSignal): Promise<void> {
    const urlList = dedupeCaseInsensitive(urls);
    if (urlList.length === 0) {
      return;
    }

    const batchId = generateCorrelationId();
    this.logger.info('Pre-fetching external lists', { batchId, count: urlList.length });

    for (const url of urlList) {
      if (signal?.aborted) {
        this.logger.debug('External list prefetch cancelled', { batchId, url });
        throw new FetchCancelledError('External list prefetch cancelled', { url });
      }

      if (cache.has(url)) {
        this.logger.debug('External list already cached', { batchId, url });
        this.metrics.incrementCounter('list_cache_hits');
        continue;
      }

      const adapter = this.resolveAdapter(url);
      if (!adapter) {
        const message = `No external list provider found for URL: ${url}`;
        this.logger.warn(message, { batchId });
        cache.addWarning(message);
        cache.set(url, emptyListResult());
        this.metrics.incrementCounter('list_fetch_total', { source: 'none', status: 'unhandled' });
        continue;
      }

      await this.fetchOne(adapter, url, cache, batchId, signal);
    }
  }

  private async fetchOne(
    adapter: ListAdapter,
    url: string,
    cache: FetchCache,
    batchId: string,
    signal?: AbortSignal
  ): Promise<void> {
    const source = adapter.name;
    const startTime = Date.now();

    try {
      const result = await withListFetchSpan(source, url, () => adapter.fetchList(url, signal));
      cache.set(url, result);

      if (result.incomplete !== undefined) {
        cache.addWarning(`External list partially fetched: ${url} (${result.incomplete})`);
      }

      this.metrics.incrementCounter('list_fetch_total', {
        source,
        status: result.incomplete === undefined ? 'success' : 'partial',
      });
      this.metrics.recordGauge('list_items_fetched', result.totalItems, { source });
      this.logger.debug('Cached external list', { batchId, url, totalItems: result.totalItems });
    } catch (error: unknown) {
      if (error instanceof FetchCancelledError) {
        this.logger.debug('External list fetch cancelled', { batchId, url });
        this.metrics.incrementCounter('list_fetch_total', { source, status: 'cancelled' });
        throw error;
      }

      const detail = error instanceof Error ? error.message : String(error);
      this.logger.warn('Failed to fetch external list, treating as empty', {
        batchId,
        url,
        source,
        error: detail,
      });
      cache.addWarning(`Failed to fetch external list: ${url} (${detail})`);
      cache.set(url, emptyListResult());
      this.metrics.incrementCounter('list_fetch_total', { source, status: 'failed' });
    } finally {
      this.metrics.recordLatency('list_fetch_duration', Date.now() - startTime, { source });
    }
  }
}

function dedupeCaseInsensitive(urls: Iterable<string>): string[] {
  const seen = new Set<string>();
  const unique: string[] = [];
  for (const url of urls) {
    const key = FetchCache.key(url);
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(url);
  }
  return unique;
}
