// src/sdk.ts

import type { ListAdapter, AdapterDeps } from './adapters/types';
import type { SourceName } from './core/result/types';
import type { RuleSet } from './rules/types';
import { HttpCore } from './core/http/HttpCore';
import { FetchCache } from './core/cache/FetchCache';
import { ListAggregator } from './core/aggregator/ListAggregator';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import { MdbListAdapter } from './adapters/mdblist/MdbListAdapter';
import { ImdbListAdapter } from './adapters/imdb/ImdbListAdapter';
import { TmdbListAdapter } from './adapters/tmdb/TmdbListAdapter';
import { TraktListAdapter } from './adapters/trakt/TraktListAdapter';
import { ExternalListLookup, collectExternalListUrls } from './rules/ExternalListLookup';
import {
  DEFAULT_RATE_LIMITS,
  DEFAULT_RETRY_CONFIG,
  DEFAULT_SOURCES,
  validateConfig,
  type InitConfig,
  type ListCredentials,
  type SourceUserAgents,
} from './config/ConfigValidator';

export interface CoreDeps {
  logger: Logger;
  metrics: MetricsCollector;
  http: HttpCore;
}

/**
 * Builds one adapter per source, in the given order
 */
export function createAdapters(
  sources: readonly SourceName[],
  deps: AdapterDeps,
  credentials: ListCredentials = {},
  userAgents: SourceUserAgents = {}
): ListAdapter[] {
  return sources.map((source): ListAdapter => {
    switch (source) {
      case 'mdblist':
        return new MdbListAdapter(deps, { apiKey: credentials.mdbListApiKey });
      case 'imdb':
        return new ImdbListAdapter(deps, { userAgent: userAgents.imdb });
      case 'tmdb':
        return new TmdbListAdapter(deps, { apiKey: credentials.tmdbApiKey });
      case 'trakt':
        return new TraktListAdapter(deps, {
          clientId: credentials.traktClientId,
          userAgent: userAgents.trakt,
        });
    }
  });
}

export class ExternalListSDK {
  private readonly core: CoreDeps;
  private readonly aggregator: ListAggregator;

  private constructor(config: InitConfig) {
    const logger = new Logger(config.logging);
    const metrics = new MetricsCollector(config.metrics, logger);
    const http = new HttpCore(
      {
        timeout: config.http?.timeout,
        userAgent: config.http?.userAgent,
        retry: config.http?.retry ?? DEFAULT_RETRY_CONFIG,
      },
      config.rateLimits ?? DEFAULT_RATE_LIMITS,
      metrics,
      logger
    );

    this.core = { logger, metrics, http };

    const adapters = createAdapters(
      config.sources ?? DEFAULT_SOURCES,
      { http, logger },
      config.credentials,
      config.http?.sourceUserAgents
    );
    this.aggregator = new ListAggregator(adapters, logger, metrics);
  }

  /**
   * Validate configuration and wire the list adapters
   *
   * @throws {z.ZodError} If configuration is invalid
   *
   * @example
   * ```typescript
   * const sdk = ExternalListSDK.init({
   *   credentials: {
   *     mdbListApiKey: process.env.MDBLIST_API_KEY,
   *     tmdbApiKey: process.env.TMDB_API_KEY,
   *   },
   * });
   *
   * const cache = sdk.createCache();
   * await sdk.preFetchForRuleSets(list.ruleSets, cache);
   * const position = sdk.lookup(cache).positionIn(url, { imdb: 'tt0111161' });
   * ```
   */
  static init(config: InitConfig = {}): ExternalListSDK {
    const sdk = new ExternalListSDK(validateConfig(config));

    sdk.core.logger.info('External list SDK initialized', {
      sources: sdk.aggregator.registeredSources,
    });

    return sdk;
  }

  get sources(): string[] {
    return this.aggregator.registeredSources;
  }

  /**
   * A fresh cache for one refresh batch. Never share it across batches.
   */
  createCache(): FetchCache {
    return new FetchCache();
  }

  /**
   * Fetch every URL not already in `cache`. Failures become empty results
   * plus a warning on the cache.
   *
   * @throws {FetchCancelledError} If `signal` is aborted
   */
  async preFetch(urls: Iterable<string>, cache: FetchCache, signal?: AbortSignal): Promise<void> {
    await this.aggregator.preFetch(urls, cache, signal);
  }

  /**
   * Collect the ExternalList rules of a batch and pre-fetch their URLs
   *
   * @returns The URLs that were requested, in first-referenced order
   */
  async preFetchForRuleSets(
    ruleSets: Iterable<RuleSet | null | undefined>,
    cache: FetchCache,
    signal?: AbortSignal
  ): Promise<string[]> {
    const urls = collectExternalListUrls(ruleSets);
    await this.aggregator.preFetch(urls, cache, signal);
    return urls;
  }

  lookup(cache: FetchCache): ExternalListLookup {
    return new ExternalListLookup(cache);
  }

  async getMetrics(): Promise<string> {
    return this.core.metrics.getMetrics();
  }

  async close(): Promise<void> {
    await this.core.metrics.close();
  }
}
