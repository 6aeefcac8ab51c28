// src/index.ts

export { ExternalListSDK, createAdapters } from './sdk';
export {
  validateConfig,
  validateConfigSafe,
  DEFAULT_RETRY_CONFIG,
  DEFAULT_RATE_LIMITS,
  DEFAULT_SOURCES,
} from './config/ConfigValidator';
export type { InitConfig, ListCredentials, SourceUserAgents } from './config/ConfigValidator';
export { loadConfigFromEnv } from './config/env';
export type { EnvConfigOptions } from './config/env';

export { FetchCache } from './core/cache/FetchCache';
export type { ReadonlyFetchCache } from './core/cache/FetchCache';
export { ListAggregator } from './core/aggregator/ListAggregator';
export { ListResultBuilder, emptyListResult, isEmptyListResult } from './core/result/ListResultBuilder';
export { SOURCE_NAMES } from './core/result/types';
export type {
  SourceName,
  IdentifierFamily,
  ExternalListResult,
  ItemProviderIds,
} from './core/result/types';
export type { HttpClient, HttpResponse, HttpGetConfig } from './core/http/types';

export type { ListAdapter, AdapterDeps } from './adapters/types';
export { MdbListAdapter } from './adapters/mdblist/MdbListAdapter';
export { ImdbListAdapter } from './adapters/imdb/ImdbListAdapter';
export { TmdbListAdapter } from './adapters/tmdb/TmdbListAdapter';
export { TraktListAdapter } from './adapters/trakt/TraktListAdapter';

export {
  ExternalListLookup,
  collectExternalListUrls,
  findListPosition,
  compareByListPosition,
} from './rules/ExternalListLookup';
export { EXTERNAL_LIST_FIELD } from './rules/types';
export type { RuleExpression, RuleSet, ListOrderDirection } from './rules/types';

// Export error classes for error handling
export {
  ExternalListError,
  ListConfigError,
  MissingCredentialError,
  UnsupportedListUrlError,
  ApiError,
  ApiClientError,
  ApiServerError,
  RateLimitError,
  NetworkError,
  NetworkTimeoutError,
  MalformedResponseError,
  FetchCancelledError,
  isSoftFetchFailure,
} from './utils/errors';
