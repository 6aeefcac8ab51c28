// src/core/result/types.ts

export const SOURCE_NAMES = ['mdblist', 'imdb', 'tmdb', 'trakt'] as const;

export type SourceName = (typeof SOURCE_NAMES)[number];

/**
 * Identifier families: IMDb ("tt1234567"), TMDB ("917496"), TVDB ("421968")
 */
export type IdentifierFamily = 'imdb' | 'tmdb' | 'tvdb';

/**
 * Normalized output of one adapter call.
 *
 * Each map goes from identifier to its zero-based position in the source
 * list. A family with no entries carries no information for this source.
 */
export interface ExternalListResult {
  readonly imdbIds: ReadonlyMap<string, number>;
  readonly tmdbIds: ReadonlyMap<string, number>;
  readonly tvdbIds: ReadonlyMap<string, number>;
  /** Items observed, including those that yielded no identifier */
  readonly totalItems: number;
  /** Set when fetching stopped early and the result is partial */
  readonly incomplete?: string;
}

/**
 * Provider identifiers known for a library item
 */
export interface ItemProviderIds {
  imdb?: string;
  tmdb?: string;
  tvdb?: string;
}
