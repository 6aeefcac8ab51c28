// src/rules/ExternalListLookup.ts

import type { ReadonlyFetchCache } from '../core/cache/FetchCache';
import type { ExternalListResult, ItemProviderIds } from '../core/result/types';
import { FetchCache } from '../core/cache/FetchCache';
import { EXTERNAL_LIST_FIELD, type ListOrderDirection, type RuleSet } from './types';

/**
 * Every external list URL referenced by a batch's rule sets, in the order
 * first referenced, without case-insensitive duplicates.
 */
export function collectExternalListUrls(ruleSets: Iterable<RuleSet | null | undefined>): string[] {
  const seen = new Set<string>();
  const urls: string[] = [];

  for (const ruleSet of ruleSets) {
    for (const expression of ruleSet?.expressions ?? []) {
      if (expression.memberName.toLowerCase() !== EXTERNAL_LIST_FIELD.toLowerCase()) continue;

      const url = expression.targetValue?.trim();
      if (!url) continue;

      const key = FetchCache.key(url);
      if (seen.has(key)) continue;
      seen.add(key);
      urls.push(url);
    }
  }

  return urls;
}

/**
 * Lowest position of the item across the identifier families the list carries
 */
export function findListPosition(
  result: ExternalListResult,
  ids: ItemProviderIds
): number | undefined {
  const candidates = [
    ids.imdb ? result.imdbIds.get(ids.imdb) : undefined,
    ids.tmdb ? result.tmdbIds.get(ids.tmdb) : undefined,
    ids.tvdb ? result.tvdbIds.get(ids.tvdb) : undefined,
  ].filter((position): position is number => position !== undefined);

  return candidates.length > 0 ? Math.min(...candidates) : undefined;
}

/**
 * Synchronous reads against a populated batch cache. Never fetches.
 */
export class ExternalListLookup {
  constructor(private readonly cache: ReadonlyFetchCache) {}

  /**
   * Position of the item in the list at `url`; undefined when the item is
   * absent or the list was never fetched
   */
  positionIn(url: string, ids: ItemProviderIds): number | undefined {
    const result = this.cache.get(url);
    return result ? findListPosition(result, ids) : undefined;
  }

  contains(url: string, ids: ItemProviderIds): boolean {
    return this.positionIn(url, ids) !== undefined;
  }

  /**
   * Best (lowest) position across several lists
   */
  bestPosition(urls: Iterable<string>, ids: ItemProviderIds): number | undefined {
    let best: number | undefined;
    for (const url of urls) {
      const position = this.positionIn(url, ids);
      if (position !== undefined && (best === undefined || position < best)) {
        best = position;
      }
    }
    return best;
  }
}

/**
 * Orders by external list position. Items without a position sort last in
 * either direction.
 */
export function compareByListPosition(
  a: number | undefined,
  b: number | undefined,
  direction: ListOrderDirection = 'asc'
): number {
  if (a === undefined && b === undefined) return 0;
  if (a === undefined) return 1;
  if (b === undefined) return -1;
  return direction === 'asc' ? a - b : b - a;
}
