// src/core/cache/FetchCache.ts

import type { ExternalListResult } from '../result/types';

/**
 * What rule evaluation sees once a prefetch has completed
 */
export interface ReadonlyFetchCache {
  readonly size: number;
  readonly warnings: readonly string[];
  has(url: string): boolean;
  get(url: string): ExternalListResult | undefined;
  entries(): IterableIterator<[string, ExternalListResult]>;
}

/**
 * Per-batch store of fetched external lists, keyed by URL without regard
 * to case. Created at the start of a refresh batch and discarded after it.
 */
export class FetchCache implements ReadonlyFetchCache {
  private readonly results: Map<string, { url: string; result: ExternalListResult }> = new Map();
  private readonly warningList: string[] = [];

  static key(url: string): string {
    return url.toLowerCase();
  }

  get size(): number {
    return this.results.size;
  }

  get warnings(): readonly string[] {
    return this.warningList;
  }

  has(url: string): boolean {
    return this.results.has(FetchCache.key(url));
  }

  get(url: string): ExternalListResult | undefined {
    return this.results.get(FetchCache.key(url))?.result;
  }

  set(url: string, result: ExternalListResult): void {
    this.results.set(FetchCache.key(url), { url, result });
  }

  addWarning(message: string): void {
    this.warningList.push(message);
  }

  /**
   * Yields each URL as first stored, with its result
   */
  *entries(): IterableIterator<[string, ExternalListResult]> {
    for (const { url, result } of this.results.values()) {
      yield [url, result];
    }
  }
}
