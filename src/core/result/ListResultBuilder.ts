// src/core/result/ListResultBuilder.ts

import type { ExternalListResult, IdentifierFamily } from './types';

/**
 * Result stored for URLs that matched no adapter or failed outright
 */
export function emptyListResult(): ExternalListResult {
  return {
    imdbIds: new Map<string, number>(),
    tmdbIds: new Map<string, number>(),
    tvdbIds: new Map<string, number>(),
    totalItems: 0,
  };
}

export function isEmptyListResult(result: ExternalListResult): boolean {
  return (
    result.totalItems === 0 &&
    result.imdbIds.size === 0 &&
    result.tmdbIds.size === 0 &&
    result.tvdbIds.size === 0
  );
}

export class ListResultBuilder {
  private readonly families: Record<IdentifierFamily, Map<string, number>> = {
    imdb: new Map(),
    tmdb: new Map(),
    tvdb: new Map(),
  };
  private incomplete?: string;

  /**
   * Records an identifier at a position. The first position seen for an
   * identifier is kept; later occurrences are ignored.
   */
  add(family: IdentifierFamily, id: string | null | undefined, position: number): boolean {
    if (!id) return false;
    const index = this.families[family];
    if (index.has(id)) return false;
    index.set(id, position);
    return true;
  }

  /**
   * Numeric identifiers count only when positive
   */
  addNumeric(family: IdentifierFamily, id: number | null | undefined, position: number): boolean {
    if (typeof id !== 'number' || !Number.isInteger(id) || id <= 0) return false;
    return this.add(family, String(id), position);
  }

  size(family: IdentifierFamily): number {
    return this.families[family].size;
  }

  markIncomplete(reason: string): void {
    this.incomplete = reason;
  }

  build(totalItems: number): ExternalListResult {
    return {
      imdbIds: this.families.imdb,
      tmdbIds: this.families.tmdb,
      tvdbIds: this.families.tvdb,
      totalItems,
      ...(this.incomplete !== undefined ? { incomplete: this.incomplete } : {}),
    };
  }
}
