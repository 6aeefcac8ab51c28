// src/adapters/BaseAdapter.ts

import type { AdapterDeps, ListAdapter } from './types';
import type { ExternalListResult, SourceName } from '../core/result/types';
import type { ListResultBuilder } from '../core/result/ListResultBuilder';
import {
  FetchCancelledError,
  MissingCredentialError,
  UnsupportedListUrlError,
  isSoftFetchFailure,
} from '../utils/errors';

/**
 * True when `url` is http(s) and its host is `domain` or a subdomain of it
 */
export function matchesHost(url: string, domain: string): boolean {
  if (!url || !url.trim()) return false;

  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch {
    return false;
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return false;

  const host = parsed.hostname.toLowerCase();
  const target = domain.toLowerCase();
  return host === target || host.endsWith(`.${target}`);
}

/**
 * Decodes one path segment; undefined when it is not valid percent-encoding
 */
export function decodeSegment(segment: string): string | undefined {
  try {
    return decodeURIComponent(segment);
  } catch {
    return undefined;
  }
}

export abstract class BaseAdapter implements ListAdapter {
  abstract readonly name: SourceName;
  protected abstract readonly domain: string;

  constructor(protected deps: AdapterDeps) {}

  canHandle(url: string): boolean {
    return matchesHost(url, this.domain);
  }

  abstract fetchList(url: string, signal?: AbortSignal): Promise<ExternalListResult>;

  protected requireCredential(value: string | undefined, description: string): string {
    const trimmed = value?.trim();
    if (!trimmed) {
      throw new MissingCredentialError(`${description} is not configured`, { source: this.name });
    }
    return trimmed;
  }

  protected unsupportedUrl(url: string, formats: string[]): UnsupportedListUrlError {
    return new UnsupportedListUrlError(
      `Invalid ${this.name} URL. Supported formats: ${formats.join(', ')}`,
      { source: this.name, url }
    );
  }

  /**
   * Checked before every page request
   */
  protected throwIfCancelled(signal: AbortSignal | undefined, url: string): void {
    if (signal?.aborted) {
      throw new FetchCancelledError(`Fetch cancelled for ${url}`, { source: this.name, url });
    }
  }

  /**
   * A failed page ends pagination. With nothing collected yet the failure is
   * rethrown; otherwise the partial result is kept and marked incomplete.
   */
  protected handlePageFailure(
    error: unknown,
    itemsSoFar: number,
    builder: ListResultBuilder,
    context: Record<string, unknown>
  ): void {
    if (!isSoftFetchFailure(error) || itemsSoFar === 0) {
      throw error;
    }

    builder.markIncomplete(error.message);
    this.deps.logger.warn('Page fetch failed, keeping partial list', {
      ...context,
      source: this.name,
      itemsSoFar,
      error: error.message,
      code: error.code,
    });
  }

  protected logFetched(url: string, totalItems: number, builder: ListResultBuilder): void {
    this.deps.logger.info('Fetched external list', {
      source: this.name,
      url,
      totalItems,
      imdbCount: builder.size('imdb'),
      tmdbCount: builder.size('tmdb'),
      tvdbCount: builder.size('tvdb'),
    });
  }
}
