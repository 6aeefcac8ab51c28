// src/adapters/types.ts

import type { ExternalListResult, SourceName } from '../core/result/types';
import type { HttpClient } from '../core/http/types';
import type { Logger } from '../observability/Logger';

export interface ListAdapter {
  readonly name: SourceName;

  /**
   * Pure predicate on scheme and host. The first registered adapter that
   * accepts a URL is the one that fetches it.
   */
  canHandle(url: string): boolean;

  /**
   * Fetches every page of the list behind `url`.
   *
   * @throws {ListConfigError} When a credential is missing or the URL cannot be
   * mapped to a request
   * @throws {FetchCancelledError} When `signal` is aborted
   */
  fetchList(url: string, signal?: AbortSignal): Promise<ExternalListResult>;
}

export interface AdapterDeps {
  http: HttpClient;
  logger: Logger;
}
