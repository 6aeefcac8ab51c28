// src/utils/errors.ts

export class ExternalListError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// Configuration errors: fatal for the URL being fetched
export class ListConfigError extends ExternalListError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'LIST_CONFIG_ERROR', details);
  }
}

export class MissingCredentialError extends ListConfigError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'MISSING_CREDENTIAL';
  }
}

export class UnsupportedListUrlError extends ListConfigError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'UNSUPPORTED_LIST_URL';
  }
}

// API errors
export class ApiError extends ExternalListError {
  constructor(
    message: string,
    public status: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'API_ERROR', { ...details, status });
  }
}

function statusFrom(details: Record<string, unknown> | undefined, fallback: number): number {
  const status = details?.status;
  return typeof status === 'number' ? status : fallback;
}

export class ApiClientError extends ApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, statusFrom(details, 400), details);
    this.code = 'API_CLIENT_ERROR';
  }
}

export class ApiServerError extends ApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, statusFrom(details, 500), details);
    this.code = 'API_SERVER_ERROR';
  }
}

export class RateLimitError extends ApiError {
  constructor(
    message: string = 'Rate limit exceeded',
    public retryAfter?: number,
    details?: Record<string, unknown>
  ) {
    super(message, 429, { ...details, retryAfter });
    this.code = 'RATE_LIMIT_EXCEEDED';
  }
}

// Network errors
export class NetworkError extends ExternalListError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', details);
  }
}

export class NetworkTimeoutError extends NetworkError {
  constructor(message: string = 'Request timeout', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'NETWORK_TIMEOUT';
  }
}

// Payload errors
export class MalformedResponseError extends ExternalListError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'MALFORMED_RESPONSE', details);
  }
}

// Cancellation is the only error allowed to escape a prefetch
export class FetchCancelledError extends ExternalListError {
  constructor(message: string = 'External list fetch cancelled', details?: Record<string, unknown>) {
    super(message, 'FETCH_CANCELLED', details);
  }
}

/**
 * Soft failures stop pagination early but keep whatever was already collected.
 */
export function isSoftFetchFailure(error: unknown): error is ApiError | NetworkError | MalformedResponseError {
  return (
    error instanceof ApiError ||
    error instanceof NetworkError ||
    error instanceof MalformedResponseError
  );
}
