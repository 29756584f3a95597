// src/utils/errors.ts

export class SyncError extends Error {
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

export class ConfigError extends SyncError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
  }
}

// API errors
export class ApiError extends SyncError {
  constructor(
    message: string,
    public status: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'API_ERROR', { ...details, status });
  }
}

export class ApiClientError extends ApiError {
  constructor(message: string, status: number = 400, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_CLIENT_ERROR';
  }
}

export class ApiServerError extends ApiError {
  constructor(message: string, status: number = 500, details?: Record<string, unknown>) {
    super(message, status, details);
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
export class NetworkError extends SyncError {
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

// Pagination errors
export class MalformedPageError extends SyncError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'MALFORMED_PAGE', details);
  }
}

export class PaginationError extends SyncError {
  constructor(
    message: string,
    public readonly cause: unknown,
    details?: Record<string, unknown>
  ) {
    super(message, 'PAGINATION_FAILED', details);
  }
}

// Mapping errors
export class MappingError extends SyncError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'MAPPING_ERROR', details);
  }
}

// Catalog errors
export class CatalogAuthError extends SyncError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CATALOG_AUTH_ERROR', details);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
