// src/core/pagination/types.ts

import type { BasicAuth, RetryConfig, Upstream } from '../http/types';

/** Opaque position token returned by the upstream as `nextPageStart` */
export type Cursor = number | string;

/**
 * One page of a list endpoint. Records live under a caller-chosen key
 * (`values` for collections, `lines` for file content).
 */
export interface Page {
  nextPageStart?: Cursor | null;
  [key: string]: unknown;
}

export interface PaginatedFetcherOptions {
  upstream: Upstream;
  auth?: BasicAuth;
  /** Same-cursor retries for pages whose body is not a JSON object */
  retry: RetryConfig;
}

export const DEFAULT_PAGE_SIZE = 25;
export const DEFAULT_DATA_KEY = 'values';
