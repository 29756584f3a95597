// src/core/http/types.ts

export type Upstream = 'bitbucket' | 'catalog';

export interface BasicAuth {
  username: string;
  password: string;
}

export interface HttpRequestConfig {
  url: string;
  upstream: Upstream;
  method?: 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean>;
  body?: unknown;
  auth?: BasicAuth;
  timeout?: number;
  retry?: boolean; // false sends the request exactly once
}

export interface HttpResponse<T = unknown> {
  data: T;
  status: number;
  headers: Record<string, string>;
}

export interface RateLimitConfig {
  qps: number; // Requests per second
}

export interface RetryConfig {
  maxRetries: number;
  baseDelay: number; // milliseconds
  maxDelay: number;
  retryableStatusCodes: number[];
}

export interface HttpCoreConfig {
  timeout?: number;
  retry: RetryConfig;
  rateLimits?: Partial<Record<Upstream, RateLimitConfig>>;
}
