// src/core/http/HttpCore.ts

import axios, { AxiosInstance, isAxiosError } from 'axios';
import * as http from 'http';
import * as https from 'https';
import PQueue from 'p-queue';
import { v4 as uuidv4 } from 'uuid';
import type { HttpCoreConfig, HttpRequestConfig, HttpResponse, Upstream } from './types';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import { RetryHandler } from './RetryHandler';
import {
  ApiClientError,
  ApiServerError,
  NetworkTimeoutError,
  NetworkError,
  RateLimitError,
} from '../../utils/errors';
import { withHttpSpan } from '../../observability/tracing';

export class HttpCore {
  private axiosInstance: AxiosInstance;
  private rateLimiters: Map<Upstream, PQueue> = new Map();
  private retryHandler: RetryHandler;

  constructor(
    private config: HttpCoreConfig,
    private metrics: MetricsCollector,
    private logger: Logger
  ) {
    this.retryHandler = new RetryHandler(config.retry, logger);

    this.axiosInstance = axios.create({
      timeout: config.timeout ?? 30000,
      httpAgent: new http.Agent({ keepAlive: true }),
      httpsAgent: new https.Agent({ keepAlive: true }),
    });

    this.initializeRateLimiters();
  }

  async get<T = unknown>(
    url: string,
    config: Omit<HttpRequestConfig, 'url' | 'method'>
  ): Promise<HttpResponse<T>> {
    return this.request<T>({ ...config, url, method: 'GET' });
  }

  async post<T = unknown>(
    url: string,
    body: unknown,
    config: Omit<HttpRequestConfig, 'url' | 'method' | 'body'>
  ): Promise<HttpResponse<T>> {
    return this.request<T>({ ...config, url, method: 'POST', body });
  }

  async request<T = unknown>(config: HttpRequestConfig): Promise<HttpResponse<T>> {
    const { upstream } = config;
    const requestId = uuidv4();
    const method = config.method ?? 'GET';

    this.logger.debug('HTTP request', {
      requestId,
      upstream,
      url: config.url,
      method,
      query: config.query,
      headerKeys: Object.keys(config.headers ?? {}),
    });

    const headers: Record<string, string> = {
      'X-Request-ID': requestId,
      'User-Agent': 'bitbucket-catalog-sync/1.0',
      Accept: 'application/json',
      ...config.headers,
    };

    const send = () =>
      this.axiosInstance.request<T>({
        url: config.url,
        method,
        headers,
        params: config.query,
        data: config.body,
        auth: config.auth,
        timeout: config.timeout,
      });

    const execute = async (): Promise<HttpResponse<T>> => {
      return withHttpSpan(method, config.url, async () => {
        const startTime = Date.now();

        try {
          const axiosResponse =
            config.retry === false
              ? await send()
              : await this.retryHandler.execute(send, `${upstream} ${method}`);

          this.metrics.incrementCounter('http_requests_total', {
            upstream,
            method,
            status: axiosResponse.status.toString(),
          });
          this.metrics.recordLatency('http_request_duration', Date.now() - startTime, {
            upstream,
            status: axiosResponse.status,
          });

          return {
            data: axiosResponse.data,
            status: axiosResponse.status,
            headers: this.toHeaderRecord(axiosResponse.headers),
          };
        } catch (error: unknown) {
          const errorStatus = isAxiosError(error) ? error.response?.status ?? 'error' : 'error';

          this.metrics.incrementCounter('http_requests_total', {
            upstream,
            method,
            status: errorStatus.toString(),
          });
          this.metrics.incrementCounter('http_errors', { upstream, status: errorStatus });

          throw this.transformError(error, upstream, config.url);
        }
      });
    };

    return this.runThroughRateLimiter(upstream, execute);
  }

  private async runThroughRateLimiter<T>(upstream: Upstream, task: () => Promise<T>): Promise<T> {
    const queue = this.rateLimiters.get(upstream);

    if (!queue) {
      return task();
    }

    return queue.add(task);
  }

  /**
   * One queue per upstream, concurrency 1: requests to an upstream never
   * overlap. A configured qps additionally caps the request rate.
   */
  private initializeRateLimiters(): void {
    const upstreams: readonly Upstream[] = ['bitbucket', 'catalog'];

    for (const upstream of upstreams) {
      const limit = this.config.rateLimits?.[upstream];

      if (!limit) {
        this.rateLimiters.set(upstream, new PQueue({ concurrency: 1 }));
        continue;
      }

      // Fractional qps becomes one request per (1000 / qps) ms
      const intervalCap = limit.qps >= 1 ? Math.floor(limit.qps) : 1;
      const interval = limit.qps >= 1 ? 1000 : Math.floor(1000 / limit.qps);

      this.rateLimiters.set(upstream, new PQueue({ concurrency: 1, intervalCap, interval }));

      this.logger.debug('Rate limiter initialized', { upstream, qps: limit.qps, intervalCap, interval });
    }
  }

  private toHeaderRecord(headers: object): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === 'string') {
        record[key.toLowerCase()] = value;
      }
    }
    return record;
  }

  private transformError(error: unknown, upstream: Upstream, url: string): Error {
    if (!isAxiosError(error)) {
      return error instanceof Error ? error : new NetworkError(String(error), { upstream, url });
    }

    if (error.response) {
      const status = error.response.status;

      this.logger.debug('HTTP error response', {
        upstream,
        url,
        status,
        statusText: error.response.statusText,
        data: error.response.data,
      });

      if (status === 429) {
        const retryAfter = Number(error.response.headers?.['retry-after']);
        return new RateLimitError('Rate limit exceeded', isNaN(retryAfter) ? undefined : retryAfter, {
          upstream,
          url,
        });
      }
      if (status >= 400 && status < 500) {
        return new ApiClientError(`Client error: ${status}`, status, {
          upstream,
          url,
          response: error.response.data,
        });
      }
      if (status >= 500) {
        return new ApiServerError(`Server error: ${status}`, status, { upstream, url });
      }
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new NetworkTimeoutError('Request timeout', { upstream, url });
    }
    return new NetworkError(`Network error: ${error.message}`, { upstream, url, code: error.code });
  }
}
