// src/core/pagination/PaginatedFetcher.ts

import type { HttpCore } from '../http/HttpCore';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Cursor, Page, PaginatedFetcherOptions } from './types';
import { DEFAULT_DATA_KEY, DEFAULT_PAGE_SIZE } from './types';
import { RetryHandler } from '../http/RetryHandler';
import { MalformedPageError, PaginationError, errorMessage } from '../../utils/errors';

/**
 * Cursor pagination over one list-style endpoint. Pages are requested
 * strictly one after another and their records accumulated in order.
 */
export class PaginatedFetcher {
  private retryHandler: RetryHandler;

  constructor(
    private http: HttpCore,
    private logger: Logger,
    private metrics: MetricsCollector,
    private options: PaginatedFetcherOptions
  ) {
    this.retryHandler = new RetryHandler(options.retry, logger);
  }

  /**
   * Fetch every page of `baseUrl` and return the concatenated records.
   *
   * Only an absent or null `nextPageStart` ends the loop; an empty page
   * that still carries a cursor is followed. A page that keeps failing
   * after the bounded retries raises a PaginationError.
   */
  async fetch(
    baseUrl: string,
    pageSize: number = DEFAULT_PAGE_SIZE,
    dataKey: string = DEFAULT_DATA_KEY
  ): Promise<unknown[]> {
    const records: unknown[] = [];
    let cursor: Cursor | undefined;
    let pageCount = 0;

    do {
      const page = await this.fetchPage(baseUrl, cursor, pageSize, dataKey);
      pageCount++;
      this.metrics.incrementCounter('pages_fetched', { dataKey });

      this.collect(page, baseUrl, dataKey, records);
      cursor = page.nextPageStart ?? undefined;
    } while (cursor !== undefined);

    this.logger.debug('Pagination complete', { url: baseUrl, dataKey, pageCount, records: records.length });
    return records;
  }

  private async fetchPage(
    url: string,
    cursor: Cursor | undefined,
    pageSize: number,
    dataKey: string
  ): Promise<Page> {
    const query: Record<string, string | number> = { limit: pageSize };
    if (cursor !== undefined) {
      query.start = cursor;
    }

    let attempts = 0;

    try {
      return await this.retryHandler.execute(
        async (attempt) => {
          attempts = attempt + 1;
          if (attempt > 0) {
            this.metrics.incrementCounter('page_retries', { dataKey });
          }

          const response = await this.http.get(url, {
            upstream: this.options.upstream,
            auth: this.options.auth,
            query,
          });

          return this.toPage(response.data, url, cursor);
        },
        `page ${url}`,
        (error) => error instanceof MalformedPageError
      );
    } catch (error: unknown) {
      throw new PaginationError(`Failed to fetch page of ${url}: ${errorMessage(error)}`, error, {
        url,
        cursor,
        attempts,
      });
    }
  }

  private toPage(data: unknown, url: string, cursor: Cursor | undefined): Page {
    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
      throw new MalformedPageError('Page body is not a JSON object', { url, cursor });
    }

    const nextPageStart: unknown = Reflect.get(data, 'nextPageStart');
    if (
      nextPageStart !== undefined &&
      nextPageStart !== null &&
      typeof nextPageStart !== 'number' &&
      typeof nextPageStart !== 'string'
    ) {
      throw new MalformedPageError('Page cursor is not a number or string', { url, cursor });
    }

    return { ...data, nextPageStart };
  }

  private collect(page: Page, url: string, dataKey: string, records: unknown[]): void {
    if (!(dataKey in page)) {
      this.logger.warn('Page has no data key, treating as empty', { url, dataKey });
      return;
    }

    const items = page[dataKey];
    if (!Array.isArray(items)) {
      this.logger.warn('Page data is not a list, skipping', { url, dataKey, type: typeof items });
      return;
    }

    records.push(...items);
  }
}
