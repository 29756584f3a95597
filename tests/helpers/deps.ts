// tests/helpers/deps.ts

import { vi } from 'vitest';
import { HttpCore } from '../../src/core/http/HttpCore';
import type { RetryConfig } from '../../src/core/http/types';
import type { CoreDeps } from '../../src/connectors/types';
import type { BitbucketConnectorConfig } from '../../src/connectors/bitbucket/types';
import { Logger } from '../../src/observability/Logger';
import { MetricsCollector } from '../../src/observability/MetricsCollector';

export const BITBUCKET_HOST = 'http://bitbucket.test';
export const CATALOG_HOST = 'http://catalog.test';
export const API = '/rest/api/1.0';

export const TEST_RETRY: RetryConfig = {
  maxRetries: 2,
  baseDelay: 1,
  maxDelay: 5,
  retryableStatusCodes: [429, 500, 502, 503, 504],
};

export const TEST_BITBUCKET: BitbucketConnectorConfig = {
  baseUrl: BITBUCKET_HOST,
  username: 'sync-bot',
  password: 'test-password',
  pageSize: 25,
  readmePageSize: 500,
  readmePath: 'README.md',
};

/**
 * Real collaborators with a silenced, spied logger
 */
export function createTestDeps(): CoreDeps {
  const logger = new Logger({ level: 'error' });
  vi.spyOn(logger, 'debug').mockImplementation(() => undefined);
  vi.spyOn(logger, 'info').mockImplementation(() => undefined);
  vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
  vi.spyOn(logger, 'error').mockImplementation(() => undefined);

  const metrics = new MetricsCollector({ enabled: false });
  const http = new HttpCore({ timeout: 2000, retry: TEST_RETRY }, metrics, logger);

  return { http, logger, metrics, pageRetry: TEST_RETRY };
}

export function repositoryRecord(slug: string, projectKey: string): Record<string, unknown> {
  return {
    slug,
    name: `Repo ${slug}`,
    state: 'AVAILABLE',
    forkable: true,
    public: false,
    links: { self: [{ href: `${BITBUCKET_HOST}/projects/${projectKey}/repos/${slug}/browse` }] },
    project: { key: projectKey },
  };
}
