// src/connectors/bitbucket/BitbucketConnector.ts

import { BaseConnector } from '../BaseConnector';
import type { CoreDeps } from '../types';
import type { Upstream } from '../../core/http/types';
import type { BitbucketConnectorConfig } from './types';
import { BITBUCKET_API_PATH } from './types';
import { PaginatedFetcher } from '../../core/pagination/PaginatedFetcher';
import { README_DATA_KEY, assembleReadme, parseReadmeLines } from '../../core/readme/ReadmeAssembler';
import { ApiClientError, PaginationError } from '../../utils/errors';

/**
 * Read-only client for the Bitbucket Server REST API (`/rest/api/1.0`).
 * Every request carries HTTP basic auth.
 */
export class BitbucketConnector extends BaseConnector {
  readonly name: Upstream = 'bitbucket';
  private fetcher: PaginatedFetcher;

  constructor(
    deps: CoreDeps,
    private config: BitbucketConnectorConfig
  ) {
    super(deps, `${config.baseUrl.replace(/\/+$/, '')}${BITBUCKET_API_PATH}`);

    this.fetcher = new PaginatedFetcher(deps.http, deps.logger, deps.metrics, {
      upstream: this.name,
      auth: { username: config.username, password: config.password },
      retry: deps.pageRetry,
    });
  }

  /** Raw project records, in server order */
  async listProjects(): Promise<unknown[]> {
    return this.fetcher.fetch(this.url('/projects'), this.config.pageSize);
  }

  /** Raw repository records of one project, in server order */
  async listRepositories(projectKey: string): Promise<unknown[]> {
    return this.fetcher.fetch(
      this.url(`/projects/${encodeURIComponent(projectKey)}/repos`),
      this.config.pageSize
    );
  }

  /**
   * Line records of a file on the default branch. A file the server
   * does not have (404) yields no lines.
   */
  async readFileLines(projectKey: string, slug: string, path: string): Promise<unknown[]> {
    const filePath = path.split('/').filter(Boolean).map(encodeURIComponent).join('/');
    const url = this.url(
      `/projects/${encodeURIComponent(projectKey)}/repos/${encodeURIComponent(slug)}/browse/${filePath}`
    );

    try {
      return await this.fetcher.fetch(url, this.config.readmePageSize, README_DATA_KEY);
    } catch (error: unknown) {
      if (
        error instanceof PaginationError &&
        error.cause instanceof ApiClientError &&
        error.cause.status === 404
      ) {
        this.deps.logger.debug('File not found', { projectKey, slug, path });
        return [];
      }
      throw error;
    }
  }

  /** README text of a repository, empty when there is none */
  async readReadme(projectKey: string, slug: string): Promise<string> {
    const lines = await this.readFileLines(projectKey, slug, this.config.readmePath);
    return assembleReadme(parseReadmeLines(lines));
  }
}
