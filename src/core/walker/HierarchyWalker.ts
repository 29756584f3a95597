// src/core/walker/HierarchyWalker.ts

import type { BitbucketConnector } from '../../connectors/bitbucket/BitbucketConnector';
import type { EntityMapper } from '../normalizer/EntityMapper';
import type { ProjectRecord } from '../normalizer/records';
import { RepositoryRecordSchema } from '../normalizer/records';
import type { RepositoryEntity } from '../normalizer/types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { withProjectSpan } from '../../observability/tracing';
import { MappingError, errorMessage } from '../../utils/errors';

export interface WalkResult {
  repositories: RepositoryEntity[];
  /** Keys of projects whose repositories were dropped */
  failedProjects: string[];
}

/**
 * Projects → repositories → README traversal.
 *
 * A project is all-or-nothing: any failure while listing its repositories,
 * reading one README or mapping one repository drops every repository of
 * that project and the walk moves on to the next project.
 */
export class HierarchyWalker {
  constructor(
    private bitbucket: BitbucketConnector,
    private mapper: EntityMapper,
    private logger: Logger,
    private metrics: MetricsCollector
  ) {}

  async walk(projects: readonly ProjectRecord[]): Promise<WalkResult> {
    const result: WalkResult = { repositories: [], failedProjects: [] };

    for (const project of projects) {
      try {
        const repositories = await withProjectSpan(project.key, () => this.walkProject(project.key));
        result.repositories.push(...repositories);
      } catch (error: unknown) {
        result.failedProjects.push(project.key);
        this.metrics.incrementCounter('projects_skipped');
        this.logger.error('Skipping project after failure', {
          projectKey: project.key,
          error: errorMessage(error),
        });
      }
    }

    return result;
  }

  private async walkProject(projectKey: string): Promise<RepositoryEntity[]> {
    const rawRepositories = await this.bitbucket.listRepositories(projectKey);
    const entities: RepositoryEntity[] = [];

    for (const raw of rawRepositories) {
      const parsed = RepositoryRecordSchema.safeParse(raw);
      if (!parsed.success) {
        throw new MappingError('Invalid repository record', { projectKey });
      }

      const readme = await this.bitbucket.readReadme(projectKey, parsed.data.slug);
      entities.push(this.mapper.mapRepository(parsed.data, readme));
    }

    this.logger.info('Project walked', { projectKey, repositories: entities.length });
    return entities;
  }
}
