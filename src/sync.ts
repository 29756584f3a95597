// src/sync.ts

import { v4 as uuidv4 } from 'uuid';
import type { ProjectRecord } from './core/normalizer/records';
import { ProjectRecordSchema } from './core/normalizer/records';
import type { NormalizedEntity, ProjectEntity } from './core/normalizer/types';
import type { PublishSummary } from './connectors/catalog/types';
import type { CoreDeps } from './connectors/types';
import { HttpCore } from './core/http/HttpCore';
import { AuthCore } from './core/auth/AuthCore';
import { EntityMapper } from './core/normalizer/EntityMapper';
import { HierarchyWalker } from './core/walker/HierarchyWalker';
import { BitbucketConnector } from './connectors/bitbucket/BitbucketConnector';
import { CatalogPublisher } from './connectors/catalog/CatalogPublisher';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import { withSpan } from './observability/tracing';
import type { SyncConfig } from './config/ConfigValidator';
import { validateConfigSafe } from './config/ConfigValidator';
import { ConfigError, errorMessage } from './utils/errors';

export interface SyncReport {
  runId: string;
  dryRun: boolean;
  projects: {
    fetched: number;
    mapped: number;
    published: number;
    failed: string[];
  };
  repositories: {
    mapped: number;
    published: number;
    failed: string[];
  };
  /** Projects whose repositories were dropped by the walk */
  skippedProjects: string[];
  durationMs: number;
}

interface SyncDeps extends CoreDeps {
  auth: AuthCore;
  mapper: EntityMapper;
  bitbucket: BitbucketConnector;
  publisher: CatalogPublisher;
  walker: HierarchyWalker;
}

export class CatalogSync {
  private core: SyncDeps;

  private constructor(private config: SyncConfig) {
    const logger = new Logger(config.logging);
    const metrics = new MetricsCollector(config.metrics, logger);
    const http = new HttpCore(config.http, metrics, logger);
    const base: CoreDeps = { http, logger, metrics, pageRetry: config.http.retry };

    const auth = new AuthCore(http, config.catalog.baseUrl, config.catalog, logger);
    const mapper = new EntityMapper(config.mapping);
    const bitbucket = new BitbucketConnector(base, config.bitbucket);
    const publisher = new CatalogPublisher(base, auth, config.catalog.baseUrl);
    const walker = new HierarchyWalker(bitbucket, mapper, logger, metrics);

    this.core = { ...base, auth, mapper, bitbucket, publisher, walker };
  }

  /**
   * Validate configuration and build a sync instance
   *
   * @throws {ConfigError} If the configuration is invalid
   *
   * @example
   * ```typescript
   * const sync = CatalogSync.init({
   *   bitbucket: {
   *     baseUrl: 'https://bitbucket.example.com',
   *     username: 'sync-bot',
   *     password: process.env.BITBUCKET_PASSWORD,
   *   },
   *   catalog: {
   *     clientId: process.env.CATALOG_CLIENT_ID,
   *     clientSecret: process.env.CATALOG_CLIENT_SECRET,
   *   },
   * });
   * const report = await sync.run();
   * ```
   */
  static init(config: unknown): CatalogSync {
    const result = validateConfigSafe(config);
    if (!result.success) {
      throw new ConfigError(`Invalid configuration: ${result.errors.join('; ')}`, {
        errors: result.errors,
      });
    }
    return new CatalogSync(result.data);
  }

  /**
   * Run one full sync: projects first, then every project's repositories.
   *
   * Resolves once the run completes, however many items were skipped.
   * Rejects only when the catalog token or the project list cannot be
   * obtained.
   */
  async run(): Promise<SyncReport> {
    const { logger, metrics } = this.core;
    const runId = uuidv4();
    const startTime = Date.now();
    const dryRun = this.config.dryRun;

    logger.info('Sync started', { runId, bitbucket: this.config.bitbucket.baseUrl, dryRun });

    try {
      const report = await withSpan('Sync run', () => this.execute(runId, dryRun, startTime), {
        'sync.run_id': runId,
      });

      metrics.recordLatency('sync_duration', report.durationMs, { status: 'completed' });
      logger.info('Sync completed', { ...report });
      return report;
    } catch (error: unknown) {
      metrics.recordLatency('sync_duration', Date.now() - startTime, { status: 'failed' });
      logger.error('Sync failed', { runId, error: errorMessage(error) });
      throw error;
    } finally {
      await metrics.push();
    }
  }

  private async execute(runId: string, dryRun: boolean, startTime: number): Promise<SyncReport> {
    const { auth, bitbucket, walker } = this.core;
    const { blueprints } = this.config.catalog;

    if (!dryRun) {
      await auth.authenticate();
    }

    const rawProjects = await bitbucket.listProjects();
    const projects = this.mapProjects(rawProjects);
    const projectSummary = await this.publish(blueprints.project, projects.entities, dryRun);

    const walk = await walker.walk(projects.records);
    const repositorySummary = await this.publish(blueprints.repository, walk.repositories, dryRun);

    return {
      runId,
      dryRun,
      projects: {
        fetched: rawProjects.length,
        mapped: projects.entities.length,
        published: projectSummary.published,
        failed: projectSummary.failed,
      },
      repositories: {
        mapped: walk.repositories.length,
        published: repositorySummary.published,
        failed: repositorySummary.failed,
      },
      skippedProjects: walk.failedProjects,
      durationMs: Date.now() - startTime,
    };
  }

  /**
   * Map raw projects one by one; a record that fails to map is logged and
   * left out, together with its repositories.
   */
  private mapProjects(rawProjects: readonly unknown[]): {
    records: ProjectRecord[];
    entities: ProjectEntity[];
  } {
    const records: ProjectRecord[] = [];
    const entities: ProjectEntity[] = [];

    rawProjects.forEach((raw, index) => {
      const parsed = ProjectRecordSchema.safeParse(raw);
      if (!parsed.success) {
        this.core.logger.warn('Skipping invalid project record', {
          index,
          issues: parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        });
        return;
      }

      try {
        entities.push(this.core.mapper.mapProject(parsed.data));
        records.push(parsed.data);
      } catch (error: unknown) {
        this.core.logger.warn('Skipping unmappable project', {
          projectKey: parsed.data.key,
          error: errorMessage(error),
        });
      }
    });

    return { records, entities };
  }

  private async publish(
    blueprintId: string,
    entities: readonly NormalizedEntity[],
    dryRun: boolean
  ): Promise<PublishSummary> {
    if (!dryRun) {
      return this.core.publisher.publishAll(blueprintId, entities);
    }

    for (const entity of entities) {
      this.core.logger.debug('Dry run, not publishing', { blueprint: blueprintId, entity });
    }
    return { published: 0, failed: [] };
  }
}
