// src/connectors/catalog/CatalogPublisher.ts

import { BaseConnector } from '../BaseConnector';
import type { CoreDeps } from '../types';
import type { Upstream } from '../../core/http/types';
import type { AuthCore } from '../../core/auth/AuthCore';
import type { NormalizedEntity } from '../../core/normalizer/types';
import type { PublishResult, PublishSummary } from './types';
import { ApiError, errorMessage } from '../../utils/errors';

/**
 * Delivers entities to the catalog with create-or-merge upserts.
 * Each entity is sent once; a failed upsert is logged and reported,
 * never retried and never thrown.
 */
export class CatalogPublisher extends BaseConnector {
  readonly name: Upstream = 'catalog';

  constructor(
    deps: CoreDeps,
    private auth: AuthCore,
    baseUrl: string
  ) {
    super(deps, baseUrl);
  }

  /**
   * Upsert one entity into `blueprintId`.
   *
   * @throws {CatalogAuthError} Only when no access token can be obtained
   */
  async publish(blueprintId: string, entity: NormalizedEntity): Promise<PublishResult> {
    const token = await this.auth.authenticate();
    const { identifier } = entity;

    try {
      const response = await this.deps.http.post(
        this.url(`/v1/blueprints/${encodeURIComponent(blueprintId)}/entities`),
        {
          identifier: entity.identifier,
          title: entity.title,
          properties: entity.properties,
          relations: entity.relations,
        },
        {
          upstream: this.name,
          headers: { Authorization: `Bearer ${token}` },
          query: { upsert: true, merge: true },
          retry: false,
        }
      );

      this.deps.metrics.incrementCounter('entities_published', { blueprint: blueprintId, status: 'ok' });
      this.deps.logger.debug('Entity upserted', { blueprint: blueprintId, identifier, status: response.status });

      return { ok: true, blueprint: blueprintId, identifier, status: response.status };
    } catch (error: unknown) {
      const status = error instanceof ApiError ? error.status : undefined;

      this.deps.metrics.incrementCounter('entities_published', { blueprint: blueprintId, status: 'failed' });
      this.deps.logger.error('Entity upsert failed', {
        blueprint: blueprintId,
        identifier,
        status,
        error: errorMessage(error),
      });

      return { ok: false, blueprint: blueprintId, identifier, status, error: errorMessage(error) };
    }
  }

  /**
   * Publish in order, one request at a time
   */
  async publishAll(blueprintId: string, entities: readonly NormalizedEntity[]): Promise<PublishSummary> {
    const summary: PublishSummary = { published: 0, failed: [] };

    for (const entity of entities) {
      const result = await this.publish(blueprintId, entity);
      if (result.ok) {
        summary.published++;
      } else {
        summary.failed.push(result.identifier);
      }
    }

    this.deps.logger.info('Blueprint published', {
      blueprint: blueprintId,
      published: summary.published,
      failed: summary.failed.length,
    });
    return summary;
  }
}
