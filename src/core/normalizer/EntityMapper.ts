// src/core/normalizer/EntityMapper.ts

import { z } from 'zod';
import type { ProjectEntity, RepositoryEntity } from './types';
import type { ProjectRecord, RepositoryRecord } from './records';
import { MappingError } from '../../utils/errors';

// Validation schema (exported for JSON Schema generation)
export const NormalizedEntitySchema = z.object({
  identifier: z.string().min(1),
  title: z.string(),
  properties: z.record(z.union([z.string(), z.boolean(), z.null()])),
  relations: z.record(z.string().min(1)),
});

export const DEFAULT_SWAGGER_URL_TEMPLATE = 'https://api.{slug}.com';

export interface EntityMapperConfig {
  /** `{slug}` is replaced by the repository slug */
  swaggerUrlTemplate?: string;
}

/**
 * Fixed projection of validated Bitbucket records onto catalog entities.
 * Callers parse raw records with the schemas in `./records` first.
 * No I/O; the same input always yields the same entity.
 */
export class EntityMapper {
  private swaggerUrlTemplate: string;

  constructor(config: EntityMapperConfig = {}) {
    this.swaggerUrlTemplate = config.swaggerUrlTemplate ?? DEFAULT_SWAGGER_URL_TEMPLATE;
  }

  mapProject(project: ProjectRecord): ProjectEntity {
    return this.validate({
      identifier: project.key,
      title: project.name,
      properties: {
        description: project.description ?? null,
        type: project.type ?? null,
        public: project.public ?? null,
        link: project.links?.self?.[0]?.href ?? null,
      },
      relations: {},
    });
  }

  mapRepository(repo: RepositoryRecord, readmeText: string): RepositoryEntity {
    return this.validate({
      identifier: repo.slug,
      title: repo.name,
      properties: {
        description: repo.description ?? null,
        state: repo.state ?? null,
        forkable: repo.forkable ?? null,
        public: repo.public ?? null,
        link: repo.links?.self?.[0]?.href ?? null,
        documentation: readmeText,
        swagger_url: this.swaggerUrl(repo.slug),
      },
      relations: { project: repo.project.key },
    });
  }

  swaggerUrl(slug: string): string {
    return this.swaggerUrlTemplate.split('{slug}').join(slug);
  }

  private validate<E extends ProjectEntity | RepositoryEntity>(entity: E): E {
    const result = NormalizedEntitySchema.safeParse(entity);
    if (!result.success) {
      throw new MappingError('Schema validation failed', {
        identifier: entity.identifier,
        issues: describeIssues(result.error),
      });
    }
    return entity;
  }
}

function describeIssues(error: z.ZodError): string[] {
  return error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}
