// src/core/normalizer/types.ts

export type PropertyValue = string | boolean | null;

/**
 * Catalog entity. `identifier` is the upstream's stable key, so the same
 * record always upserts the same entity.
 */
export interface NormalizedEntity<P extends Record<string, PropertyValue> = Record<string, PropertyValue>> {
  identifier: string;
  title: string;
  properties: P;
  relations: Record<string, string>;
}

export type ProjectProperties = {
  description: string | null;
  type: string | null;
  public: boolean | null;
  link: string | null;
};

export type RepositoryProperties = {
  description: string | null;
  state: string | null;
  forkable: boolean | null;
  public: boolean | null;
  link: string | null;
  documentation: string;
  swagger_url: string;
};

export type ProjectEntity = NormalizedEntity<ProjectProperties>;
export type RepositoryEntity = NormalizedEntity<RepositoryProperties>;
