// src/index.ts

export { CatalogSync } from './sync';
export type { SyncReport } from './sync';
export {
  SyncConfigSchema,
  validateConfig,
  validateConfigSafe,
  loadConfigFromEnv,
} from './config/ConfigValidator';
export type { SyncConfig, SyncConfigInput } from './config/ConfigValidator';
export { PaginatedFetcher } from './core/pagination/PaginatedFetcher';
export type { Page, Cursor } from './core/pagination/types';
export { assembleReadme, parseReadmeLines } from './core/readme/ReadmeAssembler';
export type { ReadmeLine } from './core/readme/ReadmeAssembler';
export { EntityMapper, NormalizedEntitySchema } from './core/normalizer/EntityMapper';
export type {
  NormalizedEntity,
  ProjectEntity,
  RepositoryEntity,
} from './core/normalizer/types';
export type { ProjectRecord, RepositoryRecord } from './core/normalizer/records';
export { HierarchyWalker } from './core/walker/HierarchyWalker';
export type { WalkResult } from './core/walker/HierarchyWalker';
export { CatalogPublisher } from './connectors/catalog/CatalogPublisher';
export type { PublishResult, PublishSummary } from './connectors/catalog/types';
export { BitbucketConnector } from './connectors/bitbucket/BitbucketConnector';

// Export error classes for error handling
export {
  SyncError,
  ConfigError,
  ApiError,
  ApiClientError,
  ApiServerError,
  RateLimitError,
  NetworkError,
  NetworkTimeoutError,
  MalformedPageError,
  PaginationError,
  MappingError,
  CatalogAuthError,
} from './utils/errors';
