// src/connectors/catalog/types.ts

export const DEFAULT_CATALOG_URL = 'https://api.getport.io';

export interface BlueprintIds {
  project: string;
  repository: string;
}

export interface PublishResult {
  ok: boolean;
  blueprint: string;
  identifier: string;
  status?: number;
  error?: string;
}

export interface PublishSummary {
  published: number;
  /** Identifiers whose upsert failed */
  failed: string[];
}
