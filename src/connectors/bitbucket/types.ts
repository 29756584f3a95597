// src/connectors/bitbucket/types.ts

/** REST root of a Bitbucket Server instance, relative to its host */
export const BITBUCKET_API_PATH = '/rest/api/1.0';

export interface BitbucketConnectorConfig {
  /** Host URL, e.g. https://bitbucket.example.com */
  baseUrl: string;
  username: string;
  password: string;
  pageSize: number;
  readmePageSize: number;
  readmePath: string;
}
