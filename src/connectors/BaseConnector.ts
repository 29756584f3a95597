// src/connectors/BaseConnector.ts

import type { Connector, CoreDeps } from './types';
import type { Upstream } from '../core/http/types';

export abstract class BaseConnector implements Connector {
  abstract readonly name: Upstream;

  constructor(
    protected deps: CoreDeps,
    protected readonly baseUrl: string
  ) {}

  /**
   * Resolve an API path against the connector's base URL
   */
  protected url(path: string): string {
    return `${this.baseUrl.replace(/\/+$/, '')}${path}`;
  }
}
