// src/connectors/types.ts

import type { HttpCore } from '../core/http/HttpCore';
import type { RetryConfig, Upstream } from '../core/http/types';
import type { Logger } from '../observability/Logger';
import type { MetricsCollector } from '../observability/MetricsCollector';

export interface Connector {
  readonly name: Upstream;
}

export interface CoreDeps {
  http: HttpCore;
  logger: Logger;
  metrics: MetricsCollector;
  /** Same-cursor retry policy for list endpoints */
  pageRetry: RetryConfig;
}
