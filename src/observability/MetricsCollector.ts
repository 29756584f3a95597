// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram, Pushgateway } from 'prom-client';
import type { Logger } from './Logger';
import { errorMessage } from '../utils/errors';

export interface MetricsConfig {
  enabled?: boolean;
  pushgatewayUrl?: string;
  jobName?: string;
}

export class MetricsCollector {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();

  constructor(
    private config: MetricsConfig = {},
    private logger?: Logger
  ) {
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics();
    }
  }

  private initializeMetrics(): void {
    // HTTP metrics
    this.counters.set(
      'http_requests_total',
      new Counter({
        name: 'http_requests_total',
        help: 'Total HTTP requests',
        labelNames: ['upstream', 'method', 'status'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'http_request_duration',
      new Histogram({
        name: 'http_request_duration_seconds',
        help: 'HTTP request duration',
        labelNames: ['upstream', 'status'],
        buckets: [0.1, 0.5, 1, 2, 5],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'http_errors',
      new Counter({
        name: 'http_errors_total',
        help: 'HTTP errors',
        labelNames: ['upstream', 'status'],
        registers: [this.registry],
      })
    );

    // Pagination
    this.counters.set(
      'pages_fetched',
      new Counter({
        name: 'pages_fetched_total',
        help: 'Pages fetched from list endpoints',
        labelNames: ['dataKey'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'page_retries',
      new Counter({
        name: 'page_retries_total',
        help: 'Page fetches retried on the same cursor',
        labelNames: ['dataKey'],
        registers: [this.registry],
      })
    );

    // Sync
    this.counters.set(
      'entities_published',
      new Counter({
        name: 'entities_published_total',
        help: 'Catalog upserts by blueprint and outcome',
        labelNames: ['blueprint', 'status'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'projects_skipped',
      new Counter({
        name: 'projects_skipped_total',
        help: 'Projects whose repositories were skipped after a failure',
        labelNames: [],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'sync_duration',
      new Histogram({
        name: 'sync_duration_seconds',
        help: 'Full sync run duration',
        labelNames: ['status'],
        buckets: [1, 10, 30, 60, 300, 900],
        registers: [this.registry],
      })
    );
  }

  incrementCounter(name: string, labels: Record<string, string | number> = {}): void {
    const counter = this.counters.get(name);
    counter?.inc(labels);
  }

  recordLatency(name: string, durationMs: number, labels: Record<string, string | number>): void {
    const histogram = this.histograms.get(name);
    histogram?.observe(labels, durationMs / 1000);
  }

  /**
   * Pushes the registry to the configured Pushgateway. No-op without a URL.
   * A failed push is logged, never thrown.
   */
  async push(): Promise<void> {
    if (!this.config.pushgatewayUrl || this.config.enabled === false) {
      return;
    }

    const gateway = new Pushgateway(this.config.pushgatewayUrl, {}, this.registry);
    const jobName = this.config.jobName ?? 'bitbucket-catalog-sync';

    try {
      await gateway.pushAdd({ jobName });
      this.logger?.debug('Metrics pushed', { jobName, url: this.config.pushgatewayUrl });
    } catch (error: unknown) {
      this.logger?.warn('Metrics push failed', {
        url: this.config.pushgatewayUrl,
        error: errorMessage(error),
      });
    }
  }
}
