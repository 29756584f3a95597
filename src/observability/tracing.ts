/**
 * OpenTelemetry Tracing (Opt-in)
 *
 * Spans around HTTP calls, per-project traversal and the whole sync run.
 * No-op unless enabled.
 *
 * Enable via environment variables:
 * - OTEL_ENABLED=1
 * - OTEL_SERVICE_NAME=bitbucket-catalog-sync
 * - OTEL_EXPORTER_OTLP_ENDPOINT=http://localhost:4318/v1/traces
 */

import { trace, SpanStatusCode, SpanKind, Span } from '@opentelemetry/api';
import { errorMessage } from '../utils/errors';

const TRACER_NAME = 'bitbucket-catalog-sync';

type ShutdownHook = () => Promise<void>;

export function isOTelEnabled(): boolean {
  return process.env.OTEL_ENABLED === '1' || process.env.OTEL_ENABLED === 'true';
}

export function getTracer() {
  if (!isOTelEnabled()) {
    return null;
  }
  return trace.getTracer(TRACER_NAME);
}

/**
 * Execute a function within a span
 *
 * @param name - Span name
 * @param fn - Function to execute
 * @param attributes - Optional span attributes
 * @returns Result of fn
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span | null) => Promise<T>,
  attributes?: Record<string, string | number | boolean>
): Promise<T> {
  const tracer = getTracer();

  if (!tracer) {
    return fn(null);
  }

  return tracer.startActiveSpan(name, async (span) => {
    try {
      if (attributes) {
        Object.entries(attributes).forEach(([key, value]) => {
          span.setAttribute(key, value);
        });
      }

      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error: unknown) {
      if (error instanceof Error) {
        span.recordException(error);
      }
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: errorMessage(error),
      });
      throw error;
    } finally {
      span.end();
    }
  });
}

export async function withHttpSpan<T>(
  method: string,
  url: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`HTTP ${method}`, fn, {
    'http.method': method,
    'http.url': url,
    'span.kind': SpanKind.CLIENT,
  });
}

/**
 * Span for one project of the repository walk
 */
export async function withProjectSpan<T>(
  projectKey: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan('Walk project', fn, { 'bitbucket.project_key': projectKey });
}

/**
 * Initialize the OpenTelemetry SDK (call once, before the run starts).
 *
 * @returns a shutdown hook that flushes pending spans, or null when disabled
 */
export async function initializeTracing(): Promise<ShutdownHook | null> {
  if (!isOTelEnabled()) {
    return null;
  }

  // Loaded lazily so the SDK stays out of runs with tracing off
  const { NodeSDK } = await import('@opentelemetry/sdk-node');
  const { OTLPTraceExporter } = await import('@opentelemetry/exporter-trace-otlp-http');

  const serviceName = process.env.OTEL_SERVICE_NAME || TRACER_NAME;
  const otlpEndpoint =
    process.env.OTEL_EXPORTER_OTLP_ENDPOINT || 'http://localhost:4318/v1/traces';

  const sdk = new NodeSDK({
    serviceName,
    traceExporter: new OTLPTraceExporter({ url: otlpEndpoint }),
  });

  sdk.start();

  return () => sdk.shutdown();
}
