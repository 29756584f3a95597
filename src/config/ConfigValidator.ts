// src/config/ConfigValidator.ts

import { z } from 'zod';
import { DEFAULT_SWAGGER_URL_TEMPLATE } from '../core/normalizer/EntityMapper';
import { DEFAULT_CATALOG_URL } from '../connectors/catalog/types';
import { README_PAGE_SIZE } from '../core/readme/ReadmeAssembler';
import { DEFAULT_PAGE_SIZE } from '../core/pagination/types';

export const DEFAULT_RETRY_CONFIG = {
  maxRetries: 3,
  baseDelay: 1000,
  maxDelay: 10000,
  retryableStatusCodes: [429, 500, 502, 503, 504],
};

// Retry Configuration Schema
const RetryConfigSchema = z
  .object({
    maxRetries: z.number().int().min(0).max(10),
    baseDelay: z.number().positive(),
    maxDelay: z.number().positive(),
    retryableStatusCodes: z.array(z.number().int().min(100).max(599)),
  })
  .refine((data) => data.maxDelay >= data.baseDelay, {
    message: 'maxDelay must be greater than or equal to baseDelay',
  });

// Rate Limit Configuration Schema
const RateLimitConfigSchema = z.object({
  qps: z.number().positive(),
});

const BitbucketConfigSchema = z.object({
  baseUrl: z.string().url(),
  username: z.string().min(1),
  password: z.string().min(1),
  pageSize: z.number().int().positive().default(DEFAULT_PAGE_SIZE),
  readmePageSize: z.number().int().positive().default(README_PAGE_SIZE),
  readmePath: z.string().min(1).default('README.md'),
});

const CatalogConfigSchema = z.object({
  baseUrl: z.string().url().default(DEFAULT_CATALOG_URL),
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
  blueprints: z
    .object({
      project: z.string().min(1).default('project'),
      repository: z.string().min(1).default('repository'),
    })
    .default({}),
});

const MappingConfigSchema = z
  .object({
    swaggerUrlTemplate: z
      .string()
      .includes('{slug}', { message: 'swaggerUrlTemplate must contain {slug}' })
      .default(DEFAULT_SWAGGER_URL_TEMPLATE),
  })
  .default({});

const HttpConfigSchema = z
  .object({
    timeout: z.number().positive().optional(),
    retry: RetryConfigSchema.default(DEFAULT_RETRY_CONFIG),
    rateLimits: z
      .object({
        bitbucket: RateLimitConfigSchema.optional(),
        catalog: RateLimitConfigSchema.optional(),
      })
      .optional(),
  })
  .default({});

// Logger Configuration Schema
const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['json', 'pretty']).optional(),
  })
  .optional();

// Metrics Configuration Schema
const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
    pushgatewayUrl: z.string().url().optional(),
    jobName: z.string().min(1).optional(),
  })
  .optional();

export const SyncConfigSchema = z.object({
  bitbucket: BitbucketConfigSchema,
  catalog: CatalogConfigSchema,
  mapping: MappingConfigSchema,
  http: HttpConfigSchema,
  logging: LoggerConfigSchema,
  metrics: MetricsConfigSchema,
  dryRun: z.boolean().default(false),
});

/** Configuration after validation, defaults applied */
export type SyncConfig = z.infer<typeof SyncConfigSchema>;
/** Configuration as callers write it */
export type SyncConfigInput = z.input<typeof SyncConfigSchema>;

/**
 * Validate sync configuration
 *
 * @throws {z.ZodError} If configuration is invalid
 */
export function validateConfig(config: unknown): SyncConfig {
  return SyncConfigSchema.parse(config);
}

/**
 * Validate configuration and return user-friendly errors
 */
export function validateConfigSafe(
  config: unknown
): { success: true; data: SyncConfig } | { success: false; errors: string[] } {
  const result = SyncConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
  };
}

/**
 * Build a configuration from environment variables. The result still has
 * to be validated: missing required variables surface as validation errors.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): SyncConfigInput {
  const logLevel = env.LOG_LEVEL;
  const logFormat = env.LOG_FORMAT;

  return {
    bitbucket: {
      baseUrl: env.BITBUCKET_HOST ?? '',
      username: env.BITBUCKET_USERNAME ?? '',
      password: env.BITBUCKET_PASSWORD ?? '',
      pageSize: optionalNumber(env.SYNC_PAGE_SIZE),
      readmePageSize: optionalNumber(env.SYNC_README_PAGE_SIZE),
      readmePath: optionalString(env.SYNC_README_PATH),
    },
    catalog: {
      baseUrl: optionalString(env.CATALOG_API_URL),
      clientId: env.CATALOG_CLIENT_ID ?? '',
      clientSecret: env.CATALOG_CLIENT_SECRET ?? '',
      blueprints: {
        project: optionalString(env.CATALOG_PROJECT_BLUEPRINT),
        repository: optionalString(env.CATALOG_REPOSITORY_BLUEPRINT),
      },
    },
    mapping: {
      swaggerUrlTemplate: optionalString(env.SYNC_SWAGGER_URL_TEMPLATE),
    },
    http: {
      timeout: optionalNumber(env.HTTP_TIMEOUT_MS),
      rateLimits: {
        bitbucket: rateLimit(env.BITBUCKET_RATE_LIMIT_QPS),
        catalog: rateLimit(env.CATALOG_RATE_LIMIT_QPS),
      },
    },
    logging: {
      level: logLevel === 'debug' || logLevel === 'info' || logLevel === 'warn' || logLevel === 'error'
        ? logLevel
        : undefined,
      format: logFormat === 'json' || logFormat === 'pretty' ? logFormat : undefined,
    },
    metrics: {
      pushgatewayUrl: optionalString(env.METRICS_PUSHGATEWAY_URL),
    },
    dryRun: env.SYNC_DRY_RUN === 'true' || env.SYNC_DRY_RUN === '1',
  };
}

function optionalString(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

function optionalNumber(value: string | undefined): number | undefined {
  return value === undefined || value === '' ? undefined : Number(value);
}

function rateLimit(value: string | undefined): { qps: number } | undefined {
  const qps = optionalNumber(value);
  return qps === undefined ? undefined : { qps };
}
