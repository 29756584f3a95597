// src/observability/Logger.ts

import winston from 'winston';

export interface LoggerConfig {
  level?: 'debug' | 'info' | 'warn' | 'error';
  format?: 'json' | 'pretty';
}

const SENSITIVE_KEYS = new Set(['password', 'clientSecret', 'accessToken', 'authorization']);

export class Logger {
  private logger: winston.Logger;

  constructor(config: LoggerConfig = {}) {
    const format =
      config.format === 'pretty'
        ? winston.format.combine(winston.format.colorize(), winston.format.simple())
        : winston.format.combine(winston.format.timestamp(), winston.format.json());

    this.logger = winston.createLogger({
      level: config.level ?? 'info',
      format,
      transports: [new winston.transports.Console()],
    });
  }

  /**
   * Masks credential fields at the top level and one level down
   * (e.g. `{ headers: { authorization } }`).
   */
  private redactSensitive(obj: Record<string, unknown>): Record<string, unknown> {
    const redacted: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(obj)) {
      if (SENSITIVE_KEYS.has(key)) {
        redacted[key] = '[REDACTED]';
      } else if (isPlainObject(value)) {
        const nested: Record<string, unknown> = {};
        for (const [nestedKey, nestedValue] of Object.entries(value)) {
          nested[nestedKey] = SENSITIVE_KEYS.has(nestedKey) ? '[REDACTED]' : nestedValue;
        }
        redacted[key] = nested;
      } else {
        redacted[key] = value;
      }
    }

    return redacted;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta ? this.redactSensitive(meta) : {});
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta ? this.redactSensitive(meta) : {});
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta ? this.redactSensitive(meta) : {});
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta ? this.redactSensitive(meta) : {});
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}
