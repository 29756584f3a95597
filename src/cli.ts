#!/usr/bin/env node
// src/cli.ts

import dotenv from 'dotenv';
import { CatalogSync } from './sync';
import { loadConfigFromEnv } from './config/ConfigValidator';
import { Logger } from './observability/Logger';
import { initializeTracing } from './observability/tracing';
import { ConfigError, errorMessage } from './utils/errors';

/**
 * One sync run. Skipped projects and failed upserts still exit 0; only a
 * fatal error (bad config, no catalog token, no project list) exits 1.
 */
export async function main(env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const config = loadConfigFromEnv(env);
  const logger = new Logger(config.logging);
  const shutdownTracing = await initializeTracing();

  try {
    await CatalogSync.init(config).run();
    return 0;
  } catch (error: unknown) {
    // run() has already logged its own failure
    if (error instanceof ConfigError) {
      logger.error('Invalid configuration', { error: errorMessage(error) });
    }
    return 1;
  } finally {
    await shutdownTracing?.();
  }
}

if (require.main === module) {
  dotenv.config();
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    }
  );
}
