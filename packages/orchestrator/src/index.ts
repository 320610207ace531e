/**
 * @file packages/orchestrator/src/index.ts
 * @description Public surface of the orchestrator package and its process entry point.
 */

import 'reflect-metadata';
import { fileURLToPath } from 'node:url';
import { resolve } from 'node:path';
import { loadConfig } from './config.js';
import { AppContext } from './app-context.js';
import { errorMessage } from './domain/errors/app-error.js';
import { logger } from './logger.js';

export { AppContext } from './app-context.js';
export { buildServer } from './server.js';
export { setupContainer, type Collaborators } from './container.js';
export { loadConfig, configFromEnv } from './config.js';
export { Orchestrator } from './application/orchestrator.js';

/** Loads configuration from `projectRoot`, starts serving and stops on SIGINT/SIGTERM. */
export async function startOrchestrator(projectRoot: string): Promise<AppContext> {
  const app = await AppContext.create(loadConfig(projectRoot), { logger });
  await app.start();

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info(`Received ${signal}, shutting down`, { event: 'shutdown' });
    try {
      await app.stop();
      process.exit(0);
    } catch (err) {
      logger.error(`Shutdown failed: ${errorMessage(err)}`, { event: 'shutdown_error' });
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  return app;
}

// ─── Direct Execution Detection ─────────────────────────────
const __filename = fileURLToPath(import.meta.url);
const entryFile = process.argv[1] ? resolve(process.argv[1]) : '';

if (entryFile === __filename) {
  startOrchestrator(process.cwd()).catch((err: unknown) => {
    logger.error(`Fatal error: ${errorMessage(err)}`, { event: 'startup_error' });
    process.exit(1);
  });
}
