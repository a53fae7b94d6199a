import chalk from 'chalk';
import { resolve } from 'node:path';
import { ConfigError, LoopUsageError } from '../errors.js';
import { createRuntime, type Runtime } from '../runtime.js';
import { logger, describeError } from '../utils/logger.js';

export interface CommonOptions {
  dir?: string;
}

export function resolveRepoDir(options: CommonOptions): string {
  return resolve(options.dir ?? process.cwd());
}

export async function loadRuntime(options: CommonOptions, fileLogging = false): Promise<Runtime> {
  return createRuntime(resolveRepoDir(options), { fileLogging });
}

/**
 * Abort the returned signal on SIGINT/SIGTERM; a second signal exits at once.
 */
export function setupSignalHandlers(): AbortSignal {
  const controller = new AbortController();

  const shutdown = (signal: string): void => {
    if (controller.signal.aborted) {
      logger.warn('Shutdown already in progress, forcing exit...');
      process.exit(1);
    }
    logger.info(`Received ${signal}, shutting down after the current step...`);
    controller.abort();
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  process.on('uncaughtException', (err) => {
    logger.error('Uncaught exception', err);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', { reason: describeError(reason) });
    process.exit(1);
  });

  return controller.signal;
}

/** Report a command failure and set exit code 1. */
export function reportCommandError(err: unknown): void {
  if (err instanceof ConfigError || err instanceof LoopUsageError) {
    console.error(chalk.red(`Error: ${err.message}`));
  } else {
    logger.error('Command failed', err instanceof Error ? err : { error: describeError(err) });
  }
  process.exitCode = 1;
}
