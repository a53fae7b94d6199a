import { readFile } from 'node:fs/promises';
import { logger } from '../utils/logger.js';
import { executeShellCommand } from '../utils/subprocess-handler.js';
import { sleepSeconds, type Sleeper } from '../utils/timing.js';
import { tailLines } from '../utils/text.js';
import type { DeploySettings } from '../config/schema.js';
import type { Notifier } from '../notify/notifier.js';
import type { LogIngestor } from './log-ingestor.js';

const PENDING_TASK = /^- \[ \]/m;

/** True when the plan document has at least one unchecked `- [ ]` item. */
export async function hasPendingTasks(planFile: string): Promise<boolean> {
  try {
    return PENDING_TASK.test(await readFile(planFile, 'utf-8'));
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return false;
    throw err;
  }
}

export type DeployOutcome = 'not-configured' | 'succeeded' | 'failed';

export class DeployAction {
  constructor(
    private settings: DeploySettings,
    private repoDir: string,
    private notifier: Notifier,
    private ingestor: LogIngestor,
    private sleeper: Sleeper = sleepSeconds
  ) {}

  async run(signal?: AbortSignal): Promise<DeployOutcome> {
    if (!this.settings.command) {
      logger.warn('DEPLOY requested but no deploy command configured; skipping');
      await this.notifier.notify('⚠️', 'Deploy', 'DEPLOY requested but no deploy command configured');
      return 'not-configured';
    }

    logger.info(`Running deploy: ${this.settings.command}`);
    await this.notifier.notify('🚀', 'Deploy', 'Running deploy');
    const result = await executeShellCommand(this.settings.command, { cwd: this.repoDir });
    if (result.success) {
      logger.info('Deploy finished');
    } else {
      logger.error('Deploy command failed', { exitCode: result.exitCode, output: tailLines(result.all, 40) });
      await this.notifier.notify('🚨', 'Deploy Failed', `Deploy exited with code ${result.exitCode}`);
    }

    if (this.settings.ingestAfterDeploy) {
      if (this.settings.observeSeconds > 0) {
        logger.info(`Post-deploy observe: waiting ${this.settings.observeSeconds}s before ingesting logs`);
        await this.sleeper(this.settings.observeSeconds, signal);
      }
      if (!signal?.aborted) {
        await this.ingestor.ingest();
      }
    }

    return result.success ? 'succeeded' : 'failed';
  }
}
