import { existsSync } from 'node:fs';
import { logger, describeError } from '../utils/logger.js';
import { sleepSeconds, type Sleeper } from '../utils/timing.js';
import type { BlockerDetector } from '../control/blocker-detector.js';
import type { ControlDocument } from '../control/control-document.js';
import type { LoopRequest, LoopResult } from '../loop/iteration-loop.js';
import type { Notifier } from '../notify/notifier.js';
import type { CycleOutcome } from '../types.js';
import { hasPendingTasks, type DeployAction } from './actions.js';
import type { InstanceLock } from './instance-lock.js';
import type { LogIngestor } from './log-ingestor.js';

export type LoopRunner = (request: LoopRequest, signal?: AbortSignal) => Promise<LoopResult>;

export interface DaemonSupervisorDeps {
  control: ControlDocument;
  blockers: BlockerDetector;
  runLoop: LoopRunner;
  deploy: DeployAction;
  ingestor: LogIngestor;
  notifier: Notifier;
  sleeper?: Sleeper;
}

export interface DaemonSupervisorSettings {
  planFile: string;
  intervalSeconds: number;
  blockedPauseSeconds: number;
  maxBlockedIterations: number;
  buildBatchIterations: number;
  planIterations: number;
}

/**
 * Long-running supervisor around the iteration loop. Each cycle honours a
 * pause, backs off on repeated blockers, applies operator directives and
 * then plans or builds as the plan document requires.
 */
export class DaemonSupervisor {
  private sleeper: Sleeper;

  constructor(
    private deps: DaemonSupervisorDeps,
    private settings: DaemonSupervisorSettings
  ) {
    this.sleeper = deps.sleeper ?? sleepSeconds;
  }

  /**
   * Run until the signal aborts. Returns the process exit code.
   */
  async start(lock: InstanceLock, signal: AbortSignal): Promise<number> {
    if (!(await lock.acquire())) {
      logger.info('Another daemon instance is running. Exiting.');
      return 0;
    }

    try {
      logger.info(`Daemon starting (interval: ${this.settings.intervalSeconds}s)`);
      logger.info(
        `Blocker detection: max ${this.settings.maxBlockedIterations} consecutive blocked iterations before ${this.settings.blockedPauseSeconds}s pause`
      );
      await this.deps.notifier.notify('🤖', 'Daemon Started', `Interval: ${this.settings.intervalSeconds}s`);

      while (!signal.aborted) {
        let outcome: CycleOutcome | 'failed';
        try {
          outcome = await this.runCycle(signal);
        } catch (err) {
          outcome = 'failed';
          logger.error('Daemon cycle failed', { error: describeError(err) });
          await this.deps.notifier.notify('🚨', 'Daemon Cycle Failed', describeError(err));
        }

        // A blocker pause already waited; start the next cycle straight away
        if (outcome !== 'blocked') {
          await this.sleeper(this.settings.intervalSeconds, signal);
        }
      }

      logger.info('Shutting down...');
      return 0;
    } finally {
      await lock.release();
    }
  }

  async runCycle(signal?: AbortSignal): Promise<CycleOutcome> {
    const { control, blockers } = this.deps;

    if (await control.hasFlag('PAUSE')) {
      logger.info(`Paused ([PAUSE] in ${control.path}). Sleeping...`);
      return 'paused';
    }

    const blocker = await blockers.checkAndUpdate();
    if (blocker.blocked) {
      await this.pauseForBlocker(blocker.consecutiveCount, signal);
      return 'blocked';
    }

    let dispatched = false;

    if (await control.tryConsume('REPLAN')) {
      dispatched = (await this.runPlan(signal)) || dispatched;
    }
    if (await control.tryConsume('DEPLOY')) {
      await this.guard('deploy', () => this.deps.deploy.run(signal));
    }
    if (await control.tryConsume('INGEST_LOGS')) {
      logger.info('Running log ingest...');
      await this.guard('log ingest', () => this.deps.ingestor.ingest());
    }

    if (!existsSync(this.settings.planFile)) {
      dispatched = (await this.runPlan(signal)) || dispatched;
    }

    if (await hasPendingTasks(this.settings.planFile)) {
      dispatched = (await this.runBuild(signal)) || dispatched;
    } else {
      logger.info('No pending tasks. Sleeping...');
    }

    return dispatched ? 'dispatched' : 'idle';
  }

  private async runPlan(signal?: AbortSignal): Promise<boolean> {
    logger.info('Running planning...');
    await this.deps.notifier.notify('📋', 'Planning', 'Starting plan');
    return this.guard('planning', () =>
      this.deps.runLoop({ mode: 'plan', maxIterations: this.settings.planIterations }, signal)
    );
  }

  private async runBuild(signal?: AbortSignal): Promise<boolean> {
    const iterations = this.settings.buildBatchIterations;
    logger.info(`Running build (${iterations} iterations)...`);
    await this.deps.notifier.notify('🔨', 'Build', `Starting build (${iterations} iterations)`);
    return this.guard('build', () => this.deps.runLoop({ mode: 'build', maxIterations: iterations }, signal));
  }

  private async pauseForBlocker(count: number, signal?: AbortSignal): Promise<void> {
    const pauseSeconds = this.settings.blockedPauseSeconds;
    const minutes = Math.floor(pauseSeconds / 60);
    logger.warn(`Stuck on same blocker for ${count} iterations. Pausing for ${minutes}m...`);
    await this.deps.notifier.notify(
      '⏸️',
      'Paused - Awaiting Input',
      `Stuck on same blocker for ${count} iterations. Pausing for ${minutes}m. Check the questions file for unanswered questions.`
    );

    await this.sleeper(pauseSeconds, signal);
    await this.deps.blockers.resetAfterCooldown();
    logger.info('Resuming after blocker pause...');
  }

  /** Run one action; failures are logged and notified, never rethrown. */
  private async guard(name: string, action: () => Promise<unknown>): Promise<boolean> {
    try {
      await action();
      return true;
    } catch (err) {
      logger.error(`Daemon ${name} failed`, {
        error: describeError(err),
        stack: err instanceof Error ? err.stack : undefined,
      });
      await this.deps.notifier.notify('🚨', `Daemon ${name} failed`, describeError(err));
      return false;
    }
  }
}
