import { LoopUsageError } from '../errors.js';
import { logger, describeError } from '../utils/logger.js';
import type { GitPort } from '../git/client.js';
import type { BranchSynchronizer } from '../git/sync.js';
import type { Notifier } from '../notify/notifier.js';
import type { ExecutionRouter } from '../router/execution-router.js';
import { isUnavailable, UNAVAILABLE_EXIT_CODE, type Backend, type LoopMode, type TaskType } from '../types.js';
import { loadPrompt } from './prompt.js';
import type { ReviewGate } from './review-gate.js';
import type { SecurityGate } from './security-gate.js';

export interface LoopRequest {
  mode: LoopMode;
  /** 0 runs until stopped */
  maxIterations: number;
  workScope?: string;
}

const DEFAULT_PLAN_WORK_ITERATIONS = 5;

function parseCount(value: string | undefined, fallback: number, label: string): number {
  if (value === undefined) return fallback;
  if (!/^\d+$/.test(value)) {
    throw new LoopUsageError(`${label} must be a non-negative integer, got "${value}"`);
  }
  return Number.parseInt(value, 10);
}

/**
 * `plan [n]`, `plan-work "<scope>" [n]`, `review`, `build [n]` or a bare `[n]`.
 */
export function parseLoopArgs(args: string[]): LoopRequest {
  const [first, second, third]: (string | undefined)[] = args;

  switch (first) {
    case undefined:
      return { mode: 'build', maxIterations: 0 };
    case 'plan':
      return { mode: 'plan', maxIterations: parseCount(second, 0, 'max iterations') };
    case 'plan-work':
      if (!second || !second.trim()) {
        throw new LoopUsageError('plan-work requires a work description');
      }
      return {
        mode: 'plan-work',
        workScope: second,
        maxIterations: parseCount(third, DEFAULT_PLAN_WORK_ITERATIONS, 'max iterations'),
      };
    case 'review':
      return { mode: 'review', maxIterations: 1 };
    case 'build':
      return { mode: 'build', maxIterations: parseCount(second, 0, 'max iterations') };
    default:
      if (/^\d+$/.test(first)) {
        return { mode: 'build', maxIterations: Number.parseInt(first, 10) };
      }
      throw new LoopUsageError(`Unknown loop mode: ${first}`);
  }
}

const MODE_TASK: Record<LoopMode, TaskType> = {
  plan: 'plan',
  'plan-work': 'plan-work',
  review: 'review',
  build: 'build',
};

export interface LoopSettings {
  prompts: { plan: string; build: string; planWork: string };
  contextFiles: string[];
  protectedBranches: string[];
  progressEvery?: number;
}

export interface IterationLoopDeps {
  router: ExecutionRouter;
  git: GitPort;
  sync: BranchSynchronizer;
  notifier: Notifier;
  reviewGate?: ReviewGate;
  securityGate?: SecurityGate;
}

export interface LoopResult {
  exitCode: number;
  iterations: number;
  lastBackend: Backend | null;
}

export class IterationLoop {
  constructor(
    private deps: IterationLoopDeps,
    private settings: LoopSettings
  ) {}

  async run(request: LoopRequest, signal?: AbortSignal): Promise<LoopResult> {
    const branch = (await this.deps.git.currentBranch()) ?? 'unknown';
    const taskType = MODE_TASK[request.mode];

    if (request.mode === 'plan-work' && this.settings.protectedBranches.includes(branch)) {
      throw new LoopUsageError(`plan-work should be run on a work branch, not ${branch}`);
    }

    const promptFile = this.promptFileFor(request.mode);
    if (promptFile) {
      // Fail fast on a missing prompt before any backend is touched
      await loadPrompt(promptFile);
    }

    logger.info('Loop starting', {
      mode: request.mode,
      branch,
      prompt: promptFile ?? '(working tree diff)',
      maxIterations: request.maxIterations || 'unbounded',
    });
    await this.deps.notifier.notify('🚀', 'Loop Started', `Mode: ${request.mode} | Branch: ${branch}`);

    const progressEvery = this.settings.progressEvery ?? 5;
    let iterations = 0;
    let lastBackend: Backend | null = null;

    while (request.maxIterations === 0 || iterations < request.maxIterations) {
      if (signal?.aborted) {
        logger.info('Loop stopped by signal', { iterations });
        break;
      }

      const prompt = promptFile
        ? await loadPrompt(promptFile, { workScope: request.workScope, contextFiles: this.settings.contextFiles })
        : await this.deps.git.diff([]);

      const result = await this.deps.router.route(taskType, prompt, { signal });
      if (isUnavailable(result)) {
        logger.error('No backend available; stopping loop');
        return { exitCode: UNAVAILABLE_EXIT_CODE, iterations, lastBackend };
      }
      lastBackend = result.backend;
      if (signal?.aborted) {
        logger.info('Loop stopped by signal', { iterations });
        break;
      }

      const { reviewGate, securityGate } = this.deps;
      if (request.mode === 'build' && reviewGate) {
        await this.runGate('code review', () => reviewGate.run(signal));
      }
      if (securityGate) {
        await this.runGate('security review', () => securityGate.run());
      }

      await this.deps.sync.pushBranch(branch);

      iterations++;
      if (iterations % progressEvery === 0) {
        await this.deps.notifier.notify(
          '🔄',
          'Loop Progress',
          `Completed ${iterations} iterations on ${branch} (backend: ${result.backend})`
        );
      }
      logger.info(`======================== LOOP ${iterations} (${result.backend}) ========================`);
    }

    if (request.maxIterations > 0 && iterations >= request.maxIterations) {
      logger.info(`Reached max iterations: ${request.maxIterations}`);
    }
    return { exitCode: 0, iterations, lastBackend };
  }

  private promptFileFor(mode: LoopMode): string | null {
    switch (mode) {
      case 'plan':
        return this.settings.prompts.plan;
      case 'plan-work':
        return this.settings.prompts.planWork;
      case 'build':
        return this.settings.prompts.build;
      case 'review':
        return null;
    }
  }

  private async runGate(name: string, gate: () => Promise<unknown>): Promise<void> {
    try {
      await gate();
    } catch (err) {
      logger.error(`${name} failed`, { error: describeError(err) });
    }
  }
}
