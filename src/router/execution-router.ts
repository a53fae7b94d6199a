import { logger } from '../utils/logger.js';
import { formatDuration, sleepSeconds, systemClock, type Clock, type Sleeper } from '../utils/timing.js';
import type { BackendInvoker } from '../backends/invoker.js';
import { DEFAULT_COOLDOWN_SECONDS, estimateResumeSeconds } from '../backends/rate-limit-interpreter.js';
import type { Notifier } from '../notify/notifier.js';
import type { StateStore } from '../state/state-store.js';
import {
  alternateOf,
  UNAVAILABLE_EXIT_CODE,
  type Backend,
  type InvocationResult,
  type RouteResult,
  type RouterState,
  type TaskType,
  type UnavailableResult,
} from '../types.js';
import { preferredBackendFor, type RoutingOptions } from './routing-table.js';

// Worst case: quota → failover → quota → sleep → retry, with one binary swap on the way
const MAX_ROUTE_ATTEMPTS = 4;

export interface ExecutionRouterOptions extends RoutingOptions {
  enableFailover: boolean;
  authCooldownSeconds: number;
  cooldownDefaults?: Record<Backend, number>;
}

export interface RouteOptions {
  /** Skip routing and start on this backend */
  forcedBackend?: Backend;
  /** Aborts a quota sleep; the quota failure is then returned */
  signal?: AbortSignal;
}

const UNAVAILABLE: UnavailableResult = {
  backend: null,
  exitCode: UNAVAILABLE_EXIT_CODE,
  outputText: '',
  classification: 'unavailable',
};

/**
 * Picks a backend for each task, runs it, and reacts to auth and quota
 * failures by failing over or sleeping until the quota window resets.
 *
 * Classified failures never throw: the caller gets a terminal success,
 * the failure it could not recover from, or `unavailable` (exit 127).
 */
export class ExecutionRouter {
  constructor(
    private store: StateStore<RouterState>,
    private invoker: BackendInvoker,
    private notifier: Notifier,
    private options: ExecutionRouterOptions,
    private sleeper: Sleeper = sleepSeconds,
    private clock: Clock = systemClock
  ) {}

  async getState(): Promise<RouterState> {
    return this.store.load();
  }

  isLimited(state: RouterState, backend: Backend): boolean {
    return state.rateLimitUntil[backend] > this.clock();
  }

  /** Preferred backend for a task after rate-limit failover, without invoking it. */
  async selectBackend(taskType: TaskType): Promise<Backend | null> {
    const state = await this.store.load();
    const preferred = preferredBackendFor(taskType, this.options);
    if (!this.isLimited(state, preferred)) {
      return preferred;
    }
    const alternate = alternateOf(preferred);
    return this.isLimited(state, alternate) ? null : alternate;
  }

  async route(taskType: TaskType, prompt: string, routeOptions: RouteOptions = {}): Promise<RouteResult> {
    const state = await this.store.load();
    const preferred = preferredBackendFor(taskType, this.options);
    let forced: Backend | null = routeOptions.forcedBackend ?? null;
    let sleptOn: Backend | null = null;
    let last: InvocationResult | null = null;

    for (let attempt = 0; attempt < MAX_ROUTE_ATTEMPTS; attempt++) {
      const backend = forced ?? this.preselect(state, preferred, taskType);
      const alternate = alternateOf(backend);

      if (!this.invoker.isAvailable(backend)) {
        if (this.invoker.isAvailable(alternate)) {
          logger.warn(`${backend} not available, forcing ${alternate}`, { taskType });
          forced = alternate;
          continue;
        }
        logger.error('Neither backend is available on this host', { taskType });
        return UNAVAILABLE;
      }

      await this.setActive(state, backend);
      logger.info(`Executing task=${taskType} with backend=${backend}`, { preferred, attempt });

      const result = await this.invoker.invoke(backend, taskType, prompt);
      last = result;

      switch (result.classification) {
        case 'authFailure': {
          state.rateLimitUntil[backend] = this.clock() + this.options.authCooldownSeconds;
          await this.store.save(state);
          logger.error(`${backend} authentication failed`, {
            taskType,
            until: state.rateLimitUntil[backend],
          });
          await this.notifier.notify(
            '🔐',
            'Backend Auth Failed',
            `${backend} rejected its credentials. Re-authenticate it; it stays disabled for ${formatDuration(this.options.authCooldownSeconds)}.`
          );

          if (this.canFailOver(state, alternate)) {
            logger.warn(`Failing over to ${alternate} after auth failure`, { taskType });
            forced = alternate;
            continue;
          }
          return result;
        }

        case 'quotaFailure': {
          const waitSeconds = estimateResumeSeconds(
            result.outputText,
            backend,
            new Date(this.clock() * 1000),
            this.options.cooldownDefaults ?? DEFAULT_COOLDOWN_SECONDS
          );
          state.rateLimitUntil[backend] = this.clock() + waitSeconds;
          await this.store.save(state);
          logger.warn(`${backend} rate limited`, { taskType, waitSeconds, until: state.rateLimitUntil[backend] });

          if (this.canFailOver(state, alternate)) {
            logger.info(`Failing over to ${alternate}`, { taskType });
            await this.notifier.notify(
              '🔄',
              'Backend Failover',
              `${backend} rate limited. Switching to ${alternate}.`
            );
            forced = alternate;
            continue;
          }

          if (sleptOn === backend) {
            logger.error(`${backend} still rate limited after waiting out its cooldown`, { taskType });
            return result;
          }

          logger.info(`Sleeping ${formatDuration(waitSeconds)} until ${backend} quota resets`);
          await this.notifier.notify(
            '⏸️',
            'Loop Paused',
            `Rate limited. Sleeping ${formatDuration(waitSeconds)}`
          );
          await this.sleeper(waitSeconds, routeOptions.signal);
          if (routeOptions.signal?.aborted) {
            return result;
          }

          state.rateLimitUntil[backend] = 0;
          await this.store.save(state);
          sleptOn = backend;
          forced = backend;
          continue;
        }

        case 'schemaFailure':
          logger.error(`${backend} rejected the output schema`, { taskType, exitCode: result.exitCode });
          return result;

        default:
          if (result.classification === 'otherFailure') {
            logger.warn(`${backend} exited with code ${result.exitCode}`, { taskType });
          }
          return result;
      }
    }

    logger.error('Giving up on task after repeated backend failures', { taskType });
    return last ?? UNAVAILABLE;
  }

  private preselect(state: RouterState, preferred: Backend, taskType: TaskType): Backend {
    if (!this.isLimited(state, preferred) || !this.options.enableFailover) {
      return preferred;
    }
    const alternate = alternateOf(preferred);
    if (this.isLimited(state, alternate)) {
      return preferred;
    }
    logger.info(`Preferred backend (${preferred}) rate-limited for ${taskType}, using ${alternate}`);
    return alternate;
  }

  private canFailOver(state: RouterState, alternate: Backend): boolean {
    return (
      this.options.enableFailover &&
      this.invoker.isAvailable(alternate) &&
      !this.isLimited(state, alternate)
    );
  }

  private async setActive(state: RouterState, backend: Backend): Promise<void> {
    if (state.activeBackend === backend) {
      return;
    }
    state.activeBackend = backend;
    await this.store.save(state);
  }
}
