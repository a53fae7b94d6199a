/**
 * loopkeeper Types
 *
 * Shared vocabulary for the router, the iteration loop and the daemon.
 * Timestamps stored in state are epoch seconds.
 */

// ─────────────────────────────────────────────────────────────
// Backends & Tasks
// ─────────────────────────────────────────────────────────────

export const BACKENDS = ['claude', 'codex'] as const;

export type Backend = (typeof BACKENDS)[number];

export const TASK_TYPES = ['plan', 'plan-work', 'review', 'security', 'build'] as const;

export type TaskType = (typeof TASK_TYPES)[number];

export function isBackend(value: unknown): value is Backend {
  return typeof value === 'string' && (BACKENDS as readonly string[]).includes(value);
}

/** Unknown task names are treated as build work. */
export function normalizeTaskType(value: string | undefined): TaskType {
  return TASK_TYPES.find((t) => t === value) ?? 'build';
}

export function alternateOf(backend: Backend): Backend {
  return backend === 'claude' ? 'codex' : 'claude';
}

// ─────────────────────────────────────────────────────────────
// Router State
// ─────────────────────────────────────────────────────────────

export interface RouterState {
  activeBackend: Backend;
  /** Epoch seconds until which each backend is considered unavailable. 0 = healthy. */
  rateLimitUntil: Record<Backend, number>;
}

export function defaultRouterState(activeBackend: Backend = 'claude'): RouterState {
  return {
    activeBackend,
    rateLimitUntil: { claude: 0, codex: 0 },
  };
}

// ─────────────────────────────────────────────────────────────
// Invocation Results
// ─────────────────────────────────────────────────────────────

export type FailureClass =
  | 'success'
  | 'authFailure'
  | 'quotaFailure'
  | 'schemaFailure'
  | 'otherFailure';

export interface InvocationResult {
  backend: Backend;
  exitCode: number;
  outputText: string;
  classification: FailureClass;
}

export const UNAVAILABLE_EXIT_CODE = 127;

/** Neither backend binary exists on this host. */
export interface UnavailableResult {
  backend: null;
  exitCode: typeof UNAVAILABLE_EXIT_CODE;
  outputText: '';
  classification: 'unavailable';
}

export type RouteResult = InvocationResult | UnavailableResult;

export function isUnavailable(result: RouteResult): result is UnavailableResult {
  return result.classification === 'unavailable';
}

// ─────────────────────────────────────────────────────────────
// Daemon & Control Documents
// ─────────────────────────────────────────────────────────────

export interface BlockerState {
  consecutiveCount: number;
  /** md5 of the sorted open question ids, null when none are open */
  lastFingerprint: string | null;
}

export const CONTROL_DIRECTIVES = ['PAUSE', 'REPLAN', 'DEPLOY', 'INGEST_LOGS'] as const;

export type ControlDirective = (typeof CONTROL_DIRECTIVES)[number];

export function directiveToken(directive: ControlDirective): string {
  return `[${directive}]`;
}

export type BranchSyncDecision = 'no-op' | 'fast-forward' | 'merge' | 'rebase';

export type LoopMode = 'plan' | 'plan-work' | 'build' | 'review';

export type CycleOutcome = 'paused' | 'blocked' | 'dispatched' | 'idle';
