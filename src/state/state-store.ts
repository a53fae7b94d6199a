import { logger } from '../utils/logger.js';
import {
  isBackend,
  defaultRouterState,
  type Backend,
  type BlockerState,
  type RouterState,
} from '../types.js';
import { parseEpochSeconds, readKeyValueFile, writeKeyValueFile } from './key-value-file.js';

/**
 * Durable storage for a single state record. `load` never fails on a
 * missing or malformed record; it falls back to defaults.
 */
export interface StateStore<T> {
  load(): Promise<T>;
  save(state: T): Promise<void>;
}

export class MemoryStateStore<T> implements StateStore<T> {
  saves = 0;

  constructor(private state: T) {}

  async load(): Promise<T> {
    return structuredClone(this.state);
  }

  async save(state: T): Promise<void> {
    this.state = structuredClone(state);
    this.saves++;
  }

  peek(): T {
    return this.state;
  }
}

// ─────────────────────────────────────────────────────────────
// Router state: ACTIVE_BACKEND / <BACKEND>_RATE_LIMITED_UNTIL
// ─────────────────────────────────────────────────────────────

const ACTIVE_BACKEND_KEY = 'ACTIVE_BACKEND';
const LIMIT_KEYS: Record<Backend, string> = {
  claude: 'CLAUDE_RATE_LIMITED_UNTIL',
  codex: 'CODEX_RATE_LIMITED_UNTIL',
};

export class RouterStateFile implements StateStore<RouterState> {
  constructor(
    private path: string,
    private defaultBackend: Backend = 'claude'
  ) {}

  async load(): Promise<RouterState> {
    const state = defaultRouterState(this.defaultBackend);
    const entries = await readKeyValueFile(this.path);
    if (!entries) {
      return state;
    }

    const active = entries.get(ACTIVE_BACKEND_KEY);
    if (isBackend(active)) {
      state.activeBackend = active;
    } else if (active !== undefined) {
      logger.warn('Ignoring unknown backend in state file', { path: this.path, value: active });
    }
    state.rateLimitUntil.claude = parseEpochSeconds(entries.get(LIMIT_KEYS.claude));
    state.rateLimitUntil.codex = parseEpochSeconds(entries.get(LIMIT_KEYS.codex));
    return state;
  }

  async save(state: RouterState): Promise<void> {
    await writeKeyValueFile(this.path, [
      [ACTIVE_BACKEND_KEY, state.activeBackend],
      [LIMIT_KEYS.claude, String(state.rateLimitUntil.claude)],
      [LIMIT_KEYS.codex, String(state.rateLimitUntil.codex)],
    ]);
  }
}

// ─────────────────────────────────────────────────────────────
// Blocker state: BLOCKED_ITERATION_COUNT / LAST_BLOCKER_HASH
// ─────────────────────────────────────────────────────────────

const COUNT_KEY = 'BLOCKED_ITERATION_COUNT';
const HASH_KEY = 'LAST_BLOCKER_HASH';
const NO_BLOCKER = 'none';

export class BlockerStateFile implements StateStore<BlockerState> {
  constructor(private path: string) {}

  async load(): Promise<BlockerState> {
    const entries = await readKeyValueFile(this.path);
    if (!entries) {
      return { consecutiveCount: 0, lastFingerprint: null };
    }
    const count = Number.parseInt(entries.get(COUNT_KEY) ?? '0', 10);
    const hash = entries.get(HASH_KEY);
    return {
      consecutiveCount: Number.isFinite(count) && count > 0 ? count : 0,
      lastFingerprint: hash && hash !== NO_BLOCKER ? hash : null,
    };
  }

  async save(state: BlockerState): Promise<void> {
    await writeKeyValueFile(this.path, [
      [COUNT_KEY, String(state.consecutiveCount)],
      [HASH_KEY, state.lastFingerprint ?? NO_BLOCKER],
    ]);
  }
}
