import { readFile } from 'node:fs/promises';
import { logger } from '../utils/logger.js';
import { md5Hex } from '../utils/text.js';
import type { StateStore } from '../state/state-store.js';
import type { BlockerState } from '../types.js';

const QUESTION_HEADING = /^## (Q-\d+)\b/;
const ANY_HEADING = /^## /;
const AWAITING_MARKERS = ['⏳ Awaiting response', 'Status: Awaiting response'];
const ANSWERED_MARKERS = ['✅ Answered', 'Status: Answered'];

/**
 * Ids of `## Q-<n>` sections still awaiting an answer, sorted.
 */
export function collectOpenQuestionIds(markdown: string): string[] {
  const open: string[] = [];
  let current: string | null = null;
  let awaiting = false;
  let answered = false;

  const close = () => {
    if (current !== null && awaiting && !answered) {
      open.push(current);
    }
    current = null;
    awaiting = false;
    answered = false;
  };

  for (const line of markdown.split(/\r?\n/)) {
    const heading = QUESTION_HEADING.exec(line);
    if (heading) {
      close();
      current = heading[1];
      continue;
    }
    if (ANY_HEADING.test(line)) {
      close();
      continue;
    }
    if (current === null) continue;
    if (AWAITING_MARKERS.some((m) => line.includes(m))) awaiting = true;
    if (ANSWERED_MARKERS.some((m) => line.includes(m))) answered = true;
  }
  close();

  return open.sort();
}

/** Stable digest of a set of open question ids; null when there are none. */
export function fingerprintIds(ids: string[]): string | null {
  if (ids.length === 0) {
    return null;
  }
  return md5Hex(`${[...ids].sort().join('\n')}\n`);
}

export interface BlockerCheck {
  blocked: boolean;
  consecutiveCount: number;
  fingerprint: string | null;
}

/**
 * Notices when the agent keeps stopping on the same unanswered questions
 * so the daemon can back off instead of burning iterations.
 */
export class BlockerDetector {
  constructor(
    private questionsPath: string,
    private store: StateStore<BlockerState>,
    private threshold: number = 3
  ) {}

  async currentFingerprint(): Promise<string | null> {
    let text: string;
    try {
      text = await readFile(this.questionsPath, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return null;
      }
      throw err;
    }
    return fingerprintIds(collectOpenQuestionIds(text));
  }

  async checkAndUpdate(): Promise<BlockerCheck> {
    const fingerprint = await this.currentFingerprint();
    const state = await this.store.load();

    if (fingerprint === null) {
      const cleared: BlockerState = { consecutiveCount: 0, lastFingerprint: null };
      await this.store.save(cleared);
      return { blocked: false, consecutiveCount: 0, fingerprint };
    }

    if (fingerprint === state.lastFingerprint) {
      state.consecutiveCount += 1;
      logger.info(`Repeated blocker detected (count: ${state.consecutiveCount}/${this.threshold})`);
    } else {
      state.consecutiveCount = 1;
      state.lastFingerprint = fingerprint;
      logger.info('New blocker detected, tracking', { fingerprint });
    }
    await this.store.save(state);

    return {
      blocked: state.consecutiveCount >= this.threshold,
      consecutiveCount: state.consecutiveCount,
      fingerprint,
    };
  }

  /** Give the same blocker another full run of attempts after a pause. */
  async resetAfterCooldown(): Promise<void> {
    const state = await this.store.load();
    state.consecutiveCount = 0;
    await this.store.save(state);
  }
}
