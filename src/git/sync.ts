import { logger } from '../utils/logger.js';
import { GitSyncError } from '../errors.js';
import type { Notifier } from '../notify/notifier.js';
import type { BranchSyncDecision } from '../types.js';
import type { GitPort } from './client.js';

export interface SyncInput {
  local: string;
  remote: string;
  base: string;
  branch: string;
  protectedBranches: readonly string[];
}

/**
 * How to reconcile a local branch with its remote counterpart.
 * Protected branches keep their history and get a merge commit.
 */
export function decideSync({ local, remote, base, branch, protectedBranches }: SyncInput): BranchSyncDecision {
  if (local === remote) return 'no-op';
  if (local === base) return 'fast-forward';
  if (remote === base) return 'no-op';
  return protectedBranches.includes(branch) ? 'merge' : 'rebase';
}

export interface BranchSyncSettings {
  remote: string;
  autopush: boolean;
  protectedBranches: string[];
}

export interface SyncResult {
  ok: boolean;
  decision?: BranchSyncDecision;
  /** Why nothing happened, when nothing did */
  skipped?: string;
}

export interface PushResult {
  ok: boolean;
  pushed: boolean;
  skipped?: string;
}

export class BranchSynchronizer {
  constructor(
    private git: GitPort,
    private settings: BranchSyncSettings,
    private notifier: Notifier
  ) {}

  /**
   * Bring `branch` up to date with its remote before a push. Anything short of
   * a failed fast-forward or a failed merge counts as success.
   */
  async syncBeforePush(branch: string): Promise<SyncResult> {
    const { remote } = this.settings;

    if (!(await this.git.hasRemote(remote))) {
      return { ok: true, skipped: 'no remote' };
    }

    if (!(await this.git.isClean())) {
      logger.info(`Working tree dirty; skipping sync with ${remote}/${branch}`);
      return { ok: true, skipped: 'dirty tree' };
    }

    if (!(await this.git.fetch(remote, branch)) && !(await this.git.fetch(remote))) {
      logger.warn('git fetch failed; skipping sync', { remote, branch });
      return { ok: true, skipped: 'fetch failed' };
    }

    const remoteRef = `${remote}/${branch}`;
    if (!(await this.git.hasRemoteRef(remote, branch))) {
      return { ok: true, skipped: 'no remote branch' };
    }

    const local = await this.git.revParse(branch);
    const remoteSha = await this.git.revParse(remoteRef);
    if (!local || !remoteSha) {
      return { ok: true, skipped: 'unresolved refs' };
    }
    if (local === remoteSha) {
      return { ok: true, decision: 'no-op' };
    }

    const base = await this.git.mergeBase(branch, remoteRef);
    if (!base) {
      logger.warn(`No common history between ${branch} and ${remoteRef}; leaving branch as is`);
      return { ok: true, skipped: 'unrelated histories' };
    }

    const decision = decideSync({
      local,
      remote: remoteSha,
      base,
      branch,
      protectedBranches: this.settings.protectedBranches,
    });
    logger.info(`Sync decision for ${branch}: ${decision}`, { local, remote: remoteSha, base });

    switch (decision) {
      case 'no-op':
        return { ok: true, decision };

      case 'fast-forward':
        if (await this.git.mergeFastForward(remoteRef)) {
          return { ok: true, decision };
        }
        logger.error(`Fast-forward of ${branch} to ${remoteRef} failed; manual intervention required`);
        return { ok: false, decision };

      case 'merge':
        return { ok: await this.git.merge(remoteRef, this.mergeMessage(branch)), decision };

      case 'rebase':
        if (await this.git.rebase(remoteRef)) {
          return { ok: true, decision };
        }
        logger.warn(`Rebase of ${branch} onto ${remoteRef} failed; aborting and merging instead`);
        await this.git.abortRebase();
        return { ok: await this.git.merge(remoteRef, this.mergeMessage(branch)), decision: 'merge' };
    }
  }

  /**
   * Push `branch`, syncing and retrying exactly once on rejection.
   */
  async pushBranch(branch: string): Promise<PushResult> {
    const { remote } = this.settings;

    if (!this.settings.autopush) {
      logger.info('Autopush disabled; skipping push');
      return { ok: true, pushed: false, skipped: 'autopush disabled' };
    }
    if (!(await this.git.hasRemote(remote))) {
      logger.info(`No git remote '${remote}' configured; skipping push`);
      return { ok: true, pushed: false, skipped: 'no remote' };
    }

    if (await this.git.push(remote, branch)) {
      return { ok: true, pushed: true };
    }

    logger.warn(`Push failed for ${branch}; syncing with ${remote} and retrying`);
    const sync = await this.syncBeforePush(branch);
    if (!sync.ok) {
      await this.reportPushFailure(`Failed to sync with ${remote}/${branch}. Manual intervention required.`);
      return { ok: false, pushed: false };
    }

    if (await this.git.push(remote, branch)) {
      return { ok: true, pushed: true };
    }

    await this.reportPushFailure(`Failed to push ${branch} after sync. Manual intervention required.`);
    return { ok: false, pushed: false };
  }

  async pushBranchOrThrow(branch: string): Promise<void> {
    const result = await this.pushBranch(branch);
    if (!result.ok) {
      throw new GitSyncError(`Could not push ${branch}`, branch, 'push');
    }
  }

  private mergeMessage(branch: string): string {
    return `Merge ${this.settings.remote}/${branch} into ${branch}`;
  }

  private async reportPushFailure(message: string): Promise<void> {
    logger.error(message);
    await this.notifier.notify('🚨', 'Push Failed', message);
  }
}
