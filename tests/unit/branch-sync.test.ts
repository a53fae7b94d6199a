import { describe, it, expect, beforeEach } from 'vitest';
import { BranchSynchronizer, decideSync } from '../../src/git/sync.js';
import { GitSyncError } from '../../src/errors.js';
import { FakeGit, RecordingNotifier } from '../helpers/fakes.js';

const BRANCH = 'feature/work';
const REMOTE_REF = `origin/${BRANCH}`;

describe('decideSync', () => {
  const base = { branch: BRANCH, protectedBranches: ['main', 'master'] };

  it('should do nothing when both sides match', () => {
    expect(decideSync({ ...base, local: 'a', remote: 'a', base: 'a' })).toBe('no-op');
  });

  it('should fast-forward when local is behind', () => {
    expect(decideSync({ ...base, local: 'a', remote: 'b', base: 'a' })).toBe('fast-forward');
  });

  it('should do nothing when local is ahead', () => {
    expect(decideSync({ ...base, local: 'b', remote: 'a', base: 'a' })).toBe('no-op');
  });

  it('should rebase a diverged work branch and merge a diverged protected one', () => {
    expect(decideSync({ ...base, local: 'b', remote: 'c', base: 'a' })).toBe('rebase');
    expect(decideSync({ ...base, branch: 'main', local: 'b', remote: 'c', base: 'a' })).toBe('merge');
  });
});

describe('BranchSynchronizer', () => {
  let git: FakeGit;
  let notifier: RecordingNotifier;

  const makeSync = (autopush = true) =>
    new BranchSynchronizer(git, { remote: 'origin', autopush, protectedBranches: ['main'] }, notifier);

  beforeEach(() => {
    git = new FakeGit();
    notifier = new RecordingNotifier();
    git.refs = { [BRANCH]: 'local', [REMOTE_REF]: 'remote' };
    git.base = 'base';
  });

  describe('syncBeforePush', () => {
    it('should skip without a remote', async () => {
      git.remoteExists = false;
      expect(await makeSync().syncBeforePush(BRANCH)).toEqual({ ok: true, skipped: 'no remote' });
    });

    it('should skip a dirty working tree', async () => {
      git.clean = false;
      expect(await makeSync().syncBeforePush(BRANCH)).toEqual({ ok: true, skipped: 'dirty tree' });
    });

    it('should fall back to fetching the whole remote', async () => {
      git.fetchResults = [false, true];
      git.refs[BRANCH] = 'same';
      git.refs[REMOTE_REF] = 'same';

      const result = await makeSync().syncBeforePush(BRANCH);

      expect(result).toEqual({ ok: true, decision: 'no-op' });
      expect(git.calls).toContain('fetch origin feature/work');
      expect(git.calls).toContain('fetch origin');
    });

    it('should skip when both fetches fail', async () => {
      git.fetchResults = [false, false];
      expect(await makeSync().syncBeforePush(BRANCH)).toEqual({ ok: true, skipped: 'fetch failed' });
    });

    it('should skip when the remote branch does not exist', async () => {
      git.remoteRef = false;
      expect(await makeSync().syncBeforePush(BRANCH)).toEqual({ ok: true, skipped: 'no remote branch' });
    });

    it('should leave unrelated histories alone', async () => {
      git.base = null;

      const result = await makeSync().syncBeforePush(BRANCH);

      expect(result).toEqual({ ok: true, skipped: 'unrelated histories' });
      expect(git.calls.some((c) => c.startsWith('merge') || c.startsWith('rebase'))).toBe(false);
    });

    it('should fast-forward when behind', async () => {
      git.base = 'local';

      const result = await makeSync().syncBeforePush(BRANCH);

      expect(result).toEqual({ ok: true, decision: 'fast-forward' });
      expect(git.calls).toContain(`merge --ff-only ${REMOTE_REF}`);
    });

    it('should fail when a fast-forward fails', async () => {
      git.base = 'local';
      git.ffOk = false;
      expect(await makeSync().syncBeforePush(BRANCH)).toEqual({ ok: false, decision: 'fast-forward' });
    });

    it('should rebase a diverged work branch', async () => {
      const result = await makeSync().syncBeforePush(BRANCH);

      expect(result).toEqual({ ok: true, decision: 'rebase' });
      expect(git.calls).toContain(`rebase ${REMOTE_REF}`);
    });

    it('should abort a failed rebase and merge instead', async () => {
      git.rebaseOk = false;

      const result = await makeSync().syncBeforePush(BRANCH);

      expect(result).toEqual({ ok: true, decision: 'merge' });
      expect(git.calls).toContain('rebase --abort');
      expect(git.calls).toContain(`merge ${REMOTE_REF} -m Merge ${REMOTE_REF} into ${BRANCH}`);
    });

    it('should merge a diverged protected branch', async () => {
      git.refs = { main: 'local', 'origin/main': 'remote' };

      const result = await makeSync().syncBeforePush('main');

      expect(result).toEqual({ ok: true, decision: 'merge' });
      expect(git.calls).toContain('merge origin/main -m Merge origin/main into main');
      expect(git.calls).not.toContain('rebase origin/main');
    });

    it('should report a failed merge', async () => {
      git.refs = { main: 'local', 'origin/main': 'remote' };
      git.mergeOk = false;
      expect(await makeSync().syncBeforePush('main')).toEqual({ ok: false, decision: 'merge' });
    });
  });

  describe('pushBranch', () => {
    it('should not push when autopush is disabled', async () => {
      const result = await makeSync(false).pushBranch(BRANCH);

      expect(result).toEqual({ ok: true, pushed: false, skipped: 'autopush disabled' });
      expect(git.calls).toEqual([]);
    });

    it('should push directly when the remote accepts', async () => {
      const result = await makeSync().pushBranch(BRANCH);

      expect(result).toEqual({ ok: true, pushed: true });
      expect(git.calls.filter((c) => c.startsWith('push'))).toEqual([`push origin ${BRANCH}`]);
    });

    it('should sync and retry once after a rejected push', async () => {
      git.pushResults = [false, true];

      const result = await makeSync().pushBranch(BRANCH);

      expect(result).toEqual({ ok: true, pushed: true });
      expect(git.calls).toContain(`rebase ${REMOTE_REF}`);
      expect(git.calls.filter((c) => c.startsWith('push'))).toHaveLength(2);
    });

    it('should notify when the retry is rejected too', async () => {
      git.pushResults = [false, false];

      const result = await makeSync().pushBranch(BRANCH);

      expect(result).toEqual({ ok: false, pushed: false });
      expect(notifier.sent).toEqual([
        {
          emoji: '🚨',
          title: 'Push Failed',
          message: `Failed to push ${BRANCH} after sync. Manual intervention required.`,
        },
      ]);
    });

    it('should not retry when the sync fails', async () => {
      git.pushResults = [false];
      git.base = 'local';
      git.ffOk = false;

      const result = await makeSync().pushBranch(BRANCH);

      expect(result).toEqual({ ok: false, pushed: false });
      expect(git.calls.filter((c) => c.startsWith('push'))).toHaveLength(1);
      expect(notifier.titles()).toEqual(['Push Failed']);
    });

    it('should throw a GitSyncError from pushBranchOrThrow', async () => {
      git.pushResults = [false, false];
      await expect(makeSync().pushBranchOrThrow(BRANCH)).rejects.toBeInstanceOf(GitSyncError);
    });
  });
});
