import { simpleGit, type SimpleGit } from 'simple-git';
import { logger, describeError } from '../utils/logger.js';

/**
 * The version-control operations the loop relies on. Every call reports
 * failure as a value so callers can decide what is terminal.
 */
export interface GitPort {
  hasRemote(remote: string): Promise<boolean>;
  isClean(): Promise<boolean>;
  fetch(remote: string, branch?: string): Promise<boolean>;
  hasRemoteRef(remote: string, branch: string): Promise<boolean>;
  revParse(ref: string): Promise<string | null>;
  mergeBase(a: string, b: string): Promise<string | null>;
  mergeFastForward(ref: string): Promise<boolean>;
  merge(ref: string, message: string): Promise<boolean>;
  rebase(ref: string): Promise<boolean>;
  abortRebase(): Promise<void>;
  push(remote: string, branch: string): Promise<boolean>;
  currentBranch(): Promise<string | null>;
  /** `git diff <args>`, empty string when the command fails */
  diff(args: string[]): Promise<string>;
  commitPaths(paths: string[], message: string): Promise<boolean>;
}

export class SimpleGitClient implements GitPort {
  private git: SimpleGit;

  constructor(workDir: string) {
    this.git = simpleGit(workDir);
  }

  async hasRemote(remote: string): Promise<boolean> {
    return this.attempt(`remote get-url ${remote}`, async () => {
      await this.git.remote(['get-url', remote]);
    });
  }

  async isClean(): Promise<boolean> {
    try {
      const status = await this.git.status();
      return status.isClean();
    } catch (err) {
      logger.warn('git status failed; treating tree as dirty', { error: describeError(err) });
      return false;
    }
  }

  async fetch(remote: string, branch?: string): Promise<boolean> {
    return this.attempt(`fetch ${remote} ${branch ?? ''}`.trim(), async () => {
      if (branch) {
        await this.git.fetch(remote, branch);
      } else {
        await this.git.fetch(remote);
      }
    });
  }

  async hasRemoteRef(remote: string, branch: string): Promise<boolean> {
    return this.attempt('show-ref', async () => {
      await this.git.raw(['show-ref', '--verify', '--quiet', `refs/remotes/${remote}/${branch}`]);
    });
  }

  async revParse(ref: string): Promise<string | null> {
    return this.read(`rev-parse ${ref}`, () => this.git.revparse([ref]));
  }

  async mergeBase(a: string, b: string): Promise<string | null> {
    return this.read(`merge-base ${a} ${b}`, () => this.git.raw(['merge-base', a, b]));
  }

  async mergeFastForward(ref: string): Promise<boolean> {
    return this.attempt(`merge --ff-only ${ref}`, async () => {
      await this.git.merge(['--ff-only', ref]);
    });
  }

  async merge(ref: string, message: string): Promise<boolean> {
    const merged = await this.attempt(`merge ${ref}`, async () => {
      await this.git.merge(['--no-edit', '-m', message, ref]);
    });
    if (!merged) {
      await this.attempt('merge --abort', async () => {
        await this.git.merge(['--abort']);
      });
    }
    return merged;
  }

  async rebase(ref: string): Promise<boolean> {
    return this.attempt(`rebase ${ref}`, async () => {
      await this.git.rebase([ref]);
    });
  }

  async abortRebase(): Promise<void> {
    await this.attempt('rebase --abort', async () => {
      await this.git.rebase(['--abort']);
    });
  }

  async push(remote: string, branch: string): Promise<boolean> {
    return this.attempt(`push ${remote} ${branch}`, async () => {
      await this.git.push(remote, branch);
    });
  }

  async currentBranch(): Promise<string | null> {
    return this.read('branch --show-current', () => this.git.raw(['branch', '--show-current']));
  }

  async diff(args: string[]): Promise<string> {
    return (await this.read(`diff ${args.join(' ')}`, () => this.git.diff(args))) ?? '';
  }

  async commitPaths(paths: string[], message: string): Promise<boolean> {
    const added = await this.attempt('add', async () => {
      await this.git.add(paths);
    });
    if (!added) {
      return false;
    }
    return this.attempt('commit', async () => {
      await this.git.raw(['commit', '--allow-empty', '-m', message]);
    });
  }

  private async attempt(label: string, fn: () => Promise<void>): Promise<boolean> {
    try {
      await fn();
      return true;
    } catch (err) {
      logger.debug(`git ${label} failed`, { error: describeError(err) });
      return false;
    }
  }

  private async read(label: string, fn: () => Promise<string>): Promise<string | null> {
    try {
      const out = (await fn()).trim();
      return out || null;
    } catch (err) {
      logger.debug(`git ${label} failed`, { error: describeError(err) });
      return null;
    }
  }
}
