import { mkdir, open, readFile, stat, unlink } from 'node:fs/promises';
import { dirname } from 'node:path';
import { logger } from '../utils/logger.js';

function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return isErrno(err, 'EPERM');
  }
}

interface LockOwner {
  pid: number | null;
  ageMs: number;
}

/**
 * Advisory single-instance lock: a file holding the owner's pid, created
 * exclusively. A lock left behind by a dead process is taken over. A lock
 * without a readable pid may still be mid-write, so it is only taken over
 * once it is older than `unreadableGraceMs`.
 */
export class InstanceLock {
  private held = false;

  constructor(
    readonly path: string,
    private pid: number = process.pid,
    private unreadableGraceMs = 10_000
  ) {}

  async acquire(): Promise<boolean> {
    await mkdir(dirname(this.path), { recursive: true });

    for (let attempt = 0; attempt < 2; attempt++) {
      try {
        const handle = await open(this.path, 'wx');
        try {
          await handle.writeFile(`${this.pid}\n`, 'utf-8');
        } finally {
          await handle.close();
        }
        this.held = true;
        return true;
      } catch (err) {
        if (!isErrno(err, 'EEXIST')) {
          throw err;
        }
      }

      const owner = await this.readOwner();
      if (owner === null) {
        // Released between our open and read
        continue;
      }
      if (owner.pid === null && owner.ageMs < this.unreadableGraceMs) {
        logger.debug('Lock file has no pid yet; treating it as held', { path: this.path });
        return false;
      }
      if (owner.pid !== null && owner.pid !== this.pid && isProcessAlive(owner.pid)) {
        logger.debug('Lock held by running process', { path: this.path, owner: owner.pid });
        return false;
      }

      logger.warn('Removing stale lock', { path: this.path, owner: owner.pid });
      await unlink(this.path).catch((err: unknown) => {
        if (!isErrno(err, 'ENOENT')) throw err;
      });
    }
    return false;
  }

  async release(): Promise<void> {
    if (!this.held) {
      return;
    }
    this.held = false;
    await unlink(this.path).catch((err: unknown) => {
      if (!isErrno(err, 'ENOENT')) throw err;
    });
  }

  private async readOwner(): Promise<LockOwner | null> {
    try {
      const [content, info] = await Promise.all([readFile(this.path, 'utf-8'), stat(this.path)]);
      const pid = Number.parseInt(content.trim(), 10);
      return {
        pid: Number.isFinite(pid) && pid > 0 ? pid : null,
        ageMs: Date.now() - info.mtimeMs,
      };
    } catch (err) {
      if (isErrno(err, 'ENOENT')) return null;
      throw err;
    }
  }
}
