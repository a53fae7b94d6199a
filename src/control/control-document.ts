import { readFile, writeFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { logger } from '../utils/logger.js';
import { directiveToken, type ControlDirective } from '../types.js';

/** Records a consumed directive in version control. */
export interface DocumentCommitter {
  commitPaths(paths: string[], message: string): Promise<boolean>;
}

export const COMMIT_PREFIX = 'loopkeeper';

async function readIfExists(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return null;
    }
    throw err;
  }
}

/**
 * The operator-edited requests file. Directives are bracketed tokens such as
 * `[PAUSE]` anywhere in the text.
 */
export class ControlDocument {
  constructor(
    readonly path: string,
    private committer: DocumentCommitter | null = null
  ) {}

  async hasFlag(directive: ControlDirective): Promise<boolean> {
    const text = await readIfExists(this.path);
    return text !== null && text.includes(directiveToken(directive));
  }

  /**
   * Remove every occurrence of the directive and commit the result.
   * Returns true only if the directive was present.
   */
  async tryConsume(directive: ControlDirective): Promise<boolean> {
    const token = directiveToken(directive);
    const text = await readIfExists(this.path);
    if (text === null || !text.includes(token)) {
      return false;
    }

    await writeFile(this.path, text.split(token).join(''), 'utf-8');
    logger.info(`Consumed ${token} from ${basename(this.path)}`);

    if (this.committer) {
      const committed = await this.committer.commitPaths(
        [this.path],
        `${COMMIT_PREFIX}: processed ${directive}`
      );
      if (!committed) {
        logger.warn(`Could not commit removal of ${token}; continuing`);
      }
    }
    return true;
  }

  /** Add a directive on its own line, unless it is already present. */
  async addFlag(directive: ControlDirective): Promise<boolean> {
    const token = directiveToken(directive);
    const text = (await readIfExists(this.path)) ?? '';
    if (text.includes(token)) {
      return false;
    }
    const separator = text === '' || text.endsWith('\n') ? '' : '\n';
    await writeFile(this.path, `${text}${separator}${token}\n`, 'utf-8');
    return true;
  }

  /** Remove a directive without committing. */
  async removeFlag(directive: ControlDirective): Promise<boolean> {
    const token = directiveToken(directive);
    const text = await readIfExists(this.path);
    if (text === null || !text.includes(token)) {
      return false;
    }
    const stripped = text
      .split('\n')
      .filter((line) => line.trim() !== token)
      .join('\n')
      .split(token)
      .join('');
    await writeFile(this.path, stripped, 'utf-8');
    return true;
  }
}
