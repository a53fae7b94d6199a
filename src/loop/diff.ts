import type { GitPort } from '../git/client.js';
import { truncateMiddle } from '../utils/text.js';

/**
 * The change set a gate should look at: unstaged work, else staged work,
 * else the last commit. Oversized diffs keep their head and tail.
 */
export async function collectReviewDiff(git: GitPort, maxChars: number): Promise<string> {
  for (const args of [[], ['--staged'], ['HEAD~1']]) {
    const diff = await git.diff(args);
    if (diff.trim()) {
      return truncateMiddle(diff, maxChars);
    }
  }
  return '';
}
