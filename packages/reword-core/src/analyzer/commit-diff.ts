/**
 * Per-commit diff extraction
 */

import type { VcsAdapter } from '../vcs/adapter';

export const TRUNCATION_MARKER = '\n...[truncated]...';

/** Characters of diff sent to the suggestion service per commit */
export const DEFAULT_DIFF_BUDGET = 40_000;

export interface CommitDiffOptions {
  maxChars?: number;
}

/**
 * Unified diff (3 lines of context, renames detected, no color) of a commit
 * against its first parent, truncated to the character budget
 */
export async function getCommitDiff(
  vcs: VcsAdapter,
  sha: string,
  options: CommitDiffOptions = {}
): Promise<string> {
  const diff = await vcs.run([
    'show',
    '--patch',
    '--unified=3',
    '--no-color',
    '--find-renames',
    '--diff-merges=first-parent',
    sha,
  ]);
  return truncateDiff(diff, options.maxChars ?? DEFAULT_DIFF_BUDGET);
}

/**
 * Cut `diff` to `maxChars` code points and append the truncation marker
 */
export function truncateDiff(diff: string, maxChars: number): string {
  // UTF-16 length is an upper bound on code points
  if (diff.length <= maxChars) {
    return diff;
  }
  const chars = Array.from(diff);
  if (chars.length <= maxChars) {
    return diff;
  }
  return chars.slice(0, maxChars).join('') + TRUNCATION_MARKER;
}
