/**
 * Commit enumeration over a resolved range
 */

import {
  EmptyRangeError,
  RangeResolutionError,
  VcsCommandError,
  type CommitRecord,
} from '@reword/contracts';
import type { VcsAdapter } from '../vcs/adapter';

// Unit/record separators never occur in subjects or identities
const FIELD_SEPARATOR = '\x1f';
const RECORD_SEPARATOR = '\x1e';

/** sha, subject, author name, author email, strict ISO author date, parents */
export const COMMIT_LOG_FORMAT = '%H%x1f%s%x1f%an%x1f%ae%x1f%aI%x1f%P%x1e';

/**
 * List the commits of `expression` oldest to newest
 *
 * @throws RangeResolutionError when git cannot read the range
 * @throws EmptyRangeError when the range holds no commits
 */
export async function listCommits(vcs: VcsAdapter, expression: string): Promise<CommitRecord[]> {
  let output: string;
  try {
    output = await vcs.run([
      'log',
      '--topo-order',
      '--reverse',
      `--format=${COMMIT_LOG_FORMAT}`,
      expression,
      '--',
    ]);
  } catch (error) {
    if (error instanceof VcsCommandError) {
      throw new RangeResolutionError(
        `cannot list commits in ${expression}: ${error.stderr.trim()}`,
        { cause: error }
      );
    }
    throw error;
  }

  const commits = parseCommitLog(output);
  if (commits.length === 0) {
    throw new EmptyRangeError(expression);
  }
  return commits;
}

/**
 * Parse `git log --format=COMMIT_LOG_FORMAT` output
 */
export function parseCommitLog(output: string): CommitRecord[] {
  const commits: CommitRecord[] = [];

  for (const raw of output.split(RECORD_SEPARATOR)) {
    const record = raw.replace(/^[\r\n]+/, '');
    if (!record.trim()) continue;

    const [sha, subject, authorName, authorEmail, authorDate, parentList] =
      record.split(FIELD_SEPARATOR);
    if (sha === undefined || parentList === undefined) continue;

    const parents = parentList.trim().split(/\s+/).filter(Boolean);
    commits.push({
      sha: sha.trim(),
      subject: subject ?? '',
      authorName: authorName ?? '',
      authorEmail: authorEmail ?? '',
      authorDate: (authorDate ?? '').trim(),
      parents,
      isMerge: parents.length > 1,
    });
  }

  return commits;
}
