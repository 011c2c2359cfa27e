/**
 * Git analyzer module
 * @module @reword/core/analyzer
 */

export { resolveRange, type RangeRequest, type ResolvedRange } from './range';

export { listCommits, parseCommitLog, COMMIT_LOG_FORMAT } from './commits';

export {
  getCommitDiff,
  truncateDiff,
  TRUNCATION_MARKER,
  DEFAULT_DIFF_BUDGET,
  type CommitDiffOptions,
} from './commit-diff';
