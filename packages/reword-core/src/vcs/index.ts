/**
 * VCS module
 * @module @reword/core/vcs
 */

export type { VcsAdapter, VcsRunOptions } from './adapter';
export { SimpleGitAdapter } from './simple-git-adapter';
export {
  resolveCommit,
  tryResolveCommit,
  isAncestor,
  getRootCommits,
  getParentCount,
  isWorktreeClean,
  getStagedPaths,
  branchExists,
  isValidBranchName,
  getRepoRoot,
} from './git-commands';
