/**
 * Typed git queries over a VcsAdapter
 */

import { VcsCommandError } from '@reword/contracts';
import type { VcsAdapter } from './adapter';

function lines(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean);
}

/**
 * Resolve a revision to a full commit sha. Rejects with VcsCommandError when
 * the revision does not name a commit.
 */
export async function resolveCommit(vcs: VcsAdapter, rev: string): Promise<string> {
  const out = await vcs.run(['rev-parse', '--verify', `${rev}^{commit}`]);
  return out.trim();
}

/**
 * Like resolveCommit, but a revision that does not resolve yields null
 */
export async function tryResolveCommit(vcs: VcsAdapter, rev: string): Promise<string | null> {
  try {
    return await resolveCommit(vcs, rev);
  } catch (error) {
    if (error instanceof VcsCommandError) return null;
    throw error;
  }
}

/** Check whether `ancestor` is reachable from `descendant` */
export async function isAncestor(
  vcs: VcsAdapter,
  ancestor: string,
  descendant: string
): Promise<boolean> {
  try {
    await vcs.run(['merge-base', '--is-ancestor', ancestor, descendant]);
    return true;
  } catch (error) {
    if (error instanceof VcsCommandError) return false;
    throw error;
  }
}

/**
 * Parentless commits reachable from `rev`, newest first
 */
export async function getRootCommits(vcs: VcsAdapter, rev: string = 'HEAD'): Promise<string[]> {
  return lines(await vcs.run(['rev-list', '--max-parents=0', rev]));
}

/** Number of parents of a commit, read live from the repository */
export async function getParentCount(vcs: VcsAdapter, sha: string): Promise<number> {
  const out = await vcs.run(['rev-list', '--parents', '-n', '1', sha]);
  const ids = out.trim().split(/\s+/).filter(Boolean);
  return Math.max(ids.length - 1, 0);
}

/**
 * True when tracked files have no staged or unstaged changes. Untracked
 * files (such as a plan written into the repository) are ignored.
 */
export async function isWorktreeClean(vcs: VcsAdapter): Promise<boolean> {
  const out = await vcs.run(['status', '--porcelain', '--untracked-files=no']);
  return out.trim() === '';
}

/** Paths with staged changes relative to HEAD */
export async function getStagedPaths(vcs: VcsAdapter): Promise<string[]> {
  return lines(await vcs.run(['diff', '--cached', '--name-only']));
}

export async function branchExists(vcs: VcsAdapter, name: string): Promise<boolean> {
  try {
    await vcs.run(['rev-parse', '--verify', '--quiet', `refs/heads/${name}`]);
    return true;
  } catch (error) {
    if (error instanceof VcsCommandError) return false;
    throw error;
  }
}

export async function isValidBranchName(vcs: VcsAdapter, name: string): Promise<boolean> {
  try {
    await vcs.run(['check-ref-format', '--branch', name]);
    return true;
  } catch (error) {
    if (error instanceof VcsCommandError) return false;
    throw error;
  }
}

/** Absolute path of the working tree root */
export async function getRepoRoot(vcs: VcsAdapter): Promise<string> {
  return (await vcs.run(['rev-parse', '--show-toplevel'])).trim();
}
