/**
 * Commit range resolution
 */

import { RangeResolutionError, VcsCommandError } from '@reword/contracts';
import type { VcsAdapter } from '../vcs/adapter';
import { getRootCommits, isAncestor, resolveCommit, tryResolveCommit } from '../vcs/git-commands';

export interface RangeRequest {
  /** Explicit `<base>..<head>`; wins over `limit` when non-empty */
  range?: string;
  /** Commits back from HEAD */
  limit: number;
}

export interface ResolvedRange {
  /** Exclusive lower bound (full sha) */
  base: string;
  /** Inclusive upper bound (full sha) */
  head: string;
  /** `base..head`, ready for git log */
  expression: string;
  /** True when HEAD had fewer than `limit` ancestors and the root was used */
  fellBackToRoot: boolean;
}

/**
 * Resolve the commits to rewrite into concrete base/head shas
 *
 * Without an explicit range, base is the Nth ancestor of HEAD; a history
 * shorter than N falls back to its oldest root commit.
 */
export async function resolveRange(vcs: VcsAdapter, request: RangeRequest): Promise<ResolvedRange> {
  const explicit = request.range?.trim();
  if (explicit) {
    return resolveExplicitRange(vcs, explicit);
  }
  return resolveLimitRange(vcs, request.limit);
}

async function resolveExplicitRange(vcs: VcsAdapter, range: string): Promise<ResolvedRange> {
  if (range.includes('...')) {
    throw new RangeResolutionError(`symmetric range ${range} is not linear; use <base>..<head>`);
  }

  const separator = range.indexOf('..');
  if (separator === -1) {
    throw new RangeResolutionError(`cannot parse range "${range}"; expected <base>..<head>`);
  }

  const baseRev = range.slice(0, separator);
  const headRev = range.slice(separator + 2) || 'HEAD';
  if (!baseRev || headRev.includes('..')) {
    throw new RangeResolutionError(`cannot parse range "${range}"; expected <base>..<head>`);
  }

  const base = await tryResolveCommit(vcs, baseRev);
  if (!base) {
    throw new RangeResolutionError(`cannot resolve range base "${baseRev}"`);
  }
  const head = await tryResolveCommit(vcs, headRev);
  if (!head) {
    throw new RangeResolutionError(`cannot resolve range head "${headRev}"`);
  }

  if (!(await isAncestor(vcs, base, head))) {
    throw new RangeResolutionError(`${baseRev} is not an ancestor of ${headRev}`);
  }

  return { base, head, expression: `${base}..${head}`, fellBackToRoot: false };
}

async function resolveLimitRange(vcs: VcsAdapter, limit: number): Promise<ResolvedRange> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeResolutionError(`limit must be a positive integer, got ${limit}`);
  }

  let head: string;
  try {
    head = await resolveCommit(vcs, 'HEAD');
  } catch (error) {
    if (error instanceof VcsCommandError) {
      throw new RangeResolutionError(`cannot resolve HEAD: ${error.stderr.trim()}`, {
        cause: error,
      });
    }
    throw error;
  }

  const ancestor = await tryResolveCommit(vcs, `${head}~${limit}`);
  if (ancestor) {
    return { base: ancestor, head, expression: `${ancestor}..${head}`, fellBackToRoot: false };
  }

  // Shorter history than requested: start from the oldest root
  const roots = await getRootCommits(vcs, head);
  const root = roots[roots.length - 1];
  if (!root) {
    throw new RangeResolutionError(`cannot compute base for HEAD~${limit}: no root commit found`);
  }
  return { base: root, head, expression: `${root}..${head}`, fellBackToRoot: true };
}
