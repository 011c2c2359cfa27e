/**
 * Core types for reword
 *
 * Zod schemas and inferred types live in @reword/contracts. This file holds
 * the option shapes used inside @reword/core.
 */

export type {
  CommitRecord,
  Plan,
  PlanItem,
  PlanOutput,
  ApplyResult,
} from '@reword/contracts';

import type { Logger } from './logger';
import type { SuggesterFactory } from './generator/suggester';
import type { VcsAdapter } from './vcs/adapter';
import type { ApplyTransition } from './applier/state';

// ============================================================================
// Internal Types
// ============================================================================

/**
 * Options for generating a rewrite plan
 */
export interface GeneratePlanOptions {
  vcs: VcsAdapter;
  /** Commits back from HEAD; ignored when `range` is set */
  limit: number;
  /** Explicit `<base>..<head>` */
  range?: string;
  model: string;
  /** Include merge commits (default: false) */
  allowMerges?: boolean;
  /** Per-suggestion deadline */
  timeoutMs: number;
  /** Diff budget per commit (default: 40000) */
  maxDiffChars?: number;
  /** Called once, after enumeration and before the first suggestion */
  createSuggester: SuggesterFactory;
  logger?: Logger;
  /** Clock for `createdAt` */
  now?: () => Date;
}

/**
 * Options for replaying a plan onto a new branch
 */
export interface ApplyPlanOptions {
  vcs: VcsAdapter;
  /** Branch to create; must not exist */
  branch: string;
  /** Replay merge commits against their first parent (default: false) */
  allowMerges?: boolean;
  logger?: Logger;
  onTransition?: (transition: ApplyTransition) => void;
}
