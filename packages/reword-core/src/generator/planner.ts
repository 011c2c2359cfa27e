/**
 * Plan generation: range -> commits -> diffs -> suggestions -> Plan
 */

import {
  EmptyRangeError,
  SuggestionServiceError,
  type Plan,
  type PlanItem,
  type PlanOutput,
} from '@reword/contracts';
import { resolveRange } from '../analyzer/range';
import { listCommits } from '../analyzer/commits';
import { getCommitDiff } from '../analyzer/commit-diff';
import { getRepoRoot } from '../vcs/git-commands';
import { noopLogger } from '../logger';
import { savePlan } from '../storage/plan-storage';
import type { GeneratePlanOptions } from '../types';
import { isDecorationOnly, sanitizeMessage } from './sanitize';
import type { MessageSuggester, SuggestionRequest } from './suggester';

/**
 * Build a complete plan for the requested range
 *
 * Commits are processed one at a time, oldest first. Any suggestion failure
 * aborts the run; no partial plan is returned.
 */
export async function generatePlan(options: GeneratePlanOptions): Promise<Plan> {
  const { vcs, model } = options;
  const logger = options.logger ?? noopLogger;
  const allowMerges = options.allowMerges ?? false;

  const range = await resolveRange(vcs, { range: options.range, limit: options.limit });
  if (range.fellBackToRoot) {
    logger.debug(
      `history shorter than ${options.limit} commits; starting after root ${short(range.base)}`
    );
  }

  const commits = await listCommits(vcs, range.expression);
  logger.debug(`found ${commits.length} commit(s)`, { base: range.base, head: range.head });

  const suggester = options.createSuggester();
  const repoPath = await getRepoRoot(vcs);
  const items: PlanItem[] = [];

  for (const commit of commits) {
    if (commit.isMerge && !allowMerges) {
      logger.info(`skipped merge: ${short(commit.sha)}  ${commit.subject}`);
      continue;
    }

    const diff = await getCommitDiff(vcs, commit.sha, { maxChars: options.maxDiffChars });

    let raw: string;
    try {
      raw = await suggestWithTimeout(
        suggester,
        { model, diff, oldMessage: commit.subject },
        options.timeoutMs
      );
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SuggestionServiceError(`suggestion failed for ${short(commit.sha)}: ${reason}`, {
        sha: commit.sha,
        cause: error,
      });
    }

    if (isDecorationOnly(raw)) {
      throw new SuggestionServiceError(`suggestion for ${short(commit.sha)} was empty`, {
        sha: commit.sha,
      });
    }

    const newMessage = sanitizeMessage(raw);
    items.push({
      sha: commit.sha,
      oldMessage: commit.subject,
      newMessage,
      authorName: commit.authorName,
      authorEmail: commit.authorEmail,
      authorDate: commit.authorDate,
    });
    logger.info(`planned: ${short(commit.sha)}  ${commit.subject} -> ${firstLine(newMessage)}`);
  }

  if (items.length === 0) {
    logger.warn('every commit in range is a merge; rerun with --allow-merges to include them');
    throw new EmptyRangeError(range.expression);
  }

  return {
    schemaVersion: '1.0',
    repoPath,
    base: range.base,
    head: range.head,
    createdAt: (options.now ?? (() => new Date()))().toISOString(),
    model,
    allowMerges,
    items,
  };
}

/**
 * Generate a plan and write it to `out`
 */
export async function planAndSave(
  options: GeneratePlanOptions & { out: string }
): Promise<PlanOutput> {
  const plan = await generatePlan(options);
  await savePlan(options.out, plan);
  (options.logger ?? noopLogger).debug(`wrote ${plan.items.length} item(s) to ${options.out}`);
  return { planPath: options.out, plan };
}

/**
 * Call the suggester under its own deadline
 *
 * On expiry the request's signal is aborted and the call rejects with
 * SuggestionServiceError, whether or not the suggester honors the signal.
 */
export async function suggestWithTimeout(
  suggester: MessageSuggester,
  request: Omit<SuggestionRequest, 'signal'>,
  timeoutMs: number
): Promise<string> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new SuggestionServiceError(`timed out after ${timeoutMs}ms`));
      controller.abort();
    }, timeoutMs);
  });

  try {
    const suggestion = suggester.suggest({ ...request, signal: controller.signal });
    return await Promise.race([suggestion, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

function short(sha: string): string {
  return sha.slice(0, 7);
}

function firstLine(message: string): string {
  return message.split('\n', 1)[0] ?? '';
}
