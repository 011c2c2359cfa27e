/**
 * reword apply
 * Replay a plan onto a new branch
 */

import { resolve } from 'node:path';
import type { Command } from 'commander';
import { ApplyInputSchema, applyFlags, type ApplyResult } from '@reword/contracts';
import { applyPlan } from '@reword/core/applier';
import { loadPlan } from '@reword/core/storage';
import { getRepoRoot } from '@reword/core/vcs';
import type { CliContext } from '../context';
import { addFlags, parseFlags } from './flags';
import type { CommandAction } from './types';

export interface ApplyCommandResult {
  exitCode: number;
  result?: ApplyResult;
}

export async function executeApply(
  ctx: CliContext,
  flags: Record<string, unknown>
): Promise<ApplyCommandResult> {
  const input = parseFlags(ApplyInputSchema, {
    ...flags,
    in: flags.in ?? ctx.config.plan.file,
  });

  const planPath = resolve(ctx.cwd, input.in);
  const plan = await loadPlan(planPath);
  ctx.logger.debug(`loaded ${plan.items.length} item(s) from ${planPath}`);

  const repoRoot = await getRepoRoot(ctx.vcs);
  if (plan.repoPath !== repoRoot) {
    ctx.logger.warn(`plan was made in ${plan.repoPath}, applying in ${repoRoot}`);
  }

  const result = await applyPlan(plan, {
    vcs: ctx.vcs,
    branch: input.branch,
    allowMerges: input.allowMerges,
    logger: ctx.logger,
  });

  if (input.json) {
    ctx.ui.json(result);
  } else {
    for (const commit of result.commits) {
      ctx.ui.info(`  ${commit.sha.slice(0, 7)} ${commit.message.split('\n', 1)[0] ?? ''}`);
    }
    const skipped = result.skipped.length > 0 ? `, ${result.skipped.length} skipped as empty` : '';
    ctx.ui.info(`Branch ${result.branch}: ${result.commits.length} commit(s) rewritten${skipped}`);
  }

  return { exitCode: 0, result };
}

export function registerApplyCommand(program: Command, run: CommandAction): void {
  const command = program
    .command('apply')
    .description('Replay a plan onto a new branch with the planned messages');

  addFlags(command, applyFlags).action((flags: Record<string, unknown>) =>
    run('apply', (ctx) => executeApply(ctx, flags))
  );
}
