/**
 * reword plan
 * Suggest a new message for every commit in a range and save the plan
 */

import { resolve } from 'node:path';
import type { Command } from 'commander';
import { PlanInputSchema, planFlags, type PlanOutput } from '@reword/contracts';
import { planAndSave } from '@reword/core/generator';
import type { CliContext } from '../context';
import { addFlags, parseFlags } from './flags';
import type { CommandAction } from './types';

export interface PlanCommandResult {
  exitCode: number;
  result?: PlanOutput;
}

export async function executePlan(
  ctx: CliContext,
  flags: Record<string, unknown>
): Promise<PlanCommandResult> {
  const input = parseFlags(PlanInputSchema, {
    ...flags,
    limit: flags.limit ?? ctx.config.plan.limit,
    model: flags.model ?? ctx.config.suggestion.model,
    out: flags.out ?? ctx.config.plan.file,
    timeout: flags.timeout ?? ctx.config.suggestion.timeoutMs,
  });

  const suggestion = { ...ctx.config.suggestion, model: input.model, timeoutMs: input.timeout };
  const output = await planAndSave({
    vcs: ctx.vcs,
    limit: input.limit,
    range: input.range,
    model: input.model,
    allowMerges: input.allowMerges,
    timeoutMs: input.timeout,
    maxDiffChars: ctx.config.diff.maxChars,
    out: resolve(ctx.cwd, input.out),
    createSuggester: () => ctx.createSuggester(suggestion),
    logger: ctx.logger,
  });

  if (input.json) {
    ctx.ui.json(output);
  } else {
    ctx.ui.info(`Wrote plan with ${output.plan.items.length} commit(s) to ${output.planPath}`);
    ctx.ui.info('Review or edit it, then run: reword apply --branch <name>');
  }

  return { exitCode: 0, result: output };
}

export function registerPlanCommand(program: Command, run: CommandAction): void {
  const command = program
    .command('plan')
    .description('Suggest new messages for a range of commits and write them to a plan file');

  addFlags(command, planFlags).action((flags: Record<string, unknown>) =>
    run('plan', (ctx) => executePlan(ctx, flags))
  );
}
