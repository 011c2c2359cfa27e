/**
 * reword show
 * Print a saved plan for review between plan and apply
 */

import { resolve } from 'node:path';
import chalk from 'chalk';
import type { Command } from 'commander';
import { ShowInputSchema, showFlags, type Plan, type PlanOutput } from '@reword/contracts';
import { loadPlan } from '@reword/core/storage';
import type { CliContext } from '../context';
import { addFlags, parseFlags } from './flags';
import type { CommandAction } from './types';

export interface ShowCommandResult {
  exitCode: number;
  result?: PlanOutput;
}

export async function executeShow(
  ctx: CliContext,
  flags: Record<string, unknown>
): Promise<ShowCommandResult> {
  const input = parseFlags(ShowInputSchema, {
    ...flags,
    in: flags.in ?? ctx.config.plan.file,
  });

  const planPath = resolve(ctx.cwd, input.in);
  const plan = await loadPlan(planPath);

  if (input.json) {
    ctx.ui.json(plan);
  } else {
    for (const line of formatPlan(plan, planPath)) {
      ctx.ui.info(line);
    }
  }

  return { exitCode: 0, result: { planPath, plan } };
}

/**
 * Human-readable summary: header lines, then one line per item
 */
export function formatPlan(plan: Plan, planPath: string): string[] {
  const base = plan.base ? plan.base.slice(0, 7) : '(parent of first item)';
  const merges = plan.allowMerges ? '  Merges: included' : '';
  const lines = [
    chalk.bold(`Plan: ${planPath}`),
    `Created: ${plan.createdAt}  Model: ${plan.model}${merges}`,
    `Range: ${base}..${plan.head.slice(0, 7)}  Items: ${plan.items.length}`,
    '',
  ];

  plan.items.forEach((item, i) => {
    const [summary = '', ...rest] = item.newMessage.split('\n');
    const next = summary.trim() ? summary : chalk.dim('(keep old message)');
    lines.push(`${i + 1}. ${chalk.yellow(item.sha.slice(0, 7))} ${item.oldMessage}`);
    lines.push(`   -> ${next}`);
    const bodyLines = rest.filter((line) => line.trim() !== '');
    if (bodyLines.length > 0) {
      lines.push(chalk.dim(`      (+${bodyLines.length} body line(s))`));
    }
  });

  return lines;
}

export function registerShowCommand(program: Command, run: CommandAction): void {
  const command = program.command('show').description('Print a saved plan');

  addFlags(command, showFlags).action((flags: Record<string, unknown>) =>
    run('show', (ctx) => executeShow(ctx, flags))
  );
}
