import type { CliContext } from '../context';

export interface CommandOutcome {
  exitCode: number;
}

/**
 * Runs a command body with a fresh context and turns failures into exit codes
 */
export type CommandAction = (
  name: string,
  execute: (ctx: CliContext) => Promise<CommandOutcome>
) => Promise<void>;
