/**
 * reword command line program
 */

import { Command, CommanderError } from 'commander';
import { createConsoleLogger, type Logger } from '@reword/core';
import { version } from '../../package.json';
import { createCliContext, type CliDependencies, type GlobalOptions } from './context';
import {
  registerApplyCommand,
  registerPlanCommand,
  registerShowCommand,
  type CommandAction,
} from './commands';

export function createProgram(deps: CliDependencies = {}): Command {
  const program = new Command();
  const writeLine = deps.stderr ?? ((line: string) => process.stderr.write(`${line}\n`));

  program
    .name('reword')
    .description('Rewrite commit messages with suggested ones, preserving authorship and trees')
    .version(version)
    .option('--verbose', 'Print debug output (also REWORD_DEBUG=1)', false)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => (deps.stdout ?? ((out: string) => process.stdout.write(out)))(text),
      writeErr: (text) => writeLine(text.replace(/\n$/, '')),
    });

  const run: CommandAction = async (name, execute) => {
    const options = program.opts<GlobalOptions>();
    let logger: Logger = createConsoleLogger({ verbose: options.verbose, write: deps.stderr });

    try {
      const ctx = createCliContext(deps, options);
      logger = ctx.logger;
      const { exitCode } = await execute(ctx);
      if (exitCode !== 0) {
        throw new CommanderError(exitCode, 'reword.exit', `${name} exited with code ${exitCode}`);
      }
    } catch (error) {
      if (error instanceof CommanderError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`${name} error: ${message}`, error);
      throw new CommanderError(1, 'reword.failed', message);
    }
  };

  registerPlanCommand(program, run);
  registerApplyCommand(program, run);
  registerShowCommand(program, run);

  return program;
}

/**
 * Parse `argv` (without the node and script entries) and run the command
 *
 * @returns process exit code
 */
export async function runCli(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const program = createProgram(deps);
  try {
    await program.parseAsync([...argv], { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
}
