/**
 * Flag wiring between @reword/contracts definitions, commander and zod
 */

import type { Command } from 'commander';
import type { ZodType, ZodTypeDef } from 'zod';
import { ConfigurationError, type FlagDefinition, type FlagSet } from '@reword/contracts';

/**
 * Register every flag of `flags` as a commander option on `command`
 */
export function addFlags(command: Command, flags: FlagSet): Command {
  for (const [name, flag] of Object.entries(flags)) {
    command.option(optionSpec(name, flag), optionDescription(flag), flag.default);
  }
  return command;
}

function optionSpec(name: string, flag: FlagDefinition): string {
  const short = flag.alias ? `-${flag.alias}, ` : '';
  if (flag.type === 'boolean') {
    return `${short}--${name}`;
  }
  return `${short}--${name} ${flag.valueName ?? '<value>'}`;
}

function optionDescription(flag: FlagDefinition): string {
  if (flag.type === 'string' && flag.examples && flag.examples.length > 0) {
    return `${flag.description} (e.g. ${flag.examples.join(', ')})`;
  }
  return flag.description;
}

/**
 * Validate raw flag values; issues are reported with their flag names
 *
 * @throws ConfigurationError listing every invalid flag
 */
export function parseFlags<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  raw: Record<string, unknown>
): T {
  const result = schema.safeParse(raw);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map((issue) => {
    if (issue.message.startsWith('--')) {
      return issue.message;
    }
    const key = issue.path[0];
    const flag = typeof key === 'string' ? `--${toKebab(key)}` : 'options';
    return `${flag}: ${issue.message}`;
  });
  throw new ConfigurationError(issues.join('; '));
}

function toKebab(name: string): string {
  return name.replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`);
}
