/**
 * Per-invocation context handed to every command
 */

import {
  parseRewordEnv,
  resolveRewordConfig,
  type RewordConfig,
  type SuggestionConfig,
} from '@reword/contracts';
import { createConsoleLogger, type Logger } from '@reword/core';
import { OpenAiSuggester, type MessageSuggester } from '@reword/core/generator';
import { SimpleGitAdapter, type VcsAdapter } from '@reword/core/vcs';

/**
 * Command output on stdout; progress and errors go through the logger (stderr)
 */
export interface CliUi {
  info(text: string): void;
  json(value: unknown): void;
}

export interface CliContext {
  cwd: string;
  config: RewordConfig;
  logger: Logger;
  ui: CliUi;
  vcs: VcsAdapter;
  createSuggester(config: SuggestionConfig): MessageSuggester;
}

/**
 * Seams for embedding and tests; everything defaults to the real process
 */
export interface CliDependencies {
  cwd?: string;
  env?: Record<string, string | undefined>;
  stdout?: (text: string) => void;
  stderr?: (line: string) => void;
  createVcs?: (cwd: string) => VcsAdapter;
  createSuggester?: (config: SuggestionConfig) => MessageSuggester;
}

export interface GlobalOptions {
  verbose?: boolean;
}

export function createCliContext(deps: CliDependencies, options: GlobalOptions): CliContext {
  const config = resolveRewordConfig(parseRewordEnv(deps.env ?? process.env));
  const cwd = deps.cwd ?? process.cwd();
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(text));
  const createVcs = deps.createVcs ?? ((dir: string) => new SimpleGitAdapter(dir));

  return {
    cwd,
    config,
    logger: createConsoleLogger({
      verbose: options.verbose === true || config.debug,
      write: deps.stderr,
    }),
    ui: {
      info: (text) => stdout(`${text}\n`),
      json: (value) => stdout(`${JSON.stringify(value, null, 2)}\n`),
    },
    vcs: createVcs(cwd),
    createSuggester: deps.createSuggester ?? ((suggestion) => new OpenAiSuggester(suggestion)),
  };
}
