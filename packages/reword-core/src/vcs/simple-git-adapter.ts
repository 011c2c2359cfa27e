/**
 * VcsAdapter backed by simple-git
 */

import { GitError, simpleGit, type SimpleGit, type SimpleGitOptions } from 'simple-git';
import { VcsCommandError } from '@reword/contracts';
import type { VcsAdapter, VcsRunOptions } from './adapter';

/**
 * Variables passed through when an invocation sets its own environment.
 * simple-git replaces the child environment wholesale, so git still needs
 * these to find itself and the user's global config.
 */
const INHERITED_ENV = [
  'PATH',
  'HOME',
  'USERPROFILE',
  'SYSTEMROOT',
  'TMPDIR',
  'TEMP',
  'TMP',
  'LANG',
  'LC_ALL',
  'XDG_CONFIG_HOME',
] as const;

/**
 * simple-git only rejects when a failing command also wrote to stderr;
 * treat every non-zero exit as a failure.
 */
const detectFailure: NonNullable<SimpleGitOptions['errors']> = (error, result) => {
  if (error) return error;
  if (result.exitCode === 0) return undefined;

  const stderr = Buffer.concat(result.stdErr);
  return stderr.length > 0 ? stderr : Buffer.from(`exit code ${result.exitCode}`);
};

export class SimpleGitAdapter implements VcsAdapter {
  constructor(private readonly cwd: string) {}

  async run(args: readonly string[], options: VcsRunOptions = {}): Promise<string> {
    const git = this.client(options.env);

    try {
      return await git.raw([...args]);
    } catch (error) {
      if (error instanceof GitError) {
        throw new VcsCommandError(args, error.message, { cause: error });
      }
      throw error;
    }
  }

  private client(env?: Record<string, string>): SimpleGit {
    const git = simpleGit({ baseDir: this.cwd, errors: detectFailure });
    if (!env) {
      return git;
    }
    return git.env({ ...inheritedEnv(), ...env });
  }
}

function inheritedEnv(): Record<string, string> {
  const env: Record<string, string> = {};
  for (const key of INHERITED_ENV) {
    const value = process.env[key];
    if (value !== undefined) {
      env[key] = value;
    }
  }
  return env;
}
