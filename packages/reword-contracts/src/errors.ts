/**
 * Error taxonomy for reword
 *
 * Every failure is fatal: errors propagate to the CLI, which prints the
 * message and exits non-zero. `sha` names the offending commit where one
 * exists.
 */

export type RewordErrorCode =
  | 'ConfigurationError'
  | 'RangeResolutionError'
  | 'EmptyRangeError'
  | 'SuggestionServiceError'
  | 'SchemaError'
  | 'PreconditionError'
  | 'MergeEncounteredError'
  | 'ReplayConflictError'
  | 'VcsCommandError';

export interface RewordErrorOptions {
  /** Underlying failure */
  cause?: unknown;
  /** Commit the failure is about */
  sha?: string;
}

export class RewordError extends Error {
  public readonly code: RewordErrorCode;
  public readonly sha?: string;
  public readonly cause?: unknown;

  constructor(code: RewordErrorCode, message: string, options: RewordErrorOptions = {}) {
    super(message);
    this.name = code;
    this.code = code;
    this.sha = options.sha;
    this.cause = options.cause;
  }
}

/**
 * Missing credential or unusable configuration
 */
export class ConfigurationError extends RewordError {
  constructor(message: string, options: RewordErrorOptions = {}) {
    super('ConfigurationError', message, options);
  }
}

/**
 * Range expression could not be parsed or resolved
 */
export class RangeResolutionError extends RewordError {
  constructor(
    message: string,
    options: RewordErrorOptions = {},
    code: RewordErrorCode = 'RangeResolutionError'
  ) {
    super(code, message, options);
  }
}

/**
 * Range resolved but contains no commits
 */
export class EmptyRangeError extends RangeResolutionError {
  constructor(range: string) {
    super(`no commits in range ${range}`, {}, 'EmptyRangeError');
  }
}

/**
 * Suggestion call timed out, failed in transport, or returned nothing usable
 */
export class SuggestionServiceError extends RewordError {
  constructor(message: string, options: RewordErrorOptions = {}) {
    super('SuggestionServiceError', message, options);
  }
}

/**
 * Persisted plan is malformed
 */
export class SchemaError extends RewordError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [], options: RewordErrorOptions = {}) {
    super('SchemaError', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, options);
    this.issues = issues;
  }
}

/**
 * Apply refused to start: dirty worktree, bad branch name, unknown commit
 */
export class PreconditionError extends RewordError {
  constructor(message: string, options: RewordErrorOptions = {}) {
    super('PreconditionError', message, options);
  }
}

export class MergeEncounteredError extends RewordError {
  constructor(sha: string) {
    super(
      'MergeEncounteredError',
      `merge commit detected (${sha.slice(0, 7)}). rerun with --allow-merges (experimental).`,
      { sha }
    );
  }
}

export class ReplayConflictError extends RewordError {
  constructor(sha: string, detail: string, options: RewordErrorOptions = {}) {
    super(
      'ReplayConflictError',
      `cherry-pick failed at ${sha.slice(0, 7)}; resolve manually and rerun` +
        (detail ? `\n${detail}` : ''),
      { ...options, sha }
    );
  }
}

/**
 * A git invocation exited non-zero. `stderr` is kept verbatim.
 */
export class VcsCommandError extends RewordError {
  public readonly args: readonly string[];
  public readonly stderr: string;

  constructor(args: readonly string[], stderr: string, options: RewordErrorOptions = {}) {
    super('VcsCommandError', `git ${args.join(' ')} failed: ${stderr.trim()}`, options);
    this.args = args;
    this.stderr = stderr;
  }
}
