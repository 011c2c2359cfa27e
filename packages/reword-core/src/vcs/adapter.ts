/**
 * Version-control boundary
 *
 * Everything above this layer talks to git through `run`, so the planner and
 * applier can be driven by a real repository or an in-memory fake.
 */

export interface VcsRunOptions {
  /** Extra environment for this invocation only */
  env?: Record<string, string>;
}

export interface VcsAdapter {
  /**
   * Run one git subcommand and resolve with its stdout.
   * Rejects with VcsCommandError on a non-zero exit; never retries.
   */
  run(args: readonly string[], options?: VcsRunOptions): Promise<string>;
}
