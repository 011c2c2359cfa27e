/**
 * Plan replay onto a fresh branch
 *
 * init -> branch-created -> reset -> replaying(0..n-1) -> done
 * Any failure moves to `aborted` and is rethrown. Nothing is rolled back:
 * the new branch keeps whatever was replayed before the failure, and the
 * starting branch is never touched.
 */

import {
  MergeEncounteredError,
  PreconditionError,
  ReplayConflictError,
  SchemaError,
  VcsCommandError,
  type ApplyResult,
  type Plan,
  type PlanItem,
} from '@reword/contracts';
import { FALLBACK_MESSAGE } from '../generator/sanitize';
import { noopLogger, type Logger } from '../logger';
import type { ApplyPlanOptions } from '../types';
import {
  branchExists,
  getParentCount,
  getStagedPaths,
  isAncestor,
  isValidBranchName,
  isWorktreeClean,
  resolveCommit,
  tryResolveCommit,
} from '../vcs/git-commands';
import { describeState, type ActiveApplyState, type ApplyState } from './state';

type AppliedCommit = ApplyResult['commits'][number];

// A hooks directory that cannot exist, so no hook of any kind runs on commit
const NO_HOOKS = ['-c', 'core.hooksPath=/dev/null'];

export class PlanApplier {
  private state: ApplyState = { kind: 'init' };
  private readonly logger: Logger;
  private readonly allowMerges: boolean;

  private base = '';
  private baseDerived = false;
  private readonly commits: AppliedCommit[] = [];
  private readonly skipped: string[] = [];

  constructor(
    private readonly plan: Plan,
    private readonly options: ApplyPlanOptions
  ) {
    this.logger = (options.logger ?? noopLogger).child({ branch: options.branch });
    this.allowMerges = options.allowMerges === true;
  }

  get current(): ApplyState {
    return this.state;
  }

  /**
   * Drive the machine to `done`
   *
   * @throws the error that moved it to `aborted`
   */
  async run(): Promise<ApplyResult> {
    if (this.state.kind !== 'init') {
      throw new PreconditionError(`applier already ran (state: ${describeState(this.state)})`);
    }

    let active: ActiveApplyState = { kind: 'init' };
    for (;;) {
      let next: ApplyState;
      try {
        next = await this.step(active);
      } catch (error) {
        this.transition({ kind: 'aborted', from: active, error });
        throw error;
      }

      this.transition(next);
      if (next.kind === 'done') {
        return next.result;
      }
      if (next.kind === 'aborted') {
        throw next.error;
      }
      active = next;
    }
  }

  private async step(state: ActiveApplyState): Promise<ApplyState> {
    const { vcs } = this.options;

    switch (state.kind) {
      case 'init': {
        await this.checkPreconditions();
        await vcs.run(['checkout', '-b', this.options.branch]);
        return { kind: 'branch-created', branch: this.options.branch };
      }

      case 'branch-created': {
        this.base = await this.resolveBase();
        await vcs.run(['reset', '--hard', this.base]);
        return { kind: 'reset', base: this.base };
      }

      case 'reset':
        return this.replayingOrDone(0);

      case 'replaying': {
        const item = this.plan.items[state.index];
        if (!item) {
          throw new SchemaError(`plan has no item ${state.index}`);
        }
        await this.replay(item, state.index);
        return this.replayingOrDone(state.index + 1);
      }
    }
  }

  private replayingOrDone(index: number): ApplyState {
    const item = this.plan.items[index];
    if (item) {
      return { kind: 'replaying', index, sha: item.sha };
    }

    const { branch } = this.options;
    this.logger.info(
      `done: ${this.commits.length} commit(s) written, ${this.skipped.length} skipped`
    );
    this.logger.warn(
      `commit ids changed; if ${branch} is shared, push with: ` +
        `git push --force-with-lease origin ${branch}`
    );
    return {
      kind: 'done',
      result: {
        branch,
        base: this.base,
        baseDerived: this.baseDerived,
        commits: [...this.commits],
        skipped: [...this.skipped],
      },
    };
  }

  private transition(to: ApplyState): void {
    const from = this.state;
    this.state = to;
    this.logger.debug(`state: ${describeState(from)} -> ${describeState(to)}`);
    this.options.onTransition?.({ from, to });
  }

  /**
   * Everything that can be checked before the first mutation
   */
  private async checkPreconditions(): Promise<void> {
    const { vcs, branch } = this.options;

    if (!branch.trim()) {
      throw new PreconditionError('branch name is required');
    }
    if (!(await isValidBranchName(vcs, branch))) {
      throw new PreconditionError(`invalid branch name: ${branch}`);
    }
    if (await branchExists(vcs, branch)) {
      throw new PreconditionError(`branch ${branch} already exists`);
    }
    if (!(await isWorktreeClean(vcs))) {
      throw new PreconditionError(
        'working tree has uncommitted changes; commit or stash them first'
      );
    }
    if (this.plan.items.length === 0) {
      throw new SchemaError('plan has no items');
    }

    if (this.plan.base) {
      await this.checkBase(this.plan.base);
    }
    for (const item of this.plan.items) {
      if (!(await tryResolveCommit(vcs, item.sha))) {
        throw new PreconditionError(
          `commit ${short(item.sha)} from the plan does not exist in this repository`,
          { sha: item.sha }
        );
      }
    }
  }

  private async checkBase(base: string): Promise<void> {
    const { vcs } = this.options;

    if (!(await tryResolveCommit(vcs, base))) {
      throw new PreconditionError(`plan base ${short(base)} does not exist in this repository`);
    }
    const head = await tryResolveCommit(vcs, this.plan.head);
    if (!head) {
      throw new PreconditionError(
        `plan head ${short(this.plan.head)} does not exist in this repository`
      );
    }
    if (!(await isAncestor(vcs, base, head))) {
      throw new PreconditionError(
        `plan base ${short(base)} is not an ancestor of plan head ${short(head)}`
      );
    }
  }

  private async resolveBase(): Promise<string> {
    const { vcs } = this.options;

    if (this.plan.base) {
      return resolveCommit(vcs, this.plan.base);
    }

    const first = this.plan.items[0];
    if (!first) {
      throw new SchemaError('plan has no items');
    }
    const parent = await tryResolveCommit(vcs, `${first.sha}^`);
    if (!parent) {
      throw new PreconditionError(`plan has no base and ${short(first.sha)} has no parent`, {
        sha: first.sha,
      });
    }
    this.baseDerived = true;
    this.logger.warn(`plan has no base; using parent of first item (${short(parent)})`);
    return parent;
  }

  private async replay(item: PlanItem, index: number): Promise<void> {
    const { vcs } = this.options;
    const log = this.logger.child({ item: index + 1 });

    const isMerge = (await getParentCount(vcs, item.sha)) > 1;
    if (isMerge && !this.allowMerges) {
      if (this.plan.allowMerges) {
        log.warn('plan was made with --allow-merges; pass --allow-merges to apply as well');
      }
      throw new MergeEncounteredError(item.sha);
    }

    const pickArgs = isMerge
      ? ['cherry-pick', '-n', '-m', '1', item.sha]
      : ['cherry-pick', '-n', item.sha];
    try {
      await vcs.run(pickArgs);
    } catch (error) {
      if (!(error instanceof VcsCommandError)) {
        throw error;
      }
      await this.abortPick(log);
      throw new ReplayConflictError(item.sha, error.stderr.trim(), { cause: error });
    }

    const staged = await getStagedPaths(vcs);
    if (staged.length === 0) {
      await vcs.run(['reset']);
      this.skipped.push(item.sha);
      log.info(`skipped (no changes): ${short(item.sha)}  ${item.oldMessage}`);
      return;
    }

    const message = resolveCommitMessage(item);
    await vcs.run([...NO_HOOKS, 'commit', '--no-verify', '-m', message], {
      env: identityEnv(item),
    });
    const sha = await resolveCommit(vcs, 'HEAD');

    this.commits.push({ sourceSha: item.sha, sha, message });
    log.info(`rewrote: ${short(item.sha)} -> ${short(sha)}  ${message.split('\n', 1)[0] ?? ''}`);
  }

  /**
   * `cherry-pick -n` leaves no sequencer state behind, so `--abort` may
   * refuse; fall back to discarding the half-applied change.
   */
  private async abortPick(log: Logger): Promise<void> {
    const { vcs } = this.options;
    try {
      await vcs.run(['cherry-pick', '--abort']);
    } catch (error) {
      if (!(error instanceof VcsCommandError)) {
        throw error;
      }
      log.debug('no cherry-pick in progress; resetting to HEAD', { stderr: error.stderr.trim() });
      await vcs.run(['reset', '--hard', 'HEAD']);
    }
  }
}

/**
 * Replay `plan` onto a new branch
 */
export async function applyPlan(plan: Plan, options: ApplyPlanOptions): Promise<ApplyResult> {
  return new PlanApplier(plan, options).run();
}

/**
 * Message to commit for an item: the new message, else the old one, else the fallback
 */
export function resolveCommitMessage(item: Pick<PlanItem, 'newMessage' | 'oldMessage'>): string {
  if (item.newMessage.trim()) {
    return item.newMessage;
  }
  if (item.oldMessage.trim()) {
    return item.oldMessage;
  }
  return FALLBACK_MESSAGE;
}

/**
 * Author and committer both carry the original author's identity and date
 */
export function identityEnv(
  item: Pick<PlanItem, 'authorName' | 'authorEmail' | 'authorDate'>
): Record<string, string> {
  return {
    GIT_AUTHOR_NAME: item.authorName,
    GIT_AUTHOR_EMAIL: item.authorEmail,
    GIT_AUTHOR_DATE: item.authorDate,
    GIT_COMMITTER_NAME: item.authorName,
    GIT_COMMITTER_EMAIL: item.authorEmail,
    GIT_COMMITTER_DATE: item.authorDate,
  };
}

function short(sha: string): string {
  return sha.slice(0, 7);
}
