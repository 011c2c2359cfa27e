/**
 * Tests for the PlanApplier state machine against an in-memory VCS
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  MergeEncounteredError,
  PreconditionError,
  ReplayConflictError,
  type Plan,
} from '@reword/contracts';
import { PlanApplier, identityEnv, resolveCommitMessage } from '../../src/applier/apply';
import { describeState, type ApplyTransition } from '../../src/applier/state';
import type { Logger } from '../../src/logger';
import { FakeVcs, gitFailure } from '../helpers/fake-vcs';

const BASE = 'a'.repeat(40);
const FIRST = 'b'.repeat(40);
const SECOND = 'c'.repeat(40);
const PARENT = 'd'.repeat(40);
const NEW_HEAD = 'e'.repeat(40);
const COMMIT = '-c core.hooksPath=/dev/null commit --no-verify';

function makePlan(overrides: Partial<Plan> = {}): Plan {
  return {
    schemaVersion: '1.0',
    repoPath: '/work/repo',
    base: BASE,
    head: SECOND,
    createdAt: '2024-05-06T07:08:09.000Z',
    model: 'test-model',
    allowMerges: false,
    items: [
      {
        sha: FIRST,
        oldMessage: 'wip',
        newMessage: 'feat: one',
        authorName: 'Ada Author',
        authorEmail: 'ada@example.com',
        authorDate: '2024-01-01T10:00:00+01:00',
      },
      {
        sha: SECOND,
        oldMessage: 'more',
        newMessage: 'fix: two',
        authorName: 'Bob Builder',
        authorEmail: 'bob@example.com',
        authorDate: '2024-01-02T10:00:00Z',
      },
    ],
    ...overrides,
  };
}

/**
 * Repository where every precondition holds and every pick stages a change
 */
function healthyVcs(): FakeVcs {
  return new FakeVcs()
    .on('rev-parse --verify', (args) => {
      const rev = (args[2] ?? '').replace(/\^\{commit\}$/, '');
      if (rev === 'HEAD') return `${NEW_HEAD}\n`;
      if (rev.endsWith('^')) return `${PARENT}\n`;
      return `${rev}\n`;
    })
    .on('rev-parse --verify --quiet refs/heads/', gitFailure('rev-parse --verify --quiet', ''))
    .on('rev-list --parents -n 1', (args) => `${args[4]} ${PARENT}\n`)
    .on('diff --cached --name-only', 'file.txt\n');
}

function mutations(vcs: FakeVcs): string[] {
  return vcs.commands.filter((command) => /^(-c \S+ )?(checkout|reset|cherry-pick|commit)\b/.test(command));
}

function recordingLogger(lines: string[]): Logger {
  const logger: Logger = {
    debug: () => undefined,
    info: (message) => lines.push(`info ${message}`),
    warn: (message) => lines.push(`warn ${message}`),
    error: (message) => lines.push(`error ${message}`),
    child: () => logger,
  };
  return logger;
}

describe('PlanApplier', () => {
  let transitions: ApplyTransition[];

  beforeEach(() => {
    transitions = [];
  });

  const onTransition = (transition: ApplyTransition) => {
    transitions.push(transition);
  };

  it('should walk init -> branch-created -> reset -> replaying -> done', async () => {
    const vcs = healthyVcs();
    const applier = new PlanApplier(makePlan(), { vcs, branch: 'reworded', onTransition });

    const result = await applier.run();

    expect(transitions.map((t) => `${describeState(t.from)} -> ${describeState(t.to)}`)).toEqual([
      'init -> branch-created',
      'branch-created -> reset',
      'reset -> replaying(0)',
      'replaying(0) -> replaying(1)',
      'replaying(1) -> done',
    ]);
    expect(applier.current.kind).toBe('done');
    expect(result).toEqual({
      branch: 'reworded',
      base: BASE,
      baseDerived: false,
      commits: [
        { sourceSha: FIRST, sha: NEW_HEAD, message: 'feat: one' },
        { sourceSha: SECOND, sha: NEW_HEAD, message: 'fix: two' },
      ],
      skipped: [],
    });
  });

  it('should issue the replay commands in order with the original identity', async () => {
    const vcs = healthyVcs();

    await new PlanApplier(makePlan(), { vcs, branch: 'reworded' }).run();

    expect(mutations(vcs)).toEqual([
      'checkout -b reworded',
      `reset --hard ${BASE}`,
      `cherry-pick -n ${FIRST}`,
      `${COMMIT} -m feat: one`,
      `cherry-pick -n ${SECOND}`,
      `${COMMIT} -m fix: two`,
    ]);
    const commitEnvs = vcs.calls.filter((call) => call.args.includes('commit')).map((call) => call.env);
    expect(commitEnvs).toEqual([
      {
        GIT_AUTHOR_NAME: 'Ada Author',
        GIT_AUTHOR_EMAIL: 'ada@example.com',
        GIT_AUTHOR_DATE: '2024-01-01T10:00:00+01:00',
        GIT_COMMITTER_NAME: 'Ada Author',
        GIT_COMMITTER_EMAIL: 'ada@example.com',
        GIT_COMMITTER_DATE: '2024-01-01T10:00:00+01:00',
      },
      identityEnv({ authorName: 'Bob Builder', authorEmail: 'bob@example.com', authorDate: '2024-01-02T10:00:00Z' }),
    ]);
  });

  it('should check every precondition before mutating', async () => {
    const vcs = healthyVcs().on('status --porcelain', ' M file.txt\n');
    const applier = new PlanApplier(makePlan(), { vcs, branch: 'reworded', onTransition });

    await expect(applier.run()).rejects.toBeInstanceOf(PreconditionError);

    expect(mutations(vcs)).toEqual([]);
    expect(transitions).toHaveLength(1);
    expect(describeState(transitions[0]?.to ?? { kind: 'init' })).toBe('aborted(from init)');
  });

  it('should skip an item that stages nothing', async () => {
    let diffCalls = 0;
    const vcs = healthyVcs().on('diff --cached --name-only', () => (diffCalls++ === 0 ? '' : 'file.txt\n'));
    const lines: string[] = [];

    const result = await new PlanApplier(makePlan(), {
      vcs,
      branch: 'reworded',
      logger: recordingLogger(lines),
    }).run();

    expect(result.skipped).toEqual([FIRST]);
    expect(result.commits.map((c) => c.sourceSha)).toEqual([SECOND]);
    expect(mutations(vcs)).toEqual([
      'checkout -b reworded',
      `reset --hard ${BASE}`,
      `cherry-pick -n ${FIRST}`,
      'reset',
      `cherry-pick -n ${SECOND}`,
      `${COMMIT} -m fix: two`,
    ]);
    expect(lines).toContain(`info skipped (no changes): ${FIRST.slice(0, 7)}  wip`);
  });

  it('should abort the pick and stop on conflict', async () => {
    const vcs = healthyVcs()
      .on(`cherry-pick -n ${SECOND}`, gitFailure(`cherry-pick -n ${SECOND}`, 'error: could not apply cccccc\n'))
      .on('cherry-pick --abort', gitFailure('cherry-pick --abort', 'error: no cherry-pick or revert in progress'));
    const applier = new PlanApplier(makePlan(), { vcs, branch: 'reworded', onTransition });

    const error = await applier.run().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ReplayConflictError);
    expect(error instanceof Error ? error.message : '').toBe(
      'cherry-pick failed at ccccccc; resolve manually and rerun\nerror: could not apply cccccc'
    );
    expect(mutations(vcs).slice(-4)).toEqual([
      `${COMMIT} -m feat: one`,
      `cherry-pick -n ${SECOND}`,
      'cherry-pick --abort',
      'reset --hard HEAD',
    ]);
    expect(describeState(applier.current)).toBe('aborted(from replaying(1))');
  });

  it('should not reset when the pick aborts cleanly', async () => {
    const vcs = healthyVcs().on(`cherry-pick -n ${FIRST}`, gitFailure(`cherry-pick -n ${FIRST}`, 'conflict'));

    await expect(new PlanApplier(makePlan(), { vcs, branch: 'reworded' }).run()).rejects.toBeInstanceOf(
      ReplayConflictError
    );
    expect(mutations(vcs).slice(-2)).toEqual([`cherry-pick -n ${FIRST}`, 'cherry-pick --abort']);
  });

  it('should pick merges against the first parent when allowed', async () => {
    const vcs = healthyVcs().on(`rev-list --parents -n 1 ${FIRST}`, `${FIRST} ${PARENT} ${BASE}\n`);

    await new PlanApplier(makePlan(), { vcs, branch: 'reworded', allowMerges: true }).run();

    expect(mutations(vcs)).toContain(`cherry-pick -n -m 1 ${FIRST}`);
  });

  it('should not replay merges on the plan flag alone', async () => {
    const vcs = healthyVcs().on(`rev-list --parents -n 1 ${FIRST}`, `${FIRST} ${PARENT} ${BASE}\n`);
    const lines: string[] = [];

    await expect(
      new PlanApplier(makePlan({ allowMerges: true }), {
        vcs,
        branch: 'reworded',
        logger: recordingLogger(lines),
      }).run()
    ).rejects.toBeInstanceOf(MergeEncounteredError);

    expect(lines).toContain('warn plan was made with --allow-merges; pass --allow-merges to apply as well');
    expect(mutations(vcs)).toEqual(['checkout -b reworded', `reset --hard ${BASE}`]);
  });

  it('should refuse a base that is not an ancestor of the plan head', async () => {
    const vcs = healthyVcs().on(
      'merge-base --is-ancestor',
      gitFailure(`merge-base --is-ancestor ${BASE} ${SECOND}`, '')
    );

    const error = await new PlanApplier(makePlan(), { vcs, branch: 'reworded' }).run().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PreconditionError);
    expect(error instanceof Error ? error.message : '').toBe(
      'plan base aaaaaaa is not an ancestor of plan head ccccccc'
    );
    expect(vcs.commands).toContain(`merge-base --is-ancestor ${BASE} ${SECOND}`);
    expect(mutations(vcs)).toEqual([]);
  });

  it('should derive a missing base from the first item and warn', async () => {
    const vcs = healthyVcs();
    const lines: string[] = [];

    const result = await new PlanApplier(makePlan({ base: '' }), {
      vcs,
      branch: 'reworded',
      logger: recordingLogger(lines),
    }).run();

    expect(result.base).toBe(PARENT);
    expect(result.baseDerived).toBe(true);
    expect(mutations(vcs)[1]).toBe(`reset --hard ${PARENT}`);
    expect(lines).toContain(`warn plan has no base; using parent of first item (${PARENT.slice(0, 7)})`);
  });

  it('should remind about force-pushing when done', async () => {
    const lines: string[] = [];

    await new PlanApplier(makePlan(), { vcs: healthyVcs(), branch: 'reworded', logger: recordingLogger(lines) }).run();

    expect(lines.slice(-2)).toEqual([
      'info done: 2 commit(s) written, 0 skipped',
      'warn commit ids changed; if reworded is shared, push with: git push --force-with-lease origin reworded',
    ]);
  });

  it('should run only once', async () => {
    const applier = new PlanApplier(makePlan(), { vcs: healthyVcs(), branch: 'reworded' });
    await applier.run();

    await expect(applier.run()).rejects.toThrow('applier already ran (state: done)');
  });
});

describe('resolveCommitMessage', () => {
  it.each([
    [{ newMessage: 'feat: new', oldMessage: 'old' }, 'feat: new'],
    [{ newMessage: '', oldMessage: 'old' }, 'old'],
    [{ newMessage: ' \n ', oldMessage: 'old' }, 'old'],
    [{ newMessage: '', oldMessage: '' }, 'chore: update'],
  ])('should pick %j -> %s', (item, expected) => {
    expect(resolveCommitMessage(item)).toBe(expected);
  });
});
