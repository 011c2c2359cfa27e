/**
 * Tests for planner.ts - plan generation end to end
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import {
  ConfigurationError,
  EmptyRangeError,
  SuggestionServiceError,
} from '@reword/contracts';
import { generatePlan, planAndSave, suggestWithTimeout } from '../../src/generator/planner';
import { ScriptedSuggester, type SuggestionRequest } from '../../src/generator/suggester';
import { TRUNCATION_MARKER } from '../../src/analyzer/commit-diff';
import { loadPlan } from '../../src/storage/plan-storage';
import type { Logger } from '../../src/logger';
import { SimpleGitAdapter } from '../../src/vcs/simple-git-adapter';
import { createTestRepo, type TestRepo } from '../helpers/git-repo';
import { FakeVcs } from '../helpers/fake-vcs';

const FIXED_NOW = new Date('2024-05-06T07:08:09.000Z');

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

describe('generatePlan', () => {
  let repo: TestRepo;
  let vcs: SimpleGitAdapter;
  let base: string;
  let first: string;
  let second: string;

  beforeEach(async () => {
    repo = await createTestRepo();
    vcs = new SimpleGitAdapter(repo.dir);
    base = await repo.commit('base', { 'a.txt': 'a' });
    first = await repo.commit('wip', { 'b.txt': 'b' }, {
      author: 'Ada Author <ada@example.com>',
      date: '2024-01-02T03:04:05+01:00',
    });
    second = await repo.commit('more stuff', { 'c.txt': 'c' });
  });

  afterEach(async () => {
    await repo.cleanup();
  });

  it('should build a plan oldest to newest with sanitized messages', async () => {
    const suggester = new ScriptedSuggester(['## [feat]: add b', 'fix: add c\n\n- details']);
    const lines: string[] = [];

    const plan = await generatePlan({
      vcs,
      limit: 20,
      model: 'test-model',
      timeoutMs: 5000,
      createSuggester: () => suggester,
      logger: recordingLogger(lines),
      now: () => FIXED_NOW,
    });

    expect(plan).toEqual({
      schemaVersion: '1.0',
      repoPath: repo.dir,
      base,
      head: second,
      createdAt: '2024-05-06T07:08:09.000Z',
      model: 'test-model',
      allowMerges: false,
      items: [
        {
          sha: first,
          oldMessage: 'wip',
          newMessage: 'feat: add b',
          authorName: 'Ada Author',
          authorEmail: 'ada@example.com',
          authorDate: '2024-01-02T03:04:05+01:00',
        },
        {
          sha: second,
          oldMessage: 'more stuff',
          newMessage: 'fix: add c\n\n- details',
          authorName: 'Test User',
          authorEmail: 'test@example.com',
          authorDate: expect.any(String),
        },
      ],
    });
    expect(suggester.requests.map((r) => r.oldMessage)).toEqual(['wip', 'more stuff']);
    expect(suggester.requests[0]?.model).toBe('test-model');
    expect(suggester.requests[0]?.diff).toContain('b.txt');
    expect(lines).toEqual([
      `info planned: ${first.slice(0, 7)}  wip -> feat: add b`,
      `info planned: ${second.slice(0, 7)}  more stuff -> fix: add c`,
    ]);
  });

  it('should honor an explicit range', async () => {
    const suggester = new ScriptedSuggester(['feat: only second']);

    const plan = await generatePlan({
      vcs,
      limit: 20,
      range: `${first}..${second}`,
      model: 'm',
      timeoutMs: 5000,
      createSuggester: () => suggester,
    });

    expect(plan.base).toBe(first);
    expect(plan.items.map((item) => item.sha)).toEqual([second]);
  });

  it('should pass the truncated diff to the suggester', async () => {
    const suggester = new ScriptedSuggester(() => 'chore: x');

    await generatePlan({
      vcs,
      limit: 1,
      model: 'm',
      timeoutMs: 5000,
      maxDiffChars: 50,
      createSuggester: () => suggester,
    });

    expect(suggester.requests).toHaveLength(1);
    expect(suggester.requests[0]?.diff.endsWith(TRUNCATION_MARKER)).toBe(true);
  });

  it('should not build the suggester for an empty range', async () => {
    const createSuggester = vi.fn(() => new ScriptedSuggester([]));

    await expect(
      generatePlan({ vcs, limit: 1, range: 'HEAD..HEAD', model: 'm', timeoutMs: 5000, createSuggester })
    ).rejects.toBeInstanceOf(EmptyRangeError);
    expect(createSuggester).not.toHaveBeenCalled();
  });

  it('should surface a missing credential before any suggestion', async () => {
    const createSuggester = vi.fn((): ScriptedSuggester => {
      throw new ConfigurationError('OPENAI_API_KEY is not set');
    });

    await expect(
      generatePlan({ vcs, limit: 5, model: 'm', timeoutMs: 5000, createSuggester })
    ).rejects.toThrow('OPENAI_API_KEY is not set');
    expect(createSuggester).toHaveBeenCalledTimes(1);
  });

  it('should abort the whole run on a suggestion failure, naming the commit', async () => {
    const suggester = new ScriptedSuggester([new Error('boom'), 'feat: never reached']);

    const error = await generatePlan({
      vcs,
      limit: 5,
      model: 'm',
      timeoutMs: 5000,
      createSuggester: () => suggester,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SuggestionServiceError);
    if (!(error instanceof SuggestionServiceError)) return;
    expect(error.sha).toBe(first);
    expect(error.message).toBe(`suggestion failed for ${first.slice(0, 7)}: boom`);
    expect(suggester.requests).toHaveLength(1);
  });

  it('should treat a decoration-only answer as a failure', async () => {
    const suggester = new ScriptedSuggester(['```\n```']);

    await expect(
      generatePlan({ vcs, limit: 1, model: 'm', timeoutMs: 5000, createSuggester: () => suggester })
    ).rejects.toThrow(`suggestion for ${second.slice(0, 7)} was empty`);
  });

  it('should fail a suggestion that outlives its deadline', async () => {
    let seen: SuggestionRequest | undefined;
    const suggester = new ScriptedSuggester((request) => {
      seen = request;
      return new Promise<string>(() => undefined);
    });

    await expect(
      generatePlan({ vcs, limit: 1, model: 'm', timeoutMs: 20, createSuggester: () => suggester })
    ).rejects.toThrow(`suggestion failed for ${second.slice(0, 7)}: timed out after 20ms`);
    expect(seen?.signal?.aborted).toBe(true);
  });
});

describe('generatePlan - merges', () => {
  let repo: TestRepo;
  let vcs: SimpleGitAdapter;
  let base: string;

  beforeEach(async () => {
    repo = await createTestRepo();
    vcs = new SimpleGitAdapter(repo.dir);
    base = await repo.commit('base', { 'a.txt': 'a' });
    await repo.git.raw(['checkout', '-b', 'side']);
    await repo.commit('side work', { 'b.txt': 'b' });
    await repo.git.raw(['checkout', 'main']);
    await repo.commit('main work', { 'c.txt': 'c' });
    await repo.git.raw(['merge', '--no-ff', '--no-edit', 'side']);
  });

  afterEach(async () => {
    await repo.cleanup();
  });

  it('should skip merge commits unless allowed', async () => {
    const lines: string[] = [];
    const plan = await generatePlan({
      vcs,
      limit: 20,
      range: `${base}..HEAD`,
      model: 'm',
      timeoutMs: 5000,
      createSuggester: () => new ScriptedSuggester(() => 'chore: reworded'),
      logger: recordingLogger(lines),
    });

    expect(plan.items).toHaveLength(2);
    expect(plan.items.map((item) => item.oldMessage).sort()).toEqual(['main work', 'side work']);
    expect(lines.filter((line) => line.startsWith('info skipped merge:'))).toHaveLength(1);
  });

  it('should include merge commits when allowed', async () => {
    const plan = await generatePlan({
      vcs,
      limit: 20,
      range: `${base}..HEAD`,
      model: 'm',
      allowMerges: true,
      timeoutMs: 5000,
      createSuggester: () => new ScriptedSuggester(() => 'chore: reworded'),
    });

    expect(plan.allowMerges).toBe(true);
    expect(plan.items).toHaveLength(3);
    expect(plan.items[2]?.oldMessage).toMatch(/^Merge branch 'side'/);
  });
});

describe('generatePlan - only merges in range', () => {
  it('should fail when every commit is a skipped merge', async () => {
    const head = 'b'.repeat(40);
    const base = 'a'.repeat(40);
    const vcs = new FakeVcs()
      .on('rev-parse --verify', `${base}\n`)
      .on('rev-parse --verify HEAD', `${head}\n`)
      .on('rev-parse --show-toplevel', '/work/repo\n')
      .on('log', `${head}\x1fMerge branch 'x'\x1fA\x1fa@example.com\x1f2024-01-01T00:00:00Z\x1f${base} ${'c'.repeat(40)}\x1e\n`);
    const lines: string[] = [];

    await expect(
      generatePlan({
        vcs,
        limit: 1,
        model: 'm',
        timeoutMs: 5000,
        createSuggester: () => new ScriptedSuggester([]),
        logger: recordingLogger(lines),
      })
    ).rejects.toBeInstanceOf(EmptyRangeError);
    expect(lines).toContain('warn every commit in range is a merge; rerun with --allow-merges to include them');
    expect(vcs.commands.some((command) => command.startsWith('show'))).toBe(false);
  });
});

describe('planAndSave', () => {
  let repo: TestRepo;

  beforeEach(async () => {
    repo = await createTestRepo();
    await repo.commit('base', { 'a.txt': 'a' });
    await repo.commit('change', { 'a.txt': 'b' });
  });

  afterEach(async () => {
    await repo.cleanup();
  });

  it('should write a plan that loads back unchanged', async () => {
    const out = join(repo.dir, '.reword', 'plan.json');

    const result = await planAndSave({
      vcs: new SimpleGitAdapter(repo.dir),
      limit: 1,
      model: 'm',
      timeoutMs: 5000,
      out,
      createSuggester: () => new ScriptedSuggester(['fix: change a']),
    });

    expect(result.planPath).toBe(out);
    expect(await loadPlan(out)).toEqual(result.plan);
    expect(result.plan.items[0]?.newMessage).toBe('fix: change a');
  });
});

describe('suggestWithTimeout', () => {
  it('should resolve with the answer and leave the signal untouched', async () => {
    let signal: AbortSignal | undefined;
    const suggester = new ScriptedSuggester((request) => {
      signal = request.signal;
      return 'feat: quick';
    });

    await expect(suggestWithTimeout(suggester, { model: 'm', diff: '', oldMessage: '' }, 1000)).resolves.toBe(
      'feat: quick'
    );
    expect(signal?.aborted).toBe(false);
  });

  it('should reject with SuggestionServiceError on expiry', async () => {
    const suggester = new ScriptedSuggester(() => new Promise<string>(() => undefined));

    await expect(
      suggestWithTimeout(suggester, { model: 'm', diff: '', oldMessage: '' }, 10)
    ).rejects.toBeInstanceOf(SuggestionServiceError);
  });
});
