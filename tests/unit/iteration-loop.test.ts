import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { IterationLoop, parseLoopArgs, type LoopSettings } from '../../src/loop/iteration-loop.js';
import { ReviewGate } from '../../src/loop/review-gate.js';
import { BranchSynchronizer } from '../../src/git/sync.js';
import { ExecutionRouter } from '../../src/router/execution-router.js';
import { MemoryStateStore } from '../../src/state/state-store.js';
import { LoopUsageError } from '../../src/errors.js';
import type { StructuredRunner } from '../../src/backends/invoker.js';
import { defaultRouterState } from '../../src/types.js';
import { FakeGit, FakeInvoker, RecordingNotifier, makeTempDir, removeTempDir } from '../helpers/fakes.js';

describe('parseLoopArgs', () => {
  it('should default to an unbounded build', () => {
    expect(parseLoopArgs([])).toEqual({ mode: 'build', maxIterations: 0 });
  });

  it('should parse plan with and without a limit', () => {
    expect(parseLoopArgs(['plan'])).toEqual({ mode: 'plan', maxIterations: 0 });
    expect(parseLoopArgs(['plan', '3'])).toEqual({ mode: 'plan', maxIterations: 3 });
  });

  it('should require a description for plan-work and default to five iterations', () => {
    expect(parseLoopArgs(['plan-work', 'add login'])).toEqual({
      mode: 'plan-work',
      workScope: 'add login',
      maxIterations: 5,
    });
    expect(parseLoopArgs(['plan-work', 'add login', '2']).maxIterations).toBe(2);
    expect(() => parseLoopArgs(['plan-work'])).toThrow(LoopUsageError);
    expect(() => parseLoopArgs(['plan-work', '  '])).toThrow('plan-work requires a work description');
  });

  it('should run review exactly once', () => {
    expect(parseLoopArgs(['review'])).toEqual({ mode: 'review', maxIterations: 1 });
  });

  it('should accept build with a limit or a bare number', () => {
    expect(parseLoopArgs(['build', '7'])).toEqual({ mode: 'build', maxIterations: 7 });
    expect(parseLoopArgs(['12'])).toEqual({ mode: 'build', maxIterations: 12 });
  });

  it('should reject unknown modes and bad counts', () => {
    expect(() => parseLoopArgs(['deploy'])).toThrow('Unknown loop mode: deploy');
    expect(() => parseLoopArgs(['plan', 'many'])).toThrow('max iterations must be a non-negative integer, got "many"');
  });
});

describe('IterationLoop', () => {
  let dir: string;
  let invoker: FakeInvoker;
  let notifier: RecordingNotifier;
  let git: FakeGit;
  let router: ExecutionRouter;
  let settings: LoopSettings;

  const makeLoop = (autopush = false, extra: { reviewGate?: ReviewGate } = {}) =>
    new IterationLoop(
      {
        router,
        git,
        sync: new BranchSynchronizer(git, { remote: 'origin', autopush, protectedBranches: ['main'] }, notifier),
        notifier,
        ...extra,
      },
      settings
    );

  beforeEach(async () => {
    dir = await makeTempDir();
    await writeFile(join(dir, 'PROMPT_plan.md'), 'Plan it');
    await writeFile(join(dir, 'PROMPT_build.md'), 'Build it');
    await writeFile(join(dir, 'PROMPT_plan_work.md'), 'Scope: ${WORK_SCOPE}');

    invoker = new FakeInvoker();
    notifier = new RecordingNotifier();
    git = new FakeGit();
    router = new ExecutionRouter(
      new MemoryStateStore(defaultRouterState('claude')),
      invoker,
      notifier,
      {
        routing: { enabled: true, plan: 'codex', review: 'codex', security: 'codex', build: 'claude' },
        enableFailover: true,
        authCooldownSeconds: 86400,
      },
      vi.fn(async () => {}),
      () => 1_000_000
    );
    settings = {
      prompts: {
        plan: join(dir, 'PROMPT_plan.md'),
        build: join(dir, 'PROMPT_build.md'),
        planWork: join(dir, 'PROMPT_plan_work.md'),
      },
      contextFiles: [],
      protectedBranches: ['main'],
    };
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should route the build prompt once per iteration', async () => {
    const result = await makeLoop().run({ mode: 'build', maxIterations: 2 });

    expect(result).toEqual({ exitCode: 0, iterations: 2, lastBackend: 'claude' });
    expect(invoker.calls).toEqual([
      { backend: 'claude', taskType: 'build', prompt: 'Build it' },
      { backend: 'claude', taskType: 'build', prompt: 'Build it' },
    ]);
    expect(notifier.sent[0]).toEqual({
      emoji: '🚀',
      title: 'Loop Started',
      message: 'Mode: build | Branch: feature/work',
    });
  });

  it('should substitute the work scope for plan-work', async () => {
    await makeLoop().run({ mode: 'plan-work', maxIterations: 1, workScope: 'billing export' });

    expect(invoker.calls).toEqual([{ backend: 'codex', taskType: 'plan-work', prompt: 'Scope: billing export' }]);
  });

  it('should refuse plan-work on a protected branch', async () => {
    git.branch = 'main';

    await expect(makeLoop().run({ mode: 'plan-work', maxIterations: 1, workScope: 'x' })).rejects.toThrow(
      'plan-work should be run on a work branch, not main'
    );
    expect(invoker.calls).toHaveLength(0);
  });

  it('should fail before invoking anything when the prompt is missing', async () => {
    settings.prompts.plan = join(dir, 'nope.md');

    await expect(makeLoop().run({ mode: 'plan', maxIterations: 1 })).rejects.toBeInstanceOf(LoopUsageError);
    expect(notifier.sent).toHaveLength(0);
  });

  it('should review the working tree diff', async () => {
    git.diffs[''] = 'diff --git a/app.ts b/app.ts';

    const result = await makeLoop().run({ mode: 'review', maxIterations: 1 });

    expect(result.lastBackend).toBe('codex');
    expect(invoker.calls).toEqual([{ backend: 'codex', taskType: 'review', prompt: 'diff --git a/app.ts b/app.ts' }]);
  });

  it('should prepend context files to the prompt', async () => {
    await writeFile(join(dir, 'AGENTS.md'), 'Run the tests first.\n');
    settings.contextFiles = [join(dir, 'AGENTS.md'), join(dir, 'absent.md')];

    await makeLoop().run({ mode: 'build', maxIterations: 1 });

    expect(invoker.calls[0].prompt).toBe('## AGENTS.md\n\nRun the tests first.\n\nBuild it');
  });

  it('should stop with 127 when no backend is installed', async () => {
    invoker.available = { claude: false, codex: false };

    const result = await makeLoop().run({ mode: 'build', maxIterations: 3 });

    expect(result).toEqual({ exitCode: 127, iterations: 0, lastBackend: null });
  });

  it('should push after every iteration when autopush is on', async () => {
    await makeLoop(true).run({ mode: 'build', maxIterations: 2 });

    expect(git.calls.filter((c) => c.startsWith('push'))).toEqual([
      'push origin feature/work',
      'push origin feature/work',
    ]);
  });

  it('should report progress on a fixed cadence', async () => {
    settings.progressEvery = 2;

    await makeLoop().run({ mode: 'build', maxIterations: 4 });

    expect(notifier.titles().filter((t) => t === 'Loop Progress')).toHaveLength(2);
    expect(notifier.sent[1].message).toBe('Completed 2 iterations on feature/work (backend: claude)');
  });

  it('should not start an iteration once aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await makeLoop().run({ mode: 'build', maxIterations: 0 }, controller.signal);

    expect(result.iterations).toBe(0);
    expect(invoker.calls).toHaveLength(0);
  });

  it('should skip the gates and the push when aborted during a quota sleep', async () => {
    const controller = new AbortController();
    router = new ExecutionRouter(
      new MemoryStateStore(defaultRouterState('claude')),
      invoker,
      notifier,
      {
        routing: { enabled: true, plan: 'codex', review: 'codex', security: 'codex', build: 'claude' },
        enableFailover: false,
        authCooldownSeconds: 86400,
      },
      vi.fn(async () => {
        controller.abort();
      }),
      () => 1_000_000
    );
    invoker.replies = [{ classification: 'quotaFailure', output: 'resets in 1 hour' }];
    await writeFile(join(dir, 'review.schema.json'), '{}');
    git.diffs[''] = 'diff --git a/x b/x';
    const reviewGate = new ReviewGate(invoker, git, router, notifier, {
      enabled: true,
      schemaPath: join(dir, 'review.schema.json'),
      maxDiffChars: 10000,
      cwd: dir,
    });

    const result = await makeLoop(true, { reviewGate }).run({ mode: 'build', maxIterations: 0 }, controller.signal);

    expect(result).toEqual({ exitCode: 0, iterations: 0, lastBackend: 'claude' });
    expect(invoker.calls).toHaveLength(1);
    expect(invoker.structuredCalls).toHaveLength(0);
    expect(git.calls.filter((c) => c.startsWith('push'))).toEqual([]);
  });

  it('should keep going when a gate throws', async () => {
    await writeFile(join(dir, 'review.schema.json'), '{}');
    git.diffs[''] = 'diff --git a/x b/x';
    const failing: StructuredRunner = {
      isAvailable: () => true,
      runStructured: async () => {
        throw new Error('schema upload failed');
      },
    };
    const reviewGate = new ReviewGate(failing, git, router, notifier, {
      enabled: true,
      schemaPath: join(dir, 'review.schema.json'),
      maxDiffChars: 10000,
      cwd: dir,
    });

    const result = await makeLoop(false, { reviewGate }).run({ mode: 'build', maxIterations: 1 });

    expect(result.exitCode).toBe(0);
    expect(result.iterations).toBe(1);
  });
});
