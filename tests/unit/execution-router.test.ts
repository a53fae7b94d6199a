import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { ExecutionRouter, type ExecutionRouterOptions } from '../../src/router/execution-router.js';
import { MemoryStateStore } from '../../src/state/state-store.js';
import { defaultRouterState, type RouterState } from '../../src/types.js';
import { FailureClassifier } from '../../src/backends/failure-classifier.js';
import { FakeInvoker, RecordingNotifier } from '../helpers/fakes.js';

const NOW = 1_000_000;

const baseOptions: ExecutionRouterOptions = {
  routing: { enabled: true, plan: 'codex', review: 'codex', security: 'codex', build: 'claude' },
  enableFailover: true,
  authCooldownSeconds: 86400,
};

describe('ExecutionRouter', () => {
  let store: MemoryStateStore<RouterState>;
  let invoker: FakeInvoker;
  let notifier: RecordingNotifier;
  let sleeper: Mock<[number, AbortSignal?], Promise<void>>;

  const makeRouter = (options: Partial<ExecutionRouterOptions> = {}) =>
    new ExecutionRouter(store, invoker, notifier, { ...baseOptions, ...options }, sleeper, () => NOW);

  beforeEach(() => {
    store = new MemoryStateStore(defaultRouterState('claude'));
    invoker = new FakeInvoker();
    notifier = new RecordingNotifier();
    sleeper = vi.fn<[number, AbortSignal?], Promise<void>>(async () => {});
  });

  describe('backend selection', () => {
    it('should send build work to claude and planning to codex', async () => {
      const router = makeRouter();

      const build = await router.route('build', 'do it');
      const plan = await router.route('plan', 'think');

      expect(build.backend).toBe('claude');
      expect(plan.backend).toBe('codex');
      expect(invoker.calls.map((c) => c.backend)).toEqual(['claude', 'codex']);
      expect(store.peek().activeBackend).toBe('codex');
    });

    it('should send everything to claude when routing is disabled', async () => {
      const router = makeRouter({ routing: { ...baseOptions.routing, enabled: false } });

      const result = await router.route('review', 'diff');

      expect(result.backend).toBe('claude');
    });

    it('should honour a forced backend over the routing table', async () => {
      const router = makeRouter({ forceBackend: 'codex' });

      const result = await router.route('build', 'do it');

      expect(result.backend).toBe('codex');
    });

    it('should use the alternate while the preferred backend is rate limited', async () => {
      store = new MemoryStateStore<RouterState>({
        activeBackend: 'claude',
        rateLimitUntil: { claude: NOW + 100, codex: 0 },
      });
      const router = makeRouter();

      const result = await router.route('build', 'do it');

      expect(result.backend).toBe('codex');
      expect(await router.selectBackend('build')).toBe('codex');
    });

    it('should keep the preferred backend when both are rate limited', async () => {
      store = new MemoryStateStore<RouterState>({
        activeBackend: 'claude',
        rateLimitUntil: { claude: NOW + 100, codex: NOW + 50 },
      });
      const router = makeRouter();

      const result = await router.route('build', 'do it');

      expect(result.backend).toBe('claude');
      expect(await router.selectBackend('build')).toBeNull();
    });

    it('should not preselect the alternate when failover is disabled', async () => {
      store = new MemoryStateStore<RouterState>({
        activeBackend: 'claude',
        rateLimitUntil: { claude: NOW + 100, codex: 0 },
      });
      const router = makeRouter({ enableFailover: false });

      const result = await router.route('build', 'do it');

      expect(result.backend).toBe('claude');
    });

    it('should treat a limit that has already expired as healthy', async () => {
      store = new MemoryStateStore<RouterState>({
        activeBackend: 'claude',
        rateLimitUntil: { claude: NOW, codex: 0 },
      });
      const router = makeRouter();

      expect(router.isLimited(await router.getState(), 'claude')).toBe(false);
      expect((await router.route('build', 'x')).backend).toBe('claude');
    });
  });

  describe('missing binaries', () => {
    it('should force the alternate when the chosen binary is missing', async () => {
      invoker.available.claude = false;
      const router = makeRouter();

      const result = await router.route('build', 'do it');

      expect(result.backend).toBe('codex');
      expect(invoker.calls).toHaveLength(1);
    });

    it('should report unavailable when neither binary exists', async () => {
      invoker.available = { claude: false, codex: false };
      const router = makeRouter();

      const result = await router.route('build', 'do it');

      expect(result).toEqual({ backend: null, exitCode: 127, outputText: '', classification: 'unavailable' });
      expect(invoker.calls).toHaveLength(0);
    });
  });

  describe('quota failures', () => {
    it('should record the reset time and fail over', async () => {
      invoker.replies = [{ classification: 'quotaFailure', output: 'Usage limit reached, resets in 10 minutes' }];
      const router = makeRouter();

      const result = await router.route('build', 'do it');

      expect(result.backend).toBe('codex');
      expect(result.classification).toBe('success');
      expect(store.peek().rateLimitUntil.claude).toBe(NOW + 900);
      expect(notifier.sent).toContainEqual({
        emoji: '🔄',
        title: 'Backend Failover',
        message: 'claude rate limited. Switching to codex.',
      });
      expect(sleeper).not.toHaveBeenCalled();
    });

    it('should sleep and retry the same backend once when failover is disabled', async () => {
      invoker.replies = [{ classification: 'quotaFailure', output: 'resets in 10 minutes' }];
      const router = makeRouter({ enableFailover: false });

      const result = await router.route('build', 'do it');

      expect(result.classification).toBe('success');
      expect(invoker.calls.map((c) => c.backend)).toEqual(['claude', 'claude']);
      expect(sleeper).toHaveBeenCalledWith(900, undefined);
      expect(store.peek().rateLimitUntil.claude).toBe(0);
      expect(notifier.sent).toContainEqual({ emoji: '⏸️', title: 'Loop Paused', message: 'Rate limited. Sleeping 0h 15m' });
    });

    it('should give up after a second quota failure following the sleep', async () => {
      invoker.replies = [
        { classification: 'quotaFailure', output: 'resets in 10 minutes' },
        { classification: 'quotaFailure', output: 'resets in 10 minutes' },
      ];
      const router = makeRouter({ enableFailover: false });

      const result = await router.route('build', 'do it');

      expect(result.classification).toBe('quotaFailure');
      expect(sleeper).toHaveBeenCalledTimes(1);
      expect(invoker.calls).toHaveLength(2);
      expect(store.peek().rateLimitUntil.claude).toBe(NOW + 900);
    });

    it('should sleep instead of failing over to a limited alternate', async () => {
      store = new MemoryStateStore<RouterState>({
        activeBackend: 'claude',
        rateLimitUntil: { claude: 0, codex: NOW + 500 },
      });
      invoker.replies = [{ classification: 'quotaFailure', output: '' }];
      const router = makeRouter();

      const result = await router.route('build', 'do it');

      expect(result.classification).toBe('success');
      expect(sleeper).toHaveBeenCalledWith(18300, undefined);
      expect(invoker.calls.map((c) => c.backend)).toEqual(['claude', 'claude']);
    });

    it('should return the quota failure when the sleep is aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      invoker.replies = [{ classification: 'quotaFailure', output: 'resets in 1 hour' }];
      const router = makeRouter({ enableFailover: false });

      const result = await router.route('build', 'do it', { signal: controller.signal });

      expect(result.classification).toBe('quotaFailure');
      expect(invoker.calls).toHaveLength(1);
      expect(store.peek().rateLimitUntil.claude).toBe(NOW + 3900);
    });
  });

  describe('auth failures', () => {
    it('should disable the backend for a day and fail over', async () => {
      invoker.replies = [{ classification: 'authFailure', output: 'Invalid API Key' }];
      const router = makeRouter();

      const result = await router.route('build', 'do it');

      expect(result.backend).toBe('codex');
      expect(store.peek().rateLimitUntil.claude).toBe(NOW + 86400);
      expect(notifier.titles()).toContain('Backend Auth Failed');
    });

    it('should return the auth failure when failover is disabled', async () => {
      invoker.replies = [{ classification: 'authFailure', output: 'Invalid API Key' }];
      const router = makeRouter({ enableFailover: false });

      const result = await router.route('build', 'do it');

      expect(result.classification).toBe('authFailure');
      expect(invoker.calls).toHaveLength(1);
      expect(sleeper).not.toHaveBeenCalled();
    });
  });

  it('should keep a successful run on its backend even when the output mentions auth errors', async () => {
    invoker.classifier = new FailureClassifier();
    invoker.replies = [
      {
        exitCode: 0,
        output:
          '{"type":"result","subtype":"success","is_error":false,"result":"Users no longer get an unauthorized error."}',
      },
    ];
    const router = makeRouter();

    const result = await router.route('build', 'do it');

    expect(result.classification).toBe('success');
    expect(result.backend).toBe('claude');
    expect(invoker.calls.map((c) => c.backend)).toEqual(['claude']);
    expect(store.peek().rateLimitUntil).toEqual({ claude: 0, codex: 0 });
    expect(notifier.sent).toHaveLength(0);
  });

  it('should return schema failures without retrying or touching limits', async () => {
    invoker.replies = [{ classification: 'schemaFailure', output: 'Invalid schema for response_format' }];
    const router = makeRouter();

    const result = await router.route('review', 'diff');

    expect(result.classification).toBe('schemaFailure');
    expect(invoker.calls).toHaveLength(1);
    expect(store.peek().rateLimitUntil).toEqual({ claude: 0, codex: 0 });
  });

  it('should return other failures as they are', async () => {
    invoker.replies = [{ classification: 'otherFailure', output: 'boom' }];
    const router = makeRouter();

    const result = await router.route('build', 'do it');

    expect(result).toEqual({ backend: 'claude', exitCode: 1, outputText: 'boom', classification: 'otherFailure' });
  });
});
