import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MAX_TIMER_MS, sleep, sleepSeconds } from '../../src/utils/timing.js';

describe('sleep', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve after the requested delay', async () => {
    let done = false;
    const pending = sleep(1000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    expect(done).toBe(true);
    await pending;
  });

  it('should wait out delays longer than a single timer can hold', async () => {
    let done = false;
    const pending = sleep(MAX_TIMER_MS + 5000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(MAX_TIMER_MS);
    expect(done).toBe(false);

    await vi.advanceTimersByTimeAsync(5000);
    expect(done).toBe(true);
    await pending;
  });

  it('should not wake early for a quota reset hundreds of hours away', async () => {
    let done = false;
    const pending = sleepSeconds(600 * 3600).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(1000);
    expect(done).toBe(false);

    await vi.advanceTimersByTimeAsync(600 * 3600 * 1000);
    expect(done).toBe(true);
    await pending;
  });

  it('should resolve as soon as the signal aborts', async () => {
    const controller = new AbortController();
    const pending = sleep(MAX_TIMER_MS * 2, controller.signal);

    controller.abort();
    await pending;

    expect(vi.getTimerCount()).toBe(0);
  });

  it('should return at once for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await sleep(5000, controller.signal);

    expect(vi.getTimerCount()).toBe(0);
  });
});
