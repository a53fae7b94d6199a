// setTimeout fires at once for delays above a signed 32-bit millisecond count
export const MAX_TIMER_MS = 2 ** 31 - 1;

/** Resolves after `ms`, or early when the signal aborts. Never rejects. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) {
    return Promise.resolve();
  }

  return new Promise((resolve) => {
    let remaining = ms;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const schedule = () => {
      const delay = Math.min(remaining, MAX_TIMER_MS);
      remaining -= delay;
      timer = setTimeout(() => {
        if (remaining > 0) {
          schedule();
          return;
        }
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, delay);
    };

    signal?.addEventListener('abort', onAbort, { once: true });
    schedule();
  });
}

export type Sleeper = (seconds: number, signal?: AbortSignal) => Promise<void>;

export const sleepSeconds: Sleeper = (seconds, signal) => sleep(seconds * 1000, signal);

export type Clock = () => number;

/** Current time in epoch seconds. */
export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export function formatDuration(seconds: number): string {
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return `${hours}h ${minutes}m`;
}
