/** Largest delay `setTimeout` honours; anything above fires after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export function clampTimerDelay(ms: number): number {
  return Math.min(Math.max(ms, 0), MAX_TIMER_DELAY_MS);
}

/**
 * Resolve after `ms` milliseconds, or as soon as `signal` aborts.
 * Resolves `true` when the full delay elapsed and `false` when aborted.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return Promise.resolve(false);
  }

  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, clampTimerDelay(ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function elapsedMs(start: Date, end: Date): number {
  return end.getTime() - start.getTime();
}
