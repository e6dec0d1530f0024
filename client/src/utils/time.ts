/**
 * Timing helpers shared by the channel loops and blocking waits
 */

/**
 * Wait `ms` milliseconds. Resolves early (never rejects) when `signal` aborts,
 * so loops can check `signal.aborted` right after.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
