/**
 * Waiting for a motion to finish
 */

import { logger } from '../utils/logger.js';
import { sleep } from '../utils/time.js';
import { ENV } from '../config/env.js';
import { CancelledError } from '../errors.js';

export const BLOCK_POLL_MS = 100;
export const BLOCK_DEBOUNCE_MS = 50;

export interface BlockOnOptions {
  /** Runs once if the wait times out, normally a stop of all movement */
  onTimeout: () => Promise<void>;
  timeoutMs?: number;
  pollMs?: number;
  debounceMs?: number;
  signal?: AbortSignal;
  /** Used in log messages */
  label?: string;
}

export type BlockOutcome = 'finished' | 'timed-out';

/**
 * Wait until `active()` reads false twice in a row, `debounceMs` apart.
 * A stale snapshot can report a motion as finished for one read.
 * After `timeoutMs` the robot is stopped and the wait ends without an error.
 */
export async function blockOn(active: () => boolean, options: BlockOnOptions): Promise<BlockOutcome> {
  const timeoutMs = options.timeoutMs ?? ENV.BLOCK_TIMEOUT_MS;
  const pollMs = options.pollMs ?? BLOCK_POLL_MS;
  const debounceMs = options.debounceMs ?? BLOCK_DEBOUNCE_MS;
  const { signal } = options;
  const start = Date.now();

  for (;;) {
    if (signal?.aborted) throw new CancelledError(`${options.label ?? 'wait'} cancelled`);

    if (!active()) {
      await sleep(debounceMs, signal);
      if (!active()) return 'finished';
    }

    const elapsed = Date.now() - start;
    await sleep(pollMs, signal);
    if (elapsed > timeoutMs) {
      logger.warn('Robot', `${options.label ?? 'wait'} timed out after ${timeoutMs}ms, stopping`);
      await options.onTimeout();
      return 'timed-out';
    }
  }
}
