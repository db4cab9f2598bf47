import { setTimeout as delay } from 'node:timers/promises';
import type { CancellationToken } from '../engine/run-context.js';
import type { Sleeper } from './types.js';

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

const realSleeper: Sleeper = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (isAbortError(error)) {
      return;
    }
    throw error;
  }
};

/**
 * Performs every wait of a run: self-imposed search/delete delays and
 * server-requested backoffs. Waits end early once the run is cancelled.
 */
export class Pacer {
  private readonly sleeper: Sleeper;
  private totalWaitedMs: number;

  constructor(sleeper: Sleeper = realSleeper) {
    this.sleeper = sleeper;
    this.totalWaitedMs = 0;
  }

  async wait(ms: number, token: CancellationToken): Promise<void> {
    if (ms <= 0 || token.isCancelled) {
      return;
    }

    this.totalWaitedMs += ms;
    await this.sleeper(ms, token.signal);
  }

  get waitedMs(): number {
    return this.totalWaitedMs;
  }
}
