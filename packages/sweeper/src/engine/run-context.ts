import type { Pacer } from '../anti-blocking/pacer.js';
import type { RunStatistics } from '../observability/run-statistics.js';
import type { EngineSettings } from './types.js';

/**
 * Cooperative stop flag. Signal handlers only call {@link cancel}; the engine
 * checks {@link isCancelled} between targets, pages and messages.
 */
export class CancellationToken {
  private readonly controller: AbortController;

  constructor() {
    this.controller = new AbortController();
  }

  cancel(): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort();
    }
  }

  get isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }
}

/** State shared by the paginator and the executor for one run. */
type RunContext = {
  authorId: string;
  settings: EngineSettings;
  statistics: RunStatistics;
  token: CancellationToken;
  pacer: Pacer;
};

export type { RunContext };
