import { log } from '@workspace/logger';
import type { ApiResult } from '../api/types.js';
import type { RunContext } from '../engine/run-context.js';
import type { BackoffConfig, BackoffSignal } from './types.js';

const DEFAULT_CONFIG: BackoffConfig = {
  // Sustained bulk traffic still gets limited at the server's stated window
  rateLimitMultiplier: 2,
  defaultRateLimitSeconds: 3,
  defaultNotIndexedSeconds: 5,
};

type ClassifyOptions = {
  /** Used when a rate-limit response carries no `retry_after`. */
  fallbackRateLimitSeconds?: number;
};

export class BackoffController {
  private readonly config: BackoffConfig;

  constructor(config?: Partial<BackoffConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  classify<T>(
    result: ApiResult<T>,
    options?: ClassifyOptions,
  ): BackoffSignal | null {
    switch (result.kind) {
      case 'rate-limited': {
        const serverWaitSeconds =
          result.retryAfterSeconds ??
          options?.fallbackRateLimitSeconds ??
          this.config.defaultRateLimitSeconds;

        return {
          kind: 'rate-limited',
          serverWaitSeconds,
          waitMs: Math.ceil(
            serverWaitSeconds * this.config.rateLimitMultiplier * 1000,
          ),
        };
      }

      case 'not-indexed': {
        const serverWaitSeconds =
          result.retryAfterSeconds ?? this.config.defaultNotIndexedSeconds;

        return {
          kind: 'not-indexed',
          serverWaitSeconds,
          waitMs: Math.ceil(serverWaitSeconds * 1000),
        };
      }

      default:
        return null;
    }
  }

  async wait(signal: BackoffSignal, context: RunContext): Promise<void> {
    if (signal.kind === 'rate-limited') {
      context.statistics.increment('rateLimitedEvents');
      log.warn(
        `Rate limited - waiting ${signal.waitMs / 1000}s (retry_after=${signal.serverWaitSeconds}s)`,
      );
    } else {
      log.info(`Channel being indexed, waiting ${signal.waitMs / 1000}s...`);
    }

    await context.pacer.wait(signal.waitMs, context.token);
  }

  /**
   * Reissues `call` after every rate-limit or not-indexed response until a
   * response without a backoff signal arrives. Returns the last response
   * as-is when the run is cancelled during a wait.
   */
  async settle<T>(
    call: () => Promise<ApiResult<T>>,
    context: RunContext,
    options?: ClassifyOptions,
  ): Promise<ApiResult<T>> {
    for (;;) {
      const result = await call();
      const signal = this.classify(result, options);
      if (!signal) {
        return result;
      }

      await this.wait(signal, context);

      if (context.token.isCancelled) {
        return result;
      }
    }
  }
}

export type { ClassifyOptions };
