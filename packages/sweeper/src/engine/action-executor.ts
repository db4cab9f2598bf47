import { log } from '@workspace/logger';
import type { BackoffController } from '../anti-blocking/backoff-controller.js';
import type { ApiResult, MessageApi } from '../api/types.js';
import type { RunContext } from './run-context.js';
import type {
  ActionOutcome,
  BatchResult,
  BatchSummary,
  Message,
  Target,
  TerminalOutcome,
} from './types.js';

type ActionKind = 'edit' | 'delete';

/**
 * `unchanged`: nothing to do, no call was made.
 * `interrupted`: the run was cancelled before the message reached a terminal
 * outcome; it is left for the next pass.
 */
type MessageResult = TerminalOutcome | 'unchanged' | 'interrupted';

const ACTION_RATE_LIMIT_FALLBACK_SECONDS = 3;

function toOutcome(result: ApiResult<null>): ActionOutcome {
  switch (result.kind) {
    case 'ok':
      return 'completed';
    case 'not-found':
      return 'already-gone';
    case 'forbidden':
    case 'archived':
      return 'skipped';
    case 'rate-limited':
    case 'not-indexed':
    case 'network-error':
      return 'transient-failure';
    case 'http-error':
      return 'permanent-failure';
  }
}

function describeResult(result: ApiResult<null>): string {
  switch (result.kind) {
    case 'ok':
    case 'not-found':
    case 'rate-limited':
    case 'not-indexed':
      return `HTTP ${result.status}`;
    case 'forbidden':
    case 'archived':
    case 'http-error':
      return `HTTP ${result.status}: ${result.detail}`;
    case 'network-error':
      return result.detail;
  }
}

/**
 * Runs the mark → delete state machine over one eligible batch, in delivery
 * order, one API call at a time.
 */
export class ActionExecutor {
  private readonly api: MessageApi;
  private readonly backoff: BackoffController;

  constructor(api: MessageApi, backoff: BackoffController) {
    this.api = api;
    this.backoff = backoff;
  }

  async executeBatch(
    target: Target,
    messages: readonly Message[],
    context: RunContext,
  ): Promise<BatchResult> {
    const { settings, pacer, token } = context;
    const summary: BatchSummary = { marked: 0, deleted: 0, skipped: 0 };
    let oldestProcessedId: bigint | null = null;
    let processed = 0;

    for (const message of messages) {
      if (token.isCancelled) {
        break;
      }

      const outcome = await this.processMessage(
        target,
        message,
        context,
        summary,
      );
      if (outcome === 'interrupted') {
        break;
      }

      const id = BigInt(message.id);
      if (oldestProcessedId === null || id < oldestProcessedId) {
        oldestProcessedId = id;
      }
      processed += 1;

      // Only messages that cost an API call are paced
      if (outcome !== 'already-gone' && outcome !== 'unchanged') {
        await pacer.wait(settings.deleteDelayMs, token);
      }
    }

    return { oldestProcessedId, processed, summary };
  }

  private async processMessage(
    target: Target,
    message: Message,
    context: RunContext,
    summary: BatchSummary,
  ): Promise<MessageResult> {
    const { settings, statistics, pacer, token } = context;
    const alreadyMarked = message.content === settings.markerText;

    if (settings.mode !== 'delete-only' && !alreadyMarked) {
      const editOutcome = await this.attempt('edit', target, message, context);

      switch (editOutcome) {
        case 'interrupted':
          return editOutcome;
        case 'completed':
          statistics.increment('edited');
          summary.marked += 1;
          if (settings.mode === 'mark-only') {
            return editOutcome;
          }
          await pacer.wait(settings.deleteDelayMs, token);
          break;
        case 'already-gone':
          statistics.increment('alreadyGone');
          summary.deleted += 1;
          return editOutcome;
        case 'skipped':
          statistics.increment('skipped');
          summary.skipped += 1;
          return editOutcome;
        case 'permanent-failure':
          statistics.increment('failed');
          summary.skipped += 1;
          return editOutcome;
      }
    }

    if (settings.mode === 'mark-only') {
      return 'unchanged';
    }

    const deleteOutcome = await this.attempt('delete', target, message, context);

    switch (deleteOutcome) {
      case 'interrupted':
        break;
      case 'completed':
        statistics.increment('completed');
        summary.deleted += 1;
        break;
      case 'already-gone':
        statistics.increment('alreadyGone');
        summary.deleted += 1;
        break;
      case 'skipped':
        statistics.increment('skipped');
        summary.skipped += 1;
        break;
      case 'permanent-failure':
        statistics.increment('failed');
        summary.skipped += 1;
        break;
    }

    return deleteOutcome;
  }

  /**
   * Issues one edit or delete up to `maxRetries` times. Transient failures
   * (including rate limits, after their backoff) wait and retry; the last
   * transient failure becomes a permanent one. Cancellation during a wait
   * ends the loop without another call.
   */
  private async attempt(
    kind: ActionKind,
    target: Target,
    message: Message,
    context: RunContext,
  ): Promise<TerminalOutcome | 'interrupted'> {
    const { settings, pacer, token } = context;

    for (let attempt = 1; attempt <= settings.maxRetries; attempt += 1) {
      if (token.isCancelled) {
        return 'interrupted';
      }

      const result = await this.call(kind, target, message, settings.markerText);

      const signal = this.backoff.classify(result, {
        fallbackRateLimitSeconds: ACTION_RATE_LIMIT_FALLBACK_SECONDS,
      });
      if (signal) {
        await this.backoff.wait(signal, context);
      }

      const outcome = toOutcome(result);
      switch (outcome) {
        case 'completed':
          log.debug(`[Action] ${kind} ${message.id}: ok`);
          return outcome;
        case 'already-gone':
          log.debug(`[Action] ${kind} ${message.id}: already gone (stale index entry)`);
          return outcome;
        case 'skipped':
          log.warn(`[Action] Cannot ${kind} message ${message.id}:`, describeResult(result));
          return outcome;
        case 'permanent-failure':
          log.error(`[Action] ${kind} ${message.id} failed:`, describeResult(result));
          return outcome;
        case 'transient-failure':
          log.warn(
            `[Action] ${kind} ${message.id} attempt ${attempt}/${settings.maxRetries} failed:`,
            describeResult(result),
          );
          if (token.isCancelled) {
            log.info(`[Action] ${kind} ${message.id} left for the next run`);
            return 'interrupted';
          }
          if (attempt < settings.maxRetries) {
            await pacer.wait(settings.transientRetryDelayMs, token);
          }
          break;
      }
    }

    log.error(`[Action] ${kind} ${message.id} gave up after ${settings.maxRetries} attempts`);
    return 'permanent-failure';
  }

  private call(
    kind: ActionKind,
    target: Target,
    message: Message,
    markerText: string,
  ): Promise<ApiResult<null>> {
    return kind === 'edit'
      ? this.api.editMessage(target.channelId, message.id, markerText)
      : this.api.deleteMessage(target.channelId, message.id);
  }
}

export { toOutcome };
export type { ActionKind, MessageResult };
