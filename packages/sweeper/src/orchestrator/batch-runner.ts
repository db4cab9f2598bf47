import { log } from '@workspace/logger';
import { BackoffController } from '../anti-blocking/backoff-controller.js';
import { Pacer } from '../anti-blocking/pacer.js';
import { ActionExecutor } from '../engine/action-executor.js';
import { CursorPaginator } from '../engine/cursor-paginator.js';
import { INITIAL_CURSOR, advancePast, oldestId } from '../engine/cursor.js';
import { CancellationToken, type RunContext } from '../engine/run-context.js';
import type {
  BatchSummary,
  ExhaustionReason,
  Message,
  Target,
} from '../engine/types.js';
import { RunStatistics, formatSummary } from '../observability/run-statistics.js';
import type { ProgressStore } from '../pipeline/progress-store.js';
import type { BatchRunnerConfig, RunOptions, RunOutcome } from './types.js';

const PREVIEW_LIMIT = 5;

function describeBatch(summary: BatchSummary): string {
  const parts: string[] = [];
  if (summary.marked) {
    parts.push(`${summary.marked} marked`);
  }
  if (summary.deleted) {
    parts.push(`${summary.deleted} deleted`);
  }
  if (summary.skipped) {
    parts.push(`${summary.skipped} skipped`);
  }

  return parts.length > 0 ? parts.join(', ') : 'nothing to do';
}

function previewMessages(messages: readonly Message[]): void {
  log.info('[DRY RUN] Would process:');
  for (const message of messages.slice(0, PREVIEW_LIMIT)) {
    const content = message.content.length > 0 ? message.content : '[no content]';
    log.info(`  - ${message.createdAt.slice(0, 10) || 'unknown'}: ${content.slice(0, 50)}`);
  }
  if (messages.length > PREVIEW_LIMIT) {
    log.info(`  ... and ${messages.length - PREVIEW_LIMIT} more`);
  }
}

/**
 * Drives every enabled target to exhaustion, one at a time, and checkpoints
 * after each one. Cancellation leaves the current target unfinished; it is
 * processed again from the newest message on resume.
 */
export class BatchRunner {
  private readonly progressStore: ProgressStore;
  private readonly paginator: CursorPaginator;
  private readonly executor: ActionExecutor;
  private readonly token: CancellationToken;
  private readonly pacer: Pacer;
  private readonly config: BatchRunnerConfig;
  private readonly clock: () => number;

  constructor(config: BatchRunnerConfig) {
    const backoff = config.backoff ?? new BackoffController();

    this.config = config;
    this.progressStore = config.progressStore;
    this.paginator = new CursorPaginator(config.api, backoff);
    this.executor = new ActionExecutor(config.api, backoff);
    this.token = config.token ?? new CancellationToken();
    this.pacer = config.pacer ?? new Pacer();
    this.clock = config.clock ?? Date.now;
  }

  async run(targets: readonly Target[], options?: RunOptions): Promise<RunOutcome> {
    const enabled = targets.filter((target) => target.enabled);
    let startIndex = 0;
    let statistics = new RunStatistics();

    if (options?.resume) {
      const checkpoint = this.progressStore.load();
      if (checkpoint) {
        startIndex = checkpoint.currentTargetIndex;
        statistics = new RunStatistics(checkpoint.statistics);
        log.info(
          `Loaded saved progress: resuming at target ${startIndex + 1}/${enabled.length} (saved ${checkpoint.savedAt})`,
        );
      } else {
        log.info('No saved progress found, starting from the first target');
      }
    }

    statistics.markStarted(this.clock());

    const context: RunContext = {
      authorId: this.config.authorId,
      settings: this.config.settings,
      statistics,
      token: this.token,
      pacer: this.pacer,
    };

    let index = startIndex;
    while (index < enabled.length) {
      const target = enabled[index];
      if (!target || this.token.isCancelled) {
        break;
      }

      log.info(`[${index + 1}/${enabled.length}] Processing target: ${target.displayName}`);

      const finished = await this.processTarget(target, context);
      if (!finished) {
        break;
      }

      index += 1;
      this.progressStore.save(index, statistics.snapshot());
      statistics.log(log);
    }

    const status = index < enabled.length ? 'cancelled' : 'completed';
    if (status === 'cancelled') {
      this.progressStore.save(index, statistics.snapshot());
      log.warn(
        `Run interrupted. Progress saved to ${this.progressStore.path}; continue with --resume.`,
      );
    }

    statistics.markEnded(this.clock());
    const snapshot = statistics.snapshot();

    return {
      status,
      startIndex,
      nextTargetIndex: index,
      targetCount: enabled.length,
      statistics: snapshot,
      waitedMs: this.pacer.waitedMs,
      summary: formatSummary(snapshot),
    };
  }

  private finishTarget(
    target: Target,
    reason: ExhaustionReason,
    messagesFound: number,
  ): boolean {
    switch (reason) {
      case 'cancelled':
        return false;
      case 'search-failed':
        log.error(`Giving up on ${target.displayName} after repeated search failures`);
        return true;
      case 'empty-pages':
        log.info(`Finished ${target.displayName}: ${messagesFound} messages found`);
        return true;
    }
  }

  /** Resolves to `false` when the run was cancelled before the target was exhausted. */
  private async processTarget(target: Target, context: RunContext): Promise<boolean> {
    const { settings } = context;
    let cursor = INITIAL_CURSOR;
    let messagesFound = 0;

    for (;;) {
      const page = await this.paginator.fetchNextPage(target, cursor, context);
      cursor = page.cursor;

      if (page.kind === 'exhausted') {
        return this.finishTarget(target, page.reason, messagesFound);
      }

      messagesFound += page.messages.length;
      log.info(
        `Found ${page.messages.length} messages to process (total so far: ${messagesFound} / ~${page.totalResults})`,
      );

      if (settings.dryRun) {
        previewMessages(page.messages);
        const oldest = oldestId(page.messages);
        if (oldest !== null) {
          cursor = advancePast(cursor, oldest);
        }
      } else {
        const batch = await this.executor.executeBatch(target, page.messages, context);
        if (batch.oldestProcessedId !== null) {
          cursor = advancePast(cursor, batch.oldestProcessedId);
          log.info(`Cursor advanced: max_id=${cursor.maxId}`);
        }
        log.info(
          `Batch done (${batch.processed}/${page.messages.length}): ${describeBatch(batch.summary)}`,
        );
      }

      if (this.token.isCancelled) {
        return false;
      }

      log.info(`Waiting ${settings.searchDelayMs / 1000}s before next search...`);
      await this.pacer.wait(settings.searchDelayMs, this.token);
    }
  }
}
