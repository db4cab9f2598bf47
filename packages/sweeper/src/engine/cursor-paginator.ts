import { log } from '@workspace/logger';
import type { BackoffController } from '../anti-blocking/backoff-controller.js';
import type { ApiFailure, MessageApi } from '../api/types.js';
import { advancePast, describeCursor, oldestId } from './cursor.js';
import { filterPage } from './message-filter.js';
import type { RunContext } from './run-context.js';
import type {
  CursorState,
  ExhaustionReason,
  PageResult,
  Target,
} from './types.js';

const MAX_EMPTY_PAGES = 3;
const SEARCH_RATE_LIMIT_FALLBACK_SECONDS = 40;

function describeFailure(failure: ApiFailure): string {
  switch (failure.kind) {
    case 'network-error':
      return failure.detail;
    case 'not-found':
      return 'HTTP 404';
    case 'rate-limited':
    case 'not-indexed':
      return `HTTP ${failure.status}`;
    case 'forbidden':
    case 'archived':
    case 'http-error':
      return `HTTP ${failure.status}: ${failure.detail}`;
  }
}

function exhausted(reason: ExhaustionReason, cursor: CursorState): PageResult {
  return { kind: 'exhausted', reason, cursor };
}

/**
 * Walks one target backward through time with a decreasing `max_id` cursor.
 * Pages whose hits are all filtered out are absorbed here; only non-empty
 * eligible batches are returned to the caller.
 */
export class CursorPaginator {
  private readonly api: MessageApi;
  private readonly backoff: BackoffController;

  constructor(api: MessageApi, backoff: BackoffController) {
    this.api = api;
    this.backoff = backoff;
  }

  async fetchNextPage(
    target: Target,
    initialCursor: CursorState,
    context: RunContext,
  ): Promise<PageResult> {
    const { settings, token, pacer } = context;
    let cursor = initialCursor;
    let consecutiveFailures = 0;

    for (;;) {
      if (token.isCancelled) {
        return exhausted('cancelled', cursor);
      }

      log.info(`[Search] Searching messages (${describeCursor(cursor)})...`);

      const searchCursor = cursor;
      const result = await this.backoff.settle(
        () =>
          this.api.searchMessages({
            containerId: target.containerId,
            channelId: target.channelId,
            authorId: context.authorId,
            offset: searchCursor.offset,
            maxId: searchCursor.maxId,
          }),
        context,
        { fallbackRateLimitSeconds: SEARCH_RATE_LIMIT_FALLBACK_SECONDS },
      );

      if (result.kind !== 'ok') {
        if (token.isCancelled) {
          return exhausted('cancelled', cursor);
        }

        consecutiveFailures += 1;
        log.error(
          `[Search] Search failed (${consecutiveFailures}/${settings.maxRetries}):`,
          describeFailure(result),
        );

        if (consecutiveFailures >= settings.maxRetries) {
          return exhausted('search-failed', cursor);
        }

        await pacer.wait(settings.searchDelayMs, token);
        continue;
      }

      consecutiveFailures = 0;
      const page = result.data;

      if (page.groups.length === 0) {
        cursor = { ...cursor, emptyPageCount: cursor.emptyPageCount + 1 };

        if (cursor.emptyPageCount >= MAX_EMPTY_PAGES) {
          log.info(
            `[Search] No more messages found (after ${cursor.emptyPageCount} empty pages)`,
          );
          return exhausted('empty-pages', cursor);
        }

        // The search index sometimes lags behind; retry the same cursor
        log.warn(
          `[Search] Empty page (${cursor.emptyPageCount}/${MAX_EMPTY_PAGES}), waiting before retry...`,
        );
        await pacer.wait(settings.searchDelayMs, token);
        continue;
      }

      cursor = { ...cursor, emptyPageCount: 0 };

      const { hits, authoredHits, eligible } = filterPage(page.groups, {
        authorId: context.authorId,
        skipPinned: settings.skipPinned,
        skipMarked: settings.skipMarked,
        markerText: settings.markerText,
      });

      if (eligible.length > 0) {
        return {
          kind: 'page',
          messages: eligible,
          totalResults: page.totalResults,
          cursor,
        };
      }

      const oldestAuthored = oldestId(authoredHits);
      const oldestHit = oldestId(hits);

      if (oldestAuthored !== null) {
        cursor = advancePast(cursor, oldestAuthored);
        log.info(
          '[Search] All messages in batch were filtered (pinned/marked), advancing cursor...',
        );
      } else if (oldestHit !== null) {
        cursor = advancePast(cursor, oldestHit);
        log.info('[Search] No messages from us in batch, advancing cursor...');
      } else {
        cursor = { ...cursor, offset: cursor.offset + page.groups.length };
        log.info(
          '[Search] No decodable hits in this batch, advancing offset...',
        );
      }

      await pacer.wait(settings.searchDelayMs, token);
    }
  }
}

export { MAX_EMPTY_PAGES };
