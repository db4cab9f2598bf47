import { describe, it, expect } from 'vitest';
import { BackoffController } from '../anti-blocking/backoff-controller.js';
import {
  FakeMessageApi,
  httpError,
  networkError,
  notIndexed,
  rateLimited,
  searchHit,
  searchPage,
} from '../testing/fake-message-api.js';
import { guildTarget, testContext } from '../testing/fixtures.js';
import { INITIAL_CURSOR } from './cursor.js';
import { CursorPaginator, MAX_EMPTY_PAGES } from './cursor-paginator.js';

const target = guildTarget('2000');

function setup() {
  const api = new FakeMessageApi();
  const paginator = new CursorPaginator(api, new BackoffController());
  return { api, paginator };
}

describe('CursorPaginator', () => {
  it('returns the eligible messages of the first non-empty page', async () => {
    const { api, paginator } = setup();
    api.searchQueue.push(searchPage([[searchHit('300')], [searchHit('200')]], 40));
    const context = testContext();

    const page = await paginator.fetchNextPage(target, INITIAL_CURSOR, context);

    expect(page.kind).toBe('page');
    if (page.kind === 'page') {
      expect(page.messages.map((message) => message.id)).toEqual(['300', '200']);
      expect(page.totalResults).toBe(40);
      expect(page.cursor).toEqual(INITIAL_CURSOR);
    }
    expect(api.callsOf('search')[0]?.query).toEqual({
      containerId: '1000',
      channelId: '2000',
      authorId: '42',
      offset: 0,
      maxId: null,
    });
    expect(context.waits).toEqual([]);
  });

  it(`ends the target after ${MAX_EMPTY_PAGES} consecutive empty pages`, async () => {
    const { api, paginator } = setup();
    const context = testContext();

    const page = await paginator.fetchNextPage(target, INITIAL_CURSOR, context);

    expect(page).toEqual({
      kind: 'exhausted',
      reason: 'empty-pages',
      cursor: { maxId: null, offset: 0, emptyPageCount: 3 },
    });
    expect(api.callsOf('search')).toHaveLength(3);
    expect(context.waits).toEqual([10_000, 10_000]);
  });

  it('resets the empty page count once a page has hits', async () => {
    const { api, paginator } = setup();
    api.searchQueue.push(searchPage([]), searchPage([[searchHit('300')]]));
    const context = testContext();

    const page = await paginator.fetchNextPage(target, INITIAL_CURSOR, context);

    expect(page.kind).toBe('page');
    expect(page.cursor.emptyPageCount).toBe(0);
  });

  it('advances past the oldest authored hit when every hit is filtered out', async () => {
    const { api, paginator } = setup();
    api.searchQueue.push(
      searchPage([
        [searchHit('500', { pinned: true })],
        [searchHit('400', { pinned: true })],
      ]),
    );
    const context = testContext();

    const page = await paginator.fetchNextPage(target, INITIAL_CURSOR, context);

    expect(page.kind).toBe('exhausted');
    expect(api.callsOf('search')[1]?.query.maxId).toBe(399n);
    expect(context.waits).toEqual([10_000, 10_000, 10_000]);
  });

  it('moves past marked messages without returning them when skipMarked is set', async () => {
    const { api, paginator } = setup();
    api.searchQueue.push(
      searchPage([
        [searchHit('700', { content: 'Meow Meow Meow Meow' })],
        [searchHit('650', { content: 'Meow Meow Meow Meow' })],
      ]),
      searchPage([[searchHit('600')]]),
    );
    const context = testContext({ skipMarked: true });

    const page = await paginator.fetchNextPage(target, INITIAL_CURSOR, context);

    expect(page.kind).toBe('page');
    if (page.kind === 'page') {
      expect(page.messages.map((message) => message.id)).toEqual(['600']);
    }
    expect(api.callsOf('search')[1]?.query.maxId).toBe(649n);
  });

  it('advances past the oldest hit when none of the hits are ours', async () => {
    const { api, paginator } = setup();
    api.searchQueue.push(
      searchPage([
        [searchHit('900', { authorId: '7' })],
        [searchHit('800', { authorId: '7' })],
      ]),
    );

    await paginator.fetchNextPage(target, INITIAL_CURSOR, testContext());

    expect(api.callsOf('search')[1]?.query).toMatchObject({ maxId: 799n, offset: 0 });
  });

  it('bumps the offset by the group count when no entry is a hit', async () => {
    const { api, paginator } = setup();
    api.searchQueue.push(
      searchPage([[searchHit('900', { hit: false })], [searchHit('800', { hit: false })]]),
    );

    await paginator.fetchNextPage(target, INITIAL_CURSOR, testContext());

    expect(api.callsOf('search')[1]?.query).toMatchObject({ maxId: null, offset: 2 });
  });

  it('gives up on the target after maxRetries failed searches', async () => {
    const { api, paginator } = setup();
    api.searchQueue.push(httpError(500), httpError(500), httpError(500));
    const context = testContext();

    const page = await paginator.fetchNextPage(target, INITIAL_CURSOR, context);

    expect(page).toMatchObject({ kind: 'exhausted', reason: 'search-failed' });
    expect(api.callsOf('search')).toHaveLength(3);
    expect(context.waits).toEqual([10_000, 10_000]);
  });

  it('retries the same cursor after a network error', async () => {
    const { api, paginator } = setup();
    api.searchQueue.push(networkError(), searchPage([[searchHit('300')]]));
    const context = testContext();

    const page = await paginator.fetchNextPage(target, INITIAL_CURSOR, context);

    expect(page.kind).toBe('page');
    expect(context.waits).toEqual([10_000]);
  });

  it('waits twice the fallback when a rate-limited search has no retry_after', async () => {
    const { api, paginator } = setup();
    api.searchQueue.push(rateLimited(), searchPage([[searchHit('300')]]));
    const context = testContext();

    const page = await paginator.fetchNextPage(target, INITIAL_CURSOR, context);

    expect(page.kind).toBe('page');
    expect(context.waits).toEqual([80_000]);
    expect(context.statistics.get('rateLimitedEvents')).toBe(1);
  });

  it('waits out a not-indexed response once without counting a rate limit', async () => {
    const { api, paginator } = setup();
    api.searchQueue.push(notIndexed(4), searchPage([[searchHit('300')]]));
    const context = testContext();

    const page = await paginator.fetchNextPage(target, INITIAL_CURSOR, context);

    expect(page.kind).toBe('page');
    expect(api.callsOf('search')).toHaveLength(2);
    expect(context.waits).toEqual([4_000]);
    expect(context.statistics.get('rateLimitedEvents')).toBe(0);
  });

  it('searches nothing once the run is cancelled', async () => {
    const { api, paginator } = setup();
    const context = testContext();
    context.token.cancel();

    const page = await paginator.fetchNextPage(target, INITIAL_CURSOR, context);

    expect(page).toMatchObject({ kind: 'exhausted', reason: 'cancelled' });
    expect(api.calls).toEqual([]);
  });
});
