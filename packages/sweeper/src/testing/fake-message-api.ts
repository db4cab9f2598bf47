import type {
  ApiResult,
  CurrentUser,
  GuildChannel,
  GuildSummary,
  MessageApi,
  PrivateChannel,
  SearchHit,
  SearchPage,
  SearchQuery,
} from '../api/types.js';

const AUTHOR_ID = '42';

type StoredMessage = {
  id: string;
  authorId: string;
  content: string;
  pinned?: boolean;
};

type ApiCall =
  | { kind: 'search'; query: SearchQuery }
  | { kind: 'edit'; channelId: string; messageId: string; content: string }
  | { kind: 'delete'; channelId: string; messageId: string };

type ApiCallKind = ApiCall['kind'];

function ok<T>(data: T, status = 200): ApiResult<T> {
  return { kind: 'ok', status, data };
}

function rateLimited(retryAfterSeconds?: number): ApiResult<never> {
  return { kind: 'rate-limited', status: 429, retryAfterSeconds };
}

function notIndexed(retryAfterSeconds?: number): ApiResult<never> {
  return { kind: 'not-indexed', status: 202, retryAfterSeconds };
}

function notFound(): ApiResult<never> {
  return { kind: 'not-found', status: 404 };
}

function forbidden(): ApiResult<never> {
  return { kind: 'forbidden', status: 403, detail: 'Missing Access' };
}

function httpError(status: number): ApiResult<never> {
  return { kind: 'http-error', status, detail: `HTTP ${status}` };
}

function networkError(): ApiResult<never> {
  return { kind: 'network-error', detail: 'socket hang up' };
}

function searchHit(id: string, overrides?: Partial<SearchHit>): SearchHit {
  return {
    id,
    authorId: AUTHOR_ID,
    content: `message ${id}`,
    pinned: false,
    createdAt: '2024-03-01T12:00:00.000Z',
    hit: true,
    ...overrides,
  };
}

function searchPage(groups: SearchHit[][], totalResults = groups.length): ApiResult<SearchPage> {
  return ok({ totalResults, groups });
}

/**
 * In-process stand-in for the HTTP API. Messages live per channel; search
 * honours author, `max_id` (inclusive) and offset the way the server does.
 * Queued results are served first, before the store is consulted.
 */
class FakeMessageApi implements MessageApi {
  readonly calls: ApiCall[] = [];
  readonly searchQueue: ApiResult<SearchPage>[] = [];
  readonly editQueue: ApiResult<null>[] = [];
  readonly deleteQueue: ApiResult<null>[] = [];

  currentUser: ApiResult<CurrentUser> = ok({
    id: AUTHOR_ID,
    username: 'tester',
    discriminator: '0',
  });
  guilds: ApiResult<GuildSummary[]> = ok([]);
  guildChannels = new Map<string, ApiResult<GuildChannel[]>>();
  privateChannels: ApiResult<PrivateChannel[]> = ok([]);

  /** Per-query override, consulted after the queue. */
  searchOverride?: (query: SearchQuery) => ApiResult<SearchPage> | undefined;
  /** Runs after a call is recorded and before its result is produced. */
  onCall?: (call: ApiCall) => void;
  pageSize = 25;

  private readonly channels = new Map<string, StoredMessage[]>();

  addMessages(channelId: string, messages: StoredMessage[]): void {
    const existing = this.channels.get(channelId) ?? [];
    this.channels.set(channelId, [...existing, ...messages]);
  }

  remaining(channelId: string): StoredMessage[] {
    return this.channels.get(channelId) ?? [];
  }

  callsOf<K extends ApiCallKind>(kind: K): Extract<ApiCall, { kind: K }>[] {
    return this.calls.filter(
      (call): call is Extract<ApiCall, { kind: K }> => call.kind === kind,
    );
  }

  async getCurrentUser(): Promise<ApiResult<CurrentUser>> {
    return this.currentUser;
  }

  async listGuilds(): Promise<ApiResult<GuildSummary[]>> {
    return this.guilds;
  }

  async listGuildChannels(guildId: string): Promise<ApiResult<GuildChannel[]>> {
    return this.guildChannels.get(guildId) ?? ok([]);
  }

  async listPrivateChannels(): Promise<ApiResult<PrivateChannel[]>> {
    return this.privateChannels;
  }

  async searchMessages(query: SearchQuery): Promise<ApiResult<SearchPage>> {
    this.record({ kind: 'search', query });

    const queued = this.searchQueue.shift();
    if (queued) {
      return queued;
    }

    const overridden = this.searchOverride?.(query);
    if (overridden) {
      return overridden;
    }

    const { maxId } = query;
    const matching = this.remaining(query.channelId)
      .filter((message) => message.authorId === query.authorId)
      .filter((message) => maxId === null || BigInt(message.id) <= maxId)
      .sort((left, right) => (BigInt(right.id) > BigInt(left.id) ? 1 : -1));

    const groups = matching
      .slice(query.offset, query.offset + this.pageSize)
      .map((message) => [
        searchHit(message.id, {
          authorId: message.authorId,
          content: message.content,
          pinned: message.pinned ?? false,
        }),
      ]);

    return searchPage(groups, matching.length);
  }

  async deleteMessage(channelId: string, messageId: string): Promise<ApiResult<null>> {
    this.record({ kind: 'delete', channelId, messageId });

    const queued = this.deleteQueue.shift();
    if (queued) {
      return queued;
    }

    const messages = this.remaining(channelId);
    if (!messages.some((message) => message.id === messageId)) {
      return notFound();
    }

    this.channels.set(
      channelId,
      messages.filter((message) => message.id !== messageId),
    );
    return ok(null, 204);
  }

  async editMessage(
    channelId: string,
    messageId: string,
    content: string,
  ): Promise<ApiResult<null>> {
    this.record({ kind: 'edit', channelId, messageId, content });

    const queued = this.editQueue.shift();
    if (queued) {
      return queued;
    }

    const message = this.remaining(channelId).find((stored) => stored.id === messageId);
    if (!message) {
      return notFound();
    }

    message.content = content;
    return ok(null);
  }

  private record(call: ApiCall): void {
    this.calls.push(call);
    this.onCall?.(call);
  }
}

export {
  AUTHOR_ID,
  FakeMessageApi,
  ok,
  rateLimited,
  notIndexed,
  notFound,
  forbidden,
  httpError,
  networkError,
  searchHit,
  searchPage,
};
export type { ApiCall, StoredMessage };
