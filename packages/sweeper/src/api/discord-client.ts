import axios, {
  type AxiosAdapter,
  type AxiosInstance,
  type AxiosRequestConfig,
  type AxiosResponse,
} from 'axios';
import { createLogger } from '@workspace/logger';
import { z } from 'zod';
import {
  DIRECT_CONTAINER,
  type ApiResult,
  type CurrentUser,
  type GuildChannel,
  type GuildSummary,
  type MessageApi,
  type PrivateChannel,
  type SearchHit,
  type SearchPage,
  type SearchQuery,
} from './types.js';

const DISCORD_API_BASE = 'https://discord.com/api/v9';
const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
const ARCHIVED_THREAD_CODE = 50083;

const log = createLogger('discord');

const snowflakeSchema = z.string().regex(/^\d+$/);

const currentUserSchema = z.object({
  id: snowflakeSchema,
  username: z.string(),
  discriminator: z.string().default('0'),
});

const guildListSchema = z.array(
  z.object({
    id: snowflakeSchema,
    name: z.string(),
  }),
);

const guildChannelListSchema = z.array(
  z.object({
    id: snowflakeSchema,
    name: z.string().default(''),
    type: z.number().int(),
  }),
);

const privateChannelListSchema = z.array(
  z
    .object({
      id: snowflakeSchema,
      type: z.number().int(),
      name: z.string().nullable().default(null),
      recipients: z
        .array(z.object({ username: z.string().default('Unknown') }))
        .default([]),
    })
    .transform(
      (channel): PrivateChannel => ({
        id: channel.id,
        type: channel.type,
        name: channel.name,
        recipientNames: channel.recipients.map(
          (recipient) => recipient.username,
        ),
      }),
    ),
);

const searchHitSchema = z
  .object({
    id: snowflakeSchema,
    author: z.object({ id: snowflakeSchema }).nullish(),
    content: z.string().default(''),
    pinned: z.boolean().default(false),
    timestamp: z.string().default(''),
    hit: z.boolean().default(false),
  })
  .transform(
    (message): SearchHit => ({
      id: message.id,
      authorId: message.author?.id ?? null,
      content: message.content,
      pinned: message.pinned,
      createdAt: message.timestamp,
      hit: message.hit,
    }),
  );

// Entries are validated one by one so a single malformed hit does not
// discard the whole page.
const searchPageSchema = z
  .object({
    total_results: z.number().int().default(0),
    messages: z.array(z.array(z.unknown())).default([]),
  })
  .transform(
    (page): SearchPage => ({
      totalResults: page.total_results,
      groups: page.messages.map((group) =>
        group.flatMap((entry) => {
          const parsed = searchHitSchema.safeParse(entry);
          return parsed.success ? [parsed.data] : [];
        }),
      ),
    }),
  );

const emptyBodySchema = z.unknown().transform(() => null);

const retryAfterSchema = z.object({ retry_after: z.number().nonnegative() });
const errorCodeSchema = z.object({ code: z.number() });

type DiscordClientOptions = {
  token: string;
  baseURL?: string;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
};

function describeBody(data: unknown): string {
  if (typeof data === 'string') {
    return data;
  }

  return JSON.stringify(data) ?? '';
}

function buildSearchRequest(query: SearchQuery): AxiosRequestConfig {
  const isDirect = query.containerId === DIRECT_CONTAINER;
  const url = isDirect
    ? `/channels/${query.channelId}/messages/search`
    : `/guilds/${query.containerId}/messages/search`;

  return {
    method: 'GET',
    url,
    timeout: 30_000,
    params: {
      author_id: query.authorId,
      include_nsfw: 'true',
      sort_by: 'timestamp',
      sort_order: 'desc',
      offset: query.offset,
      channel_id: isDirect ? undefined : query.channelId,
      max_id: query.maxId === null ? undefined : query.maxId.toString(),
    },
  };
}

/**
 * Axios client for the Discord v9 HTTP API.
 * HTTP statuses never throw; every call resolves to an {@link ApiResult}.
 */
export class DiscordClient implements MessageApi {
  private readonly http: AxiosInstance;

  constructor(options: DiscordClientOptions) {
    this.http = axios.create({
      baseURL: options.baseURL ?? DISCORD_API_BASE,
      timeout: options.timeoutMs ?? 10_000,
      validateStatus: () => true,
      headers: {
        Authorization: options.token,
        'User-Agent': USER_AGENT,
      },
      adapter: options.adapter,
    });
  }

  getCurrentUser(): Promise<ApiResult<CurrentUser>> {
    return this.request({ method: 'GET', url: '/users/@me' }, currentUserSchema);
  }

  listGuilds(): Promise<ApiResult<GuildSummary[]>> {
    return this.request(
      { method: 'GET', url: '/users/@me/guilds' },
      guildListSchema,
    );
  }

  listGuildChannels(guildId: string): Promise<ApiResult<GuildChannel[]>> {
    return this.request(
      { method: 'GET', url: `/guilds/${guildId}/channels` },
      guildChannelListSchema,
    );
  }

  listPrivateChannels(): Promise<ApiResult<PrivateChannel[]>> {
    return this.request(
      { method: 'GET', url: '/users/@me/channels' },
      privateChannelListSchema,
    );
  }

  searchMessages(query: SearchQuery): Promise<ApiResult<SearchPage>> {
    return this.request(buildSearchRequest(query), searchPageSchema);
  }

  deleteMessage(
    channelId: string,
    messageId: string,
  ): Promise<ApiResult<null>> {
    return this.request(
      { method: 'DELETE', url: `/channels/${channelId}/messages/${messageId}` },
      emptyBodySchema,
    );
  }

  editMessage(
    channelId: string,
    messageId: string,
    content: string,
  ): Promise<ApiResult<null>> {
    return this.request(
      {
        method: 'PATCH',
        url: `/channels/${channelId}/messages/${messageId}`,
        data: { content },
      },
      emptyBodySchema,
    );
  }

  private async request<T>(
    config: AxiosRequestConfig,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<ApiResult<T>> {
    log.debug(`[Discord] ${config.method} ${config.url}`, config.params ?? {});

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.request<unknown>(config);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      log.warn(`[Discord] ${config.method} ${config.url} failed:`, detail);
      return { kind: 'network-error', detail };
    }

    return this.toResult(response, schema);
  }

  private toResult<T>(
    response: AxiosResponse<unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): ApiResult<T> {
    const { status, data } = response;

    if (status === 429 || status === 202) {
      const retryAfter = retryAfterSchema.safeParse(data);
      const retryAfterSeconds = retryAfter.success
        ? retryAfter.data.retry_after
        : undefined;

      return status === 429
        ? { kind: 'rate-limited', status, retryAfterSeconds }
        : { kind: 'not-indexed', status, retryAfterSeconds };
    }

    if (status >= 200 && status < 300) {
      const parsed = schema.safeParse(data);
      if (!parsed.success) {
        return {
          kind: 'http-error',
          status,
          detail: `Unexpected response body: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
        };
      }

      return { kind: 'ok', status, data: parsed.data };
    }

    if (status === 404) {
      return { kind: 'not-found', status };
    }

    if (status === 403) {
      return { kind: 'forbidden', status, detail: describeBody(data) };
    }

    if (status === 400) {
      const errorCode = errorCodeSchema.safeParse(data);
      if (errorCode.success && errorCode.data.code === ARCHIVED_THREAD_CODE) {
        return { kind: 'archived', status, detail: describeBody(data) };
      }
    }

    return { kind: 'http-error', status, detail: describeBody(data) };
  }
}

export { DISCORD_API_BASE };
export type { DiscordClientOptions };
