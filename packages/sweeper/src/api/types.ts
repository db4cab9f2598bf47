/** Container id the search endpoints use for direct and group conversations. */
const DIRECT_CONTAINER = '@me';

type ApiOk<T> = {
  kind: 'ok';
  status: number;
  data: T;
};

type ApiRateLimited = {
  kind: 'rate-limited';
  status: 429;
  retryAfterSeconds: number | undefined;
};

type ApiNotIndexed = {
  kind: 'not-indexed';
  status: 202;
  retryAfterSeconds: number | undefined;
};

type ApiNotFound = {
  kind: 'not-found';
  status: 404;
};

type ApiForbidden = {
  kind: 'forbidden';
  status: 403;
  detail: string;
};

type ApiArchived = {
  kind: 'archived';
  status: 400;
  detail: string;
};

type ApiHttpError = {
  kind: 'http-error';
  status: number;
  detail: string;
};

type ApiNetworkError = {
  kind: 'network-error';
  detail: string;
};

type ApiFailure =
  | ApiRateLimited
  | ApiNotIndexed
  | ApiNotFound
  | ApiForbidden
  | ApiArchived
  | ApiHttpError
  | ApiNetworkError;

type ApiResult<T> = ApiOk<T> | ApiFailure;

type CurrentUser = {
  id: string;
  username: string;
  discriminator: string;
};

type GuildSummary = {
  id: string;
  name: string;
};

type GuildChannel = {
  id: string;
  name: string;
  type: number;
};

type PrivateChannel = {
  id: string;
  type: number;
  name: string | null;
  recipientNames: string[];
};

type SearchHit = {
  id: string;
  authorId: string | null;
  content: string;
  pinned: boolean;
  createdAt: string;
  hit: boolean;
};

type SearchPage = {
  totalResults: number;
  groups: SearchHit[][];
};

type SearchQuery = {
  containerId: string;
  channelId: string;
  authorId: string;
  offset: number;
  maxId: bigint | null;
};

interface MessageApi {
  getCurrentUser(): Promise<ApiResult<CurrentUser>>;
  listGuilds(): Promise<ApiResult<GuildSummary[]>>;
  listGuildChannels(guildId: string): Promise<ApiResult<GuildChannel[]>>;
  listPrivateChannels(): Promise<ApiResult<PrivateChannel[]>>;
  searchMessages(query: SearchQuery): Promise<ApiResult<SearchPage>>;
  deleteMessage(channelId: string, messageId: string): Promise<ApiResult<null>>;
  editMessage(
    channelId: string,
    messageId: string,
    content: string,
  ): Promise<ApiResult<null>>;
}

export { DIRECT_CONTAINER };
export type {
  ApiOk,
  ApiFailure,
  ApiResult,
  ApiRateLimited,
  ApiNotIndexed,
  CurrentUser,
  GuildSummary,
  GuildChannel,
  PrivateChannel,
  SearchHit,
  SearchPage,
  SearchQuery,
  MessageApi,
};
