export { DiscordClient, DISCORD_API_BASE } from './api/discord-client.js';
export {
  DIRECT_CONTAINER,
  type ApiFailure,
  type ApiResult,
  type CurrentUser,
  type GuildChannel,
  type GuildSummary,
  type MessageApi,
  type PrivateChannel,
  type SearchHit,
  type SearchPage,
  type SearchQuery,
} from './api/types.js';
export { BackoffController } from './anti-blocking/backoff-controller.js';
export { Pacer } from './anti-blocking/pacer.js';
export type { BackoffSignal, Sleeper } from './anti-blocking/types.js';
export { resolveToken, verifyIdentity } from './auth/token.js';
export {
  loadRunConfig,
  parseRunConfig,
  type RunConfig,
  type RunConfigFile,
} from './config/run-config.js';
export { ActionExecutor } from './engine/action-executor.js';
export { CursorPaginator } from './engine/cursor-paginator.js';
export { filterPage } from './engine/message-filter.js';
export { CancellationToken, type RunContext } from './engine/run-context.js';
export type {
  ActionMode,
  ActionOutcome,
  CursorState,
  EngineSettings,
  Message,
  PageResult,
  Target,
} from './engine/types.js';
export {
  ApiRequestError,
  AuthError,
  CheckpointError,
  ConfigError,
  isFatalError,
} from './errors.js';
export {
  RunStatistics,
  formatSummary,
  type StatisticsSnapshot,
} from './observability/run-statistics.js';
export { BatchRunner } from './orchestrator/batch-runner.js';
export type { RunOptions, RunOutcome } from './orchestrator/types.js';
export { ProgressStore } from './pipeline/progress-store.js';
export type { Checkpoint } from './pipeline/types.js';
