import type { Pacer } from '../anti-blocking/pacer.js';
import type { BackoffController } from '../anti-blocking/backoff-controller.js';
import type { MessageApi } from '../api/types.js';
import type { CancellationToken } from '../engine/run-context.js';
import type { EngineSettings } from '../engine/types.js';
import type { StatisticsSnapshot } from '../observability/run-statistics.js';
import type { ProgressStore } from '../pipeline/progress-store.js';

type BatchRunnerConfig = {
  api: MessageApi;
  progressStore: ProgressStore;
  settings: EngineSettings;
  authorId: string;
  token?: CancellationToken;
  pacer?: Pacer;
  backoff?: BackoffController;
  clock?: () => number;
};

type RunOptions = {
  resume?: boolean;
};

type RunStatus = 'completed' | 'cancelled';

type RunOutcome = {
  status: RunStatus;
  startIndex: number;
  /** Index saved in the final checkpoint. */
  nextTargetIndex: number;
  targetCount: number;
  statistics: StatisticsSnapshot;
  /** Time spent in pacing and backoff waits during this process. */
  waitedMs: number;
  summary: string[];
};

export type { BatchRunnerConfig, RunOptions, RunStatus, RunOutcome };
