import type { StatisticsSnapshot } from '../observability/run-statistics.js';

type Checkpoint = {
  /** Index of the first enabled target that has not been fully processed. */
  currentTargetIndex: number;
  statistics: StatisticsSnapshot;
  savedAt: string;
};

export type { Checkpoint };
