const STAT_COUNTERS = [
  'completed',
  'edited',
  'failed',
  'skipped',
  'rateLimitedEvents',
  'alreadyGone',
] as const;

type StatCounter = (typeof STAT_COUNTERS)[number];

type StatisticsSnapshot = Record<StatCounter, number> & {
  startedAt: number | null;
  endedAt: number | null;
};

function emptySnapshot(): StatisticsSnapshot {
  return {
    completed: 0,
    edited: 0,
    failed: 0,
    skipped: 0,
    rateLimitedEvents: 0,
    alreadyGone: 0,
    startedAt: null,
    endedAt: null,
  };
}

/**
 * Monotone run counters. Created empty at process start, or seeded from a
 * checkpoint when a run is resumed.
 */
export class RunStatistics {
  private readonly counters: Map<StatCounter, number>;
  private startedAt: number | null;
  private endedAt: number | null;

  constructor(initial?: StatisticsSnapshot) {
    const seed = initial ?? emptySnapshot();

    this.counters = new Map();
    for (const counter of STAT_COUNTERS) {
      this.counters.set(counter, seed[counter]);
    }
    this.startedAt = seed.startedAt;
    this.endedAt = seed.endedAt;
  }

  increment(counter: StatCounter, amount = 1): void {
    const current = this.counters.get(counter) ?? 0;
    this.counters.set(counter, current + amount);
  }

  get(counter: StatCounter): number {
    return this.counters.get(counter) ?? 0;
  }

  markStarted(now = Date.now()): void {
    this.startedAt = now;
    this.endedAt = null;
  }

  markEnded(now = Date.now()): void {
    this.endedAt = now;
  }

  snapshot(): StatisticsSnapshot {
    const snapshot = emptySnapshot();
    for (const counter of STAT_COUNTERS) {
      snapshot[counter] = this.get(counter);
    }
    snapshot.startedAt = this.startedAt;
    snapshot.endedAt = this.endedAt;
    return snapshot;
  }

  log(logger: { info: (msg: string, data?: string) => void }): void {
    logger.info('[Stats]', JSON.stringify(this.snapshot()));
  }
}

function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  return `${hours}h ${minutes}m ${seconds}s`;
}

function formatSummary(snapshot: StatisticsSnapshot): string[] {
  const durationMs =
    snapshot.startedAt !== null && snapshot.endedAt !== null
      ? snapshot.endedAt - snapshot.startedAt
      : 0;

  const lines = [`Duration: ${formatDuration(durationMs)}`];
  if (snapshot.edited > 0) {
    lines.push(`Edited (marked): ${snapshot.edited}`);
  }
  lines.push(
    `Deleted: ${snapshot.completed}`,
    `Already gone: ${snapshot.alreadyGone} (stale search index entries)`,
    `Skipped: ${snapshot.skipped}`,
    `Failed: ${snapshot.failed}`,
    `Rate limited: ${snapshot.rateLimitedEvents} times`,
  );

  return lines;
}

export { STAT_COUNTERS, emptySnapshot, formatDuration, formatSummary };
export type { StatCounter, StatisticsSnapshot };
