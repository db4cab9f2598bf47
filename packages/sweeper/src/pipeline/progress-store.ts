import { existsSync, rmSync } from 'node:fs';
import { log } from '@workspace/logger';
import { z } from 'zod';
import { CheckpointError } from '../errors.js';
import type { StatisticsSnapshot } from '../observability/run-statistics.js';
import { readJsonFile, writeJsonFileAtomic } from '../utils/json.js';
import type { Checkpoint } from './types.js';

const DEFAULT_PROGRESS_FILE = '.chat-sweeper-progress.json';

const counterSchema = z.number().int().min(0).default(0);
const timestampSchema = z.string().datetime({ offset: true }).nullable().default(null);

const checkpointFileSchema = z.object({
  current_target_index: z.number().int().min(0),
  statistics: z
    .object({
      completed: counterSchema,
      edited: counterSchema,
      failed: counterSchema,
      skipped: counterSchema,
      rate_limited_events: counterSchema,
      already_gone: counterSchema,
      start_time: timestampSchema,
      end_time: timestampSchema,
    })
    .default({}),
  saved_at: z.string(),
});

type CheckpointFile = z.infer<typeof checkpointFileSchema>;

function toIso(epochMs: number | null): string | null {
  return epochMs === null ? null : new Date(epochMs).toISOString();
}

function fromIso(value: string | null): number | null {
  return value === null ? null : Date.parse(value);
}

function toFile(checkpoint: Checkpoint): CheckpointFile {
  const { statistics } = checkpoint;

  return {
    current_target_index: checkpoint.currentTargetIndex,
    statistics: {
      completed: statistics.completed,
      edited: statistics.edited,
      failed: statistics.failed,
      skipped: statistics.skipped,
      rate_limited_events: statistics.rateLimitedEvents,
      already_gone: statistics.alreadyGone,
      start_time: toIso(statistics.startedAt),
      end_time: toIso(statistics.endedAt),
    },
    saved_at: checkpoint.savedAt,
  };
}

function fromFile(file: CheckpointFile): Checkpoint {
  const { statistics } = file;

  return {
    currentTargetIndex: file.current_target_index,
    statistics: {
      completed: statistics.completed,
      edited: statistics.edited,
      failed: statistics.failed,
      skipped: statistics.skipped,
      rateLimitedEvents: statistics.rate_limited_events,
      alreadyGone: statistics.already_gone,
      startedAt: fromIso(statistics.start_time),
      endedAt: fromIso(statistics.end_time),
    },
    savedAt: file.saved_at,
  };
}

/**
 * Single-record checkpoint file. Every save replaces the previous record;
 * no history is kept.
 */
export class ProgressStore {
  private readonly filePath: string;
  private readonly clock: () => Date;

  constructor(filePath = DEFAULT_PROGRESS_FILE, clock: () => Date = () => new Date()) {
    this.filePath = filePath;
    this.clock = clock;
  }

  load(): Checkpoint | null {
    if (!existsSync(this.filePath)) {
      return null;
    }

    let raw: unknown;
    try {
      raw = readJsonFile(this.filePath);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new CheckpointError(this.filePath, message);
    }

    const parsed = checkpointFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new CheckpointError(
        this.filePath,
        issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid checkpoint',
      );
    }

    return fromFile(parsed.data);
  }

  save(currentTargetIndex: number, statistics: StatisticsSnapshot): Checkpoint {
    const checkpoint: Checkpoint = {
      currentTargetIndex,
      statistics,
      savedAt: this.clock().toISOString(),
    };

    writeJsonFileAtomic(this.filePath, toFile(checkpoint));
    log.debug(`[Progress] Saved: target ${currentTargetIndex}`);

    return checkpoint;
  }

  clear(): void {
    if (existsSync(this.filePath)) {
      rmSync(this.filePath);
    }
  }

  get path(): string {
    return this.filePath;
  }
}

export { DEFAULT_PROGRESS_FILE };
