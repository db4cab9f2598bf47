import { Pacer } from '../anti-blocking/pacer.js';
import type { Sleeper } from '../anti-blocking/types.js';
import { DEFAULT_MARKER_TEXT } from '../config/run-config.js';
import { CancellationToken, type RunContext } from '../engine/run-context.js';
import type { EngineSettings, Target } from '../engine/types.js';
import { RunStatistics } from '../observability/run-statistics.js';
import { AUTHOR_ID } from './fake-message-api.js';

type RecordingSleeper = {
  sleeper: Sleeper;
  /** Every requested wait, in milliseconds, in call order. */
  waits: number[];
};

/** Resolves at once; `onWait` runs before it does. */
function createRecordingSleeper(onWait?: (ms: number) => void): RecordingSleeper {
  const waits: number[] = [];

  return {
    waits,
    sleeper: async (ms) => {
      waits.push(ms);
      onWait?.(ms);
    },
  };
}

function testSettings(overrides?: Partial<EngineSettings>): EngineSettings {
  return {
    searchDelayMs: 10_000,
    deleteDelayMs: 1_000,
    transientRetryDelayMs: 1_000,
    skipPinned: true,
    skipMarked: false,
    maxRetries: 3,
    mode: 'delete-only',
    markerText: DEFAULT_MARKER_TEXT,
    dryRun: false,
    ...overrides,
  };
}

function guildTarget(channelId: string, overrides?: Partial<Target>): Target {
  return {
    kind: 'guild',
    containerId: '1000',
    channelId,
    displayName: `#${channelId} (Test Server)`,
    enabled: true,
    ...overrides,
  };
}

type TestContext = RunContext & { waits: number[] };

function testContext(
  settings?: Partial<EngineSettings>,
  onWait?: (ms: number) => void,
): TestContext {
  const { sleeper, waits } = createRecordingSleeper(onWait);

  return {
    authorId: AUTHOR_ID,
    settings: testSettings(settings),
    statistics: new RunStatistics(),
    token: new CancellationToken(),
    pacer: new Pacer(sleeper),
    waits,
  };
}

export { createRecordingSleeper, testSettings, guildTarget, testContext };
export type { RecordingSleeper, TestContext };
