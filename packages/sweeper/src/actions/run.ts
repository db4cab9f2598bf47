import { log } from '@workspace/logger';
import { z } from 'zod';
import { loadRunConfig, markModeSchema } from '../config/run-config.js';
import type { EngineSettings } from '../engine/types.js';
import { CancellationToken } from '../engine/run-context.js';
import { ConfigError, isFatalError } from '../errors.js';
import { formatDuration } from '../observability/run-statistics.js';
import { BatchRunner } from '../orchestrator/batch-runner.js';
import { DEFAULT_PROGRESS_FILE, ProgressStore } from '../pipeline/progress-store.js';
import { booleanFlag, optionalBooleanFlag, optionalPath } from './args.js';
import {
  connect,
  defaultDependencies,
  type ActionDependencies,
} from './dependencies.js';

const markFlagSchema = z
  .preprocess(
    // A bare `--mark` arrives as "true"
    (value) => (value === 'true' ? 'mark_and_delete' : value),
    markModeSchema,
  )
  .optional();

const runArgsSchema = z.object({
  config: z.string().trim().min(1, 'Missing --config'),
  token: optionalPath('Invalid --token'),
  progressFile: optionalPath('Invalid --progressFile'),
  resume: booleanFlag(false),
  fresh: booleanFlag(false),
  dryRun: booleanFlag(false),
  yes: booleanFlag(false),
  mark: markFlagSchema,
  skipMarked: optionalBooleanFlag(),
});

type RunArgs = z.infer<typeof runArgsSchema>;

const SHUTDOWN_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

function describeMode(settings: EngineSettings): string {
  switch (settings.mode) {
    case 'delete-only':
      return 'delete';
    case 'mark-and-delete':
      return `mark ("${settings.markerText}") then delete`;
    case 'mark-only':
      return `mark only ("${settings.markerText}")`;
  }
}

function logSettings(settings: EngineSettings, targetCount: number): void {
  log.info(`Targets: ${targetCount}`);
  log.info(`Mode: ${describeMode(settings)}`);
  log.info(`Search delay: ${settings.searchDelayMs / 1000}s`);
  log.info(`Delete delay: ${settings.deleteDelayMs / 1000}s`);
  log.info(`Skip pinned: ${settings.skipPinned}`);
  log.info(`Skip marked: ${settings.skipMarked}`);
  log.info(`Max retries: ${settings.maxRetries}`);
  if (settings.dryRun) {
    log.warn('DRY RUN: nothing will be edited or deleted');
  }
}

export async function runRunAction(
  args: RunArgs,
  dependencies: ActionDependencies = defaultDependencies,
): Promise<number> {
  const token = new CancellationToken();
  const onSignal = (signal: NodeJS.Signals) => {
    log.warn(`Received ${signal}, stopping after the current step...`);
    token.cancel();
  };

  try {
    const { settings, targets } = loadRunConfig(args.config, {
      markMode: args.mark,
      skipMarked: args.skipMarked,
      dryRun: args.dryRun,
    });

    const enabled = targets.filter((target) => target.enabled);
    if (enabled.length === 0) {
      throw new ConfigError(args.config, 'no enabled targets');
    }

    const { api, user } = await connect(args.token, dependencies);
    logSettings(settings, enabled.length);

    if (!settings.dryRun && !args.yes) {
      const confirmed = await dependencies.confirm(
        `This will permanently alter messages in ${enabled.length} target(s). Type "yes" to continue: `,
      );
      if (!confirmed) {
        log.info('Aborted.');
        return 0;
      }
    }

    for (const signal of SHUTDOWN_SIGNALS) {
      process.on(signal, onSignal);
    }

    const progressStore = new ProgressStore(args.progressFile ?? DEFAULT_PROGRESS_FILE);
    if (args.fresh) {
      progressStore.clear();
      log.info(`Cleared saved progress at ${progressStore.path}`);
    }

    const runner = new BatchRunner({
      api,
      progressStore,
      settings,
      authorId: user.id,
      token,
      pacer: dependencies.pacer,
    });

    const outcome = await runner.run(enabled, { resume: args.resume });

    log.info(outcome.status === 'completed' ? 'Run complete' : 'Run cancelled');
    for (const line of outcome.summary) {
      log.info(line);
    }
    log.info(`Time spent waiting: ${formatDuration(outcome.waitedMs)}`);

    return 0;
  } catch (error) {
    if (isFatalError(error)) {
      log.fatal(error.message);
      return 1;
    }
    throw error;
  } finally {
    for (const signal of SHUTDOWN_SIGNALS) {
      process.off(signal, onSignal);
    }
  }
}

export { runArgsSchema };
export type { RunArgs };
