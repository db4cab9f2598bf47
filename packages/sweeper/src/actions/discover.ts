import { existsSync } from 'node:fs';
import { log } from '@workspace/logger';
import { z } from 'zod';
import { BackoffController } from '../anti-blocking/backoff-controller.js';
import { Pacer } from '../anti-blocking/pacer.js';
import type {
  ApiFailure,
  GuildSummary,
  MessageApi,
  PrivateChannel,
} from '../api/types.js';
import {
  parseRunConfig,
  settingsSchema,
  type RunConfigFile,
  type TargetEntry,
} from '../config/run-config.js';
import { CancellationToken, type RunContext } from '../engine/run-context.js';
import { ApiRequestError, ConfigError, isFatalError } from '../errors.js';
import { RunStatistics } from '../observability/run-statistics.js';
import { writeJsonFileAtomic } from '../utils/json.js';
import { booleanFlag, optionalPath } from './args.js';
import {
  connect,
  defaultDependencies,
  type ActionDependencies,
} from './dependencies.js';

const DEFAULT_OUTPUT_FILE = 'config.json';

/** Text, announcement and forum channels. */
const SEARCHABLE_CHANNEL_TYPES = new Set([0, 5, 15]);
const DIRECT_MESSAGE_TYPE = 1;
const GROUP_MESSAGE_TYPE = 3;

const discoverArgsSchema = z.object({
  token: optionalPath('Invalid --token'),
  outputFile: optionalPath('Invalid --outputFile'),
  guilds: z
    .string()
    .trim()
    .transform((value) =>
      value
        .split(',')
        .map((id) => id.trim())
        .filter((id) => id.length > 0),
    )
    .optional(),
  includeDms: booleanFlag(true),
  force: booleanFlag(false),
});

type DiscoverArgs = z.infer<typeof discoverArgsSchema>;

function describeFailure(result: ApiFailure): string {
  return result.kind === 'network-error'
    ? result.detail
    : `HTTP ${result.status}`;
}

function privateTarget(channel: PrivateChannel): TargetEntry | null {
  if (channel.type === DIRECT_MESSAGE_TYPE) {
    return {
      type: 'dm',
      channel_id: channel.id,
      recipient_name: channel.recipientNames[0] ?? 'Unknown',
    };
  }

  if (channel.type === GROUP_MESSAGE_TYPE) {
    return {
      type: 'group_dm',
      channel_id: channel.id,
      group_name: channel.name ?? 'Unnamed Group',
    };
  }

  return null;
}

/**
 * Lists every searchable conversation of the account and returns them as
 * config targets. Guild channel listings that fail are logged and skipped.
 */
async function discoverTargets(
  api: MessageApi,
  context: RunContext,
  options: { guildIds?: string[]; includeDms: boolean },
): Promise<TargetEntry[]> {
  const backoff = new BackoffController();
  const targets: TargetEntry[] = [];

  const guilds = await backoff.settle(() => api.listGuilds(), context);
  if (guilds.kind !== 'ok') {
    throw new ApiRequestError('list servers', describeFailure(guilds));
  }

  const wanted = options.guildIds;
  const selected: GuildSummary[] =
    wanted && wanted.length > 0
      ? guilds.data.filter((guild) => wanted.includes(guild.id))
      : guilds.data;

  log.info(`Found ${guilds.data.length} servers, scanning ${selected.length}`);

  for (const guild of selected) {
    const channels = await backoff.settle(
      () => api.listGuildChannels(guild.id),
      context,
    );
    if (channels.kind !== 'ok') {
      log.warn(`Skipping ${guild.name}: ${describeFailure(channels)}`);
      continue;
    }

    const searchable = channels.data.filter((channel) =>
      SEARCHABLE_CHANNEL_TYPES.has(channel.type),
    );
    log.info(`  ${guild.name}: ${searchable.length} text channels`);

    for (const channel of searchable) {
      targets.push({
        type: 'guild',
        guild_id: guild.id,
        guild_name: guild.name,
        channel_id: channel.id,
        channel_name: channel.name,
      });
    }
  }

  if (options.includeDms) {
    const privateChannels = await backoff.settle(
      () => api.listPrivateChannels(),
      context,
    );
    if (privateChannels.kind !== 'ok') {
      throw new ApiRequestError(
        'list direct messages',
        describeFailure(privateChannels),
      );
    }

    for (const channel of privateChannels.data) {
      const target = privateTarget(channel);
      if (target) {
        targets.push(target);
      }
    }
    log.info(`Found ${privateChannels.data.length} direct conversations`);
  }

  return targets;
}

export async function runDiscoverAction(
  args: DiscoverArgs,
  dependencies: ActionDependencies = defaultDependencies,
): Promise<number> {
  const outputFile = args.outputFile ?? DEFAULT_OUTPUT_FILE;

  try {
    if (existsSync(outputFile) && !args.force) {
      throw new ConfigError(outputFile, 'file already exists (pass --force to overwrite)');
    }

    const { api } = await connect(args.token, dependencies);

    const settings = settingsSchema.parse({});
    const context: RunContext = {
      authorId: '',
      settings: parseRunConfig({ settings }, outputFile).settings,
      statistics: new RunStatistics(),
      token: new CancellationToken(),
      pacer: dependencies.pacer ?? new Pacer(),
    };

    const targets = await discoverTargets(api, context, {
      guildIds: args.guilds,
      includeDms: args.includeDms,
    });

    const config: RunConfigFile = { settings, targets };
    writeJsonFileAtomic(outputFile, config);

    log.info(`Configuration saved to ${outputFile} (${targets.length} targets)`);
    log.info(
      `Review it, disable what you want to keep, then start with: run --config=${outputFile}`,
    );
    return 0;
  } catch (error) {
    if (isFatalError(error)) {
      log.fatal(error.message);
      return 1;
    }
    throw error;
  }
}

export { DEFAULT_OUTPUT_FILE, discoverArgsSchema, discoverTargets };
export type { DiscoverArgs };
