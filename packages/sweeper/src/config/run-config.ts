import { existsSync } from 'node:fs';
import { z } from 'zod';
import { DIRECT_CONTAINER } from '../api/types.js';
import type { ActionMode, EngineSettings, Target } from '../engine/types.js';
import { ConfigError } from '../errors.js';
import { readJsonFile } from '../utils/json.js';

const DEFAULT_MARKER_TEXT = 'Meow Meow Meow Meow';
const TRANSIENT_RETRY_DELAY_MS = 1000;

const markModeSchema = z.enum(['off', 'mark_and_delete', 'mark_only']);

type MarkMode = z.infer<typeof markModeSchema>;

const markModeToActionMode: Record<MarkMode, ActionMode> = {
  off: 'delete-only',
  mark_and_delete: 'mark-and-delete',
  mark_only: 'mark-only',
};

const settingsSchema = z.object({
  search_delay: z.number().min(0).default(10),
  delete_delay: z.number().min(0).default(1),
  skip_pinned: z.boolean().default(true),
  skip_marked: z.boolean().default(false),
  max_retries: z.number().int().min(1).default(3),
  mark_mode: markModeSchema.default('off'),
  marker_text: z.string().min(1).default(DEFAULT_MARKER_TEXT),
  dry_run: z.boolean().default(false),
});

const snowflakeSchema = z.string().regex(/^\d+$/, 'Expected a numeric id');

const guildTargetSchema = z.object({
  type: z.literal('guild'),
  guild_id: snowflakeSchema,
  guild_name: z.string().default('Unknown server'),
  channel_id: snowflakeSchema,
  channel_name: z.string().default('unknown'),
  enabled: z.boolean().default(true),
});

const dmTargetSchema = z.object({
  type: z.literal('dm'),
  channel_id: snowflakeSchema,
  recipient_name: z.string().default('Unknown'),
  enabled: z.boolean().default(true),
});

const groupDmTargetSchema = z.object({
  type: z.literal('group_dm'),
  channel_id: snowflakeSchema,
  group_name: z.string().default('Unnamed Group'),
  enabled: z.boolean().default(true),
});

const targetSchema = z
  .discriminatedUnion('type', [
    guildTargetSchema,
    dmTargetSchema,
    groupDmTargetSchema,
  ])
  .transform((target): Target => {
    switch (target.type) {
      case 'guild':
        return {
          kind: 'guild',
          containerId: target.guild_id,
          channelId: target.channel_id,
          displayName: `#${target.channel_name} (${target.guild_name})`,
          enabled: target.enabled,
        };
      case 'dm':
        return {
          kind: 'direct',
          containerId: DIRECT_CONTAINER,
          channelId: target.channel_id,
          displayName: `DM: @${target.recipient_name}`,
          enabled: target.enabled,
        };
      case 'group_dm':
        return {
          kind: 'group',
          containerId: DIRECT_CONTAINER,
          channelId: target.channel_id,
          displayName: `Group: ${target.group_name}`,
          enabled: target.enabled,
        };
    }
  });

const runConfigSchema = z.object({
  settings: settingsSchema.default({}),
  targets: z.array(targetSchema).default([]),
});

type RunConfigFile = z.input<typeof runConfigSchema>;

type TargetEntry = z.input<typeof targetSchema>;

type RunConfig = {
  settings: EngineSettings;
  targets: Target[];
};

type ConfigOverrides = {
  markMode?: MarkMode;
  skipMarked?: boolean;
  dryRun?: boolean;
};

function parseRunConfig(
  raw: unknown,
  source: string,
  overrides?: ConfigOverrides,
): RunConfig {
  const parsed = runConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(
      source,
      issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid',
    );
  }

  const { settings, targets } = parsed.data;
  const markMode = overrides?.markMode ?? settings.mark_mode;

  return {
    settings: {
      searchDelayMs: settings.search_delay * 1000,
      deleteDelayMs: settings.delete_delay * 1000,
      transientRetryDelayMs: TRANSIENT_RETRY_DELAY_MS,
      skipPinned: settings.skip_pinned,
      skipMarked: overrides?.skipMarked ?? settings.skip_marked,
      maxRetries: settings.max_retries,
      mode: markModeToActionMode[markMode],
      markerText: settings.marker_text,
      dryRun: overrides?.dryRun === true || settings.dry_run,
    },
    targets,
  };
}

function loadRunConfig(path: string, overrides?: ConfigOverrides): RunConfig {
  if (!existsSync(path)) {
    throw new ConfigError(path, 'file not found');
  }

  let raw: unknown;
  try {
    raw = readJsonFile(path);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(path, message);
  }

  return parseRunConfig(raw, path, overrides);
}

export {
  DEFAULT_MARKER_TEXT,
  markModeSchema,
  settingsSchema,
  runConfigSchema,
  parseRunConfig,
  loadRunConfig,
};
export type { MarkMode, RunConfig, RunConfigFile, TargetEntry, ConfigOverrides };
