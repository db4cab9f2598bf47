import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { ConfigError } from '../errors.js';
import { loadRunConfig, parseRunConfig } from './run-config.js';

const TEST_DIR = join(process.cwd(), 'tmp', 'test-run-config');

const guildEntry = {
  type: 'guild',
  guild_id: '1000',
  guild_name: 'Test Server',
  channel_id: '2000',
  channel_name: 'general',
};

function cleanup(): void {
  if (existsSync(TEST_DIR)) {
    rmSync(TEST_DIR, { recursive: true, force: true });
  }
}

describe('parseRunConfig', () => {
  it('fills in default settings', () => {
    const { settings } = parseRunConfig({ targets: [guildEntry] }, 'config.json');

    expect(settings).toEqual({
      searchDelayMs: 10_000,
      deleteDelayMs: 1_000,
      transientRetryDelayMs: 1_000,
      skipPinned: true,
      skipMarked: false,
      maxRetries: 3,
      mode: 'delete-only',
      markerText: 'Meow Meow Meow Meow',
      dryRun: false,
    });
  });

  it('converts delays from seconds', () => {
    const { settings } = parseRunConfig(
      { settings: { search_delay: 2.5, delete_delay: 0 } },
      'config.json',
    );

    expect(settings.searchDelayMs).toBe(2_500);
    expect(settings.deleteDelayMs).toBe(0);
  });

  it('builds targets for every conversation kind', () => {
    const { targets } = parseRunConfig(
      {
        targets: [
          guildEntry,
          { type: 'dm', channel_id: '3000', recipient_name: 'friend', enabled: false },
          { type: 'group_dm', channel_id: '4000' },
        ],
      },
      'config.json',
    );

    expect(targets).toEqual([
      {
        kind: 'guild',
        containerId: '1000',
        channelId: '2000',
        displayName: '#general (Test Server)',
        enabled: true,
      },
      {
        kind: 'direct',
        containerId: '@me',
        channelId: '3000',
        displayName: 'DM: @friend',
        enabled: false,
      },
      {
        kind: 'group',
        containerId: '@me',
        channelId: '4000',
        displayName: 'Group: Unnamed Group',
        enabled: true,
      },
    ]);
  });

  it('maps mark modes and lets overrides win', () => {
    const raw = { settings: { mark_mode: 'mark_only', skip_marked: true } };

    expect(parseRunConfig(raw, 'config.json').settings.mode).toBe('mark-only');

    const { settings } = parseRunConfig(raw, 'config.json', {
      markMode: 'mark_and_delete',
      skipMarked: false,
      dryRun: true,
    });
    expect(settings.mode).toBe('mark-and-delete');
    expect(settings.skipMarked).toBe(false);
    expect(settings.dryRun).toBe(true);
  });

  it('keeps a dry run from the file when the flag is absent', () => {
    const { settings } = parseRunConfig(
      { settings: { dry_run: true } },
      'config.json',
      { dryRun: false },
    );

    expect(settings.dryRun).toBe(true);
  });

  it('rejects out-of-range settings with the offending path', () => {
    expect(() =>
      parseRunConfig({ settings: { max_retries: 0 } }, 'config.json'),
    ).toThrow(ConfigError);
    expect(() =>
      parseRunConfig({ settings: { max_retries: 0 } }, 'config.json'),
    ).toThrow(/settings\.max_retries/);
  });

  it('rejects unknown target types and non-numeric ids', () => {
    expect(() =>
      parseRunConfig({ targets: [{ type: 'forum', channel_id: '1' }] }, 'config.json'),
    ).toThrow(ConfigError);
    expect(() =>
      parseRunConfig(
        { targets: [{ ...guildEntry, channel_id: 'general' }] },
        'config.json',
      ),
    ).toThrow(/targets\.0\.channel_id/);
  });
});

describe('loadRunConfig', () => {
  beforeEach(() => {
    cleanup();
    mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    cleanup();
  });

  it('reads a config file from disk', () => {
    const path = join(TEST_DIR, 'config.json');
    writeFileSync(path, JSON.stringify({ targets: [guildEntry] }));

    expect(loadRunConfig(path).targets).toHaveLength(1);
  });

  it('reports a missing file', () => {
    expect(() => loadRunConfig(join(TEST_DIR, 'missing.json'))).toThrow(
      /file not found/,
    );
  });

  it('reports invalid JSON as a configuration error', () => {
    const path = join(TEST_DIR, 'broken.json');
    writeFileSync(path, '{ "targets": [');

    expect(() => loadRunConfig(path)).toThrow(ConfigError);
  });
});
