#!/usr/bin/env node
import { z } from 'zod';
import { discoverArgsSchema, runDiscoverAction } from './actions/discover.js';
import { runArgsSchema, runRunAction } from './actions/run.js';
import {
  runVerifyAuthAction,
  verifyAuthArgsSchema,
} from './actions/verify-auth.js';

type ParsedArgs = {
  command: string;
  options: Record<string, string>;
};

const cliInputSchema = z.discriminatedUnion('command', [
  z.object({
    command: z.literal('help'),
    options: z.record(z.string(), z.string()),
  }),
  z.object({
    command: z.literal('verify-auth'),
    options: z.record(z.string(), z.string()),
  }),
  z.object({
    command: z.literal('discover'),
    options: z.record(z.string(), z.string()),
  }),
  z.object({
    command: z.literal('run'),
    options: z.record(z.string(), z.string()),
  }),
]);

function parseArgs(argv: string[]): ParsedArgs {
  const [rawCommand, ...rest] = argv;
  const command = normalizeCommand(rawCommand);
  const options: Record<string, string> = {};

  for (let index = 0; index < rest.length; index += 1) {
    const arg = rest[index];
    if (!arg?.startsWith('--')) {
      continue;
    }

    const [key, maybeValue] = arg.slice(2).split('=', 2);
    if (!key) {
      continue;
    }

    if (maybeValue !== undefined) {
      options[key] = maybeValue;
      continue;
    }

    const next = rest[index + 1];
    if (next && !next.startsWith('--')) {
      options[key] = next;
      index += 1;
      continue;
    }

    options[key] = 'true';
  }

  return { command, options };
}

function normalizeCommand(command?: string): string {
  if (
    !command ||
    command === 'help' ||
    command === '--help' ||
    command === '-h'
  ) {
    return 'help';
  }

  return command;
}

function printHelp(): void {
  console.log(`chat-sweeper CLI

Usage:
  chat-sweeper help
  chat-sweeper verify-auth
  chat-sweeper verify-auth --token="<token>"
  chat-sweeper discover
  chat-sweeper discover --outputFile="./config.json" --includeDms=false
  chat-sweeper discover --guilds="111111111111111111,222222222222222222" --force
  chat-sweeper run --config="./config.json"
  chat-sweeper run --config="./config.json" --dryRun
  chat-sweeper run --config="./config.json" --resume
  chat-sweeper run --config="./config.json" --fresh
  chat-sweeper run --config="./config.json" --mark
  chat-sweeper run --config="./config.json" --mark=mark_only --skipMarked
  chat-sweeper run --config="./config.json" --yes --progressFile="./tmp/progress.json"

Commands:
  help         Show this help message
  verify-auth  Check that the token is accepted and print the account
  discover     Write a config file listing every server channel and direct conversation
  run          Delete (or mark) your messages in every enabled target of a config file

Token:
  Looked up in order: --token, the DISCORD_TOKEN environment variable,
  then DISCORD_TOKEN in ./.env

Discover options:
  --outputFile Optional. Config file to write (default: config.json).
  --guilds     Optional. Comma-separated server IDs to include (default: all).
  --includeDms Optional. true/false. Add direct and group conversations (default: true).
  --force      Optional. Overwrite an existing output file.

Run options:
  --config       Required. Config file produced by discover or written by hand.
  --dryRun       Optional. Search and preview only; nothing is edited or deleted.
  --resume       Optional. Continue from the saved progress file.
  --fresh        Optional. Delete the saved progress file before starting.
  --progressFile Optional. Progress file path (default: .chat-sweeper-progress.json).
  --mark         Optional. Overwrite messages before deleting them. Accepts
                 off, mark_and_delete (bare flag) or mark_only.
  --skipMarked   Optional. true/false. Leave messages that already carry the marker text.
  --yes          Optional. Do not ask for confirmation.

Environment:
  LOG_LEVEL  trace, debug, info, warn, error, fatal or silent (default: info)
  LOG_FILE   Also write logs to this file
`);
}

async function main(): Promise<number> {
  const { command, options } = parseArgs(process.argv.slice(2));
  const parsedCliInput = cliInputSchema.safeParse({ command, options });

  if (!parsedCliInput.success) {
    console.error(`Unknown command: ${command}`);
    printHelp();
    return 1;
  }

  if (parsedCliInput.data.command === 'help') {
    printHelp();
    return 0;
  }

  if (parsedCliInput.data.command === 'verify-auth') {
    const parsedVerifyArgs = verifyAuthArgsSchema.safeParse(
      parsedCliInput.data.options,
    );
    if (!parsedVerifyArgs.success) {
      console.error(
        parsedVerifyArgs.error.issues[0]?.message ?? 'Invalid arguments',
      );
      printHelp();
      return 1;
    }

    return runVerifyAuthAction(parsedVerifyArgs.data);
  }

  if (parsedCliInput.data.command === 'discover') {
    const parsedDiscoverArgs = discoverArgsSchema.safeParse(
      parsedCliInput.data.options,
    );
    if (!parsedDiscoverArgs.success) {
      console.error(
        parsedDiscoverArgs.error.issues[0]?.message ?? 'Invalid arguments',
      );
      printHelp();
      return 1;
    }

    return runDiscoverAction(parsedDiscoverArgs.data);
  }

  if (parsedCliInput.data.command === 'run') {
    const parsedRunArgs = runArgsSchema.safeParse(parsedCliInput.data.options);
    if (!parsedRunArgs.success) {
      console.error(
        parsedRunArgs.error.issues[0]?.message ?? 'Invalid arguments',
      );
      printHelp();
      return 1;
    }

    return runRunAction(parsedRunArgs.data);
  }

  printHelp();
  return 0;
}

const exitCode = await main();
process.exitCode = exitCode;
