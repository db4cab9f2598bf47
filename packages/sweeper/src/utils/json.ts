import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';

export function formatJson(value: unknown, pretty: boolean): string {
  return pretty ? JSON.stringify(value, null, 2) : JSON.stringify(value);
}

/** Throws on unreadable files and invalid JSON; callers map that to their own error. */
export function readJsonFile(path: string): unknown {
  return JSON.parse(readFileSync(path, 'utf-8'));
}

/** Replaces `path` as a whole: writes a sibling temp file, then renames it over. */
export function writeJsonFileAtomic(path: string, value: unknown): void {
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const tmpPath = `${path}.tmp`;
  writeFileSync(tmpPath, formatJson(value, true), 'utf-8');
  renameSync(tmpPath, path);
}
