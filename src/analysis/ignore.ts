import * as path from 'path';
import { readFileSafe } from '../core/fileio.js';

export const IGNORE_FILE_NAME = '.readmeforgeignore';

function normalizePattern(value: string): string {
  let normalized = value.trim().replace(/\\/g, '/');
  while (normalized.startsWith('./')) normalized = normalized.slice(2);
  if (normalized.startsWith('/')) normalized = normalized.slice(1);
  return normalized.trim();
}

/**
 * Reduce an ignore line to a bare directory name. Globs and nested paths are
 * not supported by the walker and yield null.
 */
export function extractDirectoryName(pattern: string): string | null {
  if (/[*?[\]{}!]/.test(pattern)) return null;
  const normalized = normalizePattern(pattern);
  if (!normalized) return null;

  const noTrailing = normalized.replace(/\/+$/, '');
  if (!noTrailing) return null;
  if (!noTrailing.includes('/')) return noTrailing;
  return null;
}

export function parseIgnoreFile(raw: string): string[] {
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

async function readIgnorePatterns(rootPath: string): Promise<string[]> {
  try {
    return parseIgnoreFile(await readFileSafe(path.join(rootPath, IGNORE_FILE_NAME)));
  } catch {
    // The ignore file is optional
    return [];
  }
}

export async function getIgnoredDirectoryNames(
  rootPath: string,
  extra: string[] = [],
): Promise<Set<string>> {
  const fromFile = await readIgnorePatterns(rootPath);
  const names = [...fromFile, ...extra]
    .map((pattern) => extractDirectoryName(pattern))
    .filter((v): v is string => !!v);
  return new Set(names);
}
