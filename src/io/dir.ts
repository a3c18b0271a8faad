import { mkdirSync } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import path from 'node:path';

/** Absolute form of a configured directory; blank values fall back to `baseDir`. */
export function resolveDirectory(directory: string | null | undefined, baseDir: string = process.cwd()): string {
  const trimmed = directory?.trim() ?? '';
  if (!trimmed || trimmed === '.') {
    return path.resolve(baseDir);
  }
  return path.resolve(baseDir, trimmed);
}

export function ensureDirectorySync(directory: string | null | undefined): string {
  const resolved = resolveDirectory(directory);
  mkdirSync(resolved, { recursive: true });
  return resolved;
}

export async function ensureDirectory(directory: string | null | undefined): Promise<string> {
  const resolved = resolveDirectory(directory);
  await mkdir(resolved, { recursive: true });
  return resolved;
}
