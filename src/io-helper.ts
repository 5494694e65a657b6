/**
 * @fileoverview File helpers shared by the pipeline, cache and CLI.
 *
 * Writes go to a temp file first and are renamed into place so readers never
 * see a half-written prompt or cache file.
 *
 * @module io-helper
 */

import { existsSync, mkdirSync } from 'node:fs';
import { readFile, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, resolve } from 'node:path';

/** Creates a directory (and parents) if it does not exist. */
export function ensureDir(dir: string): void {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

/**
 * Resolves `path` against `baseDir` unless it is already absolute.
 */
export function resolveFrom(baseDir: string, path: string): string {
  return isAbsolute(path) ? path : resolve(baseDir, path);
}

/** Reads a UTF-8 text file. */
export async function readTextFile(path: string): Promise<string> {
  return readFile(path, 'utf-8');
}

/**
 * Writes a UTF-8 text file atomically, creating parent directories.
 */
export async function writeTextFile(path: string, content: string): Promise<void> {
  ensureDir(dirname(path));
  const tempPath = `${path}.${process.pid}.tmp`;
  try {
    await writeFile(tempPath, content, 'utf-8');
    await rename(tempPath, path);
  } catch (err) {
    await unlink(tempPath).catch((cleanupErr: unknown) => {
      if (!isMissingFileError(cleanupErr)) {
        console.warn('[io-helper] Failed to remove temp file after write error:', cleanupErr);
      }
    });
    throw err;
  }
}

/**
 * True for the `ENOENT` error node raises when a path does not exist.
 */
export function isMissingFileError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
