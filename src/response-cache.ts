/**
 * @fileoverview Cache of model answers keyed by model, temperature and prompt.
 *
 * Entries live in an LRUMap; when a file path is given the cache can be
 * loaded from and saved to a JSON file so repeated runs reuse answers.
 *
 * @module response-cache
 */

import { createHash } from 'node:crypto';
import { existsSync, readFileSync } from 'node:fs';
import { LRUMap } from './utils/index.js';
import { writeTextFile } from './io-helper.js';
import { DEFAULT_CACHE_MAX_ENTRIES } from './config/generation-limits.js';

export interface CachedResponse {
  value: string;
  createdAt: number;
}

export interface ResponseCacheOptions {
  maxEntries?: number;
  /** JSON file used by load() and save() */
  filePath?: string | null;
}

interface CacheFile {
  version: 1;
  entries: Array<[string, CachedResponse]>;
}

/**
 * Builds the cache key for one model call.
 */
export function cacheKey(model: string, temperature: number | null, prompt: string): string {
  return createHash('sha256')
    .update(`${model}\0${temperature ?? ''}\0${prompt}`)
    .digest('hex');
}

export class ResponseCache {
  private readonly entries: LRUMap<string, CachedResponse>;
  private readonly filePath: string | null;

  constructor(options: ResponseCacheOptions = {}) {
    this.entries = new LRUMap({ maxSize: options.maxEntries ?? DEFAULT_CACHE_MAX_ENTRIES });
    this.filePath = options.filePath ?? null;
  }

  get size(): number {
    return this.entries.size;
  }

  get maxEntries(): number {
    return this.entries.maxEntries;
  }

  /** Returns a cached answer and marks it most recently used. */
  get(model: string, temperature: number | null, prompt: string): string | undefined {
    return this.entries.get(cacheKey(model, temperature, prompt))?.value;
  }

  set(model: string, temperature: number | null, prompt: string, value: string): void {
    this.entries.set(cacheKey(model, temperature, prompt), { value, createdAt: Date.now() });
  }

  clear(): void {
    this.entries.clear();
  }

  /**
   * Loads entries from the cache file. A missing file is an empty cache;
   * a corrupt file is reported and ignored.
   *
   * @returns Number of entries loaded
   */
  load(): number {
    if (!this.filePath || !existsSync(this.filePath)) {
      return 0;
    }
    try {
      const parsed: unknown = JSON.parse(readFileSync(this.filePath, 'utf-8'));
      if (!isCacheFile(parsed)) {
        console.warn(`[ResponseCache] Ignoring cache file with unexpected layout: ${this.filePath}`);
        return 0;
      }
      for (const [key, entry] of parsed.entries) {
        this.entries.set(key, entry);
      }
      return parsed.entries.length;
    } catch (err) {
      console.warn(`[ResponseCache] Ignoring unreadable cache file ${this.filePath}:`, err);
      return 0;
    }
  }

  /** Writes all entries, oldest first, to the cache file. */
  async save(): Promise<void> {
    if (!this.filePath) {
      return;
    }
    const file: CacheFile = {
      version: 1,
      entries: this.entries.keysInOrder().flatMap((key): Array<[string, CachedResponse]> => {
        const entry = this.entries.peek(key);
        return entry ? [[key, entry]] : [];
      }),
    };
    await writeTextFile(this.filePath, JSON.stringify(file, null, 2));
  }
}

function isCacheFile(value: unknown): value is CacheFile {
  if (typeof value !== 'object' || value === null) return false;
  if (!('version' in value) || value.version !== 1) return false;
  if (!('entries' in value) || !Array.isArray(value.entries)) return false;
  return value.entries.every(
    (item: unknown) =>
      Array.isArray(item) &&
      item.length === 2 &&
      typeof item[0] === 'string' &&
      typeof item[1] === 'object' &&
      item[1] !== null &&
      typeof item[1].value === 'string' &&
      typeof item[1].createdAt === 'number',
  );
}
