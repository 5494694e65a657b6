/**
 * @fileoverview Persistent JSON state storage for PromptCrafter.
 *
 * Run history and the last used project paths are kept in
 * `~/.promptcrafter/state.json` (or `PROMPTCRAFTER_STATE_FILE`) with
 * debounced writes so a burst of scheduled runs becomes one disk write.
 *
 * @module state-store
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync, renameSync, unlinkSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { createInitialState, type AppState, type RunRecord } from './types.js';
import { MAX_CONSECUTIVE_SAVE_FAILURES, MAX_RUN_HISTORY, SAVE_DEBOUNCE_MS } from './config/generation-limits.js';

/** Default state file location, honouring the PROMPTCRAFTER_STATE_FILE override. */
export function defaultStatePath(): string {
  return process.env.PROMPTCRAFTER_STATE_FILE || join(homedir(), '.promptcrafter', 'state.json');
}

/**
 * Persistent JSON state storage with debounced writes.
 *
 * @example
 * ```typescript
 * const store = new StateStore();
 * store.addRun(record);   // debounced - written within 500ms
 * store.flush();          // force the write before exit
 * ```
 */
export class StateStore {
  private state: AppState;
  private filePath: string;
  private saveTimeout: NodeJS.Timeout | null = null;
  private dirty: boolean = false;

  // Circuit breaker for save failures (prevents hammering disk on persistent errors)
  private consecutiveSaveFailures: number = 0;
  private circuitBreakerOpen: boolean = false;

  constructor(filePath?: string) {
    this.filePath = filePath || defaultStatePath();
    this.state = this.load();
  }

  /** Path of the state file. */
  get path(): string {
    return this.filePath;
  }

  private ensureDir(): void {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  private load(): AppState {
    try {
      if (existsSync(this.filePath)) {
        return parseState(readFileSync(this.filePath, 'utf-8'));
      }
    } catch (err) {
      console.error('[StateStore] Failed to load state, using initial state:', err);
    }
    return createInitialState();
  }

  /**
   * Schedules a debounced save.
   * Multiple calls within 500ms are batched into a single disk write.
   */
  save(): void {
    this.dirty = true;
    if (this.saveTimeout) {
      return; // Already scheduled
    }
    this.saveTimeout = setTimeout(() => {
      this.saveNow();
    }, SAVE_DEBOUNCE_MS);
  }

  /**
   * Immediately writes state to disk: the current file is copied to `.bak`,
   * then the new state is written to a temp file and renamed into place.
   */
  saveNow(): void {
    if (this.saveTimeout) {
      clearTimeout(this.saveTimeout);
      this.saveTimeout = null;
    }
    if (!this.dirty) {
      return;
    }

    if (this.circuitBreakerOpen) {
      console.warn('[StateStore] Circuit breaker open - skipping save (too many consecutive failures)');
      return;
    }

    this.dirty = false;
    const tempPath = this.filePath + '.tmp';
    const backupPath = this.filePath + '.bak';
    const json = JSON.stringify(this.state, null, 2);

    try {
      this.ensureDir();
      if (existsSync(this.filePath)) {
        const currentContent = readFileSync(this.filePath, 'utf-8');
        JSON.parse(currentContent); // Only back up a file that still parses
        writeFileSync(backupPath, currentContent, 'utf-8');
      }
    } catch (err) {
      console.warn('[StateStore] Could not create backup (current file may be corrupt):', err);
    }

    try {
      writeFileSync(tempPath, json, 'utf-8');
      renameSync(tempPath, this.filePath);

      this.consecutiveSaveFailures = 0;
    } catch (err) {
      console.error('[StateStore] Failed to write state file:', err);
      this.consecutiveSaveFailures++;

      try {
        if (existsSync(tempPath)) {
          unlinkSync(tempPath);
        }
      } catch (cleanupErr) {
        console.warn('[StateStore] Failed to cleanup temp file during save error:', cleanupErr);
      }

      if (this.consecutiveSaveFailures >= MAX_CONSECUTIVE_SAVE_FAILURES) {
        console.error('[StateStore] Circuit breaker OPEN - writes failing repeatedly');
        this.circuitBreakerOpen = true;
      }

      // Retry on the next save
      this.dirty = true;
    }
  }

  /**
   * Attempt to recover state from the backup file.
   * @returns true if the backup was read
   */
  recoverFromBackup(): boolean {
    const backupPath = this.filePath + '.bak';
    try {
      if (existsSync(backupPath)) {
        this.state = parseState(readFileSync(backupPath, 'utf-8'));
        this.circuitBreakerOpen = false;
        this.consecutiveSaveFailures = 0;
        return true;
      }
    } catch (err) {
      console.error('[StateStore] Failed to recover from backup:', err);
    }
    return false;
  }

  /** Whether saves are currently being skipped after repeated failures. */
  isCircuitBreakerOpen(): boolean {
    return this.circuitBreakerOpen;
  }

  /** Flushes any pending save. Call before shutdown. */
  flush(): void {
    this.saveNow();
  }

  /** Returns the full application state object. */
  getState(): AppState {
    return this.state;
  }

  /**
   * Records a run and trims the history to MAX_RUN_HISTORY entries.
   */
  addRun(record: RunRecord): void {
    this.state.runs[record.id] = record;
    const overflow = Object.values(this.state.runs)
      .sort((a, b) => b.startedAt - a.startedAt)
      .slice(MAX_RUN_HISTORY);
    for (const old of overflow) {
      delete this.state.runs[old.id];
    }
    this.save();
  }

  /** Returns a run record by ID, or null if not found. */
  getRun(id: string): RunRecord | null {
    return this.state.runs[id] ?? null;
  }

  /** Returns run records, newest first. */
  getRuns(limit?: number): RunRecord[] {
    const runs = Object.values(this.state.runs).sort((a, b) => b.startedAt - a.startedAt);
    return limit !== undefined ? runs.slice(0, limit) : runs;
  }

  /** Removes all run records. Returns count removed. */
  clearRuns(): number {
    const count = Object.keys(this.state.runs).length;
    this.state.runs = {};
    this.save();
    return count;
  }

  /** Remembers the project paths of the latest command. */
  setLastProject(configPath: string, templatePath: string): void {
    this.state.lastConfigPath = configPath;
    this.state.lastTemplatePath = templatePath;
    this.save();
  }

  /** Resets all state to initial values and saves immediately. */
  reset(): void {
    this.state = createInitialState();
    this.dirty = true;
    this.saveNow();
  }
}

/**
 * Parses a state file, filling in fields missing from older files.
 */
function parseState(content: string): AppState {
  const parsed = JSON.parse(content) as Partial<AppState>;
  const initial = createInitialState();
  return {
    ...initial,
    ...parsed,
    runs: { ...parsed.runs },
  };
}

// Singleton instance
let storeInstance: StateStore | null = null;

/**
 * Gets or creates the singleton StateStore instance.
 * @param filePath Optional custom file path (only used on first call).
 */
export function getStore(filePath?: string): StateStore {
  if (!storeInstance) {
    storeInstance = new StateStore(filePath);
  }
  return storeInstance;
}
