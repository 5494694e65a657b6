/**
 * @fileoverview Type definitions for PromptCrafter
 *
 * This module contains the interfaces and types shared across the
 * application. It provides type safety for:
 * - Project configuration and templates
 * - Generation results
 * - Scheduled runs
 * - Persisted run history
 */

// ========== Configuration Types ==========

/**
 * Response cache settings from the `cache` section of the config file.
 */
export interface CacheSettings {
  /** Whether model answers are cached */
  enabled: boolean;
  /** JSON file the cache is persisted to, or null for memory only */
  file: string | null;
  /** Maximum cached answers before LRU eviction */
  maxEntries: number;
}

/**
 * Normalized project configuration.
 */
export interface PromptConfig {
  /** Model name (`openai_model` or `model.name`) */
  modelName: string | null;
  /** Sampling temperature (`temperature` or `model.temperature`) */
  temperature: number | null;
  /** Param prompts in config order, one entry per name */
  params: ParamSpec[];
  /** Where the rendered prompt is written */
  outputFile: string | null;
  cache: CacheSettings;
}

/**
 * A single `{name, prompt}` entry of the `params` list.
 */
export interface ParamSpec {
  name: string;
  prompt: string;
}

// ========== Template Types ==========

export interface TemplateInfo {
  /** Raw template text */
  content: string;
  /** Unique placeholder names in first-appearance order */
  placeholders: string[];
}

// ========== Generation Types ==========

/** Param name to generated value. */
export type GeneratedValues = Record<string, string>;

/**
 * Outcome of one pipeline run.
 */
export interface GenerationResult {
  values: GeneratedValues;
  /** Rendered template */
  output: string;
  /** Absolute path written to, or null for dry runs / no output configured */
  outputFile: string | null;
  model: string;
  temperature: number | null;
  /** Params answered from the response cache */
  cacheHits: number;
  durationMs: number;
}

// ========== Scheduler Types ==========

export type ScheduledRunStatus = 'running' | 'completed' | 'failed' | 'stopped';

/**
 * State of a recurring generation schedule.
 */
export interface ScheduledRun {
  id: string;
  intervalMs: number;
  /** Stop after this many attempts (null = unlimited) */
  maxRuns: number | null;
  startedAt: number;
  /** Hard deadline (null = none) */
  endAt: number | null;
  status: ScheduledRunStatus;
  completedRuns: number;
  failedRuns: number;
  lastRunAt: number | null;
  nextRunAt: number | null;
  /** When the schedule reached a final status */
  finishedAt: number | null;
  logs: string[];
}

// ========== Persistence Types ==========

export type RunRecordStatus = 'completed' | 'failed';

/**
 * One generation run as stored in the history.
 */
export interface RunRecord {
  id: string;
  startedAt: number;
  finishedAt: number;
  status: RunRecordStatus;
  model: string | null;
  outputFile: string | null;
  placeholders: string[];
  cacheHits: number;
  error?: string;
  /** Set when the run was triggered by a schedule */
  scheduleId?: string;
}

/**
 * Complete application state persisted to disk.
 */
export interface AppState {
  /** Map of run ID to run record */
  runs: Record<string, RunRecord>;
  lastConfigPath: string | null;
  lastTemplatePath: string | null;
}

/**
 * Creates initial application state
 * @returns Fresh application state with empty history
 */
export function createInitialState(): AppState {
  return {
    runs: {},
    lastConfigPath: null,
    lastTemplatePath: null,
  };
}

// ========== Error Handling Utilities ==========

/**
 * Type guard to check if a value is an Error instance.
 */
export function isError(value: unknown): value is Error {
  return value instanceof Error;
}

/**
 * Safely extracts an error message from an unknown caught value.
 *
 * @example
 * ```typescript
 * try {
 *   await runGeneration(options);
 * } catch (err) {
 *   console.error('Failed:', getErrorMessage(err));
 * }
 * ```
 */
export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error !== null && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'An unknown error occurred';
}
