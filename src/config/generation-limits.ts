/**
 * @fileoverview Centralized limits and defaults for prompt generation.
 *
 * These constants define model defaults, cache sizing, scheduler bounds
 * and history retention.
 *
 * @module config/generation-limits
 */

// ============================================================================
// Model Defaults
// ============================================================================

/**
 * Model used when neither the command line nor the config names one.
 */
export const DEFAULT_MODEL = 'gpt-4o-mini';

/**
 * Accepted temperature range for the Chat Completions API.
 */
export const MIN_TEMPERATURE = 0;
export const MAX_TEMPERATURE = 2;

// ============================================================================
// Project Layout Defaults
// ============================================================================

/** Config file looked up in the working directory. */
export const DEFAULT_CONFIG_FILE = 'config.yaml';

/** Template file looked up in the working directory. */
export const DEFAULT_TEMPLATE_FILE = 'prompts/template.txt';

// ============================================================================
// Response Cache Limits
// ============================================================================

/**
 * Default number of cached model answers before LRU eviction.
 */
export const DEFAULT_CACHE_MAX_ENTRIES = 500;

// ============================================================================
// Scheduler Limits
// ============================================================================

/**
 * Smallest interval between scheduled runs in minutes.
 */
export const MIN_SCHEDULE_INTERVAL_MINUTES = 0.1;

/**
 * Consecutive failed runs after which a schedule is marked failed.
 */
export const MAX_CONSECUTIVE_RUN_FAILURES = 3;

/**
 * Log lines kept per scheduled run (oldest dropped first).
 */
export const MAX_RUN_LOG_LINES = 200;

/**
 * Age after which finished schedules are dropped by cleanup (1 hour).
 */
export const SCHEDULED_RUN_MAX_AGE_MS = 60 * 60 * 1000;

// ============================================================================
// History Limits
// ============================================================================

/**
 * Run records kept in the state file.
 */
export const MAX_RUN_HISTORY = 100;

/** Debounce delay for batching state writes (ms) */
export const SAVE_DEBOUNCE_MS = 500;

/** Maximum consecutive save failures before circuit breaker opens */
export const MAX_CONSECUTIVE_SAVE_FAILURES = 3;
