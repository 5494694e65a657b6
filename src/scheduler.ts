/**
 * @fileoverview Scheduler - repeats a generation job at a fixed interval.
 *
 * Each schedule runs its job immediately, then again `intervalMs` after the
 * previous attempt finished, so attempts of one schedule never overlap.
 * A schedule ends when:
 * - `maxRuns` attempts have been made, or the next attempt would start after `endAt` (completed)
 * - MAX_CONSECUTIVE_RUN_FAILURES attempts in a row failed (failed)
 * - stop() is called (stopped)
 *
 * @module scheduler
 */

import { EventEmitter } from 'node:events';
import { v4 as uuidv4 } from 'uuid';
import { SchedulerError } from './errors.js';
import {
  MAX_CONSECUTIVE_RUN_FAILURES,
  MAX_RUN_LOG_LINES,
  MIN_SCHEDULE_INTERVAL_MINUTES,
  SCHEDULED_RUN_MAX_AGE_MS,
} from './config/generation-limits.js';
import { getErrorMessage, type GenerationResult, type ScheduledRun, type ScheduledRunStatus } from './types.js';

/** Work performed on every tick of a schedule. */
export type ScheduledJob = (run: ScheduledRun) => Promise<GenerationResult>;

export interface ScheduleOptions {
  intervalMinutes: number;
  /** Stop after this many attempts */
  maxRuns?: number;
  /** Stop once this many minutes have passed since the schedule started */
  durationMinutes?: number;
  job: ScheduledJob;
}

/**
 * Events emitted by GenerationScheduler
 */
export interface GenerationSchedulerEvents {
  runStarted: (run: ScheduledRun) => void;
  iterationCompleted: (run: ScheduledRun, result: GenerationResult) => void;
  iterationFailed: (run: ScheduledRun, error: unknown) => void;
  runFinished: (run: ScheduledRun) => void;
  /** A log line was appended to a run */
  log: (run: ScheduledRun, line: string) => void;
}

interface RunControl {
  job: ScheduledJob;
  timer: NodeJS.Timeout | null;
  consecutiveFailures: number;
}

/**
 * Runs any number of independent schedules.
 *
 * @extends EventEmitter
 * @see GenerationSchedulerEvents
 */
export class GenerationScheduler extends EventEmitter {
  private runs: Map<string, ScheduledRun> = new Map();
  private controls: Map<string, RunControl> = new Map();

  /**
   * Starts a new schedule. The first attempt begins right away.
   *
   * @throws SchedulerError for an interval below the minimum or a
   *   non-positive run count or duration
   */
  schedule(options: ScheduleOptions): ScheduledRun {
    const { intervalMinutes, maxRuns, durationMinutes } = options;
    if (!Number.isFinite(intervalMinutes) || intervalMinutes < MIN_SCHEDULE_INTERVAL_MINUTES) {
      throw new SchedulerError(`Interval must be at least ${MIN_SCHEDULE_INTERVAL_MINUTES} minutes, got ${intervalMinutes}`);
    }
    if (maxRuns !== undefined && (!Number.isInteger(maxRuns) || maxRuns < 1)) {
      throw new SchedulerError(`Run count must be a positive integer, got ${maxRuns}`);
    }
    if (durationMinutes !== undefined && (!Number.isFinite(durationMinutes) || durationMinutes <= 0)) {
      throw new SchedulerError(`Duration must be a positive number of minutes, got ${durationMinutes}`);
    }

    const now = Date.now();
    const run: ScheduledRun = {
      id: uuidv4(),
      intervalMs: Math.round(intervalMinutes * 60 * 1000),
      maxRuns: maxRuns ?? null,
      startedAt: now,
      endAt: durationMinutes !== undefined ? now + Math.round(durationMinutes * 60 * 1000) : null,
      status: 'running',
      completedRuns: 0,
      failedRuns: 0,
      lastRunAt: null,
      nextRunAt: now,
      finishedAt: null,
      logs: [],
    };

    this.runs.set(run.id, run);
    this.controls.set(run.id, { job: options.job, timer: null, consecutiveFailures: 0 });
    this.addLog(run, `Scheduled run started (every ${intervalMinutes} min)`);
    this.emit('runStarted', run);

    this.trigger(run.id);
    return run;
  }

  /** Gets a schedule by ID. */
  get(id: string): ScheduledRun | undefined {
    return this.runs.get(id);
  }

  /** Gets all schedules, oldest first. */
  list(): ScheduledRun[] {
    return Array.from(this.runs.values());
  }

  /** Number of schedules still running. */
  get activeCount(): number {
    return this.list().filter((run) => run.status === 'running').length;
  }

  /**
   * Stops a running schedule. An attempt already in progress finishes but
   * no further attempts start.
   *
   * @returns false if the schedule is unknown or already finished
   */
  stop(id: string): boolean {
    const run = this.runs.get(id);
    if (!run || run.status !== 'running') {
      return false;
    }
    this.finish(run, 'stopped', 'Run stopped by user');
    return true;
  }

  /** Stops every running schedule. Returns the number stopped. */
  stopAll(): number {
    let count = 0;
    for (const run of this.list()) {
      if (this.stop(run.id)) {
        count++;
      }
    }
    return count;
  }

  /**
   * Resolves once the schedule reaches a final status.
   */
  waitForFinish(id: string): Promise<ScheduledRun> {
    const run = this.runs.get(id);
    if (!run) {
      return Promise.reject(new SchedulerError(`Unknown schedule: ${id}`));
    }
    if (run.status !== 'running') {
      return Promise.resolve(run);
    }
    return new Promise((resolve) => {
      const onFinished = (finished: ScheduledRun): void => {
        if (finished.id === id) {
          this.off('runFinished', onFinished);
          resolve(finished);
        }
      };
      this.on('runFinished', onFinished);
    });
  }

  /**
   * Drops finished schedules older than `maxAgeMs`.
   * @returns Number of schedules removed
   */
  cleanupFinished(maxAgeMs: number = SCHEDULED_RUN_MAX_AGE_MS): number {
    const now = Date.now();
    let removed = 0;
    for (const [id, run] of this.runs) {
      if (run.status !== 'running' && now - (run.finishedAt ?? run.startedAt) > maxAgeMs) {
        this.runs.delete(id);
        this.controls.delete(id);
        removed++;
      }
    }
    return removed;
  }

  private trigger(id: string): void {
    this.executeIteration(id).catch((err: unknown) => {
      console.error(`[Scheduler] Iteration bookkeeping failed for ${id.slice(0, 8)}:`, err);
    });
  }

  private async executeIteration(id: string): Promise<void> {
    const run = this.runs.get(id);
    const control = this.controls.get(id);
    if (!run || !control || run.status !== 'running') return;
    control.timer = null;

    const attempt = run.completedRuns + run.failedRuns + 1;
    run.lastRunAt = Date.now();
    run.nextRunAt = null;
    this.addLog(run, `Run #${attempt} started`);

    try {
      const result = await control.job(run);
      run.completedRuns++;
      control.consecutiveFailures = 0;
      const cached = result.cacheHits > 0 ? `, ${result.cacheHits} cached` : '';
      this.addLog(run, `Run #${attempt} completed in ${result.durationMs}ms${cached}`);
      this.emit('iterationCompleted', run, result);
    } catch (err) {
      run.failedRuns++;
      control.consecutiveFailures++;
      this.addLog(run, `Run #${attempt} failed: ${getErrorMessage(err)}`);
      this.emit('iterationFailed', run, err);
      if (control.consecutiveFailures >= MAX_CONSECUTIVE_RUN_FAILURES && run.status === 'running') {
        this.finish(run, 'failed', `Giving up after ${control.consecutiveFailures} consecutive failures`);
        return;
      }
    }

    // stop() may have been called while the job was running
    if (run.status !== 'running') return;

    const attempts = run.completedRuns + run.failedRuns;
    if (run.maxRuns !== null && attempts >= run.maxRuns) {
      this.finish(run, 'completed', `Scheduled run completed after ${attempts} run(s)`);
      return;
    }

    const nextRunAt = Date.now() + run.intervalMs;
    if (run.endAt !== null && nextRunAt >= run.endAt) {
      this.finish(run, 'completed', `Scheduled run completed: duration reached after ${attempts} run(s)`);
      return;
    }

    run.nextRunAt = nextRunAt;
    control.timer = setTimeout(() => this.trigger(id), run.intervalMs);
  }

  private finish(run: ScheduledRun, status: Exclude<ScheduledRunStatus, 'running'>, message: string): void {
    const control = this.controls.get(run.id);
    if (control?.timer) {
      clearTimeout(control.timer);
      control.timer = null;
    }
    run.status = status;
    run.nextRunAt = null;
    run.finishedAt = Date.now();
    this.addLog(run, message);
    this.emit('runFinished', run);
  }

  private addLog(run: ScheduledRun, message: string): void {
    const line = `[${new Date().toISOString()}] ${message}`;
    run.logs.push(line);
    if (run.logs.length > MAX_RUN_LOG_LINES) {
      run.logs.splice(0, run.logs.length - MAX_RUN_LOG_LINES);
    }
    this.emit('log', run, line);
  }
}
