/**
 * @fileoverview PromptCrafter CLI command definitions
 *
 * Defines the commands for inspecting a project, generating a prompt,
 * running generation on a schedule and viewing run history.
 *
 * @module cli
 */

import { resolve } from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { v4 as uuidv4 } from 'uuid';
import { inspectProject, runGeneration, createCacheFromConfig, type GenerationProgress } from './pipeline.js';
import { GenerationScheduler } from './scheduler.js';
import { getStore } from './state-store.js';
import { describeMismatch } from './template.js';
import { PlaceholderMismatchError } from './errors.js';
import type { ResponseCache } from './response-cache.js';
import {
  DEFAULT_CONFIG_FILE,
  DEFAULT_TEMPLATE_FILE,
  MAX_TEMPERATURE,
  MIN_TEMPERATURE,
} from './config/generation-limits.js';
import { getErrorMessage, type GenerationResult, type RunRecord, type ScheduledRun } from './types.js';

interface ProjectCommandOptions {
  config: string;
  template: string;
}

interface GenerateCommandOptions extends ProjectCommandOptions {
  output?: string;
  model?: string;
  temperature?: number;
  dryRun?: boolean;
  print?: boolean;
}

interface ScheduleCommandOptions extends ProjectCommandOptions {
  output?: string;
  model?: string;
  temperature?: number;
  every: number;
  runs?: number;
  duration?: number;
}

interface HistoryCommandOptions {
  limit: number;
  clear?: boolean;
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function parseTemperature(value: string): number {
  const parsed = parseNumber(value);
  if (parsed < MIN_TEMPERATURE || parsed > MAX_TEMPERATURE) {
    throw new InvalidArgumentError(`Must be between ${MIN_TEMPERATURE} and ${MAX_TEMPERATURE}.`);
  }
  return parsed;
}

function parseCount(value: string): number {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function truncate(text: string, max: number): string {
  const singleLine = text.replace(/\s+/g, ' ');
  return singleLine.length > max ? `${singleLine.slice(0, max)}...` : singleLine;
}

/** Prints an error, expanding placeholder mismatches into their two sides. */
function reportError(prefix: string, err: unknown): void {
  console.error(chalk.red(`✗ ${prefix}: ${getErrorMessage(err)}`));
  if (err instanceof PlaceholderMismatchError) {
    for (const line of describeMismatch(err)) {
      console.error(chalk.red(`  - ${line}`));
    }
  }
}

function printProgress(event: GenerationProgress): void {
  if (event.type === 'paramStarted') {
    console.log(chalk.cyan(`→ Generating ${event.name}...`));
  } else {
    const source = event.fromCache ? chalk.gray(' (cached)') : '';
    console.log(chalk.green(`✓ ${event.name}${source}: `) + truncate(event.value, 80));
  }
}

/**
 * Runs one generation and records it in the history, whether it succeeds or not.
 */
async function generateAndRecord(
  options: GenerateCommandOptions,
  extra: { scheduleId?: string; cache?: ResponseCache | null; quiet?: boolean } = {},
): Promise<GenerationResult> {
  const store = getStore();
  const configPath = resolve(options.config);
  const templatePath = resolve(options.template);
  store.setLastProject(configPath, templatePath);

  const startedAt = Date.now();
  const record: RunRecord = {
    id: uuidv4(),
    startedAt,
    finishedAt: startedAt,
    status: 'completed',
    model: options.model ?? null,
    outputFile: null,
    placeholders: [],
    cacheHits: 0,
    scheduleId: extra.scheduleId,
  };

  try {
    const result = await runGeneration({
      configPath,
      templatePath,
      outputFile: options.output,
      model: options.model,
      temperature: options.temperature,
      dryRun: options.dryRun,
      cache: extra.cache,
      onProgress: extra.quiet ? undefined : printProgress,
    });
    record.model = result.model;
    record.outputFile = result.outputFile;
    record.placeholders = Object.keys(result.values);
    record.cacheHits = result.cacheHits;
    return result;
  } catch (err) {
    record.status = 'failed';
    record.error = getErrorMessage(err);
    throw err;
  } finally {
    record.finishedAt = Date.now();
    store.addRun(record);
  }
}

function printSchedule(run: ScheduledRun): void {
  const statusColor =
    run.status === 'running' ? chalk.green :
    run.status === 'failed' ? chalk.red :
    run.status === 'stopped' ? chalk.yellow :
    chalk.gray;

  console.log(chalk.bold('\nSchedule Status:'));
  console.log(`  ID: ${run.id}`);
  console.log(`  Status: ${statusColor(run.status)}`);
  console.log(`  Interval: ${(run.intervalMs / 60000).toFixed(2)} minutes`);
  console.log(`  Completed runs: ${run.completedRuns}`);
  console.log(`  Failed runs: ${run.failedRuns}`);
  console.log('');
}

/**
 * Builds the command tree. A fresh program per call keeps option values
 * from leaking between parses.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('promptcrafter')
    .description('Fill prompt templates with model-generated values')
    .version('0.1.0');

  // ============ Inspect ============

  program
    .command('inspect')
    .alias('i')
    .description('Read the template and config and check that their placeholders match')
    .option('-c, --config <path>', 'Config file', DEFAULT_CONFIG_FILE)
    .option('-t, --template <path>', 'Template file', DEFAULT_TEMPLATE_FILE)
    .action(async (options: ProjectCommandOptions) => {
      try {
        const { template, config, outputFile } = await inspectProject({
          configPath: resolve(options.config),
          templatePath: resolve(options.template),
        });

        console.log(chalk.bold('\nTemplate placeholders:'));
        if (template.placeholders.length === 0) {
          console.log('  (none)');
        }
        for (const name of template.placeholders) {
          console.log(`  - ${name}`);
        }

        const model = config.modelName ?? chalk.gray('(not set)');
        const temperature = config.temperature !== null ? `, temperature ${config.temperature}` : '';
        console.log(chalk.bold(`\nModel: `) + `${model}${temperature}`);
        console.log(chalk.bold('Param prompts:'));
        for (const { name, prompt } of config.params) {
          console.log(`  - ${name}: ${prompt}`);
        }

        if (outputFile) {
          console.log(chalk.bold('\nOutput file: ') + outputFile);
        }
        if (config.cache.enabled) {
          console.log(chalk.bold('Cache: ') + (config.cache.file ?? 'memory only'));
        }

        console.log(chalk.green('\n✓ Ready to generate'));
      } catch (err) {
        reportError('Inspection failed', err);
        process.exitCode = 1;
      }
    });

  // ============ Generate ============

  program
    .command('generate')
    .alias('g')
    .description('Generate every param with the model and write the rendered prompt')
    .option('-c, --config <path>', 'Config file', DEFAULT_CONFIG_FILE)
    .option('-t, --template <path>', 'Template file', DEFAULT_TEMPLATE_FILE)
    .option('-o, --output <path>', 'Output file (overrides the config)')
    .option('-m, --model <name>', 'Model name (overrides the config)')
    .option('--temperature <value>', 'Sampling temperature (overrides the config)', parseTemperature)
    .option('--dry-run', 'Do not write the output file')
    .option('-p, --print', 'Print the rendered prompt')
    .action(async (options: GenerateCommandOptions) => {
      try {
        const result = await generateAndRecord(options);
        if (options.print || !result.outputFile) {
          console.log(chalk.bold('\nRendered prompt:'));
          console.log(result.output);
        }
        if (result.outputFile) {
          console.log(chalk.green(`\n✓ Prompt written to ${result.outputFile}`));
        } else if (options.dryRun) {
          console.log(chalk.yellow('\nDry run: output file not written'));
        }
        const cached = result.cacheHits > 0 ? `, ${result.cacheHits} from cache` : '';
        console.log(chalk.gray(`  Model ${result.model}, ${Object.keys(result.values).length} param(s)${cached}, ${result.durationMs}ms`));
      } catch (err) {
        reportError('Generation failed', err);
        process.exitCode = 1;
      } finally {
        getStore().flush();
      }
    });

  // ============ Schedule ============

  program
    .command('schedule')
    .alias('s')
    .description('Run generation repeatedly at a fixed interval')
    .option('-c, --config <path>', 'Config file', DEFAULT_CONFIG_FILE)
    .option('-t, --template <path>', 'Template file', DEFAULT_TEMPLATE_FILE)
    .option('-o, --output <path>', 'Output file (overrides the config)')
    .option('-m, --model <name>', 'Model name (overrides the config)')
    .option('--temperature <value>', 'Sampling temperature (overrides the config)', parseTemperature)
    .requiredOption('-e, --every <minutes>', 'Minutes between runs', parseNumber)
    .option('-n, --runs <count>', 'Stop after this many runs', parseCount)
    .option('-d, --duration <minutes>', 'Stop after this many minutes', parseNumber)
    .action(async (options: ScheduleCommandOptions) => {
      const scheduler = new GenerationScheduler();
      const store = getStore();

      try {
        // Check the project once up front so a broken setup fails fast
        const configPath = resolve(options.config);
        const { config } = await inspectProject({
          configPath,
          templatePath: resolve(options.template),
        });
        // One cache for the whole schedule keeps answers across runs
        const cache = createCacheFromConfig(config, configPath);

        scheduler.on('iterationCompleted', (run: ScheduledRun, result: GenerationResult) => {
          const where = result.outputFile ?? 'stdout';
          console.log(chalk.green(`✓ Run ${run.completedRuns + run.failedRuns} completed → ${where}`));
        });
        scheduler.on('iterationFailed', (run: ScheduledRun, error: unknown) => {
          console.log(chalk.red(`✗ Run ${run.completedRuns + run.failedRuns} failed: ${getErrorMessage(error)}`));
        });

        const run = scheduler.schedule({
          intervalMinutes: options.every,
          maxRuns: options.runs,
          durationMinutes: options.duration,
          job: (current) => generateAndRecord(options, { scheduleId: current.id, cache, quiet: true }),
        });

        console.log(chalk.green(`✓ Schedule started: ${run.id}`));
        console.log(`  Every ${options.every} minute(s)`);
        if (options.runs) console.log(`  Runs: ${options.runs}`);
        if (options.duration) console.log(`  Duration: ${options.duration} minute(s)`);
        console.log(chalk.gray('  Press Ctrl+C to stop\n'));

        const onSigint = (): void => {
          console.log(chalk.yellow('\nStopping schedule...'));
          scheduler.stopAll();
        };
        process.on('SIGINT', onSigint);

        const finished = await scheduler.waitForFinish(run.id);
        process.off('SIGINT', onSigint);
        printSchedule(finished);
        if (finished.status === 'failed') {
          process.exitCode = 1;
        }
      } catch (err) {
        reportError('Schedule failed', err);
        process.exitCode = 1;
      } finally {
        store.flush();
      }
    });

  // ============ History ============

  program
    .command('history')
    .alias('h')
    .description('Show recent generation runs')
    .option('-n, --limit <count>', 'Number of runs to show', parseCount, 20)
    .option('--clear', 'Delete the run history')
    .action((options: HistoryCommandOptions) => {
      const store = getStore();

      if (options.clear) {
        const count = store.clearRuns();
        store.flush();
        console.log(chalk.green(`✓ Cleared ${count} run(s)`));
        return;
      }

      const runs = store.getRuns(options.limit);
      if (runs.length === 0) {
        console.log(chalk.yellow('No runs recorded'));
        return;
      }

      console.log(chalk.bold('\nRecent runs:'));
      for (const run of runs) {
        const status = run.status === 'completed' ? chalk.green(run.status.padEnd(10)) : chalk.red(run.status.padEnd(10));
        const when = new Date(run.startedAt).toISOString();
        const target = run.error ? chalk.red(truncate(run.error, 60)) : (run.outputFile ?? chalk.gray('(not written)'));
        const scheduled = run.scheduleId ? chalk.gray(' [scheduled]') : '';
        console.log(`  ${chalk.cyan(run.id.slice(0, 8))} ${status} ${when} ${run.model ?? '-'} ${target}${scheduled}`);
      }
      console.log('');
    });

  return program;
}

const program = createProgram();

export { program };
