/**
 * @fileoverview End-to-end generation: read, validate, generate, render, write.
 *
 * `inspectProject` is the read-and-check half used by `promptcrafter inspect`;
 * `runGeneration` adds the model calls and the output file.
 *
 * @module pipeline
 */

import { dirname, resolve } from 'node:path';
import { loadConfig } from './config-loader.js';
import { loadTemplate, renderTemplate, validatePlaceholders } from './template.js';
import { PromptGenerator } from './generator.js';
import { OpenAIBackend, type CompletionBackend } from './completion-backend.js';
import { ResponseCache } from './response-cache.js';
import { resolveFrom, writeTextFile } from './io-helper.js';
import { DEFAULT_MODEL } from './config/generation-limits.js';
import type { GeneratedValues, GenerationResult, PromptConfig, TemplateInfo } from './types.js';

export interface ProjectPaths {
  configPath: string;
  templatePath: string;
}

export interface ProjectInspection {
  template: TemplateInfo;
  config: PromptConfig;
  /** Output file resolved against the config directory, or null */
  outputFile: string | null;
}

export type GenerationProgress =
  | { type: 'paramStarted'; name: string }
  | { type: 'paramCompleted'; name: string; value: string; fromCache: boolean };

export interface GenerationOptions extends ProjectPaths {
  /** Overrides the config output file; relative paths resolve against the working directory */
  outputFile?: string;
  model?: string;
  temperature?: number;
  /** Generate and render without writing the output file */
  dryRun?: boolean;
  /** Defaults to an OpenAIBackend reading OPENAI_API_KEY */
  backend?: CompletionBackend;
  /**
   * Cache to use. Omitted: built from the config's cache section.
   * null: no caching for this run.
   */
  cache?: ResponseCache | null;
  onProgress?: (event: GenerationProgress) => void;
}

/**
 * Loads the template and config and checks that their placeholders agree.
 */
export async function inspectProject(paths: ProjectPaths): Promise<ProjectInspection> {
  const template = await loadTemplate(paths.templatePath);
  const config = await loadConfig(paths.configPath);
  validatePlaceholders(template.placeholders, config.params);

  const configDir = dirname(resolve(paths.configPath));
  return {
    template,
    config,
    outputFile: config.outputFile ? resolveFrom(configDir, config.outputFile) : null,
  };
}

/**
 * Builds the response cache described by a config, loading any saved entries.
 * Returns null when caching is disabled.
 */
export function createCacheFromConfig(config: PromptConfig, configPath: string): ResponseCache | null {
  if (!config.cache.enabled) {
    return null;
  }
  const configDir = dirname(resolve(configPath));
  const cache = new ResponseCache({
    maxEntries: config.cache.maxEntries,
    filePath: config.cache.file ? resolveFrom(configDir, config.cache.file) : null,
  });
  cache.load();
  return cache;
}

/**
 * Runs a full generation and returns the rendered prompt.
 */
export async function runGeneration(options: GenerationOptions): Promise<GenerationResult> {
  const startedAt = Date.now();
  const { template, config, outputFile: configOutput } = await inspectProject(options);

  const model = options.model ?? config.modelName ?? DEFAULT_MODEL;
  const temperature = options.temperature ?? config.temperature;
  const cache = options.cache === undefined
    ? createCacheFromConfig(config, options.configPath)
    : options.cache;

  const generator = new PromptGenerator({
    backend: options.backend ?? new OpenAIBackend(),
    cache,
  });

  const { onProgress } = options;
  if (onProgress) {
    generator.on('paramStarted', (name: string) => onProgress({ type: 'paramStarted', name }));
    generator.on('paramCompleted', (name: string, value: string, fromCache: boolean) =>
      onProgress({ type: 'paramCompleted', name, value, fromCache }),
    );
  }

  let values: GeneratedValues;
  try {
    values = await generator.generateAll(config.params, model, temperature);
  } finally {
    // Answers received before a failure are kept for the next run
    if (cache) {
      await cache.save();
    }
  }
  const output = renderTemplate(template.content, values);

  const target = options.outputFile ? resolve(options.outputFile) : configOutput;
  let writtenTo: string | null = null;
  if (target && !options.dryRun) {
    await writeTextFile(target, output);
    writtenTo = target;
  }

  return {
    values,
    output,
    outputFile: writtenTo,
    model,
    temperature,
    cacheHits: generator.cacheHits,
    durationMs: Date.now() - startedAt,
  };
}
