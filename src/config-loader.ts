/**
 * @fileoverview Loads and normalizes the YAML project configuration.
 *
 * Accepted layout (both the flat and the nested spellings are read):
 *
 * ```yaml
 * model:
 *   name: gpt-4o-mini      # or top-level `openai_model`
 *   temperature: 0.7       # or top-level `temperature`
 * params:
 *   - name: topic
 *     prompt: Suggest a topic for a short story.
 * output:
 *   directory: output      # or top-level `output_file`
 *   filename: result.txt
 * cache:
 *   enabled: true
 *   file: .cache/responses.json
 *   max_entries: 500
 * ```
 *
 * @module config-loader
 */

import { join } from 'node:path';
import { parse, YAMLParseError } from 'yaml';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { isMissingFileError, readTextFile } from './io-helper.js';
import { DEFAULT_CACHE_MAX_ENTRIES, MAX_TEMPERATURE, MIN_TEMPERATURE } from './config/generation-limits.js';
import { getErrorMessage, type CacheSettings, type ParamSpec, type PromptConfig } from './types.js';

const TemperatureSchema = z.number().min(MIN_TEMPERATURE).max(MAX_TEMPERATURE).nullish();

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** `model:` and `output:` sections that are not mappings are ignored. */
function optionalSection<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (isMapping(value) ? value : undefined), schema.optional());
}

export const RawConfigSchema = z.object({
  openai_model: z.string().nullish(),
  temperature: TemperatureSchema,
  model: optionalSection(
    z.object({
      name: z.string().nullish(),
      temperature: TemperatureSchema,
    }),
  ),
  params: z.unknown(),
  output_file: z.string().nullish(),
  output: optionalSection(
    z.object({
      directory: z.string().nullish(),
      filename: z.string().nullish(),
    }),
  ),
  cache: z
    .object({
      enabled: z.boolean().default(false),
      file: z.string().min(1).nullish(),
      max_entries: z.number().int().positive().nullish(),
    })
    .nullish(),
});

export type RawConfig = z.infer<typeof RawConfigSchema>;

/**
 * Reads a config file and returns the normalized configuration.
 *
 * @throws ConfigError when the file is missing, is not valid YAML, or does
 *   not match the expected layout
 */
export async function loadConfig(configPath: string): Promise<PromptConfig> {
  let text: string;
  try {
    text = await readTextFile(configPath);
  } catch (err) {
    if (isMissingFileError(err)) {
      throw new ConfigError('CONFIG_NOT_FOUND', `Config file not found: ${configPath}`, { cause: err });
    }
    throw new ConfigError('CONFIG_INVALID', `Failed to read config file ${configPath}: ${getErrorMessage(err)}`, { cause: err });
  }

  let data: unknown;
  try {
    data = parse(text);
  } catch (err) {
    if (err instanceof YAMLParseError) {
      throw new ConfigError('CONFIG_INVALID', `Invalid YAML in ${configPath}: ${err.message}`, { cause: err });
    }
    throw err;
  }

  return normalizeConfig(data ?? {}, configPath);
}

/**
 * Validates already-parsed config data.
 * Exposed separately so callers holding an object need not go through a file.
 */
export function normalizeConfig(data: unknown, source = '<inline>'): PromptConfig {
  if (!isMapping(data)) {
    throw new ConfigError('CONFIG_INVALID', `Config root in ${source} must be a mapping`);
  }

  const result = RawConfigSchema.safeParse(data);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError('CONFIG_INVALID', `Invalid config in ${source}: ${details}`);
  }
  const raw = result.data;

  return {
    // An empty model name counts as unset
    modelName: raw.openai_model || raw.model?.name || null,
    temperature: raw.temperature ?? raw.model?.temperature ?? null,
    params: normalizeParams(raw.params),
    outputFile: resolveOutputFile(raw),
    cache: normalizeCache(raw),
  };
}

/**
 * Turns the `params` list into ordered, de-duplicated entries.
 * A repeated name keeps the position of its first entry and the prompt of its last.
 */
function normalizeParams(value: unknown): ParamSpec[] {
  if (!Array.isArray(value)) {
    throw new ConfigError('CONFIG_INVALID', 'params must be a list of {name, prompt} entries');
  }

  const prompts = new Map<string, string>();
  value.forEach((item: unknown, index) => {
    const position = index + 1;
    if (!isMapping(item)) {
      throw new ConfigError('CONFIG_INVALID', `params entry #${position} must be a mapping`);
    }
    const { name, prompt } = item;
    if (typeof name !== 'string' || name === '' || typeof prompt !== 'string' || prompt === '') {
      throw new ConfigError('CONFIG_INVALID', `params entry #${position} is missing name or prompt`);
    }
    prompts.set(name, prompt);
  });
  return Array.from(prompts, ([name, prompt]) => ({ name, prompt }));
}

function resolveOutputFile(raw: RawConfig): string | null {
  if (raw.output_file) {
    return raw.output_file;
  }
  const directory = raw.output?.directory;
  const filename = raw.output?.filename;
  if (directory && filename) {
    return join(directory, filename);
  }
  return null;
}

function normalizeCache(raw: RawConfig): CacheSettings {
  return {
    enabled: raw.cache?.enabled ?? false,
    file: raw.cache?.file ?? null,
    maxEntries: raw.cache?.max_entries ?? DEFAULT_CACHE_MAX_ENTRIES,
  };
}
