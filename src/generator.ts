/**
 * @fileoverview Generates a value for every template param by asking a model.
 *
 * Params are answered one at a time in config order. Answers already in the
 * response cache are reused without a model call.
 *
 * @module generator
 */

import { EventEmitter } from 'node:events';
import type { CompletionBackend } from './completion-backend.js';
import type { ResponseCache } from './response-cache.js';
import { GenerationError } from './errors.js';
import type { GeneratedValues, ParamSpec } from './types.js';

/**
 * Events emitted by PromptGenerator
 */
export interface PromptGeneratorEvents {
  /** Fired before a param is generated */
  paramStarted: (name: string) => void;
  /** Fired once a param has a value */
  paramCompleted: (name: string, value: string, fromCache: boolean) => void;
}

export interface PromptGeneratorOptions {
  backend: CompletionBackend;
  cache?: ResponseCache | null;
}

/**
 * Sequential param generator.
 *
 * @extends EventEmitter
 * @see PromptGeneratorEvents
 */
export class PromptGenerator extends EventEmitter {
  private readonly backend: CompletionBackend;
  private readonly cache: ResponseCache | null;
  private _cacheHits = 0;

  constructor(options: PromptGeneratorOptions) {
    super();
    this.backend = options.backend;
    this.cache = options.cache ?? null;
  }

  /** Params answered from the cache during the last generateAll() call. */
  get cacheHits(): number {
    return this._cacheHits;
  }

  /**
   * Generates the value of a single param.
   *
   * @throws GenerationError for an empty prompt or a failed model call
   */
  async generateParam(promptText: string, model: string, temperature: number | null): Promise<string> {
    return (await this.resolveParam(promptText, model, temperature)).value;
  }

  /**
   * Generates every param in order. The first failure aborts the run.
   *
   * @param params - Param entries in order, or a name → prompt map
   */
  async generateAll(
    params: ParamSpec[] | Record<string, string>,
    model: string,
    temperature: number | null,
  ): Promise<GeneratedValues> {
    const entries: ParamSpec[] = Array.isArray(params)
      ? [...params]
      : Object.entries(params).map(([name, prompt]) => ({ name, prompt }));

    this._cacheHits = 0;
    const results: Array<[string, string]> = [];

    for (const { name, prompt } of entries) {
      if (!name || !prompt) {
        throw new GenerationError('Param entry is missing name or prompt');
      }

      this.emit('paramStarted', name);
      const { value, fromCache } = await this.resolveParam(prompt, model, temperature);
      if (fromCache) {
        this._cacheHits++;
      }
      results.push([name, value]);
      this.emit('paramCompleted', name, value, fromCache);
    }

    // Own data properties, `__proto__` included
    return Object.fromEntries(results);
  }

  private async resolveParam(
    promptText: string,
    model: string,
    temperature: number | null,
  ): Promise<{ value: string; fromCache: boolean }> {
    if (!promptText) {
      throw new GenerationError('Prompt text must not be empty');
    }

    const cached = this.cache?.get(model, temperature, promptText);
    if (cached !== undefined) {
      return { value: cached, fromCache: true };
    }

    const value = await this.backend.complete({ prompt: promptText, model, temperature });
    this.cache?.set(model, temperature, promptText, value);
    return { value, fromCache: false };
  }
}
