/**
 * @fileoverview Model backends that turn a param prompt into an answer.
 *
 * `OpenAIBackend` talks to the Chat Completions API through the official SDK.
 * Tests and callers that need another provider implement `CompletionBackend`.
 *
 * @module completion-backend
 */

import OpenAI from 'openai';
import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import { GenerationError } from './errors.js';
import { getErrorMessage } from './types.js';

export interface CompletionRequest {
  prompt: string;
  model: string;
  /** Omitted from the API call when null */
  temperature: number | null;
}

/**
 * Anything that can answer a single prompt.
 */
export interface CompletionBackend {
  complete(request: CompletionRequest): Promise<string>;
}

/**
 * The slice of the OpenAI client this module calls.
 */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): PromiseLike<ChatCompletion>;
    };
  };
}

export interface OpenAIBackendOptions {
  /** Defaults to the `OPENAI_API_KEY` environment variable */
  apiKey?: string;
  baseURL?: string;
  /** Injected client; when given, no API key is required */
  client?: ChatCompletionsClient;
}

export class OpenAIBackend implements CompletionBackend {
  private readonly options: OpenAIBackendOptions;
  private client: ChatCompletionsClient | null;

  constructor(options: OpenAIBackendOptions = {}) {
    this.options = options;
    this.client = options.client ?? null;
  }

  /**
   * Builds the SDK client on first use so commands that never call the model
   * do not need an API key.
   */
  private getClient(): ChatCompletionsClient {
    if (this.client) {
      return this.client;
    }
    const apiKey = this.options.apiKey ?? process.env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new GenerationError('OPENAI_API_KEY is not set; export it before generating');
    }
    this.client = new OpenAI({ apiKey, baseURL: this.options.baseURL });
    return this.client;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const client = this.getClient();

    const body: ChatCompletionCreateParamsNonStreaming = {
      model: request.model,
      messages: [{ role: 'user', content: request.prompt }],
    };
    if (request.temperature !== null) {
      body.temperature = request.temperature;
    }

    let response: ChatCompletion;
    try {
      response = await client.chat.completions.create(body);
    } catch (err) {
      throw new GenerationError(`OpenAI request failed: ${getErrorMessage(err)}`, { cause: err });
    }

    const choices = Array.isArray(response.choices) ? response.choices : [];
    if (choices.length === 0) {
      throw new GenerationError('OpenAI returned no choices');
    }

    const content = choices[0].message?.content;
    if (typeof content !== 'string') {
      throw new GenerationError('OpenAI returned an unexpected response shape');
    }
    return content.trim();
  }
}
