// src/services/textGenerator.ts
import { OpenAI } from 'openai';
import Anthropic from '@anthropic-ai/sdk';
import type { EnvConfig } from '../config/env.js';
import { ExternalServiceError, isAbortError } from '../lib/errors.js';

export interface CompletionOptions {
  signal?: AbortSignal;
}

/**
 * Single-shot text generation provider
 */
export interface TextGenerator {
  complete(systemPrompt: string, userPrompt: string, options?: CompletionOptions): Promise<string>;
}

export interface GeneratorSettings {
  apiKey: string;
  model: string;
  baseURL?: string;
  timeoutMs: number;
  maxRetries: number;
}

const TEMPERATURE = 0.8;
const MAX_TOKENS = 2000;

/**
 * Wrap provider failures; aborts pass through untouched so callers can tell
 * cancellation from failure.
 */
function toServiceError(err: unknown, signal: AbortSignal | undefined): unknown {
  if (err instanceof ExternalServiceError) return err;
  if (signal?.aborted || isAbortError(err)) return err;
  const reason = err instanceof Error ? err.message : String(err);
  return new ExternalServiceError(`Text generation failed: ${reason}`, 'generator', { cause: err });
}

/**
 * OpenAI-compatible chat completions (OpenAI, OpenRouter)
 */
export class OpenAiTextGenerator implements TextGenerator {
  private readonly client: OpenAI;

  constructor(private readonly settings: GeneratorSettings) {
    this.client = new OpenAI({
      apiKey: settings.apiKey,
      baseURL: settings.baseURL,
      timeout: settings.timeoutMs,
      maxRetries: settings.maxRetries,
    });
  }

  async complete(systemPrompt: string, userPrompt: string, options: CompletionOptions = {}): Promise<string> {
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.settings.model,
          messages: [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: userPrompt },
          ],
          temperature: TEMPERATURE,
          max_tokens: MAX_TOKENS,
        },
        { signal: options.signal }
      );

      const text = response.choices[0]?.message?.content?.trim() ?? '';
      if (!text) {
        throw new ExternalServiceError('Empty response from text generator', 'generator');
      }
      return text;
    } catch (err) {
      throw toServiceError(err, options.signal);
    }
  }
}

/**
 * Anthropic messages API
 */
export class AnthropicTextGenerator implements TextGenerator {
  private readonly client: Anthropic;

  constructor(private readonly settings: GeneratorSettings) {
    this.client = new Anthropic({
      apiKey: settings.apiKey,
      timeout: settings.timeoutMs,
      maxRetries: settings.maxRetries,
    });
  }

  async complete(systemPrompt: string, userPrompt: string, options: CompletionOptions = {}): Promise<string> {
    try {
      const response = await this.client.messages.create(
        {
          model: this.settings.model,
          max_tokens: MAX_TOKENS,
          temperature: TEMPERATURE,
          system: systemPrompt,
          messages: [{ role: 'user', content: userPrompt }],
        },
        { signal: options.signal }
      );

      const text = response.content
        .map((block) => (block.type === 'text' ? block.text : ''))
        .join('')
        .trim();
      if (!text) {
        throw new ExternalServiceError('Empty response from text generator', 'generator');
      }
      return text;
    } catch (err) {
      throw toServiceError(err, options.signal);
    }
  }
}

/**
 * Build the configured provider; timeout and retry budget go to the SDK client
 */
export function createTextGenerator(config: EnvConfig): TextGenerator {
  const settings: GeneratorSettings = {
    apiKey: config.AI_API_KEY,
    model: config.AI_MODEL,
    timeoutMs: config.AI_TIMEOUT_MS,
    maxRetries: config.AI_MAX_RETRIES,
  };

  if (config.AI_PROVIDER === 'anthropic') {
    return new AnthropicTextGenerator(settings);
  }
  return new OpenAiTextGenerator({ ...settings, baseURL: config.AI_BASE_URL });
}
