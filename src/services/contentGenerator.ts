// src/services/contentGenerator.ts
import type { Logger } from 'pino';
import { buildPrompt } from '../prompts/contentPrompts.js';
import { parseVariants } from '../parsers/variantParser.js';
import { recordPromptUsage } from '../db/promptHistoryDb.js';
import { saveContentHistory } from '../db/contentHistoryDb.js';
import { logger as rootLogger } from '../lib/logger.js';
import { isAbortError } from '../lib/errors.js';
import type { TextGenerator } from './textGenerator.js';
import type { ContentKind, GenerationResult } from '../types/content.js';
import type { Profile } from '../types/user.js';

/**
 * Separator between variants in a stored history entry
 */
export const HISTORY_SEPARATOR = '\n\n---\n\n';

export const DEFAULT_VARIANT_COUNT = 3;

export const FAILURE_MESSAGES: Record<ContentKind, string> = {
  caption: 'خطا در تولید کپشن. لطفاً دوباره تلاش کنید.',
  reels: 'خطا در تولید سناریو ریلز. لطفاً دوباره تلاش کنید.',
  visual: 'خطا در تولید ایده بصری. لطفاً دوباره تلاش کنید.',
  calendar: 'خطا در تولید تقویم محتوایی. لطفاً دوباره تلاش کنید.',
  summary: 'خطا در تولید خلاصه. لطفاً دوباره تلاش کنید.',
};

export const CANCELLED_MESSAGE = 'درخواست قبلی با پیام جدید شما جایگزین شد.';

export interface GenerateOptions {
  userId: string;
  signal?: AbortSignal;
  count?: number;
  /** Analytics name; defaults to the kind's prompt name */
  promptName?: string;
  now?: Date;
}

/**
 * Content generation orchestrator.
 *
 * Builds the prompt for a kind, calls the text generator, splits the reply into
 * variants and logs the result. Never throws: failures come back as a
 * 'failed' or 'cancelled' result holding one user-facing message.
 */
export class ContentGenerator {
  private readonly log: Logger;

  constructor(
    private readonly generator: TextGenerator,
    log: Logger = rootLogger
  ) {
    this.log = log.child({ module: 'contentGenerator' });
  }

  async generate(
    kind: ContentKind,
    userInput: string,
    profile: Profile,
    options: GenerateOptions
  ): Promise<GenerationResult> {
    const { userId, signal } = options;
    const count = kind === 'summary' ? 1 : Math.max(1, options.count ?? DEFAULT_VARIANT_COUNT);
    const now = options.now ?? new Date();
    const prompt = buildPrompt(kind, userInput, profile, count);
    const promptName = options.promptName ?? prompt.name;

    if (signal?.aborted) {
      return { status: 'cancelled', variants: [CANCELLED_MESSAGE] };
    }

    try {
      recordPromptUsage(userId, promptName, prompt.systemPrompt, prompt.userPrompt, now);
    } catch (err) {
      this.log.warn({ err, userId, promptName }, 'Failed to record prompt usage');
    }

    let reply: string;
    try {
      reply = await this.generator.complete(prompt.systemPrompt, prompt.userPrompt, { signal });
    } catch (err) {
      if (signal?.aborted || isAbortError(err)) {
        this.log.info({ userId, kind }, 'Generation cancelled');
        return { status: 'cancelled', variants: [CANCELLED_MESSAGE] };
      }
      this.log.error({ err, userId, kind }, 'Content generation failed');
      return { status: 'failed', variants: [FAILURE_MESSAGES[kind]] };
    }

    if (signal?.aborted) {
      return { status: 'cancelled', variants: [CANCELLED_MESSAGE] };
    }

    const variants = kind === 'summary' ? [reply.trim()] : parseVariants(reply, count, prompt.labelPattern);

    try {
      saveContentHistory(userId, kind, userInput.trim() || promptName, variants.join(HISTORY_SEPARATOR), now);
    } catch (err) {
      this.log.error({ err, userId, kind }, 'Failed to save content history');
    }

    this.log.debug({ userId, kind, variants: variants.length }, 'Content generated');
    return { status: 'ok', variants };
  }
}
