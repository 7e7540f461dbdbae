// src/services/contentGenerator.test.ts
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { pino } from 'pino';

vi.mock('../db/db.js', async () => {
  const { openDatabase } = await import('../db/schema.js');
  return { default: openDatabase(':memory:') };
});

import { CANCELLED_MESSAGE, ContentGenerator, FAILURE_MESSAGES, HISTORY_SEPARATOR } from './contentGenerator.js';
import type { TextGenerator } from './textGenerator.js';
import { createUser } from '../db/userDb.js';
import { ensureProfile } from '../db/profileDb.js';
import { listContentHistory } from '../db/contentHistoryDb.js';
import { getPromptUsage } from '../db/promptHistoryDb.js';
import db from '../db/db.js';
import type { Profile } from '../types/user.js';

const NOW = new Date('2026-06-01T12:00:00.000Z');
const silent = pino({ level: 'silent' });

function fakeGenerator(impl: TextGenerator['complete']) {
  const complete = vi.fn(impl);
  const generator: TextGenerator = { complete };
  return { generator, complete };
}

describe('ContentGenerator', () => {
  let profile: Profile;

  beforeEach(() => {
    db.exec('DELETE FROM users');
    createUser({ userId: 'tg-100' }, { trialDays: 30, now: NOW });
    profile = ensureProfile('tg-100', NOW);
  });

  it('splits labelled variants and logs the generation', async () => {
    const { generator, complete } = fakeGenerator(async () => 'کپشن 1: الف\nکپشن 2: ب\nکپشن 3: ج');
    const content = new ContentGenerator(generator, silent);

    const result = await content.generate('caption', ' انگشتر ', profile, { userId: 'tg-100', now: NOW });

    expect(result).toEqual({ status: 'ok', variants: ['کپشن 1: الف', 'کپشن 2: ب', 'کپشن 3: ج'] });
    expect(complete).toHaveBeenCalledTimes(1);
    expect(complete.mock.calls[0]?.[1]).toBe('محصول: انگشتر\n\nکپشن‌ها را برای این محصول بنویس.');

    const [entry] = listContentHistory('tg-100');
    expect(entry?.contentType).toBe('caption');
    expect(entry?.prompt).toBe('انگشتر');
    expect(entry?.generatedContent).toBe(['کپشن 1: الف', 'کپشن 2: ب', 'کپشن 3: ج'].join(HISTORY_SEPARATOR));
    expect(getPromptUsage('tg-100', 'caption_generation')?.usageCount).toBe(1);
  });

  it('returns the kind failure message and stores no history', async () => {
    const { generator } = fakeGenerator(async () => {
      throw new Error('upstream 500');
    });
    const content = new ContentGenerator(generator, silent);

    const result = await content.generate('visual', 'گردنبند', profile, { userId: 'tg-100', now: NOW });

    expect(result).toEqual({ status: 'failed', variants: [FAILURE_MESSAGES.visual] });
    expect(listContentHistory('tg-100')).toEqual([]);
    expect(getPromptUsage('tg-100', 'visual_ideas')?.usageCount).toBe(1);
  });

  it('does not call the generator when already aborted', async () => {
    const { generator, complete } = fakeGenerator(async () => 'unused');
    const content = new ContentGenerator(generator, silent);
    const controller = new AbortController();
    controller.abort();

    const result = await content.generate('reels', 'عید', profile, {
      userId: 'tg-100',
      signal: controller.signal,
      now: NOW,
    });

    expect(result).toEqual({ status: 'cancelled', variants: [CANCELLED_MESSAGE] });
    expect(complete).not.toHaveBeenCalled();
  });

  it('treats an abort error from the provider as cancellation', async () => {
    const { generator } = fakeGenerator(async () => {
      const err = new Error('aborted');
      err.name = 'AbortError';
      throw err;
    });
    const content = new ContentGenerator(generator, silent);

    const result = await content.generate('reels', 'عید', profile, { userId: 'tg-100', now: NOW });

    expect(result.status).toBe('cancelled');
    expect(listContentHistory('tg-100')).toEqual([]);
  });

  it('discards a reply that arrives after the event was superseded', async () => {
    const controller = new AbortController();
    const { generator } = fakeGenerator(async () => {
      controller.abort();
      return 'سناریو 1: الف\nسناریو 2: ب\nسناریو 3: ج';
    });
    const content = new ContentGenerator(generator, silent);

    const result = await content.generate('reels', 'عید', profile, {
      userId: 'tg-100',
      signal: controller.signal,
      now: NOW,
    });

    expect(result.status).toBe('cancelled');
    expect(listContentHistory('tg-100')).toEqual([]);
  });

  it('returns the summary as a single variant', async () => {
    const { generator } = fakeGenerator(async () => '  گالری شما در مسیر خوبی است.\n\nفرصت‌ها زیاد است.  ');
    const content = new ContentGenerator(generator, silent);

    const result = await content.generate('summary', '', profile, { userId: 'tg-100', now: NOW });

    expect(result.variants).toEqual(['گالری شما در مسیر خوبی است.\n\nفرصت‌ها زیاد است.']);
    expect(listContentHistory('tg-100')[0]?.prompt).toBe('situation_summary');
  });

  it('stores the prompt name for a calendar without focus', async () => {
    const { generator } = fakeGenerator(async () => 'هفته 1: پست\n\nهفته 2: ریلز');
    const content = new ContentGenerator(generator, silent);

    const result = await content.generate('calendar', '', profile, { userId: 'tg-100', now: NOW });

    expect(result.variants).toEqual(['هفته 1: پست', 'هفته 2: ریلز']);
    expect(listContentHistory('tg-100')[0]?.prompt).toBe('content_calendar');
  });

  it('honours a custom count and prompt name', async () => {
    const { generator } = fakeGenerator(async () => 'سناریو 1: الف\nسناریو 2: ب\nسناریو 3: ج\nسناریو 4: د');
    const content = new ContentGenerator(generator, silent);

    const result = await content.generate('reels', 'افتتاحیه', profile, {
      userId: 'tg-100',
      count: 2,
      promptName: 'onboarding_scenarios',
      now: NOW,
    });

    expect(result.variants).toEqual(['سناریو 1: الف', 'سناریو 2: ب']);
    expect(getPromptUsage('tg-100', 'onboarding_scenarios')?.usageCount).toBe(1);
    expect(getPromptUsage('tg-100', 'reels_scenario')).toBeNull();
  });
});
