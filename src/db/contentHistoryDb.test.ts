// src/db/contentHistoryDb.test.ts
import { describe, it, expect, beforeEach, vi } from 'vitest';

vi.mock('./db.js', async () => {
  const { openDatabase } = await import('./schema.js');
  return { default: openDatabase(':memory:') };
});

import { countRecentContent, listContentHistory, saveContentHistory } from './contentHistoryDb.js';
import { getPromptUsage, recordPromptUsage } from './promptHistoryDb.js';
import { createUser } from './userDb.js';
import db from './db.js';

const NOW = new Date('2026-06-01T12:00:00.000Z');

describe('contentHistoryDb', () => {
  beforeEach(() => {
    db.exec('DELETE FROM users');
    createUser({ userId: 'tg-100' }, { trialDays: 30, now: NOW });
  });

  it('lists entries newest first', () => {
    saveContentHistory('tg-100', 'caption', 'انگشتر', 'کپشن 1', new Date('2026-05-01T10:00:00.000Z'));
    saveContentHistory('tg-100', 'reels', 'دستبند', 'سناریو 1', new Date('2026-05-02T10:00:00.000Z'));

    const entries = listContentHistory('tg-100');

    expect(entries.map((entry) => entry.contentType)).toEqual(['reels', 'caption']);
    expect(entries[0]?.prompt).toBe('دستبند');
    expect(entries[0]?.generatedContent).toBe('سناریو 1');
    expect(listContentHistory('tg-100', 1)).toHaveLength(1);
  });

  it('counts only the last 30 days', () => {
    saveContentHistory('tg-100', 'caption', 'a', 'x', new Date('2026-04-01T12:00:00.000Z'));
    saveContentHistory('tg-100', 'caption', 'b', 'y', new Date('2026-05-02T12:00:00.000Z'));
    saveContentHistory('tg-100', 'visual', 'c', 'z', new Date('2026-05-31T12:00:00.000Z'));

    expect(countRecentContent('tg-100', 30, NOW)).toBe(2);
    expect(countRecentContent('tg-100', 90, NOW)).toBe(3);
  });

  it('rejects an unknown content type', () => {
    expect(() =>
      db.prepare(`
        INSERT INTO content_history (user_id, content_type, prompt, generated_content, created_at)
        VALUES ('tg-100', 'poem', 'p', 'g', '2026-06-01T12:00:00.000Z')
      `).run()
    ).toThrow();
  });
});

describe('promptHistoryDb', () => {
  beforeEach(() => {
    db.exec('DELETE FROM users');
    createUser({ userId: 'tg-100' }, { trialDays: 30, now: NOW });
  });

  it('inserts on first use and increments afterwards', () => {
    recordPromptUsage('tg-100', 'caption_generation', 'system 1', 'user 1', NOW);
    recordPromptUsage('tg-100', 'caption_generation', 'system 2', 'user 2', new Date('2026-06-02T12:00:00.000Z'));

    const usage = getPromptUsage('tg-100', 'caption_generation');
    expect(usage?.usageCount).toBe(2);
    expect(usage?.lastSystemPrompt).toBe('system 2');
    expect(usage?.lastUserPrompt).toBe('user 2');
    expect(usage?.updatedAt.toISOString()).toBe('2026-06-02T12:00:00.000Z');
  });

  it('keeps prompt names apart', () => {
    recordPromptUsage('tg-100', 'caption_generation', 's', 'u', NOW);
    recordPromptUsage('tg-100', 'onboarding_scenarios', 's', 'u', NOW);

    expect(getPromptUsage('tg-100', 'caption_generation')?.usageCount).toBe(1);
    expect(getPromptUsage('tg-100', 'onboarding_scenarios')?.usageCount).toBe(1);
    expect(getPromptUsage('tg-100', 'visual_ideas')).toBeNull();
  });
});
