// src/conversation/formatting.test.ts
import { describe, it, expect } from 'vitest';
import { formatDate, formatToman, formatVariants } from './formatting.js';

describe('formatting', () => {
  it('numbers several variants under the kind header', () => {
    expect(formatVariants('caption', ['یک', 'دو'])).toBe(
      '🎯 کپشن‌های پیشنهادی:\n\nکپشن 1:\nیک\n\n---\n\nکپشن 2:\nدو'
    );
  });

  it('shows a single variant without a number', () => {
    expect(formatVariants('calendar', ['هفته اول'])).toBe('📅 تقویم محتوایی پیشنهادی:\n\nهفته اول');
  });

  it('formats dates in the configured zone', () => {
    // 22:00 UTC is already the next day in Tehran
    expect(formatDate(new Date('2026-03-01T22:00:00.000Z'), 'Asia/Tehran')).toBe('2026/03/02');
    expect(formatDate(new Date('2026-03-01T22:00:00.000Z'), 'UTC')).toBe('2026/03/01');
  });

  it('groups toman amounts', () => {
    expect(formatToman(7_599_000)).toBe('7,599,000 تومان');
  });
});
