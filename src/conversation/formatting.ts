// src/conversation/formatting.ts
import { formatInTimeZone } from 'date-fns-tz';
import type { RequestableKind } from './tokens.js';

const DIVIDER = '━━━━━━━━━━━━━━━━━━━━';

const VARIANT_HEADERS: Record<RequestableKind, string> = {
  caption: '🎯 کپشن‌های پیشنهادی:',
  reels: '🎬 سناریوهای ریلز پیشنهادی:',
  visual: '📷 ایده‌های بصری پیشنهادی:',
  calendar: '📅 تقویم محتوایی پیشنهادی:',
};

const ITEM_LABELS: Record<RequestableKind, string> = {
  caption: 'کپشن',
  reels: 'سناریو',
  visual: 'ایده',
  calendar: 'هفته',
};

/**
 * One page of the scenario browser
 */
export function formatScenario(text: string, page: number, total: number): string {
  return `🎬 سناریو ${page} از ${total}\n${DIVIDER}\n\n${text}\n\n${DIVIDER}`;
}

/**
 * Numbered list of generated variants under a kind header
 */
export function formatVariants(kind: RequestableKind, variants: readonly string[]): string {
  if (variants.length === 1) {
    return `${VARIANT_HEADERS[kind]}\n\n${variants[0] ?? ''}`;
  }
  const items = variants.map((variant, i) => `${ITEM_LABELS[kind]} ${i + 1}:\n${variant}`);
  return `${VARIANT_HEADERS[kind]}\n\n${items.join('\n\n---\n\n')}`;
}

/**
 * Calendar date as yyyy/MM/dd in the configured zone
 */
export function formatDate(date: Date, timeZone: string): string {
  return formatInTimeZone(date, timeZone, 'yyyy/MM/dd');
}

/**
 * Toman amount with thousands separators
 */
export function formatToman(amount: number): string {
  return `${amount.toLocaleString('en-US')} تومان`;
}
