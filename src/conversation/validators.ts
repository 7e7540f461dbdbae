// src/conversation/validators.ts
import { NO_WORDS, YES_WORDS } from './tokens.js';

export type InvalidReason = 'empty' | 'too_long' | 'format';

export type Validated<T> = { ok: true; value: T } | { ok: false; reason: InvalidReason };

/**
 * Iranian mobile number: optional +98 / + / 0 / +0 prefix, then 9 and nine digits
 */
export const PHONE_PATTERN = /^(?:\+98|\+?0?)9\d{9}$/;

export const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

export const PAYMENT_REFERENCE_PATTERN = /^[A-Za-z0-9_-]{4,64}$/;

export const MAX_TEXT_LENGTH = 500;
export const MAX_NAME_LENGTH = 100;

const HANDLE_PREFIXES = ['https://www.instagram.com/', 'https://instagram.com/', 'https://t.me/'];

function invalid<T>(reason: InvalidReason): Validated<T> {
  return { ok: false, reason };
}

/**
 * Non-empty free text up to `max` characters
 */
export function validateRequiredText(input: string, max = MAX_TEXT_LENGTH): Validated<string> {
  const value = input.trim();
  if (!value) return invalid('empty');
  if (value.length > max) return invalid('too_long');
  return { ok: true, value };
}

export function validatePhone(input: string): Validated<string> {
  const value = input.trim();
  if (!value) return invalid('empty');
  return PHONE_PATTERN.test(value) ? { ok: true, value } : invalid('format');
}

export function validateEmail(input: string): Validated<string> {
  const value = input.trim();
  if (!value) return invalid('empty');
  return EMAIL_PATTERN.test(value) ? { ok: true, value } : invalid('format');
}

/**
 * Strip "@" and profile URL prefixes from a social handle
 */
export function cleanHandle(input: string): string {
  let value = input.trim();
  for (const prefix of HANDLE_PREFIXES) {
    value = value.split(prefix).join('');
  }
  return value.split('@').join('').trim();
}

export function validateHandle(input: string): Validated<string> {
  return validateRequiredText(cleanHandle(input), MAX_NAME_LENGTH);
}

/**
 * Yes/no answer, or null when the input is neither
 */
export function parseYesNo(input: string): boolean | null {
  const value = input.trim();
  if (YES_WORDS.includes(value)) return true;
  if (NO_WORDS.includes(value)) return false;
  return null;
}

export function validatePaymentReference(input: string): Validated<string> {
  const value = input.trim();
  if (!value) return invalid('empty');
  return PAYMENT_REFERENCE_PATTERN.test(value) ? { ok: true, value } : invalid('format');
}
