// src/db/referralDb.ts
import Database from 'better-sqlite3';
import { randomInt } from 'crypto';
import db from './db.js';

const REFERRAL_CHARSET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
export const REFERRAL_CODE_LENGTH = 8;
const MAX_ATTEMPTS = 10;

export type CodeGenerator = () => string;

/**
 * Random 8-character code of uppercase letters and digits
 */
export function generateReferralCode(): string {
  let code = '';
  for (let i = 0; i < REFERRAL_CODE_LENGTH; i++) {
    code += REFERRAL_CHARSET.charAt(randomInt(REFERRAL_CHARSET.length));
  }
  return code;
}

const findByCodeStmt = db.prepare<[string], { user_id: string }>(`
  SELECT user_id FROM users WHERE referral_code = ?
`);

const getCodeStmt = db.prepare<[string], { referral_code: string | null; referral_count: number }>(`
  SELECT referral_code, referral_count FROM users WHERE user_id = ?
`);

const assignCodeStmt = db.prepare<[string, string]>(`
  UPDATE users SET referral_code = ? WHERE user_id = ? AND referral_code IS NULL
`);

/**
 * Resolve a referral code to its owner
 */
export function findUserIdByReferralCode(code: string): string | null {
  const row = findByCodeStmt.get(code.trim().toUpperCase());
  return row?.user_id ?? null;
}

/**
 * Link a newly created user to the owner of `code` and bump the owner's count.
 * Unknown codes and self-referrals are ignored.
 *
 * @returns true if a referral was recorded
 */
export function recordReferral(newUserId: string, code: string, now: Date = new Date()): boolean {
  const referrerId = findUserIdByReferralCode(code);
  if (!referrerId || referrerId === newUserId) return false;

  const stamp = now.toISOString();
  const linked = db.prepare(`
    UPDATE users SET referred_by = ?, updated_at = ?
    WHERE user_id = ? AND referred_by IS NULL
  `).run(referrerId, stamp, newUserId);

  if (linked.changes === 0) return false;

  db.prepare(`
    UPDATE users SET referral_count = referral_count + 1, updated_at = ?
    WHERE user_id = ?
  `).run(stamp, referrerId);

  return true;
}

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Database.SqliteError && err.code === 'SQLITE_CONSTRAINT_UNIQUE';
}

/**
 * Return the user's referral code, generating it on first use.
 * A collision with another user's code re-rolls.
 */
export function ensureReferralCode(
  userId: string,
  generate: CodeGenerator = generateReferralCode
): string {
  for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
    const existing = getCodeStmt.get(userId);
    if (!existing) {
      throw new Error(`Cannot assign referral code: user ${userId} not found`);
    }
    if (existing.referral_code) return existing.referral_code;

    const candidate = generate();
    try {
      if (assignCodeStmt.run(candidate, userId).changes === 1) return candidate;
    } catch (err) {
      if (isUniqueViolation(err)) continue;
      throw err;
    }
  }

  throw new Error(`Could not generate a unique referral code after ${MAX_ATTEMPTS} attempts`);
}

/**
 * Number of users this user has referred
 */
export function getReferralCount(userId: string): number {
  return getCodeStmt.get(userId)?.referral_count ?? 0;
}
