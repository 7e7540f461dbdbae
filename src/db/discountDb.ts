// src/db/discountDb.ts
import db from './db.js';
import { setDiscount } from './subscriptionDb.js';
import { logger } from '../lib/logger.js';
import type { DiscountCode, NewDiscountCode } from '../types/discount.js';

/**
 * Raw discount code row from database
 */
interface DiscountCodeRow {
  code: string;
  discount_percentage: number;
  max_uses: number;
  current_uses: number;
  expires_at: string | null;
  is_active: number;
  created_at: string;
}

function rowToDiscountCode(row: DiscountCodeRow): DiscountCode {
  return {
    code: row.code,
    discountPercentage: row.discount_percentage,
    maxUses: row.max_uses,
    currentUses: row.current_uses,
    expiresAt: row.expires_at ? new Date(row.expires_at) : null,
    isActive: row.is_active === 1,
    createdAt: new Date(row.created_at),
  };
}

const getStmt = db.prepare<[string], DiscountCodeRow>(`
  SELECT * FROM discount_codes WHERE code = ?
`);

// Validity check and increment in one statement: a code with one use left
// can only be taken by one caller.
const redeemStmt = db.prepare<[string, string], DiscountCodeRow>(`
  UPDATE discount_codes
  SET current_uses = current_uses + 1
  WHERE code = ?
    AND is_active = 1
    AND current_uses < max_uses
    AND (expires_at IS NULL OR expires_at > ?)
  RETURNING *
`);

/**
 * Get a discount code (case-insensitive)
 */
export function getDiscountCode(code: string): DiscountCode | null {
  const row = getStmt.get(code.trim());
  return row ? rowToDiscountCode(row) : null;
}

/**
 * Valid iff active, uses remaining and not expired
 */
export function isCodeValid(discount: DiscountCode, now: Date = new Date()): boolean {
  if (!discount.isActive) return false;
  if (discount.currentUses >= discount.maxUses) return false;
  return discount.expiresAt === null || discount.expiresAt.getTime() > now.getTime();
}

/**
 * Issue a new discount code
 *
 * @throws if the code already exists or the numbers are out of range
 */
export function createDiscountCode(input: NewDiscountCode, now: Date = new Date()): DiscountCode {
  const code = input.code.trim();
  if (!/^[A-Za-z0-9_-]{3,32}$/.test(code)) {
    throw new Error('Discount code must be 3-32 letters, digits, "-" or "_"');
  }
  if (!(input.discountPercentage > 0 && input.discountPercentage <= 1)) {
    throw new Error('Discount percentage must be a fraction in (0, 1]');
  }
  if (!Number.isInteger(input.maxUses) || input.maxUses < 1) {
    throw new Error('Max uses must be a positive integer');
  }

  db.prepare(`
    INSERT INTO discount_codes (code, discount_percentage, max_uses, expires_at, created_at)
    VALUES (?, ?, ?, ?, ?)
  `).run(
    code,
    input.discountPercentage,
    input.maxUses,
    input.expiresAt?.toISOString() ?? null,
    now.toISOString()
  );

  const created = getDiscountCode(code);
  if (!created) {
    throw new Error(`Discount code ${code} missing after insert`);
  }
  return created;
}

/**
 * Redeem a code: on success its use count goes up by one.
 *
 * @returns the redeemed code, or null if invalid, exhausted or expired
 */
export function applyCode(code: string, userId: string, now: Date = new Date()): DiscountCode | null {
  const row = redeemStmt.get(code.trim(), now.toISOString());
  if (!row) {
    logger.info({ userId }, 'Discount code rejected');
    return null;
  }

  logger.info({ userId, code: row.code, uses: row.current_uses }, 'Discount code redeemed');
  return rowToDiscountCode(row);
}

/**
 * Store the code's percentage on the user's subscription for the next payment.
 * Expiry is not touched.
 */
export function attachDiscount(userId: string, discount: DiscountCode, now: Date = new Date()): boolean {
  return setDiscount(userId, discount.code, discount.discountPercentage, now);
}

/**
 * Redeem and attach as one unit of work
 */
export function redeemForUser(code: string, userId: string, now: Date = new Date()): DiscountCode | null {
  const run = db.transaction((): DiscountCode | null => {
    const discount = applyCode(code, userId, now);
    if (!discount) return null;
    attachDiscount(userId, discount, now);
    return discount;
  });
  return run();
}
