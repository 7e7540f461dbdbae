// src/db/subscriptionDb.ts

import { addDays, max } from 'date-fns';
import db from './db.js';
import { DAYS_PER_MONTH } from '../config/plans.js';
import { PersistenceError } from '../lib/errors.js';
import type {
  ExtendOutcome,
  Subscription,
  SubscriptionStatus,
} from '../types/subscription.js';

/**
 * Raw subscription row from database
 */
interface SubscriptionRow {
  user_id: string;
  status: SubscriptionStatus;
  started_at: string;
  expires_at: string;
  payment_amount: number;
  payment_reference: string | null;
  discount_percentage: number | null;
  discount_code: string | null;
  version: number;
  created_at: string;
  updated_at: string;
}

/**
 * Convert database row to Subscription object
 */
function rowToSubscription(row: SubscriptionRow): Subscription {
  return {
    userId: row.user_id,
    status: row.status,
    startedAt: new Date(row.started_at),
    expiresAt: new Date(row.expires_at),
    paymentAmount: row.payment_amount,
    paymentReference: row.payment_reference,
    discountPercentage: row.discount_percentage,
    discountCode: row.discount_code,
    version: row.version,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

const getStmt = db.prepare<[string], SubscriptionRow>(`
  SELECT * FROM subscriptions WHERE user_id = ?
`);

/**
 * Get subscription for a user
 *
 * @returns Subscription record or null if not found
 */
export function getSubscription(userId: string): Subscription | null {
  const row = getStmt.get(userId);
  return row ? rowToSubscription(row) : null;
}

/**
 * Create the signup trial: status=trial, expiry = now + trialDays.
 * A second call for the same user leaves the existing row alone.
 */
export function createTrial(userId: string, trialDays: number, now: Date = new Date()): Subscription {
  const stamp = now.toISOString();

  db.prepare(`
    INSERT INTO subscriptions (user_id, status, started_at, expires_at, created_at, updated_at)
    VALUES (?, 'trial', ?, ?, ?, ?)
    ON CONFLICT(user_id) DO NOTHING
  `).run(userId, stamp, addDays(now, trialDays).toISOString(), stamp, stamp);

  const created = getSubscription(userId);
  if (!created) {
    throw new PersistenceError(`Trial subscription was not stored for user ${userId}`);
  }
  return created;
}

/**
 * Active iff expiry is in the future and status is trial or active
 */
export function isActive(subscription: Subscription | null, now: Date = new Date()): boolean {
  if (!subscription) return false;
  if (subscription.status !== 'trial' && subscription.status !== 'active') return false;
  return subscription.expiresAt.getTime() > now.getTime();
}

/**
 * New expiry for a renewal: extend from the later of the current expiry and now,
 * so early renewals keep remaining time and late ones are never back-dated.
 */
export function computeExtendedExpiry(currentExpiry: Date, now: Date, months: number): Date {
  return addDays(max([currentExpiry, now]), DAYS_PER_MONTH * months);
}

/**
 * Extend a subscription after a payment.
 *
 * Runs as an IMMEDIATE transaction (write lock taken before the read), and the
 * UPDATE is conditional on the version that was read. A reference equal to the
 * last recorded one is a replay and changes nothing.
 */
export function extend(
  userId: string,
  paymentAmount: number,
  paymentReference: string,
  months: number,
  now: Date = new Date()
): ExtendOutcome {
  const run = db.transaction((): ExtendOutcome => {
    const row = getStmt.get(userId);
    if (!row) return { status: 'not_found' };

    const current = rowToSubscription(row);
    if (current.paymentReference === paymentReference) {
      return { status: 'duplicate', expiresAt: current.expiresAt };
    }

    const expiresAt = computeExtendedExpiry(current.expiresAt, now, months);
    const result = db.prepare(`
      UPDATE subscriptions
      SET status = 'active',
          expires_at = ?,
          payment_amount = ?,
          payment_reference = ?,
          version = version + 1,
          updated_at = ?
      WHERE user_id = ? AND version = ?
    `).run(
      expiresAt.toISOString(),
      paymentAmount,
      paymentReference,
      now.toISOString(),
      userId,
      current.version
    );

    if (result.changes !== 1) {
      throw new PersistenceError(`Subscription for ${userId} changed during extension`);
    }

    return { status: 'extended', expiresAt };
  });

  return run.immediate();
}

/**
 * Flip a lapsed trial/active subscription to expired
 *
 * @returns true if the row changed
 */
export function expireIfLapsed(userId: string, now: Date = new Date()): boolean {
  const result = db.prepare(`
    UPDATE subscriptions
    SET status = 'expired', updated_at = ?
    WHERE user_id = ? AND status IN ('trial', 'active') AND expires_at <= ?
  `).run(now.toISOString(), userId, now.toISOString());

  return result.changes > 0;
}

/**
 * Store a discount for the next payment calculation; expiry is untouched
 */
export function setDiscount(
  userId: string,
  code: string,
  percentage: number,
  now: Date = new Date()
): boolean {
  const result = db.prepare(`
    UPDATE subscriptions
    SET discount_code = ?, discount_percentage = ?, updated_at = ?
    WHERE user_id = ?
  `).run(code, percentage, now.toISOString(), userId);

  return result.changes > 0;
}

/**
 * Remove the attached discount once a payment has used it
 */
export function clearDiscount(userId: string, now: Date = new Date()): void {
  db.prepare(`
    UPDATE subscriptions
    SET discount_code = NULL, discount_percentage = NULL, updated_at = ?
    WHERE user_id = ?
  `).run(now.toISOString(), userId);
}
