// src/db/subscriptionDb.test.ts
import { describe, it, expect, beforeEach, vi } from 'vitest';

// Mock the db import with an in-memory database
vi.mock('./db.js', async () => {
  const { openDatabase } = await import('./schema.js');
  return { default: openDatabase(':memory:') };
});

// Import functions after mocking
import {
  clearDiscount,
  computeExtendedExpiry,
  createTrial,
  expireIfLapsed,
  extend,
  getSubscription,
  isActive,
  setDiscount,
} from './subscriptionDb.js';
import { createUser } from './userDb.js';
import db from './db.js';

const SIGNUP = new Date('2026-06-01T12:00:00.000Z');
const TRIAL_END = '2026-07-01T12:00:00.000Z';

describe('subscriptionDb', () => {
  beforeEach(() => {
    db.exec('DELETE FROM users');
    createUser({ userId: 'owner-1' }, { trialDays: 30, now: SIGNUP });
  });

  describe('createTrial', () => {
    it('grants a trial of trialDays from signup', () => {
      const sub = getSubscription('owner-1');

      expect(sub?.status).toBe('trial');
      expect(sub?.expiresAt.toISOString()).toBe(TRIAL_END);
      expect(sub?.version).toBe(0);
    });

    it('leaves an existing subscription alone', () => {
      const again = createTrial('owner-1', 90, new Date('2026-06-20T12:00:00.000Z'));

      expect(again.expiresAt.toISOString()).toBe(TRIAL_END);
    });
  });

  describe('isActive', () => {
    it('is true strictly before expiry', () => {
      const sub = getSubscription('owner-1');

      expect(isActive(sub, new Date('2026-07-01T11:59:59.000Z'))).toBe(true);
      expect(isActive(sub, new Date(TRIAL_END))).toBe(false);
    });

    it('is false for expired status and missing subscriptions', () => {
      db.prepare("UPDATE subscriptions SET status = 'expired' WHERE user_id = ?").run('owner-1');

      expect(isActive(getSubscription('owner-1'), SIGNUP)).toBe(false);
      expect(isActive(null, SIGNUP)).toBe(false);
    });
  });

  describe('computeExtendedExpiry', () => {
    it('extends from the current expiry when it is later than now', () => {
      const expiry = new Date('2026-07-01T12:00:00.000Z');
      const now = new Date('2026-06-26T12:00:00.000Z');

      expect(computeExtendedExpiry(expiry, now, 1).toISOString()).toBe('2026-07-31T12:00:00.000Z');
    });

    it('extends from now when the subscription has lapsed', () => {
      const expiry = new Date('2026-07-01T12:00:00.000Z');
      const now = new Date('2026-07-11T12:00:00.000Z');

      expect(computeExtendedExpiry(expiry, now, 1).toISOString()).toBe('2026-08-10T12:00:00.000Z');
    });
  });

  describe('extend', () => {
    it('keeps remaining time when renewing early', () => {
      const outcome = extend('owner-1', 980000, 'REF-0001', 1, new Date('2026-06-26T12:00:00.000Z'));

      expect(outcome).toEqual({ status: 'extended', expiresAt: new Date('2026-07-31T12:00:00.000Z') });
      const sub = getSubscription('owner-1');
      expect(sub?.status).toBe('active');
      expect(sub?.paymentAmount).toBe(980000);
      expect(sub?.paymentReference).toBe('REF-0001');
      expect(sub?.version).toBe(1);
    });

    it('never back-dates a late renewal', () => {
      extend('owner-1', 980000, 'REF-0001', 1, new Date('2026-07-11T12:00:00.000Z'));

      expect(getSubscription('owner-1')?.expiresAt.toISOString()).toBe('2026-08-10T12:00:00.000Z');
    });

    it('treats a repeated payment reference as a duplicate', () => {
      const now = new Date('2026-06-26T12:00:00.000Z');
      extend('owner-1', 980000, 'REF-0001', 1, now);

      const replay = extend('owner-1', 980000, 'REF-0001', 1, now);

      expect(replay).toEqual({ status: 'duplicate', expiresAt: new Date('2026-07-31T12:00:00.000Z') });
      expect(getSubscription('owner-1')?.version).toBe(1);
    });

    it('applies two concurrent extensions one after the other', async () => {
      const now = new Date('2026-06-26T12:00:00.000Z');

      const outcomes = await Promise.all([
        Promise.resolve().then(() => extend('owner-1', 980000, 'REF-A', 1, now)),
        Promise.resolve().then(() => extend('owner-1', 980000, 'REF-B', 1, now)),
      ]);

      expect(outcomes.map((outcome) => outcome.status)).toEqual(['extended', 'extended']);
      const sub = getSubscription('owner-1');
      expect(sub?.expiresAt.toISOString()).toBe('2026-08-30T12:00:00.000Z');
      expect(sub?.version).toBe(2);
    });

    it('adds ninety days for a three-month plan', () => {
      extend('owner-1', 7599000, 'REF-S', 3, new Date('2026-06-26T12:00:00.000Z'));

      expect(getSubscription('owner-1')?.expiresAt.toISOString()).toBe('2026-09-29T12:00:00.000Z');
    });

    it('reports a missing subscription', () => {
      expect(extend('nobody', 980000, 'REF-0001', 1, SIGNUP)).toEqual({ status: 'not_found' });
    });
  });

  describe('expireIfLapsed', () => {
    it('flips a lapsed trial to expired once', () => {
      expect(expireIfLapsed('owner-1', new Date('2026-06-30T12:00:00.000Z'))).toBe(false);
      expect(expireIfLapsed('owner-1', new Date(TRIAL_END))).toBe(true);
      expect(getSubscription('owner-1')?.status).toBe('expired');
      expect(expireIfLapsed('owner-1', new Date(TRIAL_END))).toBe(false);
    });
  });

  describe('discounts', () => {
    it('stores and clears a discount without touching expiry', () => {
      expect(setDiscount('owner-1', 'GOLD20', 0.2, SIGNUP)).toBe(true);
      let sub = getSubscription('owner-1');
      expect(sub?.discountCode).toBe('GOLD20');
      expect(sub?.discountPercentage).toBe(0.2);
      expect(sub?.expiresAt.toISOString()).toBe(TRIAL_END);

      clearDiscount('owner-1', SIGNUP);
      sub = getSubscription('owner-1');
      expect(sub?.discountCode).toBeNull();
      expect(sub?.discountPercentage).toBeNull();
    });

    it('returns false for an unknown user', () => {
      expect(setDiscount('nobody', 'GOLD20', 0.2, SIGNUP)).toBe(false);
    });
  });
});
