// src/db/userDb.test.ts
import { describe, it, expect, beforeEach, vi } from 'vitest';

// Mock the db import with an in-memory database
vi.mock('./db.js', async () => {
  const { openDatabase } = await import('./schema.js');
  return { default: openDatabase(':memory:') };
});

// Import functions after mocking
import {
  completeOnboarding,
  createUser,
  deleteUser,
  getOrCreateUser,
  getUser,
  setOnboardingStep,
  updateUser,
} from './userDb.js';
import {
  ensureReferralCode,
  findUserIdByReferralCode,
  generateReferralCode,
  getReferralCount,
  recordReferral,
} from './referralDb.js';
import { getProfile } from './profileDb.js';
import { getSubscription } from './subscriptionDb.js';
import db from './db.js';

const NOW = new Date('2026-06-01T12:00:00.000Z');
const options = { trialDays: 30, now: NOW };

describe('userDb', () => {
  beforeEach(() => {
    db.exec('DELETE FROM users');
  });

  describe('createUser', () => {
    it('creates the user with a profile and a trial', () => {
      const user = createUser({ userId: 'tg-100', username: 'gold_sara', firstName: 'Sara' }, options);

      expect(user.userId).toBe('tg-100');
      expect(user.username).toBe('gold_sara');
      expect(user.firstName).toBe('Sara');
      expect(user.onboardingStep).toBe('start');
      expect(user.onboardingCompleted).toBe(false);
      expect(user.referralCode).toBeNull();
      expect(getProfile('tg-100')?.pageStyle).toBe('friendly');
      expect(getSubscription('tg-100')?.status).toBe('trial');
      expect(getSubscription('tg-100')?.expiresAt.toISOString()).toBe('2026-07-01T12:00:00.000Z');
    });
  });

  describe('getOrCreateUser', () => {
    it('creates on first contact and reuses afterwards', () => {
      const first = getOrCreateUser({ userId: 'tg-100', firstName: 'Sara' }, options);
      const second = getOrCreateUser({ userId: 'tg-100', lastName: 'Ahmadi' }, options);

      expect(first.created).toBe(true);
      expect(second.created).toBe(false);
      expect(second.user.firstName).toBe('Sara');
      expect(second.user.lastName).toBe('Ahmadi');
    });

    it('recreates a missing profile', () => {
      createUser({ userId: 'tg-100' }, options);
      db.prepare('DELETE FROM profiles WHERE user_id = ?').run('tg-100');

      getOrCreateUser({ userId: 'tg-100' }, options);

      expect(getProfile('tg-100')).not.toBeNull();
    });
  });

  describe('updates', () => {
    it('assigns only the fields in the patch', () => {
      createUser({ userId: 'tg-100' }, options);
      updateUser('tg-100', { displayName: 'سارا', phone: '09121234567' }, NOW);
      updateUser('tg-100', { email: 'sara@gallery.ir' }, NOW);

      const user = getUser('tg-100');
      expect(user?.displayName).toBe('سارا');
      expect(user?.phone).toBe('09121234567');
      expect(user?.email).toBe('sara@gallery.ir');
    });

    it('returns false for an unknown user', () => {
      expect(updateUser('nobody', { phone: '09121234567' })).toBe(false);
    });

    it('tracks the onboarding step until completion', () => {
      createUser({ userId: 'tg-100' }, options);
      setOnboardingStep('tg-100', 'instagram', NOW);
      expect(getUser('tg-100')?.onboardingStep).toBe('instagram');

      completeOnboarding('tg-100', NOW);
      const user = getUser('tg-100');
      expect(user?.onboardingStep).toBe('completed');
      expect(user?.onboardingCompleted).toBe(true);
    });

    it('deletes the user with everything it owns', () => {
      createUser({ userId: 'tg-100' }, options);

      expect(deleteUser('tg-100')).toBe(true);
      expect(getProfile('tg-100')).toBeNull();
      expect(getSubscription('tg-100')).toBeNull();
      expect(deleteUser('tg-100')).toBe(false);
    });
  });
});

describe('referralDb', () => {
  beforeEach(() => {
    db.exec('DELETE FROM users');
  });

  it('generates 8 uppercase letters and digits', () => {
    expect(generateReferralCode()).toMatch(/^[A-Z0-9]{8}$/);
  });

  it('credits the referrer once when a referred user signs up', () => {
    createUser({ userId: 'referrer' }, options);
    const code = ensureReferralCode('referrer', () => 'ABCD1234');

    const referred = createUser({ userId: 'newcomer', referredByCode: 'abcd1234' }, options);

    expect(code).toBe('ABCD1234');
    expect(referred.referredBy).toBe('referrer');
    expect(referred.referralCode).toBeNull();
    expect(getReferralCount('referrer')).toBe(1);
    expect(recordReferral('newcomer', 'ABCD1234', NOW)).toBe(false);
    expect(getReferralCount('referrer')).toBe(1);
  });

  it('ignores unknown codes and self-referrals', () => {
    createUser({ userId: 'referrer' }, options);
    ensureReferralCode('referrer', () => 'ABCD1234');

    const stranger = createUser({ userId: 'stranger', referredByCode: 'NOPE0000' }, options);

    expect(stranger.referredBy).toBeNull();
    expect(recordReferral('referrer', 'ABCD1234', NOW)).toBe(false);
    expect(getReferralCount('referrer')).toBe(0);
  });

  it('re-rolls a code that collides with another user', () => {
    createUser({ userId: 'first' }, options);
    createUser({ userId: 'second' }, options);
    ensureReferralCode('first', () => 'ABCD1234');

    const candidates = ['ABCD1234', 'WXYZ9876'];
    const generate = vi.fn(() => candidates.shift() ?? 'UNUSED00');

    expect(ensureReferralCode('second', generate)).toBe('WXYZ9876');
    expect(generate).toHaveBeenCalledTimes(2);
    expect(findUserIdByReferralCode('wxyz9876')).toBe('second');
  });

  it('returns the existing code without generating', () => {
    createUser({ userId: 'first' }, options);
    ensureReferralCode('first', () => 'ABCD1234');
    const generate = vi.fn(() => 'OTHER000');

    expect(ensureReferralCode('first', generate)).toBe('ABCD1234');
    expect(generate).not.toHaveBeenCalled();
  });

  it('fails for an unknown user', () => {
    expect(() => ensureReferralCode('ghost', () => 'ABCD1234')).toThrow('user ghost not found');
  });
});
