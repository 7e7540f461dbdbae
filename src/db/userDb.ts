// src/db/userDb.ts
import db from './db.js';
import { ensureProfile } from './profileDb.js';
import { createTrial } from './subscriptionDb.js';
import { recordReferral } from './referralDb.js';
import type { NewUserInput, OnboardingStep, User, UserPatch } from '../types/user.js';

/**
 * Raw user row from database
 */
interface UserRow {
  user_id: string;
  username: string | null;
  first_name: string | null;
  last_name: string | null;
  display_name: string | null;
  phone: string | null;
  email: string | null;
  referral_code: string | null;
  referred_by: string | null;
  referral_count: number;
  onboarding_step: OnboardingStep;
  onboarding_completed: number;
  is_active: number;
  is_blocked: number;
  created_at: string;
  updated_at: string;
  last_activity: string;
}

function rowToUser(row: UserRow): User {
  return {
    userId: row.user_id,
    username: row.username,
    firstName: row.first_name,
    lastName: row.last_name,
    displayName: row.display_name,
    phone: row.phone,
    email: row.email,
    referralCode: row.referral_code,
    referredBy: row.referred_by,
    referralCount: row.referral_count,
    onboardingStep: row.onboarding_step,
    onboardingCompleted: row.onboarding_completed === 1,
    isActive: row.is_active === 1,
    isBlocked: row.is_blocked === 1,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
    lastActivity: new Date(row.last_activity),
  };
}

const getByIdStmt = db.prepare<[string], UserRow>(`
  SELECT * FROM users WHERE user_id = ?
`);

const insertStmt = db.prepare<[string, string | null, string | null, string | null, string, string, string]>(`
  INSERT INTO users (user_id, username, first_name, last_name, created_at, updated_at, last_activity)
  VALUES (?, ?, ?, ?, ?, ?, ?)
`);

// Refresh transport-provided names; COALESCE keeps what we had when a field is missing
const touchStmt = db.prepare<[string | null, string | null, string | null, string, string]>(`
  UPDATE users
  SET username = COALESCE(?, username),
      first_name = COALESCE(?, first_name),
      last_name = COALESCE(?, last_name),
      last_activity = ?
  WHERE user_id = ?
`);

/**
 * Get user by external identity
 *
 * @returns User if found, null otherwise
 */
export function getUser(userId: string): User | null {
  const row = getByIdStmt.get(userId);
  return row ? rowToUser(row) : null;
}

export interface CreateUserOptions {
  trialDays: number;
  now?: Date;
}

/**
 * Create a user together with an empty profile and a trial subscription.
 * A non-empty referral code credits its owner once; unknown codes are ignored.
 */
export function createUser(input: NewUserInput, options: CreateUserOptions): User {
  const now = options.now ?? new Date();
  const stamp = now.toISOString();

  const create = db.transaction(() => {
    insertStmt.run(
      input.userId,
      input.username ?? null,
      input.firstName ?? null,
      input.lastName ?? null,
      stamp,
      stamp,
      stamp
    );
    ensureProfile(input.userId, now);
    createTrial(input.userId, options.trialDays, now);

    const code = input.referredByCode?.trim();
    if (code) {
      recordReferral(input.userId, code, now);
    }
  });
  create();

  const user = getUser(input.userId);
  if (!user) {
    throw new Error(`User ${input.userId} missing after creation`);
  }
  return user;
}

/**
 * Fetch or create the user for an inbound event and refresh last activity
 */
export function getOrCreateUser(
  input: NewUserInput,
  options: CreateUserOptions
): { user: User; created: boolean } {
  const now = options.now ?? new Date();
  const existing = getUser(input.userId);

  if (!existing) {
    return { user: createUser(input, { ...options, now }), created: true };
  }

  touchStmt.run(
    input.username ?? null,
    input.firstName ?? null,
    input.lastName ?? null,
    now.toISOString(),
    input.userId
  );
  // The profile shares the user's lifecycle; recreate it if it went missing
  ensureProfile(input.userId, now);

  return { user: getUser(input.userId) ?? existing, created: false };
}

/**
 * Assign contact fields collected during onboarding
 */
export function updateUser(userId: string, patch: UserPatch, now: Date = new Date()): boolean {
  const existing = getUser(userId);
  if (!existing) return false;

  db.prepare(`
    UPDATE users SET display_name = ?, phone = ?, email = ?, updated_at = ?
    WHERE user_id = ?
  `).run(
    'displayName' in patch ? patch.displayName ?? null : existing.displayName,
    'phone' in patch ? patch.phone ?? null : existing.phone,
    'email' in patch ? patch.email ?? null : existing.email,
    now.toISOString(),
    userId
  );

  return true;
}

/**
 * Update a user's onboarding step
 */
export function setOnboardingStep(userId: string, step: OnboardingStep, now: Date = new Date()): void {
  db.prepare(`
    UPDATE users SET onboarding_step = ?, updated_at = ? WHERE user_id = ?
  `).run(step, now.toISOString(), userId);
}

/**
 * Mark onboarding completed
 */
export function completeOnboarding(userId: string, now: Date = new Date()): void {
  db.prepare(`
    UPDATE users
    SET onboarding_step = 'completed', onboarding_completed = 1, updated_at = ?
    WHERE user_id = ?
  `).run(now.toISOString(), userId);
}

/**
 * Delete a user; profile, subscription and history cascade
 *
 * @returns true if deleted, false if not found
 */
export function deleteUser(userId: string): boolean {
  return db.prepare('DELETE FROM users WHERE user_id = ?').run(userId).changes > 0;
}
