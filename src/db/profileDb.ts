// src/db/profileDb.ts
import db from './db.js';
import type {
  AudienceType,
  PageStyle,
  Profile,
  ProfilePatch,
  SalesGoal,
} from '../types/user.js';

/**
 * Raw profile row from database
 */
interface ProfileRow {
  user_id: string;
  gallery_name: string | null;
  instagram_handle: string | null;
  telegram_channel: string | null;
  main_customers: string | null;
  constraints: string | null;
  content_help: string | null;
  has_physical_store: number | null;
  additional_info: string | null;
  page_style: PageStyle;
  audience_type: AudienceType;
  sales_goal: SalesGoal;
  situation_summary: string | null;
  summary_approved: number;
  created_at: string;
  updated_at: string;
}

function rowToProfile(row: ProfileRow): Profile {
  return {
    userId: row.user_id,
    galleryName: row.gallery_name,
    instagramHandle: row.instagram_handle,
    telegramChannel: row.telegram_channel,
    mainCustomers: row.main_customers,
    constraints: row.constraints,
    contentHelp: row.content_help,
    hasPhysicalStore: row.has_physical_store === null ? null : row.has_physical_store === 1,
    additionalInfo: row.additional_info,
    pageStyle: row.page_style,
    audienceType: row.audience_type,
    salesGoal: row.sales_goal,
    situationSummary: row.situation_summary,
    summaryApproved: row.summary_approved === 1,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

// Patch keys and the column each one writes
const PATCH_COLUMNS: ReadonlyArray<readonly [keyof ProfilePatch, string]> = [
  ['galleryName', 'gallery_name'],
  ['instagramHandle', 'instagram_handle'],
  ['telegramChannel', 'telegram_channel'],
  ['mainCustomers', 'main_customers'],
  ['constraints', 'constraints'],
  ['contentHelp', 'content_help'],
  ['hasPhysicalStore', 'has_physical_store'],
  ['additionalInfo', 'additional_info'],
  ['pageStyle', 'page_style'],
  ['audienceType', 'audience_type'],
  ['salesGoal', 'sales_goal'],
];

const getStmt = db.prepare<[string], ProfileRow>(`
  SELECT * FROM profiles WHERE user_id = ?
`);

/**
 * Get profile by user ID
 */
export function getProfile(userId: string): Profile | null {
  const row = getStmt.get(userId);
  return row ? rowToProfile(row) : null;
}

/**
 * Create an empty profile if the user has none
 */
export function ensureProfile(userId: string, now: Date = new Date()): Profile {
  const stamp = now.toISOString();
  db.prepare(`
    INSERT INTO profiles (user_id, created_at, updated_at)
    VALUES (?, ?, ?)
    ON CONFLICT(user_id) DO NOTHING
  `).run(userId, stamp, stamp);

  const row = getStmt.get(userId);
  if (!row) {
    throw new Error(`Profile for ${userId} could not be created`);
  }
  return rowToProfile(row);
}

/**
 * Assign profile fields. Keys absent from the patch are left alone;
 * assigning the same value twice is a no-op.
 *
 * @returns true if the profile exists
 */
export function updateProfile(userId: string, patch: ProfilePatch, now: Date = new Date()): boolean {
  const assignments: string[] = [];
  const values: Array<string | number | null> = [];

  for (const [key, column] of PATCH_COLUMNS) {
    if (!(key in patch)) continue;
    const value = patch[key];
    assignments.push(`${column} = ?`);
    if (typeof value === 'boolean') {
      values.push(value ? 1 : 0);
    } else if (typeof value === 'string') {
      values.push(value);
    } else {
      values.push(null);
    }
  }

  if (assignments.length === 0) return getStmt.get(userId) !== undefined;

  const result = db.prepare(`
    UPDATE profiles SET ${assignments.join(', ')}, updated_at = ?
    WHERE user_id = ?
  `).run(...values, now.toISOString(), userId);

  return result.changes > 0;
}

/**
 * Store a freshly generated situation summary, not yet approved
 */
export function saveSummary(userId: string, summary: string, now: Date = new Date()): void {
  db.prepare(`
    UPDATE profiles
    SET situation_summary = ?, summary_approved = 0, updated_at = ?
    WHERE user_id = ?
  `).run(summary, now.toISOString(), userId);
}

/**
 * Approve the stored summary
 */
export function approveSummary(userId: string, now: Date = new Date()): void {
  db.prepare(`
    UPDATE profiles SET summary_approved = 1, updated_at = ?
    WHERE user_id = ? AND situation_summary IS NOT NULL
  `).run(now.toISOString(), userId);
}
