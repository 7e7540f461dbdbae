// src/db/schema.ts
import Database from 'better-sqlite3';

/**
 * Create tables if they don't exist.
 * Shared by the process-wide connection and the in-memory test databases.
 *
 * All business timestamps are ISO-8601 strings written by the application,
 * so they compare lexicographically.
 */
export function applySchema(db: Database.Database): void {
  db.exec(`
    -- Users keyed by the transport's stable identity
    CREATE TABLE IF NOT EXISTS users (
      user_id TEXT PRIMARY KEY,
      username TEXT,
      first_name TEXT,
      last_name TEXT,
      display_name TEXT,
      phone TEXT,
      email TEXT,
      referral_code TEXT UNIQUE,
      referred_by TEXT REFERENCES users(user_id) ON DELETE SET NULL,
      referral_count INTEGER NOT NULL DEFAULT 0,
      onboarding_step TEXT NOT NULL DEFAULT 'start' CHECK(onboarding_step IN (
        'start', 'name', 'phone', 'email', 'gallery_name', 'instagram', 'telegram',
        'customers', 'constraints', 'help', 'physical_store', 'additional_info',
        'summary_confirm', 'completed'
      )),
      onboarding_completed INTEGER NOT NULL DEFAULT 0,
      is_active INTEGER NOT NULL DEFAULT 1,
      is_blocked INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      last_activity TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_users_referred_by ON users(referred_by);

    -- Business profile, one-to-one with users
    CREATE TABLE IF NOT EXISTS profiles (
      user_id TEXT PRIMARY KEY REFERENCES users(user_id) ON DELETE CASCADE,
      gallery_name TEXT,
      instagram_handle TEXT,
      telegram_channel TEXT,
      main_customers TEXT,
      constraints TEXT,
      content_help TEXT,
      has_physical_store INTEGER,
      additional_info TEXT,
      page_style TEXT NOT NULL DEFAULT 'friendly'
        CHECK(page_style IN ('serious', 'friendly', 'luxury', 'traditional')),
      audience_type TEXT NOT NULL DEFAULT 'general'
        CHECK(audience_type IN ('youth', 'luxury', 'brides', 'general')),
      sales_goal TEXT NOT NULL DEFAULT 'increase_sales'
        CHECK(sales_goal IN ('increase_sales', 'brand_awareness', 'engagement')),
      situation_summary TEXT,
      summary_approved INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    -- Trial / paid subscription, one-to-one with users
    CREATE TABLE IF NOT EXISTS subscriptions (
      user_id TEXT PRIMARY KEY REFERENCES users(user_id) ON DELETE CASCADE,
      status TEXT NOT NULL CHECK(status IN ('trial', 'active', 'expired')),
      started_at TEXT NOT NULL,
      expires_at TEXT NOT NULL,
      payment_amount INTEGER NOT NULL DEFAULT 0,
      payment_reference TEXT,
      discount_percentage REAL,
      discount_code TEXT,
      version INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_subscriptions_expires_at ON subscriptions(expires_at);

    -- Append-only generation log
    CREATE TABLE IF NOT EXISTS content_history (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id TEXT NOT NULL REFERENCES users(user_id) ON DELETE CASCADE,
      content_type TEXT NOT NULL
        CHECK(content_type IN ('caption', 'reels', 'visual', 'calendar', 'summary')),
      prompt TEXT NOT NULL,
      generated_content TEXT NOT NULL,
      created_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_content_history_user_created
      ON content_history(user_id, created_at);

    -- Per-user prompt usage analytics
    CREATE TABLE IF NOT EXISTS prompt_history (
      user_id TEXT NOT NULL REFERENCES users(user_id) ON DELETE CASCADE,
      prompt_name TEXT NOT NULL,
      usage_count INTEGER NOT NULL DEFAULT 1,
      last_system_prompt TEXT NOT NULL,
      last_user_prompt TEXT NOT NULL,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      PRIMARY KEY (user_id, prompt_name)
    );

    -- Promotional codes (case-insensitive)
    CREATE TABLE IF NOT EXISTS discount_codes (
      code TEXT PRIMARY KEY COLLATE NOCASE,
      discount_percentage REAL NOT NULL
        CHECK(discount_percentage > 0 AND discount_percentage <= 1),
      max_uses INTEGER NOT NULL CHECK(max_uses > 0),
      current_uses INTEGER NOT NULL DEFAULT 0,
      expires_at TEXT,
      is_active INTEGER NOT NULL DEFAULT 1,
      created_at TEXT NOT NULL,
      CHECK(current_uses >= 0 AND current_uses <= max_uses)
    );

    -- Conversation state, loaded and saved once per inbound event
    CREATE TABLE IF NOT EXISTS conversation_states (
      user_id TEXT PRIMARY KEY REFERENCES users(user_id) ON DELETE CASCADE,
      state TEXT NOT NULL,
      data TEXT NOT NULL DEFAULT '{}',
      updated_at TEXT NOT NULL
    );
  `);
}

/**
 * Open a connection with the pragmas the app relies on and the schema applied.
 * `:memory:` gives an isolated database for tests.
 */
export function openDatabase(path: string): Database.Database {
  const db = new Database(path);

  // WAL allows readers alongside the single writer
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  // Wait for a competing writer instead of failing with SQLITE_BUSY
  db.pragma('busy_timeout = 5000');

  applySchema(db);
  return db;
}
