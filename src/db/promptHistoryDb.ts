// src/db/promptHistoryDb.ts
import db from './db.js';
import type { PromptUsage } from '../types/content.js';

interface PromptHistoryRow {
  user_id: string;
  prompt_name: string;
  usage_count: number;
  last_system_prompt: string;
  last_user_prompt: string;
  updated_at: string;
}

/**
 * Record use of a named prompt: insert on first use, increment afterwards
 */
export function recordPromptUsage(
  userId: string,
  promptName: string,
  systemPrompt: string,
  userPrompt: string,
  now: Date = new Date()
): void {
  const stamp = now.toISOString();
  db.prepare(`
    INSERT INTO prompt_history
      (user_id, prompt_name, usage_count, last_system_prompt, last_user_prompt, created_at, updated_at)
    VALUES (?, ?, 1, ?, ?, ?, ?)
    ON CONFLICT(user_id, prompt_name) DO UPDATE SET
      usage_count = prompt_history.usage_count + 1,
      last_system_prompt = excluded.last_system_prompt,
      last_user_prompt = excluded.last_user_prompt,
      updated_at = excluded.updated_at
  `).run(userId, promptName, systemPrompt, userPrompt, stamp, stamp);
}

export function getPromptUsage(userId: string, promptName: string): PromptUsage | null {
  const row = db.prepare<[string, string], PromptHistoryRow>(`
    SELECT user_id, prompt_name, usage_count, last_system_prompt, last_user_prompt, updated_at
    FROM prompt_history
    WHERE user_id = ? AND prompt_name = ?
  `).get(userId, promptName);

  if (!row) return null;

  return {
    userId: row.user_id,
    promptName: row.prompt_name,
    usageCount: row.usage_count,
    lastSystemPrompt: row.last_system_prompt,
    lastUserPrompt: row.last_user_prompt,
    updatedAt: new Date(row.updated_at),
  };
}
