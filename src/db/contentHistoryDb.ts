// src/db/contentHistoryDb.ts
import { subDays } from 'date-fns';
import db from './db.js';
import type { ContentHistoryEntry, ContentKind } from '../types/content.js';

interface ContentHistoryRow {
  id: number;
  user_id: string;
  content_type: ContentKind;
  prompt: string;
  generated_content: string;
  created_at: string;
}

function rowToEntry(row: ContentHistoryRow): ContentHistoryEntry {
  return {
    id: row.id,
    userId: row.user_id,
    contentType: row.content_type,
    prompt: row.prompt,
    generatedContent: row.generated_content,
    createdAt: new Date(row.created_at),
  };
}

/**
 * Append one generation to the log
 *
 * @returns new entry id
 */
export function saveContentHistory(
  userId: string,
  contentType: ContentKind,
  prompt: string,
  generatedContent: string,
  now: Date = new Date()
): number {
  const result = db.prepare(`
    INSERT INTO content_history (user_id, content_type, prompt, generated_content, created_at)
    VALUES (?, ?, ?, ?, ?)
  `).run(userId, contentType, prompt, generatedContent, now.toISOString());

  return Number(result.lastInsertRowid);
}

/**
 * Most recent entries first
 */
export function listContentHistory(userId: string, limit = 20): ContentHistoryEntry[] {
  const rows = db.prepare<[string, number], ContentHistoryRow>(`
    SELECT * FROM content_history
    WHERE user_id = ?
    ORDER BY created_at DESC, id DESC
    LIMIT ?
  `).all(userId, limit);

  return rows.map(rowToEntry);
}

/**
 * Number of generations in the last `days` days
 */
export function countRecentContent(userId: string, days = 30, now: Date = new Date()): number {
  const row = db.prepare<[string, string], { count: number }>(`
    SELECT COUNT(*) AS count FROM content_history
    WHERE user_id = ? AND created_at >= ?
  `).get(userId, subDays(now, days).toISOString());

  return row?.count ?? 0;
}
