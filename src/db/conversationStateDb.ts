// src/db/conversationStateDb.ts
import db from './db.js';
import { logger } from '../lib/logger.js';
import { isStateName, type ConversationStateName } from '../conversation/states.js';
import { conversationDataSchema, type ConversationData } from '../conversation/types.js';

interface ConversationStateRow {
  user_id: string;
  state: string;
  data: string;
  updated_at: string;
}

export interface StoredConversation {
  state: ConversationStateName;
  data: ConversationData;
}

const getStmt = db.prepare<[string], ConversationStateRow>(`
  SELECT * FROM conversation_states WHERE user_id = ?
`);

const upsertStmt = db.prepare<[string, string, string, string]>(`
  INSERT INTO conversation_states (user_id, state, data, updated_at)
  VALUES (?, ?, ?, ?)
  ON CONFLICT(user_id) DO UPDATE SET
    state = excluded.state,
    data = excluded.data,
    updated_at = excluded.updated_at
`);

function parseData(userId: string, raw: string): ConversationData {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    logger.warn({ err, userId }, 'Stored conversation data is not valid JSON');
    return {};
  }

  const parsed = conversationDataSchema.safeParse(json);
  if (!parsed.success) {
    logger.warn({ userId, issues: parsed.error.issues }, 'Stored conversation data failed validation');
    return {};
  }
  return parsed.data;
}

/**
 * Stored state for a user, or null when none (or an unknown state) is stored
 */
export function loadConversation(userId: string): StoredConversation | null {
  const row = getStmt.get(userId);
  if (!row) return null;

  if (!isStateName(row.state)) {
    logger.warn({ userId, state: row.state }, 'Unknown stored conversation state');
    return null;
  }

  return { state: row.state, data: parseData(userId, row.data) };
}

export function saveConversation(
  userId: string,
  state: ConversationStateName,
  data: ConversationData,
  now: Date = new Date()
): void {
  upsertStmt.run(userId, state, JSON.stringify(data), now.toISOString());
}
