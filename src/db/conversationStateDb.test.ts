// src/db/conversationStateDb.test.ts
import { describe, it, expect, beforeEach, vi } from 'vitest';

vi.mock('./db.js', async () => {
  const { openDatabase } = await import('./schema.js');
  return { default: openDatabase(':memory:') };
});

import { loadConversation, saveConversation } from './conversationStateDb.js';
import { createUser } from './userDb.js';
import db from './db.js';

const NOW = new Date('2026-06-01T12:00:00.000Z');

describe('conversationStateDb', () => {
  beforeEach(() => {
    db.exec('DELETE FROM users');
    createUser({ userId: 'tg-100' }, { trialDays: 30, now: NOW });
  });

  it('returns null before anything is stored', () => {
    expect(loadConversation('tg-100')).toBeNull();
  });

  it('round-trips state and data, replacing the previous save', () => {
    saveConversation('tg-100', 'scenario_browsing', { variants: ['الف', 'ب'], page: 2 }, NOW);
    saveConversation('tg-100', 'payment_reference', { planId: 'monthly', amount: 980000 }, NOW);

    expect(loadConversation('tg-100')).toEqual({
      state: 'payment_reference',
      data: { planId: 'monthly', amount: 980000 },
    });
  });

  it('ignores an unknown stored state', () => {
    db.prepare(`INSERT INTO conversation_states (user_id, state, data, updated_at) VALUES (?, ?, ?, ?)`).run(
      'tg-100',
      'retired_state',
      '{}',
      NOW.toISOString()
    );

    expect(loadConversation('tg-100')).toBeNull();
  });

  it('falls back to empty data when the stored bag is unreadable', () => {
    db.prepare(`INSERT INTO conversation_states (user_id, state, data, updated_at) VALUES (?, ?, ?, ?)`).run(
      'tg-100',
      'main_menu',
      '{not json',
      NOW.toISOString()
    );
    expect(loadConversation('tg-100')).toEqual({ state: 'main_menu', data: {} });

    db.prepare(`UPDATE conversation_states SET data = ? WHERE user_id = ?`).run('{"page":-1}', 'tg-100');
    expect(loadConversation('tg-100')).toEqual({ state: 'main_menu', data: {} });
  });
});
