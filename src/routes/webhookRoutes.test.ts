// src/routes/webhookRoutes.test.ts
import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { register } from 'prom-client';

vi.mock('../db/db.js', async () => {
  const { openDatabase } = await import('../db/schema.js');
  return { default: openDatabase(':memory:') };
});

import { buildApp } from '../app.js';
import { loadConfig } from '../config/env.js';
import type { ConversationHandler, HandleResult } from '../conversation/types.js';
import type { VoiceHandler } from '../services/voiceIntake.js';

const SECRET = 'test-secret';
const REPLY: HandleResult = {
  status: 'replied',
  response: { text: 'چی صدات کنم؟', suggestedReplies: ['🔙 بازگشت'] },
};

describe('webhook routes', () => {
  let app: FastifyInstance;
  let conversationHandle: Mock<ConversationHandler['handle']>;
  let voiceHandle: Mock<VoiceHandler['handle']>;

  const post = (payload: object, secret: string | undefined = SECRET) =>
    app.inject({
      method: 'POST',
      url: '/webhook',
      headers: secret ? { 'x-webhook-secret': secret } : {},
      payload,
    });

  beforeEach(async () => {
    register.clear();
    conversationHandle = vi.fn<ConversationHandler['handle']>(async () => REPLY);
    voiceHandle = vi.fn<VoiceHandler['handle']>(async () => ({
      status: 'replied',
      response: { text: 'چی صدات کنم؟', transcript: 'سارا' },
    }));
    app = await buildApp({
      config: loadConfig({ AI_API_KEY: 'test-key', NODE_ENV: 'test', WEBHOOK_SECRET: SECRET }),
      conversation: { handle: conversationHandle },
      voice: { handle: voiceHandle },
    });
  });

  afterEach(async () => {
    await app.close();
  });

  it('reports health and transport mode', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: 'ok', transport: 'polling' });
  });

  it('rejects calls without the shared secret', async () => {
    const missing = await post({ externalUserId: 'tg-100', text: 'سلام' }, undefined);
    const wrong = await post({ externalUserId: 'tg-100', text: 'سلام' }, 'wrong-secret');

    expect(missing.statusCode).toBe(401);
    expect(wrong.statusCode).toBe(401);
    expect(wrong.json()).toEqual({ error: 'Unauthorized' });
    expect(conversationHandle).not.toHaveBeenCalled();
  });

  it('rejects events without any input', async () => {
    const response = await post({ externalUserId: 'tg-100' });

    expect(response.statusCode).toBe(400);
    expect(response.json().error).toBe('Invalid event');
  });

  it('rejects events without a user id', async () => {
    const response = await post({ text: 'سلام' });

    expect(response.statusCode).toBe(400);
  });

  it('hands text events to the conversation', async () => {
    const response = await post({ externalUserId: 'tg-100', text: 'سارا', firstName: 'Sara' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      status: 'replied',
      response: { text: 'چی صدات کنم؟', suggestedReplies: ['🔙 بازگشت'] },
    });
    expect(conversationHandle).toHaveBeenCalledWith({
      externalUserId: 'tg-100',
      text: 'سارا',
      callbackToken: undefined,
      username: undefined,
      firstName: 'Sara',
      lastName: undefined,
    });
  });

  it('hands voice events to the voice intake', async () => {
    const audio = { data: 'dm9pY2U=', durationSeconds: 3, sizeBytes: 5, mimeType: 'audio/ogg' };

    const response = await post({ externalUserId: 'tg-100', audio });

    expect(response.json()).toEqual({
      status: 'replied',
      response: { text: 'چی صدات کنم؟', transcript: 'سارا' },
    });
    expect(voiceHandle).toHaveBeenCalledWith(expect.objectContaining({ externalUserId: 'tg-100' }), audio);
    expect(conversationHandle).not.toHaveBeenCalled();
  });

  it('answers a superseded event with its status only', async () => {
    conversationHandle.mockResolvedValueOnce({ status: 'superseded' });

    const response = await post({ externalUserId: 'tg-100', callbackToken: 'scenario_next' });

    expect(response.json()).toEqual({ status: 'superseded' });
  });

  it('returns 500 when handling throws', async () => {
    conversationHandle.mockRejectedValueOnce(new Error('boom'));

    const response = await post({ externalUserId: 'tg-100', text: 'سلام' });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({ error: 'Internal server error' });
  });
});
