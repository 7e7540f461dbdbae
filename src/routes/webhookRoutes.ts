// src/routes/webhookRoutes.ts
import type { FastifyInstance } from 'fastify';
import { timingSafeEqual } from 'crypto';
import { z } from 'zod';
import type { ConversationHandler, HandleResult, InboundEvent } from '../conversation/types.js';
import type { VoiceHandler } from '../services/voiceIntake.js';

/**
 * Zod schema for inbound chat events
 */
const AudioSchema = z.object({
  data: z.string().min(1, 'Audio data is required'),
  durationSeconds: z.number().nonnegative(),
  sizeBytes: z.number().int().nonnegative(),
  mimeType: z.string().optional(),
});

export const InboundEventSchema = z
  .object({
    externalUserId: z.string().min(1, 'externalUserId is required').max(128),
    text: z.string().max(4096).optional(),
    callbackToken: z.string().max(256).optional(),
    audio: AudioSchema.optional(),
    username: z.string().max(64).nullish(),
    firstName: z.string().max(128).nullish(),
    lastName: z.string().max(128).nullish(),
  })
  .refine((event) => event.text !== undefined || event.callbackToken !== undefined || event.audio !== undefined, {
    message: 'Event must carry text, callbackToken or audio',
  });

export type InboundEventBody = z.infer<typeof InboundEventSchema>;

export interface WebhookRouteOptions {
  path: string;
  secret?: string;
  conversation: ConversationHandler;
  voice: VoiceHandler;
}

function secretMatches(expected: string, received: string | string[] | undefined): boolean {
  if (typeof received !== 'string') return false;
  const a = Buffer.from(expected);
  const b = Buffer.from(received);
  return a.length === b.length && timingSafeEqual(a, b);
}

function inputKind(body: InboundEventBody): 'voice' | 'callback' | 'text' {
  if (body.audio) return 'voice';
  if (body.callbackToken !== undefined) return 'callback';
  return 'text';
}

/**
 * Register the chat transport webhook
 *
 * @param fastify - Fastify instance
 * @param options - Path, optional shared secret and the event handlers
 */
export async function webhookRoutes(fastify: FastifyInstance, options: WebhookRouteOptions): Promise<void> {
  /**
   * POST {WEBHOOK_PATH}
   * Handle one inbound chat event and answer with the reply to deliver
   */
  fastify.post(options.path, async (request, reply) => {
    if (options.secret && !secretMatches(options.secret, request.headers['x-webhook-secret'])) {
      fastify.log.warn('Webhook call with missing or wrong secret');
      return reply.code(401).send({ error: 'Unauthorized' });
    }

    const bodyResult = InboundEventSchema.safeParse(request.body);
    if (!bodyResult.success) {
      return reply.code(400).send({
        error: 'Invalid event',
        details: bodyResult.error.issues,
      });
    }

    const body = bodyResult.data;
    const kind = inputKind(body);
    const event: InboundEvent = {
      externalUserId: body.externalUserId,
      text: body.text,
      callbackToken: body.callbackToken,
      username: body.username,
      firstName: body.firstName,
      lastName: body.lastName,
    };

    try {
      const result: HandleResult = body.audio
        ? await options.voice.handle(event, body.audio)
        : await options.conversation.handle(event);

      if (fastify.hasDecorator('metrics')) {
        fastify.metrics.conversationEvents.inc({ input: kind, status: result.status });
      }

      if (result.status === 'superseded') {
        return reply.code(200).send({ status: result.status });
      }
      return reply.code(200).send({ status: result.status, response: result.response });
    } catch (error) {
      fastify.log.error({ err: error, userId: body.externalUserId }, 'Error handling inbound event');
      return reply.code(500).send({ error: 'Internal server error' });
    }
  });
}
