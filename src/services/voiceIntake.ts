// src/services/voiceIntake.ts
import type { Logger } from 'pino';
import { ExternalServiceError, ValidationError } from '../lib/errors.js';
import { logger as rootLogger } from '../lib/logger.js';
import type { ConversationHandler, HandleResult, InboundEvent } from '../conversation/types.js';
import { checkAudioAdmission, type AudioLimits, type SpeechToText } from './speechService.js';

export const VOICE_FAILURE = 'خطا در پردازش پیام صوتی. لطفاً دوباره تلاش کنید یا پیام متنی بفرستید.';

export interface VoiceClip {
  data: string; // base64
  durationSeconds: number;
  sizeBytes: number;
  mimeType?: string;
}

/**
 * Decoded size of a base64 payload, without decoding it
 */
export function decodedLength(base64: string): number {
  const trimmed = base64.replace(/\s/g, '');
  const padding = trimmed.endsWith('==') ? 2 : trimmed.endsWith('=') ? 1 : 0;
  return Math.floor((trimmed.length * 3) / 4) - padding;
}

export interface VoiceHandler {
  handle(event: InboundEvent, clip: VoiceClip): Promise<HandleResult>;
}

/**
 * Voice messages: admission check, transcription, then the transcript is
 * handled like typed text.
 */
export class VoiceIntake implements VoiceHandler {
  private readonly log: Logger;

  constructor(
    private readonly speech: SpeechToText,
    private readonly conversation: ConversationHandler,
    private readonly limits: AudioLimits,
    log: Logger = rootLogger
  ) {
    this.log = log.child({ module: 'voiceIntake' });
  }

  async handle(event: InboundEvent, clip: VoiceClip): Promise<HandleResult> {
    const userId = event.externalUserId;

    let transcript: string;
    try {
      checkAudioAdmission(Math.max(clip.sizeBytes, decodedLength(clip.data)), clip.durationSeconds, this.limits);
      const audio = Buffer.from(clip.data, 'base64');
      transcript = await this.speech.transcribe(audio, clip.durationSeconds, clip.sizeBytes, {
        mimeType: clip.mimeType,
      });
    } catch (err) {
      if (err instanceof ValidationError) {
        this.log.info({ userId, reason: err.message }, 'Voice message rejected');
        return { status: 'replied', response: { text: err.message } };
      }
      if (err instanceof ExternalServiceError) {
        this.log.error({ err, userId }, 'Voice transcription failed');
        return { status: 'replied', response: { text: VOICE_FAILURE } };
      }
      throw err;
    }

    this.log.debug({ userId, length: transcript.length }, 'Voice message transcribed');
    const result = await this.conversation.handle({ ...event, text: transcript, callbackToken: undefined });
    if (result.status === 'superseded') return result;
    return { ...result, response: { ...result.response, transcript } };
  }
}
