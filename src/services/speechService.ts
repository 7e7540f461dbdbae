// src/services/speechService.ts
import { OpenAI, toFile } from 'openai';
import type { EnvConfig } from '../config/env.js';
import { LazyHandle } from '../lib/singleFlight.js';
import { ExternalServiceError, ValidationError, isAbortError } from '../lib/errors.js';

export interface AudioLimits {
  maxFileSizeBytes: number;
  maxDurationSeconds: number;
}

export interface TranscribeOptions {
  mimeType?: string;
  signal?: AbortSignal;
}

/**
 * Speech-to-text provider
 */
export interface SpeechToText {
  transcribe(
    audio: Buffer,
    durationSeconds: number,
    sizeBytes: number,
    options?: TranscribeOptions
  ): Promise<string>;
}

export interface SpeechSettings {
  apiKey: string;
  baseURL?: string;
  model: string;
  timeoutMs: number;
  limits: AudioLimits;
}

const BYTES_PER_MB = 1024 * 1024;

export function audioLimitsFromConfig(config: EnvConfig): AudioLimits {
  return {
    maxFileSizeBytes: config.AUDIO_MAX_FILE_SIZE_MB * BYTES_PER_MB,
    maxDurationSeconds: config.AUDIO_MAX_DURATION_SECONDS,
  };
}

/**
 * Reject audio over the configured limits before any work starts
 *
 * @throws ValidationError with a user-facing message
 */
export function checkAudioAdmission(sizeBytes: number, durationSeconds: number, limits: AudioLimits): void {
  if (sizeBytes > limits.maxFileSizeBytes) {
    const maxMb = Math.round(limits.maxFileSizeBytes / BYTES_PER_MB);
    throw new ValidationError(`فایل صوتی خیلی بزرگ است. حداکثر اندازه: ${maxMb}MB`);
  }
  if (durationSeconds > limits.maxDurationSeconds) {
    throw new ValidationError(
      `پیام صوتی خیلی طولانی است. حداکثر مدت: ${limits.maxDurationSeconds} ثانیه`
    );
  }
}

const EXTENSIONS: Record<string, string> = {
  'audio/ogg': 'ogg',
  'audio/mpeg': 'mp3',
  'audio/mp4': 'm4a',
  'audio/wav': 'wav',
  'audio/webm': 'webm',
};

/**
 * Transcription on the OpenAI audio endpoint.
 *
 * The client is built and the model checked once, on first use; concurrent
 * first calls share that initialisation.
 */
export class WhisperSpeechService implements SpeechToText {
  private readonly client: LazyHandle<OpenAI>;

  constructor(private readonly settings: SpeechSettings) {
    this.client = new LazyHandle(async () => {
      const client = new OpenAI({
        apiKey: settings.apiKey,
        baseURL: settings.baseURL,
        timeout: settings.timeoutMs,
        maxRetries: 1,
      });
      await client.models.retrieve(settings.model);
      return client;
    });
  }

  async transcribe(
    audio: Buffer,
    durationSeconds: number,
    sizeBytes: number,
    options: TranscribeOptions = {}
  ): Promise<string> {
    checkAudioAdmission(Math.max(sizeBytes, audio.byteLength), durationSeconds, this.settings.limits);

    try {
      const client = await this.client.get();
      const mimeType = options.mimeType ?? 'audio/ogg';
      const file = await toFile(audio, `voice.${EXTENSIONS[mimeType] ?? 'ogg'}`, { type: mimeType });

      const result = await client.audio.transcriptions.create(
        { file, model: this.settings.model, language: 'fa' },
        { signal: options.signal }
      );

      const text = result.text.trim();
      if (!text) {
        throw new ValidationError('متوجه صدای شما نشدم. لطفاً دوباره و واضح‌تر بفرستید.');
      }
      return text;
    } catch (err) {
      if (err instanceof ValidationError || isAbortError(err)) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new ExternalServiceError(`Transcription failed: ${reason}`, 'speech', { cause: err });
    }
  }
}

export function createSpeechService(config: EnvConfig): WhisperSpeechService {
  return new WhisperSpeechService({
    apiKey: config.SPEECH_API_KEY ?? config.AI_API_KEY,
    baseURL: config.SPEECH_BASE_URL,
    model: config.SPEECH_MODEL,
    timeoutMs: config.AI_TIMEOUT_MS,
    limits: audioLimitsFromConfig(config),
  });
}
