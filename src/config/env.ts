// src/config/env.ts
import { z } from 'zod';
import { config } from 'dotenv';
import { existsSync } from 'fs';
import { join } from 'path';
import { LOG_LEVELS } from '../lib/logger.js';

/**
 * Load environment variables from the appropriate .env file based on NODE_ENV.
 * Priority: .env.{NODE_ENV}.local > .env.{NODE_ENV} > .env.local > .env
 *
 * Since dotenv doesn't override by default, we load highest priority first.
 * The first value set for each variable wins.
 */
function loadEnvFile(): void {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const cwd = process.cwd();

  const envFiles = [
    `.env.${nodeEnv}.local`,
    `.env.${nodeEnv}`,
    '.env.local',
    '.env',
  ];

  for (const file of envFiles) {
    const filePath = join(cwd, file);
    if (existsSync(filePath)) {
      config({ path: filePath });
    }
  }
}

// Load env files before schema validation
loadEnvFile();

const numberFrom = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform(Number)
    .pipe(z.number().int().positive());

/**
 * Environment variable schema using Zod.
 * Validates all required env vars at startup to fail fast.
 */
export const envSchema = z.object({
  // Server Configuration
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: numberFrom('3000'),
  HOST: z.string().default('0.0.0.0'),

  // Database
  DB_PATH: z.string().default('./data/assistant.db'),

  // Text generation
  AI_PROVIDER: z.enum(['openai', 'anthropic']).default('openai'),
  AI_API_KEY: z.string().min(1, 'AI_API_KEY is required'),
  AI_BASE_URL: z.string().url().default('https://openrouter.ai/api/v1'),
  AI_MODEL: z.string().default('openai/gpt-4o-mini'),
  AI_TIMEOUT_MS: numberFrom('30000'),
  AI_MAX_RETRIES: z.string().default('1').transform(Number).pipe(z.number().int().min(0).max(5)),

  // Speech-to-text (falls back to AI_API_KEY and the provider's default endpoint)
  SPEECH_MODEL: z.string().default('whisper-1'),
  SPEECH_API_KEY: z.string().optional(),
  SPEECH_BASE_URL: z.string().url().optional(),
  AUDIO_MAX_FILE_SIZE_MB: numberFrom('10'),
  AUDIO_MAX_DURATION_SECONDS: numberFrom('300'),

  // Business rules
  TRIAL_DAYS: numberFrom('30'),
  TIMEZONE: z.string().default('Asia/Tehran'),
  BOT_USERNAME: z.string().optional(),

  // Logging
  LOG_LEVEL: z
    .string()
    .default('INFO')
    .transform((value) => value.toUpperCase())
    .pipe(z.enum(LOG_LEVELS)),

  // Transport (no WEBHOOK_HOST means the transport polls)
  WEBHOOK_HOST: z.string().url().optional(),
  WEBHOOK_PATH: z.string().startsWith('/').default('/webhook'),
  WEBHOOK_SECRET: z.string().min(8).optional(),
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Validate an environment source into a typed config.
 * Throws with every failing variable listed.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  return result.data;
}

let cached: EnvConfig | null = null;

/**
 * Process-wide config, validated once on first use
 */
export function getConfig(): EnvConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}

/**
 * Transport mode reported by /health
 */
export function transportMode(config: EnvConfig): 'webhook' | 'polling' {
  return config.WEBHOOK_HOST ? 'webhook' : 'polling';
}
