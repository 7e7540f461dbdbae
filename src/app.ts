// src/app.ts
import Fastify from 'fastify';
import { getConfig, transportMode, type EnvConfig } from './config/env.js';
import { toPinoLevel } from './lib/logger.js';
import { ConversationController } from './conversation/controller.js';
import type { ConversationHandler } from './conversation/types.js';
import { ContentGenerator } from './services/contentGenerator.js';
import { createTextGenerator } from './services/textGenerator.js';
import { audioLimitsFromConfig, createSpeechService } from './services/speechService.js';
import { VoiceIntake, type VoiceHandler } from './services/voiceIntake.js';
import { webhookRoutes } from './routes/webhookRoutes.js';
import metricsPlugin from './plugins/metrics.js';

export interface BuildOptions {
  config?: EnvConfig;
  conversation?: ConversationHandler;
  voice?: VoiceHandler;
}

/**
 * Build and configure Fastify application
 *
 * @returns Configured Fastify instance
 */
export async function buildApp(options: BuildOptions = {}) {
  const config = options.config ?? getConfig();
  const level = toPinoLevel(config.LOG_LEVEL, config.NODE_ENV);

  const fastify = Fastify({
    logger:
      config.NODE_ENV === 'development'
        ? {
            level,
            transport: {
              target: 'pino-pretty',
              options: {
                translateTime: 'HH:MM:ss Z',
                ignore: 'pid,hostname',
              },
            },
          }
        : {
            level,
          },
  });

  const conversation =
    options.conversation ??
    new ConversationController({
      generator: new ContentGenerator(createTextGenerator(config)),
      trialDays: config.TRIAL_DAYS,
      timeZone: config.TIMEZONE,
      botUsername: config.BOT_USERNAME,
    });

  const voice =
    options.voice ?? new VoiceIntake(createSpeechService(config), conversation, audioLimitsFromConfig(config));

  // Health check endpoint
  fastify.get('/health', async () => {
    return { status: 'ok', transport: transportMode(config), timestamp: new Date().toISOString() };
  });

  // Register plugins
  await fastify.register(metricsPlugin);

  // Register routes
  await fastify.register(webhookRoutes, {
    path: config.WEBHOOK_PATH,
    secret: config.WEBHOOK_SECRET,
    conversation,
    voice,
  });

  return fastify;
}

/**
 * Start the application server
 */
async function start() {
  try {
    const config = getConfig();
    const fastify = await buildApp({ config });

    await fastify.listen({ port: config.PORT, host: config.HOST });

    fastify.log.info(
      { transport: transportMode(config), webhookPath: config.WEBHOOK_PATH },
      `Server listening on ${config.HOST}:${config.PORT}`
    );
  } catch (err) {
    console.error('Error starting server:', err);
    process.exit(1);
  }
}

// Start server if this is the main module
if (import.meta.url === `file://${process.argv[1]}`) {
  void start();
}
