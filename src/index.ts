import type { Server } from 'http';
import { Telegraf } from 'telegraf';
import { createApp } from '@/app';
import { loadConfigFromEnvironment, type AppConfig } from '@/config/app.config';
import { createDatabase } from '@/db/connection';
import { ConfigurationError, getErrorMessage } from '@/lib/errors';
import { flushLogs, logger } from '@/lib/logger';
import { GoogleAccessTokenProvider } from '@/lib/google-auth';
import { GcsService } from '@/lib/gcs';
import { UserSettingsRepository } from '@/repositories/user-settings.repository';
import { GenerationRepository } from '@/repositories/generation.repository';
import { VeoService } from '@/services/veo.service';
import { TempStorageService } from '@/services/temp-storage.service';
import { VideoGenerationService } from '@/services/video-generation.service';
import { CommandController } from '@/controllers/command.controller';
import { PromptController } from '@/controllers/prompt.controller';
import { StatsController } from '@/controllers/stats.controller';
import { registerBotRoutes } from '@/routes/bot.routes';

// Running pipelines get this long to finish before the database is closed
const SHUTDOWN_GRACE_MS = 30_000;

function readConfig(): AppConfig {
  try {
    return loadConfigFromEnvironment();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      error.issues.forEach(issue => logger.error(`❌ ${issue}`));
    } else {
      logger.error('❌ Failed to load configuration', { error: getErrorMessage(error) });
    }
    process.exit(1);
  }
}

async function main(): Promise<void> {
  const config = readConfig();

  const database = createDatabase(config.databasePath);
  const tempStorage = new TempStorageService(config.tempDir);
  const swept = await tempStorage.cleanupAll();
  if (swept > 0) {
    logger.info(`🧹 Removed ${swept} leftover temp files from ${config.tempDir}`);
  }

  const settingsRepository = new UserSettingsRepository(database.db);
  const generationRepository = new GenerationRepository(database.db);

  const veoService = new VeoService({
    projectId: config.google.projectId,
    location: config.google.location,
    tokenProvider: new GoogleAccessTokenProvider(config.google.credentialsPath),
    downloader: new GcsService(config.google.credentialsPath, config.google.projectId),
  });

  const generationService = new VideoGenerationService({
    settingsRepository,
    generationRepository,
    client: veoService,
    tempStorage,
    quotaLimit: config.globalVideoQuotaLimit,
  });

  const promptController = new PromptController(generationService);
  const commandController = new CommandController(settingsRepository, generationRepository);

  const bot = new Telegraf(config.telegram.botToken);
  registerBotRoutes(bot, { commandController, promptController });

  const app = createApp({ statsController: new StatsController(generationRepository, generationService) });
  const server: Server = app.listen(config.port, () => {
    logger.info(`🚀 Health server running on port ${config.port}`);
    logger.info(`📊 Environment: ${config.environment}`);
  });

  logger.info('🤖 Starting Telegram bot (long polling)', {
    project: config.google.projectId,
    location: config.google.location,
    quotaLimit: config.globalVideoQuotaLimit,
  });
  bot.launch().catch((error: unknown) => {
    logger.error('❌ Telegram bot stopped with an error', { error: getErrorMessage(error) });
    process.exit(1);
  });

  let shuttingDown = false;

  // Graceful shutdown
  const gracefulShutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`📴 Received ${signal}. Starting graceful shutdown...`);

    try {
      bot.stop(signal);
      logger.info('✅ Bot stopped receiving updates');

      if (promptController.pendingCount > 0) {
        logger.info(`⏳ Waiting for ${promptController.pendingCount} running generations`);
        await Promise.race([
          promptController.waitForIdle(),
          new Promise<void>(resolve => setTimeout(resolve, SHUTDOWN_GRACE_MS).unref()),
        ]);
      }

      await new Promise<void>((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()));
      });
      logger.info('✅ Server closed successfully');

      database.close();
      await tempStorage.cleanupAll();
      await flushLogs();
      process.exit(0);
    } catch (error) {
      logger.error('❌ Error during graceful shutdown', { error: getErrorMessage(error) });
      process.exit(1);
    }
  };

  // Handle shutdown signals
  process.once('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  process.once('SIGINT', () => void gracefulShutdown('SIGINT'));
}

main().catch((error: unknown) => {
  logger.error('❌ Failed to start', {
    error: getErrorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
