import express, { type Express } from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import { errorHandler } from '@/middleware/error-handler';
import { notFoundHandler } from '@/middleware/not-found-handler';
import { logger } from '@/lib/logger';
import healthRoutes from '@/routes/health.routes';
import { createStatsRoutes } from '@/routes/stats.routes';
import { StatsController } from '@/controllers/stats.controller';

export interface AppDependencies {
  statsController: StatsController;
  /** Skips access logging, e.g. in tests */
  quiet?: boolean;
}

/**
 * Operator facing HTTP server: health probe and usage statistics
 */
export function createApp({ statsController, quiet = false }: AppDependencies): Express {
  const app = express();

  // Security middleware
  app.use(helmet());

  // Logging middleware
  if (!quiet) {
    app.use(
      morgan('combined', {
        stream: {
          write: (message: string) => logger.info(message.trim()),
        },
      })
    );
  }

  app.use(express.json({ limit: '1mb' }));

  // Health check endpoint
  app.use('/health', healthRoutes);

  // API routes
  app.use('/api/v1/stats', createStatsRoutes(statsController));

  // Error handling middleware
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
