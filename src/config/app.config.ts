import os from 'os';
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '@/lib/errors';

const required = (name: string) =>
  z
    .string({ required_error: `${name} environment variable is required` })
    .trim()
    .min(1, `${name} environment variable is required`);

const envSchema = z.object({
  TELEGRAM_BOT_TOKEN: required('TELEGRAM_BOT_TOKEN'),
  GOOGLE_CLOUD_PROJECT_ID: required('GOOGLE_CLOUD_PROJECT_ID'),
  GOOGLE_CLOUD_LOCATION: required('GOOGLE_CLOUD_LOCATION'),
  GOOGLE_APPLICATION_CREDENTIALS: required('GOOGLE_APPLICATION_CREDENTIALS'),
  DATABASE_PATH: z.string().trim().min(1).default('database.db'),
  TEMP_DIR: z.string().trim().min(1).optional(),
  GLOBAL_VIDEO_QUOTA_LIMIT: z.coerce.number().int().nonnegative().default(70),
  PORT: z.coerce.number().int().positive().default(3001),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export interface AppConfig {
  telegram: {
    botToken: string;
  };
  google: {
    projectId: string;
    location: string;
    credentialsPath: string;
  };
  databasePath: string;
  tempDir: string;
  globalVideoQuotaLimit: number;
  port: number;
  environment: 'development' | 'production' | 'test';
}

/**
 * Builds the application configuration from environment variables.
 * Throws ConfigurationError listing every missing or invalid value.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigurationError(result.error.issues.map(issue => issue.message));
  }

  const values = result.data;

  return {
    telegram: {
      botToken: values.TELEGRAM_BOT_TOKEN,
    },
    google: {
      projectId: values.GOOGLE_CLOUD_PROJECT_ID,
      location: values.GOOGLE_CLOUD_LOCATION,
      credentialsPath: values.GOOGLE_APPLICATION_CREDENTIALS,
    },
    databasePath: values.DATABASE_PATH,
    tempDir: values.TEMP_DIR ?? path.join(os.tmpdir(), 'telegram-video-gen'),
    globalVideoQuotaLimit: values.GLOBAL_VIDEO_QUOTA_LIMIT,
    port: values.PORT,
    environment: values.NODE_ENV,
  };
}

/**
 * Loads `.env` into the process environment, then validates it
 */
export function loadConfigFromEnvironment(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
