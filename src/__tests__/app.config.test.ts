import os from 'os';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { loadConfig } from '@/config/app.config';
import { ConfigurationError } from '@/lib/errors';

const REQUIRED = {
  TELEGRAM_BOT_TOKEN: 'test-bot-token',
  GOOGLE_CLOUD_PROJECT_ID: 'test-project',
  GOOGLE_CLOUD_LOCATION: 'us-central1',
  GOOGLE_APPLICATION_CREDENTIALS: '/tmp/test-credentials.json',
};

describe('loadConfig', () => {
  it('applies defaults for optional values', () => {
    expect(loadConfig(REQUIRED)).toEqual({
      telegram: { botToken: 'test-bot-token' },
      google: {
        projectId: 'test-project',
        location: 'us-central1',
        credentialsPath: '/tmp/test-credentials.json',
      },
      databasePath: 'database.db',
      tempDir: path.join(os.tmpdir(), 'telegram-video-gen'),
      globalVideoQuotaLimit: 70,
      port: 3001,
      environment: 'development',
    });
  });

  it('reads optional overrides', () => {
    const config = loadConfig({
      ...REQUIRED,
      DATABASE_PATH: '/data/bot.db',
      TEMP_DIR: '/data/tmp',
      GLOBAL_VIDEO_QUOTA_LIMIT: '5',
      PORT: '8080',
      NODE_ENV: 'production',
    });

    expect(config.databasePath).toBe('/data/bot.db');
    expect(config.tempDir).toBe('/data/tmp');
    expect(config.globalVideoQuotaLimit).toBe(5);
    expect(config.port).toBe(8080);
    expect(config.environment).toBe('production');
  });

  it('lists every missing required variable', () => {
    let caught: unknown;
    try {
      loadConfig({ GOOGLE_CLOUD_LOCATION: '  ' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught instanceof ConfigurationError ? caught.issues : []).toEqual([
      'TELEGRAM_BOT_TOKEN environment variable is required',
      'GOOGLE_CLOUD_PROJECT_ID environment variable is required',
      'GOOGLE_CLOUD_LOCATION environment variable is required',
      'GOOGLE_APPLICATION_CREDENTIALS environment variable is required',
    ]);
  });

  it('rejects a quota that is not a number', () => {
    expect(() => loadConfig({ ...REQUIRED, GLOBAL_VIDEO_QUOTA_LIMIT: 'lots' })).toThrow(ConfigurationError);
  });
});
