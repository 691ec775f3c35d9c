import type { Server } from 'http';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createApp } from '@/app';
import { createDatabase, type DatabaseConnection } from '@/db/connection';
import { StatsController } from '@/controllers/stats.controller';
import { GenerationRepository } from '@/repositories/generation.repository';
import { UserSettingsRepository } from '@/repositories/user-settings.repository';
import { TempStorageService } from '@/services/temp-storage.service';
import { VideoGenerationService } from '@/services/video-generation.service';
import type { IVideoGenerationClient } from '@/interfaces/video-generation-client.interface';

const unusedClient: IVideoGenerationClient = {
  submit: async () => {
    throw new Error('not used');
  },
  poll: async () => {
    throw new Error('not used');
  },
  fetchVideo: async () => {
    throw new Error('not used');
  },
};

const listen = (server: Server) =>
  new Promise<string>((resolve, reject) => {
    server.once('error', reject);
    server.once('listening', () => {
      const address = server.address();
      if (address && typeof address === 'object') {
        resolve(`http://127.0.0.1:${address.port}`);
      } else {
        reject(new Error('Server has no TCP address'));
      }
    });
  });

describe('HTTP app', () => {
  let connection: DatabaseConnection;
  let generationRepository: GenerationRepository;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    connection = createDatabase(':memory:');
    generationRepository = new GenerationRepository(connection.db);
    const generationService = new VideoGenerationService({
      settingsRepository: new UserSettingsRepository(connection.db),
      generationRepository,
      client: unusedClient,
      tempStorage: new TempStorageService('/tmp/unused-video-bot-test'),
      quotaLimit: 3,
    });

    const app = createApp({
      statsController: new StatsController(generationRepository, generationService),
      quiet: true,
    });
    server = app.listen(0, '127.0.0.1');
    baseUrl = await listen(server);
  });

  afterEach(async () => {
    await new Promise<void>(resolve => server.close(() => resolve()));
    if (connection.sqlite.open) {
      connection.close();
    }
  });

  it('reports health', async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toMatchObject({
      status: 'ok',
      timestamp: expect.any(String),
      uptime: expect.any(Number),
    });
  });

  it('returns ledger statistics with quota usage', async () => {
    const id = await generationRepository.create({
      userId: 1,
      username: 'alice',
      model: 'veo-3.1-fast-generate-001',
      durationSeconds: 8,
      resolution: '720p',
    });
    await generationRepository.update(id, { status: 'success', cost: 1.2 });
    await generationRepository.create({
      userId: 2,
      username: null,
      model: 'veo-3.1-generate-001',
      durationSeconds: 4,
      resolution: '720p',
    });

    const response = await fetch(`${baseUrl}/api/v1/stats`);

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toEqual({
      success: true,
      data: {
        totalMessages: 2,
        uniqueUsers: 2,
        successfulMessages: 1,
        failedMessages: 0,
        totalCost: 1.2,
        totalPromptTokens: 0,
        totalOutputPromptTokens: 0,
        quota: { used: 1, limit: 3, remaining: 2 },
      },
    });
  });

  it('answers unknown routes with 404', async () => {
    const response = await fetch(`${baseUrl}/nope`);

    expect(response.status).toBe(404);
    await expect(response.json()).resolves.toEqual({
      success: false,
      error: { message: 'Route GET /nope not found' },
    });
  });

  it('hides internal failures behind a generic 500', async () => {
    connection.close();

    const response = await fetch(`${baseUrl}/api/v1/stats`);

    expect(response.status).toBe(500);
    await expect(response.json()).resolves.toEqual({
      success: false,
      error: { message: 'Internal Server Error' },
    });
  });
});
