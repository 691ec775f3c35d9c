import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createDatabase, type DatabaseConnection } from '@/db/connection';
import { CommandController } from '@/controllers/command.controller';
import { UserSettingsRepository } from '@/repositories/user-settings.repository';
import { GenerationRepository } from '@/repositories/generation.repository';
import { MODEL_TEXT, buildResetMessage } from '@/utils/messages.util';

describe('CommandController', () => {
  let connection: DatabaseConnection;
  let settingsRepository: UserSettingsRepository;
  let generationRepository: GenerationRepository;
  let controller: CommandController;

  beforeEach(() => {
    connection = createDatabase(':memory:');
    settingsRepository = new UserSettingsRepository(connection.db);
    generationRepository = new GenerationRepository(connection.db);
    controller = new CommandController(settingsRepository, generationRepository);
  });

  afterEach(() => {
    connection.close();
  });

  it('greets and lists the commands', () => {
    expect(controller.start().split('\n')[0]).toBe('👋 Welcome to the Video Generation Bot!');
    expect(controller.help()).toContain('/setduration [seconds] - Set video duration');
  });

  it('shows the current settings', async () => {
    const reply = await controller.settings({ userId: 1 });

    expect(reply).toContain('Model: <code>veo-3.1-fast-generate-001</code>');
    expect(reply).toContain('Duration: <code>8</code> seconds');
    expect(reply).toContain('Resolution: <code>720p</code>');
  });

  describe('/setmodel', () => {
    it('stores a valid model', async () => {
      const reply = await controller.setModel({ userId: 1, argument: 'veo-3.0-generate-001' });

      expect(reply).toBe('✅ Model set to: <code>veo-3.0-generate-001</code>');
      await expect(settingsRepository.get(1)).resolves.toMatchObject({ model: 'veo-3.0-generate-001' });
    });

    it('answers with usage when the model is missing', async () => {
      await expect(controller.setModel({ userId: 1 })).resolves.toBe(MODEL_TEXT.missing());
    });

    it('rejects unknown models without storing them', async () => {
      const reply = await controller.setModel({ userId: 1, argument: 'veo-2.0-generate-001' });

      expect(reply.split('\n')[0]).toBe('❌ Invalid model: <code>veo-2.0-generate-001</code>');
      await expect(settingsRepository.get(1)).resolves.toMatchObject({ model: 'veo-3.1-fast-generate-001' });
    });

    it('escapes model names echoed back', async () => {
      const reply = await controller.setModel({ userId: 1, argument: '<script>' });

      expect(reply.split('\n')[0]).toBe('❌ Invalid model: <code>&lt;script&gt;</code>');
    });
  });

  describe('/setduration', () => {
    it('stores a valid duration', async () => {
      const reply = await controller.setDuration({ userId: 1, argument: '6' });

      expect(reply).toBe(
        [
          '✅ Duration set to: <code>6</code> seconds',
          '',
          'Model: <code>veo-3.1-fast-generate-001</code>',
          'Duration: <code>6</code> seconds',
        ].join('\n')
      );
      await expect(settingsRepository.get(1)).resolves.toMatchObject({ duration: 6 });
    });

    it('shows the valid values and current setting when the duration is missing', async () => {
      const reply = await controller.setDuration({ userId: 1 });

      expect(reply.split('\n')[0]).toBe('❌ Please specify a duration.');
      expect(reply).toContain('📋 Valid durations for Veo 3.1 models:');
      expect(reply).toContain('  • <code>8</code> seconds (default)');
      expect(reply).toContain('Your current duration: <code>8</code> seconds');
    });

    it('asks for a number when the argument is not one', async () => {
      const reply = await controller.setDuration({ userId: 1, argument: 'eight' });

      expect(reply.split('\n')[0]).toBe('❌ Invalid duration. Please provide a number.');
      await expect(settingsRepository.get(1)).resolves.toMatchObject({ duration: 8 });
    });

    it('rejects durations outside the supported set', async () => {
      await settingsRepository.set(1, { model: 'veo-3.0-generate-001' });

      const reply = await controller.setDuration({ userId: 1, argument: '5' });

      expect(reply.split('\n')[0]).toBe('❌ Invalid duration: <code>5</code> seconds');
      expect(reply).toContain('📋 Valid durations for Veo 3.0 models:');
      await expect(settingsRepository.get(1)).resolves.toMatchObject({ duration: 8 });
    });
  });

  describe('/setresolution', () => {
    it('stores the lower-cased resolution', async () => {
      const reply = await controller.setResolution({ userId: 1, argument: '1080P' });

      expect(reply).toBe('✅ Resolution set to: <code>1080p</code>');
      await expect(settingsRepository.get(1)).resolves.toMatchObject({ resolution: '1080p' });
    });

    it('stores 1080p for a model outside Veo 3 but warns about it', async () => {
      await settingsRepository.set(1, { model: 'legacy-model' });

      const reply = await controller.setResolution({ userId: 1, argument: '1080p' });

      expect(reply.split('\n')[0]).toBe(
        '⚠️ Warning: <code>1080p</code> resolution is only supported by Veo 3 models.'
      );
      expect(reply).toContain('✅ Resolution set to: <code>1080p</code>');
      await expect(settingsRepository.get(1)).resolves.toMatchObject({ resolution: '1080p' });
    });

    it('rejects unknown resolutions', async () => {
      const reply = await controller.setResolution({ userId: 1, argument: '4K' });

      expect(reply.split('\n')[0]).toBe('❌ Invalid resolution: <code>4k</code>');
      await expect(settingsRepository.get(1)).resolves.toMatchObject({ resolution: '720p' });
    });

    it('answers with usage when the resolution is missing', async () => {
      const reply = await controller.setResolution({ userId: 1 });

      expect(reply.split('\n')[0]).toBe('❌ Please specify a resolution.');
    });
  });

  it('resets settings to the defaults', async () => {
    await settingsRepository.set(1, { model: 'veo-3.0-generate-001', duration: 4 });

    await expect(controller.reset({ userId: 1 })).resolves.toBe(buildResetMessage());
    await expect(settingsRepository.get(1)).resolves.toEqual(UserSettingsRepository.defaults(1));
  });

  it('reports ledger statistics', async () => {
    const id = await generationRepository.create({
      userId: 1,
      username: 'alice',
      model: 'veo-3.1-fast-generate-001',
      durationSeconds: 8,
      resolution: '720p',
    });
    await generationRepository.update(id, { status: 'success', cost: 1.2 });

    const reply = await controller.stats();

    expect(reply).toContain('Total Messages: 1\nUnique Users: 1\nSuccessful: 1\nFailed: 0\nTotal Cost: $1.2000');
  });
});
