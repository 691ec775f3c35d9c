import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createDatabase, type DatabaseConnection } from '@/db/connection';
import { UserSettingsRepository } from '@/repositories/user-settings.repository';

describe('UserSettingsRepository', () => {
  let connection: DatabaseConnection;
  let repository: UserSettingsRepository;

  beforeEach(() => {
    connection = createDatabase(':memory:');
    repository = new UserSettingsRepository(connection.db);
  });

  afterEach(() => {
    connection.close();
  });

  it('returns defaults for a user without stored settings', async () => {
    await expect(repository.get(42)).resolves.toEqual({
      userId: 42,
      model: 'veo-3.1-fast-generate-001',
      duration: 8,
      resolution: '720p',
    });
  });

  it('merges partial updates onto the current settings', async () => {
    const afterModel = await repository.set(7, { model: 'veo-3.0-generate-001' });
    expect(afterModel).toEqual({ userId: 7, model: 'veo-3.0-generate-001', duration: 8, resolution: '720p' });

    const afterDuration = await repository.set(7, { duration: 4 });
    expect(afterDuration).toEqual({ userId: 7, model: 'veo-3.0-generate-001', duration: 4, resolution: '720p' });

    await expect(repository.get(7)).resolves.toEqual(afterDuration);
  });

  it('stores values as given without validating them', async () => {
    await repository.set(9, { model: 'not-a-model', resolution: '4k' });

    const settings = await repository.get(9);
    expect(settings.model).toBe('not-a-model');
    expect(settings.resolution).toBe('4k');
  });

  it('keeps users apart', async () => {
    await repository.set(1, { duration: 6 });

    await expect(repository.get(2)).resolves.toEqual(UserSettingsRepository.defaults(2));
  });

  it('reset removes stored settings and returns defaults', async () => {
    await repository.set(3, { model: 'veo-3.1-generate-001', duration: 6, resolution: '1080p' });

    await expect(repository.reset(3)).resolves.toEqual(UserSettingsRepository.defaults(3));
    await expect(repository.get(3)).resolves.toEqual(UserSettingsRepository.defaults(3));
  });

  it('reset of a user without settings still returns defaults', async () => {
    await expect(repository.reset(99)).resolves.toEqual(UserSettingsRepository.defaults(99));
  });
});
