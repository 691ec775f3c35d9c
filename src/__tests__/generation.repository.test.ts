import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createDatabase, type DatabaseConnection } from '@/db/connection';
import { GenerationRepository } from '@/repositories/generation.repository';

const record = (userId: number, model = 'veo-3.1-fast-generate-001') => ({
  userId,
  username: `user${userId}`,
  model,
  durationSeconds: 8,
  resolution: '720p',
});

describe('GenerationRepository', () => {
  let connection: DatabaseConnection;
  let repository: GenerationRepository;

  beforeEach(() => {
    connection = createDatabase(':memory:');
    repository = new GenerationRepository(connection.db);
  });

  afterEach(() => {
    connection.close();
  });

  it('creates pending records with zero cost and tokens', async () => {
    const id = await repository.create(record(5));

    const stored = await repository.findById(id);
    expect(stored).toMatchObject({
      id,
      userId: 5,
      username: 'user5',
      model: 'veo-3.1-fast-generate-001',
      durationSeconds: 8,
      resolution: '720p',
      status: 'pending',
      cost: 0,
      promptTokens: 0,
      outputPromptTokens: 0,
    });
    expect(stored?.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });

  it('assigns increasing ids', async () => {
    const first = await repository.create(record(1));
    const second = await repository.create(record(1));

    expect(second).toBeGreaterThan(first);
  });

  it('update applies only the given fields', async () => {
    const id = await repository.create(record(1));

    await repository.update(id, { status: 'success', cost: 1.2 });

    const stored = await repository.findById(id);
    expect(stored?.status).toBe('success');
    expect(stored?.cost).toBe(1.2);
    expect(stored?.promptTokens).toBe(0);
  });

  it('update without fields leaves the record untouched', async () => {
    const id = await repository.create(record(1));
    const before = await repository.findById(id);

    await repository.update(id, {});

    await expect(repository.findById(id)).resolves.toEqual(before);
  });

  it('findById returns null for unknown ids', async () => {
    await expect(repository.findById(1234)).resolves.toBeNull();
  });

  it('returns zeroed statistics for an empty ledger', async () => {
    await expect(repository.getStats()).resolves.toEqual({
      totalMessages: 0,
      uniqueUsers: 0,
      successfulMessages: 0,
      failedMessages: 0,
      totalCost: 0,
      totalPromptTokens: 0,
      totalOutputPromptTokens: 0,
    });
    await expect(repository.getSuccessfulVideosCount()).resolves.toBe(0);
    await expect(repository.getTotalSuccessfulCost()).resolves.toBe(0);
  });

  it('aggregates statistics across users and statuses', async () => {
    const a = await repository.create(record(1));
    const b = await repository.create(record(1, 'veo-3.1-generate-001'));
    const c = await repository.create(record(2));
    await repository.create(record(3));

    await repository.update(a, { status: 'success', cost: 1.2, promptTokens: 10, outputPromptTokens: 5 });
    await repository.update(b, { status: 'success', cost: 3.2 });
    await repository.update(c, { status: 'failed' });

    const stats = await repository.getStats();
    expect(stats).toMatchObject({
      totalMessages: 4,
      uniqueUsers: 3,
      successfulMessages: 2,
      failedMessages: 1,
      totalPromptTokens: 10,
      totalOutputPromptTokens: 5,
    });
    expect(stats.totalCost).toBeCloseTo(4.4);
    await expect(repository.getSuccessfulVideosCount()).resolves.toBe(2);
    await expect(repository.getTotalSuccessfulCost()).resolves.toBeCloseTo(4.4);
  });

  it('leaves pending and failed records out of the success totals', async () => {
    const id = await repository.create(record(1));
    await repository.update(id, { status: 'failed', cost: 0 });
    await repository.create(record(2));

    await expect(repository.getSuccessfulVideosCount()).resolves.toBe(0);
    await expect(repository.getTotalSuccessfulCost()).resolves.toBe(0);
  });
});
