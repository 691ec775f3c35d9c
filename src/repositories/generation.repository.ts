import { eq, sql } from 'drizzle-orm';
import { messages } from '@/db/schema';
import { BaseRepository } from './base.repository';
import type { NewMessageRow } from '@/types/database';
import type {
  CreateGenerationRecordData,
  GenerationRecord,
  UpdateGenerationRecordData,
  UsageStats,
} from '@/interfaces/generation.interface';

const EMPTY_STATS: UsageStats = {
  totalMessages: 0,
  uniqueUsers: 0,
  successfulMessages: 0,
  failedMessages: 0,
  totalCost: 0,
  totalPromptTokens: 0,
  totalOutputPromptTokens: 0,
};

/**
 * Append-only ledger of generation attempts. Aggregates are computed from the
 * full table on every read.
 */
export class GenerationRepository extends BaseRepository {
  protected tableName = 'messages';

  /**
   * Appends a pending record and returns its id
   */
  async create(data: CreateGenerationRecordData): Promise<number> {
    try {
      const record: NewMessageRow = {
        userId: data.userId,
        username: data.username,
        timestamp: this.getCurrentTimestamp(),
        promptTokens: 0,
        outputPromptTokens: 0,
        model: data.model,
        cost: 0,
        durationSeconds: data.durationSeconds,
        resolution: data.resolution,
        status: 'pending',
      };

      const [inserted] = this.db.transaction(tx =>
        tx.insert(messages).values(record).returning({ id: messages.id }).all()
      );
      if (!inserted) {
        throw new Error('Insert returned no row');
      }

      this.logOperation('create', { id: inserted.id, userId: data.userId, model: data.model });
      return inserted.id;
    } catch (error) {
      return this.handleError(error, 'create generation record');
    }
  }

  /**
   * Applies only the supplied fields. Does nothing when none are given.
   */
  async update(id: number, data: UpdateGenerationRecordData): Promise<void> {
    const changes: Partial<NewMessageRow> = {};

    if (data.status !== undefined) changes.status = data.status;
    if (data.cost !== undefined) changes.cost = data.cost;
    if (data.promptTokens !== undefined) changes.promptTokens = data.promptTokens;
    if (data.outputPromptTokens !== undefined) changes.outputPromptTokens = data.outputPromptTokens;

    if (Object.keys(changes).length === 0) {
      return;
    }

    try {
      this.db.transaction(tx => {
        tx.update(messages).set(changes).where(eq(messages.id, id)).run();
      });
      this.logOperation('update', { id, ...changes });
    } catch (error) {
      this.handleError(error, 'update generation record');
    }
  }

  async findById(id: number): Promise<GenerationRecord | null> {
    const row = this.db.select().from(messages).where(eq(messages.id, id)).get();
    return row ?? null;
  }

  /**
   * Aggregated statistics across all users
   */
  async getStats(): Promise<UsageStats> {
    const row = this.db
      .select({
        totalMessages: sql<number>`count(*)`,
        uniqueUsers: sql<number>`count(distinct ${messages.userId})`,
        successfulMessages: sql<number>`coalesce(sum(case when ${messages.status} = 'success' then 1 else 0 end), 0)`,
        failedMessages: sql<number>`coalesce(sum(case when ${messages.status} = 'failed' then 1 else 0 end), 0)`,
        totalCost: sql<number>`coalesce(sum(${messages.cost}), 0)`,
        totalPromptTokens: sql<number>`coalesce(sum(${messages.promptTokens}), 0)`,
        totalOutputPromptTokens: sql<number>`coalesce(sum(${messages.outputPromptTokens}), 0)`,
      })
      .from(messages)
      .get();

    return row ?? EMPTY_STATS;
  }

  /**
   * Videos generated successfully across all users; drives the global quota
   */
  async getSuccessfulVideosCount(): Promise<number> {
    const row = this.db
      .select({ count: sql<number>`count(*)` })
      .from(messages)
      .where(eq(messages.status, 'success'))
      .get();

    return row?.count ?? 0;
  }

  /**
   * Total cost of all successfully generated videos
   */
  async getTotalSuccessfulCost(): Promise<number> {
    const row = this.db
      .select({ total: sql<number>`coalesce(sum(${messages.cost}), 0)` })
      .from(messages)
      .where(eq(messages.status, 'success'))
      .get();

    return row?.total ?? 0;
  }
}
