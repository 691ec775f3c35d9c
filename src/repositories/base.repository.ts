import { logger } from '@/lib/logger';
import type { AppDatabase } from '@/db/connection';

/**
 * Base repository class with common utilities.
 * Repositories receive the database handle instead of importing a global one,
 * so each test can run against its own in-memory database.
 */
export abstract class BaseRepository {
  protected abstract tableName: string;

  constructor(protected readonly db: AppDatabase) {}

  /**
   * Log repository operation
   */
  protected logOperation(operation: string, metadata: Record<string, unknown> = {}): void {
    logger.debug(`Repository operation: ${operation}`, {
      repository: this.constructor.name,
      table: this.tableName,
      operation,
      ...metadata,
    });
  }

  /**
   * Log and rethrow a repository failure with the operation name attached
   */
  protected handleError(error: unknown, operation: string): never {
    const message = error instanceof Error ? error.message : String(error);

    logger.error(`${this.constructor.name}.${operation} failed`, {
      repository: this.constructor.name,
      table: this.tableName,
      error: message,
    });

    throw new Error(`Failed to ${operation}: ${message}`);
  }

  /**
   * Get current timestamp as an ISO-8601 UTC string
   */
  protected getCurrentTimestamp(): string {
    return new Date().toISOString();
  }
}
