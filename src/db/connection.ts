import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema';
import { logger } from '@/lib/logger';

export type AppDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseConnection {
  db: AppDatabase;
  sqlite: Database.Database;
  close: () => void;
}

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS user_settings (
    user_id INTEGER PRIMARY KEY,
    model TEXT NOT NULL,
    duration INTEGER NOT NULL,
    resolution TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS messages (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id INTEGER NOT NULL,
    username TEXT,
    timestamp TEXT NOT NULL,
    prompt_tokens INTEGER NOT NULL DEFAULT 0,
    output_prompt_tokens INTEGER NOT NULL DEFAULT 0,
    model TEXT NOT NULL,
    cost REAL NOT NULL DEFAULT 0.0,
    duration_seconds INTEGER NOT NULL,
    resolution TEXT NOT NULL,
    status TEXT NOT NULL
  );
`;

/**
 * Opens the embedded database file and makes sure both tables exist.
 * Pass ':memory:' for an isolated throwaway database.
 */
export function createDatabase(filename: string): DatabaseConnection {
  const sqlite = new Database(filename);

  if (filename !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
  }
  sqlite.exec(SCHEMA_SQL);

  logger.debug('Database ready', { filename });

  return {
    db: drizzle(sqlite, { schema }),
    sqlite,
    close: () => sqlite.close(),
  };
}
