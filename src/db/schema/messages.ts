import { sqliteTable, integer, text, real } from 'drizzle-orm/sqlite-core';

export const generationStatuses = ['pending', 'success', 'failed'] as const;

// One row per generation attempt. Rows are never deleted.
export const messages = sqliteTable('messages', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  userId: integer('user_id').notNull(),
  username: text('username'),
  timestamp: text('timestamp').notNull(), // ISO-8601 UTC
  promptTokens: integer('prompt_tokens').notNull().default(0),
  outputPromptTokens: integer('output_prompt_tokens').notNull().default(0),
  model: text('model').notNull(),
  cost: real('cost').notNull().default(0),
  durationSeconds: integer('duration_seconds').notNull(),
  resolution: text('resolution').notNull(),
  status: text('status', { enum: generationStatuses }).notNull(),
});
