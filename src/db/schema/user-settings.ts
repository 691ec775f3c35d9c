import { sqliteTable, integer, text } from 'drizzle-orm/sqlite-core';

export const userSettings = sqliteTable('user_settings', {
  userId: integer('user_id').primaryKey(),
  model: text('model').notNull(),
  duration: integer('duration').notNull(),
  resolution: text('resolution').notNull(),
});
