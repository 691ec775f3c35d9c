import type { InferSelectModel, InferInsertModel } from 'drizzle-orm';
import type * as schema from '@/db/schema';

// User settings types
export type UserSettingsRow = InferSelectModel<typeof schema.userSettings>;
export type NewUserSettingsRow = InferInsertModel<typeof schema.userSettings>;

// Generation record types
export type MessageRow = InferSelectModel<typeof schema.messages>;
export type NewMessageRow = InferInsertModel<typeof schema.messages>;
