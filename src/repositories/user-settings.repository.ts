import { eq } from 'drizzle-orm';
import { userSettings } from '@/db/schema';
import { BaseRepository } from './base.repository';
import {
  DEFAULT_DURATION,
  DEFAULT_MODEL,
  DEFAULT_RESOLUTION,
} from '@/config/generation.config';
import type { UserSettings, UserSettingsUpdate } from '@/interfaces/generation.interface';

/**
 * Per-user generation settings. Values are stored as given; the command layer
 * validates them before they get here.
 */
export class UserSettingsRepository extends BaseRepository {
  protected tableName = 'user_settings';

  static defaults(userId: number): UserSettings {
    return {
      userId,
      model: DEFAULT_MODEL,
      duration: DEFAULT_DURATION,
      resolution: DEFAULT_RESOLUTION,
    };
  }

  /**
   * Stored settings for the user, or the defaults when none were saved
   */
  async get(userId: number): Promise<UserSettings> {
    const row = this.db.select().from(userSettings).where(eq(userSettings.userId, userId)).get();
    return row ?? UserSettingsRepository.defaults(userId);
  }

  /**
   * Merges the given fields onto the current settings and saves the result
   */
  async set(userId: number, update: UserSettingsUpdate): Promise<UserSettings> {
    try {
      const merged = this.db.transaction(tx => {
        const current =
          tx.select().from(userSettings).where(eq(userSettings.userId, userId)).get() ??
          UserSettingsRepository.defaults(userId);

        const next: UserSettings = {
          userId,
          model: update.model ?? current.model,
          duration: update.duration ?? current.duration,
          resolution: update.resolution ?? current.resolution,
        };

        tx.insert(userSettings)
          .values(next)
          .onConflictDoUpdate({
            target: userSettings.userId,
            set: { model: next.model, duration: next.duration, resolution: next.resolution },
          })
          .run();

        return next;
      });

      this.logOperation('set', { userId, fields: Object.keys(update) });
      return merged;
    } catch (error) {
      return this.handleError(error, 'set user settings');
    }
  }

  /**
   * Removes stored settings so the defaults apply again
   */
  async reset(userId: number): Promise<UserSettings> {
    try {
      this.db.transaction(tx => {
        tx.delete(userSettings).where(eq(userSettings.userId, userId)).run();
      });
      this.logOperation('reset', { userId });
      return UserSettingsRepository.defaults(userId);
    } catch (error) {
      return this.handleError(error, 'reset user settings');
    }
  }
}
