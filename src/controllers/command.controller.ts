import { logger } from '@/lib/logger';
import { UserSettingsRepository } from '@/repositories/user-settings.repository';
import { GenerationRepository } from '@/repositories/generation.repository';
import { SettingsValidationService } from '@/services/settings-validation.service';
import { getModelFamily, isVeo3Model } from '@/utils/model.util';
import {
  DURATION_TEXT,
  MODEL_TEXT,
  RESOLUTION_TEXT,
  buildHelpMessage,
  buildResetMessage,
  buildSettingsMessage,
  buildStatsMessage,
  buildWelcomeMessage,
} from '@/utils/messages.util';

export interface CommandRequest {
  userId: number;
  argument?: string;
}

/**
 * Chat commands. Each handler returns the HTML reply to send back.
 */
export class CommandController {
  constructor(
    private readonly settingsRepository: UserSettingsRepository,
    private readonly generationRepository: GenerationRepository,
    private readonly validation: SettingsValidationService = new SettingsValidationService()
  ) {}

  start(): string {
    return buildWelcomeMessage();
  }

  help(): string {
    return buildHelpMessage();
  }

  async settings({ userId }: CommandRequest): Promise<string> {
    const settings = await this.settingsRepository.get(userId);
    return buildSettingsMessage(settings);
  }

  async setModel({ userId, argument }: CommandRequest): Promise<string> {
    const result = this.validation.validateModel(argument);
    if (!result.success) {
      return result.reason === 'missing' ? MODEL_TEXT.missing() : MODEL_TEXT.invalid(result.input ?? '');
    }

    await this.settingsRepository.set(userId, { model: result.value });
    logger.info('User model updated', { userId, model: result.value });
    return MODEL_TEXT.updated(result.value);
  }

  async setDuration({ userId, argument }: CommandRequest): Promise<string> {
    const current = await this.settingsRepository.get(userId);
    const family = getModelFamily(current.model);
    const result = this.validation.validateDuration(argument);

    if (!result.success) {
      switch (result.reason) {
        case 'missing':
          return DURATION_TEXT.missing(current, family);
        case 'not_a_number':
          return DURATION_TEXT.notANumber(family);
        case 'invalid':
          return DURATION_TEXT.invalid(Number(result.input), current, family);
      }
    }

    const updated = await this.settingsRepository.set(userId, { duration: result.value });
    logger.info('User duration updated', { userId, duration: result.value });
    return DURATION_TEXT.updated(result.value, updated.model);
  }

  /**
   * 1080p is stored for any model; non Veo 3 models get a warning alongside
   */
  async setResolution({ userId, argument }: CommandRequest): Promise<string> {
    const result = this.validation.validateResolution(argument);
    if (!result.success) {
      return result.reason === 'missing'
        ? RESOLUTION_TEXT.missing()
        : RESOLUTION_TEXT.invalid(result.input ?? '');
    }

    const updated = await this.settingsRepository.set(userId, { resolution: result.value });
    logger.info('User resolution updated', { userId, resolution: result.value });

    if (result.value === '1080p' && !isVeo3Model(updated.model)) {
      return RESOLUTION_TEXT.unsupportedByModel(result.value, updated.model);
    }
    return RESOLUTION_TEXT.updated(result.value);
  }

  async reset({ userId }: CommandRequest): Promise<string> {
    await this.settingsRepository.reset(userId);
    logger.info('User settings reset', { userId });
    return buildResetMessage();
  }

  async stats(): Promise<string> {
    const stats = await this.generationRepository.getStats();
    return buildStatsMessage(stats);
  }
}
