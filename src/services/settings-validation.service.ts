import { z } from 'zod';
import { BaseService } from './base.service';
import {
  VALID_DURATIONS,
  VALID_MODELS,
  VALID_RESOLUTIONS,
  type VeoModel,
  type VideoDuration,
  type VideoResolution,
} from '@/config/generation.config';

export type SettingValidationFailure = 'missing' | 'not_a_number' | 'invalid';

export type SettingValidationResult<T> =
  | { success: true; value: T }
  | { success: false; reason: SettingValidationFailure; input?: string };

const argumentSchema = z.string().trim().min(1);

export const modelSchema = z.enum(VALID_MODELS);

const integerSchema = z
  .string()
  .trim()
  .regex(/^[+-]?\d+$/)
  .transform(value => Number.parseInt(value, 10));

export const durationSchema = z
  .number()
  .int()
  .refine((value): value is VideoDuration => VALID_DURATIONS.some(duration => duration === value));

export const resolutionSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(VALID_RESOLUTIONS));

/**
 * Validates chat command arguments before they reach the settings store.
 * The store itself accepts anything; only values passing here are persisted.
 */
export class SettingsValidationService extends BaseService {
  private readArgument(raw: string | undefined): string | undefined {
    const parsed = argumentSchema.safeParse(raw);
    return parsed.success ? parsed.data : undefined;
  }

  validateModel(raw: string | undefined): SettingValidationResult<VeoModel> {
    const input = this.readArgument(raw);
    if (input === undefined) {
      return { success: false, reason: 'missing' };
    }

    const parsed = modelSchema.safeParse(input);
    if (!parsed.success) {
      this.logger.debug('Rejected model setting', { input });
      return { success: false, reason: 'invalid', input };
    }
    return { success: true, value: parsed.data };
  }

  /**
   * Accepts an integer number of seconds from the closed duration set
   */
  validateDuration(raw: string | undefined): SettingValidationResult<VideoDuration> {
    const input = this.readArgument(raw);
    if (input === undefined) {
      return { success: false, reason: 'missing' };
    }

    const number = integerSchema.safeParse(input);
    if (!number.success) {
      return { success: false, reason: 'not_a_number', input };
    }

    const parsed = durationSchema.safeParse(number.data);
    if (!parsed.success) {
      this.logger.debug('Rejected duration setting', { input });
      return { success: false, reason: 'invalid', input: String(number.data) };
    }
    return { success: true, value: parsed.data };
  }

  /**
   * Resolution names are matched case-insensitively and stored lower-cased
   */
  validateResolution(raw: string | undefined): SettingValidationResult<VideoResolution> {
    const input = this.readArgument(raw);
    if (input === undefined) {
      return { success: false, reason: 'missing' };
    }

    const parsed = resolutionSchema.safeParse(input);
    if (!parsed.success) {
      this.logger.debug('Rejected resolution setting', { input });
      return { success: false, reason: 'invalid', input: input.toLowerCase() };
    }
    return { success: true, value: parsed.data };
  }
}
