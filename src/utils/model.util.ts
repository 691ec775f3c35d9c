import { GENERATION_CONFIG } from '@/config/generation.config';

/**
 * Model-name heuristics used for pricing and command replies.
 *
 * Classification is by substring on the model id. A name that matches none of
 * the known markers is priced as a standard model.
 */

/** True when the model id contains "fast" in any letter case */
export function isFastModel(model: string): boolean {
  return model.toLowerCase().includes('fast');
}

/** True for any Veo 3.x model id */
export function isVeo3Model(model: string): boolean {
  return model.includes('veo-3');
}

export function getModelFamily(model: string): 'Veo 3.0' | 'Veo 3.1' | 'Veo 3' {
  if (model.includes('veo-3.0')) return 'Veo 3.0';
  if (model.includes('veo-3.1')) return 'Veo 3.1';
  return 'Veo 3';
}

/** USD per generated second */
export function getPricePerSecond(model: string): number {
  return isFastModel(model) ? GENERATION_CONFIG.pricing.fast : GENERATION_CONFIG.pricing.standard;
}

/**
 * Cost in USD of one video, rounded to cents
 */
export function calculateCost(model: string, durationSeconds: number): number {
  return Math.round(getPricePerSecond(model) * durationSeconds * 100) / 100;
}
