/**
 * Generation defaults and the closed value sets accepted by the bot commands.
 */
export const VALID_MODELS = [
  'veo-3.1-generate-001',
  'veo-3.1-fast-generate-001',
  'veo-3.1-generate-preview',
  'veo-3.1-fast-generate-preview',
  'veo-3.0-generate-001',
  'veo-3.0-fast-generate-001',
] as const;

export const VALID_DURATIONS = [4, 6, 8] as const;

export const VALID_RESOLUTIONS = ['720p', '1080p'] as const;

export type VeoModel = (typeof VALID_MODELS)[number];
export type VideoDuration = (typeof VALID_DURATIONS)[number];
export type VideoResolution = (typeof VALID_RESOLUTIONS)[number];

export const DEFAULT_MODEL: VeoModel = 'veo-3.1-fast-generate-001';
export const DEFAULT_DURATION: VideoDuration = 8;
export const DEFAULT_RESOLUTION: VideoResolution = '720p';

export const GENERATION_CONFIG = {
  pollIntervalMs: 5_000,
  maxWaitSeconds: 600,
  generateAudio: true,
  sampleCount: 1,
  // USD per generated second
  pricing: {
    fast: 0.15,
    standard: 0.4,
  },
  maxErrorMessageLength: 200,
  maxPromptPreviewLength: 200,
  // Telegram caption limit
  maxCaptionLength: 1024,
  tempFileSuffix: '.mp4',
} as const;
