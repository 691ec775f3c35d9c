import {
  DEFAULT_DURATION,
  DEFAULT_MODEL,
  DEFAULT_RESOLUTION,
  GENERATION_CONFIG,
  VALID_DURATIONS,
  VALID_MODELS,
  VALID_RESOLUTIONS,
} from '@/config/generation.config';
import { escapeHtml, formatCount, formatUsd, truncateMessage } from './text.util';
import type { UsageStats, UserSettings } from '@/interfaces/generation.interface';

// Texts sent in HTML parse mode unless noted otherwise.

const HELP_FOOTER = '💡 Use /help to explore other commands.';

const code = (value: string | number) => `<code>${escapeHtml(String(value))}</code>`;

const bulletList = (values: readonly string[]) => values.map(value => `  • ${code(value)}`).join('\n');

export const STATUS_TEXT = {
  requested: '🎬 Video generation requested...',
  started: '⏳ Video generation started...',
  downloading: '⬇️ Downloading video...',
  uploading: '📤 Uploading video to Telegram...',
} as const;

export const FAILURE_TEXT = {
  emptyPrompt: '❌ Please provide a text prompt for video generation.',
  timedOut: '❌ Video generation timed out. Please try again.',
  noVideos: '❌ No videos were generated.',
  remote: (message: string) =>
    `❌ Video generation failed: ${escapeHtml(truncateMessage(message, GENERATION_CONFIG.maxErrorMessageLength))}`,
  unexpected: (message: string) =>
    `❌ An error occurred: ${escapeHtml(truncateMessage(message, GENERATION_CONFIG.maxErrorMessageLength))}`,
} as const;

export function buildWelcomeMessage(): string {
  return [
    '👋 Welcome to the Video Generation Bot!',
    '',
    "Send me a text prompt and I'll generate a video for you using Google Veo API.",
    '',
    'Use /help to see all available commands.',
  ].join('\n');
}

export function buildHelpMessage(): string {
  return [
    '📖 Available Commands:',
    '',
    '/start - Welcome message',
    '/help - Show this help message',
    '/settings - View current settings',
    '/setmodel [model] - Set Veo model',
    '/setduration [seconds] - Set video duration',
    '/setresolution [resolution] - Set video resolution',
    '/reset - Reset settings to defaults',
    '/stats - View usage statistics',
    '',
    '💡 Usage:',
    "Just send me a text prompt and I'll generate a video for you!",
    '',
    `Example: ${code('A beautiful sunset over the ocean')}`,
  ].join('\n');
}

export function buildSettingsMessage(settings: UserSettings): string {
  return [
    '⚙️ Your Current Settings:',
    '',
    `Model: ${code(settings.model)}`,
    `Duration: ${code(settings.duration)} seconds`,
    `Resolution: ${code(settings.resolution)}`,
    '',
    'Use /setmodel to change the model.',
    'Use /setduration to change the duration.',
    'Use /setresolution to change the resolution.',
    'Use /reset to restore defaults.',
  ].join('\n');
}

function modelListing(): string {
  const veo31 = VALID_MODELS.filter(model => model.includes('veo-3.1'));
  const veo30 = VALID_MODELS.filter(model => model.includes('veo-3.0'));
  return [
    '📋 Available models (Veo 3.0 and 3.1 only):',
    '',
    '<b>Veo 3.1 models:</b>',
    bulletList(veo31),
    '',
    '<b>Veo 3.0 models:</b>',
    bulletList(veo30),
  ].join('\n');
}

export const MODEL_TEXT = {
  missing: () =>
    [
      '❌ Please specify a model.',
      '',
      'Usage: /setmodel [model]',
      '',
      'Example:',
      code('/setmodel veo-3.1-generate-001'),
      '',
      modelListing(),
      '',
      HELP_FOOTER,
    ].join('\n'),
  invalid: (model: string) =>
    [`❌ Invalid model: ${code(model)}`, '', modelListing(), '', HELP_FOOTER].join('\n'),
  updated: (model: string) => `✅ Model set to: ${code(model)}`,
};

function durationListing(modelFamily: string, markDefault = false): string {
  const lines = VALID_DURATIONS.map(duration => {
    const suffix = markDefault && duration === DEFAULT_DURATION ? ' (default)' : '';
    return `  • ${code(duration)} seconds${suffix}`;
  });
  return [`📋 Valid durations for ${modelFamily} models:`, ...lines].join('\n');
}

export const DURATION_TEXT = {
  missing: (settings: UserSettings, modelFamily: string) =>
    [
      '❌ Please specify a duration.',
      '',
      'Usage: /setduration [seconds]',
      '',
      'Example:',
      code('/setduration 8'),
      '',
      durationListing(modelFamily, true),
      '',
      `Your current model: ${code(settings.model)}`,
      `Your current duration: ${code(settings.duration)} seconds`,
      '',
      HELP_FOOTER,
    ].join('\n'),
  notANumber: (modelFamily: string) =>
    [
      '❌ Invalid duration. Please provide a number.',
      '',
      'Usage: /setduration [seconds]',
      '',
      durationListing(modelFamily),
      '',
      HELP_FOOTER,
    ].join('\n'),
  invalid: (duration: number, settings: UserSettings, modelFamily: string) =>
    [
      `❌ Invalid duration: ${code(duration)} seconds`,
      '',
      durationListing(modelFamily),
      '',
      `Your current model: ${code(settings.model)}`,
      '',
      HELP_FOOTER,
    ].join('\n'),
  updated: (duration: number, model: string) =>
    [
      `✅ Duration set to: ${code(duration)} seconds`,
      '',
      `Model: ${code(model)}`,
      `Duration: ${code(duration)} seconds`,
    ].join('\n'),
};

export const RESOLUTION_TEXT = {
  missing: () =>
    [
      '❌ Please specify a resolution.',
      '',
      'Usage: /setresolution [resolution]',
      '',
      'Example:',
      code('/setresolution 1080p'),
      '',
      'Valid resolutions:',
      ...VALID_RESOLUTIONS.map(
        resolution => `- ${code(resolution)}${resolution === DEFAULT_RESOLUTION ? ' (default)' : ''}`
      ),
      '',
      HELP_FOOTER,
    ].join('\n'),
  invalid: (resolution: string) =>
    [
      `❌ Invalid resolution: ${code(resolution)}`,
      '',
      'Please use one of the supported resolutions:',
      ...VALID_RESOLUTIONS.map(value => `- ${code(value)}`),
      '',
      HELP_FOOTER,
    ].join('\n'),
  updated: (resolution: string) => `✅ Resolution set to: ${code(resolution)}`,
  unsupportedByModel: (resolution: string, model: string) =>
    [
      `⚠️ Warning: ${code('1080p')} resolution is only supported by Veo 3 models.`,
      `Your current model is: ${code(model)}`,
      '',
      `✅ Resolution set to: ${code(resolution)}`,
      `Consider using a Veo 3 model (e.g., ${code('/setmodel veo-3.1-generate-001')}) for 1080p support.`,
    ].join('\n'),
};

export function buildResetMessage(): string {
  return [
    '✅ Settings reset to defaults:',
    '',
    `Model: ${code(DEFAULT_MODEL)}`,
    `Duration: ${code(DEFAULT_DURATION)} seconds`,
    `Resolution: ${code(DEFAULT_RESOLUTION)}`,
  ].join('\n');
}

export function buildStatsMessage(stats: UsageStats): string {
  return [
    '📊 Usage Statistics:',
    '',
    `Total Messages: ${stats.totalMessages}`,
    `Unique Users: ${stats.uniqueUsers}`,
    `Successful: ${stats.successfulMessages}`,
    `Failed: ${stats.failedMessages}`,
    `Total Cost: ${formatUsd(stats.totalCost, 4)}`,
    `Total Prompt Tokens: ${formatCount(stats.totalPromptTokens)}`,
    `Total Output Tokens: ${formatCount(stats.totalOutputPromptTokens)}`,
  ].join('\n');
}

export function buildQuotaExceededMessage(limit: number, used: number, totalCost: number): string {
  return [
    '❌ <b>Quota Limit Reached</b>',
    '',
    `The global limit of <b>${limit} videos</b> has been reached.`,
    '',
    '📊 Stats:',
    `  • Total videos generated: ${used}`,
    `  • Total cost: <b>${formatUsd(totalCost)} USD</b>`,
    `  • Remaining quota: ${Math.max(0, limit - used)} videos`,
    '',
    'The service is temporarily unavailable. Please try again later.',
  ].join('\n');
}

export interface VideoCaptionData {
  prompt: string;
  settings: UserSettings;
  elapsed: string;
  generateAudio: boolean;
  filteredCount: number;
  cost: number;
  pricePerSecond: number;
}

/**
 * Caption attached to the delivered video. Plain text, no parse mode.
 */
export function buildVideoCaption(data: VideoCaptionData): string {
  const lines = [
    `✅ Video generated! (Time: ${data.elapsed})`,
    '',
    `📝 Prompt: ${truncateMessage(data.prompt, GENERATION_CONFIG.maxPromptPreviewLength)}`,
    '',
    '⚙️ Settings:',
    `  • Model: ${data.settings.model}`,
    `  • Duration: ${data.settings.duration}s`,
    `  • Resolution: ${data.settings.resolution}`,
    `  • Audio: ${data.generateAudio ? 'Yes' : 'No'}`,
  ];

  if (data.filteredCount > 0) {
    lines.push(`  • Filtered videos: ${data.filteredCount}`);
  }

  lines.push(
    '',
    '💰 Cost:',
    `  • ${formatUsd(data.cost)} USD (${data.settings.duration}s × ${formatUsd(data.pricePerSecond)}/s)`
  );

  return truncateMessage(lines.join('\n'), GENERATION_CONFIG.maxCaptionLength - 3);
}
