import type { generationStatuses } from '@/db/schema';

/**
 * Per-user generation settings. Values are whatever the command layer stored,
 * so they are typed as plain strings/numbers here.
 */
export interface UserSettings {
  userId: number;
  model: string;
  duration: number;
  resolution: string;
}

export type UserSettingsUpdate = Partial<Pick<UserSettings, 'model' | 'duration' | 'resolution'>>;

export type GenerationStatus = (typeof generationStatuses)[number];

export interface GenerationRecord {
  id: number;
  userId: number;
  username: string | null;
  timestamp: string;
  promptTokens: number;
  outputPromptTokens: number;
  model: string;
  cost: number;
  durationSeconds: number;
  resolution: string;
  status: GenerationStatus;
}

export interface CreateGenerationRecordData {
  userId: number;
  username: string | null;
  model: string;
  durationSeconds: number;
  resolution: string;
}

export interface UpdateGenerationRecordData {
  status?: GenerationStatus;
  cost?: number;
  promptTokens?: number;
  outputPromptTokens?: number;
}

export interface UsageStats {
  totalMessages: number;
  uniqueUsers: number;
  successfulMessages: number;
  failedMessages: number;
  totalCost: number;
  totalPromptTokens: number;
  totalOutputPromptTokens: number;
}

/**
 * A generated video as returned by the service: either a Cloud Storage
 * reference or the inline base64 payload.
 */
export interface VideoDescriptor {
  gcsUri?: string;
  bytesBase64Encoded?: string;
  mimeType?: string;
}

export interface VideoGenerationRequest {
  prompt: string;
  model: string;
  durationSeconds: number;
  resolution: string;
  generateAudio: boolean;
  sampleCount: number;
}

/** Handle of an in-flight long running operation */
export interface GenerationJob {
  operationName: string;
  model: string;
}

export interface PollResult {
  done: boolean;
  videos: VideoDescriptor[];
  raiMediaFilteredCount: number;
  error: string | null;
}
