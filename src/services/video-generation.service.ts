import { BaseService } from './base.service';
import { TempStorageService } from './temp-storage.service';
import { GENERATION_CONFIG } from '@/config/generation.config';
import {
  AppError,
  EmptyResultError,
  GenerationTimeoutError,
  QuotaExceededError,
  RemoteGenerationError,
  getErrorMessage,
} from '@/lib/errors';
import { UserSettingsRepository } from '@/repositories/user-settings.repository';
import { GenerationRepository } from '@/repositories/generation.repository';
import { calculateCost, getPricePerSecond } from '@/utils/model.util';
import { formatElapsed } from '@/utils/text.util';
import {
  FAILURE_TEXT,
  STATUS_TEXT,
  buildQuotaExceededMessage,
  buildVideoCaption,
} from '@/utils/messages.util';
import type { IVideoGenerationClient } from '@/interfaces/video-generation-client.interface';
import type { DeliveryChannel, StatusMessage } from '@/interfaces/delivery-channel.interface';
import type { PollResult, VideoDescriptor } from '@/interfaces/generation.interface';

export interface PromptRequest {
  userId: number;
  username: string | null;
  prompt: string;
}

export type GenerationFailureReason = AppError['code'] | 'UNEXPECTED';

export type GenerationOutcome =
  | { status: 'rejected'; reason: 'EMPTY_PROMPT' }
  | { status: 'quota_exceeded'; used: number; limit: number }
  | { status: 'failed'; recordId: number; reason: GenerationFailureReason; message: string }
  | { status: 'success'; recordId: number; cost: number };

export interface VideoGenerationDependencies {
  settingsRepository: UserSettingsRepository;
  generationRepository: GenerationRepository;
  client: IVideoGenerationClient;
  tempStorage: TempStorageService;
  quotaLimit: number;
  maxWaitSeconds?: number;
  now?: () => number;
}

/**
 * Runs one prompt end to end: quota check, ledger record, submit, poll,
 * download, delivery and the final ledger update.
 *
 * Every failure after the ledger record exists is turned into a failed record
 * and a short message to the user; nothing is thrown past `handlePrompt`
 * except errors raised before that point.
 */
export class VideoGenerationService extends BaseService {
  private readonly settingsRepository: UserSettingsRepository;
  private readonly generationRepository: GenerationRepository;
  private readonly client: IVideoGenerationClient;
  private readonly tempStorage: TempStorageService;
  private readonly quotaLimit: number;
  private readonly maxWaitSeconds: number;
  private readonly now: () => number;

  constructor(deps: VideoGenerationDependencies) {
    super();
    this.settingsRepository = deps.settingsRepository;
    this.generationRepository = deps.generationRepository;
    this.client = deps.client;
    this.tempStorage = deps.tempStorage;
    this.quotaLimit = deps.quotaLimit;
    this.maxWaitSeconds = deps.maxWaitSeconds ?? GENERATION_CONFIG.maxWaitSeconds;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Throws QuotaExceededError once the global success count reaches the limit.
   * The count only grows, so once reached every later request is rejected.
   */
  async assertWithinQuota(): Promise<void> {
    const used = await this.generationRepository.getSuccessfulVideosCount();
    if (used >= this.quotaLimit) {
      throw new QuotaExceededError(this.quotaLimit, used);
    }
  }

  async getQuotaUsage(): Promise<{ used: number; limit: number; remaining: number }> {
    const used = await this.generationRepository.getSuccessfulVideosCount();
    return { used, limit: this.quotaLimit, remaining: Math.max(0, this.quotaLimit - used) };
  }

  /**
   * Maps a poll result to its videos, or throws the matching failure
   */
  private assertCompleted(result: PollResult): VideoDescriptor[] {
    if (!result.done) {
      throw new GenerationTimeoutError(result.error ?? undefined);
    }
    if (result.error) {
      throw new RemoteGenerationError(result.error);
    }
    if (result.videos.length === 0) {
      throw new EmptyResultError();
    }
    return result.videos;
  }

  private describeFailure(error: unknown): string {
    if (error instanceof GenerationTimeoutError) return FAILURE_TEXT.timedOut;
    if (error instanceof EmptyResultError) return FAILURE_TEXT.noVideos;
    if (error instanceof RemoteGenerationError) return FAILURE_TEXT.remote(error.message);
    return FAILURE_TEXT.unexpected(getErrorMessage(error));
  }

  async handlePrompt(request: PromptRequest, channel: DeliveryChannel): Promise<GenerationOutcome> {
    const prompt = request.prompt.trim();
    if (!prompt) {
      await channel.sendMessage(FAILURE_TEXT.emptyPrompt);
      return { status: 'rejected', reason: 'EMPTY_PROMPT' };
    }

    try {
      await this.assertWithinQuota();
    } catch (error) {
      if (!(error instanceof QuotaExceededError)) {
        throw error;
      }
      this.logger.warn('Global video quota reached', { userId: request.userId, used: error.used, limit: error.limit });
      const totalCost = await this.generationRepository.getTotalSuccessfulCost();
      await channel.sendMessage(buildQuotaExceededMessage(error.limit, error.used, totalCost));
      return { status: 'quota_exceeded', used: error.used, limit: error.limit };
    }

    const settings = await this.settingsRepository.get(request.userId);
    const recordId = await this.generationRepository.create({
      userId: request.userId,
      username: request.username,
      model: settings.model,
      durationSeconds: settings.duration,
      resolution: settings.resolution,
    });

    this.logOperation('Video generation accepted', {
      recordId,
      userId: request.userId,
      model: settings.model,
      duration: settings.duration,
      resolution: settings.resolution,
    });

    let status: StatusMessage | null = null;

    try {
      status = await channel.sendStatus(STATUS_TEXT.requested);
      const startedAt = this.now();

      const job = await this.client.submit({
        prompt,
        model: settings.model,
        durationSeconds: settings.duration,
        resolution: settings.resolution,
        generateAudio: GENERATION_CONFIG.generateAudio,
        sampleCount: GENERATION_CONFIG.sampleCount,
      });

      await status.edit(STATUS_TEXT.started);

      const pollResult = await this.client.poll(job.operationName, settings.model, this.maxWaitSeconds);
      const videos = this.assertCompleted(pollResult);

      const elapsed = formatElapsed(this.now() - startedAt);
      const cost = calculateCost(settings.model, settings.duration);

      // Only the first sample is delivered
      const [video] = videos;
      if (!video) {
        throw new EmptyResultError();
      }

      await status.edit(STATUS_TEXT.downloading);
      const bytes = await this.client.fetchVideo(video);

      await status.edit(STATUS_TEXT.uploading);
      const caption = buildVideoCaption({
        prompt,
        settings,
        elapsed,
        generateAudio: GENERATION_CONFIG.generateAudio,
        filteredCount: pollResult.raiMediaFilteredCount,
        cost,
        pricePerSecond: getPricePerSecond(settings.model),
      });

      await this.tempStorage.withTempFile(bytes, filePath => channel.sendVideo(filePath, caption));

      await this.generationRepository.update(recordId, { status: 'success', cost });
      this.logOperation('Video generation succeeded', { recordId, cost, elapsed });

      await this.removeStatus(status);
      return { status: 'success', recordId, cost };
    } catch (error) {
      return this.fail(recordId, error, channel, status);
    }
  }

  private async fail(
    recordId: number,
    error: unknown,
    channel: DeliveryChannel,
    status: StatusMessage | null
  ): Promise<GenerationOutcome> {
    const reason: GenerationFailureReason = error instanceof AppError ? error.code : 'UNEXPECTED';
    const message = this.describeFailure(error);

    this.logger.error('Video generation failed', {
      recordId,
      reason,
      error: getErrorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });

    try {
      await this.generationRepository.update(recordId, { status: 'failed' });
    } catch (updateError) {
      this.logger.error('Failed to mark generation record as failed', {
        recordId,
        error: getErrorMessage(updateError),
      });
    }

    try {
      if (status) {
        await status.edit(message);
      } else {
        await channel.sendMessage(message);
      }
    } catch (notifyError) {
      this.logger.error('Failed to notify user about failed generation', {
        recordId,
        error: getErrorMessage(notifyError),
      });
    }

    return { status: 'failed', recordId, reason, message };
  }

  private async removeStatus(status: StatusMessage): Promise<void> {
    try {
      await status.delete();
    } catch (error) {
      this.logger.warn('Failed to delete status message', { error: getErrorMessage(error) });
    }
  }
}
