import { logger } from '@/lib/logger';
import { getErrorMessage } from '@/lib/errors';
import type {
  GenerationOutcome,
  PromptRequest,
  VideoGenerationService,
} from '@/services/video-generation.service';
import type { DeliveryChannel } from '@/interfaces/delivery-channel.interface';

export type PromptHandler = Pick<VideoGenerationService, 'handlePrompt'>;

/**
 * Free text messages. Each prompt runs its own pipeline in the background so
 * the update loop keeps serving other chats while videos are generated.
 */
export class PromptController {
  private readonly inFlight = new Set<Promise<GenerationOutcome | null>>();

  constructor(private readonly generationService: PromptHandler) {}

  /**
   * Starts the pipeline without waiting for it. Errors are logged here.
   */
  dispatch(request: PromptRequest, channel: DeliveryChannel): Promise<GenerationOutcome | null> {
    logger.info('Prompt received', {
      userId: request.userId,
      username: request.username,
      promptLength: request.prompt.length,
    });

    const task = this.generationService
      .handlePrompt(request, channel)
      .catch((error: unknown) => {
        logger.error('Prompt pipeline crashed', {
          userId: request.userId,
          error: getErrorMessage(error),
          stack: error instanceof Error ? error.stack : undefined,
        });
        return null;
      })
      .finally(() => {
        this.inFlight.delete(task);
      });

    this.inFlight.add(task);
    return task;
  }

  get pendingCount(): number {
    return this.inFlight.size;
  }

  /**
   * Resolves once every running pipeline has settled
   */
  async waitForIdle(): Promise<void> {
    await Promise.allSettled([...this.inFlight]);
  }
}
