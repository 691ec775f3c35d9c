import { NextFunction, Request, Response } from 'express';
import { BaseController } from './base.controller';
import { GenerationRepository } from '@/repositories/generation.repository';
import { VideoGenerationService } from '@/services/video-generation.service';

/**
 * Read-only view of the usage ledger for operators
 */
export class StatsController extends BaseController {
  constructor(
    private readonly generationRepository: GenerationRepository,
    private readonly generationService: VideoGenerationService
  ) {
    super();
  }

  async getStats(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const [stats, quota] = await Promise.all([
        this.generationRepository.getStats(),
        this.generationService.getQuotaUsage(),
      ]);
      this.success(res, { ...stats, quota });
    } catch (error) {
      next(error);
    }
  }
}
