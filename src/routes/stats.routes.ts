import { Router } from 'express';
import { StatsController } from '@/controllers/stats.controller';

export function createStatsRoutes(statsController: StatsController): Router {
  const router = Router();

  /**
   * GET /api/v1/stats
   * Ledger totals and global quota usage
   */
  router.get('/', statsController.getStats.bind(statsController));

  return router;
}
