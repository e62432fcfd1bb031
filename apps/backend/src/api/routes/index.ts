import { Router, type Request, type Response } from 'express';
import type { StatsController } from '../../modules/stats/api/stats.controller.js';
import { adminRouter } from './admin.router.js';
import { statsRouter } from './stats.router.js';
import { telegramRouter } from './telegram.router.js';

export interface ApiRouterDependencies {
  statsController: StatsController;
  telegramWebhook: (req: Request, res: Response) => Promise<void>;
  adminToken: string | undefined;
}

/**
 * Create the API router. Handlers are built once in bootstrap and injected
 * here so every route shares the same service instances.
 */
export function createApiRouter(deps: ApiRouterDependencies) {
  const router = Router();

  router.use('/stats', statsRouter(deps.statsController));
  router.use('/telegram', telegramRouter(deps.telegramWebhook));
  router.use('/admin', adminRouter(deps.statsController, deps.adminToken));

  return router;
}
