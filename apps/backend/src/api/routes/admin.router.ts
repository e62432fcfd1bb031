import { Router } from 'express';
import type { StatsController } from '../../modules/stats/api/stats.controller.js';
import { asyncHandler } from '../middleware/async-handler.js';
import { requireAdmin } from '../middleware/admin-auth.js';

export function adminRouter(controller: StatsController, adminToken: string | undefined) {
  const router = Router();

  router.use(requireAdmin(adminToken));
  router.get('/status', asyncHandler(controller.status));
  router.patch('/scheduler/job/:jobName', asyncHandler(controller.updateJob));

  return router;
}
