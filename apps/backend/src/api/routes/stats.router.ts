import { Router } from 'express';
import type { StatsController } from '../../modules/stats/api/stats.controller.js';
import { asyncHandler } from '../middleware/async-handler.js';

export function statsRouter(controller: StatsController) {
  const router = Router();

  router.get('/current', asyncHandler(controller.current));
  router.get('/trend/:entityId', asyncHandler(controller.trend));
  router.get('/top', asyncHandler(controller.top));
  router.get('/trending', asyncHandler(controller.trending));

  return router;
}
