import { Router, type Request, type Response } from 'express';
import { asyncHandler } from '../middleware/async-handler.js';

export function telegramRouter(webhook: (req: Request, res: Response) => Promise<void>) {
  const router = Router();

  router.post('/webhook', asyncHandler(webhook));

  return router;
}
