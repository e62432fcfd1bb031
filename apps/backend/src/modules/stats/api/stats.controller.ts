import type { Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import type { ISchedulerService, IStatsService } from '@tubepulse/types';
import { z } from 'zod';
import { NotFoundError } from '../../../lib/errors.js';

const currentSchema = z.object({
  ids: z
    .string()
    .transform(value => value.split(',').map(id => id.trim()).filter(Boolean))
    .pipe(z.array(z.string()).min(1).max(200))
});

const trendParamsSchema = z.object({
  entityId: z.string().min(1)
});

const trendQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(365).default(7)
});

const jobParamsSchema = z.object({
  jobName: z.string().min(1)
});

const jobUpdateSchema = z
  .object({
    schedule: z.string().min(1).optional(),
    enabled: z.boolean().optional()
  })
  .refine(body => body.schedule !== undefined || body.enabled !== undefined, {
    message: 'Provide schedule or enabled'
  });

/**
 * HTTP surface over the stats facade.
 *
 * Stats-domain outcomes (stale, unavailable, no-data) are part of the 200
 * payload; only a trend for an unknown entity maps to 404.
 */
export class StatsController {
  constructor(
    private readonly stats: IStatsService,
    private readonly scheduler: ISchedulerService | null
  ) {}

  current = async (req: Request, res: Response) => {
    const { ids } = currentSchema.parse(req.query);
    const results = await this.stats.getCurrent(ids);
    res.json({ success: true, results });
  };

  trend = async (req: Request, res: Response) => {
    const { entityId } = trendParamsSchema.parse(req.params);
    const { days } = trendQuerySchema.parse(req.query);
    const result = await this.stats.getTrend(entityId, days);

    const status = result.status === 'not-found' ? StatusCodes.NOT_FOUND : StatusCodes.OK;
    res.status(status).json({ success: result.status !== 'not-found', result });
  };

  top = async (req: Request, res: Response) => {
    const { days } = trendQuerySchema.parse(req.query);
    const top = await this.stats.getTopContent(days);
    res.json({ success: true, top });
  };

  trending = async (_req: Request, res: Response) => {
    const result = await this.stats.getTrending();
    res.json({ success: true, result });
  };

  status = async (_req: Request, res: Response) => {
    const status = await this.stats.getStatus();
    res.json({ success: true, status, jobs: this.scheduler?.getAllJobConfigs() ?? [] });
  };

  updateJob = async (req: Request, res: Response) => {
    if (!this.scheduler) {
      throw new NotFoundError('Scheduler is disabled');
    }
    const { jobName } = jobParamsSchema.parse(req.params);
    const updates = jobUpdateSchema.parse(req.body);

    await this.scheduler.updateJobConfig(jobName, { ...updates, updatedBy: 'admin-api' });
    res.json({ success: true, jobs: this.scheduler.getAllJobConfigs() });
  };
}
