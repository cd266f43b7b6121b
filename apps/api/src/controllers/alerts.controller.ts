import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { DEFAULT_ALERT_LIMIT } from '@feedgate/domain';
import type { MetricsQueryPort } from '@feedgate/domain';

const listQuerySchema = z.object({
  alertType: z
    .enum(['VALIDATION_ERROR', 'STALE_DATA', 'GEOGRAPHIC_VIOLATION', 'SPEED_VIOLATION'])
    .optional(),
  severity: z.enum(['LOW', 'MEDIUM', 'HIGH', 'CRITICAL']).optional(),
  agencyId: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(DEFAULT_ALERT_LIMIT),
});

export function alertsRouter(metrics: MetricsQueryPort): Router {
  const router = Router();

  /** GET /api/alerts?alertType=&severity=&agencyId=&limit=: newest first */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = listQuerySchema.parse(req.query);
      const items = await metrics.alerts(query);
      res.json({ items, count: items.length });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
