import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { LayerMaintenancePort } from '@feedgate/domain';

const aggregateBodySchema = z.object({
  bucketSeconds: z.number().int().positive().optional(),
});

export function layersRouter(layers: LayerMaintenancePort): Router {
  const router = Router();

  /** POST /api/layers/promote: raw → validated */
  router.post('/promote', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await layers.promote());
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/layers/aggregate: validated → vehicle metrics and route performance */
  router.post('/aggregate', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { bucketSeconds } = aggregateBodySchema.parse(req.body ?? {});
      const vehicleMetrics = await layers.aggregateWindow(bucketSeconds);
      const routePerformance = await layers.aggregateRoutePerformance();
      res.json({ vehicleMetrics, routePerformance });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
