import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import {
  DEFAULT_AGGREGATE_LIMIT,
  DEFAULT_HEAT_MAP_GRID_SIZE,
  DEFAULT_NEARBY_RADIUS_METERS,
  DEFAULT_SLOW_ZONE_LIMIT,
  DEFAULT_SLOW_ZONE_THRESHOLD_KMH,
} from '@feedgate/domain';
import type { MetricsQueryPort } from '@feedgate/domain';
import type { TtlCacheStats } from '@feedgate/adapters';
import type { PollerStats } from '../services/poller/feed-poller.js';

const isoDate = z
  .string()
  .datetime({ offset: true })
  .transform((s) => new Date(s));

const aggregateQuerySchema = z.object({
  agencyId: z.string().min(1).optional(),
  routeId: z.string().min(1).optional(),
  from: isoDate.optional(),
  to: isoDate.optional(),
  bucketSeconds: z.coerce.number().int().positive().optional(),
  limit: z.coerce.number().int().min(1).max(5000).default(DEFAULT_AGGREGATE_LIMIT),
});

const latitude = z.coerce.number().min(-90).max(90);
const longitude = z.coerce.number().min(-180).max(180);

const spatialWindow = {
  agencyId: z.string().min(1).optional(),
  from: isoDate.optional(),
  to: isoDate.optional(),
};

const nearbyQuerySchema = z.object({
  latitude,
  longitude,
  radiusMeters: z.coerce.number().positive().max(50_000).default(DEFAULT_NEARBY_RADIUS_METERS),
  ...spatialWindow,
});

const heatMapQuerySchema = z
  .object({
    minLat: latitude,
    maxLat: latitude,
    minLon: longitude,
    maxLon: longitude,
    gridSize: z.coerce.number().int().min(1).max(200).default(DEFAULT_HEAT_MAP_GRID_SIZE),
    ...spatialWindow,
  })
  .refine((q) => q.minLat < q.maxLat && q.minLon < q.maxLon, {
    message: 'bounding box minimum must be below maximum',
  })
  .transform(({ minLat, maxLat, minLon, maxLon, ...rest }) => ({
    ...rest,
    bounds: { minLat, maxLat, minLon, maxLon },
  }));

const slowZoneQuerySchema = z.object({
  speedThresholdKmh: z.coerce.number().positive().default(DEFAULT_SLOW_ZONE_THRESHOLD_KMH),
  minObservations: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(500).default(DEFAULT_SLOW_ZONE_LIMIT),
  ...spatialWindow,
});

export interface MetricsRouterDeps {
  metrics: MetricsQueryPort;
  pollerStats?: () => PollerStats[];
  weatherCacheStats?: () => TtlCacheStats | null;
}

export function metricsRouter(deps: MetricsRouterDeps): Router {
  const router = Router();

  /** GET /api/metrics: per-layer counts and quality rate */
  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await deps.metrics.metrics());
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/metrics/poller */
  router.get('/poller', (_req: Request, res: Response) => {
    res.json({ pollers: deps.pollerStats ? deps.pollerStats() : [] });
  });

  /** GET /api/metrics/weather-cache */
  router.get('/weather-cache', (_req: Request, res: Response) => {
    res.json({ cache: deps.weatherCacheStats ? deps.weatherCacheStats() : null });
  });

  /** GET /api/metrics/hourly?agencyId=&routeId=&from=&to=&bucketSeconds=&limit= */
  router.get('/hourly', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = aggregateQuerySchema.parse(req.query);
      const items = await deps.metrics.hourlyMetrics(query);
      res.json({ items, count: items.length });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/metrics/route-performance?agencyId=&routeId=&from=&to=&limit= */
  router.get('/route-performance', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = aggregateQuerySchema.parse(req.query);
      const items = await deps.metrics.routePerformance(query);
      res.json({ items, count: items.length });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/metrics/nearby?latitude=&longitude=&radiusMeters=&agencyId=&from=&to= */
  router.get('/nearby', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = nearbyQuerySchema.parse(req.query);
      const items = await deps.metrics.vehiclesNear(query);
      res.json({ items, count: items.length });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/metrics/heatmap?minLat=&maxLat=&minLon=&maxLon=&gridSize=&agencyId=&from=&to= */
  router.get('/heatmap', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = heatMapQuerySchema.parse(req.query);
      const items = await deps.metrics.heatMap(query);
      res.json({ items, count: items.length });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/metrics/slow-zones?speedThresholdKmh=&minObservations=&limit=&agencyId=&from=&to= */
  router.get('/slow-zones', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = slowZoneQuerySchema.parse(req.query);
      const items = await deps.metrics.slowZones(query);
      res.json({ items, count: items.length });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
