import express, { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { FeedIngestionPort } from '@feedgate/domain';

const FEED_CONTENT_TYPES = ['application/octet-stream', 'application/x-protobuf'];

const feedQuerySchema = z.object({
  agencyId: z.string().min(1),
});

const weatherBodySchema = z.object({
  latitude: z.number().optional(),
  longitude: z.number().optional(),
  temperatureCelsius: z.number().optional(),
  precipitationMm: z.number().optional(),
  windSpeedKmh: z.number().optional(),
  weatherCode: z.number().int().optional(),
  observationTime: z.string().optional(),
  agencyId: z.string().min(1),
});

export function ingestRouter(pipeline: FeedIngestionPort): Router {
  const router = Router();

  /** POST /api/ingest/feed?agencyId=: binary GTFS-Realtime FeedMessage */
  router.post(
    '/feed',
    express.raw({ type: FEED_CONTENT_TYPES, limit: '10mb' }),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { agencyId } = feedQuerySchema.parse(req.query);
        const body: unknown = req.body;
        if (!Buffer.isBuffer(body)) {
          res.status(415).json({
            error: 'unsupported_media_type',
            message: `expected one of ${FEED_CONTENT_TYPES.join(', ')}`,
          });
          return;
        }
        const result = await pipeline.ingestFeed(body, agencyId);
        res.status(202).json(result);
      } catch (err) {
        next(err);
      }
    },
  );

  /** POST /api/ingest/weather: one observation from an external provider */
  router.post('/weather', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const observation = weatherBodySchema.parse(req.body);
      const result = await pipeline.ingestWeather(observation);
      res.status(202).json(result);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
