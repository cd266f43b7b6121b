import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { createServer } from 'http';
import type { Server } from 'http';
import type { FeedIngestionPort, LayerMaintenancePort, MetricsQueryPort } from '@feedgate/domain';
import type { TtlCacheStats } from '@feedgate/adapters';

import { ingestRouter } from './controllers/ingest.controller.js';
import { layersRouter } from './controllers/layers.controller.js';
import { metricsRouter } from './controllers/metrics.controller.js';
import { alertsRouter } from './controllers/alerts.controller.js';
import { WsGateway } from './ws/ws-gateway.js';
import { errorHandler } from './middleware/error-handler.js';
import type { PollerStats } from './services/poller/feed-poller.js';

export interface ApiDeps {
  pipeline: FeedIngestionPort;
  layers: LayerMaintenancePort;
  metrics: MetricsQueryPort;
  pollerStats?: () => PollerStats[];
  weatherCacheStats?: () => TtlCacheStats | null;
  storageDriver?: string;
  corsOrigin?: string;
  /** Access logging; off in tests. */
  accessLog?: boolean;
}

export function buildApp(deps: ApiDeps): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: deps.corsOrigin ?? '*' }));
  if (deps.accessLog ?? true) app.use(morgan('combined'));
  app.use(express.json({ limit: '1mb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api/ingest', ingestRouter(deps.pipeline));
  app.use('/api/layers', layersRouter(deps.layers));
  app.use(
    '/api/metrics',
    metricsRouter({
      metrics: deps.metrics,
      pollerStats: deps.pollerStats,
      weatherCacheStats: deps.weatherCacheStats,
    }),
  );
  app.use('/api/alerts', alertsRouter(deps.metrics));

  app.get('/healthz', (_req, res) => {
    res.json({
      status: 'ok',
      ts: new Date().toISOString(),
      storage: deps.storageDriver ?? 'unknown',
    });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}

/** The app is attached with `httpServer.on('request', app)` once the pipeline has its sink. */
export function buildHttpServer(): { httpServer: Server; wsGateway: WsGateway } {
  const httpServer = createServer();
  const wsGateway = new WsGateway(httpServer);
  return { httpServer, wsGateway };
}
