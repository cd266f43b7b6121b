import 'dotenv/config';
import {
  HttpFeedFetcher,
  InMemoryLayeredStore,
  OpenMeteoWeatherAdapter,
  PgLayeredStore,
  TtlCache,
  applySchema,
  getPool,
} from '@feedgate/adapters';
import type { LayeredStorePort, RawWeatherObservation } from '@feedgate/domain';
import { buildApp, buildHttpServer } from './app.js';
import { loadPipelineConfig } from './config/pipeline-config.js';
import type { PipelineConfig } from './config/pipeline-config.js';
import { QualityGate } from './services/quality/quality-gate.js';
import { LayeredStoreService } from './services/layers/layered-store.service.js';
import { MetricsReporter } from './services/metrics/metrics-reporter.service.js';
import { FeedPipeline } from './services/ingestion/feed-pipeline.service.js';
import { FeedPoller } from './services/poller/feed-poller.js';
import { WeatherEnrichment } from './services/weather/weather-enrichment.service.js';

async function openStore(config: PipelineConfig): Promise<LayeredStorePort> {
  if (config.env.STORAGE_DRIVER === 'memory') {
    console.log('[server] using in-memory layered store');
    return new InMemoryLayeredStore();
  }
  await getPool().query('SELECT 1');
  console.log('[server] database connected');
  await applySchema();
  return new PgLayeredStore();
}

/** One poller per agency with a feed URL; FEED_URL/AGENCY_ID add or override one. */
function feedTargets(config: PipelineConfig): Array<{ agencyId: string; feedUrl: string }> {
  const targets = new Map<string, string>();
  for (const agency of config.agencies) {
    if (agency.feedUrl) targets.set(agency.agencyId, agency.feedUrl);
  }
  if (config.env.FEED_URL) {
    targets.set(config.env.AGENCY_ID ?? 'default', config.env.FEED_URL);
  }
  return [...targets].map(([agencyId, feedUrl]) => ({ agencyId, feedUrl }));
}

async function main() {
  const config = loadPipelineConfig();
  const { env } = config;
  const store = await openStore(config);

  const gate = new QualityGate(config.quality);
  const layers = new LayeredStoreService({
    store,
    gate,
    promotionWindowMs: env.PROMOTION_WINDOW_MS,
  });
  const metrics = new MetricsReporter(store);

  const { httpServer, wsGateway } = buildHttpServer();
  const pipeline = new FeedPipeline({ gate, layers, sink: wsGateway });

  // ─── Feed polling ───────────────────────────────────────────────────────────
  const fetcher = new HttpFeedFetcher({
    timeoutMs: env.FETCH_TIMEOUT_MS,
    maxRetries: env.FETCH_MAX_RETRIES,
  });
  const pollers = feedTargets(config).map(
    ({ agencyId, feedUrl }) =>
      new FeedPoller({ fetcher, pipeline, feedUrl, agencyId, intervalMs: env.POLL_INTERVAL_MS }),
  );
  for (const poller of pollers) poller.start();

  // ─── Weather enrichment ─────────────────────────────────────────────────────
  const weatherCache = new TtlCache<RawWeatherObservation>({
    ttlMs: env.WEATHER_CACHE_TTL_MS,
    maxEntries: env.WEATHER_CACHE_MAX_ENTRIES,
  });
  const weather = new WeatherEnrichment({
    provider: new OpenMeteoWeatherAdapter({
      baseUrl: env.WEATHER_API_BASE,
      cache: weatherCache,
      timeoutMs: env.FETCH_TIMEOUT_MS,
    }),
    pipeline,
    agencies: config.agencies,
    cacheStats: () => weatherCache.stats(),
  });
  weather.start(env.WEATHER_INTERVAL_MS);

  // ─── Aggregation ────────────────────────────────────────────────────────────
  const aggregateTimer = setInterval(() => {
    layers
      .aggregateWindow()
      .then(() => layers.aggregateRoutePerformance())
      .catch((err) => {
        console.warn('[server] aggregation error (retried next interval)', err);
      });
  }, env.AGGREGATE_INTERVAL_MS);

  const app = buildApp({
    pipeline,
    layers,
    metrics,
    pollerStats: () => pollers.map((p) => p.stats()),
    weatherCacheStats: () => weather.cacheStats(),
    storageDriver: env.STORAGE_DRIVER,
    corsOrigin: env.CORS_ORIGIN,
  });
  httpServer.on('request', app);

  httpServer.listen(env.PORT, () => {
    console.log(`[server] listening on http://0.0.0.0:${env.PORT}`);
  });

  const shutdown = async () => {
    console.log('[server] shutting down...');
    clearInterval(aggregateTimer);
    await Promise.all(pollers.map((p) => p.stop()));
    await weather.stop();
    await wsGateway.close();
    httpServer.close();
    await store.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('[server] shutdown error', err);
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
