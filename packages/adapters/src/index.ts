// ─── PostgreSQL Adapters ───────────────────────────────────────────────────────
export { getPool, withTransaction } from './postgres/pool.js';
export type { PoolLike, ClientLike } from './postgres/pool.js';
export { applySchema } from './postgres/schema.js';
export { PgLayeredStore, PgLayerTransaction } from './postgres/layered-store.repository.js';

// ─── In-memory Adapters ───────────────────────────────────────────────────────
export {
  InMemoryLayeredStore,
  positionKey,
  tripUpdateKey,
  weatherKey,
} from './memory/in-memory-layered-store.js';

// ─── GTFS-Realtime Codec ──────────────────────────────────────────────────────
export { decodeFeedMessage, encodeFeedMessage, feedMessageSchema } from './gtfs-rt/feed-message.js';
export type {
  GtfsFeedEntity,
  GtfsFeedMessage,
  GtfsFeedMessageInput,
  GtfsStopTimeUpdate,
  GtfsTripUpdate,
  GtfsVehiclePosition,
} from './gtfs-rt/feed-message.js';

// ─── HTTP Collaborators ───────────────────────────────────────────────────────
export { HttpFeedFetcher } from './http/http-feed-fetcher.js';
export type { FetchLike, FetchResponseLike, HttpFeedFetcherOptions } from './http/http-feed-fetcher.js';
export { OpenMeteoWeatherAdapter, weatherCacheKey } from './open-meteo/open-meteo-weather.adapter.js';
export type { JsonFetchLike, JsonResponseLike, OpenMeteoOptions } from './open-meteo/open-meteo-weather.adapter.js';
export { TtlCache } from './cache/ttl-cache.js';
export type { TtlCacheOptions, TtlCacheStats } from './cache/ttl-cache.js';

// ─── Clock / RNG ──────────────────────────────────────────────────────────────
export { DeterministicClock, systemClock } from './clock/clock.js';
export { SeededRng } from './clock/seeded-rng.js';
