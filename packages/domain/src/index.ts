// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/gtfs-codes.js';
export * from './entities/vehicle-position.js';
export * from './entities/trip-update.js';
export * from './entities/weather-observation.js';
export * from './entities/quality.js';
export * from './entities/quality-alert.js';
export * from './entities/layer-records.js';
export * from './entities/spatial.js';

// ─── Errors / time ────────────────────────────────────────────────────────────
export * from './errors.js';
export * from './time/utc.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/feed-ingestion.port.js';
export * from './ports/inbound/layer-maintenance.port.js';
export * from './ports/inbound/metrics-query.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/layered-store.port.js';
export * from './ports/outbound/event-sink.port.js';
export * from './ports/outbound/feed-fetcher.port.js';
export * from './ports/outbound/weather-provider.port.js';
export * from './ports/outbound/clock.port.js';
