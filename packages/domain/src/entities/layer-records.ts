import type { RejectionCounts, RejectionReason } from './quality.js';

export type LayerEntityKind = 'vehicle_positions' | 'trip_updates' | 'weather_observations';

export const LAYER_ENTITY_KINDS: readonly LayerEntityKind[] = [
  'vehicle_positions',
  'trip_updates',
  'weather_observations',
];

/** Row in the raw (bronze) layer. Never updated or deleted. */
export interface StoredRaw<T> {
  readonly rawId: number;
  readonly ingestedAt: Date;
  readonly record: T;
}

/** Row in the validated (silver) layer. Written only by promotion. */
export interface StoredValidated<T> {
  readonly validatedId: number;
  readonly promotedAt: Date;
  readonly record: T;
}

/** Aggregate (gold) row keyed by (bucketStart, bucketSeconds, agencyId, routeId). */
export interface HourlyVehicleMetrics {
  readonly bucketStart: Date;
  readonly bucketSeconds: number;
  readonly agencyId: string;
  readonly routeId: string;
  readonly totalVehicles: number;
  readonly avgSpeedKmh: number | null;
  readonly maxSpeedKmh: number | null;
  readonly avgCongestionScore: number;
  readonly totalObservations: number;
  readonly computedAt: Date;
}

/** Daily schedule adherence per route, keyed by (day, agencyId, routeId). */
export interface RoutePerformance {
  readonly day: Date;
  readonly agencyId: string;
  readonly routeId: string;
  readonly avgDelaySeconds: number;
  readonly maxDelaySeconds: number;
  readonly minDelaySeconds: number;
  readonly onTimePercentage: number;
  readonly totalTrips: number;
  readonly totalObservations: number;
  readonly computedAt: Date;
}

export interface LayerCounts {
  readonly raw: Record<LayerEntityKind, number>;
  readonly validated: Record<LayerEntityKind, number>;
  readonly hourlyMetrics: number;
  readonly routePerformance: number;
  readonly alerts: RejectionCounts;
}

export interface LayerMetrics extends LayerCounts {
  /** validated / raw vehicle positions; 0 while the raw layer is empty. */
  readonly qualityRate: number;
}

export interface KindPromotionResult {
  readonly scanned: number;
  readonly promoted: number;
  readonly duplicates: number;
  readonly outsideWindow: number;
  /** Rejections that passed the gate when ingested, alerted during this promotion. */
  readonly alerted: number;
  readonly rejected: Readonly<Record<RejectionReason, number>>;
}

export type PromotionResult = Readonly<Record<LayerEntityKind, KindPromotionResult>>;

export interface AggregationResult {
  readonly bucketSeconds: number;
  /** Start of every bucket that was recomputed. */
  readonly bucketsTouched: Date[];
  readonly rowsUpserted: number;
}
