import type { RawVehiclePosition, VehiclePosition } from '../../entities/vehicle-position.js';
import type { RawTripUpdate, TripUpdate } from '../../entities/trip-update.js';
import type {
  RawWeatherObservation,
  WeatherObservation,
} from '../../entities/weather-observation.js';
import type { AlertSeverity, QualityAlert } from '../../entities/quality-alert.js';
import type { BoundingBox, RejectionReason } from '../../entities/quality.js';
import type {
  HourlyVehicleMetrics,
  LayerCounts,
  RoutePerformance,
  StoredRaw,
  StoredValidated,
} from '../../entities/layer-records.js';

// ---------------------------------------------------------------------------
// Batches
// ---------------------------------------------------------------------------

export interface RawBatch {
  positions?: readonly RawVehiclePosition[];
  tripUpdates?: readonly RawTripUpdate[];
  weather?: readonly RawWeatherObservation[];
  alerts?: readonly QualityAlert[];
}

export interface RawAppendResult {
  positions: number;
  tripUpdates: number;
  weather: number;
  alerts: number;
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

export const DEFAULT_AGGREGATE_LIMIT = 500;
export const DEFAULT_ALERT_LIMIT = 100;
export const DEFAULT_POSITION_LIMIT = 10_000;

/** Aggregate rows come back oldest first, then by agency and route. */
export interface AggregateQuery {
  agencyId?: string;
  routeId?: string;
  from?: Date;
  to?: Date;
  bucketSeconds?: number;
  limit?: number;
}

/** Alerts come back newest first. */
export interface AlertQuery {
  alertType?: RejectionReason;
  severity?: AlertSeverity;
  agencyId?: string;
  limit?: number;
}

/** Validated positions come back newest first. Bounds are inclusive. */
export interface PositionQuery {
  agencyId?: string;
  routeId?: string;
  from?: Date;
  to?: Date;
  bounds?: BoundingBox;
  limit?: number;
}

// ---------------------------------------------------------------------------
// Unit of work
// ---------------------------------------------------------------------------

/**
 * Operations available inside one all-or-nothing layer transition.
 *
 * Validated inserts skip records whose stable identity is already stored:
 *   vehicle positions  (vehicleId, timestamp)
 *   trip updates       (tripId, stopSequence, timestamp)
 *   weather            (agencyId, latitude, longitude, observationTime)
 * and return the number of rows actually inserted.
 */
export interface LayerTransaction {
  appendRaw(batch: RawBatch, ingestedAt: Date): Promise<RawAppendResult>;

  readRawPositionsAfter(rawId: number, limit: number): Promise<StoredRaw<RawVehiclePosition>[]>;
  readRawTripUpdatesAfter(rawId: number, limit: number): Promise<StoredRaw<RawTripUpdate>[]>;
  readRawWeatherAfter(rawId: number, limit: number): Promise<StoredRaw<RawWeatherObservation>[]>;

  insertValidatedPositions(records: readonly VehiclePosition[], promotedAt: Date): Promise<number>;
  insertValidatedTripUpdates(records: readonly TripUpdate[], promotedAt: Date): Promise<number>;
  insertValidatedWeather(records: readonly WeatherObservation[], promotedAt: Date): Promise<number>;

  readValidatedPositionsAfter(
    validatedId: number,
    limit: number,
  ): Promise<StoredValidated<VehiclePosition>[]>;
  /** Validated positions with `from <= timestamp < to`. */
  readValidatedPositionsBetween(from: Date, to: Date): Promise<VehiclePosition[]>;
  readValidatedTripUpdatesAfter(
    validatedId: number,
    limit: number,
  ): Promise<StoredValidated<TripUpdate>[]>;
  /** Validated trip updates with `from <= timestamp < to`. */
  readValidatedTripUpdatesBetween(from: Date, to: Date): Promise<TripUpdate[]>;

  /** Insert or replace by (bucketStart, bucketSeconds, agencyId, routeId). */
  upsertHourlyMetrics(rows: readonly HourlyVehicleMetrics[]): Promise<number>;
  /** Insert or replace by (day, agencyId, routeId). */
  upsertRoutePerformance(rows: readonly RoutePerformance[]): Promise<number>;

  /** Last processed row id for a named cursor; 0 when the cursor has never moved. */
  getWatermark(name: string): Promise<number>;
  setWatermark(name: string, value: number): Promise<void>;
}

// ---------------------------------------------------------------------------
// Port
// ---------------------------------------------------------------------------

export interface LayeredStorePort {
  /** Runs `fn` atomically; any failure rolls back and surfaces as a StorageError. */
  transaction<T>(fn: (tx: LayerTransaction) => Promise<T>): Promise<T>;
  counts(): Promise<LayerCounts>;
  listHourlyMetrics(query?: AggregateQuery): Promise<HourlyVehicleMetrics[]>;
  listRoutePerformance(query?: AggregateQuery): Promise<RoutePerformance[]>;
  listAlerts(query?: AlertQuery): Promise<QualityAlert[]>;
  listValidatedPositions(query?: PositionQuery): Promise<VehiclePosition[]>;
  close(): Promise<void>;
}
