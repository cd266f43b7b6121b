import { bucketStart, emptyRejectionCounts, toUtcDate } from '@feedgate/domain';
import type {
  AggregationResult,
  ClockPort,
  KindPromotionResult,
  LayerEntityKind,
  LayerMaintenancePort,
  LayerTransaction,
  LayeredStorePort,
  PromotionResult,
  QualityAlert,
  RawAppendResult,
  RawBatch,
  RawTripUpdate,
  RawVehiclePosition,
  RawWeatherObservation,
  StoredRaw,
  TimestampInput,
  TripUpdate,
  ValidationResult,
  VehiclePosition,
  WeatherObservation,
} from '@feedgate/domain';
import { systemClock } from '@feedgate/adapters';
import { toQualityAlert } from '../quality/quality-gate.js';
import type { GateSubject, QualityGate } from '../quality/quality-gate.js';
import {
  DAY_SECONDS,
  DEFAULT_BUCKET_SECONDS,
  computeRoutePerformance,
  computeVehicleMetrics,
} from './aggregation.js';

export interface LayeredStoreServiceOptions {
  store: LayeredStorePort;
  gate: QualityGate;
  clock?: ClockPort;
  /**
   * Raw rows older than this at promotion time are not promoted. Weather uses
   * the larger of this and the gate's weather freshness limit.
   */
  promotionWindowMs?: number;
  /** Rows read per cursor step; a pass keeps reading until the cursor is exhausted. */
  batchSize?: number;
}

export const DEFAULT_PROMOTION_WINDOW_MS = 10 * 60 * 1000;
const DEFAULT_BATCH_SIZE = 5000;

/** How promotion handles one entity kind. */
interface PromotionPlan<R, V> {
  kind: LayerEntityKind;
  windowMs: number;
  subject(raw: R): GateSubject;
  readRaw(tx: LayerTransaction, after: number, limit: number): Promise<StoredRaw<R>[]>;
  timestamp(raw: R): TimestampInput | undefined;
  validate(raw: R, now: Date): ValidationResult<V>;
  insert(tx: LayerTransaction, records: readonly V[], promotedAt: Date): Promise<number>;
}

export function promotionWatermark(kind: LayerEntityKind): string {
  return `promote:${kind}`;
}

export function aggregationWatermark(kind: LayerEntityKind, bucketSeconds: number): string {
  return `aggregate:${kind}:${bucketSeconds}`;
}

/**
 * Owns the raw → validated → aggregate transitions.
 *
 * Every transition runs in one store transaction, and all of them go through a
 * single in-process queue so that promotion and aggregation never interleave.
 */
export class LayeredStoreService implements LayerMaintenancePort {
  private readonly store: LayeredStorePort;
  private readonly gate: QualityGate;
  private readonly clock: ClockPort;
  private readonly promotionWindowMs: number;
  private readonly batchSize: number;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(opts: LayeredStoreServiceOptions) {
    this.store = opts.store;
    this.gate = opts.gate;
    this.clock = opts.clock ?? systemClock;
    this.promotionWindowMs = opts.promotionWindowMs ?? DEFAULT_PROMOTION_WINDOW_MS;
    this.batchSize = opts.batchSize ?? DEFAULT_BATCH_SIZE;
  }

  /** Unconditional insert into the raw layer (alerts included). */
  appendRaw(batch: RawBatch): Promise<RawAppendResult> {
    return this.serialize(() =>
      this.store.transaction((tx) => tx.appendRaw(batch, this.clock.now())),
    );
  }

  promote(): Promise<PromotionResult> {
    return this.serialize(async () => {
      const now = this.clock.now();
      const result = await this.store.transaction(async (tx) => ({
        vehicle_positions: await this.promoteKind<RawVehiclePosition, VehiclePosition>(tx, now, {
          kind: 'vehicle_positions',
          windowMs: this.promotionWindowMs,
          subject: (record) => ({ kind: 'vehicle_position', record }),
          readRaw: (t, after, limit) => t.readRawPositionsAfter(after, limit),
          timestamp: (p) => p.timestamp,
          validate: (p, at) => this.gate.validatePosition(p, at),
          insert: (t, records, at) => t.insertValidatedPositions(records, at),
        }),
        trip_updates: await this.promoteKind<RawTripUpdate, TripUpdate>(tx, now, {
          kind: 'trip_updates',
          windowMs: this.promotionWindowMs,
          subject: (record) => ({ kind: 'trip_update', record }),
          readRaw: (t, after, limit) => t.readRawTripUpdatesAfter(after, limit),
          timestamp: (u) => u.timestamp,
          validate: (u, at) => this.gate.validateTripUpdate(u, at),
          insert: (t, records, at) => t.insertValidatedTripUpdates(records, at),
        }),
        weather_observations: await this.promoteKind<RawWeatherObservation, WeatherObservation>(tx, now, {
          kind: 'weather_observations',
          windowMs: Math.max(this.promotionWindowMs, this.gate.config.maxWeatherAgeSeconds * 1000),
          subject: (record) => ({ kind: 'weather_observation', record }),
          readRaw: (t, after, limit) => t.readRawWeatherAfter(after, limit),
          timestamp: (w) => w.observationTime,
          validate: (w, at) => this.gate.validateWeather(w, at),
          insert: (t, records, at) => t.insertValidatedWeather(records, at),
        }),
      }));
      const promoted =
        result.vehicle_positions.promoted + result.trip_updates.promoted + result.weather_observations.promoted;
      if (promoted > 0) {
        console.log(
          `[layers] promoted ${result.vehicle_positions.promoted} positions, ` +
            `${result.trip_updates.promoted} trip updates, ${result.weather_observations.promoted} weather`,
        );
      }
      return result;
    });
  }

  aggregateWindow(bucketSeconds: number = DEFAULT_BUCKET_SECONDS): Promise<AggregationResult> {
    if (!Number.isInteger(bucketSeconds) || bucketSeconds <= 0) {
      return Promise.reject(new RangeError(`bucketSeconds must be a positive integer, got ${bucketSeconds}`));
    }
    return this.serialize(async () => {
      const computedAt = this.clock.now();
      const result = await this.store.transaction(async (tx) => {
        const watermark = aggregationWatermark('vehicle_positions', bucketSeconds);
        const buckets = await this.touchedBuckets(
          tx,
          watermark,
          (after, limit) => tx.readValidatedPositionsAfter(after, limit),
          (p) => p.timestamp,
          bucketSeconds,
        );
        let rowsUpserted = 0;
        for (const start of buckets) {
          const end = new Date(start.getTime() + bucketSeconds * 1000);
          const rows = await tx.readValidatedPositionsBetween(start, end);
          rowsUpserted += await tx.upsertHourlyMetrics(computeVehicleMetrics(rows, bucketSeconds, computedAt));
        }
        return { bucketSeconds, bucketsTouched: buckets, rowsUpserted };
      });
      if (result.bucketsTouched.length > 0) {
        console.log(
          `[layers] aggregated ${result.bucketsTouched.length} bucket(s) of ${bucketSeconds}s, ` +
            `${result.rowsUpserted} row(s) upserted`,
        );
      }
      return result;
    });
  }

  aggregateRoutePerformance(): Promise<AggregationResult> {
    return this.serialize(async () => {
      const computedAt = this.clock.now();
      return this.store.transaction(async (tx) => {
        const watermark = aggregationWatermark('trip_updates', DAY_SECONDS);
        const days = await this.touchedBuckets(
          tx,
          watermark,
          (after, limit) => tx.readValidatedTripUpdatesAfter(after, limit),
          (u) => u.timestamp,
          DAY_SECONDS,
        );
        let rowsUpserted = 0;
        for (const start of days) {
          const end = new Date(start.getTime() + DAY_SECONDS * 1000);
          const rows = await tx.readValidatedTripUpdatesBetween(start, end);
          rowsUpserted += await tx.upsertRoutePerformance(computeRoutePerformance(rows, computedAt));
        }
        return { bucketSeconds: DAY_SECONDS, bucketsTouched: days, rowsUpserted };
      });
    });
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private serialize<T>(fn: () => Promise<T>): Promise<T> {
    const next = this.tail.then(fn, fn);
    this.tail = next.catch(() => undefined);
    return next;
  }

  private async promoteKind<R, V>(
    tx: LayerTransaction,
    now: Date,
    plan: PromotionPlan<R, V>,
  ): Promise<KindPromotionResult> {
    const watermarkName = promotionWatermark(plan.kind);
    let cursor = await tx.getWatermark(watermarkName);
    const rejected = emptyRejectionCounts();
    let scanned = 0;
    let promoted = 0;
    let duplicates = 0;
    let outsideWindow = 0;
    const alerts: QualityAlert[] = [];

    for (;;) {
      const rows = await plan.readRaw(tx, cursor, this.batchSize);
      if (rows.length === 0) break;
      const survivors: V[] = [];
      for (const row of rows) {
        scanned++;
        const ts = toUtcDate(plan.timestamp(row.record));
        if (ts && now.getTime() - ts.getTime() > plan.windowMs) {
          outsideWindow++;
          continue;
        }
        const result = plan.validate(row.record, now);
        if (result.ok) {
          survivors.push(result.record);
          continue;
        }
        rejected[result.rejection.reason]++;
        // The gate is pure: a row it rejected at ingest time was alerted then.
        if (plan.validate(row.record, row.ingestedAt).ok) {
          alerts.push(toQualityAlert(result.rejection, plan.subject(row.record), now, this.gate.config));
        }
      }
      const inserted = await plan.insert(tx, survivors, now);
      promoted += inserted;
      duplicates += survivors.length - inserted;
      cursor = rows[rows.length - 1]?.rawId ?? cursor;
      if (rows.length < this.batchSize) break;
    }

    if (alerts.length > 0) await tx.appendRaw({ alerts }, now);
    if (scanned > 0) await tx.setWatermark(watermarkName, cursor);
    return { scanned, promoted, duplicates, outsideWindow, alerted: alerts.length, rejected };
  }

  /** Advances an aggregation cursor and returns the distinct bucket starts it passed over. */
  private async touchedBuckets<T>(
    tx: LayerTransaction,
    watermarkName: string,
    read: (after: number, limit: number) => Promise<{ validatedId: number; record: T }[]>,
    timestamp: (record: T) => Date,
    bucketSeconds: number,
  ): Promise<Date[]> {
    let cursor = await tx.getWatermark(watermarkName);
    const starting = cursor;
    const buckets = new Map<number, Date>();

    for (;;) {
      const rows = await read(cursor, this.batchSize);
      if (rows.length === 0) break;
      for (const row of rows) {
        const start = bucketStart(timestamp(row.record), bucketSeconds);
        buckets.set(start.getTime(), start);
        cursor = row.validatedId;
      }
      if (rows.length < this.batchSize) break;
    }

    if (cursor !== starting) await tx.setWatermark(watermarkName, cursor);
    return [...buckets.entries()].sort(([a], [b]) => a - b).map(([, start]) => start);
  }
}
