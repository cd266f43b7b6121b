import {
  ALERT_SEVERITIES,
  CONGESTION_LEVELS,
  DEFAULT_AGGREGATE_LIMIT,
  DEFAULT_ALERT_LIMIT,
  DEFAULT_POSITION_LIMIT,
  OCCUPANCY_STATUSES,
  PipelineError,
  QUALITY_ENTITY_TYPES,
  REJECTION_REASONS,
  SCHEDULE_RELATIONSHIPS,
  StorageError,
  VEHICLE_STOP_STATUSES,
  WEATHER_CONDITIONS,
  emptyRejectionCounts,
  errorMessage,
  isUnmappedCode,
  toUtcDate,
} from '@feedgate/domain';
import type {
  AggregateQuery,
  AlertQuery,
  HourlyVehicleMetrics,
  LayerCounts,
  LayerTransaction,
  LayeredStorePort,
  PositionQuery,
  QualityAlert,
  RawAppendResult,
  RawBatch,
  RawTripUpdate,
  RawVehiclePosition,
  RawWeatherObservation,
  RoutePerformance,
  StoredRaw,
  StoredValidated,
  TimestampInput,
  TripUpdate,
  VehiclePosition,
  WeatherObservation,
} from '@feedgate/domain';
import { getPool, withTransaction } from './pool.js';
import type { ClientLike, PoolLike } from './pool.js';
import {
  readDate,
  readEnum,
  readJsonArray,
  readNullableNumber,
  readNumber,
  readOptionalDate,
  readOptionalEnum,
  readOptionalNumber,
  readOptionalString,
  readString,
} from './row-readers.js';
import type { Row } from './row-readers.js';

// Stays well under the 65535 bind-parameter limit for the widest table.
const INSERT_CHUNK_ROWS = 1000;

type Queryable = Pick<ClientLike, 'query'>;

/**
 * Multi-row INSERT split into chunks.
 * Returns the rows produced by `tail` (typically a RETURNING clause).
 */
async function insertMany(
  db: Queryable,
  head: string,
  tuples: readonly unknown[][],
  tail = '',
): Promise<Row[]> {
  const returned: Row[] = [];
  for (let start = 0; start < tuples.length; start += INSERT_CHUNK_ROWS) {
    const chunk = tuples.slice(start, start + INSERT_CHUNK_ROWS);
    const values: unknown[] = [];
    const placeholders = chunk.map((tuple) => {
      const cols = tuple.map((value) => {
        values.push(value);
        return `$${values.length}`;
      });
      return `(${cols.join(',')})`;
    });
    const { rows } = await db.query(`${head} VALUES ${placeholders.join(',')} ${tail}`, values);
    returned.push(...rows);
  }
  return returned;
}

function ts(value: TimestampInput | undefined): Date | null {
  return toUtcDate(value);
}

function dayKey(day: Date): string {
  return day.toISOString().slice(0, 10);
}

function unmappedCodes(row: Row): RawVehiclePosition['unmappedCodes'] {
  const codes = readJsonArray(row, 'unmapped_codes').filter(isUnmappedCode);
  return codes.length > 0 ? codes : undefined;
}

// ─── Row mappers ──────────────────────────────────────────────────────────────

function mapRawPosition(row: Row): StoredRaw<RawVehiclePosition> {
  return {
    rawId: readNumber(row, 'raw_id'),
    ingestedAt: readDate(row, 'ingestion_timestamp'),
    record: {
      vehicleId: readString(row, 'vehicle_id'),
      tripId: readOptionalString(row, 'trip_id'),
      routeId: readOptionalString(row, 'route_id'),
      latitude: readOptionalNumber(row, 'latitude'),
      longitude: readOptionalNumber(row, 'longitude'),
      bearing: readOptionalNumber(row, 'bearing'),
      speed: readOptionalNumber(row, 'speed'),
      timestamp: readOptionalDate(row, 'position_timestamp'),
      feedTimestamp: readOptionalDate(row, 'feed_timestamp'),
      currentStopSequence: readOptionalNumber(row, 'current_stop_sequence'),
      stopId: readOptionalString(row, 'stop_id'),
      currentStatus: readOptionalEnum(row, 'current_status', VEHICLE_STOP_STATUSES),
      congestionLevel: readOptionalEnum(row, 'congestion_level', CONGESTION_LEVELS),
      occupancyStatus: readOptionalEnum(row, 'occupancy_status', OCCUPANCY_STATUSES),
      agencyId: readString(row, 'agency_id'),
      unmappedCodes: unmappedCodes(row),
    },
  };
}

function mapRawTripUpdate(row: Row): StoredRaw<RawTripUpdate> {
  return {
    rawId: readNumber(row, 'raw_id'),
    ingestedAt: readDate(row, 'ingestion_timestamp'),
    record: {
      tripId: readString(row, 'trip_id'),
      routeId: readOptionalString(row, 'route_id'),
      vehicleId: readOptionalString(row, 'vehicle_id'),
      stopSequence: readOptionalNumber(row, 'stop_sequence'),
      stopId: readString(row, 'stop_id'),
      arrivalDelay: readOptionalNumber(row, 'arrival_delay'),
      departureDelay: readOptionalNumber(row, 'departure_delay'),
      arrivalTime: readOptionalDate(row, 'arrival_time'),
      departureTime: readOptionalDate(row, 'departure_time'),
      scheduleRelationship: readOptionalEnum(row, 'schedule_relationship', SCHEDULE_RELATIONSHIPS),
      agencyId: readString(row, 'agency_id'),
      timestamp: readOptionalDate(row, 'observed_at'),
      unmappedCodes: unmappedCodes(row),
    },
  };
}

function mapRawWeather(row: Row): StoredRaw<RawWeatherObservation> {
  return {
    rawId: readNumber(row, 'raw_id'),
    ingestedAt: readDate(row, 'ingestion_timestamp'),
    record: {
      latitude: readOptionalNumber(row, 'latitude'),
      longitude: readOptionalNumber(row, 'longitude'),
      temperatureCelsius: readOptionalNumber(row, 'temperature_celsius'),
      precipitationMm: readOptionalNumber(row, 'precipitation_mm'),
      windSpeedKmh: readOptionalNumber(row, 'wind_speed_kmh'),
      weatherCode: readOptionalNumber(row, 'weather_code'),
      observationTime: readOptionalDate(row, 'observation_time'),
      agencyId: readString(row, 'agency_id'),
    },
  };
}

function mapValidatedPosition(row: Row): VehiclePosition {
  return {
    vehicleId: readString(row, 'vehicle_id'),
    tripId: readOptionalString(row, 'trip_id'),
    routeId: readOptionalString(row, 'route_id'),
    latitude: readNumber(row, 'latitude'),
    longitude: readNumber(row, 'longitude'),
    bearing: readOptionalNumber(row, 'bearing'),
    speed: readOptionalNumber(row, 'speed'),
    timestamp: readDate(row, 'position_timestamp'),
    feedTimestamp: readDate(row, 'feed_timestamp'),
    currentStopSequence: readOptionalNumber(row, 'current_stop_sequence'),
    stopId: readOptionalString(row, 'stop_id'),
    currentStatus: readOptionalEnum(row, 'current_status', VEHICLE_STOP_STATUSES),
    congestionLevel: readOptionalEnum(row, 'congestion_level', CONGESTION_LEVELS),
    occupancyStatus: readOptionalEnum(row, 'occupancy_status', OCCUPANCY_STATUSES),
    agencyId: readString(row, 'agency_id'),
  };
}

function mapValidatedTripUpdate(row: Row): TripUpdate {
  return {
    tripId: readString(row, 'trip_id'),
    routeId: readOptionalString(row, 'route_id'),
    vehicleId: readOptionalString(row, 'vehicle_id'),
    stopSequence: readNumber(row, 'stop_sequence'),
    stopId: readString(row, 'stop_id'),
    arrivalDelay: readOptionalNumber(row, 'arrival_delay'),
    departureDelay: readOptionalNumber(row, 'departure_delay'),
    arrivalTime: readOptionalDate(row, 'arrival_time'),
    departureTime: readOptionalDate(row, 'departure_time'),
    scheduleRelationship: readEnum(row, 'schedule_relationship', SCHEDULE_RELATIONSHIPS),
    agencyId: readString(row, 'agency_id'),
    timestamp: readDate(row, 'observed_at'),
  };
}

function mapValidated<T>(row: Row, map: (row: Row) => T): StoredValidated<T> {
  return {
    validatedId: readNumber(row, 'validated_id'),
    promotedAt: readDate(row, 'promoted_at'),
    record: map(row),
  };
}

function mapHourlyMetrics(row: Row): HourlyVehicleMetrics {
  return {
    bucketStart: readDate(row, 'hour_timestamp'),
    bucketSeconds: readNumber(row, 'bucket_seconds'),
    agencyId: readString(row, 'agency_id'),
    routeId: readString(row, 'route_id'),
    totalVehicles: readNumber(row, 'total_vehicles'),
    avgSpeedKmh: readNullableNumber(row, 'avg_speed_kmh'),
    maxSpeedKmh: readNullableNumber(row, 'max_speed_kmh'),
    avgCongestionScore: readNumber(row, 'avg_congestion_score'),
    totalObservations: readNumber(row, 'total_observations'),
    computedAt: readDate(row, 'computed_at'),
  };
}

function mapRoutePerformance(row: Row): RoutePerformance {
  return {
    day: new Date(`${readString(row, 'day')}T00:00:00Z`),
    agencyId: readString(row, 'agency_id'),
    routeId: readString(row, 'route_id'),
    avgDelaySeconds: readNumber(row, 'avg_delay_seconds'),
    maxDelaySeconds: readNumber(row, 'max_delay_seconds'),
    minDelaySeconds: readNumber(row, 'min_delay_seconds'),
    onTimePercentage: readNumber(row, 'on_time_percentage'),
    totalTrips: readNumber(row, 'total_trips'),
    totalObservations: readNumber(row, 'total_observations'),
    computedAt: readDate(row, 'computed_at'),
  };
}

function mapAlert(row: Row): QualityAlert {
  return {
    alertId: readString(row, 'alert_id'),
    alertType: readEnum(row, 'alert_type', REJECTION_REASONS),
    severity: readEnum(row, 'severity', ALERT_SEVERITIES),
    entityType: readEnum(row, 'entity_type', QUALITY_ENTITY_TYPES),
    entityId: readOptionalString(row, 'entity_id'),
    agencyId: readString(row, 'agency_id'),
    errorMessage: readString(row, 'error_message'),
    fieldName: readOptionalString(row, 'field_name'),
    fieldValue: readOptionalString(row, 'field_value'),
    detectedAt: readDate(row, 'detected_at'),
  };
}

// ─── Transaction ──────────────────────────────────────────────────────────────

export class PgLayerTransaction implements LayerTransaction {
  constructor(private readonly db: Queryable) {}

  async appendRaw(batch: RawBatch, ingestedAt: Date): Promise<RawAppendResult> {
    const positions = batch.positions ?? [];
    const tripUpdates = batch.tripUpdates ?? [];
    const weather = batch.weather ?? [];
    const alerts = batch.alerts ?? [];

    await insertMany(
      this.db,
      `INSERT INTO bronze.vehicle_positions
         (ingestion_timestamp, vehicle_id, trip_id, route_id, latitude, longitude, bearing, speed,
          position_timestamp, current_stop_sequence, stop_id, current_status, congestion_level,
          occupancy_status, agency_id, feed_timestamp, unmapped_codes)`,
      positions.map((p) => [
        ingestedAt,
        p.vehicleId,
        p.tripId ?? null,
        p.routeId ?? null,
        p.latitude ?? null,
        p.longitude ?? null,
        p.bearing ?? null,
        p.speed ?? null,
        ts(p.timestamp),
        p.currentStopSequence ?? null,
        p.stopId ?? null,
        p.currentStatus ?? null,
        p.congestionLevel ?? null,
        p.occupancyStatus ?? null,
        p.agencyId,
        ts(p.feedTimestamp),
        JSON.stringify(p.unmappedCodes ?? []),
      ]),
    );

    await insertMany(
      this.db,
      `INSERT INTO bronze.trip_updates
         (ingestion_timestamp, trip_id, route_id, vehicle_id, stop_sequence, stop_id, arrival_delay,
          departure_delay, arrival_time, departure_time, schedule_relationship, agency_id,
          observed_at, unmapped_codes)`,
      tripUpdates.map((u) => [
        ingestedAt,
        u.tripId,
        u.routeId ?? null,
        u.vehicleId ?? null,
        u.stopSequence ?? null,
        u.stopId,
        u.arrivalDelay ?? null,
        u.departureDelay ?? null,
        ts(u.arrivalTime),
        ts(u.departureTime),
        u.scheduleRelationship ?? null,
        u.agencyId,
        ts(u.timestamp),
        JSON.stringify(u.unmappedCodes ?? []),
      ]),
    );

    await insertMany(
      this.db,
      `INSERT INTO bronze.weather_observations
         (ingestion_timestamp, latitude, longitude, temperature_celsius, precipitation_mm,
          wind_speed_kmh, weather_code, observation_time, agency_id)`,
      weather.map((w) => [
        ingestedAt,
        w.latitude ?? null,
        w.longitude ?? null,
        w.temperatureCelsius ?? null,
        w.precipitationMm ?? null,
        w.windSpeedKmh ?? null,
        w.weatherCode ?? null,
        ts(w.observationTime),
        w.agencyId,
      ]),
    );

    const insertedAlerts = await insertMany(
      this.db,
      `INSERT INTO quality.alerts
         (alert_id, alert_type, severity, entity_type, entity_id, agency_id, error_message,
          field_name, field_value, detected_at)`,
      alerts.map((a) => [
        a.alertId,
        a.alertType,
        a.severity,
        a.entityType,
        a.entityId ?? null,
        a.agencyId,
        a.errorMessage,
        a.fieldName ?? null,
        a.fieldValue ?? null,
        a.detectedAt,
      ]),
      'ON CONFLICT (alert_id) DO NOTHING RETURNING alert_id',
    );

    return {
      positions: positions.length,
      tripUpdates: tripUpdates.length,
      weather: weather.length,
      alerts: insertedAlerts.length,
    };
  }

  async readRawPositionsAfter(rawId: number, limit: number): Promise<StoredRaw<RawVehiclePosition>[]> {
    const { rows } = await this.db.query(
      `SELECT * FROM bronze.vehicle_positions WHERE raw_id > $1 ORDER BY raw_id ASC LIMIT $2`,
      [rawId, limit],
    );
    return rows.map(mapRawPosition);
  }

  async readRawTripUpdatesAfter(rawId: number, limit: number): Promise<StoredRaw<RawTripUpdate>[]> {
    const { rows } = await this.db.query(
      `SELECT * FROM bronze.trip_updates WHERE raw_id > $1 ORDER BY raw_id ASC LIMIT $2`,
      [rawId, limit],
    );
    return rows.map(mapRawTripUpdate);
  }

  async readRawWeatherAfter(rawId: number, limit: number): Promise<StoredRaw<RawWeatherObservation>[]> {
    const { rows } = await this.db.query(
      `SELECT * FROM bronze.weather_observations WHERE raw_id > $1 ORDER BY raw_id ASC LIMIT $2`,
      [rawId, limit],
    );
    return rows.map(mapRawWeather);
  }

  async insertValidatedPositions(records: readonly VehiclePosition[], promotedAt: Date): Promise<number> {
    const inserted = await insertMany(
      this.db,
      `INSERT INTO silver.vehicle_positions
         (promoted_at, vehicle_id, trip_id, route_id, latitude, longitude, bearing, speed,
          position_timestamp, current_stop_sequence, stop_id, current_status, congestion_level,
          occupancy_status, agency_id, feed_timestamp)`,
      records.map((p) => [
        promotedAt,
        p.vehicleId,
        p.tripId ?? null,
        p.routeId ?? null,
        p.latitude,
        p.longitude,
        p.bearing ?? null,
        p.speed ?? null,
        p.timestamp,
        p.currentStopSequence ?? null,
        p.stopId ?? null,
        p.currentStatus ?? null,
        p.congestionLevel ?? null,
        p.occupancyStatus ?? null,
        p.agencyId,
        p.feedTimestamp,
      ]),
      'ON CONFLICT (vehicle_id, position_timestamp) DO NOTHING RETURNING validated_id',
    );
    return inserted.length;
  }

  async insertValidatedTripUpdates(records: readonly TripUpdate[], promotedAt: Date): Promise<number> {
    const inserted = await insertMany(
      this.db,
      `INSERT INTO silver.trip_updates
         (promoted_at, trip_id, route_id, vehicle_id, stop_sequence, stop_id, arrival_delay,
          departure_delay, arrival_time, departure_time, schedule_relationship, agency_id, observed_at)`,
      records.map((u) => [
        promotedAt,
        u.tripId,
        u.routeId ?? null,
        u.vehicleId ?? null,
        u.stopSequence,
        u.stopId,
        u.arrivalDelay ?? null,
        u.departureDelay ?? null,
        u.arrivalTime ?? null,
        u.departureTime ?? null,
        u.scheduleRelationship,
        u.agencyId,
        u.timestamp,
      ]),
      'ON CONFLICT (trip_id, stop_sequence, observed_at) DO NOTHING RETURNING validated_id',
    );
    return inserted.length;
  }

  async insertValidatedWeather(records: readonly WeatherObservation[], promotedAt: Date): Promise<number> {
    const inserted = await insertMany(
      this.db,
      `INSERT INTO silver.weather_observations
         (promoted_at, latitude, longitude, temperature_celsius, precipitation_mm, wind_speed_kmh,
          weather_code, weather_condition, observation_time, agency_id)`,
      records.map((w) => [
        promotedAt,
        w.latitude,
        w.longitude,
        w.temperatureCelsius,
        w.precipitationMm,
        w.windSpeedKmh,
        w.weatherCode,
        w.weatherCondition,
        w.observationTime,
        w.agencyId,
      ]),
      'ON CONFLICT (agency_id, latitude, longitude, observation_time) DO NOTHING RETURNING validated_id',
    );
    return inserted.length;
  }

  async readValidatedPositionsAfter(
    validatedId: number,
    limit: number,
  ): Promise<StoredValidated<VehiclePosition>[]> {
    const { rows } = await this.db.query(
      `SELECT * FROM silver.vehicle_positions WHERE validated_id > $1 ORDER BY validated_id ASC LIMIT $2`,
      [validatedId, limit],
    );
    return rows.map((row) => mapValidated(row, mapValidatedPosition));
  }

  async readValidatedPositionsBetween(from: Date, to: Date): Promise<VehiclePosition[]> {
    const { rows } = await this.db.query(
      `SELECT * FROM silver.vehicle_positions
       WHERE position_timestamp >= $1 AND position_timestamp < $2
       ORDER BY validated_id ASC`,
      [from, to],
    );
    return rows.map(mapValidatedPosition);
  }

  async readValidatedTripUpdatesAfter(
    validatedId: number,
    limit: number,
  ): Promise<StoredValidated<TripUpdate>[]> {
    const { rows } = await this.db.query(
      `SELECT * FROM silver.trip_updates WHERE validated_id > $1 ORDER BY validated_id ASC LIMIT $2`,
      [validatedId, limit],
    );
    return rows.map((row) => mapValidated(row, mapValidatedTripUpdate));
  }

  async readValidatedTripUpdatesBetween(from: Date, to: Date): Promise<TripUpdate[]> {
    const { rows } = await this.db.query(
      `SELECT * FROM silver.trip_updates
       WHERE observed_at >= $1 AND observed_at < $2
       ORDER BY validated_id ASC`,
      [from, to],
    );
    return rows.map(mapValidatedTripUpdate);
  }

  async upsertHourlyMetrics(rows: readonly HourlyVehicleMetrics[]): Promise<number> {
    const upserted = await insertMany(
      this.db,
      `INSERT INTO gold.hourly_vehicle_metrics
         (hour_timestamp, bucket_seconds, agency_id, route_id, total_vehicles, avg_speed_kmh,
          max_speed_kmh, avg_congestion_score, total_observations, computed_at)`,
      rows.map((m) => [
        m.bucketStart,
        m.bucketSeconds,
        m.agencyId,
        m.routeId,
        m.totalVehicles,
        m.avgSpeedKmh,
        m.maxSpeedKmh,
        m.avgCongestionScore,
        m.totalObservations,
        m.computedAt,
      ]),
      `ON CONFLICT (hour_timestamp, bucket_seconds, agency_id, route_id) DO UPDATE SET
         total_vehicles       = EXCLUDED.total_vehicles,
         avg_speed_kmh        = EXCLUDED.avg_speed_kmh,
         max_speed_kmh        = EXCLUDED.max_speed_kmh,
         avg_congestion_score = EXCLUDED.avg_congestion_score,
         total_observations   = EXCLUDED.total_observations,
         computed_at          = EXCLUDED.computed_at
       RETURNING hour_timestamp`,
    );
    return upserted.length;
  }

  async upsertRoutePerformance(rows: readonly RoutePerformance[]): Promise<number> {
    const upserted = await insertMany(
      this.db,
      `INSERT INTO gold.route_performance
         (date, agency_id, route_id, avg_delay_seconds, max_delay_seconds, min_delay_seconds,
          on_time_percentage, total_trips, total_observations, computed_at)`,
      rows.map((r) => [
        dayKey(r.day),
        r.agencyId,
        r.routeId,
        r.avgDelaySeconds,
        r.maxDelaySeconds,
        r.minDelaySeconds,
        r.onTimePercentage,
        r.totalTrips,
        r.totalObservations,
        r.computedAt,
      ]),
      `ON CONFLICT (date, agency_id, route_id) DO UPDATE SET
         avg_delay_seconds  = EXCLUDED.avg_delay_seconds,
         max_delay_seconds  = EXCLUDED.max_delay_seconds,
         min_delay_seconds  = EXCLUDED.min_delay_seconds,
         on_time_percentage = EXCLUDED.on_time_percentage,
         total_trips        = EXCLUDED.total_trips,
         total_observations = EXCLUDED.total_observations,
         computed_at        = EXCLUDED.computed_at
       RETURNING date`,
    );
    return upserted.length;
  }

  async getWatermark(name: string): Promise<number> {
    const { rows } = await this.db.query(`SELECT value FROM quality.layer_watermarks WHERE name = $1`, [
      name,
    ]);
    const row = rows[0];
    return row ? readNumber(row, 'value') : 0;
  }

  async setWatermark(name: string, value: number): Promise<void> {
    await this.db.query(
      `INSERT INTO quality.layer_watermarks (name, value, updated_at)
       VALUES ($1, $2, NOW())
       ON CONFLICT (name) DO UPDATE SET value = EXCLUDED.value, updated_at = EXCLUDED.updated_at`,
      [name, value],
    );
  }
}

// ─── Store ────────────────────────────────────────────────────────────────────

function aggregateFilters(
  query: Pick<AggregateQuery, 'agencyId' | 'routeId' | 'from' | 'to'>,
  timeColumn: string,
  timeValue: (d: Date) => unknown,
): { where: string; conditions: string[]; params: unknown[] } {
  const conditions: string[] = [];
  const params: unknown[] = [];
  if (query.agencyId) {
    params.push(query.agencyId);
    conditions.push(`agency_id = $${params.length}`);
  }
  if (query.routeId) {
    params.push(query.routeId);
    conditions.push(`route_id = $${params.length}`);
  }
  if (query.from) {
    params.push(timeValue(query.from));
    conditions.push(`${timeColumn} >= $${params.length}`);
  }
  if (query.to) {
    params.push(timeValue(query.to));
    conditions.push(`${timeColumn} < $${params.length}`);
  }
  return { where: conditions.length ? `WHERE ${conditions.join(' AND ')}` : '', conditions, params };
}

export class PgLayeredStore implements LayeredStorePort {
  constructor(private readonly pool: PoolLike = getPool()) {}

  async transaction<T>(fn: (tx: LayerTransaction) => Promise<T>): Promise<T> {
    try {
      return await withTransaction((client) => fn(new PgLayerTransaction(client)), this.pool);
    } catch (err) {
      if (err instanceof PipelineError) throw err;
      throw new StorageError(`layer transaction rolled back: ${errorMessage(err)}`, { cause: err });
    }
  }

  async counts(): Promise<LayerCounts> {
    const { rows } = await this.query(
      `SELECT
         (SELECT COUNT(*) FROM bronze.vehicle_positions)     AS raw_positions,
         (SELECT COUNT(*) FROM bronze.trip_updates)          AS raw_trip_updates,
         (SELECT COUNT(*) FROM bronze.weather_observations)  AS raw_weather,
         (SELECT COUNT(*) FROM silver.vehicle_positions)     AS validated_positions,
         (SELECT COUNT(*) FROM silver.trip_updates)          AS validated_trip_updates,
         (SELECT COUNT(*) FROM silver.weather_observations)  AS validated_weather,
         (SELECT COUNT(*) FROM gold.hourly_vehicle_metrics)  AS hourly_metrics,
         (SELECT COUNT(*) FROM gold.route_performance)       AS route_performance`,
    );
    const { rows: alertRows } = await this.query(
      `SELECT alert_type, COUNT(*) AS n FROM quality.alerts GROUP BY alert_type`,
    );

    const row = rows[0] ?? {};
    const count = (column: string): number => readOptionalNumber(row, column) ?? 0;
    const alerts = emptyRejectionCounts();
    for (const alertRow of alertRows) {
      const reason = readOptionalEnum(alertRow, 'alert_type', REJECTION_REASONS);
      if (reason) alerts[reason] = readNumber(alertRow, 'n');
    }

    return {
      raw: {
        vehicle_positions: count('raw_positions'),
        trip_updates: count('raw_trip_updates'),
        weather_observations: count('raw_weather'),
      },
      validated: {
        vehicle_positions: count('validated_positions'),
        trip_updates: count('validated_trip_updates'),
        weather_observations: count('validated_weather'),
      },
      hourlyMetrics: count('hourly_metrics'),
      routePerformance: count('route_performance'),
      alerts,
    };
  }

  async listHourlyMetrics(query: AggregateQuery = {}): Promise<HourlyVehicleMetrics[]> {
    const { where, params } = aggregateFilters(query, 'hour_timestamp', (d) => d);
    let sql = `SELECT * FROM gold.hourly_vehicle_metrics ${where}`;
    if (query.bucketSeconds) {
      params.push(query.bucketSeconds);
      sql += `${where ? ' AND' : ' WHERE'} bucket_seconds = $${params.length}`;
    }
    params.push(query.limit ?? DEFAULT_AGGREGATE_LIMIT);
    sql += ` ORDER BY hour_timestamp ASC, agency_id ASC, route_id ASC LIMIT $${params.length}`;
    const { rows } = await this.query(sql, params);
    return rows.map(mapHourlyMetrics);
  }

  async listRoutePerformance(query: AggregateQuery = {}): Promise<RoutePerformance[]> {
    const { where, params } = aggregateFilters(query, 'date', dayKey);
    params.push(query.limit ?? DEFAULT_AGGREGATE_LIMIT);
    const { rows } = await this.query(
      `SELECT to_char(date, 'YYYY-MM-DD') AS day, * FROM gold.route_performance ${where}
       ORDER BY date ASC, agency_id ASC, route_id ASC LIMIT $${params.length}`,
      params,
    );
    return rows.map(mapRoutePerformance);
  }

  async listAlerts(query: AlertQuery = {}): Promise<QualityAlert[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];
    if (query.alertType) {
      params.push(query.alertType);
      conditions.push(`alert_type = $${params.length}`);
    }
    if (query.severity) {
      params.push(query.severity);
      conditions.push(`severity = $${params.length}`);
    }
    if (query.agencyId) {
      params.push(query.agencyId);
      conditions.push(`agency_id = $${params.length}`);
    }
    params.push(query.limit ?? DEFAULT_ALERT_LIMIT);
    const where = conditions.length ? `WHERE ${conditions.join(' AND ')}` : '';
    const { rows } = await this.query(
      `SELECT * FROM quality.alerts ${where} ORDER BY detected_at DESC, alert_id ASC LIMIT $${params.length}`,
      params,
    );
    return rows.map(mapAlert);
  }

  async listValidatedPositions(query: PositionQuery = {}): Promise<VehiclePosition[]> {
    const { conditions, params } = aggregateFilters(query, 'position_timestamp', (d) => d);
    const { bounds } = query;
    if (bounds) {
      params.push(bounds.minLat, bounds.maxLat, bounds.minLon, bounds.maxLon);
      const n = params.length;
      conditions.push(`latitude BETWEEN $${n - 3} AND $${n - 2} AND longitude BETWEEN $${n - 1} AND $${n}`);
    }
    params.push(query.limit ?? DEFAULT_POSITION_LIMIT);
    const clause = conditions.length ? `WHERE ${conditions.join(' AND ')}` : '';
    const { rows } = await this.query(
      `SELECT * FROM silver.vehicle_positions ${clause}
       ORDER BY position_timestamp DESC, validated_id DESC LIMIT $${params.length}`,
      params,
    );
    return rows.map(mapValidatedPosition);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async query(sql: string, params?: unknown[]): Promise<{ rows: Row[] }> {
    try {
      return await this.pool.query(sql, params);
    } catch (err) {
      throw new StorageError(`layer query failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
