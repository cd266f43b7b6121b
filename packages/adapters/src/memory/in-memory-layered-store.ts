import {
  DEFAULT_AGGREGATE_LIMIT,
  DEFAULT_ALERT_LIMIT,
  DEFAULT_POSITION_LIMIT,
  PipelineError,
  StorageError,
  emptyRejectionCounts,
  errorMessage,
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
  TripUpdate,
  VehiclePosition,
  WeatherObservation,
} from '@feedgate/domain';

export function positionKey(p: Pick<VehiclePosition, 'vehicleId' | 'timestamp'>): string {
  return `${p.vehicleId}|${p.timestamp.getTime()}`;
}

export function tripUpdateKey(u: Pick<TripUpdate, 'tripId' | 'stopSequence' | 'timestamp'>): string {
  return `${u.tripId}|${u.stopSequence}|${u.timestamp.getTime()}`;
}

export function weatherKey(
  w: Pick<WeatherObservation, 'agencyId' | 'latitude' | 'longitude' | 'observationTime'>,
): string {
  return `${w.agencyId}|${w.latitude}|${w.longitude}|${w.observationTime.getTime()}`;
}

function hourlyKey(m: HourlyVehicleMetrics): string {
  return `${m.bucketStart.getTime()}|${m.bucketSeconds}|${m.agencyId}|${m.routeId}`;
}

function routePerformanceKey(r: RoutePerformance): string {
  return `${r.day.getTime()}|${r.agencyId}|${r.routeId}`;
}

interface ValidatedTable<T> {
  rows: StoredValidated<T>[];
  keys: Set<string>;
}

interface StoreState {
  nextId: number;
  rawPositions: StoredRaw<RawVehiclePosition>[];
  rawTripUpdates: StoredRaw<RawTripUpdate>[];
  rawWeather: StoredRaw<RawWeatherObservation>[];
  positions: ValidatedTable<VehiclePosition>;
  tripUpdates: ValidatedTable<TripUpdate>;
  weather: ValidatedTable<WeatherObservation>;
  hourly: Map<string, HourlyVehicleMetrics>;
  routePerformance: Map<string, RoutePerformance>;
  alerts: Map<string, QualityAlert>;
  watermarks: Map<string, number>;
}

function emptyState(): StoreState {
  return {
    nextId: 1,
    rawPositions: [],
    rawTripUpdates: [],
    rawWeather: [],
    positions: { rows: [], keys: new Set() },
    tripUpdates: { rows: [], keys: new Set() },
    weather: { rows: [], keys: new Set() },
    hourly: new Map(),
    routePerformance: new Map(),
    alerts: new Map(),
    watermarks: new Map(),
  };
}

function cloneTable<T>(table: ValidatedTable<T>): ValidatedTable<T> {
  return { rows: [...table.rows], keys: new Set(table.keys) };
}

// Rows are immutable once written, so copying the containers is enough.
function cloneState(s: StoreState): StoreState {
  return {
    nextId: s.nextId,
    rawPositions: [...s.rawPositions],
    rawTripUpdates: [...s.rawTripUpdates],
    rawWeather: [...s.rawWeather],
    positions: cloneTable(s.positions),
    tripUpdates: cloneTable(s.tripUpdates),
    weather: cloneTable(s.weather),
    hourly: new Map(s.hourly),
    routePerformance: new Map(s.routePerformance),
    alerts: new Map(s.alerts),
    watermarks: new Map(s.watermarks),
  };
}

function rowsAfter<T>(
  rows: readonly T[],
  id: (row: T) => number,
  after: number,
  limit: number,
): T[] {
  return rows.filter((row) => id(row) > after).slice(0, limit);
}

class InMemoryLayerTransaction implements LayerTransaction {
  constructor(private readonly state: StoreState) {}

  private allocateId(): number {
    return this.state.nextId++;
  }

  private insertValidated<T>(
    table: ValidatedTable<T>,
    records: readonly T[],
    key: (record: T) => string,
    promotedAt: Date,
  ): number {
    let inserted = 0;
    for (const record of records) {
      const k = key(record);
      if (table.keys.has(k)) continue;
      table.keys.add(k);
      table.rows.push({ validatedId: this.allocateId(), promotedAt, record });
      inserted++;
    }
    return inserted;
  }

  async appendRaw(batch: RawBatch, ingestedAt: Date): Promise<RawAppendResult> {
    const positions = batch.positions ?? [];
    const tripUpdates = batch.tripUpdates ?? [];
    const weather = batch.weather ?? [];
    for (const record of positions) {
      this.state.rawPositions.push({ rawId: this.allocateId(), ingestedAt, record });
    }
    for (const record of tripUpdates) {
      this.state.rawTripUpdates.push({ rawId: this.allocateId(), ingestedAt, record });
    }
    for (const record of weather) {
      this.state.rawWeather.push({ rawId: this.allocateId(), ingestedAt, record });
    }
    let alerts = 0;
    for (const alert of batch.alerts ?? []) {
      if (this.state.alerts.has(alert.alertId)) continue;
      this.state.alerts.set(alert.alertId, alert);
      alerts++;
    }
    return {
      positions: positions.length,
      tripUpdates: tripUpdates.length,
      weather: weather.length,
      alerts,
    };
  }

  async readRawPositionsAfter(rawId: number, limit: number): Promise<StoredRaw<RawVehiclePosition>[]> {
    return rowsAfter(this.state.rawPositions, (r) => r.rawId, rawId, limit);
  }

  async readRawTripUpdatesAfter(rawId: number, limit: number): Promise<StoredRaw<RawTripUpdate>[]> {
    return rowsAfter(this.state.rawTripUpdates, (r) => r.rawId, rawId, limit);
  }

  async readRawWeatherAfter(rawId: number, limit: number): Promise<StoredRaw<RawWeatherObservation>[]> {
    return rowsAfter(this.state.rawWeather, (r) => r.rawId, rawId, limit);
  }

  async insertValidatedPositions(records: readonly VehiclePosition[], promotedAt: Date): Promise<number> {
    return this.insertValidated(this.state.positions, records, positionKey, promotedAt);
  }

  async insertValidatedTripUpdates(records: readonly TripUpdate[], promotedAt: Date): Promise<number> {
    return this.insertValidated(this.state.tripUpdates, records, tripUpdateKey, promotedAt);
  }

  async insertValidatedWeather(records: readonly WeatherObservation[], promotedAt: Date): Promise<number> {
    return this.insertValidated(this.state.weather, records, weatherKey, promotedAt);
  }

  async readValidatedPositionsAfter(
    validatedId: number,
    limit: number,
  ): Promise<StoredValidated<VehiclePosition>[]> {
    return rowsAfter(this.state.positions.rows, (r) => r.validatedId, validatedId, limit);
  }

  async readValidatedPositionsBetween(from: Date, to: Date): Promise<VehiclePosition[]> {
    return this.state.positions.rows
      .map((r) => r.record)
      .filter((p) => p.timestamp >= from && p.timestamp < to);
  }

  async readValidatedTripUpdatesAfter(
    validatedId: number,
    limit: number,
  ): Promise<StoredValidated<TripUpdate>[]> {
    return rowsAfter(this.state.tripUpdates.rows, (r) => r.validatedId, validatedId, limit);
  }

  async readValidatedTripUpdatesBetween(from: Date, to: Date): Promise<TripUpdate[]> {
    return this.state.tripUpdates.rows
      .map((r) => r.record)
      .filter((u) => u.timestamp >= from && u.timestamp < to);
  }

  async upsertHourlyMetrics(rows: readonly HourlyVehicleMetrics[]): Promise<number> {
    for (const row of rows) this.state.hourly.set(hourlyKey(row), row);
    return rows.length;
  }

  async upsertRoutePerformance(rows: readonly RoutePerformance[]): Promise<number> {
    for (const row of rows) this.state.routePerformance.set(routePerformanceKey(row), row);
    return rows.length;
  }

  async getWatermark(name: string): Promise<number> {
    return this.state.watermarks.get(name) ?? 0;
  }

  async setWatermark(name: string, value: number): Promise<void> {
    this.state.watermarks.set(name, value);
  }
}

function matchesAggregate(
  row: { agencyId: string; routeId: string },
  time: Date,
  query: AggregateQuery,
): boolean {
  if (query.agencyId && row.agencyId !== query.agencyId) return false;
  if (query.routeId && row.routeId !== query.routeId) return false;
  if (query.from && time < query.from) return false;
  if (query.to && time >= query.to) return false;
  return true;
}

function compareAggregate(
  a: { agencyId: string; routeId: string },
  aTime: Date,
  b: { agencyId: string; routeId: string },
  bTime: Date,
): number {
  return (
    aTime.getTime() - bTime.getTime() ||
    a.agencyId.localeCompare(b.agencyId) ||
    a.routeId.localeCompare(b.routeId)
  );
}

function matchesPosition(p: VehiclePosition, query: PositionQuery): boolean {
  if (query.agencyId && p.agencyId !== query.agencyId) return false;
  if (query.routeId && p.routeId !== query.routeId) return false;
  if (query.from && p.timestamp < query.from) return false;
  if (query.to && p.timestamp >= query.to) return false;
  const { bounds } = query;
  if (bounds) {
    if (p.latitude < bounds.minLat || p.latitude > bounds.maxLat) return false;
    if (p.longitude < bounds.minLon || p.longitude > bounds.maxLon) return false;
  }
  return true;
}

/**
 * Process-local layered store for tests and `STORAGE_DRIVER=memory`.
 *
 * Transactions run one at a time against a copy of the state; the copy
 * replaces the live state only when the callback resolves.
 */
export class InMemoryLayeredStore implements LayeredStorePort {
  private state = emptyState();
  private tail: Promise<unknown> = Promise.resolve();

  transaction<T>(fn: (tx: LayerTransaction) => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => {
      const working = cloneState(this.state);
      try {
        const result = await fn(new InMemoryLayerTransaction(working));
        this.state = working;
        return result;
      } catch (err) {
        if (err instanceof PipelineError) throw err;
        throw new StorageError(`layer transaction rolled back: ${errorMessage(err)}`, { cause: err });
      }
    };
    const next = this.tail.then(run, run);
    this.tail = next.catch(() => undefined);
    return next;
  }

  async counts(): Promise<LayerCounts> {
    const alerts = emptyRejectionCounts();
    for (const alert of this.state.alerts.values()) alerts[alert.alertType]++;
    return {
      raw: {
        vehicle_positions: this.state.rawPositions.length,
        trip_updates: this.state.rawTripUpdates.length,
        weather_observations: this.state.rawWeather.length,
      },
      validated: {
        vehicle_positions: this.state.positions.rows.length,
        trip_updates: this.state.tripUpdates.rows.length,
        weather_observations: this.state.weather.rows.length,
      },
      hourlyMetrics: this.state.hourly.size,
      routePerformance: this.state.routePerformance.size,
      alerts,
    };
  }

  async listHourlyMetrics(query: AggregateQuery = {}): Promise<HourlyVehicleMetrics[]> {
    return [...this.state.hourly.values()]
      .filter((m) => matchesAggregate(m, m.bucketStart, query))
      .filter((m) => !query.bucketSeconds || m.bucketSeconds === query.bucketSeconds)
      .sort((a, b) => compareAggregate(a, a.bucketStart, b, b.bucketStart))
      .slice(0, query.limit ?? DEFAULT_AGGREGATE_LIMIT);
  }

  async listRoutePerformance(query: AggregateQuery = {}): Promise<RoutePerformance[]> {
    return [...this.state.routePerformance.values()]
      .filter((r) => matchesAggregate(r, r.day, query))
      .sort((a, b) => compareAggregate(a, a.day, b, b.day))
      .slice(0, query.limit ?? DEFAULT_AGGREGATE_LIMIT);
  }

  async listAlerts(query: AlertQuery = {}): Promise<QualityAlert[]> {
    return [...this.state.alerts.values()]
      .filter((a) => !query.alertType || a.alertType === query.alertType)
      .filter((a) => !query.severity || a.severity === query.severity)
      .filter((a) => !query.agencyId || a.agencyId === query.agencyId)
      .sort(
        (a, b) =>
          b.detectedAt.getTime() - a.detectedAt.getTime() || a.alertId.localeCompare(b.alertId),
      )
      .slice(0, query.limit ?? DEFAULT_ALERT_LIMIT);
  }

  async listValidatedPositions(query: PositionQuery = {}): Promise<VehiclePosition[]> {
    return this.state.positions.rows
      .filter((row) => matchesPosition(row.record, query))
      .sort(
        (a, b) =>
          b.record.timestamp.getTime() - a.record.timestamp.getTime() || b.validatedId - a.validatedId,
      )
      .slice(0, query.limit ?? DEFAULT_POSITION_LIMIT)
      .map((row) => row.record);
  }

  async close(): Promise<void> {
    await this.tail;
  }
}
