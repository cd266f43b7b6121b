import { describe, it, expect } from '@jest/globals';
import { StorageError } from '@feedgate/domain';
import type { QualityAlert, RawVehiclePosition } from '@feedgate/domain';
import { PgLayeredStore } from '../layered-store.repository.js';
import type { ClientLike, PoolLike } from '../pool.js';
import type { Row } from '../row-readers.js';

// ─── Fake pg ──────────────────────────────────────────────────────────────────

interface Call {
  sql: string;
  params?: unknown[];
}

type Responder = (sql: string, params?: unknown[]) => Row[];

class FakeClient implements ClientLike {
  readonly calls: Call[] = [];
  released = 0;

  constructor(private readonly respond: Responder) {}

  async query(sql: string, params?: unknown[]): Promise<{ rows: Row[] }> {
    this.calls.push({ sql, params });
    return { rows: this.respond(sql, params) };
  }

  release(): void {
    this.released++;
  }
}

class FakePool implements PoolLike {
  readonly calls: Call[] = [];
  ended = false;

  constructor(
    readonly client: FakeClient,
    private readonly respond: Responder = () => [],
  ) {}

  async connect(): Promise<ClientLike> {
    return this.client;
  }

  async query(sql: string, params?: unknown[]): Promise<{ rows: Row[] }> {
    this.calls.push({ sql, params });
    return { rows: this.respond(sql, params) };
  }

  async end(): Promise<void> {
    this.ended = true;
  }
}

const INGESTED = new Date('2024-03-10T14:00:05Z');

function position(vehicleId: string): RawVehiclePosition {
  return {
    vehicleId,
    routeId: '20',
    latitude: 45.52,
    longitude: -122.68,
    speed: 10,
    timestamp: new Date('2024-03-10T14:00:00Z'),
    agencyId: 'trimet',
  };
}

const alert: QualityAlert = {
  alertId: 'a1',
  alertType: 'SPEED_VIOLATION',
  severity: 'HIGH',
  entityType: 'vehicle_position',
  entityId: 'v1',
  agencyId: 'trimet',
  errorMessage: 'speed 40 m/s exceeds 33.3 m/s',
  fieldName: 'speed',
  fieldValue: '40',
  detectedAt: new Date('2024-03-10T14:00:05Z'),
};

function placeholders(from: number, count: number): string {
  return `(${Array.from({ length: count }, (_, i) => `$${from + i}`).join(',')})`;
}

// ─── Transactions ─────────────────────────────────────────────────────────────

describe('PgLayeredStore.transaction', () => {
  it('wraps raw appends in BEGIN/COMMIT and releases the client', async () => {
    const client = new FakeClient((sql) => (sql.includes('quality.alerts') ? [{ alert_id: 'a1' }] : []));
    const store = new PgLayeredStore(new FakePool(client));

    const result = await store.transaction((tx) =>
      tx.appendRaw({ positions: [position('v1'), position('v2')], alerts: [alert] }, INGESTED),
    );

    expect(result).toEqual({ positions: 2, tripUpdates: 0, weather: 0, alerts: 1 });
    expect(client.calls.map((c) => c.sql.split(/\s+/).slice(0, 3).join(' '))).toEqual([
      'BEGIN',
      'INSERT INTO bronze.vehicle_positions',
      'INSERT INTO quality.alerts',
      'COMMIT',
    ]);
    expect(client.released).toBe(1);
  });

  it('numbers placeholders across every row of a multi-row insert', async () => {
    const client = new FakeClient(() => []);
    const store = new PgLayeredStore(new FakePool(client));

    await store.transaction((tx) => tx.appendRaw({ positions: [position('v1'), position('v2')] }, INGESTED));

    const insert = client.calls[1];
    expect(insert?.sql).toContain(`VALUES ${placeholders(1, 17)},${placeholders(18, 17)}`);
    expect(insert?.params).toHaveLength(34);
    expect(insert?.params?.[0]).toEqual(INGESTED);
    expect(insert?.params?.[1]).toBe('v1');
    expect(insert?.params?.[16]).toBe('[]');
    expect(insert?.params?.[18]).toBe('v2');
  });

  it('stores a missing timestamp as NULL', async () => {
    const client = new FakeClient(() => []);
    const store = new PgLayeredStore(new FakePool(client));

    await store.transaction((tx) =>
      tx.appendRaw({ positions: [{ vehicleId: 'v1', agencyId: 'trimet', timestamp: 'garbage' }] }, INGESTED),
    );

    // position_timestamp is the ninth column
    expect(client.calls[1]?.params?.[8]).toBeNull();
  });

  it('rolls back and wraps the failure in a StorageError', async () => {
    const client = new FakeClient((sql) => {
      if (sql.startsWith('INSERT')) throw new Error('connection reset');
      return [];
    });
    const store = new PgLayeredStore(new FakePool(client));

    const attempt = store.transaction((tx) => tx.appendRaw({ positions: [position('v1')] }, INGESTED));

    await expect(attempt).rejects.toThrow('layer transaction rolled back: connection reset');
    await expect(attempt).rejects.toBeInstanceOf(StorageError);
    expect(client.calls.map((c) => c.sql.split(/\s+/)[0])).toEqual(['BEGIN', 'INSERT', 'ROLLBACK']);
    expect(client.released).toBe(1);
  });

  it('maps raw rows, reading BIGINT ids and filtering unmapped codes', async () => {
    const client = new FakeClient((sql) =>
      sql.startsWith('SELECT * FROM bronze.vehicle_positions')
        ? [
            {
              raw_id: '7',
              ingestion_timestamp: INGESTED,
              vehicle_id: 'v1',
              trip_id: null,
              route_id: '20',
              latitude: 45.52,
              longitude: -122.68,
              speed: 10,
              position_timestamp: null,
              congestion_level: 'CONGESTION',
              current_status: null,
              agency_id: 'trimet',
              unmapped_codes: [
                { field: 'occupancyStatus', code: 9 },
                { field: 'speed', code: 1 },
              ],
            },
          ]
        : [],
    );
    const store = new PgLayeredStore(new FakePool(client));

    const rows = await store.transaction((tx) => tx.readRawPositionsAfter(3, 50));

    expect(client.calls[1]?.params).toEqual([3, 50]);
    expect(rows).toHaveLength(1);
    const [row] = rows;
    expect(row?.rawId).toBe(7);
    expect(row?.ingestedAt).toEqual(INGESTED);
    expect(row?.record.vehicleId).toBe('v1');
    expect(row?.record.tripId).toBeUndefined();
    expect(row?.record.timestamp).toBeUndefined();
    expect(row?.record.congestionLevel).toBe('CONGESTION');
    expect(row?.record.currentStatus).toBeUndefined();
    expect(row?.record.unmappedCodes).toEqual([{ field: 'occupancyStatus', code: 9 }]);
  });

  it('reads a missing watermark as zero', async () => {
    const store = new PgLayeredStore(new FakePool(new FakeClient(() => [])));
    expect(await store.transaction((tx) => tx.getWatermark('promotion:vehicle_positions'))).toBe(0);
  });
});

// ─── Reads ────────────────────────────────────────────────────────────────────

describe('PgLayeredStore reads', () => {
  it('assembles layer counts from numeric strings', async () => {
    const pool = new FakePool(new FakeClient(() => []), (sql) =>
      sql.includes('GROUP BY alert_type')
        ? [
            { alert_type: 'SPEED_VIOLATION', n: '2' },
            { alert_type: 'NOT_A_REASON', n: '5' },
          ]
        : [
            {
              raw_positions: '10',
              raw_trip_updates: '4',
              raw_weather: '1',
              validated_positions: '8',
              validated_trip_updates: '4',
              validated_weather: '1',
              hourly_metrics: '3',
              route_performance: '2',
            },
          ],
    );
    const store = new PgLayeredStore(pool);

    expect(await store.counts()).toEqual({
      raw: { vehicle_positions: 10, trip_updates: 4, weather_observations: 1 },
      validated: { vehicle_positions: 8, trip_updates: 4, weather_observations: 1 },
      hourlyMetrics: 3,
      routePerformance: 2,
      alerts: { VALIDATION_ERROR: 0, STALE_DATA: 0, GEOGRAPHIC_VIOLATION: 0, SPEED_VIOLATION: 2 },
    });
  });

  it('filters route performance by agency and day', async () => {
    const pool = new FakePool(new FakeClient(() => []), () => [
      {
        day: '2024-03-10',
        agency_id: 'trimet',
        route_id: '20',
        avg_delay_seconds: '45.5',
        max_delay_seconds: 120,
        min_delay_seconds: -30,
        on_time_percentage: '75',
        total_trips: '4',
        total_observations: '8',
        computed_at: new Date('2024-03-11T00:05:00Z'),
      },
    ]);
    const store = new PgLayeredStore(pool);

    const rows = await store.listRoutePerformance({
      agencyId: 'trimet',
      from: new Date('2024-03-10T08:00:00Z'),
    });

    const call = pool.calls[0];
    expect(call?.sql).toContain('WHERE agency_id = $1 AND date >= $2');
    expect(call?.sql).toContain('LIMIT $3');
    expect(call?.params).toEqual(['trimet', '2024-03-10', 500]);
    expect(rows).toEqual([
      {
        day: new Date('2024-03-10T00:00:00Z'),
        agencyId: 'trimet',
        routeId: '20',
        avgDelaySeconds: 45.5,
        maxDelaySeconds: 120,
        minDelaySeconds: -30,
        onTimePercentage: 75,
        totalTrips: 4,
        totalObservations: 8,
        computedAt: new Date('2024-03-11T00:05:00Z'),
      },
    ]);
  });

  it('adds the bucket filter when no other filter is set', async () => {
    const pool = new FakePool(new FakeClient(() => []));
    const store = new PgLayeredStore(pool);

    await store.listHourlyMetrics({ bucketSeconds: 900, limit: 10 });

    expect(pool.calls[0]?.sql).toContain(' WHERE bucket_seconds = $1 ORDER BY');
    expect(pool.calls[0]?.params).toEqual([900, 10]);
  });

  it('orders alerts newest first with the default limit', async () => {
    const pool = new FakePool(new FakeClient(() => []));
    const store = new PgLayeredStore(pool);

    await store.listAlerts({ severity: 'CRITICAL', agencyId: 'trimet' });

    expect(pool.calls[0]?.sql).toContain('WHERE severity = $1 AND agency_id = $2 ORDER BY detected_at DESC');
    expect(pool.calls[0]?.params).toEqual(['CRITICAL', 'trimet', 100]);
  });

  it('lists validated positions newest first inside a bounding box', async () => {
    const from = new Date('2024-03-10T13:00:00Z');
    const pool = new FakePool(new FakeClient(() => []), () => [
      {
        vehicle_id: 'v1',
        route_id: '20',
        latitude: '45.52',
        longitude: '-122.68',
        speed: 4.5,
        position_timestamp: new Date('2024-03-10T14:00:00Z'),
        feed_timestamp: new Date('2024-03-10T14:00:05Z'),
        congestion_level: 'STOP_AND_GO',
        agency_id: 'trimet',
      },
    ]);
    const store = new PgLayeredStore(pool);

    const rows = await store.listValidatedPositions({
      agencyId: 'trimet',
      from,
      bounds: { minLat: 45.2, maxLat: 45.8, minLon: -123.2, maxLon: -122.3 },
    });

    const call = pool.calls[0];
    expect(call?.sql).toContain(
      'WHERE agency_id = $1 AND position_timestamp >= $2 AND latitude BETWEEN $3 AND $4 AND longitude BETWEEN $5 AND $6',
    );
    expect(call?.sql).toContain('ORDER BY position_timestamp DESC, validated_id DESC LIMIT $7');
    expect(call?.params).toEqual(['trimet', from, 45.2, 45.8, -123.2, -122.3, 10_000]);
    expect(rows).toEqual([
      {
        vehicleId: 'v1',
        routeId: '20',
        latitude: 45.52,
        longitude: -122.68,
        speed: 4.5,
        timestamp: new Date('2024-03-10T14:00:00Z'),
        feedTimestamp: new Date('2024-03-10T14:00:05Z'),
        congestionLevel: 'STOP_AND_GO',
        agencyId: 'trimet',
      },
    ]);
  });

  it('lists validated positions without filters', async () => {
    const pool = new FakePool(new FakeClient(() => []));
    const store = new PgLayeredStore(pool);

    await store.listValidatedPositions({ limit: 25 });

    expect(pool.calls[0]?.sql).not.toContain('WHERE');
    expect(pool.calls[0]?.sql).toContain('LIMIT $1');
    expect(pool.calls[0]?.params).toEqual([25]);
  });

  it('wraps query failures in a StorageError', async () => {
    const pool = new FakePool(new FakeClient(() => []), () => {
      throw new Error('too many clients');
    });
    const store = new PgLayeredStore(pool);

    await expect(store.listAlerts()).rejects.toThrow('layer query failed: too many clients');
  });

  it('ends the pool on close', async () => {
    const pool = new FakePool(new FakeClient(() => []));
    await new PgLayeredStore(pool).close();
    expect(pool.ended).toBe(true);
  });
});
