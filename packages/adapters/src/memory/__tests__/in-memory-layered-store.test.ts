import { describe, it, expect } from '@jest/globals';
import { DecodeError, StorageError } from '@feedgate/domain';
import type {
  HourlyVehicleMetrics,
  PositionQuery,
  QualityAlert,
  RawVehiclePosition,
  VehiclePosition,
} from '@feedgate/domain';
import { InMemoryLayeredStore, positionKey } from '../in-memory-layered-store.js';

const T0 = new Date('2024-03-10T14:00:00Z');
const at = (offsetSec: number) => new Date(T0.getTime() + offsetSec * 1000);

function rawPosition(vehicleId: string, offsetSec = 0): RawVehiclePosition {
  return { vehicleId, latitude: 45.5, longitude: -122.6, timestamp: at(offsetSec), agencyId: 'trimet' };
}

function position(vehicleId: string, offsetSec = 0, routeId = '20'): VehiclePosition {
  return {
    vehicleId,
    routeId,
    latitude: 45.5,
    longitude: -122.6,
    timestamp: at(offsetSec),
    feedTimestamp: at(offsetSec),
    agencyId: 'trimet',
  };
}

function alert(alertId: string, offsetSec: number, overrides: Partial<QualityAlert> = {}): QualityAlert {
  return {
    alertId,
    alertType: 'SPEED_VIOLATION',
    severity: 'HIGH',
    entityType: 'vehicle_position',
    entityId: 'v1',
    agencyId: 'trimet',
    errorMessage: 'speed_limit: speed 40 m/s exceeds limit 33.3 m/s',
    detectedAt: at(offsetSec),
    ...overrides,
  };
}

function hourly(routeId: string, bucketOffsetSec: number, agencyId = 'trimet'): HourlyVehicleMetrics {
  return {
    bucketStart: at(bucketOffsetSec),
    bucketSeconds: 3600,
    agencyId,
    routeId,
    totalVehicles: 1,
    avgSpeedKmh: 36,
    maxSpeedKmh: 36,
    avgCongestionScore: 1,
    totalObservations: 1,
    computedAt: T0,
  };
}

describe('InMemoryLayeredStore', () => {
  it('appends raw rows with increasing ids and reads them by cursor', async () => {
    const store = new InMemoryLayeredStore();
    const appended = await store.transaction((tx) =>
      tx.appendRaw({ positions: [rawPosition('a'), rawPosition('b'), rawPosition('c')] }, T0),
    );
    expect(appended).toEqual({ positions: 3, tripUpdates: 0, weather: 0, alerts: 0 });

    const page = await store.transaction((tx) => tx.readRawPositionsAfter(1, 1));
    expect(page.map((r) => [r.rawId, r.record.vehicleId])).toEqual([[2, 'b']]);
    expect(page[0]?.ingestedAt).toEqual(T0);
  });

  it('skips validated duplicates and reports the inserted count', async () => {
    const store = new InMemoryLayeredStore();
    const first = await store.transaction((tx) =>
      tx.insertValidatedPositions([position('a'), position('a'), position('b')], T0),
    );
    const second = await store.transaction((tx) => tx.insertValidatedPositions([position('a', 0)], T0));

    expect(first).toBe(2);
    expect(second).toBe(0);
    expect((await store.counts()).validated.vehicle_positions).toBe(2);
  });

  it('keys positions by vehicle id and instant', () => {
    expect(positionKey(position('4012', 5))).toBe(`4012|${T0.getTime() + 5000}`);
  });

  it('rolls back every write when the callback fails', async () => {
    const store = new InMemoryLayeredStore();
    const failing = store.transaction(async (tx) => {
      await tx.appendRaw({ positions: [rawPosition('a')] }, T0);
      await tx.setWatermark('promote:vehicle_positions', 1);
      throw new Error('boom');
    });

    await expect(failing).rejects.toBeInstanceOf(StorageError);
    await expect(failing).rejects.toThrow('layer transaction rolled back: boom');
    const counts = await store.counts();
    expect(counts.raw.vehicle_positions).toBe(0);
    expect(await store.transaction((tx) => tx.getWatermark('promote:vehicle_positions'))).toBe(0);
  });

  it('passes pipeline errors through unchanged', async () => {
    const store = new InMemoryLayeredStore();
    const err = new DecodeError('bad feed');
    await expect(store.transaction(async () => Promise.reject(err))).rejects.toBe(err);
  });

  it('reads validated positions in a half-open interval', async () => {
    const store = new InMemoryLayeredStore();
    await store.transaction((tx) =>
      tx.insertValidatedPositions([position('a', 0), position('b', 3599), position('c', 3600)], T0),
    );
    const rows = await store.transaction((tx) => tx.readValidatedPositionsBetween(at(0), at(3600)));
    expect(rows.map((p) => p.vehicleId)).toEqual(['a', 'b']);
  });

  it('lists validated positions newest first with filters', async () => {
    const store = new InMemoryLayeredStore();
    await store.transaction((tx) =>
      tx.insertValidatedPositions(
        [
          position('v1', 0),
          position('v2', 60, '72'),
          { ...position('v3', 120), latitude: 46.1 },
          { ...position('v4', 180), agencyId: 'mbta' },
          position('v5', -7200),
        ],
        T0,
      ),
    );

    const ids = async (query: PositionQuery) =>
      (await store.listValidatedPositions(query)).map((p) => p.vehicleId);

    expect(await ids({})).toEqual(['v4', 'v3', 'v2', 'v1', 'v5']);
    expect(await ids({ agencyId: 'trimet', from: at(-3600) })).toEqual(['v3', 'v2', 'v1']);
    expect(await ids({ routeId: '72' })).toEqual(['v2']);
    expect(await ids({ bounds: { minLat: 45, maxLat: 45.5, minLon: -123, maxLon: -122.6 } })).toEqual([
      'v4',
      'v2',
      'v1',
      'v5',
    ]);
    expect(await ids({ to: at(60), limit: 1 })).toEqual(['v1']);
  });

  it('upserts aggregates by key and lists them oldest first', async () => {
    const store = new InMemoryLayeredStore();
    await store.transaction((tx) =>
      tx.upsertHourlyMetrics([hourly('72', 3600), hourly('20', 3600), hourly('20', 0, 'mbta')]),
    );
    await store.transaction((tx) => tx.upsertHourlyMetrics([{ ...hourly('20', 3600), totalVehicles: 5 }]));

    const all = await store.listHourlyMetrics();
    expect(all.map((m) => [m.agencyId, m.routeId, m.bucketStart.toISOString(), m.totalVehicles])).toEqual([
      ['mbta', '20', '2024-03-10T14:00:00.000Z', 1],
      ['trimet', '20', '2024-03-10T15:00:00.000Z', 5],
      ['trimet', '72', '2024-03-10T15:00:00.000Z', 1],
    ]);
    expect((await store.counts()).hourlyMetrics).toBe(3);

    const filtered = await store.listHourlyMetrics({ agencyId: 'trimet', from: at(3600), limit: 1 });
    expect(filtered.map((m) => m.routeId)).toEqual(['20']);
  });

  it('stores each alert once and lists newest first', async () => {
    const store = new InMemoryLayeredStore();
    const result = await store.transaction((tx) =>
      tx.appendRaw(
        {
          alerts: [
            alert('a1', 0),
            alert('a2', 10, { alertType: 'STALE_DATA', severity: 'LOW' }),
            alert('a1', 0),
          ],
        },
        T0,
      ),
    );
    expect(result.alerts).toBe(2);

    expect((await store.listAlerts()).map((a) => a.alertId)).toEqual(['a2', 'a1']);
    expect((await store.listAlerts({ severity: 'HIGH' })).map((a) => a.alertId)).toEqual(['a1']);
    expect((await store.counts()).alerts).toEqual({
      VALIDATION_ERROR: 0,
      STALE_DATA: 1,
      GEOGRAPHIC_VIOLATION: 0,
      SPEED_VIOLATION: 1,
    });
  });

  it('starts watermarks at zero', async () => {
    const store = new InMemoryLayeredStore();
    await store.transaction((tx) => tx.setWatermark('aggregate:vehicle_positions:3600', 42));
    const values = await store.transaction(async (tx) => [
      await tx.getWatermark('aggregate:vehicle_positions:3600'),
      await tx.getWatermark('promote:trip_updates'),
    ]);
    expect(values).toEqual([42, 0]);
  });
});
