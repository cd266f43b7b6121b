import { describe, it, expect } from '@jest/globals';
import { DeterministicClock, InMemoryLayeredStore } from '@feedgate/adapters';
import { emptyRejectionCounts } from '@feedgate/domain';
import type { LayerCounts, VehiclePosition } from '@feedgate/domain';
import { MetricsReporter, qualityRate } from '../metrics-reporter.service.js';

function counts(raw: number, validated: number): LayerCounts {
  return {
    raw: { vehicle_positions: raw, trip_updates: 0, weather_observations: 0 },
    validated: { vehicle_positions: validated, trip_updates: 0, weather_observations: 0 },
    hourlyMetrics: 0,
    routePerformance: 0,
    alerts: emptyRejectionCounts(),
  };
}

describe('qualityRate', () => {
  it('is validated over raw vehicle positions', () => {
    expect(qualityRate(counts(8, 6))).toBe(0.75);
  });

  it('is zero while the raw layer is empty', () => {
    expect(qualityRate(counts(0, 0))).toBe(0);
  });
});

describe('MetricsReporter', () => {
  it('reports layer counts with the quality rate', async () => {
    const store = new InMemoryLayeredStore();
    await store.transaction((tx) =>
      tx.appendRaw(
        {
          positions: [
            { vehicleId: 'v1', agencyId: 'trimet' },
            { vehicleId: 'v2', agencyId: 'trimet' },
          ],
        },
        new Date('2024-03-10T14:00:00Z'),
      ),
    );

    const metrics = await new MetricsReporter(store).metrics();

    expect(metrics.raw.vehicle_positions).toBe(2);
    expect(metrics.validated.vehicle_positions).toBe(0);
    expect(metrics.qualityRate).toBe(0);
    expect(metrics.alerts).toEqual(emptyRejectionCounts());
  });

  it('passes listings through to the store', async () => {
    const store = new InMemoryLayeredStore();
    const reporter = new MetricsReporter(store);
    await store.transaction((tx) =>
      tx.upsertRoutePerformance([
        {
          day: new Date('2024-03-10T00:00:00Z'),
          agencyId: 'trimet',
          routeId: '20',
          avgDelaySeconds: 30,
          maxDelaySeconds: 90,
          minDelaySeconds: -10,
          onTimePercentage: 100,
          totalTrips: 2,
          totalObservations: 3,
          computedAt: new Date('2024-03-11T00:00:00Z'),
        },
      ]),
    );

    expect(await reporter.routePerformance({ routeId: '20' })).toHaveLength(1);
    expect(await reporter.routePerformance({ routeId: '72' })).toEqual([]);
    expect(await reporter.hourlyMetrics()).toEqual([]);
    expect(await reporter.alerts()).toEqual([]);
  });
});

describe('MetricsReporter spatial queries', () => {
  const NOW = Date.parse('2024-03-10T14:00:10Z');

  function position(
    vehicleId: string,
    timestamp: string,
    overrides: Partial<VehiclePosition> = {},
  ): VehiclePosition {
    return {
      vehicleId,
      routeId: '20',
      latitude: 45.52,
      longitude: -122.68,
      speed: 2,
      timestamp: new Date(timestamp),
      feedTimestamp: new Date(timestamp),
      agencyId: 'trimet',
      ...overrides,
    };
  }

  async function seeded(): Promise<MetricsReporter> {
    const store = new InMemoryLayeredStore();
    await store.transaction((tx) =>
      tx.insertValidatedPositions(
        [
          position('recent', '2024-03-10T13:59:00Z'),
          position('old', '2024-03-10T12:30:00Z'),
          position('other-agency', '2024-03-10T13:59:00Z', { agencyId: 'mbta' }),
          position('fast', '2024-03-10T13:58:00Z', { latitude: 45.65, speed: 20 }),
        ],
        new Date(NOW),
      ),
    );
    return new MetricsReporter(store, new DeterministicClock(NOW));
  }

  it('looks back one hour by default', async () => {
    const reporter = await seeded();

    const near = await reporter.vehiclesNear({ latitude: 45.52, longitude: -122.68, agencyId: 'trimet' });

    expect(near.map((v) => v.vehicleId)).toEqual(['recent']);
  });

  it('honours an explicit start', async () => {
    const reporter = await seeded();

    const near = await reporter.vehiclesNear({
      latitude: 45.52,
      longitude: -122.68,
      agencyId: 'trimet',
      from: new Date('2024-03-10T12:00:00Z'),
    });

    expect(near.map((v) => v.vehicleId)).toEqual(['old', 'recent']);
  });

  it('builds a heat map over the requested bounds', async () => {
    const reporter = await seeded();

    const cells = await reporter.heatMap({
      bounds: { minLat: 45.5, maxLat: 45.7, minLon: -122.7, maxLon: -122.5 },
      gridSize: 2,
    });

    expect(cells.map((c) => [c.latCell, c.lonCell, c.observationCount])).toEqual([
      [0, 0, 2],
      [1, 0, 1],
    ]);
  });

  it('finds slow zones among recent positions', async () => {
    const reporter = await seeded();

    const zones = await reporter.slowZones({ agencyId: 'trimet' });

    expect(zones.map((z) => [z.latitude, z.longitude, z.observationCount])).toEqual([[45.52, -122.68, 1]]);
  });
});
