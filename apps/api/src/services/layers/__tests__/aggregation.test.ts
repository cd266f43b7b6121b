import { describe, it, expect } from '@jest/globals';
import type { TripUpdate, VehiclePosition } from '@feedgate/domain';
import { computeRoutePerformance, computeVehicleMetrics, effectiveDelay } from '../aggregation.js';

const COMPUTED_AT = new Date('2024-03-10T16:00:00Z');

function position(overrides: Partial<VehiclePosition>): VehiclePosition {
  return {
    vehicleId: 'v1',
    routeId: '20',
    latitude: 45.52,
    longitude: -122.68,
    timestamp: new Date('2024-03-10T14:10:00Z'),
    feedTimestamp: new Date('2024-03-10T14:10:00Z'),
    agencyId: 'trimet',
    ...overrides,
  };
}

function update(overrides: Partial<TripUpdate>): TripUpdate {
  return {
    tripId: 't1',
    routeId: '72',
    stopSequence: 1,
    stopId: 'A',
    scheduleRelationship: 'SCHEDULED',
    agencyId: 'trimet',
    timestamp: new Date('2024-03-10T09:00:00Z'),
    ...overrides,
  };
}

describe('computeVehicleMetrics', () => {
  it('averages speeds in km/h and counts distinct vehicles per bucket', () => {
    const rows = computeVehicleMetrics(
      [
        position({ vehicleId: 'v1', speed: 10, congestionLevel: 'RUNNING_SMOOTHLY' }),
        position({ vehicleId: 'v2', speed: 5, congestionLevel: 'CONGESTION' }),
        position({ vehicleId: 'v1', timestamp: new Date('2024-03-10T14:50:00Z') }),
      ],
      3600,
      COMPUTED_AT,
    );

    expect(rows).toHaveLength(1);
    const [row] = rows;
    expect(row?.bucketStart).toEqual(new Date('2024-03-10T14:00:00Z'));
    expect(row?.bucketSeconds).toBe(3600);
    expect(row?.totalVehicles).toBe(2);
    expect(row?.avgSpeedKmh).toBe(27);
    expect(row?.maxSpeedKmh).toBe(36);
    expect(row?.avgCongestionScore).toBeCloseTo(4 / 3, 10);
    expect(row?.totalObservations).toBe(3);
    expect(row?.computedAt).toBe(COMPUTED_AT);
  });

  it('reports null speeds when no row carries a speed', () => {
    const [row] = computeVehicleMetrics([position({}), position({ vehicleId: 'v2' })], 3600, COMPUTED_AT);
    expect([row?.avgSpeedKmh, row?.maxSpeedKmh, row?.avgCongestionScore]).toEqual([null, null, 0]);
  });

  it('splits by bucket, agency and route and leaves routeless rows out', () => {
    const rows = computeVehicleMetrics(
      [
        position({}),
        position({ timestamp: new Date('2024-03-10T15:05:00Z') }),
        position({ routeId: '33' }),
        position({ agencyId: 'mbta' }),
        position({ routeId: undefined }),
      ],
      3600,
      COMPUTED_AT,
    );

    expect(rows.map((r) => [r.bucketStart.toISOString(), r.agencyId, r.routeId])).toEqual([
      ['2024-03-10T14:00:00.000Z', 'trimet', '20'],
      ['2024-03-10T15:00:00.000Z', 'trimet', '20'],
      ['2024-03-10T14:00:00.000Z', 'trimet', '33'],
      ['2024-03-10T14:00:00.000Z', 'mbta', '20'],
    ]);
  });

  it('honours narrower buckets', () => {
    const rows = computeVehicleMetrics(
      [position({}), position({ timestamp: new Date('2024-03-10T14:20:00Z') })],
      900,
      COMPUTED_AT,
    );
    expect(rows.map((r) => r.bucketStart.toISOString())).toEqual([
      '2024-03-10T14:00:00.000Z',
      '2024-03-10T14:15:00.000Z',
    ]);
  });
});

describe('computeRoutePerformance', () => {
  it('computes delay statistics and on-time share per day', () => {
    const rows = computeRoutePerformance(
      [
        update({ tripId: 't1', arrivalDelay: 0 }),
        update({ tripId: 't1', stopSequence: 2, arrivalDelay: 300 }),
        update({ tripId: 't2', arrivalDelay: 301 }),
        update({ tripId: 't3', departureDelay: -61 }),
        update({ tripId: 't4' }),
      ],
      COMPUTED_AT,
    );

    expect(rows).toEqual([
      {
        day: new Date('2024-03-10T00:00:00Z'),
        agencyId: 'trimet',
        routeId: '72',
        avgDelaySeconds: 135,
        maxDelaySeconds: 301,
        minDelaySeconds: -61,
        onTimePercentage: 50,
        totalTrips: 3,
        totalObservations: 4,
        computedAt: COMPUTED_AT,
      },
    ]);
  });

  it('groups by UTC day', () => {
    const rows = computeRoutePerformance(
      [
        update({ arrivalDelay: 10, timestamp: new Date('2024-03-10T23:59:59Z') }),
        update({ arrivalDelay: 20, timestamp: new Date('2024-03-11T00:00:00Z') }),
      ],
      COMPUTED_AT,
    );
    expect(rows.map((r) => [r.day.toISOString(), r.avgDelaySeconds])).toEqual([
      ['2024-03-10T00:00:00.000Z', 10],
      ['2024-03-11T00:00:00.000Z', 20],
    ]);
  });

  it('returns nothing when no update carries a delay', () => {
    expect(computeRoutePerformance([update({})], COMPUTED_AT)).toEqual([]);
  });
});

describe('effectiveDelay', () => {
  it('prefers the arrival delay', () => {
    expect(effectiveDelay(update({ arrivalDelay: 30, departureDelay: 45 }))).toBe(30);
    expect(effectiveDelay(update({ departureDelay: 45 }))).toBe(45);
    expect(effectiveDelay(update({}))).toBeUndefined();
  });
});
