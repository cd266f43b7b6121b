import { MPS_TO_KMH, bucketStart, congestionScore } from '@feedgate/domain';
import type {
  HourlyVehicleMetrics,
  RoutePerformance,
  TripUpdate,
  VehiclePosition,
} from '@feedgate/domain';

export const DEFAULT_BUCKET_SECONDS = 3600;
export const DAY_SECONDS = 86_400;

/** Delays inside this range count as on time. */
export const ON_TIME_MIN_DELAY_SECONDS = -60;
export const ON_TIME_MAX_DELAY_SECONDS = 300;

interface GroupKey {
  start: Date;
  agencyId: string;
  routeId: string;
}

interface Routed {
  readonly agencyId: string;
  readonly routeId?: string;
}

/** Groups rows by (bucket, agency, route); rows without a route id are left out. */
function groupByBucket<T extends Routed>(
  rows: readonly T[],
  timestamp: (row: T) => Date,
  bucketSeconds: number,
): Map<string, { key: GroupKey; rows: T[] }> {
  const groups = new Map<string, { key: GroupKey; rows: T[] }>();
  for (const row of rows) {
    const { agencyId, routeId }: Routed = row;
    if (!routeId) continue;
    const start = bucketStart(timestamp(row), bucketSeconds);
    const id = `${start.getTime()}|${agencyId}|${routeId}`;
    let group = groups.get(id);
    if (!group) {
      group = { key: { start, agencyId, routeId }, rows: [] };
      groups.set(id, group);
    }
    group.rows.push(row);
  }
  return groups;
}

function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Per-bucket vehicle metrics. Every group is computed from the rows given,
 * so callers pass all validated rows of each bucket they want replaced.
 */
export function computeVehicleMetrics(
  positions: readonly VehiclePosition[],
  bucketSeconds: number,
  computedAt: Date,
): HourlyVehicleMetrics[] {
  const out: HourlyVehicleMetrics[] = [];
  for (const { key, rows } of groupByBucket(positions, (p) => p.timestamp, bucketSeconds).values()) {
    const speedsKmh = rows.flatMap((p) => (p.speed === undefined ? [] : [p.speed * MPS_TO_KMH]));
    out.push({
      bucketStart: key.start,
      bucketSeconds,
      agencyId: key.agencyId,
      routeId: key.routeId,
      totalVehicles: new Set(rows.map((p) => p.vehicleId)).size,
      avgSpeedKmh: mean(speedsKmh),
      maxSpeedKmh: speedsKmh.length > 0 ? Math.max(...speedsKmh) : null,
      avgCongestionScore: mean(rows.map((p) => congestionScore(p.congestionLevel))) ?? 0,
      totalObservations: rows.length,
      computedAt,
    });
  }
  return out;
}

export function effectiveDelay(update: TripUpdate): number | undefined {
  return update.arrivalDelay ?? update.departureDelay;
}

/** Per-day schedule adherence. Updates carrying no delay are skipped. */
export function computeRoutePerformance(
  updates: readonly TripUpdate[],
  computedAt: Date,
): RoutePerformance[] {
  const withDelay = updates.filter((u) => effectiveDelay(u) !== undefined);
  const out: RoutePerformance[] = [];
  for (const { key, rows } of groupByBucket(withDelay, (u) => u.timestamp, DAY_SECONDS).values()) {
    const delays = rows.flatMap((u) => {
      const delay = effectiveDelay(u);
      return delay === undefined ? [] : [delay];
    });
    const onTime = delays.filter(
      (d) => d >= ON_TIME_MIN_DELAY_SECONDS && d <= ON_TIME_MAX_DELAY_SECONDS,
    ).length;
    out.push({
      day: key.start,
      agencyId: key.agencyId,
      routeId: key.routeId,
      avgDelaySeconds: mean(delays) ?? 0,
      maxDelaySeconds: Math.max(...delays),
      minDelaySeconds: Math.min(...delays),
      onTimePercentage: (onTime / delays.length) * 100,
      totalTrips: new Set(rows.map((u) => u.tripId)).size,
      totalObservations: rows.length,
      computedAt,
    });
  }
  return out;
}
