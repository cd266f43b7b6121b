import {
  DEFAULT_HEAT_MAP_GRID_SIZE,
  DEFAULT_NEARBY_RADIUS_METERS,
  DEFAULT_SLOW_ZONE_LIMIT,
  DEFAULT_SLOW_ZONE_THRESHOLD_KMH,
  EARTH_RADIUS_METERS,
  MPS_TO_KMH,
} from '@feedgate/domain';
import type {
  BoundingBox,
  HeatMapCell,
  NearbyVehicle,
  SlowZone,
  VehiclePosition,
} from '@feedgate/domain';

const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;

/** Great-circle distance between two WGS84 points, in meters. */
export function haversineMeters(lat1: number, lon1: number, lat2: number, lon2: number): number {
  const dLat = toRadians(lat2 - lat1);
  const dLon = toRadians(lon2 - lon1);
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(lat1)) * Math.cos(toRadians(lat2)) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_METERS * Math.asin(Math.min(1, Math.sqrt(h)));
}

function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function latestPerVehicle(positions: readonly VehiclePosition[]): VehiclePosition[] {
  const latest = new Map<string, VehiclePosition>();
  for (const p of positions) {
    const seen = latest.get(p.vehicleId);
    if (!seen || p.timestamp > seen.timestamp) latest.set(p.vehicleId, p);
  }
  return [...latest.values()];
}

/**
 * Vehicles whose most recent position lies within `radiusMeters` of the
 * point. An older position inside the radius does not count.
 */
export function findVehiclesNear(
  positions: readonly VehiclePosition[],
  latitude: number,
  longitude: number,
  radiusMeters: number = DEFAULT_NEARBY_RADIUS_METERS,
): NearbyVehicle[] {
  const out: NearbyVehicle[] = [];
  for (const p of latestPerVehicle(positions)) {
    const distanceMeters = haversineMeters(latitude, longitude, p.latitude, p.longitude);
    if (distanceMeters > radiusMeters) continue;
    out.push({
      vehicleId: p.vehicleId,
      routeId: p.routeId,
      latitude: p.latitude,
      longitude: p.longitude,
      speed: p.speed,
      timestamp: p.timestamp,
      distanceMeters,
    });
  }
  return out.sort((a, b) => a.distanceMeters - b.distanceMeters || a.vehicleId.localeCompare(b.vehicleId));
}

function cellIndex(value: number, min: number, max: number, gridSize: number): number {
  const span = max - min;
  if (span <= 0) return 0;
  // The max edge belongs to the last cell.
  return Math.min(gridSize - 1, Math.floor(((value - min) / span) * gridSize));
}

/** Observation density over `bounds`. Positions outside the box are ignored. */
export function buildHeatMap(
  positions: readonly VehiclePosition[],
  bounds: BoundingBox,
  gridSize: number = DEFAULT_HEAT_MAP_GRID_SIZE,
): HeatMapCell[] {
  const cells = new Map<string, { latCell: number; lonCell: number; rows: VehiclePosition[] }>();
  for (const p of positions) {
    if (p.latitude < bounds.minLat || p.latitude > bounds.maxLat) continue;
    if (p.longitude < bounds.minLon || p.longitude > bounds.maxLon) continue;
    const latCell = cellIndex(p.latitude, bounds.minLat, bounds.maxLat, gridSize);
    const lonCell = cellIndex(p.longitude, bounds.minLon, bounds.maxLon, gridSize);
    const id = `${latCell}|${lonCell}`;
    let cell = cells.get(id);
    if (!cell) {
      cell = { latCell, lonCell, rows: [] };
      cells.set(id, cell);
    }
    cell.rows.push(p);
  }

  const latStep = (bounds.maxLat - bounds.minLat) / gridSize;
  const lonStep = (bounds.maxLon - bounds.minLon) / gridSize;
  return [...cells.values()]
    .map(({ latCell, lonCell, rows }) => ({
      latCell,
      lonCell,
      centerLatitude: bounds.minLat + (latCell + 0.5) * latStep,
      centerLongitude: bounds.minLon + (lonCell + 0.5) * lonStep,
      observationCount: rows.length,
      vehicleCount: new Set(rows.map((p) => p.vehicleId)).size,
      avgSpeedKmh: mean(rows.flatMap((p) => (p.speed === undefined ? [] : [p.speed * MPS_TO_KMH]))),
    }))
    .sort(
      (a, b) => b.observationCount - a.observationCount || a.latCell - b.latCell || a.lonCell - b.lonCell,
    );
}

const roundToZone = (degrees: number): number => Math.round(degrees * 100) / 100;

interface ZoneAccumulator {
  latitude: number;
  longitude: number;
  speedsKmh: number[];
  routes: Set<string>;
}

export interface SlowZoneOptions {
  speedThresholdKmh?: number;
  minObservations?: number;
  limit?: number;
}

/**
 * Zones whose mean speed is strictly below the threshold. Positions without
 * a speed are not counted.
 */
export function findSlowZones(
  positions: readonly VehiclePosition[],
  opts: SlowZoneOptions = {},
): SlowZone[] {
  const threshold = opts.speedThresholdKmh ?? DEFAULT_SLOW_ZONE_THRESHOLD_KMH;
  const minObservations = opts.minObservations ?? 1;

  const zones = new Map<string, ZoneAccumulator>();
  for (const p of positions) {
    if (p.speed === undefined) continue;
    const latitude = roundToZone(p.latitude);
    const longitude = roundToZone(p.longitude);
    const id = `${latitude}|${longitude}`;
    let zone = zones.get(id);
    if (!zone) {
      zone = { latitude, longitude, speedsKmh: [], routes: new Set() };
      zones.set(id, zone);
    }
    zone.speedsKmh.push(p.speed * MPS_TO_KMH);
    if (p.routeId) zone.routes.add(p.routeId);
  }

  const out: SlowZone[] = [];
  for (const zone of zones.values()) {
    const avgSpeedKmh = mean(zone.speedsKmh);
    if (avgSpeedKmh === null || avgSpeedKmh >= threshold) continue;
    if (zone.speedsKmh.length < minObservations) continue;
    out.push({
      latitude: zone.latitude,
      longitude: zone.longitude,
      avgSpeedKmh,
      observationCount: zone.speedsKmh.length,
      affectedRoutes: [...zone.routes].sort(),
    });
  }
  return out
    .sort((a, b) => a.avgSpeedKmh - b.avgSpeedKmh || a.latitude - b.latitude || a.longitude - b.longitude)
    .slice(0, opts.limit ?? DEFAULT_SLOW_ZONE_LIMIT);
}
