import type { BoundingBox } from './quality.js';

export const EARTH_RADIUS_METERS = 6_371_000;

/** Latest validated position of a vehicle inside a search radius. */
export interface NearbyVehicle {
  readonly vehicleId: string;
  readonly routeId?: string;
  readonly latitude: number;
  readonly longitude: number;
  readonly speed?: number;
  readonly timestamp: Date;
  readonly distanceMeters: number;
}

/**
 * One cell of a `gridSize` x `gridSize` grid laid over `bounds`.
 * Cell (0, 0) is the south-west corner.
 */
export interface HeatMapCell {
  readonly latCell: number;
  readonly lonCell: number;
  readonly centerLatitude: number;
  readonly centerLongitude: number;
  readonly observationCount: number;
  readonly vehicleCount: number;
  readonly avgSpeedKmh: number | null;
}

/** Positions grouped by coordinates rounded to two decimals (~1 km). */
export interface SlowZone {
  readonly latitude: number;
  readonly longitude: number;
  readonly avgSpeedKmh: number;
  readonly observationCount: number;
  readonly affectedRoutes: string[];
}

export interface NearbyQuery {
  latitude: number;
  longitude: number;
  radiusMeters?: number;
  agencyId?: string;
  from?: Date;
  to?: Date;
}

export interface HeatMapQuery {
  bounds: BoundingBox;
  gridSize?: number;
  agencyId?: string;
  from?: Date;
  to?: Date;
}

export interface SlowZoneQuery {
  speedThresholdKmh?: number;
  minObservations?: number;
  agencyId?: string;
  from?: Date;
  to?: Date;
  limit?: number;
}

export const DEFAULT_NEARBY_RADIUS_METERS = 1000;
export const DEFAULT_HEAT_MAP_GRID_SIZE = 20;
export const DEFAULT_SLOW_ZONE_THRESHOLD_KMH = 10;
export const DEFAULT_SLOW_ZONE_LIMIT = 50;
/** Spatial queries without `from` look back this far. */
export const DEFAULT_SPATIAL_LOOKBACK_SECONDS = 3600;
