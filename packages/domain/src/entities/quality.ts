export type RejectionReason =
  | 'VALIDATION_ERROR'
  | 'STALE_DATA'
  | 'GEOGRAPHIC_VIOLATION'
  | 'SPEED_VIOLATION';

export const REJECTION_REASONS: readonly RejectionReason[] = [
  'VALIDATION_ERROR',
  'STALE_DATA',
  'GEOGRAPHIC_VIOLATION',
  'SPEED_VIOLATION',
];

export interface Rejection {
  readonly reason: RejectionReason;
  /** Name of the rule that failed. */
  readonly rule: string;
  readonly message: string;
  readonly field?: string;
  readonly value?: string;
}

export type ValidationResult<T> =
  | { readonly ok: true; readonly record: T }
  | { readonly ok: false; readonly rejection: Rejection };

export type RejectionCounts = Record<RejectionReason, number>;

export function emptyRejectionCounts(): RejectionCounts {
  return { VALIDATION_ERROR: 0, STALE_DATA: 0, GEOGRAPHIC_VIOLATION: 0, SPEED_VIOLATION: 0 };
}

export interface BoundingBox {
  readonly minLat: number;
  readonly maxLat: number;
  readonly minLon: number;
  readonly maxLon: number;
}

export const GLOBAL_BOUNDS: BoundingBox = { minLat: -90, maxLat: 90, minLon: -180, maxLon: 180 };

export interface QualityGateConfig {
  readonly maxSpeedMps: number;
  readonly maxPositionAgeSeconds: number;
  readonly maxWeatherAgeSeconds: number;
  readonly minDelaySeconds: number;
  readonly maxDelaySeconds: number;
  /** Per-agency service area; agencies not listed fall back to `GLOBAL_BOUNDS`. */
  readonly agencyBounds: Readonly<Record<string, BoundingBox>>;
}

export const DEFAULT_QUALITY_GATE_CONFIG: QualityGateConfig = {
  maxSpeedMps: 33.3, // ~120 km/h
  maxPositionAgeSeconds: 300,
  maxWeatherAgeSeconds: 3600,
  minDelaySeconds: -3600,
  maxDelaySeconds: 7200,
  agencyBounds: {},
};
