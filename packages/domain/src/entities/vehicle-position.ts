import type {
  CongestionLevel,
  OccupancyStatus,
  UnmappedCode,
  VehicleStopStatus,
} from './gtfs-codes.js';

/** Timestamp as it arrives from a decoder or collaborator; strings may be naive. */
export type TimestampInput = Date | string;

/**
 * Vehicle position as decoded, before the quality gate.
 * Identifiers may be empty and timestamps may be unparseable.
 */
export interface RawVehiclePosition {
  readonly vehicleId: string;
  readonly tripId?: string;
  readonly routeId?: string;
  readonly latitude?: number;
  readonly longitude?: number;
  readonly bearing?: number;
  readonly speed?: number; // m/s
  readonly timestamp?: TimestampInput;
  readonly feedTimestamp?: TimestampInput;
  readonly currentStopSequence?: number;
  readonly stopId?: string;
  readonly currentStatus?: VehicleStopStatus;
  readonly congestionLevel?: CongestionLevel;
  readonly occupancyStatus?: OccupancyStatus;
  readonly agencyId: string;
  readonly unmappedCodes?: readonly UnmappedCode[];
}

/** Vehicle position that passed every quality rule. Timestamps are UTC instants. */
export interface VehiclePosition {
  readonly vehicleId: string;
  readonly tripId?: string;
  readonly routeId?: string;
  readonly latitude: number;
  readonly longitude: number;
  readonly bearing?: number;
  readonly speed?: number; // m/s
  readonly timestamp: Date;
  readonly feedTimestamp: Date;
  readonly currentStopSequence?: number;
  readonly stopId?: string;
  readonly currentStatus?: VehicleStopStatus;
  readonly congestionLevel?: CongestionLevel;
  readonly occupancyStatus?: OccupancyStatus;
  readonly agencyId: string;
}

export const MPS_TO_KMH = 3.6;
