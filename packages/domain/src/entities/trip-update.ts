import type { ScheduleRelationship, UnmappedCode } from './gtfs-codes.js';
import type { TimestampInput } from './vehicle-position.js';

/** One stop-time update fanned out of a GTFS-RT trip update entity. */
export interface RawTripUpdate {
  readonly tripId: string;
  readonly routeId?: string;
  readonly vehicleId?: string;
  readonly stopSequence?: number;
  readonly stopId: string;
  readonly arrivalDelay?: number; // seconds, negative = early
  readonly departureDelay?: number;
  readonly arrivalTime?: TimestampInput;
  readonly departureTime?: TimestampInput;
  readonly scheduleRelationship?: ScheduleRelationship;
  readonly agencyId: string;
  readonly timestamp?: TimestampInput;
  readonly unmappedCodes?: readonly UnmappedCode[];
}

export interface TripUpdate {
  readonly tripId: string;
  readonly routeId?: string;
  readonly vehicleId?: string;
  readonly stopSequence: number;
  readonly stopId: string;
  readonly arrivalDelay?: number;
  readonly departureDelay?: number;
  readonly arrivalTime?: Date;
  readonly departureTime?: Date;
  readonly scheduleRelationship: ScheduleRelationship;
  readonly agencyId: string;
  readonly timestamp: Date;
}
