import { decodeFeedMessage } from '@feedgate/adapters';
import type { GtfsFeedEntity, GtfsTripUpdate, GtfsVehiclePosition } from '@feedgate/adapters';
import {
  CONGESTION_LEVEL_CODES,
  DecodeError,
  OCCUPANCY_STATUS_CODES,
  SCHEDULE_RELATIONSHIP_CODES,
  VEHICLE_STOP_STATUS_CODES,
  decodeEnum,
} from '@feedgate/domain';
import type {
  CodeTable,
  CodeValue,
  EnumField,
  RawTripUpdate,
  RawVehiclePosition,
  UnmappedCode,
} from '@feedgate/domain';

export interface SkippedEntities {
  /** Vehicle entities with no position payload. */
  noPosition: number;
  /** Trip update entities with no trip id. */
  noTripId: number;
  deleted: number;
  /** Entities carrying neither a vehicle nor a trip update (e.g. service alerts). */
  noPayload: number;
}

export interface DecodedFeed {
  positions: RawVehiclePosition[];
  tripUpdates: RawTripUpdate[];
  feedTimestamp: Date;
  entityCount: number;
  skipped: SkippedEntities;
}

export function totalSkipped(skipped: SkippedEntities): number {
  return skipped.noPosition + skipped.noTripId + skipped.deleted + skipped.noPayload;
}

function fromEpochSeconds(seconds: number): Date {
  return new Date(seconds * 1000);
}

/**
 * Maps one enumerated wire code. Unknown codes leave the field unset and are
 * recorded so that they reach the raw layer.
 */
function mapCode<T extends CodeTable>(
  table: T,
  field: EnumField,
  code: number | undefined,
  unmapped: UnmappedCode[],
): CodeValue<T> | undefined {
  if (code === undefined) return undefined;
  const decoded = decodeEnum(table, code);
  switch (decoded.kind) {
    case 'known':
      return decoded.value;
    case 'unknown':
      unmapped.push({ field, code: decoded.code });
      return undefined;
  }
}

function toRawPosition(
  entityId: string,
  vehicle: GtfsVehiclePosition,
  agencyId: string,
  feedTimestamp: Date,
): RawVehiclePosition | null {
  const position = vehicle.position;
  if (!position) return null;

  const unmapped: UnmappedCode[] = [];
  return {
    vehicleId: vehicle.vehicle?.id || entityId,
    tripId: vehicle.trip?.tripId,
    routeId: vehicle.trip?.routeId,
    latitude: position.latitude,
    longitude: position.longitude,
    bearing: position.bearing,
    speed: position.speed,
    timestamp: vehicle.timestamp !== undefined ? fromEpochSeconds(vehicle.timestamp) : feedTimestamp,
    feedTimestamp,
    currentStopSequence: vehicle.currentStopSequence,
    stopId: vehicle.stopId,
    currentStatus: mapCode(VEHICLE_STOP_STATUS_CODES, 'currentStatus', vehicle.currentStatus, unmapped),
    congestionLevel: mapCode(CONGESTION_LEVEL_CODES, 'congestionLevel', vehicle.congestionLevel, unmapped),
    occupancyStatus: mapCode(OCCUPANCY_STATUS_CODES, 'occupancyStatus', vehicle.occupancyStatus, unmapped),
    agencyId,
    unmappedCodes: unmapped.length > 0 ? unmapped : undefined,
  };
}

/** One record per stop-time update, each inheriting the trip's identifiers. */
function fanOutTripUpdate(
  tripUpdate: GtfsTripUpdate,
  agencyId: string,
  feedTimestamp: Date,
): RawTripUpdate[] | null {
  const tripId = tripUpdate.trip.tripId;
  if (!tripId) return null;

  const routeId = tripUpdate.trip.routeId;
  const vehicleId = tripUpdate.vehicle?.id;
  const timestamp =
    tripUpdate.timestamp !== undefined ? fromEpochSeconds(tripUpdate.timestamp) : feedTimestamp;

  return tripUpdate.stopTimeUpdate.map((stu) => {
    const unmapped: UnmappedCode[] = [];
    return {
      tripId,
      routeId,
      vehicleId,
      stopSequence: stu.stopSequence ?? 0,
      stopId: stu.stopId ?? '',
      arrivalDelay: stu.arrival?.delay,
      departureDelay: stu.departure?.delay,
      arrivalTime: stu.arrival?.time !== undefined ? fromEpochSeconds(stu.arrival.time) : undefined,
      departureTime:
        stu.departure?.time !== undefined ? fromEpochSeconds(stu.departure.time) : undefined,
      scheduleRelationship: mapCode(
        SCHEDULE_RELATIONSHIP_CODES,
        'scheduleRelationship',
        stu.scheduleRelationship,
        unmapped,
      ),
      agencyId,
      timestamp,
      unmappedCodes: unmapped.length > 0 ? unmapped : undefined,
    };
  });
}

function decodeEntity(
  entity: GtfsFeedEntity,
  agencyId: string,
  feedTimestamp: Date,
  out: DecodedFeed,
): void {
  if (entity.isDeleted) {
    out.skipped.deleted++;
    return;
  }
  if (!entity.vehicle && !entity.tripUpdate) {
    out.skipped.noPayload++;
    return;
  }
  if (entity.vehicle) {
    const position = toRawPosition(entity.id, entity.vehicle, agencyId, feedTimestamp);
    if (position) out.positions.push(position);
    else out.skipped.noPosition++;
  }
  if (entity.tripUpdate) {
    const updates = fanOutTripUpdate(entity.tripUpdate, agencyId, feedTimestamp);
    if (updates) out.tripUpdates.push(...updates);
    else out.skipped.noTripId++;
  }
}

/**
 * Decodes a binary GTFS-Realtime message into raw records.
 * Throws DecodeError when the bytes do not parse or the header has no timestamp.
 */
export function decodeFeed(bytes: Uint8Array, agencyId: string): DecodedFeed {
  const message = decodeFeedMessage(bytes);
  if (message.header.timestamp === undefined) {
    throw new DecodeError('feed header has no timestamp');
  }
  const feedTimestamp = fromEpochSeconds(message.header.timestamp);

  const out: DecodedFeed = {
    positions: [],
    tripUpdates: [],
    feedTimestamp,
    entityCount: message.entity.length,
    skipped: { noPosition: 0, noTripId: 0, deleted: 0, noPayload: 0 },
  };
  for (const entity of message.entity) {
    decodeEntity(entity, agencyId, feedTimestamp, out);
  }
  return out;
}

