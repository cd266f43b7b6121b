// GTFS-Realtime enumerated wire codes.
//
// Each table is the single source of truth for its value union, so a code and
// its label can never drift apart. Decoding goes through `decodeEnum`, which
// forces the caller to handle codes the table does not know.

export const VEHICLE_STOP_STATUS_CODES = {
  0: 'INCOMING_AT',
  1: 'STOPPED_AT',
  2: 'IN_TRANSIT_TO',
} as const;

export const CONGESTION_LEVEL_CODES = {
  0: 'UNKNOWN_CONGESTION_LEVEL',
  1: 'RUNNING_SMOOTHLY',
  2: 'STOP_AND_GO',
  3: 'CONGESTION',
  4: 'SEVERE_CONGESTION',
} as const;

export const OCCUPANCY_STATUS_CODES = {
  0: 'EMPTY',
  1: 'MANY_SEATS_AVAILABLE',
  2: 'FEW_SEATS_AVAILABLE',
  3: 'STANDING_ROOM_ONLY',
  4: 'CRUSHED_STANDING_ROOM_ONLY',
  5: 'FULL',
  6: 'NOT_ACCEPTING_PASSENGERS',
} as const;

export const SCHEDULE_RELATIONSHIP_CODES = {
  0: 'SCHEDULED',
  1: 'SKIPPED',
  2: 'NO_DATA',
  3: 'UNSCHEDULED',
} as const;

export type CodeTable = Readonly<Record<number, string>>;
export type CodeValue<T extends CodeTable> = T[keyof T & number];

export type VehicleStopStatus = CodeValue<typeof VEHICLE_STOP_STATUS_CODES>;
export type CongestionLevel = CodeValue<typeof CONGESTION_LEVEL_CODES>;
export type OccupancyStatus = CodeValue<typeof OCCUPANCY_STATUS_CODES>;
export type ScheduleRelationship = CodeValue<typeof SCHEDULE_RELATIONSHIP_CODES>;

export const VEHICLE_STOP_STATUSES: readonly VehicleStopStatus[] = Object.values(VEHICLE_STOP_STATUS_CODES);
export const CONGESTION_LEVELS: readonly CongestionLevel[] = Object.values(CONGESTION_LEVEL_CODES);
export const OCCUPANCY_STATUSES: readonly OccupancyStatus[] = Object.values(OCCUPANCY_STATUS_CODES);
export const SCHEDULE_RELATIONSHIPS: readonly ScheduleRelationship[] = Object.values(
  SCHEDULE_RELATIONSHIP_CODES,
);

/** Result of mapping a wire code: either a known label or the raw code. */
export type DecodedEnum<T extends string> =
  | { readonly kind: 'known'; readonly value: T }
  | { readonly kind: 'unknown'; readonly code: number };

function isKnownCode<T extends CodeTable>(table: T, code: number): code is keyof T & number {
  return Number.isInteger(code) && Object.prototype.hasOwnProperty.call(table, code);
}

export function decodeEnum<T extends CodeTable>(table: T, code: number): DecodedEnum<CodeValue<T>> {
  if (isKnownCode(table, code)) {
    return { kind: 'known', value: table[code] };
  }
  return { kind: 'unknown', code };
}

/** Field name plus wire code of an enumerated value the decoder could not map. */
export interface UnmappedCode {
  readonly field: EnumField;
  readonly code: number;
}

export type EnumField = 'currentStatus' | 'congestionLevel' | 'occupancyStatus' | 'scheduleRelationship';

export const ENUM_FIELDS: readonly EnumField[] = [
  'currentStatus',
  'congestionLevel',
  'occupancyStatus',
  'scheduleRelationship',
];

/** Numeric congestion score used by the hourly aggregates. */
export function congestionScore(level: CongestionLevel | undefined): number {
  switch (level) {
    case 'RUNNING_SMOOTHLY':
      return 1;
    case 'STOP_AND_GO':
      return 2;
    case 'CONGESTION':
      return 3;
    case 'SEVERE_CONGESTION':
      return 4;
    case 'UNKNOWN_CONGESTION_LEVEL':
    case undefined:
      return 0;
  }
}

export function isUnmappedCode(value: unknown): value is UnmappedCode {
  if (typeof value !== 'object' || value === null) return false;
  const field: unknown = Reflect.get(value, 'field');
  const code: unknown = Reflect.get(value, 'code');
  return ENUM_FIELDS.some((f) => f === field) && typeof code === 'number' && Number.isInteger(code);
}
