import { v4 as uuidv4 } from 'uuid';
import {
  DEFAULT_QUALITY_GATE_CONFIG,
  GLOBAL_BOUNDS,
  SCHEDULE_RELATIONSHIPS,
  secondsBetween,
  toUtcDate,
  weatherConditionFromWmo,
} from '@feedgate/domain';
import type {
  AlertSeverity,
  BoundingBox,
  QualityAlert,
  QualityEntityType,
  QualityGateConfig,
  RawTripUpdate,
  RawVehiclePosition,
  RawWeatherObservation,
  Rejection,
  RejectionReason,
  TimestampInput,
  TripUpdate,
  ValidationResult,
  VehiclePosition,
  WeatherObservation,
} from '@feedgate/domain';

export interface GateContext {
  now: Date;
  config: QualityGateConfig;
}

/**
 * A named check. Returns null when the input passes.
 * Rules run in array order and the first rejection wins.
 */
export interface QualityRule<T> {
  readonly name: string;
  check(input: T, ctx: GateContext): Rejection | null;
}

/**
 * Rules over the raw record, then a normalisation step that yields the typed
 * record (UTC timestamps), then rules over that record.
 */
interface GateDefinition<R, V> {
  readonly rawRules: readonly QualityRule<R>[];
  readonly normalize: QualityRule<R> & { build(input: R): V | null };
  readonly recordRules: readonly QualityRule<V>[];
}

function reject(
  reason: RejectionReason,
  rule: string,
  message: string,
  field?: string,
  value?: unknown,
): Rejection {
  return {
    reason,
    rule,
    message,
    field,
    value: value === undefined ? undefined : value instanceof Date ? value.toISOString() : String(value),
  };
}

function runGate<R, V>(def: GateDefinition<R, V>, input: R, ctx: GateContext): ValidationResult<V> {
  for (const rule of def.rawRules) {
    const rejection = rule.check(input, ctx);
    if (rejection) return { ok: false, rejection };
  }
  const normalizeRejection = def.normalize.check(input, ctx);
  if (normalizeRejection) return { ok: false, rejection: normalizeRejection };
  const record = def.normalize.build(input);
  if (!record) {
    return {
      ok: false,
      rejection: reject('VALIDATION_ERROR', def.normalize.name, 'record could not be normalised'),
    };
  }
  for (const rule of def.recordRules) {
    const rejection = rule.check(record, ctx);
    if (rejection) return { ok: false, rejection };
  }
  return { ok: true, record };
}

// ─── Shared checks ────────────────────────────────────────────────────────────

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim().length === 0;
}

function isMissingTimestamp(value: TimestampInput | undefined): boolean {
  return value === undefined || (typeof value === 'string' && value.trim().length === 0);
}

function firstMissing(fields: ReadonlyArray<[string, boolean]>): string | undefined {
  return fields.find(([, missing]) => missing)?.[0];
}

function missingFieldRule<T>(fields: (input: T) => ReadonlyArray<[string, boolean]>): QualityRule<T> {
  return {
    name: 'required_fields',
    check: (input) => {
      const field = firstMissing(fields(input));
      return field ? reject('VALIDATION_ERROR', 'required_fields', `${field} is required`, field) : null;
    },
  };
}

function outOfRange(
  rule: string,
  field: string,
  value: number | undefined,
  inRange: (v: number) => boolean,
  expected: string,
): Rejection | null {
  if (value === undefined) return null;
  if (isFiniteNumber(value) && inRange(value)) return null;
  return reject('VALIDATION_ERROR', rule, `${field} ${value} outside ${expected}`, field, value);
}

function firstOf(...checks: Array<() => Rejection | null>): Rejection | null {
  for (const check of checks) {
    const rejection = check();
    if (rejection) return rejection;
  }
  return null;
}

function unparseableTimestamp(
  fields: ReadonlyArray<[string, TimestampInput | undefined]>,
): Rejection | null {
  for (const [field, value] of fields) {
    if (value !== undefined && toUtcDate(value) === null) {
      return reject('VALIDATION_ERROR', 'timestamp_utc', `${field} is not a valid timestamp`, field, value);
    }
  }
  return null;
}

function optionalUtc(value: TimestampInput | undefined): Date | undefined {
  return toUtcDate(value) ?? undefined;
}

function boundsFor(ctx: GateContext, agencyId: string): BoundingBox {
  return ctx.config.agencyBounds[agencyId] ?? GLOBAL_BOUNDS;
}

function geographicRule<T extends { latitude: number; longitude: number; agencyId: string }>(): QualityRule<T> {
  return {
    name: 'geographic_bounds',
    check: (rec, ctx) => {
      const b = boundsFor(ctx, rec.agencyId);
      if (rec.latitude < b.minLat || rec.latitude > b.maxLat) {
        return reject(
          'GEOGRAPHIC_VIOLATION',
          'geographic_bounds',
          `latitude ${rec.latitude} outside service area of ${rec.agencyId} [${b.minLat}, ${b.maxLat}]`,
          'latitude',
          rec.latitude,
        );
      }
      if (rec.longitude < b.minLon || rec.longitude > b.maxLon) {
        return reject(
          'GEOGRAPHIC_VIOLATION',
          'geographic_bounds',
          `longitude ${rec.longitude} outside service area of ${rec.agencyId} [${b.minLon}, ${b.maxLon}]`,
          'longitude',
          rec.longitude,
        );
      }
      return null;
    },
  };
}

function freshnessRule<T>(
  field: string,
  timestamp: (rec: T) => Date,
  maxAgeSeconds: (config: QualityGateConfig) => number,
): QualityRule<T> {
  return {
    name: 'freshness',
    check: (rec, ctx) => {
      const ts = timestamp(rec);
      const age = secondsBetween(ts, ctx.now);
      const limit = maxAgeSeconds(ctx.config);
      return age > limit
        ? reject('STALE_DATA', 'freshness', `${field} is ${Math.round(age)}s old (limit ${limit}s)`, field, ts)
        : null;
    },
  };
}

// ─── Vehicle positions ────────────────────────────────────────────────────────

const vehiclePositionGate: GateDefinition<RawVehiclePosition, VehiclePosition> = {
  rawRules: [
    missingFieldRule<RawVehiclePosition>((p) => [
      ['vehicleId', isBlank(p.vehicleId)],
      ['agencyId', isBlank(p.agencyId)],
      ['latitude', p.latitude === undefined],
      ['longitude', p.longitude === undefined],
      ['timestamp', isMissingTimestamp(p.timestamp)],
      ['feedTimestamp', isMissingTimestamp(p.feedTimestamp)],
    ]),
    {
      name: 'ranges',
      check: (p) =>
        firstOf(
          () => outOfRange('ranges', 'latitude', p.latitude, (v) => v >= -90 && v <= 90, '[-90, 90]'),
          () => outOfRange('ranges', 'longitude', p.longitude, (v) => v >= -180 && v <= 180, '[-180, 180]'),
          () => outOfRange('ranges', 'bearing', p.bearing, (v) => v >= 0 && v < 360, '[0, 360)'),
          () => outOfRange('ranges', 'speed', p.speed, (v) => v >= 0, '[0, ∞)'),
          () =>
            outOfRange(
              'ranges',
              'currentStopSequence',
              p.currentStopSequence,
              (v) => Number.isInteger(v) && v >= 0,
              'non-negative integers',
            ),
        ),
    },
    {
      name: 'speed_limit',
      check: (p, ctx) =>
        p.speed !== undefined && p.speed > ctx.config.maxSpeedMps
          ? reject(
              'SPEED_VIOLATION',
              'speed_limit',
              `speed ${p.speed} m/s exceeds limit ${ctx.config.maxSpeedMps} m/s`,
              'speed',
              p.speed,
            )
          : null,
    },
  ],
  normalize: {
    name: 'timestamp_utc',
    check: (p) =>
      unparseableTimestamp([
        ['timestamp', p.timestamp],
        ['feedTimestamp', p.feedTimestamp],
      ]),
    build: (p) => {
      const timestamp = toUtcDate(p.timestamp);
      const feedTimestamp = toUtcDate(p.feedTimestamp);
      if (!timestamp || !feedTimestamp || p.latitude === undefined || p.longitude === undefined) {
        return null;
      }
      return {
        vehicleId: p.vehicleId,
        tripId: p.tripId,
        routeId: p.routeId,
        latitude: p.latitude,
        longitude: p.longitude,
        bearing: p.bearing,
        speed: p.speed,
        timestamp,
        feedTimestamp,
        currentStopSequence: p.currentStopSequence,
        stopId: p.stopId,
        currentStatus: p.currentStatus,
        congestionLevel: p.congestionLevel,
        occupancyStatus: p.occupancyStatus,
        agencyId: p.agencyId,
      };
    },
  },
  recordRules: [
    freshnessRule('timestamp', (p) => p.timestamp, (c) => c.maxPositionAgeSeconds),
    geographicRule<VehiclePosition>(),
  ],
};

// ─── Trip updates ─────────────────────────────────────────────────────────────

function delayCheck(field: string, delay: number | undefined, config: QualityGateConfig): Rejection | null {
  if (delay === undefined) return null;
  if (delay >= config.minDelaySeconds && delay <= config.maxDelaySeconds) return null;
  return reject(
    'VALIDATION_ERROR',
    'delay_bounds',
    `${field} ${delay}s outside [${config.minDelaySeconds}, ${config.maxDelaySeconds}]`,
    field,
    delay,
  );
}

const tripUpdateGate: GateDefinition<RawTripUpdate, TripUpdate> = {
  rawRules: [
    missingFieldRule<RawTripUpdate>((u) => [
      ['tripId', isBlank(u.tripId)],
      ['stopId', isBlank(u.stopId)],
      ['agencyId', isBlank(u.agencyId)],
      ['stopSequence', u.stopSequence === undefined],
      ['timestamp', isMissingTimestamp(u.timestamp)],
    ]),
    {
      name: 'ranges',
      check: (u) =>
        firstOf(
          () =>
            outOfRange(
              'ranges',
              'stopSequence',
              u.stopSequence,
              (v) => Number.isInteger(v) && v >= 0,
              'non-negative integers',
            ),
          () =>
            u.scheduleRelationship !== undefined &&
            !SCHEDULE_RELATIONSHIPS.includes(u.scheduleRelationship)
              ? reject(
                  'VALIDATION_ERROR',
                  'ranges',
                  `scheduleRelationship ${u.scheduleRelationship} is not a known relationship`,
                  'scheduleRelationship',
                  u.scheduleRelationship,
                )
              : null,
        ),
    },
  ],
  normalize: {
    name: 'timestamp_utc',
    check: (u) =>
      unparseableTimestamp([
        ['timestamp', u.timestamp],
        ['arrivalTime', u.arrivalTime],
        ['departureTime', u.departureTime],
      ]),
    build: (u) => {
      const timestamp = toUtcDate(u.timestamp);
      if (!timestamp || u.stopSequence === undefined) return null;
      return {
        tripId: u.tripId,
        routeId: u.routeId,
        vehicleId: u.vehicleId,
        stopSequence: u.stopSequence,
        stopId: u.stopId,
        arrivalDelay: u.arrivalDelay,
        departureDelay: u.departureDelay,
        arrivalTime: optionalUtc(u.arrivalTime),
        departureTime: optionalUtc(u.departureTime),
        scheduleRelationship: u.scheduleRelationship ?? 'SCHEDULED',
        agencyId: u.agencyId,
        timestamp,
      };
    },
  },
  recordRules: [
    {
      name: 'arrival_before_departure',
      check: (u) =>
        u.arrivalTime && u.departureTime && u.arrivalTime > u.departureTime
          ? reject(
              'VALIDATION_ERROR',
              'arrival_before_departure',
              `arrivalTime ${u.arrivalTime.toISOString()} is after departureTime ${u.departureTime.toISOString()}`,
              'arrivalTime',
              u.arrivalTime,
            )
          : null,
    },
    {
      name: 'delay_bounds',
      check: (u, ctx) =>
        firstOf(
          () => delayCheck('arrivalDelay', u.arrivalDelay, ctx.config),
          () => delayCheck('departureDelay', u.departureDelay, ctx.config),
        ),
    },
  ],
};

// ─── Weather observations ─────────────────────────────────────────────────────

const weatherGate: GateDefinition<RawWeatherObservation, WeatherObservation> = {
  rawRules: [
    missingFieldRule<RawWeatherObservation>((w) => [
      ['agencyId', isBlank(w.agencyId)],
      ['latitude', w.latitude === undefined],
      ['longitude', w.longitude === undefined],
      ['temperatureCelsius', w.temperatureCelsius === undefined],
      ['precipitationMm', w.precipitationMm === undefined],
      ['windSpeedKmh', w.windSpeedKmh === undefined],
      ['weatherCode', w.weatherCode === undefined],
      ['observationTime', isMissingTimestamp(w.observationTime)],
    ]),
    {
      name: 'ranges',
      check: (w) =>
        firstOf(
          () => outOfRange('ranges', 'latitude', w.latitude, (v) => v >= -90 && v <= 90, '[-90, 90]'),
          () => outOfRange('ranges', 'longitude', w.longitude, (v) => v >= -180 && v <= 180, '[-180, 180]'),
          () =>
            outOfRange('ranges', 'temperatureCelsius', w.temperatureCelsius, (v) => v >= -50 && v <= 60, '[-50, 60]'),
          () => outOfRange('ranges', 'precipitationMm', w.precipitationMm, (v) => v >= 0, '[0, ∞)'),
          () => outOfRange('ranges', 'windSpeedKmh', w.windSpeedKmh, (v) => v >= 0 && v <= 200, '[0, 200]'),
          () =>
            outOfRange(
              'ranges',
              'weatherCode',
              w.weatherCode,
              (v) => Number.isInteger(v) && v >= 0 && v <= 99,
              'WMO codes [0, 99]',
            ),
        ),
    },
  ],
  normalize: {
    name: 'timestamp_utc',
    check: (w) => unparseableTimestamp([['observationTime', w.observationTime]]),
    build: (w) => {
      const observationTime = toUtcDate(w.observationTime);
      if (
        !observationTime ||
        w.latitude === undefined ||
        w.longitude === undefined ||
        w.temperatureCelsius === undefined ||
        w.precipitationMm === undefined ||
        w.windSpeedKmh === undefined ||
        w.weatherCode === undefined
      ) {
        return null;
      }
      return {
        latitude: w.latitude,
        longitude: w.longitude,
        temperatureCelsius: w.temperatureCelsius,
        precipitationMm: w.precipitationMm,
        windSpeedKmh: w.windSpeedKmh,
        weatherCode: w.weatherCode,
        weatherCondition: weatherConditionFromWmo(w.weatherCode),
        observationTime,
        agencyId: w.agencyId,
      };
    },
  },
  recordRules: [
    freshnessRule('observationTime', (w) => w.observationTime, (c) => c.maxWeatherAgeSeconds),
    geographicRule<WeatherObservation>(),
  ],
};

// ─── Public surface ───────────────────────────────────────────────────────────

export function validateVehiclePosition(
  raw: RawVehiclePosition,
  ctx: GateContext,
): ValidationResult<VehiclePosition> {
  return runGate(vehiclePositionGate, raw, ctx);
}

export function validateTripUpdate(raw: RawTripUpdate, ctx: GateContext): ValidationResult<TripUpdate> {
  return runGate(tripUpdateGate, raw, ctx);
}

export function validateWeatherObservation(
  raw: RawWeatherObservation,
  ctx: GateContext,
): ValidationResult<WeatherObservation> {
  return runGate(weatherGate, raw, ctx);
}

function ruleNames<R, V>(def: GateDefinition<R, V>): string[] {
  return [...def.rawRules.map((r) => r.name), def.normalize.name, ...def.recordRules.map((r) => r.name)];
}

/** Evaluation order of each rule set. */
export const RULE_ORDER: Readonly<Record<QualityEntityType, readonly string[]>> = {
  vehicle_position: ruleNames(vehiclePositionGate),
  trip_update: ruleNames(tripUpdateGate),
  weather_observation: ruleNames(weatherGate),
};

/** The thresholds are fixed at construction; `now` is supplied per call. */
export class QualityGate {
  constructor(readonly config: QualityGateConfig = DEFAULT_QUALITY_GATE_CONFIG) {}

  validatePosition(raw: RawVehiclePosition, now: Date): ValidationResult<VehiclePosition> {
    return validateVehiclePosition(raw, { now, config: this.config });
  }

  validateTripUpdate(raw: RawTripUpdate, now: Date): ValidationResult<TripUpdate> {
    return validateTripUpdate(raw, { now, config: this.config });
  }

  validateWeather(raw: RawWeatherObservation, now: Date): ValidationResult<WeatherObservation> {
    return validateWeatherObservation(raw, { now, config: this.config });
  }
}

// ─── Alerts ───────────────────────────────────────────────────────────────────

export type GateSubject =
  | { kind: 'vehicle_position'; record: RawVehiclePosition }
  | { kind: 'trip_update'; record: RawTripUpdate }
  | { kind: 'weather_observation'; record: RawWeatherObservation };

function subjectId(subject: GateSubject): string | undefined {
  switch (subject.kind) {
    case 'vehicle_position':
      return subject.record.vehicleId || undefined;
    case 'trip_update':
      return subject.record.tripId ? `${subject.record.tripId}:${subject.record.stopSequence ?? ''}` : undefined;
    case 'weather_observation':
      return subject.record.latitude !== undefined && subject.record.longitude !== undefined
        ? `${subject.record.latitude},${subject.record.longitude}`
        : undefined;
  }
}

export function alertSeverity(
  rejection: Rejection,
  subject: GateSubject,
  config: QualityGateConfig = DEFAULT_QUALITY_GATE_CONFIG,
): AlertSeverity {
  switch (rejection.reason) {
    case 'SPEED_VIOLATION': {
      const speed = subject.kind === 'vehicle_position' ? subject.record.speed : undefined;
      return speed !== undefined && speed > 2 * config.maxSpeedMps ? 'CRITICAL' : 'HIGH';
    }
    case 'GEOGRAPHIC_VIOLATION':
      return 'HIGH';
    case 'VALIDATION_ERROR':
      return 'MEDIUM';
    case 'STALE_DATA':
      return 'LOW';
  }
}

export function toQualityAlert(
  rejection: Rejection,
  subject: GateSubject,
  detectedAt: Date,
  config: QualityGateConfig = DEFAULT_QUALITY_GATE_CONFIG,
): QualityAlert {
  return {
    alertId: uuidv4(),
    alertType: rejection.reason,
    severity: alertSeverity(rejection, subject, config),
    entityType: subject.kind,
    entityId: subjectId(subject),
    agencyId: subject.record.agencyId,
    errorMessage: `${rejection.rule}: ${rejection.message}`,
    fieldName: rejection.field,
    fieldValue: rejection.value,
    detectedAt,
  };
}
