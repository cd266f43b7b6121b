import type { RejectionReason } from './quality.js';

export type AlertSeverity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export const ALERT_SEVERITIES: readonly AlertSeverity[] = ['LOW', 'MEDIUM', 'HIGH', 'CRITICAL'];

export type QualityEntityType = 'vehicle_position' | 'trip_update' | 'weather_observation';

export const QUALITY_ENTITY_TYPES: readonly QualityEntityType[] = [
  'vehicle_position',
  'trip_update',
  'weather_observation',
];

/** A record excluded from the validated layer, with the reason it was excluded. */
export interface QualityAlert {
  readonly alertId: string;
  readonly alertType: RejectionReason;
  readonly severity: AlertSeverity;
  readonly entityType: QualityEntityType;
  readonly entityId?: string;
  readonly agencyId: string;
  readonly errorMessage: string;
  readonly fieldName?: string;
  readonly fieldValue?: string;
  readonly detectedAt: Date;
}
