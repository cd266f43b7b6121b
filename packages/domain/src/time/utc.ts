import type { TimestampInput } from '../entities/vehicle-position.js';

// ISO-8601 strings that end in Z or a numeric offset carry their own zone.
const ZONED_ISO = /(Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Normalises a timestamp to a UTC instant.
 * Naive ISO strings (no zone designator) are read as UTC.
 * Returns null for anything that does not denote a valid instant.
 */
export function toUtcDate(value: TimestampInput | null | undefined): Date | null {
  if (value == null) return null;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : new Date(value.getTime());
  }
  const trimmed = value.trim();
  if (trimmed.length === 0) return null;
  const normalized = trimmed.replace(/^(\d{4}-\d{2}-\d{2}) (\d)/, '$1T$2');
  const iso = normalized.includes('T') && !ZONED_ISO.test(normalized) ? `${normalized}Z` : normalized;
  const parsed = new Date(iso);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/** Start of the fixed-width UTC bucket containing `ts`. */
export function bucketStart(ts: Date, bucketSeconds: number): Date {
  const widthMs = bucketSeconds * 1000;
  return new Date(Math.floor(ts.getTime() / widthMs) * widthMs);
}

export function secondsBetween(earlier: Date, later: Date): number {
  return (later.getTime() - earlier.getTime()) / 1000;
}
