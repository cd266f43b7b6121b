// Narrowing readers for untyped pg result rows.

export type Row = Record<string, unknown>;

export function readString(row: Row, column: string): string {
  const value = row[column];
  if (typeof value === 'string') return value;
  throw new TypeError(`column ${column}: expected text, got ${typeof value}`);
}

export function readOptionalString(row: Row, column: string): string | undefined {
  const value = row[column];
  return typeof value === 'string' ? value : undefined;
}

/** Reads numeric columns; BIGINT and NUMERIC arrive from pg as strings. */
export function readNumber(row: Row, column: string): number {
  const value = readOptionalNumber(row, column);
  if (value === undefined) throw new TypeError(`column ${column}: expected a number`);
  return value;
}

export function readOptionalNumber(row: Row, column: string): number | undefined {
  const value = row[column];
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

export function readNullableNumber(row: Row, column: string): number | null {
  return readOptionalNumber(row, column) ?? null;
}

export function readDate(row: Row, column: string): Date {
  const value = readOptionalDate(row, column);
  if (!value) throw new TypeError(`column ${column}: expected a timestamp`);
  return value;
}

export function readOptionalDate(row: Row, column: string): Date | undefined {
  const value = row[column];
  if (value instanceof Date) return value;
  if (typeof value === 'string') {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? undefined : parsed;
  }
  return undefined;
}

export function readJsonArray(row: Row, column: string): unknown[] {
  const value = row[column];
  if (Array.isArray(value)) return value;
  if (typeof value === 'string') {
    const parsed: unknown = JSON.parse(value);
    return Array.isArray(parsed) ? parsed : [];
  }
  return [];
}

/** Member of a closed string set, or undefined when the column is null or unknown. */
export function readOptionalEnum<T extends string>(
  row: Row,
  column: string,
  allowed: readonly T[],
): T | undefined {
  const value = row[column];
  return allowed.find((candidate) => candidate === value);
}

export function readEnum<T extends string>(row: Row, column: string, allowed: readonly T[]): T {
  const value = readOptionalEnum(row, column, allowed);
  if (value === undefined) {
    throw new TypeError(`column ${column}: ${String(row[column])} is not one of ${allowed.join(', ')}`);
  }
  return value;
}
