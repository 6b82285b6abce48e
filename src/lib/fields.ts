/**
 * Defensive accessors for weakly-typed API records. Absent keys and values of
 * the wrong type fall back to a default instead of throwing.
 */

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Returns the value when it is a plain object, otherwise an empty record. */
export function asRecord(value: unknown): JsonRecord {
  return isRecord(value) ? value : {};
}

export function stringField(record: JsonRecord | undefined, key: string, fallback = ''): string {
  const value = record?.[key];
  return typeof value === 'string' ? value : fallback;
}

export function numberField(record: JsonRecord | undefined, key: string, fallback = 0): number {
  const value = record?.[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

export function recordField(record: JsonRecord | undefined, key: string): JsonRecord | undefined {
  const value = record?.[key];
  return isRecord(value) ? value : undefined;
}

export function arrayField(record: JsonRecord | undefined, key: string): unknown[] | undefined {
  const value = record?.[key];
  return Array.isArray(value) ? value : undefined;
}
