/**
 * Field readers for message payloads.
 *
 * The management server stringifies every `data` value, so numbers and
 * flags may arrive either as JSON primitives or as their string form.
 * Each reader returns the fallback when a value is missing or does not
 * coerce.
 */

export type PayloadRecord = Readonly<Record<string, unknown>>;

const TRUE_STRINGS = new Set(['true', '1', 'yes']);
const FALSE_STRINGS = new Set(['false', '0', 'no', '']);

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readString(record: PayloadRecord, key: string, fallback: string): string {
  const value = record[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return fallback;
}

export function readNumber(record: PayloadRecord, key: string, fallback: number): number {
  const value = record[key];
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : fallback;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : fallback;
  }
  return fallback;
}

export function readBoolean(record: PayloadRecord, key: string, fallback: boolean): boolean {
  const value = record[key];
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (TRUE_STRINGS.has(normalized)) return true;
    if (FALSE_STRINGS.has(normalized)) return false;
  }
  return fallback;
}

/**
 * Reads a list of strings; a comma-separated string is split.
 */
export function readStringList(record: PayloadRecord, key: string): string[] {
  const value = record[key];
  if (Array.isArray(value)) {
    return value
      .filter((item): item is string | number | boolean =>
        typeof item === 'string' || typeof item === 'number' || typeof item === 'boolean',
      )
      .map(String);
  }
  if (typeof value === 'string') {
    return value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }
  return [];
}

/**
 * Reads a list of objects, skipping entries that are not objects.
 */
export function readRecordList(record: PayloadRecord, key: string): PayloadRecord[] {
  const value = record[key];
  if (!Array.isArray(value)) return [];
  return value.filter(isRecord);
}
