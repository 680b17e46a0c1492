/**
 * Timestamp normalization for display.
 */

/**
 * ISO-8601 date, optional time of day (seconds and fraction optional),
 * optional `Z` or numeric offset.
 */
const ISO_8601 =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:[.,]\d+)?)?)(Z|[+-]\d{2}(?::?\d{2})?)?)?$/i;

/**
 * Formats a date as local `HH:MM:SS`.
 *
 * @example
 * formatClock(new Date(2024, 0, 1, 9, 5, 7))  // "09:05:07"
 */
export function formatClock(date: Date): string {
  return [date.getHours(), date.getMinutes(), date.getSeconds()]
    .map((part) => String(part).padStart(2, '0'))
    .join(':');
}

/**
 * Parses an ISO-8601 instant. Returns `null` when the text is not ISO-8601
 * or names an impossible date.
 *
 * A date-time without an offset is read as local time, and a bare date
 * as local midnight.
 */
export function parseIsoInstant(text: string): Date | null {
  const match = ISO_8601.exec(text.trim());
  if (!match) return null;

  const [, datePart, timePart, zonePart] = match;
  if (datePart === undefined || !isCalendarDate(datePart)) return null;

  let normalized = `${datePart}T${timePart ?? '00:00:00'}`.replace(',', '.');

  if (zonePart) {
    normalized += normalizeZone(zonePart);
  }

  const date = new Date(normalized);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Renders a server timestamp for the feed.
 *
 * - ISO-8601 instant: local `HH:MM:SS`
 * - anything else: the raw text unchanged
 * - absent: the current local time
 */
export function formatTimestamp(timestamp: string | undefined, now: () => Date = () => new Date()): string {
  if (timestamp === undefined || timestamp === '') {
    return formatClock(now());
  }

  const instant = parseIsoInstant(timestamp);
  return instant ? formatClock(instant) : timestamp;
}

/**
 * Whether a `YYYY-MM-DD` names a day that exists. `Date` rolls
 * Feb 30 over to March, so the fields are checked round-trip.
 */
function isCalendarDate(datePart: string): boolean {
  const [year, month, day] = datePart.split('-').map(Number);
  if (year === undefined || month === undefined || day === undefined) return false;

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return (
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day
  );
}

function normalizeZone(zone: string): string {
  if (zone.toUpperCase() === 'Z') return 'Z';

  const sign = zone[0];
  const digits = zone.slice(1).replace(':', '');
  const hours = digits.slice(0, 2);
  const minutes = digits.slice(2, 4) || '00';
  return `${sign}${hours}:${minutes}`;
}
