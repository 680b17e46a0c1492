import { describe, it, expect } from 'vitest';
import { formatClock, formatTimestamp, parseIsoInstant } from '../../src/protocol/timestamp.js';

describe('formatClock', () => {
  it('zero-pads each part', () => {
    expect(formatClock(new Date(2024, 0, 1, 9, 5, 7))).toBe('09:05:07');
    expect(formatClock(new Date(2024, 0, 1, 23, 59, 59))).toBe('23:59:59');
  });
});

describe('parseIsoInstant', () => {
  it('parses a UTC instant', () => {
    expect(parseIsoInstant('2024-01-15T10:30:45Z')?.toISOString()).toBe('2024-01-15T10:30:45.000Z');
  });

  it('parses fractional seconds', () => {
    expect(parseIsoInstant('2024-01-15T10:30:45.123456Z')?.getUTCSeconds()).toBe(45);
  });

  it('normalizes compact offsets', () => {
    expect(parseIsoInstant('2024-01-15T10:30:45+0200')?.toISOString()).toBe('2024-01-15T08:30:45.000Z');
    expect(parseIsoInstant('2024-01-15T10:30:45-05')?.toISOString()).toBe('2024-01-15T15:30:45.000Z');
  });

  it('reads a date-time without offset as local time', () => {
    const date = parseIsoInstant('2024-01-15 10:30');
    expect(date?.getHours()).toBe(10);
    expect(date?.getMinutes()).toBe(30);
  });

  it('reads a bare date as local midnight', () => {
    expect(parseIsoInstant('2024-01-15')?.getTime()).toBe(new Date(2024, 0, 15).getTime());
  });

  it('returns null for days that do not exist', () => {
    expect(parseIsoInstant('2024-02-30T10:00:00Z')).toBeNull();
    expect(parseIsoInstant('2024-02-31T10:00:00')).toBeNull();
    expect(parseIsoInstant('2023-02-29')).toBeNull();
    expect(parseIsoInstant('2024-04-31T08:00:00+02:00')).toBeNull();
  });

  it('accepts a leap day', () => {
    expect(parseIsoInstant('2024-02-29T10:00:00Z')?.toISOString()).toBe('2024-02-29T10:00:00.000Z');
  });

  it('returns null for text that is not an instant', () => {
    expect(parseIsoInstant('not a date')).toBeNull();
    expect(parseIsoInstant('2024-13-45T10:00:00')).toBeNull();
    expect(parseIsoInstant('')).toBeNull();
  });
});

describe('formatTimestamp', () => {
  const now = (): Date => new Date(2024, 0, 1, 12, 0, 1);

  it('formats ISO instants as local wall-clock time', () => {
    const utc = '2024-01-15T10:30:45Z';
    expect(formatTimestamp(utc, now)).toBe(formatClock(new Date(utc)));
  });

  it('returns unparseable text unchanged', () => {
    expect(formatTimestamp('10:30:45 PM', now)).toBe('10:30:45 PM');
    expect(formatTimestamp('2024-02-30T10:00:00Z', now)).toBe('2024-02-30T10:00:00Z');
    expect(formatTimestamp('2024-02-31T10:00:00', now)).toBe('2024-02-31T10:00:00');
  });

  it('uses the clock when the timestamp is missing or empty', () => {
    expect(formatTimestamp(undefined, now)).toBe('12:00:01');
    expect(formatTimestamp('', now)).toBe('12:00:01');
  });
});
