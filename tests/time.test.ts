import { describe, expect, it } from 'vitest';

import {
  formatDisplayTime,
  formatFileStamp,
  isValidTimeZone,
  parseIsoTimestamp,
  toZonedIsoString,
} from '../src/shared/utils/time';

const NEW_YORK = 'America/New_York';

describe('parseIsoTimestamp', () => {
  it('parses UTC and offset timestamps', () => {
    expect(parseIsoTimestamp('2024-01-15T15:00:00Z')?.toISOString()).toBe('2024-01-15T15:00:00.000Z');
    expect(parseIsoTimestamp('2024-01-15T10:30:00+09:00')?.toISOString()).toBe(
      '2024-01-15T01:30:00.000Z'
    );
    expect(parseIsoTimestamp('2024-01-15T10:30:00-05:30')?.toISOString()).toBe(
      '2024-01-15T16:00:00.000Z'
    );
  });

  it('accepts microsecond precision', () => {
    expect(parseIsoTimestamp('2024-01-15T10:30:00.123456+00:00')?.toISOString()).toBe(
      '2024-01-15T10:30:00.123Z'
    );
  });

  it('returns null for anything it cannot read', () => {
    expect(parseIsoTimestamp('yesterday')).toBeNull();
    expect(parseIsoTimestamp('2024-01-15 10:30:00')).toBeNull();
    expect(parseIsoTimestamp('2024-13-01T00:00:00Z')).toBeNull();
    expect(parseIsoTimestamp('2024-02-30T00:00:00Z')).toBeNull();
  });
});

describe('formatDisplayTime', () => {
  it('converts to the configured zone with a 12-hour clock', () => {
    expect(formatDisplayTime(new Date('2024-01-15T15:00:00Z'), NEW_YORK)).toBe(
      '2024-01-15 10:00:00 AM EST'
    );
    expect(formatDisplayTime(new Date('2024-07-04T16:30:05Z'), NEW_YORK)).toBe(
      '2024-07-04 12:30:05 PM EDT'
    );
  });

  it('shows midnight as 12 AM', () => {
    expect(formatDisplayTime(new Date('2024-01-15T05:00:00Z'), NEW_YORK)).toBe(
      '2024-01-15 12:00:00 AM EST'
    );
  });

  it('works for UTC', () => {
    expect(formatDisplayTime(new Date('2024-01-15T15:00:00Z'), 'UTC')).toBe(
      '2024-01-15 03:00:00 PM UTC'
    );
  });
});

describe('formatFileStamp', () => {
  it('uses a 24-hour clock in the configured zone', () => {
    expect(formatFileStamp(new Date('2024-01-15T20:05:09Z'), NEW_YORK)).toEqual({
      date: '2024-01-15',
      time: '15-05-09',
    });
    expect(formatFileStamp(new Date('2024-01-16T03:00:00Z'), NEW_YORK)).toEqual({
      date: '2024-01-15',
      time: '22-00-00',
    });
  });
});

describe('toZonedIsoString', () => {
  it('includes the zone offset', () => {
    expect(toZonedIsoString(new Date('2024-01-15T15:00:00.500Z'), NEW_YORK)).toBe(
      '2024-01-15T10:00:00-05:00'
    );
    expect(toZonedIsoString(new Date('2024-07-04T16:00:00Z'), NEW_YORK)).toBe(
      '2024-07-04T12:00:00-04:00'
    );
    expect(toZonedIsoString(new Date('2024-01-15T00:00:00Z'), 'Asia/Kolkata')).toBe(
      '2024-01-15T05:30:00+05:30'
    );
    expect(toZonedIsoString(new Date('2024-01-15T00:00:00Z'), 'UTC')).toBe(
      '2024-01-15T00:00:00+00:00'
    );
  });
});

describe('isValidTimeZone', () => {
  it('accepts IANA names and rejects garbage', () => {
    expect(isValidTimeZone('America/New_York')).toBe(true);
    expect(isValidTimeZone('Mars/Olympus_Mons')).toBe(false);
  });
});
