import { describe, it, expect } from 'vitest';
import {
  addHours,
  buildDateBasedS3Key,
  describeDuration,
  extractFilename,
  getUtcDateString,
  isOnOrAfter,
  parseTimestamp,
  secondsBetween,
  subtractDays,
} from '../date-utils';

describe('date utils', () => {
  it('formats the UTC date', () => {
    expect(getUtcDateString(new Date('2026-03-01T23:30:00.000Z'))).toBe('2026-03-01');
  });

  it('builds date-partitioned S3 keys with or without a trailing slash', () => {
    expect(buildDateBasedS3Key('threat_intel/reports/', 'report.json', '2026-03-01')).toBe(
      'threat_intel/reports/2026-03-01/report.json'
    );
    expect(buildDateBasedS3Key('threat_intel/reports', 'report.json', '2026-03-01')).toBe(
      'threat_intel/reports/2026-03-01/report.json'
    );
  });

  it('extracts the filename from a key', () => {
    expect(extractFilename('threat_intel/feeds/incoming/test-feed/batch.csv')).toBe('batch.csv');
  });

  it('shifts dates by days and hours', () => {
    const now = new Date('2026-03-08T00:00:00.000Z');
    expect(subtractDays(now, 7).toISOString()).toBe('2026-03-01T00:00:00.000Z');
    expect(addHours(now, 24).toISOString()).toBe('2026-03-09T00:00:00.000Z');
  });

  it('returns null for unparseable timestamps', () => {
    expect(parseTimestamp('not a date')).toBeNull();
    expect(parseTimestamp('2026-03-01T00:00:00.000Z')).toBe(Date.UTC(2026, 2, 1));
  });

  it('computes the absolute gap in seconds', () => {
    expect(secondsBetween('2026-03-01T10:00:00.000Z', '2026-03-01T09:00:00.000Z')).toBe(3600);
    expect(secondsBetween('2026-03-01T09:00:00.000Z', '2026-03-01T10:00:00.000Z')).toBe(3600);
    expect(secondsBetween('garbage', '2026-03-01T10:00:00.000Z')).toBeNull();
  });

  it('compares against a window start inclusively', () => {
    const since = new Date('2026-03-01T00:00:00.000Z');
    expect(isOnOrAfter('2026-03-01T00:00:00.000Z', since)).toBe(true);
    expect(isOnOrAfter('2026-02-28T23:59:59.999Z', since)).toBe(false);
    expect(isOnOrAfter('garbage', since)).toBe(false);
  });

  it('describes gaps in minutes or hours', () => {
    expect(describeDuration(60)).toBe('1 minute');
    expect(describeDuration(2700)).toBe('45 minutes');
    expect(describeDuration(12_600)).toBe('3.5 hours');
  });
});
