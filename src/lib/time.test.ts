import { describe, it, expect } from 'vitest';
import { dayKey, formatTimestamp, isValidTimeZone, periodOf } from './time';

describe('time', () => {
  it('derives the period in the configured zone', () => {
    // 20:00 UTC on Dec 31 is already Jan 1 in India
    const date = new Date('2024-12-31T20:00:00Z');
    expect(periodOf(date, 'Asia/Kolkata')).toEqual({ year: '2025', month: '01', day: '01' });
    expect(periodOf(date, 'UTC')).toEqual({ year: '2024', month: '12', day: '31' });
  });

  it('builds day keys', () => {
    expect(dayKey(new Date('2025-03-05T01:00:00Z'), 'UTC')).toBe('2025-03-05');
  });

  it('formats display timestamps', () => {
    expect(formatTimestamp(new Date('2025-01-15T10:00:00Z'), 'Asia/Kolkata')).toBe('15 Jan 2025, 03:30 PM');
  });

  it('validates zones', () => {
    expect(isValidTimeZone('Europe/Berlin')).toBe(true);
    expect(isValidTimeZone('Mars/Olympus')).toBe(false);
  });
});
