import { describe, it, expect } from 'vitest';
import { addDays, daysBetween, fileStamp, minutesOfDay, toCalendarDate } from '../utils/dates.js';

describe('date helpers', () => {
  const instant = new Date('2026-03-10T23:30:15.000Z');

  it('reads the calendar date in a time zone', () => {
    expect(toCalendarDate(instant, 'UTC')).toBe('2026-03-10');
    expect(toCalendarDate(instant, 'Asia/Tokyo')).toBe('2026-03-11');
    expect(toCalendarDate(instant, 'America/New_York')).toBe('2026-03-10');
  });

  it('shifts dates across month and year ends', () => {
    expect(addDays('2026-03-01', -1)).toBe('2026-02-28');
    expect(addDays('2025-12-31', 1)).toBe('2026-01-01');
    expect(addDays('2026-03-10', 0)).toBe('2026-03-10');
  });

  it('counts whole days between dates', () => {
    expect(daysBetween('2026-03-05', '2026-03-10')).toBe(5);
    expect(daysBetween('2026-03-10', '2026-03-05')).toBe(-5);
    // Spans the US DST change on 2026-03-08
    expect(daysBetween('2026-03-07', '2026-03-09')).toBe(2);
  });

  it('rejects malformed calendar dates', () => {
    expect(() => addDays('10/03/2026', 1)).toThrow('Invalid calendar date: 10/03/2026');
  });

  it('builds file stamps on the local wall clock', () => {
    expect(fileStamp(instant, 'UTC')).toBe('20260310_233015');
    expect(fileStamp(instant, 'Asia/Tokyo')).toBe('20260311_083015');
  });

  it('reads minutes since local midnight', () => {
    expect(minutesOfDay(instant, 'UTC')).toBe(23 * 60 + 30);
    expect(minutesOfDay(new Date('2026-03-10T00:05:00.000Z'), 'UTC')).toBe(5);
  });
});
