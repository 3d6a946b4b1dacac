/**
 * Tests for Date Proximity Scoring
 */

import {
  daysBetween,
  formatCalendarDate,
  parseCalendarDate,
  scoreDate,
} from '../../src/matching/dateProximity';

describe('daysBetween', () => {
  it('should return 0 for same date', () => {
    const date = new Date('2024-01-15');
    expect(daysBetween(date, date)).toBe(0);
  });

  it('should return positive for different dates', () => {
    expect(daysBetween(new Date('2024-01-10'), new Date('2024-01-15'))).toBe(5);
  });

  it('should be symmetric (order independent)', () => {
    const date1 = new Date('2024-01-10');
    const date2 = new Date('2024-01-15');
    expect(daysBetween(date1, date2)).toBe(daysBetween(date2, date1));
  });

  it('should handle month and year boundaries', () => {
    expect(daysBetween(new Date('2024-01-30'), new Date('2024-02-05'))).toBe(6);
    expect(daysBetween(new Date('2023-12-30'), new Date('2024-01-05'))).toBe(6);
  });

  it('should compare calendar days, ignoring the time of day', () => {
    expect(daysBetween(new Date('2024-03-10T23:59:00Z'), new Date('2024-03-11T00:01:00Z'))).toBe(1);
    expect(daysBetween(new Date('2024-03-10T00:00:00Z'), new Date('2024-03-10T23:59:59Z'))).toBe(0);
  });
});

describe('scoreDate', () => {
  const remembered = new Date('2024-01-15');

  it('should return 1 for the same day', () => {
    expect(scoreDate(remembered, new Date('2024-01-15'), 3)).toBe(1);
  });

  it('should decrease linearly within tolerance', () => {
    expect(scoreDate(remembered, new Date('2024-01-14'), 4)).toBeCloseTo(0.75);
    expect(scoreDate(remembered, new Date('2024-01-17'), 4)).toBeCloseTo(0.5);
  });

  it('should keep the last day of tolerance above zero', () => {
    expect(scoreDate(remembered, new Date('2024-01-18'), 3)).toBeGreaterThan(0);
  });

  it('should return exactly 0 beyond tolerance', () => {
    expect(scoreDate(remembered, new Date('2024-01-19'), 3)).toBe(0);
    expect(scoreDate(remembered, new Date('2023-12-15'), 3)).toBe(0);
  });

  it('should accept only the exact day with zero tolerance', () => {
    expect(scoreDate(remembered, new Date('2024-01-15'), 0)).toBe(1);
    expect(scoreDate(remembered, new Date('2024-01-16'), 0)).toBe(0);
  });
});

describe('parseCalendarDate', () => {
  it('should parse a YYYY-MM-DD date at UTC midnight', () => {
    expect(parseCalendarDate('2024-02-29')?.toISOString()).toBe('2024-02-29T00:00:00.000Z');
  });

  it('should reject impossible dates', () => {
    expect(parseCalendarDate('2024-02-30')).toBeNull();
    expect(parseCalendarDate('2023-02-29')).toBeNull();
    expect(parseCalendarDate('2024-13-01')).toBeNull();
  });

  it('should reject other formats', () => {
    expect(parseCalendarDate('2024-2-3')).toBeNull();
    expect(parseCalendarDate('03/02/2024')).toBeNull();
    expect(parseCalendarDate('2024-02-03T10:00:00Z')).toBeNull();
  });
});

describe('formatCalendarDate', () => {
  it('should format as YYYY-MM-DD', () => {
    expect(formatCalendarDate(new Date('2024-11-02T00:00:00Z'))).toBe('2024-11-02');
  });
});
