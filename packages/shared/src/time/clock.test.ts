import { describe, it, expect } from 'vitest';
import {
  fixedClock,
  formatFileTimestamp,
  formatLocalDate,
  formatLocalDateTime,
  parseDayMonthYear,
  daysBetween,
  parseTimeOfDay,
  nextOccurrence,
} from './clock.js';

describe('fixedClock', () => {
  it('should return copies of the same instant', () => {
    const instant = new Date(2024, 2, 1, 12, 0, 0);
    const clock = fixedClock(instant);
    const first = clock.now();
    first.setFullYear(1999);
    expect(clock.now().getTime()).toBe(instant.getTime());
  });
});

describe('local formatting', () => {
  const date = new Date(2024, 0, 5, 9, 3, 7);

  it('should format file timestamps as yyyyMMdd_HHmmss', () => {
    expect(formatFileTimestamp(date)).toBe('20240105_090307');
  });

  it('should format dates and date-times', () => {
    expect(formatLocalDate(date)).toBe('2024-01-05');
    expect(formatLocalDateTime(date)).toBe('2024-01-05 09:03:07');
  });
});

describe('parseDayMonthYear', () => {
  it('should convert dd/MM/yyyy to ISO dates', () => {
    expect(parseDayMonthYear('15/01/2024')).toBe('2024-01-15');
    expect(parseDayMonthYear('29/02/2024')).toBe('2024-02-29');
  });

  it('should reject dates that do not exist', () => {
    expect(parseDayMonthYear('31/02/2024')).toBeNull();
    expect(parseDayMonthYear('29/02/2023')).toBeNull();
    expect(parseDayMonthYear('00/01/2024')).toBeNull();
    expect(parseDayMonthYear('12/13/2024')).toBeNull();
  });

  it('should reject other layouts', () => {
    expect(parseDayMonthYear('1/02/2024')).toBeNull();
    expect(parseDayMonthYear('2024-01-15')).toBeNull();
    expect(parseDayMonthYear(' 15/01/2024')).toBeNull();
    expect(parseDayMonthYear('')).toBeNull();
    expect(parseDayMonthYear(undefined)).toBeNull();
  });
});

describe('daysBetween', () => {
  it('should count whole days between ISO dates', () => {
    expect(daysBetween('2024-01-15', '2024-02-14')).toBe(30);
    expect(daysBetween('2024-02-28', '2024-03-01')).toBe(2);
    expect(daysBetween('2024-01-15', '2024-01-15')).toBe(0);
    expect(daysBetween('2024-01-15', '2024-01-10')).toBe(-5);
  });
});

describe('parseTimeOfDay', () => {
  it('should parse 24-hour times', () => {
    expect(parseTimeOfDay('17:00')).toEqual({ hours: 17, minutes: 0 });
    expect(parseTimeOfDay('7:45')).toEqual({ hours: 7, minutes: 45 });
    expect(parseTimeOfDay('00:00')).toEqual({ hours: 0, minutes: 0 });
  });

  it('should reject out-of-range or malformed times', () => {
    expect(parseTimeOfDay('24:00')).toBeNull();
    expect(parseTimeOfDay('12:60')).toBeNull();
    expect(parseTimeOfDay('noon')).toBeNull();
    expect(parseTimeOfDay('1700')).toBeNull();
  });
});

describe('nextOccurrence', () => {
  const fivePm = { hours: 17, minutes: 0 };

  it('should pick later the same day', () => {
    const next = nextOccurrence(new Date(2024, 0, 15, 9, 0, 0), fivePm);
    expect(next.getTime()).toBe(new Date(2024, 0, 15, 17, 0, 0).getTime());
  });

  it('should roll to the next day once the time has passed', () => {
    const next = nextOccurrence(new Date(2024, 0, 15, 18, 30, 0), fivePm);
    expect(next.getTime()).toBe(new Date(2024, 0, 16, 17, 0, 0).getTime());
  });

  it('should be strictly after the reference instant', () => {
    const next = nextOccurrence(new Date(2024, 0, 15, 17, 0, 0), fivePm);
    expect(next.getTime()).toBe(new Date(2024, 0, 16, 17, 0, 0).getTime());
  });
});
