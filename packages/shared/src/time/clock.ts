/**
 * Clock and calendar helpers.
 *
 * File names, sidecars and date fallbacks use local wall-clock time. The
 * Clock interface lets tests pin "now".
 */

import type { ISODate } from '@invoice-bridge/contracts';

/**
 * Clock interface for injectable time.
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * Clock that always returns the same instant.
 */
export function fixedClock(instant: Date): Clock {
  return { now: () => new Date(instant.getTime()) };
}

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/**
 * `yyyyMMdd_HHmmss` in local time, used in output/archive/error file names.
 */
export function formatFileTimestamp(date: Date): string {
  return (
    `${pad(date.getFullYear(), 4)}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * `yyyy-MM-dd` in local time.
 */
export function formatLocalDate(date: Date): ISODate {
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * `yyyy-MM-dd HH:mm:ss` in local time, used in diagnostic sidecars.
 */
export function formatLocalDateTime(date: Date): string {
  return `${formatLocalDate(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Parse a strict `dd/MM/yyyy` date into `yyyy-MM-dd`.
 *
 * Day and month must have two digits and form a real calendar date
 * ("31/02/2024" is rejected). Returns null otherwise.
 */
export function parseDayMonthYear(text: string | null | undefined): ISODate | null {
  if (!text) {
    return null;
  }

  const match = /^(\d{2})\/(\d{2})\/(\d{4})$/.exec(text);
  if (!match) {
    return null;
  }

  const day = Number(match[1]);
  const month = Number(match[2]);
  const year = Number(match[3]);

  const date = new Date(Date.UTC(year, month - 1, day));
  date.setUTCFullYear(year);
  if (year < 1 || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }

  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

/**
 * Whole days from one ISO date to another (negative when `to` is earlier).
 */
export function daysBetween(from: ISODate, to: ISODate): number {
  return Math.round((Date.parse(`${to}T00:00:00Z`) - Date.parse(`${from}T00:00:00Z`)) / 86_400_000);
}

/**
 * Time of day in 24-hour clock
 */
export interface TimeOfDay {
  hours: number;
  minutes: number;
}

/**
 * Parse `HH:mm` (24-hour). Returns null when malformed or out of range.
 */
export function parseTimeOfDay(text: string): TimeOfDay | null {
  const match = /^(\d{1,2}):(\d{2})$/.exec(text.trim());
  if (!match) {
    return null;
  }

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) {
    return null;
  }

  return { hours, minutes };
}

/**
 * First local instant at `time` strictly after `after`.
 */
export function nextOccurrence(after: Date, time: TimeOfDay): Date {
  const candidate = new Date(after.getTime());
  candidate.setHours(time.hours, time.minutes, 0, 0);
  if (candidate.getTime() <= after.getTime()) {
    candidate.setDate(candidate.getDate() + 1);
  }
  return candidate;
}
