/**
 * Civil date-time <-> Julian Day (UT).
 *
 * The UTC offset is a plain number of hours; no timezone database is consulted.
 * Julian Days come from swe_julday / swe_revjul on the Gregorian calendar.
 */

import { julday, revjul } from "./ephemeris/swisseph.js";

const MS_PER_SECOND = 1_000;
const MS_PER_DAY = 86_400_000;
const MS_PER_HOUR = 3_600_000;

export interface CivilDateTime {
  year: number;
  month: number; // 1-12
  day: number;
  hour: number;
  minute: number;
  second: number;
}

function toEpochMs(civil: CivilDateTime): number {
  return Date.UTC(
    civil.year,
    civil.month - 1,
    civil.day,
    civil.hour,
    civil.minute,
    civil.second
  );
}

function fromEpochMs(ms: number): CivilDateTime {
  const d = new Date(ms);
  return {
    year: d.getUTCFullYear(),
    month: d.getUTCMonth() + 1,
    day: d.getUTCDate(),
    hour: d.getUTCHours(),
    minute: d.getUTCMinutes(),
    second: d.getUTCSeconds(),
  };
}

/**
 * Shift a local civil instant at `offsetHours` east of UTC to UT.
 */
export function toUniversalTime(
  local: CivilDateTime,
  offsetHours: number
): CivilDateTime {
  if (!Number.isFinite(offsetHours)) {
    throw new Error(`Invalid UTC offset: ${offsetHours}`);
  }
  return fromEpochMs(toEpochMs(local) - Math.round(offsetHours * MS_PER_HOUR));
}

/**
 * Julian Day (UT) of a civil instant that is already in UT.
 */
export function julianDayFromUT(ut: CivilDateTime): number {
  const hour = ut.hour + ut.minute / 60 + ut.second / 3600;
  return julday(ut.year, ut.month, ut.day, hour);
}

/**
 * Julian Day (UT) of a local civil instant at the given UTC offset.
 */
export function julianDayFor(local: CivilDateTime, offsetHours: number): number {
  return julianDayFromUT(toUniversalTime(local, offsetHours));
}

/**
 * Inverse of julianDayFromUT, rounded to the nearest second.
 */
export function civilFromJulianDay(jd: number): CivilDateTime {
  if (!Number.isFinite(jd)) {
    throw new Error("Invalid Julian Day");
  }
  const { year, month, day, hour } = revjul(jd);
  const seconds = Math.round(hour * 3600);
  return fromEpochMs(Date.UTC(year, month - 1, day) + seconds * MS_PER_SECOND);
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** YYYY-MM-DD */
export function formatDate(c: CivilDateTime): string {
  return `${String(c.year).padStart(4, "0")}-${pad2(c.month)}-${pad2(c.day)}`;
}

/** HH:MM:SS */
export function formatTime(c: CivilDateTime): string {
  return `${pad2(c.hour)}:${pad2(c.minute)}:${pad2(c.second)}`;
}

/** YYYY-MM-DD HH:MM:SS */
export function formatDateTime(c: CivilDateTime): string {
  return `${formatDate(c)} ${formatTime(c)}`;
}

/**
 * Number of days in a calendar month (next month's first day minus this month's).
 */
export function daysInMonth(year: number, month: number): number {
  return (Date.UTC(year, month, 1) - Date.UTC(year, month - 1, 1)) / MS_PER_DAY;
}
