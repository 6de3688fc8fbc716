/**
 * Monthly driver: walks a regular local-time grid over one calendar month and
 * accumulates the snapshot table plus the aspect and ingress streams.
 *
 * Strictly sequential: ingress detection depends on the previous sample.
 */

import { computeAspects } from "./computeAspects.js";
import { computeIngress } from "./computeIngress.js";
import { computeSnapshot, presentPlanets, type Snapshot } from "./computeSnapshot.js";
import type { EphemerisEngine } from "./ephemeris/engine.js";
import { InvalidRunParamsError } from "./errors.js";
import {
  daysInMonth,
  formatDate,
  formatDateTime,
  formatTime,
  julianDayFromUT,
  toUniversalTime,
  type CivilDateTime,
} from "./julianDay.js";
import {
  MonthlyRunParamsSchema,
  type AspectEvent,
  type IngressEvent,
  type MonthlyRunParams,
  type MonthlyRunParamsInput,
  type SnapshotRow,
} from "./schemas/ephemeris.schema.js";
import { ephemerisLogHelpers } from "../logging/ephemerisLog.js";

export interface MonthlyEphemeris {
  params: MonthlyRunParams;
  records: SnapshotRow[];
  aspects: AspectEvent[];
  ingresses: IngressEvent[];
}

function round6(value: number): number {
  return Number(value.toFixed(6));
}

export function parseMonthlyRunParams(input: MonthlyRunParamsInput): MonthlyRunParams {
  const parsed = MonthlyRunParamsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "params"}: ${issue.message}`)
      .join("; ");
    throw new InvalidRunParamsError(`Invalid monthly run parameters: ${issues}`);
  }
  return parsed.data;
}

/**
 * Flatten one snapshot into a table row. Numeric fields are rounded to 6
 * decimals; planets missing from the snapshot contribute no columns.
 */
export function toSnapshotRow(
  local: CivilDateTime,
  ut: CivilDateTime,
  jd: number,
  timezoneOffset: number,
  snapshot: Snapshot
): SnapshotRow {
  const row: SnapshotRow = {
    date: formatDate(local),
    time: formatTime(local),
    datetime_local: formatDateTime(local),
    datetime_utc: formatDateTime(ut),
    julian_day: jd,
    timezone_offset: timezoneOffset,
  };

  for (const planet of presentPlanets(snapshot)) {
    const pos = snapshot[planet];
    if (!pos) continue;

    row[`${planet}_Longitude`] = round6(pos.longitude);
    row[`${planet}_Latitude`] = round6(pos.latitude);
    row[`${planet}_Distance`] = round6(pos.distance_au);
    row[`${planet}_Sign`] = pos.sign;
    row[`${planet}_Sign_VI`] = pos.sign_vi;
    row[`${planet}_Degree`] = pos.degree_formatted;
    row[`${planet}_Degree_Decimal`] = round6(pos.degree_in_sign);
    row[`${planet}_Motion`] = pos.motion;
    row[`${planet}_Retrograde`] = pos.retrograde;
    row[`${planet}_Speed`] = round6(pos.longitude_speed);
    row[`${planet}_Symbol`] = pos.symbol;
    row[`${planet}_Name_VI`] = pos.name_vi;
  }

  return row;
}

export function computeMonthlyEphemeris(
  input: MonthlyRunParamsInput,
  engine: EphemerisEngine
): MonthlyEphemeris {
  const params = parseMonthlyRunParams(input);
  const { year, month, timezoneOffset, stepMinutes, orb, retrogradeMethod } = params;

  const dayCount = daysInMonth(year, month);
  const samplesPerDay = 1440 / stepMinutes;

  const records: SnapshotRow[] = [];
  const aspects: AspectEvent[] = [];
  const ingresses: IngressEvent[] = [];
  let previous: Snapshot | null = null;

  ephemerisLogHelpers.monthStarted({
    year,
    month,
    timezone_offset: timezoneOffset,
    step_minutes: stepMinutes,
  });

  for (let day = 1; day <= dayCount; day++) {
    for (let sample = 0; sample < samplesPerDay; sample++) {
      const minuteOfDay = sample * stepMinutes;
      const local: CivilDateTime = {
        year,
        month,
        day,
        hour: Math.floor(minuteOfDay / 60),
        minute: minuteOfDay % 60,
        second: 0,
      };
      const ut = toUniversalTime(local, timezoneOffset);
      const jd = julianDayFromUT(ut);
      const datetime = formatDateTime(local);

      const snapshot = computeSnapshot(engine, jd, { retrogradeMethod });

      for (const match of computeAspects(snapshot, orb)) {
        aspects.push({ datetime, ...match });
      }
      for (const match of computeIngress(snapshot, previous)) {
        ingresses.push({ datetime, ...match });
      }

      previous = snapshot;
      records.push(toSnapshotRow(local, ut, jd, timezoneOffset, snapshot));
    }

    ephemerisLogHelpers.dayCompleted({
      year,
      month,
      day,
      days_in_month: dayCount,
      progress_pct: Number(((day / dayCount) * 100).toFixed(1)),
    });
  }

  ephemerisLogHelpers.monthCompleted({
    year,
    month,
    records: records.length,
    aspects: aspects.length,
    ingresses: ingresses.length,
  });

  return { params, records, aspects, ingresses };
}
