import fs from "node:fs/promises";
import path from "node:path";
import { daysInMonth } from "../julianDay.js";
import type { AspectEvent, IngressEvent } from "../schemas/ephemeris.schema.js";
import { writeCsvTable, writeJsonArray } from "./writeTable.js";
import { ephemerisLogHelpers } from "../../logging/ephemerisLog.js";

/**
 * Group events by the date part of their local `datetime`.
 */
export function groupEventsByDate<T extends { datetime: string }>(
  events: readonly T[]
): Map<string, T[]> {
  const byDate = new Map<string, T[]>();
  for (const event of events) {
    const date = event.datetime.split(" ")[0];
    const bucket = byDate.get(date);
    if (bucket) {
      bucket.push(event);
    } else {
      byDate.set(date, [event]);
    }
  }
  return byDate;
}

/**
 * Best-effort per-day export: one folder per calendar day of the month
 * holding aspects.{csv,json} and ingress.{csv,json} (bare JSON arrays).
 *
 * A failing day is logged and skipped. Returns the dates whose folder was
 * written without error.
 */
export async function exportDaily(
  aspects: readonly AspectEvent[],
  ingresses: readonly IngressEvent[],
  options: { outDir: string; year: number; month: number }
): Promise<string[]> {
  const { outDir, year, month } = options;
  const aspectsByDate = groupEventsByDate(aspects);
  const ingressByDate = groupEventsByDate(ingresses);
  const exported: string[] = [];

  const monthPrefix = `${year}-${String(month).padStart(2, "0")}`;
  for (let day = 1; day <= daysInMonth(year, month); day++) {
    const date = `${monthPrefix}-${String(day).padStart(2, "0")}`;
    const folder = path.join(outDir, date);

    try {
      await fs.mkdir(folder, { recursive: true });

      const dayAspects = aspectsByDate.get(date) ?? [];
      await writeCsvTable(dayAspects, path.join(folder, "aspects.csv"));
      await writeJsonArray(dayAspects, path.join(folder, "aspects.json"));

      const dayIngress = ingressByDate.get(date) ?? [];
      await writeCsvTable(dayIngress, path.join(folder, "ingress.csv"));
      await writeJsonArray(dayIngress, path.join(folder, "ingress.json"));

      exported.push(date);
    } catch (err) {
      ephemerisLogHelpers.exportDayFailed({ date, error: err });
    }
  }

  return exported;
}
