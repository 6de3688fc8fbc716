import fs from "node:fs/promises";
import path from "node:path";
import type { MonthlyEphemeris } from "../computeMonthlyEphemeris.js";
import type { EphemerisEngine } from "../ephemeris/engine.js";
import { writeCsvTable, writeJsonTable } from "./writeTable.js";

export interface RunMetadata {
  year: number;
  month: number;
  timezone_offset: number;
  step_minutes: number;
  orb_deg: number;
  retrograde_method: string;
  calculation_time: string;
  ephemeris_type: string;
  ephemeris_version: string;
  coordinate_system: "Sidereal Zodiac (Lahiri)";
  node_type: "Mean Node";
  description: string;
}

export function buildRunMetadata(
  result: MonthlyEphemeris,
  engine: Pick<EphemerisEngine, "name" | "version">,
  now: Date = new Date()
): RunMetadata {
  const { params } = result;
  return {
    year: params.year,
    month: params.month,
    timezone_offset: params.timezoneOffset,
    step_minutes: params.stepMinutes,
    orb_deg: params.orb,
    retrograde_method: params.retrogradeMethod,
    calculation_time: now.toISOString(),
    ephemeris_type: engine.name,
    ephemeris_version: engine.version,
    coordinate_system: "Sidereal Zodiac (Lahiri)",
    node_type: "Mean Node",
    description: `Planetary positions every ${params.stepMinutes} minutes with aspect and ingress events`,
  };
}

/** ephemeris_YYYY_MM */
export function monthlyBaseName(year: number, month: number): string {
  return `ephemeris_${year}_${String(month).padStart(2, "0")}`;
}

/**
 * Write the month-level snapshot, aspect and ingress tables as CSV and JSON.
 * Returns the paths actually written (empty tables are skipped).
 */
export async function exportMonthly(
  result: MonthlyEphemeris,
  options: { outDir: string; metadata: RunMetadata }
): Promise<string[]> {
  const { outDir, metadata } = options;
  await fs.mkdir(outDir, { recursive: true });

  const base = path.join(outDir, monthlyBaseName(result.params.year, result.params.month));
  const written: string[] = [];

  const tables = [
    { suffix: "", records: result.records },
    { suffix: "_aspects", records: result.aspects },
    { suffix: "_ingress", records: result.ingresses },
  ];

  for (const { suffix, records } of tables) {
    const csvPath = `${base}${suffix}.csv`;
    const jsonPath = `${base}${suffix}.json`;
    if (await writeCsvTable(records, csvPath)) written.push(csvPath);
    if (await writeJsonTable(records, jsonPath, { ...metadata })) written.push(jsonPath);
  }

  return written;
}
