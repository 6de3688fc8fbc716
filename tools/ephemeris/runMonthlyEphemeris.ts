#!/usr/bin/env node
/**
 * CLI tool to compute one month of sidereal positions, aspects and ingresses
 * and export them as CSV + JSON (month-level files and per-day folders).
 *
 * Usage:
 *   npx tsx tools/ephemeris/runMonthlyEphemeris.ts --year 2025 --month 9 --offset 7
 */

import "dotenv/config";
import fs from "node:fs/promises";
import { computeMonthlyEphemeris } from "../../astro/computeMonthlyEphemeris.js";
import { configureSwissEphemeris } from "../../astro/ephemeris/swisseph.js";
import { exportDaily } from "../../astro/persistence/exportDaily.js";
import { buildRunMetadata, exportMonthly } from "../../astro/persistence/exportMonthly.js";
import { loadConfig } from "../../lib/config.js";
import { parseArgs } from "./cliArgs.js";

async function describeFile(filePath: string): Promise<string> {
  const stats = await fs.stat(filePath);
  return `${filePath} (${(stats.size / 1024 / 1024).toFixed(2)} MB)`;
}

async function main() {
  const config = loadConfig();
  const args = parseArgs(process.argv.slice(2), config);
  const offsetLabel = args.timezoneOffset >= 0 ? `+${args.timezoneOffset}` : `${args.timezoneOffset}`;

  console.log(`[monthly-ephemeris] ${args.month}/${args.year} (UTC${offsetLabel}), every ${args.stepMinutes} min`);
  console.log(`[monthly-ephemeris] backend=${args.backend} ephe_path=${config.ephePath}`);

  const engine = configureSwissEphemeris({
    ephePath: config.ephePath,
    backend: args.backend,
  });

  const result = computeMonthlyEphemeris(
    {
      year: args.year,
      month: args.month,
      timezoneOffset: args.timezoneOffset,
      stepMinutes: args.stepMinutes,
      orb: args.orb,
      retrogradeMethod: args.retrogradeMethod,
    },
    engine
  );

  console.log(
    `[monthly-ephemeris] ${result.records.length} records, ${result.aspects.length} aspects, ${result.ingresses.length} ingresses`
  );

  const metadata = buildRunMetadata(result, engine);
  const written = await exportMonthly(result, { outDir: args.outDir, metadata });

  console.log("[monthly-ephemeris] Files written:");
  for (const filePath of written) {
    console.log(`  • ${await describeFile(filePath)}`);
  }

  if (args.daily) {
    const days = await exportDaily(result.aspects, result.ingresses, {
      outDir: args.outDir,
      year: args.year,
      month: args.month,
    });
    console.log(`[monthly-ephemeris] Per-day folders written: ${days.length}`);
  }

  const sample = result.records[0];
  if (sample) {
    console.log(`\n[monthly-ephemeris] First record: ${sample.datetime_local}`);
    for (const planet of ["Sun", "Moon", "Rahu", "Ketu"]) {
      if (sample[`${planet}_Sign`] === undefined) continue;
      console.log(
        `  ${planet}: ${sample[`${planet}_Sign`]} ${sample[`${planet}_Degree`]} (${sample[`${planet}_Motion`]})`
      );
    }
  }
}

main().catch((err) => {
  console.error("\n✗ Error:", err instanceof Error ? err.message : String(err));
  if (err instanceof Error && err.stack) {
    console.error(err.stack);
  }
  process.exit(1);
});
