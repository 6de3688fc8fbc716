import { describe, expect, it } from "vitest";
import type { EphemerisConfig } from "../../../lib/config.js";
import { parseArgs } from "../cliArgs.js";

const config: EphemerisConfig = {
  ephePath: "/tmp/ephe",
  backend: "swiss",
  outputDir: "output",
  timezoneOffset: 7,
  orb: 1,
  stepMinutes: 15,
  retrogradeMethod: "speed",
};

const now = new Date("2025-09-14T12:00:00.000Z");

describe("parseArgs", () => {
  it("defaults to the current UTC month and the environment config", () => {
    expect(parseArgs([], config, now)).toEqual({
      year: 2025,
      month: 9,
      timezoneOffset: 7,
      orb: 1,
      stepMinutes: 15,
      outDir: "output",
      backend: "swiss",
      retrogradeMethod: "speed",
      daily: true,
    });
  });

  it("lets flags override the environment", () => {
    const args = parseArgs(
      [
        "--year", "2024",
        "--month", "2",
        "--offset", "-5",
        "--orb", "0.5",
        "--step", "60",
        "--out", "tmp/out",
        "--backend", "moshier",
        "--retrograde", "probe",
        "--no-daily",
      ],
      config,
      now
    );

    expect(args).toEqual({
      year: 2024,
      month: 2,
      timezoneOffset: -5,
      orb: 0.5,
      stepMinutes: 60,
      outDir: "tmp/out",
      backend: "moshier",
      retrogradeMethod: "probe",
      daily: false,
    });
  });

  it("rejects malformed flags", () => {
    expect(() => parseArgs(["--year"], config, now)).toThrow("--year requires a numeric value");
    expect(() => parseArgs(["--orb", "wide"], config, now)).toThrow("--orb requires a numeric value");
    expect(() => parseArgs(["--out"], config, now)).toThrow("--out requires a directory");
    expect(() => parseArgs(["--backend", "jpl"], config, now)).toThrow("--backend must be swiss or moshier");
    expect(() => parseArgs(["--retrograde"], config, now)).toThrow("--retrograde must be speed or probe");
    expect(() => parseArgs(["--verbose"], config, now)).toThrow("Unknown argument: --verbose");
  });
});
