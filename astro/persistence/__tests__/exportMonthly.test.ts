import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import type { MonthlyEphemeris } from "../../computeMonthlyEphemeris.js";
import { parseMonthlyRunParams } from "../../computeMonthlyEphemeris.js";
import type { AspectEvent, IngressEvent } from "../../schemas/ephemeris.schema.js";
import { exportDaily, groupEventsByDate } from "../exportDaily.js";
import { buildRunMetadata, exportMonthly, monthlyBaseName } from "../exportMonthly.js";
import { loggedEvents } from "../../__tests__/testHelpers.js";

function aspectAt(datetime: string): AspectEvent {
  return {
    datetime,
    event: "Aspect",
    type: "Conjunction",
    planet1: "Sun",
    planet1_sign: "Leo",
    planet1_degree: `14°30'00"`,
    planet2: "Mercury",
    planet2_sign: "Leo",
    planet2_degree: `15°00'00"`,
    exact_angle: 0,
    difference: 0.5,
    orb_residual: 0.5,
  };
}

function ingressAt(datetime: string): IngressEvent {
  return {
    datetime,
    event: "Ingress",
    planet: "Moon",
    from_sign: "Cancer",
    to_sign: "Leo",
    degree: `0°15'00"`,
    longitude: 120.25,
  };
}

const result: MonthlyEphemeris = {
  params: parseMonthlyRunParams({ year: 2025, month: 9, timezoneOffset: 7 }),
  records: [
    { date: "2025-09-01", time: "00:00:00", Sun_Sign: "Leo" },
    { date: "2025-09-01", time: "00:15:00", Sun_Sign: "Leo" },
  ],
  aspects: [aspectAt("2025-09-01 00:00:00")],
  ingresses: [],
};

const engineInfo = { name: "Swiss Ephemeris", version: "2.10" };

describe("monthly and daily export", () => {
  let dir: string;
  let logSpy: MockInstance;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "ephemeris-export-"));
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(async () => {
    logSpy.mockRestore();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("names month files ephemeris_YYYY_MM", () => {
    expect(monthlyBaseName(2025, 9)).toBe("ephemeris_2025_09");
    expect(monthlyBaseName(2025, 12)).toBe("ephemeris_2025_12");
  });

  it("builds run metadata", () => {
    const metadata = buildRunMetadata(result, engineInfo, new Date("2025-10-01T00:00:00.000Z"));

    expect(metadata).toEqual({
      year: 2025,
      month: 9,
      timezone_offset: 7,
      step_minutes: 15,
      orb_deg: 1,
      retrograde_method: "speed",
      calculation_time: "2025-10-01T00:00:00.000Z",
      ephemeris_type: "Swiss Ephemeris",
      ephemeris_version: "2.10",
      coordinate_system: "Sidereal Zodiac (Lahiri)",
      node_type: "Mean Node",
      description: "Planetary positions every 15 minutes with aspect and ingress events",
    });
  });

  it("writes month-level tables and skips empty ones", async () => {
    const outDir = path.join(dir, "output");
    const metadata = buildRunMetadata(result, engineInfo);

    const written = await exportMonthly(result, { outDir, metadata });

    expect(written.map((p) => path.basename(p))).toEqual([
      "ephemeris_2025_09.csv",
      "ephemeris_2025_09.json",
      "ephemeris_2025_09_aspects.csv",
      "ephemeris_2025_09_aspects.json",
    ]);
    expect((await fs.readdir(outDir)).sort()).toEqual([
      "ephemeris_2025_09.csv",
      "ephemeris_2025_09.json",
      "ephemeris_2025_09_aspects.csv",
      "ephemeris_2025_09_aspects.json",
    ]);

    const snapshotJson = JSON.parse(
      await fs.readFile(path.join(outDir, "ephemeris_2025_09.json"), "utf8")
    );
    expect(snapshotJson.total_records).toBe(2);
    expect(snapshotJson.metadata.coordinate_system).toBe("Sidereal Zodiac (Lahiri)");
    expect(snapshotJson.data[1].time).toBe("00:15:00");

    const aspectsCsv = await fs.readFile(path.join(outDir, "ephemeris_2025_09_aspects.csv"), "utf8");
    expect(aspectsCsv.split("\r\n")[0]).toBe(
      "\uFEFFdatetime,event,type,planet1,planet1_sign,planet1_degree,planet2,planet2_sign,planet2_degree,exact_angle,difference,orb_residual"
    );
    expect(aspectsCsv.split("\r\n")[1]).toBe(
      `2025-09-01 00:00:00,Aspect,Conjunction,Sun,Leo,"14°30'00""",Mercury,Leo,"15°00'00""",0,0.5,0.5`
    );
  });

  it("groups events by local date", () => {
    const grouped = groupEventsByDate([
      aspectAt("2025-09-01 00:00:00"),
      aspectAt("2025-09-03 12:00:00"),
      aspectAt("2025-09-01 23:45:00"),
    ]);
    expect([...grouped.keys()]).toEqual(["2025-09-01", "2025-09-03"]);
    expect(grouped.get("2025-09-01")?.map((e) => e.datetime)).toEqual([
      "2025-09-01 00:00:00",
      "2025-09-01 23:45:00",
    ]);
  });

  it("writes one folder per valid day with bare event arrays", async () => {
    const days = await exportDaily(
      [aspectAt("2025-09-01 00:00:00"), aspectAt("2025-09-03 06:00:00")],
      [ingressAt("2025-09-03 06:15:00")],
      { outDir: dir, year: 2025, month: 9 }
    );

    expect(days).toHaveLength(30);
    expect(days[0]).toBe("2025-09-01");
    expect(days[29]).toBe("2025-09-30");
    await expect(fs.stat(path.join(dir, "2025-09-31"))).rejects.toThrow();

    expect(await fs.readdir(path.join(dir, "2025-09-02"))).toEqual([]);
    expect((await fs.readdir(path.join(dir, "2025-09-01"))).sort()).toEqual([
      "aspects.csv",
      "aspects.json",
    ]);

    const ingress = JSON.parse(await fs.readFile(path.join(dir, "2025-09-03", "ingress.json"), "utf8"));
    expect(ingress).toEqual([ingressAt("2025-09-03 06:15:00")]);
  });

  it("logs and skips days that cannot be written", async () => {
    const blocker = path.join(dir, "not-a-directory");
    await fs.writeFile(blocker, "");

    const days = await exportDaily([aspectAt("2025-02-01 00:00:00")], [], {
      outDir: blocker,
      year: 2025,
      month: 2,
    });

    expect(days).toEqual([]);
    const failures = loggedEvents(logSpy).filter((e) => e.event === "export.day_failed");
    expect(failures).toHaveLength(28);
    expect(failures[0].date).toBe("2025-02-01");
  });
});
