import { createRequire } from "node:module";
import fs from "node:fs";
import { z } from "zod";
import { EphemerisCalcError, EphemerisConfigError } from "../errors.js";
import type { EnginePlanetId } from "../planets.js";
import type { EclipticPosition, EphemerisEngine } from "./engine.js";

/**
 * The subset of the swisseph binding used here. The package ships no types.
 */
interface SwissEphBinding {
  swe_set_ephe_path(path: string): void;
  swe_set_sid_mode(sidMode: number, t0: number, ayanT0: number): void;
  swe_calc_ut(tjdUt: number, ipl: number, iflag: number): unknown;
  swe_julday(year: number, month: number, day: number, hour: number, gregflag: number): number;
  swe_revjul(tjd: number, gregflag: number): unknown;
  swe_version(): string;
  SE_SUN: number;
  SE_MOON: number;
  SE_MERCURY: number;
  SE_VENUS: number;
  SE_MARS: number;
  SE_JUPITER: number;
  SE_SATURN: number;
  SE_URANUS: number;
  SE_NEPTUNE: number;
  SE_PLUTO: number;
  SE_MEAN_NODE: number;
  SE_SIDM_LAHIRI: number;
  SE_GREG_CAL: number;
  SEFLG_SWIEPH: number;
  SEFLG_MOSEPH: number;
  SEFLG_SPEED: number;
  SEFLG_SIDEREAL: number;
}

const require = createRequire(import.meta.url);
const swe: SwissEphBinding = require("swisseph");

const REQUIRED_PREFIXES = ["sepl_", "semo_"];

export type EphemerisBackend = "swiss" | "moshier";

export interface SwissEphemerisConfig {
  ephePath: string;
  /** "moshier" uses the analytic tables built into the engine; no data files. */
  backend: EphemerisBackend;
}

function ensureEphePath(ephePath: string) {
  let stats: fs.Stats;
  try {
    stats = fs.statSync(ephePath);
  } catch {
    throw new EphemerisConfigError(
      `Swiss Ephemeris data files not found at ${ephePath}. ` +
        "Place .se1 files there or set EPHEMERIS_BACKEND=moshier."
    );
  }

  if (!stats.isDirectory()) {
    throw new EphemerisConfigError(
      `Swiss Ephemeris path ${ephePath} is not a directory.`
    );
  }

  const se1Files = fs
    .readdirSync(ephePath)
    .filter((name) => name.toLowerCase().endsWith(".se1"));

  const missing = REQUIRED_PREFIXES.filter(
    (prefix) => !se1Files.some((name) => name.toLowerCase().startsWith(prefix))
  );

  if (missing.length) {
    throw new EphemerisConfigError(
      `Swiss Ephemeris .se1 files incomplete in ${ephePath}. Missing prefixes: ${missing.join(
        ", "
      )}. Found: ${se1Files.join(", ") || "none"}.`
    );
  }
}

/**
 * Julian Day (UT) of a Gregorian calendar date; `hour` is fractional UT hours.
 * Needs no ephemeris files.
 */
export function julday(year: number, month: number, day: number, hour: number): number {
  const jd = swe.swe_julday(year, month, day, hour, swe.SE_GREG_CAL);
  if (!Number.isFinite(jd)) {
    throw new Error("Failed to compute Julian Day");
  }
  return jd;
}

const RevJulSchema = z.object({
  year: z.number().int(),
  month: z.number().int().min(1).max(12),
  day: z.number().int().min(1).max(31),
  hour: z.number(),
});

/**
 * Gregorian calendar date of a Julian Day (UT), inverse of julday.
 */
export function revjul(jd: number): z.infer<typeof RevJulSchema> {
  const parsed = RevJulSchema.safeParse(swe.swe_revjul(jd, swe.SE_GREG_CAL));
  if (!parsed.success) {
    throw new Error(`Failed to convert Julian Day ${jd} to a calendar date`);
  }
  return parsed.data;
}

const BODY_MAP: Record<EnginePlanetId, number> = {
  Sun: swe.SE_SUN,
  Moon: swe.SE_MOON,
  Mercury: swe.SE_MERCURY,
  Venus: swe.SE_VENUS,
  Mars: swe.SE_MARS,
  Jupiter: swe.SE_JUPITER,
  Saturn: swe.SE_SATURN,
  Uranus: swe.SE_URANUS,
  Neptune: swe.SE_NEPTUNE,
  Pluto: swe.SE_PLUTO,
  Rahu: swe.SE_MEAN_NODE,
};

const CalcErrorSchema = z.object({ error: z.string().min(1) });

const StatusSchema = z.object({
  rc: z.number().optional(),
  rflag: z.number().optional(),
  flag: z.number().optional(),
  serr: z.string().optional(),
});

const NamedResultSchema = z.object({
  longitude: z.number(),
  latitude: z.number(),
  distance: z.number(),
  longitudeSpeed: z.number(),
  latitudeSpeed: z.number(),
  distanceSpeed: z.number(),
});

// Some builds return the raw six-element coordinate array instead.
const ArrayResultSchema = z.object({ xx: z.array(z.number()).min(6) });

function toEclipticPosition(raw: unknown): EclipticPosition | null {
  const named = NamedResultSchema.safeParse(raw);
  if (named.success) {
    const r = named.data;
    return {
      longitude: r.longitude,
      latitude: r.latitude,
      distance_au: r.distance,
      longitude_speed: r.longitudeSpeed,
      latitude_speed: r.latitudeSpeed,
      distance_speed: r.distanceSpeed,
    };
  }
  const array = ArrayResultSchema.safeParse(raw);
  if (array.success) {
    const [lon, lat, dist, lonSpeed, latSpeed, distSpeed] = array.data.xx;
    return {
      longitude: lon,
      latitude: lat,
      distance_au: dist,
      longitude_speed: lonSpeed,
      latitude_speed: latSpeed,
      distance_speed: distSpeed,
    };
  }
  return null;
}

let active: { config: SwissEphemerisConfig; engine: EphemerisEngine } | null =
  null;

/**
 * Configure the process-wide Swiss Ephemeris binding and return an engine.
 *
 * The binding keeps its ephemeris path and sidereal mode as global state, so
 * configuring twice with different settings is refused.
 */
export function configureSwissEphemeris(
  config: SwissEphemerisConfig
): EphemerisEngine {
  if (active) {
    if (
      active.config.ephePath !== config.ephePath ||
      active.config.backend !== config.backend
    ) {
      throw new EphemerisConfigError(
        `Swiss Ephemeris already configured (${active.config.backend}, ${active.config.ephePath})`
      );
    }
    return active.engine;
  }

  const baseFlags =
    (config.backend === "moshier" ? swe.SEFLG_MOSEPH : swe.SEFLG_SWIEPH) |
    swe.SEFLG_SIDEREAL |
    swe.SEFLG_SPEED;

  let initialized = false;
  function init() {
    if (initialized) return;
    if (config.backend === "swiss") {
      ensureEphePath(config.ephePath);
      swe.swe_set_ephe_path(config.ephePath);
    }
    swe.swe_set_sid_mode(swe.SE_SIDM_LAHIRI, 0, 0);
    initialized = true;
  }

  const engine: EphemerisEngine = {
    name: config.backend === "moshier" ? "Moshier (Swiss Ephemeris)" : "Swiss Ephemeris",
    version: swe.swe_version(),
    calc(jd: number, planet: EnginePlanetId): EclipticPosition {
      if (!Number.isFinite(jd)) {
        throw new EphemerisCalcError(planet, jd, "Invalid Julian Day");
      }
      const ipl = BODY_MAP[planet];
      if (ipl === undefined) {
        throw new EphemerisCalcError(planet, jd, `Unknown body: ${planet}`);
      }

      init();
      const raw = swe.swe_calc_ut(jd, ipl, baseFlags);

      const failed = CalcErrorSchema.safeParse(raw);
      if (failed.success) {
        throw new EphemerisCalcError(planet, jd, failed.data.error);
      }

      const status = StatusSchema.safeParse(raw);
      const flags = status.success
        ? status.data.rc ?? status.data.rflag ?? status.data.flag
        : undefined;
      if (typeof flags === "number" && flags < 0) {
        throw new EphemerisCalcError(
          planet,
          jd,
          (status.success && status.data.serr) || "Swiss Ephemeris calculation failed"
        );
      }

      const position = toEclipticPosition(raw);
      if (!position) {
        const keys =
          raw && typeof raw === "object" ? Object.keys(raw).join(", ") : "";
        throw new EphemerisCalcError(
          planet,
          jd,
          `Swiss Ephemeris returned invalid data (keys: ${keys || "none"}).`
        );
      }

      if (
        config.backend === "swiss" &&
        typeof flags === "number" &&
        flags & swe.SEFLG_MOSEPH
      ) {
        throw new EphemerisConfigError(
          "Swiss Ephemeris fell back to Moshier (SEFLG_MOSEPH) unexpectedly"
        );
      }

      return position;
    },
  };

  active = { config, engine };
  return engine;
}
