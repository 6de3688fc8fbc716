/**
 * Positions of every planet at one instant.
 *
 * Ketu is never queried from the engine; it is derived from Rahu so that the
 * two nodes stay exactly 180° apart.
 */

import {
  isRetrogradeByProbe,
  isRetrogradeFromSpeed,
  motionLetter,
  type Motion,
  type RetrogradeMethod,
} from "./computeRetrograde.js";
import type { EclipticPosition, EphemerisEngine } from "./ephemeris/engine.js";
import { EphemerisConfigError } from "./errors.js";
import { ENGINE_PLANETS, PLANETS, PLANET_ORDER, type PlanetId } from "./planets.js";
import { classifyLongitude, normalizeDegrees, type ZodiacPlacement } from "./zodiac.js";
import { ephemerisLogHelpers } from "../logging/ephemerisLog.js";

export interface PlanetPosition extends EclipticPosition, ZodiacPlacement {
  retrograde: boolean;
  motion: Motion;
  symbol: string;
  name_vi: string;
}

/** Planets that failed to compute are absent. */
export type Snapshot = Partial<Record<PlanetId, PlanetPosition>>;

export interface SnapshotOptions {
  retrogradeMethod?: RetrogradeMethod;
}

/**
 * Planets present in a snapshot, in canonical order.
 */
export function presentPlanets(snapshot: Snapshot): PlanetId[] {
  return PLANET_ORDER.filter((planet) => snapshot[planet] !== undefined);
}

export function deriveKetu(rahu: PlanetPosition): PlanetPosition {
  const longitude = (rahu.longitude + 180) % 360;

  return {
    longitude,
    latitude: -rahu.latitude,
    distance_au: rahu.distance_au,
    longitude_speed: -rahu.longitude_speed,
    latitude_speed: -rahu.latitude_speed,
    distance_speed: rahu.distance_speed,
    ...classifyLongitude(longitude),
    retrograde: rahu.retrograde,
    motion: rahu.motion,
    symbol: PLANETS.Ketu.symbol,
    name_vi: PLANETS.Ketu.name_vi,
  };
}

export function computeSnapshot(
  engine: EphemerisEngine,
  jd: number,
  options: SnapshotOptions = {}
): Snapshot {
  const method = options.retrogradeMethod ?? "speed";
  const snapshot: Snapshot = {};

  for (const planet of ENGINE_PLANETS) {
    let position: EclipticPosition;
    try {
      position = engine.calc(jd, planet);
    } catch (err) {
      if (err instanceof EphemerisConfigError) throw err;
      ephemerisLogHelpers.planetCalcFailed({ planet, julian_day: jd, error: err });
      continue;
    }

    const longitude = normalizeDegrees(position.longitude);
    const retrograde =
      method === "probe"
        ? isRetrogradeByProbe(engine, planet, jd)
        : isRetrogradeFromSpeed(position.longitude_speed);

    snapshot[planet] = {
      ...position,
      longitude,
      ...classifyLongitude(longitude),
      retrograde,
      motion: motionLetter(retrograde),
      symbol: PLANETS[planet].symbol,
      name_vi: PLANETS[planet].name_vi,
    };
  }

  const rahu = snapshot.Rahu;
  if (rahu) {
    snapshot.Ketu = deriveKetu(rahu);
  }

  return snapshot;
}
