/**
 * Direction of apparent motion.
 */

import type { EphemerisEngine } from "./ephemeris/engine.js";
import { EphemerisConfigError } from "./errors.js";
import type { EnginePlanetId } from "./planets.js";

export type RetrogradeMethod = "speed" | "probe";

export type Motion = "R" | "D";

export function motionLetter(retrograde: boolean): Motion {
  return retrograde ? "R" : "D";
}

/**
 * Retrograde iff the longitudinal speed is strictly negative.
 */
export function isRetrogradeFromSpeed(longitudeSpeed: number): boolean {
  return longitudeSpeed < 0;
}

/**
 * Wrap a longitude delta into (-180, 180].
 */
export function wrapDelta(delta: number): number {
  if (delta > 180) return delta - 360;
  if (delta <= -180) return delta + 360;
  return delta;
}

/**
 * Finite-difference probe: compare the longitude at jd and jd + 1 day.
 * A calculation failure reads as direct motion.
 */
export function isRetrogradeByProbe(
  engine: EphemerisEngine,
  planet: EnginePlanetId,
  jd: number
): boolean {
  try {
    const now = engine.calc(jd, planet).longitude;
    const next = engine.calc(jd + 1, planet).longitude;
    return wrapDelta(next - now) < 0;
  } catch (err) {
    if (err instanceof EphemerisConfigError) throw err;
    return false;
  }
}
