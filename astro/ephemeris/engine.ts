import type { EnginePlanetId } from "../planets.js";

/**
 * Position of one body at one instant, sidereal (Lahiri) frame.
 * Rates are per day.
 */
export interface EclipticPosition {
  longitude: number; // [0, 360)
  latitude: number;
  distance_au: number;
  longitude_speed: number;
  latitude_speed: number;
  distance_speed: number;
}

/**
 * Boundary to the numerical ephemeris.
 *
 * calc() throws EphemerisCalcError for a per-planet failure and
 * EphemerisConfigError when the engine cannot be used at all.
 */
export interface EphemerisEngine {
  readonly name: string;
  readonly version: string;
  calc(jd: number, planet: EnginePlanetId): EclipticPosition;
}
