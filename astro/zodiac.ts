/**
 * Pure zodiac classification of a sidereal longitude.
 */

import { SIGN_NAMES, SIGN_NAMES_VI, type SignName } from "./planets.js";

export interface ZodiacPlacement {
  sign: SignName;
  sign_vi: string;
  sign_index: number; // 0 = Aries ... 11 = Pisces
  degree_in_sign: number; // [0, 30)
  degree_formatted: string; // D°MM'SS"
}

/**
 * Normalize degrees to 0-360 range
 */
export function normalizeDegrees(value: number): number {
  let v = value % 360;
  if (v < 0) v += 360;
  // -1e-15 % 360 + 360 rounds back up to 360
  return v >= 360 ? 0 : v;
}

/**
 * Format a degree within a sign as D°MM'SS".
 * Minutes and seconds are truncated, not rounded.
 */
export function formatDegree(degreeInSign: number): string {
  const degrees = Math.floor(degreeInSign);
  const minutesExact = (degreeInSign - degrees) * 60;
  const minutes = Math.floor(minutesExact);
  const seconds = Math.floor((minutesExact - minutes) * 60);

  return `${degrees}°${String(minutes).padStart(2, "0")}'${String(seconds).padStart(2, "0")}"`;
}

/**
 * Parse D°MM'SS" back to decimal degrees.
 */
export function parseDegree(formatted: string): number {
  const match = /^(\d+)°(\d{2})'(\d{2})"$/.exec(formatted);
  if (!match) {
    throw new Error(`Invalid degree string: ${formatted}`);
  }
  return Number(match[1]) + Number(match[2]) / 60 + Number(match[3]) / 3600;
}

export function classifyLongitude(longitude: number): ZodiacPlacement {
  const lon = normalizeDegrees(longitude);
  const signIndex = Math.floor(lon / 30);
  const degreeInSign = lon % 30;

  return {
    sign: SIGN_NAMES[signIndex],
    sign_vi: SIGN_NAMES_VI[signIndex],
    sign_index: signIndex,
    degree_in_sign: degreeInSign,
    degree_formatted: formatDegree(degreeInSign),
  };
}
