/**
 * Pure functions for computing aspects between planets in one snapshot.
 */

import type { PlanetPosition, Snapshot } from "./computeSnapshot.js";
import { presentPlanets } from "./computeSnapshot.js";
import type { PlanetId } from "./planets.js";
import type { AspectMatch, AspectType } from "./schemas/ephemeris.schema.js";

export const DEFAULT_ORB_DEG = 1.0;

export const MAJOR_ASPECTS: ReadonlyArray<{ name: AspectType; angle: number }> = [
  { name: "Conjunction", angle: 0 },
  { name: "Opposition", angle: 180 },
  { name: "Square", angle: 90 },
  { name: "Trine", angle: 120 },
  { name: "Sextile", angle: 60 },
];

function round(value: number, digits: number): number {
  return Number(value.toFixed(digits));
}

/**
 * Shortest arc between two longitudes, in [0, 180].
 */
export function angularSeparation(lon1: number, lon2: number): number {
  const diff = Math.abs(lon1 - lon2) % 360;
  return diff > 180 ? 360 - diff : diff;
}

function isNodalAxis(a: PlanetId, b: PlanetId): boolean {
  return (a === "Rahu" && b === "Ketu") || (a === "Ketu" && b === "Rahu");
}

function toMatch(
  type: AspectType,
  angle: number,
  planet1: PlanetId,
  pos1: PlanetPosition,
  planet2: PlanetId,
  pos2: PlanetPosition,
  diff: number
): AspectMatch {
  return {
    event: "Aspect",
    type,
    planet1,
    planet1_sign: pos1.sign,
    planet1_degree: pos1.degree_formatted,
    planet2,
    planet2_sign: pos2.sign,
    planet2_degree: pos2.degree_formatted,
    exact_angle: angle,
    difference: round(diff, 4),
    orb_residual: round(Math.abs(diff - angle), 4),
  };
}

/**
 * Every aspect within `orbDeg` for every pair of planets in the snapshot.
 *
 * Pairs follow the canonical planet order (planet1 before planet2); within a
 * pair, aspects follow MAJOR_ASPECTS. The Rahu-Ketu opposition is skipped.
 */
export function computeAspects(
  snapshot: Snapshot,
  orbDeg: number = DEFAULT_ORB_DEG
): AspectMatch[] {
  const aspects: AspectMatch[] = [];
  const planets = presentPlanets(snapshot);

  for (let i = 0; i < planets.length; i++) {
    const planetA = planets[i];
    const posA = snapshot[planetA];
    if (!posA) continue;

    for (let j = i + 1; j < planets.length; j++) {
      const planetB = planets[j];
      const posB = snapshot[planetB];
      if (!posB || isNodalAxis(planetA, planetB)) continue;

      const diff = angularSeparation(posA.longitude, posB.longitude);
      for (const aspect of MAJOR_ASPECTS) {
        if (Math.abs(diff - aspect.angle) <= orbDeg) {
          aspects.push(
            toMatch(aspect.name, aspect.angle, planetA, posA, planetB, posB, diff)
          );
        }
      }
    }
  }

  return aspects;
}
