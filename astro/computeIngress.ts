/**
 * Sign ingress detection between two consecutive snapshots.
 *
 * The previous snapshot is passed in explicitly; this module keeps no state.
 */

import type { Snapshot } from "./computeSnapshot.js";
import { presentPlanets } from "./computeSnapshot.js";
import type { IngressMatch } from "./schemas/ephemeris.schema.js";

/**
 * One event per planet present in both snapshots whose sign changed.
 * `degree` and `longitude` describe the current (post-ingress) position.
 * No previous snapshot (first sample of a run) means no events.
 */
export function computeIngress(
  current: Snapshot,
  previous: Snapshot | null
): IngressMatch[] {
  if (!previous) return [];

  const events: IngressMatch[] = [];
  for (const planet of presentPlanets(current)) {
    const now = current[planet];
    const before = previous[planet];
    if (!now || !before) continue;

    if (now.sign_index !== before.sign_index) {
      events.push({
        event: "Ingress",
        planet,
        from_sign: before.sign,
        to_sign: now.sign,
        degree: now.degree_formatted,
        longitude: Number(now.longitude.toFixed(6)),
      });
    }
  }

  return events;
}
