import { describe, expect, it } from "vitest";
import {
  isRetrogradeByProbe,
  isRetrogradeFromSpeed,
  motionLetter,
  wrapDelta,
} from "../computeRetrograde.js";
import { EphemerisConfigError } from "../errors.js";
import { position, scriptedEngine } from "./testHelpers.js";

describe("retrograde detection", () => {
  it("is retrograde only for strictly negative speed", () => {
    expect(isRetrogradeFromSpeed(-0.01)).toBe(true);
    expect(isRetrogradeFromSpeed(0)).toBe(false);
    expect(isRetrogradeFromSpeed(1.2)).toBe(false);
  });

  it("maps the flag to a motion letter", () => {
    expect(motionLetter(true)).toBe("R");
    expect(motionLetter(false)).toBe("D");
  });

  it("wraps deltas into (-180, 180]", () => {
    expect(wrapDelta(-359.5)).toBe(0.5);
    expect(wrapDelta(359.5)).toBe(-0.5);
    expect(wrapDelta(180)).toBe(180);
    expect(wrapDelta(-180)).toBe(180);
    expect(wrapDelta(-12)).toBe(-12);
  });

  it("probe reads forward motion across 360° as direct", () => {
    const engine = scriptedEngine((jd) => position(jd === 100 ? 359.75 : 0.25));
    expect(isRetrogradeByProbe(engine, "Mars", 100)).toBe(false);
  });

  it("probe reads backward motion across 0° as retrograde", () => {
    const engine = scriptedEngine((jd) => position(jd === 100 ? 0.25 : 359.75));
    expect(isRetrogradeByProbe(engine, "Mercury", 100)).toBe(true);
  });

  it("probe falls back to direct when the engine fails", () => {
    const engine = scriptedEngine((jd) => (jd === 100 ? position(10) : null));
    expect(isRetrogradeByProbe(engine, "Saturn", 100)).toBe(false);
  });

  it("probe still surfaces configuration errors", () => {
    const engine = {
      name: "broken",
      version: "test",
      calc(): never {
        throw new EphemerisConfigError("no ephemeris files");
      },
    };
    expect(() => isRetrogradeByProbe(engine, "Sun", 100)).toThrow(EphemerisConfigError);
  });
});
