import { describe, expect, it } from "vitest";
import {
  classifyLongitude,
  formatDegree,
  normalizeDegrees,
  parseDegree,
} from "../zodiac.js";

describe("classifyLongitude", () => {
  it("0° is the start of Aries", () => {
    const placement = classifyLongitude(0);
    expect(placement.sign_index).toBe(0);
    expect(placement.sign).toBe("Aries");
    expect(placement.degree_in_sign).toBe(0);
    expect(placement.degree_formatted).toBe(`0°00'00"`);
  });

  it("30° belongs to Taurus (floor semantics)", () => {
    const placement = classifyLongitude(30);
    expect(placement.sign_index).toBe(1);
    expect(placement.sign).toBe("Taurus");
    expect(placement.degree_in_sign).toBe(0);
  });

  it("classifies Leo with the Vietnamese sign name", () => {
    const placement = classifyLongitude(123.75);
    expect(placement.sign_index).toBe(4);
    expect(placement.sign).toBe("Leo");
    expect(placement.sign_vi).toBe("Sư Tử");
    expect(placement.degree_in_sign).toBe(3.75);
    expect(placement.degree_formatted).toBe(`3°45'00"`);
  });

  it("keeps the last sliver of Pisces in Pisces", () => {
    const placement = classifyLongitude(359.999999);
    expect(placement.sign).toBe("Pisces");
    expect(placement.sign_index).toBe(11);
    expect(placement.degree_formatted).toBe(`29°59'59"`);
  });

  it("normalizes out-of-range longitudes first", () => {
    expect(classifyLongitude(-30).sign).toBe("Pisces");
    expect(classifyLongitude(390).sign).toBe("Taurus");
    expect(normalizeDegrees(720.5)).toBe(0.5);
    expect(normalizeDegrees(-1e-20)).toBe(0);
  });

  it("sign index always matches floor(longitude / 30)", () => {
    for (let lon = 0; lon < 360; lon += 7.3) {
      const placement = classifyLongitude(lon);
      expect(placement.sign_index).toBe(Math.floor(lon / 30));
      expect(placement.degree_in_sign).toBeGreaterThanOrEqual(0);
      expect(placement.degree_in_sign).toBeLessThan(30);
    }
  });
});

describe("formatDegree", () => {
  it("truncates seconds instead of rounding", () => {
    // 10°59'59.9" would round up to 11°00'00"
    expect(formatDegree(10 + 59 / 60 + 59.9 / 3600)).toBe(`10°59'59"`);
  });

  it("zero-pads minutes and seconds", () => {
    expect(formatDegree(0.5)).toBe(`0°30'00"`);
    expect(formatDegree(7.0625)).toBe(`7°03'45"`);
  });

  it("parses back to within one arc-second below the exact value", () => {
    for (const lon of [0, 12.345678, 89.999, 181.5, 271.123456, 359.9999]) {
      const placement = classifyLongitude(lon);
      const parsed = parseDegree(placement.degree_formatted);
      const diff = placement.degree_in_sign - parsed;
      expect(diff).toBeGreaterThanOrEqual(-1e-9);
      expect(diff).toBeLessThan(1 / 3600 + 1e-9);
    }
  });

  it("rejects malformed degree strings", () => {
    expect(() => parseDegree("12.5")).toThrow("Invalid degree string");
  });
});
