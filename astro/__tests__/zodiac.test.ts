import { describe, expect, it } from "vitest";
import { normalizeLongitude, signForLongitude } from "../zodiac.js";

describe("normalizeLongitude", () => {
  it("leaves in-range values unchanged", () => {
    expect(normalizeLongitude(42.5)).toBe(42.5);
    expect(normalizeLongitude(0)).toBe(0);
  });

  it("wraps negative and over-range values into [0, 360)", () => {
    expect(normalizeLongitude(-30)).toBe(330);
    expect(normalizeLongitude(725)).toBe(5);
    expect(normalizeLongitude(360)).toBe(0);
    expect(normalizeLongitude(-720)).toBe(0);
  });

  it("is idempotent", () => {
    for (const value of [-725.25, -0.5, 12, 359.75, 1080.5]) {
      const once = normalizeLongitude(value);
      expect(normalizeLongitude(once)).toBe(once);
      expect(once).toBeGreaterThanOrEqual(0);
      expect(once).toBeLessThan(360);
    }
  });

  it("rejects non-finite input", () => {
    expect(() => normalizeLongitude(Number.NaN)).toThrow(RangeError);
    expect(() => normalizeLongitude(Number.POSITIVE_INFINITY)).toThrow(RangeError);
  });
});

describe("signForLongitude", () => {
  it("places sign boundaries at multiples of 30 degrees", () => {
    expect(signForLongitude(0)).toEqual({ sign: "aries", sign_index: 0, degree_in_sign: 0 });
    expect(signForLongitude(30)).toEqual({ sign: "taurus", sign_index: 1, degree_in_sign: 0 });
    expect(signForLongitude(359.5).sign).toBe("pisces");
    expect(signForLongitude(359.5).sign_index).toBe(11);
  });

  it("reports the degree within the sign", () => {
    const placement = signForLongitude(54.3);
    expect(placement.sign).toBe("taurus");
    expect(placement.degree_in_sign).toBeCloseTo(24.3, 9);
  });

  it("normalizes before placing", () => {
    expect(signForLongitude(-15).sign).toBe("pisces");
    expect(signForLongitude(400).sign).toBe("taurus");
  });
});
