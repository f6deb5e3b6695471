import { describe, it, expect } from "vitest";
import {
  counterargumentCap,
  INTENSITY_TIERS,
  levelForTier,
  normalizeIntensity,
  temperatureForTier,
  tierForLevel,
  toneForTier,
} from "../../src/critique/intensity.js";

describe("intensity tiers", () => {
  it("maps levels 1..5 to named tiers and back", () => {
    expect(INTENSITY_TIERS.map((_, i) => tierForLevel(normalizeIntensity(i + 1)))).toEqual([
      "gentle",
      "balanced",
      "direct",
      "challenging",
      "brutally_honest",
    ]);
    for (const tier of INTENSITY_TIERS) {
      expect(tierForLevel(levelForTier(tier))).toBe(tier);
    }
  });

  it("uses the fixed counterargument caps", () => {
    expect(INTENSITY_TIERS.map(counterargumentCap)).toEqual([2, 3, 4, 5, 6]);
  });

  it("raises temperature linearly with level", () => {
    expect(INTENSITY_TIERS.map(temperatureForTier)).toEqual([0.38, 0.46, 0.54, 0.62, 0.7]);
  });

  it("gives every tier a distinct tone", () => {
    const tones = INTENSITY_TIERS.map(toneForTier);
    expect(new Set(tones).size).toBe(INTENSITY_TIERS.length);
  });

  describe("normalizeIntensity", () => {
    it.each([
      [0, 1],
      [-3, 1],
      [1, 1],
      [2.4, 2],
      [2.5, 3],
      [5, 5],
      [9, 5],
    ])("maps %d to %d", (raw, expected) => {
      expect(normalizeIntensity(raw)).toBe(expected);
    });

    it("falls back for non-finite input", () => {
      expect(normalizeIntensity(Number.NaN)).toBe(3);
      expect(normalizeIntensity(Number.POSITIVE_INFINITY, 2)).toBe(2);
    });
  });
});
