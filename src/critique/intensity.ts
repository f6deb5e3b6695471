import { clamp } from "./text-signals.js";

/**
 * Named intensity tiers, one per level 1..5.
 */
export const INTENSITY_TIERS = [
  "gentle",
  "balanced",
  "direct",
  "challenging",
  "brutally_honest",
] as const;

export type IntensityTier = (typeof INTENSITY_TIERS)[number];

export type IntensityLevel = 1 | 2 | 3 | 4 | 5;

export const MIN_INTENSITY: IntensityLevel = 1;
export const MAX_INTENSITY: IntensityLevel = 5;

function isIntensityLevel(n: number): n is IntensityLevel {
  return n === 1 || n === 2 || n === 3 || n === 4 || n === 5;
}

/**
 * Round and clamp any numeric input into 1..5.
 * Non-finite input (NaN, ±Infinity) maps to `fallback`.
 */
export function normalizeIntensity(raw: number, fallback: IntensityLevel = 3): IntensityLevel {
  if (!Number.isFinite(raw)) return fallback;
  const level = clamp(Math.round(raw), MIN_INTENSITY, MAX_INTENSITY);
  return isIntensityLevel(level) ? level : fallback;
}

export function tierForLevel(level: IntensityLevel): IntensityTier {
  switch (level) {
    case 1:
      return "gentle";
    case 2:
      return "balanced";
    case 3:
      return "direct";
    case 4:
      return "challenging";
    case 5:
      return "brutally_honest";
  }
}

export function levelForTier(tier: IntensityTier): IntensityLevel {
  switch (tier) {
    case "gentle":
      return 1;
    case "balanced":
      return 2;
    case "direct":
      return 3;
    case "challenging":
      return 4;
    case "brutally_honest":
      return 5;
  }
}

/**
 * Maximum number of templated counterarguments before the tier additions.
 */
export function counterargumentCap(tier: IntensityTier): number {
  switch (tier) {
    case "gentle":
      return 2;
    case "balanced":
      return 3;
    case "direct":
      return 4;
    case "challenging":
      return 5;
    case "brutally_honest":
      return 6;
  }
}

/**
 * Sampling temperature for the external model: 0.3 + 0.08 per level.
 */
export function temperatureForTier(tier: IntensityTier): number {
  return Number((0.3 + 0.08 * levelForTier(tier)).toFixed(2));
}

/**
 * How the model is told to pitch its critique at each tier.
 */
export function toneForTier(tier: IntensityTier): string {
  switch (tier) {
    case "gentle":
      return "Raise concerns softly and acknowledge what is sound about the decision.";
    case "balanced":
      return "Weigh strengths and weaknesses evenly, flagging the most important risks.";
    case "direct":
      return "State the weaknesses plainly without hedging.";
    case "challenging":
      return "Actively stress-test every assumption and push back on optimistic framing.";
    case "brutally_honest":
      return "Assume the decision is flawed and expose every weak assumption bluntly, without softening.";
  }
}
