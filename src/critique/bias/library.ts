import type { BiasCode } from "../types.js";
import {
  OVERCONFIDENCE_KEYWORDS,
  PLANNING_FALLACY_KEYWORDS,
  SOCIAL_PROOF_KEYWORDS,
  SUNK_COST_KEYWORDS,
} from "../constants/keywords.js";

export interface BiasDefinition {
  code: BiasCode;
  label: string;
  mechanism: string;
  keywords: readonly string[];
}

/**
 * Bias rules in evaluation order; this order is the output order.
 */
export const BIAS_LIBRARY: readonly BiasDefinition[] = [
  {
    code: "OVERCONFIDENCE",
    label: "Overconfidence bias",
    mechanism: "Certainty language suggests the downside has not been seriously examined.",
    keywords: OVERCONFIDENCE_KEYWORDS,
  },
  {
    code: "SOCIAL_PROOF",
    label: "Social proof / groupthink",
    mechanism: "Appeals to consensus or obviousness can stand in for independent evaluation.",
    keywords: SOCIAL_PROOF_KEYWORDS,
  },
  {
    code: "PLANNING_FALLACY",
    label: "Optimism / planning fallacy",
    mechanism: "Emphasis on speed tends to underestimate effort, duration and cost.",
    keywords: PLANNING_FALLACY_KEYWORDS,
  },
  {
    code: "SUNK_COST",
    label: "Sunk cost fallacy",
    mechanism: "Past investment is being used to justify future commitment.",
    keywords: SUNK_COST_KEYWORDS,
  },
];

export const NO_BIAS_DETECTED = "No strong bias detected (based on visible signals)";
