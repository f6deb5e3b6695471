import { clamp, containsAny, countNumbers } from "./text-signals.js";
import { ABSOLUTE_CERTAINTY_MARKERS, EVIDENCE_MARKERS } from "./constants/keywords.js";

export const CONFIDENCE_BASE = 55;
const NUMBER_WEIGHT = 4;
const NUMBER_BONUS_MAX = 20;
const EVIDENCE_BONUS = 10;
const CERTAINTY_PENALTY = 15;
const SHORT_DECISION_CHARS = 40;
const SHORT_DECISION_PENALTY = 10;
const SHORT_CONTEXT_CHARS = 20;
const SHORT_CONTEXT_PENALTY = 5;

/**
 * Specificity-vs-hedging score in [0, 100].
 *
 * Numbers and evidentiary language raise it; absolute certainty and thin
 * decision/context text lower it.
 */
export function scoreConfidence(decision?: string | null, context?: string | null): number {
  const d = decision ?? "";
  const c = context ?? "";
  const combined = `${d} ${c}`;

  let score = CONFIDENCE_BASE;
  score += clamp(NUMBER_WEIGHT * countNumbers(combined), 0, NUMBER_BONUS_MAX);
  if (containsAny(combined, EVIDENCE_MARKERS)) score += EVIDENCE_BONUS;
  if (containsAny(combined, ABSOLUTE_CERTAINTY_MARKERS)) score -= CERTAINTY_PENALTY;
  if (d.length < SHORT_DECISION_CHARS) score -= SHORT_DECISION_PENALTY;
  if (c.length < SHORT_CONTEXT_CHARS) score -= SHORT_CONTEXT_PENALTY;

  return clamp(Math.round(score), 0, 100);
}
