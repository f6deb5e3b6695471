import type { IntentRecord } from "./types.js";
import { containsAny } from "./text-signals.js";
import { CERTAINTY_KEYWORDS, SCALE_KEYWORDS, URGENCY_KEYWORDS } from "./constants/keywords.js";

export const TIMEFRAME_NOT_SPECIFIED = "Not specified";

const TIMEFRAME_PATTERN =
  /\b(?:in|within|over)\s+(\d+)\s+(days?|weeks?|months?|quarters?|years?)\b/i;

/**
 * First "in|within|over <n> <unit>" phrase in the text, as "<n> <unit>".
 */
export function extractTimeframe(text: string): string {
  const match = TIMEFRAME_PATTERN.exec(text);
  if (!match) return TIMEFRAME_NOT_SPECIFIED;
  return `${match[1]} ${match[2].toLowerCase()}`;
}

/**
 * Build the intent record for one analysis. Missing texts are treated as
 * empty; the record is frozen.
 */
export function parseIntent(decisionText?: string | null, contextText?: string | null): IntentRecord {
  const decision = (decisionText ?? "").trim();
  const context = (contextText ?? "").trim();

  return Object.freeze({
    decision,
    context,
    timeframe: extractTimeframe(decision),
    signals: Object.freeze({
      urgency: containsAny(decision, URGENCY_KEYWORDS),
      scale: containsAny(decision, SCALE_KEYWORDS),
      certainty: containsAny(decision, CERTAINTY_KEYWORDS),
    }),
  });
}
