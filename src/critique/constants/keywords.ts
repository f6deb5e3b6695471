/**
 * Keyword lists for signal, bias and confidence detection.
 * Matched as case-insensitive substrings (see text-signals.ts).
 */

// Intent signals
export const URGENCY_KEYWORDS = ["asap", "immediately", "right away", "urgent"] as const;
export const SCALE_KEYWORDS = ["scale", "roll out", "rollout", "expand", "enterprise-wide"] as const;
export const CERTAINTY_KEYWORDS = ["no-brainer", "sure", "guaranteed", "can't fail"] as const;

// Bias rules
export const OVERCONFIDENCE_KEYWORDS = CERTAINTY_KEYWORDS;
export const SOCIAL_PROOF_KEYWORDS = ["everyone", "obvious", "clearly"] as const;
export const PLANNING_FALLACY_KEYWORDS = ["quick", "fast", "asap", "immediately"] as const;
export const SUNK_COST_KEYWORDS = ["sunk cost", "we've already invested", "too much to stop"] as const;

// Confidence markers
export const EVIDENCE_MARKERS = [
  "because",
  "due to",
  "based on",
  "data",
  "analysis",
  "pilot",
  "experiment",
  "evidence",
] as const;
export const ABSOLUTE_CERTAINTY_MARKERS = [
  "no-brainer",
  "guaranteed",
  "can't fail",
  "zero risk",
  "no risk",
] as const;

// Argument template triggers
export const SPEND_KEYWORDS = ["spend", "invest", "funding", "capital", "hire"] as const;
export const BUDGET_CONSTRAINT_KEYWORDS = ["budget", "$", "cost", "limited", "runway"] as const;
export const LAUNCH_KEYWORDS = ["launch", "scale", "roll out", "rollout", "expand"] as const;
export const INTEGRATION_KEYWORDS = ["integration", "integrate", "platform", "api", "migration"] as const;
