import type { ArgumentSet, IntentRecord } from "../types.js";
import { counterargumentCap, levelForTier, type IntensityTier } from "../intensity.js";
import {
  ALWAYS_IMPACTS,
  CONDITIONAL_IMPACT_TEMPLATES,
  COUNTERARGUMENT_TEMPLATES,
  GENERIC_COUNTERARGUMENT,
  IRREVERSIBLE_COST_PROMPT,
  PRE_MORTEM_PROMPT,
  RECOMMENDATIONS,
  STAKEHOLDER_TRUST_IMPACT,
} from "./templates.js";

export function buildCounterarguments(intent: IntentRecord, tier: IntensityTier): string[] {
  const level = levelForTier(tier);
  const matched = COUNTERARGUMENT_TEMPLATES.filter((t) => t.applies(intent)).map((t) =>
    t.render(intent)
  );
  const base = matched.length > 0 ? matched : [GENERIC_COUNTERARGUMENT];

  // Tier additions go beyond the cap
  const result = base.slice(0, counterargumentCap(tier));
  if (level >= 3) result.push(PRE_MORTEM_PROMPT);
  if (level >= 5) result.push(IRREVERSIBLE_COST_PROMPT);
  return result;
}

export function buildImpacts(intent: IntentRecord, tier: IntensityTier): string[] {
  const impacts = CONDITIONAL_IMPACT_TEMPLATES.filter((t) => t.applies(intent)).map((t) =>
    t.render(intent)
  );
  impacts.push(...ALWAYS_IMPACTS);
  if (levelForTier(tier) >= 4) impacts.push(STAKEHOLDER_TRUST_IMPACT);
  return impacts;
}

export function buildRecommendations(tier: IntensityTier): string[] {
  return levelForTier(tier) <= 3 ? RECOMMENDATIONS.slice(0, 3) : [...RECOMMENDATIONS];
}

/**
 * Local, deterministic argument generation; always available.
 */
export function generateHeuristicArguments(intent: IntentRecord, tier: IntensityTier): ArgumentSet {
  return {
    counterarguments: buildCounterarguments(intent, tier),
    impacts: buildImpacts(intent, tier),
    recommendations: buildRecommendations(tier),
  };
}
