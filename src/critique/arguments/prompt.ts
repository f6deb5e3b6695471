import type { IntentRecord } from "../types.js";
import { toneForTier, type IntensityTier } from "../intensity.js";

/**
 * Signal block sent to the model alongside the raw texts.
 */
export function buildSignalBlock(intent: IntentRecord, tier: IntensityTier): string {
  return JSON.stringify(
    {
      timeframe: intent.timeframe,
      signals: intent.signals,
      intensity: tier,
    },
    null,
    2
  );
}

export function buildCritiquePrompt(intent: IntentRecord, tier: IntensityTier): string {
  const context = intent.context.length > 0 ? intent.context : "(none provided)";

  return `You are a constructive devil's advocate reviewing a proposed decision before it is committed.

## Decision
${intent.decision.length > 0 ? intent.decision : "(empty)"}

## Context
${context}

## Parsed Signals
${buildSignalBlock(intent, tier)}

## Intensity: ${tier}
${toneForTier(tier)}

## Your Task
- counterarguments: specific reasons the decision could be wrong or fail
- impacts: second-order consequences that follow if the decision goes ahead
- recommendations: concrete actions that reduce the risk of the decision

## Output Format (JSON)
Return ONLY valid JSON with exactly this shape:
{"counterarguments": ["..."], "impacts": ["..."], "recommendations": ["..."]}

IMPORTANT: Return ONLY the JSON object, no markdown formatting`;
}
