import { getCritiqueAdapter } from "../adapters/llm/router.js";
import type { CritiqueAdapter } from "../adapters/llm/types.js";
import { createCritic } from "./orchestrator.js";
import type { CritiqueResult } from "./types.js";

export { createCritic, type Critic, type CritiqueInput, type AnalyzeOptions } from "./orchestrator.js";
export { parseIntent, extractTimeframe, TIMEFRAME_NOT_SPECIFIED } from "./intent.js";
export { detectBiasFlags, detectBiasFindings, NO_BIAS_DETECTED } from "./bias/index.js";
export { scoreConfidence } from "./confidence.js";
export { generateArguments, generateHeuristicArguments, parseModelReply } from "./arguments/index.js";
export * from "./intensity.js";
export type * from "./types.js";

/**
 * Positional form of `Critic.analyze`. The adapter defaults to the one the
 * current configuration provides (null without a credential).
 */
export async function analyze(
  decisionText: string,
  contextText: string,
  intensityLevel: number,
  useExternalModel: boolean,
  adapter: CritiqueAdapter | null = getCritiqueAdapter()
): Promise<CritiqueResult> {
  return createCritic({ adapter }).analyze({
    decision: decisionText,
    context: contextText,
    intensity: intensityLevel,
    useExternalModel,
  });
}
