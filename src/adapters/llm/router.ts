/**
 * Adapter selection for external-call mode.
 *
 * Returns null when the feature switch is off or no credential is configured;
 * callers treat null as "external model unavailable".
 */

import { getConfig, isExternalModelAvailable, type Config } from "../../config/index.js";
import { log } from "../../utils/telemetry.js";
import { OpenAIAdapter } from "./openai.js";
import type { CritiqueAdapter } from "./types.js";

export function getCritiqueAdapter(cfg: Config = getConfig()): CritiqueAdapter | null {
  const apiKey = cfg.llm.openaiApiKey;
  if (!isExternalModelAvailable(cfg) || apiKey === undefined) {
    log.debug(
      { feature_enabled: cfg.features.externalModel, credential_present: apiKey !== undefined },
      "External model unavailable; heuristic mode only"
    );
    return null;
  }

  return new OpenAIAdapter({
    apiKey,
    model: cfg.llm.model,
    baseUrl: cfg.llm.baseUrl,
  });
}
