import type { CritiqueAdapter } from "../adapters/llm/types.js";
import type { CritiqueResult } from "./types.js";
import { parseIntent } from "./intent.js";
import { detectBiasFindings, toBiasFlags } from "./bias/index.js";
import { scoreConfidence } from "./confidence.js";
import { normalizeIntensity, tierForLevel, type IntensityLevel } from "./intensity.js";
import { generateArguments } from "./arguments/index.js";

export interface CritiqueInput {
  decision: string;
  context?: string;
  /** Any number; rounded and clamped into 1..5 */
  intensity?: number;
  useExternalModel?: boolean;
}

export interface AnalyzeOptions {
  requestId?: string;
  signal?: AbortSignal;
}

export interface CriticDeps {
  /** External-model adapter, or null when no credential is configured */
  adapter: CritiqueAdapter | null;
  defaultIntensity?: IntensityLevel;
}

export interface Critic {
  readonly externalModelAvailable: boolean;
  analyze(input: CritiqueInput, options?: AnalyzeOptions): Promise<CritiqueResult>;
}

/**
 * Build the single entry point the presentation layer calls.
 *
 * Intent, bias and confidence always run locally; only argument generation
 * may go to the external model, with heuristic fallback. Heuristic-mode
 * results are deterministic for identical input.
 */
export function createCritic(deps: CriticDeps): Critic {
  const defaultIntensity = deps.defaultIntensity ?? 3;

  return {
    externalModelAvailable: deps.adapter !== null,

    async analyze(input: CritiqueInput, options: AnalyzeOptions = {}): Promise<CritiqueResult> {
      const intent = parseIntent(input.decision, input.context);
      const findings = detectBiasFindings(intent);
      const confidence = scoreConfidence(intent.decision, intent.context);

      const level = normalizeIntensity(input.intensity ?? defaultIntensity, defaultIntensity);
      const tier = tierForLevel(level);

      const generated = await generateArguments(intent, tier, {
        adapter: deps.adapter,
        useExternalModel: input.useExternalModel === true,
        requestId: options.requestId,
        signal: options.signal,
      });

      return Object.freeze({
        intent,
        bias_flags: Object.freeze(toBiasFlags(findings)),
        bias_findings: Object.freeze(findings.map((f) => Object.freeze({ ...f, matched: [...f.matched] }))),
        confidence,
        intensity: Object.freeze({ level, tier }),
        counterarguments: Object.freeze(generated.arguments.counterarguments),
        impacts: Object.freeze(generated.arguments.impacts),
        recommendations: Object.freeze(generated.arguments.recommendations),
        source: generated.source,
        warnings: Object.freeze(generated.warnings),
      });
    },
  };
}
