import type { IntensityTier } from "./intensity.js";

export interface IntentSignals {
  urgency: boolean;
  scale: boolean;
  certainty: boolean;
}

/**
 * Structured view of the decision, built once per analysis.
 */
export interface IntentRecord {
  readonly decision: string;
  readonly context: string;
  /** "<number> <unit>" or "Not specified" */
  readonly timeframe: string;
  readonly signals: Readonly<IntentSignals>;
}

export type BiasCode = "OVERCONFIDENCE" | "SOCIAL_PROOF" | "PLANNING_FALLACY" | "SUNK_COST";

export interface BiasFinding {
  code: BiasCode;
  label: string;
  explanation: string;
  /** Keywords that triggered the rule, in rule order */
  matched: string[];
}

export interface ArgumentSet {
  counterarguments: string[];
  impacts: string[];
  recommendations: string[];
}

export type ArgumentSource = "heuristic" | "model";

export interface CritiqueResult {
  readonly intent: IntentRecord;
  readonly bias_flags: readonly string[];
  readonly bias_findings: readonly BiasFinding[];
  readonly confidence: number;
  readonly intensity: { readonly level: number; readonly tier: IntensityTier };
  readonly counterarguments: readonly string[];
  readonly impacts: readonly string[];
  readonly recommendations: readonly string[];
  readonly source: ArgumentSource;
  /** Advisory, non-fatal messages (e.g. why the model path fell back) */
  readonly warnings: readonly string[];
}
