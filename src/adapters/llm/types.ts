/**
 * Provider-agnostic adapter interface for the external critique model.
 */

/**
 * Usage metrics returned by LLM calls for telemetry.
 */
export interface UsageMetrics {
  input_tokens: number;
  output_tokens: number;
}

/**
 * Per-call options.
 */
export interface CallOpts {
  requestId: string;
  /** Caller-side cancellation */
  signal?: AbortSignal;
}

export interface CritiqueCompletionArgs {
  prompt: string;
  temperature: number;
}

/**
 * Raw model reply; parsing is the caller's job so that salvage and
 * fallback live in one place.
 */
export interface CritiqueCompletionResult {
  content: string;
  usage: UsageMetrics;
}

export interface CritiqueAdapter {
  readonly name: string;
  readonly model: string;
  complete(args: CritiqueCompletionArgs, opts: CallOpts): Promise<CritiqueCompletionResult>;
}
