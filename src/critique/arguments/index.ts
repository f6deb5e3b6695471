import type { CritiqueAdapter } from "../../adapters/llm/types.js";
import { ModelReplyParseError, UpstreamHTTPError, UpstreamTimeoutError } from "../../adapters/llm/errors.js";
import { ModelArgumentReply } from "../../schemas/critique.js";
import { extractJsonFromResponse, JsonExtractionError } from "../../utils/json-extractor.js";
import { emit, log, TelemetryEvents } from "../../utils/telemetry.js";
import type { ArgumentSet, ArgumentSource, IntentRecord } from "../types.js";
import { temperatureForTier, type IntensityTier } from "../intensity.js";
import { generateHeuristicArguments } from "./heuristic.js";
import { buildCritiquePrompt } from "./prompt.js";

export { generateHeuristicArguments } from "./heuristic.js";
export { buildCritiquePrompt } from "./prompt.js";

export interface GenerateArgumentsOptions {
  /** null when no credential is configured */
  adapter: CritiqueAdapter | null;
  useExternalModel: boolean;
  requestId?: string;
  signal?: AbortSignal;
}

export interface GeneratedArguments {
  arguments: ArgumentSet;
  source: ArgumentSource;
  warnings: string[];
}

export const NO_CREDENTIAL_WARNING =
  "External model requested but no credential is configured; used heuristic analysis.";

const ARGUMENT_FIELDS = ["counterarguments", "impacts", "recommendations"] as const;

function cleanList(items: readonly string[]): string[] {
  return items.map((s) => s.trim()).filter((s) => s.length > 0);
}

/**
 * Parse a model reply into an argument set: strict JSON, then brace salvage,
 * then shape validation. Extra keys are ignored; every list must keep at
 * least one non-blank entry.
 *
 * @throws ModelReplyParseError
 */
export function parseModelReply(content: string): ArgumentSet {
  let json: unknown;
  try {
    const extracted = extractJsonFromResponse(content);
    if (extracted.wasExtracted) {
      log.debug(
        {
          extraction_method: extracted.extractionMethod,
          preamble_length: extracted.preambleLength,
          suffix_length: extracted.suffixLength,
        },
        "Salvaged JSON object from model reply"
      );
    }
    json = extracted.json;
  } catch (error) {
    const detail = error instanceof JsonExtractionError ? error.message : "unparseable reply";
    throw new ModelReplyParseError(`model reply is not valid JSON: ${detail}`, "extract", error);
  }

  const parsed = ModelArgumentReply.safeParse(json);
  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).join(", ");
    throw new ModelReplyParseError(
      `model reply does not match the expected shape${fields ? ` (${fields})` : ""}`,
      "schema",
      parsed.error
    );
  }

  const args: ArgumentSet = {
    counterarguments: cleanList(parsed.data.counterarguments),
    impacts: cleanList(parsed.data.impacts),
    recommendations: cleanList(parsed.data.recommendations),
  };

  const empty = ARGUMENT_FIELDS.filter((field) => args[field].length === 0);
  if (empty.length > 0) {
    throw new ModelReplyParseError(`model reply has no usable entries (${empty.join(", ")})`, "schema");
  }

  return args;
}

function failureReason(error: unknown): { code: string; message: string } {
  if (error instanceof UpstreamTimeoutError) {
    return { code: "timeout", message: error.message };
  }
  if (error instanceof UpstreamHTTPError) {
    return { code: `http_${error.status}`, message: error.message };
  }
  if (error instanceof ModelReplyParseError) {
    return { code: `parse_${error.stage}`, message: error.message };
  }
  if (error instanceof Error) {
    return { code: "transport", message: error.message || error.name };
  }
  return { code: "unknown", message: "unknown error" };
}

/**
 * Counterarguments, impacts and recommendations for one analysis.
 *
 * External-call mode makes exactly one model call. Any failure falls back to
 * the heuristic generator and is reported as a warning, never thrown.
 */
export async function generateArguments(
  intent: IntentRecord,
  tier: IntensityTier,
  options: GenerateArgumentsOptions
): Promise<GeneratedArguments> {
  const { adapter, useExternalModel, requestId = "unknown", signal } = options;

  if (!useExternalModel) {
    return { arguments: generateHeuristicArguments(intent, tier), source: "heuristic", warnings: [] };
  }

  if (!adapter) {
    emit(TelemetryEvents.ModelFallback, { request_id: requestId, reason: "no_credential" });
    return {
      arguments: generateHeuristicArguments(intent, tier),
      source: "heuristic",
      warnings: [NO_CREDENTIAL_WARNING],
    };
  }

  const temperature = temperatureForTier(tier);
  const startTime = Date.now();
  emit(TelemetryEvents.ModelCallStarted, {
    request_id: requestId,
    provider: adapter.name,
    model: adapter.model,
    tier,
    temperature,
  });

  try {
    const reply = await adapter.complete(
      { prompt: buildCritiquePrompt(intent, tier), temperature },
      { requestId, signal }
    );
    const args = parseModelReply(reply.content);

    emit(TelemetryEvents.ModelCallSucceeded, {
      request_id: requestId,
      provider: adapter.name,
      model: adapter.model,
      elapsed_ms: Date.now() - startTime,
      tokens_in: reply.usage.input_tokens,
      tokens_out: reply.usage.output_tokens,
    });

    return { arguments: args, source: "model", warnings: [] };
  } catch (error) {
    const reason = failureReason(error);
    log.warn(
      { request_id: requestId, reason: reason.code, error: reason.message },
      "External model failed; falling back to heuristic arguments"
    );
    emit(TelemetryEvents.ModelCallFailed, {
      request_id: requestId,
      provider: adapter.name,
      model: adapter.model,
      elapsed_ms: Date.now() - startTime,
      reason: reason.code,
    });
    emit(TelemetryEvents.ModelFallback, { request_id: requestId, reason: reason.code });

    return {
      arguments: generateHeuristicArguments(intent, tier),
      source: "heuristic",
      warnings: [`External model call failed (${reason.message}); used heuristic analysis.`],
    };
  }
}
