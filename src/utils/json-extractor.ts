/**
 * JSON Extractor Utility
 *
 * Extracts a JSON value from an LLM reply that may wrap it in
 * conversational preamble or suffix text.
 *
 * Two stages only:
 * 1. Strict parse of the trimmed reply
 * 2. Parse of the substring from the first `{` to the last `}`
 *
 * Anything else is a failure; callers fall back to local generation.
 */

/**
 * Result of JSON extraction
 */
export interface JsonExtractionResult {
  /** The parsed JSON */
  json: unknown;
  /** Whether the brace-delimited salvage stage was needed */
  wasExtracted: boolean;
  /** The extraction method used */
  extractionMethod: "strict" | "brace_salvage";
  /** Characters of preamble text that were stripped */
  preambleLength: number;
  /** Characters of suffix text that were stripped */
  suffixLength: number;
}

/**
 * Thrown when neither extraction stage yields parseable JSON.
 */
export class JsonExtractionError extends Error {
  readonly name = "JsonExtractionError";

  constructor(
    message: string,
    public readonly contentLength: number,
    public readonly cause?: unknown
  ) {
    super(message);
  }
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false; error: unknown } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, error };
  }
}

/**
 * Extract JSON from an LLM reply.
 *
 * @throws JsonExtractionError if no valid JSON can be extracted
 */
export function extractJsonFromResponse(content: string): JsonExtractionResult {
  const trimmed = content.trim();

  const strict = tryParse(trimmed);
  if (strict.ok) {
    return {
      json: strict.value,
      wasExtracted: false,
      extractionMethod: "strict",
      preambleLength: 0,
      suffixLength: 0,
    };
  }

  const start = trimmed.indexOf("{");
  const end = trimmed.lastIndexOf("}");
  if (start === -1 || end === -1 || end < start) {
    throw new JsonExtractionError(
      "reply contains no brace-delimited JSON object",
      trimmed.length,
      strict.error
    );
  }

  const candidate = trimmed.slice(start, end + 1);
  const salvaged = tryParse(candidate);
  if (!salvaged.ok) {
    throw new JsonExtractionError(
      "brace-delimited substring is not valid JSON",
      trimmed.length,
      salvaged.error
    );
  }

  return {
    json: salvaged.value,
    wasExtracted: true,
    extractionMethod: "brace_salvage",
    preambleLength: start,
    suffixLength: trimmed.length - (end + 1),
  };
}
