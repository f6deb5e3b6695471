import type { BiasFinding, IntentRecord } from "../types.js";
import { matchedKeywords } from "../text-signals.js";
import { BIAS_LIBRARY, NO_BIAS_DETECTED } from "./library.js";

export { BIAS_LIBRARY, NO_BIAS_DETECTED } from "./library.js";

function quoteList(items: readonly string[]): string {
  return items.map((k) => `"${k}"`).join(", ");
}

/**
 * Keyword-based bias findings against the decision text.
 *
 * Deterministic and cheap: every rule is checked independently, in library
 * order. Labels are unique per finding; nothing here inspects context text.
 */
export function detectBiasFindings(intent: IntentRecord): BiasFinding[] {
  const findings: BiasFinding[] = [];
  const seen = new Set<string>();

  for (const def of BIAS_LIBRARY) {
    const matched = matchedKeywords(intent.decision, def.keywords);
    if (matched.length === 0 || seen.has(def.label)) continue;
    seen.add(def.label);
    findings.push({
      code: def.code,
      label: def.label,
      explanation: `Detected ${quoteList(matched)}. ${def.mechanism}`,
      matched,
    });
  }

  return findings;
}

/**
 * Ordered, deduplicated bias labels; never empty.
 */
export function detectBiasFlags(intent: IntentRecord): string[] {
  return toBiasFlags(detectBiasFindings(intent));
}

export function toBiasFlags(findings: readonly BiasFinding[]): string[] {
  const flags = [...new Set(findings.map((f) => f.label))];
  return flags.length > 0 ? flags : [NO_BIAS_DETECTED];
}
