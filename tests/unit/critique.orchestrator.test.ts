import { describe, it, expect } from "vitest";
import { analyze, createCritic } from "../../src/critique/index.js";
import { NO_BIAS_DETECTED } from "../../src/critique/bias/index.js";
import {
  GENERIC_COUNTERARGUMENT,
  IRREVERSIBLE_COST_PROMPT,
  PRE_MORTEM_PROMPT,
  RECOMMENDATIONS,
} from "../../src/critique/arguments/templates.js";
import { FakeCritiqueAdapter, LAUNCH_CONTEXT, LAUNCH_DECISION } from "../helpers/fake-adapter.js";

const heuristicCritic = createCritic({ adapter: null });

describe("critic.analyze", () => {
  it("assembles the full result for the launch scenario", async () => {
    const result = await heuristicCritic.analyze({
      decision: LAUNCH_DECISION,
      context: LAUNCH_CONTEXT,
      intensity: 3,
    });

    expect(result.intent.timeframe).toBe("3 months");
    expect(result.intent.signals).toEqual({ urgency: true, scale: true, certainty: true });
    expect(result.bias_flags).toEqual(["Overconfidence bias", "Optimism / planning fallacy"]);
    expect(result.confidence).toBe(48);
    expect(result.intensity).toEqual({ level: 3, tier: "direct" });
    expect(result.counterarguments).toHaveLength(5);
    expect(result.counterarguments.at(-1)).toBe(PRE_MORTEM_PROMPT);
    expect(result.counterarguments).not.toContain(IRREVERSIBLE_COST_PROMPT);
    expect(result.impacts).toHaveLength(4);
    expect(result.recommendations).toEqual(RECOMMENDATIONS.slice(0, 3));
    expect(result.source).toBe("heuristic");
    expect(result.warnings).toEqual([]);
  });

  it("handles empty input", async () => {
    const result = await heuristicCritic.analyze({ decision: "", context: "", intensity: 3 });

    expect(result.intent.timeframe).toBe("Not specified");
    expect(result.intent.signals).toEqual({ urgency: false, scale: false, certainty: false });
    expect(result.bias_flags).toEqual([NO_BIAS_DETECTED]);
    expect(result.bias_findings).toEqual([]);
    expect(result.confidence).toBe(40);
    expect(result.counterarguments).toEqual([GENERIC_COUNTERARGUMENT, PRE_MORTEM_PROMPT]);
  });

  it("is deterministic in heuristic mode", async () => {
    const input = { decision: LAUNCH_DECISION, context: LAUNCH_CONTEXT, intensity: 4 };
    const first = await heuristicCritic.analyze(input);
    const second = await heuristicCritic.analyze(input);
    expect(second).toEqual(first);
  });

  it("clamps out-of-range intensity", async () => {
    const high = await heuristicCritic.analyze({ decision: LAUNCH_DECISION, intensity: 9 });
    const low = await heuristicCritic.analyze({ decision: LAUNCH_DECISION, intensity: -2 });

    expect(high.intensity).toEqual({ level: 5, tier: "brutally_honest" });
    expect(high.counterarguments.at(-1)).toBe(IRREVERSIBLE_COST_PROMPT);
    expect(low.intensity).toEqual({ level: 1, tier: "gentle" });
  });

  it("uses the configured default intensity when none is given", async () => {
    const critic = createCritic({ adapter: null, defaultIntensity: 5 });
    const result = await critic.analyze({ decision: LAUNCH_DECISION });
    expect(result.intensity).toEqual({ level: 5, tier: "brutally_honest" });
  });

  it("returns a frozen result", async () => {
    const result = await heuristicCritic.analyze({ decision: LAUNCH_DECISION, context: LAUNCH_CONTEXT });

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.intent)).toBe(true);
    expect(Object.isFrozen(result.counterarguments)).toBe(true);
    expect(Object.isFrozen(result.bias_findings[0])).toBe(true);
  });

  it("keeps bias and confidence local when the model answers", async () => {
    const adapter = new FakeCritiqueAdapter({
      content: JSON.stringify({ counterarguments: ["A"], impacts: ["B"], recommendations: ["C"] }),
    });
    const critic = createCritic({ adapter });
    const result = await critic.analyze({
      decision: LAUNCH_DECISION,
      context: LAUNCH_CONTEXT,
      intensity: 3,
      useExternalModel: true,
    });

    expect(critic.externalModelAvailable).toBe(true);
    expect(result.source).toBe("model");
    expect(result.counterarguments).toEqual(["A"]);
    expect(result.impacts).toEqual(["B"]);
    expect(result.recommendations).toEqual(["C"]);
    expect(result.bias_flags).toEqual(["Overconfidence bias", "Optimism / planning fallacy"]);
    expect(result.confidence).toBe(48);
  });

  it("still succeeds when the model reply is malformed", async () => {
    const adapter = new FakeCritiqueAdapter({ content: "Honestly this seems fine to me." });
    const result = await createCritic({ adapter }).analyze({
      decision: LAUNCH_DECISION,
      context: LAUNCH_CONTEXT,
      intensity: 3,
      useExternalModel: true,
    });

    expect(result.source).toBe("heuristic");
    expect(result.counterarguments).toHaveLength(5);
    expect(result.warnings).toHaveLength(1);
  });
});

describe("analyze", () => {
  it("runs the positional form without a configured credential", async () => {
    const result = await analyze(LAUNCH_DECISION, LAUNCH_CONTEXT, 3, true);

    expect(result.source).toBe("heuristic");
    expect(result.warnings).toEqual([
      "External model requested but no credential is configured; used heuristic analysis.",
    ]);
  });
});
