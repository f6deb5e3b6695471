import { describe, it, expect, vi } from "vitest";
import { parseModelReply } from "../../src/critique/arguments/index.js";
import { ModelReplyParseError } from "../../src/adapters/llm/errors.js";
import { log } from "../../src/utils/telemetry.js";

const VALID = {
  counterarguments: ["Demand is unproven"],
  impacts: ["Support queues grow"],
  recommendations: ["Pilot with two customers"],
};

function parseFailure(content: string): ModelReplyParseError {
  try {
    parseModelReply(content);
  } catch (err) {
    if (err instanceof ModelReplyParseError) return err;
    throw err;
  }
  throw new Error("parseModelReply accepted the reply");
}

describe("parseModelReply", () => {
  it("parses a pure JSON reply", () => {
    expect(parseModelReply(JSON.stringify(VALID))).toEqual(VALID);
  });

  it("parses JSON embedded in prose", () => {
    const reply = `Here is my critique:\n${JSON.stringify(VALID)}\nLet me know if you need more.`;
    expect(parseModelReply(reply)).toEqual(VALID);
  });

  it("ignores extra keys", () => {
    expect(parseModelReply(JSON.stringify({ ...VALID, severity: "high" }))).toEqual(VALID);
  });

  it("trims entries and drops blank ones", () => {
    const reply = JSON.stringify({
      counterarguments: ["  Demand is unproven  ", "   "],
      impacts: ["Support queues grow", ""],
      recommendations: ["Pilot with two customers"],
    });
    expect(parseModelReply(reply)).toEqual(VALID);
  });

  it("rejects a reply whose lists are empty after trimming", () => {
    const err = parseFailure(JSON.stringify({ counterarguments: ["   "], impacts: [], recommendations: [] }));
    expect(err.stage).toBe("schema");
    expect(err.message).toBe("model reply has no usable entries (counterarguments, impacts, recommendations)");
  });

  it("rejects a reply with a single empty list", () => {
    expect(() => parseModelReply(JSON.stringify({ ...VALID, recommendations: [] }))).toThrow(
      "model reply has no usable entries (recommendations)"
    );
  });

  it("logs how a wrapped reply was salvaged", () => {
    const debug = vi.spyOn(log, "debug").mockImplementation(() => undefined);
    try {
      parseModelReply(`Sure: ${JSON.stringify(VALID)} Done`);
      expect(debug).toHaveBeenCalledWith(
        { extraction_method: "brace_salvage", preamble_length: 6, suffix_length: 5 },
        "Salvaged JSON object from model reply"
      );
    } finally {
      debug.mockRestore();
    }
  });

  it("rejects prose with no JSON at the extract stage", () => {
    const err = parseFailure("This decision looks risky; I would slow down.");
    expect(err.stage).toBe("extract");
    expect(err.message).toBe("model reply is not valid JSON: reply contains no brace-delimited JSON object");
  });

  it("rejects a reply with the wrong shape at the schema stage", () => {
    const err = parseFailure(JSON.stringify({ counterarguments: "one", impacts: [], recommendations: [] }));
    expect(err.stage).toBe("schema");
    expect(err.message).toBe("model reply does not match the expected shape (counterarguments)");
  });

  it("rejects a reply missing a required key", () => {
    expect(() => parseModelReply(JSON.stringify({ counterarguments: [], impacts: [] }))).toThrow(
      "model reply does not match the expected shape (recommendations)"
    );
  });
});
