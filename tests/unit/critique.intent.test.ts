import { describe, it, expect } from "vitest";
import { extractTimeframe, parseIntent, TIMEFRAME_NOT_SPECIFIED } from "../../src/critique/intent.js";
import { LAUNCH_CONTEXT, LAUNCH_DECISION } from "../helpers/fake-adapter.js";

describe("parseIntent", () => {
  it("parses the launch scenario", () => {
    const intent = parseIntent(LAUNCH_DECISION, LAUNCH_CONTEXT);

    expect(intent.decision).toBe(LAUNCH_DECISION);
    expect(intent.context).toBe(LAUNCH_CONTEXT);
    expect(intent.timeframe).toBe("3 months");
    expect(intent.signals).toEqual({ urgency: true, scale: true, certainty: true });
  });

  it("returns a sparse record for empty input", () => {
    const intent = parseIntent("", "");

    expect(intent).toEqual({
      decision: "",
      context: "",
      timeframe: TIMEFRAME_NOT_SPECIFIED,
      signals: { urgency: false, scale: false, certainty: false },
    });
  });

  it("treats missing text as empty and trims whitespace", () => {
    const intent = parseIntent("  Hire two engineers  ", undefined);
    expect(intent.decision).toBe("Hire two engineers");
    expect(intent.context).toBe("");
  });

  it.each(["asap", "ASAP", "Asap", "do this asap please"])("flags urgency for %j", (text) => {
    expect(parseIntent(text).signals.urgency).toBe(true);
  });

  it("detects scale and certainty keywords", () => {
    expect(parseIntent("Roll out enterprise-wide").signals.scale).toBe(true);
    expect(parseIntent("This can’t fail").signals.certainty).toBe(true);
    expect(parseIntent("Maybe try a small test").signals).toEqual({
      urgency: false,
      scale: false,
      certainty: false,
    });
  });

  it("only reads signals from the decision text", () => {
    const intent = parseIntent("Consider a new vendor", "We need this ASAP");
    expect(intent.signals.urgency).toBe(false);
  });

  it("freezes the record", () => {
    const intent = parseIntent("Launch now");
    expect(Object.isFrozen(intent)).toBe(true);
    expect(Object.isFrozen(intent.signals)).toBe(true);
  });
});

describe("extractTimeframe", () => {
  it.each([
    ["Ship within 2 weeks", "2 weeks"],
    ["Hit targets over 4 Quarters", "4 quarters"],
    ["Break even in 1 year", "1 year"],
    ["Migrate in 30 days then expand in 6 months", "30 days"],
  ])("extracts %j as %j", (text, expected) => {
    expect(extractTimeframe(text)).toBe(expected);
  });

  it("returns the sentinel when no pattern matches", () => {
    expect(extractTimeframe("Launch next month")).toBe(TIMEFRAME_NOT_SPECIFIED);
    expect(extractTimeframe("in a few weeks")).toBe(TIMEFRAME_NOT_SPECIFIED);
    expect(extractTimeframe("")).toBe(TIMEFRAME_NOT_SPECIFIED);
  });
});
