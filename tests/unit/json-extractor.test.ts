import { describe, it, expect } from "vitest";
import { extractJsonFromResponse, JsonExtractionError } from "../../src/utils/json-extractor.js";

describe("extractJsonFromResponse", () => {
  it("parses clean JSON strictly", () => {
    const result = extractJsonFromResponse('  {"a": 1}  ');
    expect(result).toEqual({
      json: { a: 1 },
      wasExtracted: false,
      extractionMethod: "strict",
      preambleLength: 0,
      suffixLength: 0,
    });
  });

  it("salvages JSON between the first { and the last }", () => {
    const result = extractJsonFromResponse('Here you go: {"a": {"b": 2}} Hope that helps');
    expect(result.json).toEqual({ a: { b: 2 } });
    expect(result.extractionMethod).toBe("brace_salvage");
    expect(result.wasExtracted).toBe(true);
    expect(result.preambleLength).toBe(13);
    expect(result.suffixLength).toBe(16);
  });

  it("fails when the reply has no braces", () => {
    expect(() => extractJsonFromResponse("I think this is risky.")).toThrow(JsonExtractionError);
    expect(() => extractJsonFromResponse("I think this is risky.")).toThrow(
      "reply contains no brace-delimited JSON object"
    );
  });

  it("fails when the brace-delimited substring is not JSON", () => {
    expect(() => extractJsonFromResponse("Sure { not json } ok")).toThrow(
      "brace-delimited substring is not valid JSON"
    );
  });

  it("fails when the only closing brace precedes the opening one", () => {
    expect(() => extractJsonFromResponse("} backwards {")).toThrow(JsonExtractionError);
  });

  it("does not try further heuristics across multiple objects", () => {
    // First { to last } spans two objects, which is not valid JSON
    expect(() => extractJsonFromResponse('{"a":1} and {"b":2}')).toThrow(
      "brace-delimited substring is not valid JSON"
    );
  });
});
