import { describe, it, expect } from "vitest";
import { extractCallbackArgument, parseRelaxedObject } from "../parsers/relaxed-json.js";
import { PricingParseError } from "../errors.js";

describe("extractCallbackArgument", () => {
  it("extracts the argument of a single-line wrapper", () => {
    expect(extractCallbackArgument("callback({a:1});")).toBe("{a:1}");
  });

  it("spans lines and skips a leading comment", () => {
    const body = [
      "/* pricing feed, generated */",
      "callback({",
      "  vers: 0.01,",
      '  config: {rate: "perhr"}',
      "});",
    ].join("\n");

    expect(extractCallbackArgument(body)).toBe('{\n  vers: 0.01,\n  config: {rate: "perhr"}\n}');
  });

  it("accepts a wrapper without a trailing semicolon", () => {
    expect(extractCallbackArgument("callback({vers:1})")).toBe("{vers:1}");
  });

  it("throws when there is no wrapper", () => {
    expect(() => extractCallbackArgument("var pricing = {};", "feed.js")).toThrow(PricingParseError);
    expect(() => extractCallbackArgument("var pricing = {};", "feed.js")).toThrow(
      "Unable to parse pricing data from feed.js: no callback(...) wrapper found"
    );
  });
});

describe("parseRelaxedObject", () => {
  it("decodes unquoted keys, single quotes and trailing commas", () => {
    expect(parseRelaxedObject("{vers: 0.01, config: {rate: 'perhr', regions: [],},}")).toEqual({
      vers: 0.01,
      config: { rate: "perhr", regions: [] },
    });
  });

  it("decodes strict JSON too", () => {
    expect(parseRelaxedObject('{"a": [1, 2]}')).toEqual({ a: [1, 2] });
  });

  it("throws a parse error for malformed input", () => {
    expect(() => parseRelaxedObject("{a: }", "feed.js")).toThrow(PricingParseError);
  });
});
