import { describe, it, expect } from "vitest";
import { availableCodecs } from "./codecs/index.js";
import {
  DEFAULT_FLUSH_HEADERS,
  DEFAULT_MIN_SIZE,
  isCompressionOptions,
  resolveConfig,
} from "./config.js";
import { DEFAULT_FLUSH_CONTENT_TYPES } from "./content-type.js";
import { ConfigError } from "./errors.js";

describe("resolveConfig", () => {
  it("fills in defaults", () => {
    expect(resolveConfig()).toEqual({
      minSize: DEFAULT_MIN_SIZE,
      codecs: availableCodecs(),
      flushContentTypes: DEFAULT_FLUSH_CONTENT_TYPES,
      flushHeaders: DEFAULT_FLUSH_HEADERS,
    });
    expect(DEFAULT_MIN_SIZE).toBe(860);
  });

  it("keeps preference order whatever order codecs are given in", () => {
    expect(resolveConfig({ codecs: ["gzip", "br"] }).codecs).toEqual(["br", "gzip"]);
  });

  it("accepts a zero minSize and custom flush rules", () => {
    const config = resolveConfig({
      minSize: 0,
      flushContentTypes: ["application/x-ndjson"],
      flushHeaders: [{ name: "x-stream", value: "1" }],
    });
    expect(config.minSize).toBe(0);
    expect(config.flushContentTypes).toEqual(["application/x-ndjson"]);
    expect(config.flushHeaders).toEqual([{ name: "x-stream", value: "1" }]);
  });

  it.each([
    ["negative minSize", { minSize: -1 }],
    ["fractional minSize", { minSize: 1.5 }],
    ["unknown codec", { codecs: ["deflate"] }],
    ["empty flush header name", { flushHeaders: [{ name: "", value: "no" }] }],
    ["non-object", "gzip"],
  ])("rejects %s", (_, input) => {
    expect(() => resolveConfig(input)).toThrow(ConfigError);
    expect(() => resolveConfig(input)).toThrow(/^invalid compression options: /);
  });
});

describe("isCompressionOptions", () => {
  it("guards the option shape", () => {
    expect(isCompressionOptions({ minSize: 10, codecs: ["br"] })).toBe(true);
    expect(isCompressionOptions({ minSize: "10" })).toBe(false);
  });
});
