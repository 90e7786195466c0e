import { describe, it, expect } from "vitest";
import { isExcludedContentType, isFlushContentType, mediaType } from "./content-type.js";

describe("mediaType", () => {
  it("drops parameters and normalises case", () => {
    expect(mediaType("Text/HTML; charset=UTF-8")).toBe("text/html");
    expect(mediaType(null)).toBe("");
  });
});

describe("isExcludedContentType", () => {
  it.each([
    ["image/png", true],
    ["image/jpeg", true],
    ["IMAGE/WEBP", true],
    ["image/svg+xml", false],
    ["image/svg+xml; charset=utf-8", false],
    ["application/grpc", true],
    ["application/grpc+proto", true],
    ["application/grpc-web", false],
    ["application/grpc-web-text+proto", false],
    ["text/html", false],
    ["application/json", false],
    [null, false],
  ])("%s → %s", (ct, excluded) => {
    expect(isExcludedContentType(ct)).toBe(excluded);
  });
});

describe("isFlushContentType", () => {
  it("matches the default streaming types by prefix", () => {
    expect(isFlushContentType("text/event-stream; charset=utf-8")).toBe(true);
    expect(isFlushContentType("application/grpc-web+proto")).toBe(true);
    expect(isFlushContentType("application/grpc")).toBe(false);
    expect(isFlushContentType("text/plain")).toBe(false);
    expect(isFlushContentType(null)).toBe(false);
  });

  it("uses the configured list", () => {
    expect(isFlushContentType("application/x-ndjson", ["Application/X-NDJSON"])).toBe(true);
    expect(isFlushContentType("text/event-stream", [])).toBe(false);
  });
});
