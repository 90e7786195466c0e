import { describe, it, expect } from "vitest";
import { decodeAll, text, textChunks } from "./codecs/test-decode.js";
import { ResponseCompressor } from "./compressor.js";
import { chunked, encodeBytes } from "./encode-bytes.js";

describe("encodeBytes", () => {
  const compressor = new ResponseCompressor({ codecs: ["gzip"] });
  const [page] = textChunks(1, 2000);

  it("returns the encoded body with the final headers", async () => {
    const { response, encoded } = await encodeBytes(compressor, new Headers({ "accept-encoding": "gzip" }), {
      headers: new Headers({ "content-type": "text/plain", "content-length": "2000" }),
      bytes: page,
      chunkSize: 256,
    });
    expect(response.decision).toEqual({ action: "compress", codec: "gzip", forceFlush: false, contentLength: 2000 });
    expect(response.headers.get("content-encoding")).toBe("gzip");
    expect(decodeAll("gzip", encoded)).toEqual(page);
  });

  it("returns the input unchanged when nothing is accepted", async () => {
    const { response, encoded } = await encodeBytes(compressor, new Headers(), {
      headers: new Headers({ "content-type": "text/plain" }),
      bytes: page,
      chunkSize: 300,
    });
    expect(response.decision).toMatchObject({ action: "skip", reason: "not-acceptable" });
    expect(encoded).toEqual(page);
  });
});

describe("chunked", () => {
  it("splits into fixed-size chunks with a short tail", () => {
    expect(chunked(text("abcdefg"), 3)).toEqual([text("abc"), text("def"), text("g")]);
    expect(chunked(new Uint8Array(0), 3)).toEqual([]);
  });

  it("rejects a non-positive size", () => {
    expect(() => chunked(text("abc"), 0)).toThrow(RangeError);
  });
});
