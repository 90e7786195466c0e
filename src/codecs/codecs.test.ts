import { describe, it, expect } from "vitest";
import { availableCodecs, createCodec, hasNativeZstd } from "./index.js";
import { StreamCodec } from "./stream-codec.js";
import type { CodecName } from "./types.js";
import { FRAME_INPUT_LIMIT, ZstdFrameCodec } from "./zstd-frames.js";
import { CodecError } from "../errors.js";
import { concatBytes } from "../body/bytes.js";
import { decodeAll, decodePartial, text, textChunks } from "./test-decode.js";

describe("availableCodecs", () => {
  it("lists every codec in preference order", () => {
    expect(availableCodecs()).toEqual(["zstd", "br", "gzip"]);
  });
});

for (const codec of ["gzip", "br", "zstd"] as const satisfies readonly CodecName[]) {
  describe(`codec: ${codec}`, () => {
    it("push + finish decodes to the input", async () => {
      const chunks = textChunks(5, 1000);
      const c = createCodec(codec);
      const out: Uint8Array[] = [];
      for (const chunk of chunks) out.push(...(await c.push(chunk)));
      out.push(...(await c.finish()));
      expect(decodeAll(codec, concatBytes(out))).toEqual(concatBytes(chunks));
    });

    it("compresses repetitive content", async () => {
      const input = text("abcdef".repeat(1000));
      const c = createCodec(codec);
      const out = [...(await c.push(input)), ...(await c.finish())];
      expect(concatBytes(out).byteLength).toBeLessThan(input.byteLength);
    });

    it("finish with no input yields a valid empty stream", async () => {
      const c = createCodec(codec);
      const out = await c.finish();
      expect(decodeAll(codec, concatBytes(out))).toEqual(new Uint8Array(0));
    });

    it("rejects use after finish", async () => {
      const c = createCodec(codec);
      await c.finish();
      await expect(c.push(text("late"))).rejects.toBeInstanceOf(CodecError);
    });

    it("release is idempotent and ends the instance", async () => {
      const c = createCodec(codec);
      c.release();
      c.release();
      await expect(c.flush()).rejects.toMatchObject({ name: "CodecError", codec, operation: "flush" });
    });

    it("flushed and finished output decodes to everything pushed", async () => {
      const c = createCodec(codec);
      const first = text("data: first event\n\n");
      const second = text("data: second event\n\n");
      const out = [...(await c.push(first)), ...(await c.flush())];
      expect(concatBytes(out).byteLength).toBeGreaterThan(0);
      out.push(...(await c.push(second)), ...(await c.flush()), ...(await c.finish()));
      expect(decodeAll(codec, concatBytes(out))).toEqual(concatBytes([first, second]));
    });
  });
}

describe("flush", () => {
  for (const codec of ["gzip", "br"] as const) {
    it(`${codec}: makes everything pushed so far decodable`, async () => {
      const c = createCodec(codec);
      const first = text("data: first event\n\n");
      const out = [...(await c.push(first)), ...(await c.flush())];
      expect(decodePartial(codec, concatBytes(out))).toEqual(first);

      const second = text("data: second event\n\n");
      out.push(...(await c.push(second)), ...(await c.flush()));
      expect(decodePartial(codec, concatBytes(out))).toEqual(concatBytes([first, second]));

      out.push(...(await c.finish()));
      expect(decodeAll(codec, concatBytes(out))).toEqual(concatBytes([first, second]));
    });
  }
});

describe("zstd", () => {
  it("uses node:zlib when the runtime has it and frames otherwise", () => {
    const c = createCodec("zstd");
    expect(c).toBeInstanceOf(hasNativeZstd() ? StreamCodec : ZstdFrameCodec);
    c.release();
  });
});

describe("ZstdFrameCodec", () => {
  it("closes a complete frame on every flush", async () => {
    const c = new ZstdFrameCodec(3);
    const first = text("data: first event\n\n");
    const second = text("data: second event\n\n");

    expect(await c.push(first)).toEqual([]);
    const firstFrame = await c.flush();
    expect(firstFrame).toHaveLength(1);
    expect(decodeAll("zstd", concatBytes(firstFrame))).toEqual(first);

    expect(await c.push(second)).toEqual([]);
    const secondFrame = await c.flush();
    expect(decodeAll("zstd", concatBytes(secondFrame))).toEqual(second);

    expect(await c.flush()).toEqual([]);
    expect(await c.finish()).toEqual([]);
    expect(decodeAll("zstd", concatBytes([...firstFrame, ...secondFrame]))).toEqual(concatBytes([first, second]));
  });

  it("closes a frame once held input reaches the limit", async () => {
    const c = new ZstdFrameCodec(3);
    const half = textChunks(2, FRAME_INPUT_LIMIT / 2);
    expect(await c.push(half[0])).toEqual([]);
    const frame = await c.push(half[1]);
    expect(frame).toHaveLength(1);
    const tail = await c.finish();
    expect(tail).toEqual([]);
    expect(decodeAll("zstd", concatBytes(frame))).toEqual(concatBytes(half));
  });

  it("ignores empty pushes", async () => {
    const c = new ZstdFrameCodec(3);
    expect(await c.push(new Uint8Array(0))).toEqual([]);
    expect(await c.flush()).toEqual([]);
    c.release();
  });
});
