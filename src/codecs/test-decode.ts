// Test support: decoders for checking what the codecs produce.
//
// decodeAll     — whole stream, must be complete (footer/checksum included);
//                 zstd goes through fzstd, which reads concatenated frames
// decodePartial — stream cut after a flush; gzip and br only

import * as zlib from "node:zlib";
import { decompress as zstdDecompress } from "fzstd";
import type { CodecName } from "./types.js";

function plain(buf: Buffer): Uint8Array {
  return new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength).slice();
}

export function decodeAll(codec: CodecName, bytes: Uint8Array): Uint8Array {
  switch (codec) {
    case "gzip":
      return plain(zlib.gunzipSync(bytes));
    case "br":
      return plain(zlib.brotliDecompressSync(bytes));
    case "zstd":
      return zstdDecompress(bytes);
  }
}

export function decodePartial(codec: "gzip" | "br", bytes: Uint8Array): Uint8Array {
  return codec === "gzip"
    ? plain(zlib.gunzipSync(bytes, { finishFlush: zlib.constants.Z_SYNC_FLUSH }))
    : plain(zlib.brotliDecompressSync(bytes, { finishFlush: zlib.constants.BROTLI_OPERATION_FLUSH }));
}

export function text(s: string): Uint8Array {
  return new TextEncoder().encode(s);
}

/** `count` chunks of `size` bytes of repetitive ASCII, distinct per chunk. */
export function textChunks(count: number, size: number): Uint8Array[] {
  const out: Uint8Array[] = [];
  for (let i = 0; i < count; i++) {
    const line = `chunk ${i} lorem ipsum dolor sit amet `;
    out.push(text(line.repeat(Math.ceil(size / line.length)).slice(0, size)));
  }
  return out;
}
