import { createBrotliCodec } from "./brotli.js";
import { createGzipCodec } from "./gzip.js";
import { createZstdCodec } from "./zstd.js";
import { CODEC_NAMES, type CodecAdapter, type CodecName } from "./types.js";

export { CODEC_NAMES, isCodecName } from "./types.js";
export type { CodecAdapter, CodecFactory, CodecName } from "./types.js";
export { StreamCodec } from "./stream-codec.js";
export { hasNativeZstd } from "./zstd.js";
export { ZstdFrameCodec, FRAME_INPUT_LIMIT } from "./zstd-frames.js";

/** Creates a fresh encoder; the caller owns it and must finish() or release() it. */
export function createCodec(name: CodecName): CodecAdapter {
  switch (name) {
    case "zstd":
      return createZstdCodec();
    case "br":
      return createBrotliCodec();
    case "gzip":
      return createGzipCodec();
  }
}

/** Codecs this runtime can produce, in server preference order. */
export function availableCodecs(): CodecName[] {
  return [...CODEC_NAMES];
}
