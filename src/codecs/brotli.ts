import { constants, createBrotliCompress } from "node:zlib";
import { CodecError } from "../errors.js";
import { StreamCodec } from "./stream-codec.js";

// Quality 4 keeps brotli fast enough for per-request streaming; the default
// of 11 is meant for static, precompressed assets.
export const BROTLI_STREAMING_QUALITY = 4;

export function createBrotliCodec(quality: number = BROTLI_STREAMING_QUALITY): StreamCodec {
  try {
    const encoder = createBrotliCompress({
      params: {
        [constants.BROTLI_PARAM_QUALITY]: quality,
        [constants.BROTLI_PARAM_MODE]: constants.BROTLI_MODE_TEXT,
      },
    });
    return new StreamCodec("br", encoder, constants.BROTLI_OPERATION_FLUSH);
  } catch (e) {
    throw new CodecError("br", "init", e);
  }
}
