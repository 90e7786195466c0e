// zstd rides on node:zlib where the runtime ships it (Node.js >= 22.15) and
// falls back to frame-per-flush encoding through zstd-codec elsewhere.

import * as zlib from "node:zlib";
import { CodecError } from "../errors.js";
import { StreamCodec, type ZlibEncoder } from "./stream-codec.js";
import { ZstdFrameCodec } from "./zstd-frames.js";
import type { CodecAdapter } from "./types.js";

export const ZSTD_DEFAULT_LEVEL = 3;

type ZstdFactory = (options?: { params?: Record<number, number> }) => ZlibEncoder;

function isZstdFactory(x: unknown): x is ZstdFactory {
  return typeof x === "function";
}

function zstdFactory(): ZstdFactory | undefined {
  const factory: unknown = Reflect.get(zlib, "createZstdCompress");
  return isZstdFactory(factory) ? factory : undefined;
}

/** True when node:zlib itself can stream zstd. */
export function hasNativeZstd(): boolean {
  return zstdFactory() !== undefined;
}

export function createZstdCodec(level: number = ZSTD_DEFAULT_LEVEL): CodecAdapter {
  const factory = zstdFactory();
  if (!factory) return new ZstdFrameCodec(level);
  const levelParam: unknown = Reflect.get(zlib.constants, "ZSTD_c_compressionLevel");
  try {
    const encoder = typeof levelParam === "number" ? factory({ params: { [levelParam]: level } }) : factory();
    // The encoder's default flush kind for zstd is ZSTD_e_flush.
    return new StreamCodec("zstd", encoder);
  } catch (e) {
    throw new CodecError("zstd", "init", e);
  }
}
