// Compression options — validated once, when a ResponseCompressor is built.

import { type } from "arktype";
import type { Logger } from "@adviser/cement";
import { availableCodecs } from "./codecs/index.js";
import type { CodecName } from "./codecs/types.js";
import { DEFAULT_FLUSH_CONTENT_TYPES } from "./content-type.js";
import { ConfigError } from "./errors.js";

/** Roughly one MTU; smaller bodies gain nothing from compression. */
export const DEFAULT_MIN_SIZE = 860;

export const FlushHeader = type({
  name: "string > 0",
  value: "string",
});
export type FlushHeader = typeof FlushHeader.infer;

export const CompressionOptions = type({
  "minSize?": "number >= 0",
  "codecs?": '("zstd" | "br" | "gzip")[]',
  "flushContentTypes?": "string[]",
  "flushHeaders?": FlushHeader.array(),
});
export type CompressionOptions = typeof CompressionOptions.infer;

export const DEFAULT_FLUSH_HEADERS: readonly FlushHeader[] = [{ name: "x-accel-buffering", value: "no" }];

export interface CompressionConfig {
  readonly minSize: number;
  /** Enabled codecs this runtime can produce, preference order. */
  readonly codecs: readonly CodecName[];
  readonly flushContentTypes: readonly string[];
  readonly flushHeaders: readonly FlushHeader[];
}

export function isCompressionOptions(x: unknown): x is CompressionOptions {
  return !(CompressionOptions(x) instanceof type.errors);
}

export function resolveConfig(input: unknown = {}): CompressionConfig {
  const opts = CompressionOptions(input);
  if (opts instanceof type.errors) {
    throw new ConfigError(`invalid compression options: ${opts.summary}`);
  }
  const minSize = opts.minSize ?? DEFAULT_MIN_SIZE;
  if (!Number.isSafeInteger(minSize)) {
    throw new ConfigError(`invalid compression options: minSize must be an integer (was ${minSize})`);
  }
  const enabled = opts.codecs ?? availableCodecs();
  return {
    minSize,
    codecs: availableCodecs().filter((c) => enabled.includes(c)),
    flushContentTypes: opts.flushContentTypes ?? DEFAULT_FLUSH_CONTENT_TYPES,
    flushHeaders: opts.flushHeaders ?? DEFAULT_FLUSH_HEADERS,
  };
}

/** Options accepted by ResponseCompressor and the hosting adapters. */
export type CompressorOptions = CompressionOptions & { logger?: Logger };
