// Encoding negotiation — one Decision per response, before any body byte is read.
//
// Order matters: the checks that never look at Accept-Encoding come first, so a
// response skipped for its own headers leaves Vary untouched. Only once a
// codec could have been chosen does Vary gain Accept-Encoding, compressed or not.

import { parseAcceptEncoding, rankCodecs } from "./accept-encoding.js";
import type { CodecName } from "./codecs/types.js";
import type { CompressionConfig, FlushHeader } from "./config.js";
import { isExcludedContentType, isFlushContentType } from "./content-type.js";

export type SkipReason =
  | "content-encoded"
  | "content-range"
  | "no-transform"
  | "no-body"
  | "excluded-type"
  | "not-acceptable"
  | "below-min-size";

export interface SkipDecision {
  readonly action: "skip";
  readonly reason: SkipReason;
  readonly forceFlush: boolean;
  /** Negotiation saw an acceptable codec; caches must vary on Accept-Encoding. */
  readonly vary: boolean;
}

export interface CompressDecision {
  readonly action: "compress";
  readonly codec: CodecName;
  readonly forceFlush: boolean;
  /** Declared Content-Length, absent when the body length is unknown. */
  readonly contentLength?: number;
}

export type Decision = SkipDecision | CompressDecision;

export interface NegotiationInput {
  readonly requestHeaders: Headers;
  readonly responseHeaders: Headers;
  /** False for responses without a body (e.g. 204, HEAD). */
  readonly hasBody: boolean;
}

function matchesFlushHeader(headers: Headers, rules: readonly FlushHeader[]): boolean {
  return rules.some((rule) => headers.get(rule.name)?.trim().toLowerCase() === rule.value.toLowerCase());
}

export function shouldForceFlush(input: NegotiationInput, config: CompressionConfig): boolean {
  return (
    matchesFlushHeader(input.requestHeaders, config.flushHeaders) ||
    matchesFlushHeader(input.responseHeaders, config.flushHeaders) ||
    isFlushContentType(input.responseHeaders.get("content-type"), config.flushContentTypes)
  );
}

function hasNoTransform(headers: Headers): boolean {
  const cc = headers.get("cache-control");
  if (!cc) return false;
  return cc.split(",").some((d) => d.trim().toLowerCase() === "no-transform");
}

function contentLength(headers: Headers): number | undefined {
  const raw = headers.get("content-length")?.trim();
  if (!raw || !/^\d+$/.test(raw)) return undefined;
  const n = Number(raw);
  return Number.isSafeInteger(n) ? n : undefined;
}

export function negotiate(input: NegotiationInput, config: CompressionConfig): Decision {
  const { requestHeaders, responseHeaders } = input;
  const forceFlush = shouldForceFlush(input, config);
  const skip = (reason: SkipReason, vary = false): SkipDecision => ({ action: "skip", reason, forceFlush, vary });

  if (responseHeaders.has("content-encoding")) return skip("content-encoded");
  if (responseHeaders.has("content-range")) return skip("content-range");
  if (hasNoTransform(responseHeaders)) return skip("no-transform");
  if (!input.hasBody) return skip("no-body");
  if (isExcludedContentType(responseHeaders.get("content-type"))) return skip("excluded-type");

  const acceptEncoding = requestHeaders.get("accept-encoding");
  const [codec] = acceptEncoding === null ? [] : rankCodecs(parseAcceptEncoding(acceptEncoding), config.codecs);
  if (!codec) return skip("not-acceptable");

  const length = contentLength(responseHeaders);
  if (length !== undefined && length < config.minSize) return skip("below-min-size", true);

  return length === undefined
    ? { action: "compress", codec, forceFlush }
    : { action: "compress", codec, forceFlush, contentLength: length };
}
