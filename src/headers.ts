import type { Decision } from "./negotiate.js";

/**
 * Adds `token` to Vary unless it (or `*`) is already listed. Existing Vary
 * values are merged into one comma-separated field.
 */
export function appendVary(headers: Headers, token: string): void {
  const current = headers.get("vary");
  if (current === null) {
    headers.set("vary", token);
    return;
  }
  const tokens = current
    .split(",")
    .map((t) => t.trim())
    .filter((t) => t.length > 0);
  const wanted = token.toLowerCase();
  if (tokens.some((t) => t === "*" || t.toLowerCase() === wanted)) return;
  headers.set("vary", [...tokens, token].join(", "));
}

/** Applies the header changes a final Decision implies, in place. */
export function rewriteHeaders(headers: Headers, decision: Decision): Headers {
  if (decision.action === "compress") {
    headers.set("content-encoding", decision.codec);
    // The compressed size is unknown until the stream ends, and byte ranges
    // of the original no longer address the encoded body.
    headers.delete("content-length");
    headers.delete("accept-ranges");
    appendVary(headers, "Accept-Encoding");
  } else if (decision.vary) {
    appendVary(headers, "Accept-Encoding");
  }
  return headers;
}
