// Content-Type rules. All predicates take the raw header value (or null) and
// look only at the media type, so parameters such as charset never matter.

export function mediaType(contentType: string | null): string {
  if (!contentType) return "";
  return contentType.split(";")[0].trim().toLowerCase();
}

/**
 * Types that never benefit from compression: raster images are already
 * compressed (SVG is text), and plain gRPC carries its own message
 * compression (gRPC-Web does not).
 */
export function isExcludedContentType(contentType: string | null): boolean {
  const mt = mediaType(contentType);
  if (mt.startsWith("image/")) return mt !== "image/svg+xml";
  if (mt.startsWith("application/grpc")) return !mt.startsWith("application/grpc-web");
  return false;
}

export const DEFAULT_FLUSH_CONTENT_TYPES: readonly string[] = ["text/event-stream", "application/grpc-web"];

/** True when the media type starts with one of `flushTypes` (e.g. grpc-web+proto). */
export function isFlushContentType(
  contentType: string | null,
  flushTypes: readonly string[] = DEFAULT_FLUSH_CONTENT_TYPES,
): boolean {
  const mt = mediaType(contentType);
  if (!mt) return false;
  return flushTypes.some((t) => mt.startsWith(t.toLowerCase()));
}
