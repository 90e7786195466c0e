// Fetch-style hosting: (Request) => Promise<Response>.
//
// A Response body is a plain byte stream, so flush points need no signal (each
// chunk is handed to the transport as it is produced) and trailers have no
// place to go: they are dropped with a warning.

import { bodyFromStream, bytesFromBody } from "../body/frames.js";
import { ResponseCompressor } from "../compressor.js";
import type { CompressorOptions } from "../config.js";

export type FetchHandler = (request: Request) => Promise<Response>;

/**
 * Wraps a fetch handler so its responses are compressed when the request
 * allows it.
 *
 * @example
 * ```ts
 * const handler = withCompression(async () => new Response(largeText, { headers: { "content-type": "text/plain" } }));
 * ```
 */
export function withCompression(handler: FetchHandler, opts?: CompressorOptions): FetchHandler {
  const compressor = new ResponseCompressor(opts);
  return async (request: Request): Promise<Response> => {
    const res = await handler(request);
    const out = await compressor.compress(request.headers, {
      status: res.status,
      statusText: res.statusText,
      headers: new Headers(res.headers),
      body: res.body ? bodyFromStream(res.body) : null,
    });
    const body = out.body
      ? bytesFromBody(out.body, (trailers) => {
          compressor.logger
            .Warn()
            .Str("trailers", [...trailers.keys()].join(","))
            .Msg("fetch responses cannot carry trailers, dropped");
        })
      : null;
    return new Response(body, { status: out.status, statusText: out.statusText, headers: out.headers });
  };
}
