// Body frames — the unit a transformed response body is made of.
//
//   data      — a chunk of body bytes (original or compressed)
//   trailers  — trailer fields; at most one, always after the last data frame
//   flush     — asks the transport to deliver everything written so far
//
// A body is a single-reader ReadableStream<BodyFrame>. Hosting adapters convert
// it to whatever the transport speaks (see ./adapters/).

export interface DataFrame {
  readonly type: "data";
  readonly data: Uint8Array;
}

export interface TrailersFrame {
  readonly type: "trailers";
  readonly trailers: Headers;
}

export interface FlushFrame {
  readonly type: "flush";
}

export type BodyFrame = DataFrame | TrailersFrame | FlushFrame;

export type HttpBody = ReadableStream<BodyFrame>;

/** A response as seen by the compressor: status line, mutable headers, framed body. */
export interface HttpResponse {
  status: number;
  statusText?: string;
  headers: Headers;
  body: HttpBody | null;
}

export function dataFrame(data: Uint8Array): DataFrame {
  return { type: "data", data };
}

export function trailersFrame(trailers: Headers): TrailersFrame {
  return { type: "trailers", trailers };
}

export const FLUSH: FlushFrame = { type: "flush" };
