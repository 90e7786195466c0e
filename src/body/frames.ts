// Conversions between byte streams and framed bodies.

import { dataFrame, trailersFrame, type BodyFrame, type HttpBody } from "../types.js";
import { concatBytes } from "./bytes.js";

/** Frames a byte stream as data frames, followed by `trailers` when given. */
export function bodyFromStream(stream: ReadableStream<Uint8Array>, trailers?: Headers): HttpBody {
  return stream.pipeThrough(
    new TransformStream<Uint8Array, BodyFrame>({
      transform(chunk, ctrl): void {
        ctrl.enqueue(dataFrame(chunk));
      },
      flush(ctrl): void {
        if (trailers) ctrl.enqueue(trailersFrame(trailers));
      },
    }),
  );
}

/** A body of the given chunks; each chunk becomes one data frame. */
export function bodyFromChunks(chunks: readonly Uint8Array[], trailers?: Headers): HttpBody {
  let i = 0;
  let trailersSent = false;
  return new ReadableStream<BodyFrame>(
    {
      pull(ctrl): void {
        if (i < chunks.length) {
          ctrl.enqueue(dataFrame(chunks[i++]));
          return;
        }
        if (trailers && !trailersSent) {
          trailersSent = true;
          ctrl.enqueue(trailersFrame(trailers));
          return;
        }
        ctrl.close();
      },
    },
    { highWaterMark: 0 },
  );
}

/**
 * Unframes a body into plain bytes. Flush frames need no action on a byte
 * stream, trailers are handed to `onTrailers` when present.
 */
export function bytesFromBody(body: HttpBody, onTrailers?: (trailers: Headers) => void): ReadableStream<Uint8Array> {
  return body.pipeThrough(
    new TransformStream<BodyFrame, Uint8Array>({
      transform(frame, ctrl): void {
        switch (frame.type) {
          case "data":
            ctrl.enqueue(frame.data);
            break;
          case "trailers":
            onTrailers?.(frame.trailers);
            break;
          case "flush":
            break;
        }
      },
    }),
  );
}

export interface CollectedBody {
  readonly frames: BodyFrame[];
  readonly data: Uint8Array;
  readonly trailers?: Headers;
}

/** Reads a body to its end. */
export async function collectBody(body: HttpBody): Promise<CollectedBody> {
  const frames: BodyFrame[] = [];
  const reader = body.getReader();
  while (true) {
    const { done, value } = await reader.read();
    if (done) break;
    frames.push(value);
  }
  const data = concatBytes(frames.flatMap((f) => (f.type === "data" ? [f.data] : [])));
  const trailers = frames.find((f) => f.type === "trailers");
  return trailers?.type === "trailers" ? { frames, data, trailers: trailers.trailers } : { frames, data };
}
