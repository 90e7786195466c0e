// Runs an in-memory body through a ResponseCompressor and collects the bytes
// that would go on the wire.

import { stream2uint8array } from "@adviser/cement/utils";
import { bodyFromChunks, bytesFromBody } from "./body/frames.js";
import type { CompressedResponse, ResponseCompressor } from "./compressor.js";

export interface EncodeBytesInput {
  readonly headers: Headers;
  readonly bytes: Uint8Array;
  /** Size of the body chunks the compressor sees. */
  readonly chunkSize: number;
}

export interface EncodedBytes {
  readonly response: CompressedResponse;
  readonly encoded: Uint8Array;
}

export function chunked(bytes: Uint8Array, size: number): Uint8Array[] {
  if (!Number.isSafeInteger(size) || size <= 0) throw new RangeError(`chunk size must be a positive integer: ${size}`);
  const chunks: Uint8Array[] = [];
  for (let o = 0; o < bytes.byteLength; o += size) chunks.push(bytes.subarray(o, o + size));
  return chunks;
}

export async function encodeBytes(
  compressor: ResponseCompressor,
  requestHeaders: Headers,
  input: EncodeBytesInput,
): Promise<EncodedBytes> {
  const response = await compressor.compress(requestHeaders, {
    status: 200,
    headers: input.headers,
    body: bodyFromChunks(chunked(input.bytes, input.chunkSize)),
  });
  const encoded = response.body ? await stream2uint8array(bytesFromBody(response.body)) : new Uint8Array(0);
  return { response, encoded };
}
