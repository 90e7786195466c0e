// ZstdFrameCodec — zstd for runtimes whose node:zlib has no zstd encoder.
//
// Input is held until a flush, which closes it as one complete zstd frame.
// A stream of concatenated frames decodes to the concatenation of their
// contents, so each flush point is decodable on its own. Held input is also
// closed into a frame once it reaches FRAME_INPUT_LIMIT.

import zstdCodec, { type ZstdSimple } from "zstd-codec";
import { concatBytes } from "../body/bytes.js";
import { CodecError, type CodecOperation } from "../errors.js";
import type { CodecAdapter } from "./types.js";

export const FRAME_INPUT_LIMIT = 128 * 1024;

let encoder: Promise<ZstdSimple> | undefined;

function zstdSimple(): Promise<ZstdSimple> {
  encoder ??= new Promise<ZstdSimple>((resolve) => {
    zstdCodec.ZstdCodec.run((zstd) => resolve(new zstd.Simple()));
  });
  return encoder;
}

export class ZstdFrameCodec implements CodecAdapter {
  readonly name = "zstd";
  readonly #level: number;
  #held: Uint8Array[] = [];
  #heldBytes = 0;
  #frames = 0;
  #finished = false;
  #released = false;

  constructor(level: number) {
    this.#level = level;
  }

  async push(chunk: Uint8Array): Promise<Uint8Array[]> {
    this.#assertOpen("push");
    if (chunk.byteLength === 0) return [];
    this.#held.push(chunk);
    this.#heldBytes += chunk.byteLength;
    return this.#heldBytes >= FRAME_INPUT_LIMIT ? [await this.#frame("push")] : [];
  }

  async flush(): Promise<Uint8Array[]> {
    this.#assertOpen("flush");
    return this.#heldBytes > 0 ? [await this.#frame("flush")] : [];
  }

  /** An empty body still gets one (empty) frame. */
  async finish(): Promise<Uint8Array[]> {
    this.#assertOpen("finish");
    const out = this.#heldBytes > 0 || this.#frames === 0 ? [await this.#frame("finish")] : [];
    this.#finished = true;
    this.release();
    return out;
  }

  release(): void {
    if (this.#released) return;
    this.#released = true;
    this.#held = [];
    this.#heldBytes = 0;
  }

  #assertOpen(op: CodecOperation): void {
    if (this.#released || this.#finished) {
      throw new CodecError(this.name, op, new Error("codec already released"));
    }
  }

  async #frame(op: CodecOperation): Promise<Uint8Array> {
    const zstd = await zstdSimple();
    const input = concatBytes(this.#held);
    this.#held = [];
    this.#heldBytes = 0;
    let frame: Uint8Array | null;
    try {
      frame = zstd.compress(input, this.#level);
    } catch (e) {
      throw new CodecError(this.name, op, e);
    }
    if (!frame) throw new CodecError(this.name, op, new Error("zstd compression returned no frame"));
    this.#frames++;
    // The binding may hand out a view of its own heap.
    return frame.slice();
  }
}
