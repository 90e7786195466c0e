// StreamCodec — adapts a node:zlib Transform to the CodecAdapter contract.
//
// The encoder runs in flowing mode; every "data" event lands in #out. zlib
// pushes its output before completing the write callback of the chunk that
// produced it, so once a write (or flush) callback fires, #out holds exactly
// what that call produced. finish() ends the writable side and waits for "end",
// which fires only after the last output chunk was delivered.
//
// Only one operation is in flight at a time; the owning CompressionBody awaits
// each call before issuing the next.

import type { Transform } from "node:stream";
import type { Zlib } from "node:zlib";
import { CodecError, type CodecOperation } from "../errors.js";
import type { CodecAdapter, CodecName } from "./types.js";

export type ZlibEncoder = Transform & Zlib;

export class StreamCodec implements CodecAdapter {
  readonly name: CodecName;
  readonly #encoder: ZlibEncoder;
  readonly #flushKind?: number;
  #out: Uint8Array[] = [];
  #failure?: unknown;
  #finished = false;
  #released = false;

  /**
   * @param flushKind zlib flush flag handed to `encoder.flush()`; the encoder's
   *   own default applies when omitted.
   */
  constructor(name: CodecName, encoder: ZlibEncoder, flushKind?: number) {
    this.name = name;
    this.#encoder = encoder;
    this.#flushKind = flushKind;
    encoder.on("data", (chunk: Buffer) => {
      this.#out.push(new Uint8Array(chunk.buffer, chunk.byteOffset, chunk.byteLength));
    });
    // Kept for the lifetime of the encoder so a late error after release()
    // never becomes an unhandled "error" event.
    encoder.on("error", (err: Error) => {
      this.#failure ??= err;
    });
  }

  async push(chunk: Uint8Array): Promise<Uint8Array[]> {
    if (chunk.byteLength === 0) return [];
    await this.#run("push", (done) => {
      this.#encoder.write(chunk, done);
    });
    return this.#take();
  }

  async flush(): Promise<Uint8Array[]> {
    await this.#run("flush", (done) => {
      const cb = (): void => done();
      if (this.#flushKind === undefined) this.#encoder.flush(cb);
      else this.#encoder.flush(this.#flushKind, cb);
    });
    return this.#take();
  }

  async finish(): Promise<Uint8Array[]> {
    await this.#run("finish", (done) => {
      this.#encoder.once("end", () => done());
      this.#encoder.end();
    });
    this.#finished = true;
    const out = this.#take();
    this.release();
    return out;
  }

  release(): void {
    if (this.#released) return;
    this.#released = true;
    this.#out = [];
    if (!this.#encoder.destroyed) this.#encoder.destroy();
  }

  #take(): Uint8Array[] {
    // read() re-emits "data" for anything zlib left in the readable buffer.
    while (this.#encoder.readableLength > 0 && this.#encoder.read() !== null) {
      /* drained into #out */
    }
    const out = this.#out;
    this.#out = [];
    return out;
  }

  #run(op: CodecOperation, start: (done: (err?: Error | null) => void) => void): Promise<void> {
    if (this.#released || this.#finished) {
      return Promise.reject(new CodecError(this.name, op, new Error("codec already released")));
    }
    if (this.#failure !== undefined) {
      return Promise.reject(new CodecError(this.name, op, this.#failure));
    }
    return new Promise<void>((resolve, reject) => {
      let settled = false;
      const onError = (err: Error): void => settle(err);
      const settle = (err?: Error | null): void => {
        if (settled) return;
        settled = true;
        this.#encoder.off("error", onError);
        const failure = err ?? this.#failure;
        if (failure !== undefined && failure !== null) reject(new CodecError(this.name, op, failure));
        else resolve();
      };
      this.#encoder.once("error", onError);
      start(settle);
    });
  }
}
