// CompressionBody — per-response body state machine.
//
//   buffering ──▶ compressing ──▶ finished
//       │                            ▲
//       └──────▶ passthrough ────────┘        failed: from any live mode
//
// buffering    unknown length, Compress decision: hold chunks while the total
//              stays below minSize. The chunk that reaches minSize commits to
//              compressing (buffer + chunk go to the codec together); end of
//              body first commits to passthrough.
// compressing  every data frame goes through the codec; forceFlush flushes
//              the codec after each one and marks the point with a flush frame.
//              finish() runs at end of body or when trailers arrive.
// passthrough  frames forwarded as they are.
//
// step() is the single transition function: it reads at most one input frame
// and returns the frames it produced, [] when it needs more input, and
// undefined once finished. stream() drives it lazily from the consumer side.
// The codec is released on every exit: finish, failure, cancel.

import type { Logger } from "@adviser/cement";
import { createCodec } from "../codecs/index.js";
import type { CodecAdapter, CodecFactory, CodecName } from "../codecs/types.js";
import { compressionLogger } from "../logger.js";
import type { Decision } from "../negotiate.js";
import { FLUSH, dataFrame, trailersFrame, type BodyFrame, type HttpBody } from "../types.js";
import { concatBytes } from "./bytes.js";

export type CompressionMode = "buffering" | "compressing" | "passthrough" | "finished" | "failed";

/** What the body turned out to be once buffering (if any) is over. */
export type CommittedMode = "compressing" | "passthrough";

export interface CompressionBodyOptions {
  readonly minSize: number;
  readonly codecFactory?: CodecFactory;
  readonly logger?: Logger;
}

export class CompressionBody {
  readonly #reader: ReadableStreamDefaultReader<BodyFrame>;
  readonly #codecName?: CodecName;
  readonly #forceFlush: boolean;
  readonly #minSize: number;
  readonly #createCodec: CodecFactory;
  readonly #logger: Logger;

  #mode: CompressionMode;
  #committed?: CommittedMode;
  #buffer: Uint8Array[] = [];
  #buffered = 0;
  #codec?: CodecAdapter;
  #trailers?: Headers;
  #pending: BodyFrame[] = [];
  #sourceOpen = true;
  #failure?: unknown;

  constructor(source: HttpBody, decision: Decision, opts: CompressionBodyOptions) {
    this.#reader = source.getReader();
    this.#forceFlush = decision.forceFlush;
    this.#minSize = opts.minSize;
    this.#createCodec = opts.codecFactory ?? createCodec;
    this.#logger = opts.logger ?? compressionLogger();

    if (decision.action === "skip") {
      this.#mode = this.#committed = "passthrough";
    } else {
      this.#codecName = decision.codec;
      if (decision.contentLength === undefined && this.#minSize > 0) {
        this.#mode = "buffering";
      } else {
        this.#mode = this.#committed = "compressing";
      }
    }
  }

  get mode(): CompressionMode {
    return this.#mode;
  }

  /** Bytes currently held by the buffering phase; always below minSize. */
  get bufferedBytes(): number {
    return this.#buffered;
  }

  /**
   * Runs the buffering phase to its end and reports the outcome, so headers
   * can be finalised before the first byte goes out. Frames produced on the
   * way are kept for the next step(). A failure here is not thrown; it
   * surfaces from the body stream.
   */
  async commit(): Promise<CommittedMode> {
    try {
      while (this.#mode === "buffering") {
        const out = await this.step();
        if (out) this.#pending.push(...out);
      }
    } catch (e) {
      this.#logger.Debug().Err(e).Msg("body failed before commit");
    }
    return this.#committed ?? "passthrough";
  }

  async step(): Promise<BodyFrame[] | undefined> {
    if (this.#pending.length > 0) {
      const out = this.#pending;
      this.#pending = [];
      return out;
    }
    if (this.#mode === "failed") throw this.#failure;
    if (this.#mode === "finished") return undefined;
    try {
      return await this.#advance();
    } catch (e) {
      await this.#fail(e);
      throw e;
    }
  }

  /** Consumer-driven view of the body; reads upstream only when asked. */
  stream(): HttpBody {
    return new ReadableStream<BodyFrame>(
      {
        pull: async (ctrl): Promise<void> => {
          for (;;) {
            const out = await this.step();
            if (out === undefined) {
              ctrl.close();
              return;
            }
            if (out.length > 0) {
              for (const frame of out) ctrl.enqueue(frame);
              return;
            }
          }
        },
        cancel: (reason: unknown): Promise<void> => this.cancel(reason),
      },
      { highWaterMark: 0 },
    );
  }

  /** Consumer went away: drop codec, buffer and source; emit nothing further. */
  async cancel(reason?: unknown): Promise<void> {
    if (this.#mode === "finished" || this.#mode === "failed") return;
    this.#mode = "finished";
    this.#releaseState();
    await this.#cancelSource(reason);
  }

  // ── transitions ─────────────────────────────────────────────────────────────

  async #advance(): Promise<BodyFrame[]> {
    const frame = await this.#read();
    if (frame === undefined) return this.#end();
    switch (frame.type) {
      case "data":
        return this.#onData(frame.data);
      case "flush":
        return this.#onFlush();
      case "trailers":
        this.#trailers = frame.trailers;
        // Trailers close the body; anything after them is not part of it.
        await this.#cancelSource();
        return this.#end();
    }
  }

  async #onData(chunk: Uint8Array): Promise<BodyFrame[]> {
    switch (this.#mode) {
      case "buffering": {
        if (this.#buffered + chunk.byteLength < this.#minSize) {
          this.#buffer.push(chunk);
          this.#buffered += chunk.byteLength;
          return [];
        }
        const held = concatBytes([...this.#buffer, chunk]);
        this.#logger
          .Debug()
          .Str("codec", this.#codecName)
          .Uint64("bytes", held.byteLength)
          .Msg("min size reached, compressing");
        this.#dropBuffer();
        this.#mode = this.#committed = "compressing";
        return this.#compress(held);
      }
      case "compressing":
        return this.#compress(chunk);
      default:
        return chunk.byteLength > 0 && this.#forceFlush ? [dataFrame(chunk), FLUSH] : [dataFrame(chunk)];
    }
  }

  async #onFlush(): Promise<BodyFrame[]> {
    switch (this.#mode) {
      case "buffering":
        return [];
      case "compressing":
        return [...this.#data(await this.#codecInstance().flush()), FLUSH];
      default:
        return [FLUSH];
    }
  }

  async #compress(chunk: Uint8Array): Promise<BodyFrame[]> {
    if (chunk.byteLength === 0) return [];
    const codec = this.#codecInstance();
    const out = await codec.push(chunk);
    if (!this.#forceFlush) return this.#data(out);
    out.push(...(await codec.flush()));
    const frames = this.#data(out);
    return frames.length > 0 ? [...frames, FLUSH] : frames;
  }

  async #end(): Promise<BodyFrame[]> {
    const out: BodyFrame[] = [];
    if (this.#mode === "buffering") {
      this.#logger.Debug().Uint64("bytes", this.#buffered).Msg("body ended below min size, passing through");
      this.#mode = this.#committed = "passthrough";
      if (this.#buffered > 0) {
        out.push(dataFrame(concatBytes(this.#buffer)));
        if (this.#forceFlush) out.push(FLUSH);
      }
      this.#dropBuffer();
    } else if (this.#mode === "compressing") {
      out.push(...this.#data(await this.#codecInstance().finish()));
    }
    if (this.#trailers) out.push(trailersFrame(this.#trailers));
    this.#trailers = undefined;
    this.#mode = "finished";
    this.#releaseState();
    return out;
  }

  // ── resources ───────────────────────────────────────────────────────────────

  async #read(): Promise<BodyFrame | undefined> {
    if (!this.#sourceOpen) return undefined;
    try {
      const { done, value } = await this.#reader.read();
      if (done) this.#sourceOpen = false;
      return value;
    } catch (e) {
      this.#sourceOpen = false;
      throw e;
    }
  }

  #codecInstance(): CodecAdapter {
    if (this.#codec) return this.#codec;
    if (!this.#codecName) throw new Error(`no codec for a ${this.#mode} body`);
    this.#codec = this.#createCodec(this.#codecName);
    return this.#codec;
  }

  #data(chunks: Uint8Array[]): BodyFrame[] {
    const bytes = concatBytes(chunks.filter((c) => c.byteLength > 0));
    return bytes.byteLength > 0 ? [dataFrame(bytes)] : [];
  }

  async #fail(e: unknown): Promise<void> {
    if (this.#mode === "failed") return;
    this.#mode = "failed";
    this.#failure = e;
    this.#logger.Error().Err(e).Str("codec", this.#codecName).Msg("body transform failed");
    this.#releaseState();
    await this.#cancelSource(e);
  }

  async #cancelSource(reason?: unknown): Promise<void> {
    if (!this.#sourceOpen) return;
    this.#sourceOpen = false;
    try {
      await this.#reader.cancel(reason);
    } catch (e) {
      this.#logger.Debug().Err(e).Msg("source cancel failed");
    }
  }

  #dropBuffer(): void {
    this.#buffer = [];
    this.#buffered = 0;
  }

  #releaseState(): void {
    this.#codec?.release();
    this.#codec = undefined;
    this.#pending = [];
    this.#dropBuffer();
  }
}
