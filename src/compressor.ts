// ResponseCompressor — negotiate, wrap the body, then finalise headers.
//
// Headers are written only after the body has left its buffering phase: an
// unknown-length body that ends below minSize goes out with its original
// headers (plus Vary), never with a Content-Encoding it does not have.

import type { Logger } from "@adviser/cement";
import { CompressionBody, type CommittedMode } from "./body/compression-body.js";
import { createCodec } from "./codecs/index.js";
import type { CodecFactory } from "./codecs/types.js";
import { resolveConfig, type CompressionConfig, type CompressorOptions } from "./config.js";
import { rewriteHeaders } from "./headers.js";
import { compressionLogger } from "./logger.js";
import { negotiate, type Decision } from "./negotiate.js";
import type { HttpResponse } from "./types.js";

export interface CompressedResponse extends HttpResponse {
  /** The final decision the headers were written for. */
  readonly decision: Decision;
}

/** The decision after buffering settled; only a Compress decision can change. */
export function settleDecision(decision: Decision, committed: CommittedMode): Decision {
  if (decision.action === "skip" || committed === "compressing") return decision;
  return { action: "skip", reason: "below-min-size", forceFlush: decision.forceFlush, vary: true };
}

export class ResponseCompressor {
  readonly config: CompressionConfig;
  readonly logger: Logger;
  readonly #codecFactory: CodecFactory;

  constructor(opts: CompressorOptions & { codecFactory?: CodecFactory } = {}) {
    const { logger, codecFactory, ...options } = opts;
    this.config = resolveConfig(options);
    this.logger = compressionLogger(logger);
    this.#codecFactory = codecFactory ?? createCodec;
  }

  negotiate(requestHeaders: Headers, response: HttpResponse): Decision {
    return negotiate(
      { requestHeaders, responseHeaders: response.headers, hasBody: response.body !== null },
      this.config,
    );
  }

  /**
   * Compresses `response` for a request carrying `requestHeaders`. Mutates
   * `response.headers` and returns a response whose body is the transformed
   * stream; the original body must not be read by anyone else.
   */
  async compress(requestHeaders: Headers, response: HttpResponse): Promise<CompressedResponse> {
    const initial = this.negotiate(requestHeaders, response);
    this.logger
      .Debug()
      .Str("action", initial.action)
      .Str("codec", initial.action === "compress" ? initial.codec : undefined)
      .Str("reason", initial.action === "skip" ? initial.reason : undefined)
      .Bool("forceFlush", initial.forceFlush)
      .Msg("negotiated");

    if (response.body === null) {
      return { ...response, headers: rewriteHeaders(response.headers, initial), decision: initial };
    }

    const body = new CompressionBody(response.body, initial, {
      minSize: this.config.minSize,
      codecFactory: this.#codecFactory,
      logger: this.logger,
    });
    const decision = settleDecision(initial, await body.commit());
    return {
      ...response,
      headers: rewriteHeaders(response.headers, decision),
      body: body.stream(),
      decision,
    };
  }
}
