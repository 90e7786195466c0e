import type { CodecName } from "./codecs/types.js";

export type CodecOperation = "init" | "push" | "flush" | "finish";

/**
 * A codec failed to initialise or to process input. Fatal for the response it
 * belongs to: the body stream errors with this and no further bytes follow.
 */
export class CodecError extends Error {
  override readonly name = "CodecError";
  readonly codec: CodecName;
  readonly operation: CodecOperation;

  constructor(codec: CodecName, operation: CodecOperation, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`${codec} ${operation} failed: ${detail}`, { cause });
    this.codec = codec;
    this.operation = operation;
  }
}

/** Compression options did not validate. */
export class ConfigError extends Error {
  override readonly name = "ConfigError";
}

export function isCodecError(e: unknown): e is CodecError {
  return e instanceof CodecError;
}
