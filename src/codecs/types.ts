// Codec contract — one shape for every compression algorithm.
//
//   push(chunk) → zero or more compressed chunks (codecs buffer internally,
//                 so one input rarely maps to one output)
//   flush()     → everything the codec can emit now, stream stays open
//   finish()    → final bytes including footer/checksum; instance is spent
//   release()   → drop native state; idempotent, safe on every exit path

export const CODEC_NAMES = ["zstd", "br", "gzip"] as const;

/** Content-Encoding token of a supported codec, in server preference order. */
export type CodecName = (typeof CODEC_NAMES)[number];

export interface CodecAdapter {
  readonly name: CodecName;
  push(chunk: Uint8Array): Promise<Uint8Array[]>;
  flush(): Promise<Uint8Array[]>;
  finish(): Promise<Uint8Array[]>;
  release(): void;
}

export type CodecFactory = (name: CodecName) => CodecAdapter;

export function isCodecName(x: string): x is CodecName {
  return CODEC_NAMES.some((n) => n === x);
}
