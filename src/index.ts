export type { BodyFrame, DataFrame, FlushFrame, TrailersFrame, HttpBody, HttpResponse } from "./types.js";
export { FLUSH, dataFrame, trailersFrame } from "./types.js";
export { CodecError, ConfigError, isCodecError } from "./errors.js";
export type { CodecOperation } from "./errors.js";
export {
  CompressionOptions,
  FlushHeader,
  DEFAULT_MIN_SIZE,
  DEFAULT_FLUSH_HEADERS,
  resolveConfig,
  isCompressionOptions,
} from "./config.js";
export type { CompressionConfig, CompressorOptions } from "./config.js";
export { CODEC_NAMES, isCodecName, createCodec, availableCodecs, hasNativeZstd, StreamCodec, ZstdFrameCodec } from "./codecs/index.js";
export type { CodecAdapter, CodecFactory, CodecName } from "./codecs/index.js";
export { mediaType, isExcludedContentType, isFlushContentType, DEFAULT_FLUSH_CONTENT_TYPES } from "./content-type.js";
export { parseAcceptEncoding, rankCodecs } from "./accept-encoding.js";
export type { AcceptedCoding } from "./accept-encoding.js";
export { negotiate, shouldForceFlush } from "./negotiate.js";
export type { Decision, SkipDecision, CompressDecision, SkipReason, NegotiationInput } from "./negotiate.js";
export { rewriteHeaders, appendVary } from "./headers.js";
export { CompressionBody } from "./body/compression-body.js";
export type { CompressionMode, CommittedMode, CompressionBodyOptions } from "./body/compression-body.js";
export { bodyFromStream, bodyFromChunks, bytesFromBody, collectBody } from "./body/frames.js";
export type { CollectedBody } from "./body/frames.js";
export { ResponseCompressor, settleDecision } from "./compressor.js";
export { encodeBytes, chunked } from "./encode-bytes.js";
export type { EncodeBytesInput, EncodedBytes } from "./encode-bytes.js";
export type { CompressedResponse } from "./compressor.js";
export { withCompression } from "./adapters/fetch.js";
export type { FetchHandler } from "./adapters/fetch.js";
export { sendNodeResponse, headersFromNode, headersToNode } from "./adapters/node.js";
export type { NodeResponseSink } from "./adapters/node.js";
export { compressionLogger } from "./logger.js";
