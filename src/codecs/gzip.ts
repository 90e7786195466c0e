import { constants, createGzip } from "node:zlib";
import { CodecError } from "../errors.js";
import { StreamCodec } from "./stream-codec.js";

// Z_SYNC_FLUSH aligns output to a byte boundary without resetting the
// dictionary, so flushed gzip streams keep their ratio.
export function createGzipCodec(level: number = constants.Z_DEFAULT_COMPRESSION): StreamCodec {
  try {
    return new StreamCodec("gzip", createGzip({ level }), constants.Z_SYNC_FLUSH);
  } catch (e) {
    throw new CodecError("gzip", "init", e);
  }
}
