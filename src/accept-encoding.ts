// Accept-Encoding — RFC 9110 §12.5.3
//
//   Accept-Encoding = #( codings [ weight ] )
//   weight          = OWS ";" OWS "q=" qvalue
//   qvalue          = ( "0" [ "." 0*3DIGIT ] ) / ( "1" [ "." 0*3("0") ] )
//
// Entries with a bad token or a bad qvalue are dropped one by one; the rest of
// the header still counts. "identity" and "*" are kept in the parsed list but
// never select a codec. q=0 marks a coding as not acceptable.

import { CODEC_NAMES, type CodecName } from "./codecs/types.js";

export interface AcceptedCoding {
  readonly coding: string;
  readonly q: number;
}

const TOKEN = /^[!#$%&'*+\-.^_`|~0-9a-z]+$/;
const QVALUE = /^(?:0(?:\.\d{0,3})?|1(?:\.0{0,3})?)$/;

const ALIASES = new Map<string, string>([
  ["x-gzip", "gzip"],
  ["brotli", "br"],
]);

function parseEntry(entry: string): AcceptedCoding | undefined {
  const [rawCoding, ...params] = entry.split(";");
  const coding = rawCoding.trim().toLowerCase();
  if (!TOKEN.test(coding)) return undefined;
  let q = 1;
  for (const param of params) {
    const eq = param.indexOf("=");
    if (eq === -1) return undefined;
    const name = param.slice(0, eq).trim().toLowerCase();
    if (name !== "q") continue;
    const value = param.slice(eq + 1).trim();
    if (!QVALUE.test(value)) return undefined;
    q = Number(value);
  }
  return { coding: ALIASES.get(coding) ?? coding, q };
}

export function parseAcceptEncoding(header: string): AcceptedCoding[] {
  const out: AcceptedCoding[] = [];
  for (const entry of header.split(",")) {
    if (!entry.trim()) continue;
    const parsed = parseEntry(entry);
    if (parsed) out.push(parsed);
  }
  return out;
}

/**
 * Codecs from `enabled` the client accepts, best first: highest q, ties broken
 * by the server preference zstd > br > gzip. A coding listed more than once
 * keeps its highest weight.
 */
export function rankCodecs(accepted: readonly AcceptedCoding[], enabled: readonly CodecName[]): CodecName[] {
  const weights = new Map<CodecName, number>();
  for (const { coding, q } of accepted) {
    const codec = CODEC_NAMES.find((n) => n === coding);
    if (!codec || !enabled.includes(codec)) continue;
    weights.set(codec, Math.max(q, weights.get(codec) ?? 0));
  }
  const preference = (c: CodecName): number => CODEC_NAMES.indexOf(c);
  return [...weights.entries()]
    .filter(([, q]) => q > 0)
    .sort(([a, qa], [b, qb]) => qb - qa || preference(a) - preference(b))
    .map(([codec]) => codec);
}
