#!/usr/bin/env node
// streamzip CLI — inspect negotiation and compress files the way a response would be.
//
//   streamzip negotiate --accept-encoding "gzip, br" --header "content-type: text/plain" --header "content-length: 2000"
//   streamzip compress --in page.html --out page.html.br --accept-encoding br --header "content-type: text/html"
//
//   --header          response header "name: value", repeatable
//   --request-header  extra request header "name: value", repeatable
//   --unknown-length  compress: leave Content-Length unset so the body is buffered first

import { command, subcommands, run, string, number, option, optional, flag, multioption, array } from "cmd-ts";
import { promises as fs } from "node:fs";
import { ResponseCompressor } from "./compressor.js";
import { bodyFromChunks } from "./body/frames.js";
import { DEFAULT_MIN_SIZE } from "./config.js";
import { encodeBytes } from "./encode-bytes.js";
import { rewriteHeaders } from "./headers.js";

// ── argument helpers ──────────────────────────────────────────────────────────

function parseHeaders(args: string[]): Headers {
  const headers = new Headers();
  for (const arg of args) {
    const colon = arg.indexOf(":");
    if (colon <= 0) throw new Error(`header must look like "name: value", got: ${arg}`);
    headers.append(arg.slice(0, colon).trim(), arg.slice(colon + 1).trim());
  }
  return headers;
}

function requestHeaders(acceptEncoding: string | undefined, extra: string[]): Headers {
  const headers = parseHeaders(extra);
  if (acceptEncoding !== undefined) headers.set("accept-encoding", acceptEncoding);
  return headers;
}

const shared = {
  acceptEncoding: option({
    type: optional(string),
    long: "accept-encoding",
    short: "a",
    description: "Request Accept-Encoding value (omit for no header)",
  }),
  header: multioption({
    type: array(string),
    long: "header",
    short: "H",
    description: 'Response header "name: value"',
  }),
  requestHeader: multioption({
    type: array(string),
    long: "request-header",
    description: 'Additional request header "name: value"',
  }),
  minSize: option({
    type: number,
    long: "min-size",
    description: `Minimum body size worth compressing (default: ${DEFAULT_MIN_SIZE})`,
    defaultValue: () => DEFAULT_MIN_SIZE,
  }),
};

// ── negotiate command ─────────────────────────────────────────────────────────

const negotiateCmd = command({
  name: "negotiate",
  description: "Print the compression decision and rewritten headers for a response",
  args: shared,
  handler: async ({ acceptEncoding, header, requestHeader, minSize }): Promise<void> => {
    const compressor = new ResponseCompressor({ minSize });
    const response = { status: 200, headers: parseHeaders(header), body: bodyFromChunks([]) };
    // Decision only: an unknown-length body is reported as Compress, before buffering.
    const decision = compressor.negotiate(requestHeaders(acceptEncoding, requestHeader), response);
    const headers = rewriteHeaders(new Headers(response.headers), decision);
    console.log(JSON.stringify({ decision, headers: Object.fromEntries(headers) }, null, 2));
  },
});

// ── compress command ──────────────────────────────────────────────────────────

const compressCmd = command({
  name: "compress",
  description: "Stream a file through the compressor as a response body",
  args: {
    ...shared,
    input: option({ type: string, long: "in", short: "i", description: "Input file" }),
    out: option({ type: string, long: "out", short: "o", description: "Output file for the (possibly) encoded body" }),
    chunkSize: option({
      type: number,
      long: "chunk-size",
      description: "Body chunk size in bytes (default: 16384)",
      defaultValue: () => 16_384,
    }),
    unknownLength: flag({
      long: "unknown-length",
      description: "Do not declare Content-Length; the body is buffered up to --min-size first",
    }),
  },
  handler: async ({ acceptEncoding, header, requestHeader, minSize, input, out, chunkSize, unknownLength }): Promise<void> => {
    if (chunkSize <= 0) {
      console.error("Error: --chunk-size must be positive");
      process.exit(1);
    }
    const bytes = new Uint8Array(await fs.readFile(input));
    const headers = parseHeaders(header);
    if (!unknownLength) headers.set("content-length", String(bytes.byteLength));

    const compressor = new ResponseCompressor({ minSize });
    const { response: res, encoded } = await encodeBytes(
      compressor,
      requestHeaders(acceptEncoding, requestHeader),
      { headers, bytes, chunkSize },
    );
    await fs.writeFile(out, encoded);

    console.error(`[compress] ${input}: ${bytes.byteLength} → ${encoded.byteLength} bytes → ${out}`);
    console.log(JSON.stringify({ decision: res.decision, headers: Object.fromEntries(res.headers) }, null, 2));
  },
});

// ── main ──────────────────────────────────────────────────────────────────────

const app = subcommands({
  name: "streamzip",
  description: "streamzip CLI — HTTP response compression decisions and encoding",
  cmds: { negotiate: negotiateCmd, compress: compressCmd },
});

void run(app, process.argv.slice(2));
