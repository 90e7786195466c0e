// node:http hosting.
//
//   http.createServer(async (req, res) => {
//     const response = await app(req);
//     await sendNodeResponse(res, await compressor.compress(headersFromNode(req.headers), response));
//   });
//
// ServerResponse writes each chunk out as soon as it is written, so flush
// frames need no extra call here.

import type { IncomingHttpHeaders, OutgoingHttpHeaders } from "node:http";
import type { Logger } from "@adviser/cement";
import { compressionLogger } from "../logger.js";
import type { HttpResponse } from "../types.js";

/** The part of http.ServerResponse the adapter uses. */
export interface NodeResponseSink {
  statusMessage: string;
  writeHead(statusCode: number, headers: OutgoingHttpHeaders): unknown;
  write(chunk: Uint8Array): boolean;
  addTrailers(headers: OutgoingHttpHeaders): void;
  end(): unknown;
  destroy(error?: Error): unknown;
  once(event: "drain" | "close", listener: () => void): unknown;
  removeListener(event: "drain" | "close", listener: () => void): unknown;
}

export function headersFromNode(incoming: IncomingHttpHeaders): Headers {
  const out = new Headers();
  for (const [name, value] of Object.entries(incoming)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const v of value) out.append(name, v);
    } else {
      out.set(name, value);
    }
  }
  return out;
}

export function headersToNode(headers: Headers): OutgoingHttpHeaders {
  const out: OutgoingHttpHeaders = {};
  headers.forEach((value, name) => {
    out[name] = value;
  });
  const cookies = headers.getSetCookie();
  if (cookies.length > 0) out["set-cookie"] = cookies;
  return out;
}

function writable(res: NodeResponseSink): Promise<void> {
  return new Promise<void>((resolve) => {
    const done = (): void => {
      res.removeListener("drain", done);
      res.removeListener("close", done);
      resolve();
    };
    res.once("drain", done);
    res.once("close", done);
  });
}

/**
 * Sends a (compressed) response through a node:http ServerResponse, honouring
 * its backpressure. If the client goes away first the body is cancelled; if
 * the body fails the response is destroyed and the error rethrown.
 */
export async function sendNodeResponse(
  res: NodeResponseSink,
  response: HttpResponse,
  opts?: { logger?: Logger },
): Promise<void> {
  if (response.statusText) res.statusMessage = response.statusText;
  res.writeHead(response.status, headersToNode(response.headers));
  if (!response.body) {
    res.end();
    return;
  }

  const logger = compressionLogger(opts?.logger);
  const reader = response.body.getReader();
  let closed = false;
  const onClose = (): void => {
    closed = true;
    reader.cancel(new Error("response closed before the body finished")).catch((e: unknown) => {
      logger.Debug().Err(e).Msg("body cancel failed");
    });
  };
  res.once("close", onClose);

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done || closed) break;
      switch (value.type) {
        case "data":
          if (!res.write(value.data)) await writable(res);
          break;
        case "trailers":
          res.addTrailers(headersToNode(value.trailers));
          break;
        case "flush":
          break;
      }
    }
    if (!closed) res.end();
  } catch (e) {
    logger.Error().Err(e).Msg("response body failed");
    res.destroy(e instanceof Error ? e : new Error(String(e)));
    throw e;
  } finally {
    res.removeListener("close", onClose);
  }
}
