import { describe, it, expect } from "vitest";
import { gunzipSync } from "node:zlib";
import { withCompression } from "./fetch.js";

const page = "<p>hello compression</p>\n".repeat(100);

function request(acceptEncoding?: string): Request {
  return new Request("http://localhost/", {
    headers: acceptEncoding === undefined ? {} : { "accept-encoding": acceptEncoding },
  });
}

describe("withCompression", () => {
  const handler = withCompression(
    async () =>
      new Response(page, {
        status: 200,
        statusText: "OK",
        headers: { "content-type": "text/html", "content-length": String(page.length) },
      }),
    { codecs: ["gzip"] },
  );

  it("compresses when the client accepts it", async () => {
    const res = await handler(request("gzip"));
    expect(res.status).toBe(200);
    expect(res.statusText).toBe("OK");
    expect(res.headers.get("content-encoding")).toBe("gzip");
    expect(res.headers.get("content-length")).toBeNull();
    expect(res.headers.get("vary")).toBe("Accept-Encoding");
    expect(gunzipSync(new Uint8Array(await res.arrayBuffer())).toString("utf8")).toBe(page);
  });

  it("passes through when the client does not", async () => {
    const res = await handler(request());
    expect(res.headers.get("content-encoding")).toBeNull();
    expect(res.headers.get("vary")).toBeNull();
    expect(await res.text()).toBe(page);
  });

  it("sends a short streamed body uncompressed", async () => {
    const short = withCompression(async () => new Response("tiny", { headers: { "content-type": "text/plain" } }));
    const res = await short(request("gzip"));
    expect(res.headers.get("content-encoding")).toBeNull();
    expect(res.headers.get("vary")).toBe("Accept-Encoding");
    expect(await res.text()).toBe("tiny");
  });

  it("keeps bodiless responses bodiless", async () => {
    const empty = withCompression(async () => new Response(null, { status: 204 }));
    const res = await empty(request("gzip"));
    expect(res.status).toBe(204);
    expect(res.body).toBeNull();
  });
});
