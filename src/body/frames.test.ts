import { describe, it, expect } from "vitest";
import { stream2uint8array, uint8array2stream } from "@adviser/cement/utils";
import { text } from "../codecs/test-decode.js";
import { FLUSH, dataFrame, trailersFrame, type BodyFrame } from "../types.js";
import { bodyFromChunks, bodyFromStream, bytesFromBody, collectBody } from "./frames.js";

describe("body frames", () => {
  it("frames a byte stream and appends trailers", async () => {
    const trailers = new Headers({ "x-checksum": "abc123" });
    const { frames, data } = await collectBody(bodyFromStream(uint8array2stream(text("payload")), trailers));
    expect(frames[frames.length - 1]).toEqual(trailersFrame(trailers));
    expect(data).toEqual(text("payload"));
  });

  it("collects data and trailers", async () => {
    const trailers = new Headers({ "grpc-status": "0" });
    const collected = await collectBody(bodyFromChunks([text("a"), text("bc")], trailers));
    expect(collected.frames).toEqual([dataFrame(text("a")), dataFrame(text("bc")), trailersFrame(trailers)]);
    expect(collected.data).toEqual(text("abc"));
    expect(collected.trailers).toBe(trailers);
  });

  it("unframes to bytes, handing trailers aside", async () => {
    const seen: Headers[] = [];
    const trailers = new Headers({ "grpc-status": "0" });
    const body = new ReadableStream<BodyFrame>({
      start(ctrl): void {
        ctrl.enqueue(dataFrame(text("one ")));
        ctrl.enqueue(FLUSH);
        ctrl.enqueue(dataFrame(text("two")));
        ctrl.enqueue(trailersFrame(trailers));
        ctrl.close();
      },
    });
    const bytes = await stream2uint8array(bytesFromBody(body, (t) => seen.push(t)));
    expect(bytes).toEqual(text("one two"));
    expect(seen).toEqual([trailers]);
  });
});
