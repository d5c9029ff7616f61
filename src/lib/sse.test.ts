import { describe, expect, it } from "vitest";
import { SSEParser, encodeEvent, isRunEvent } from "./sse";
import type { RunEvent } from "@/types/batch";

describe("SSE framing", () => {
  const wait: RunEvent = { type: "throttle_wait", waitMs: 4200 };
  const done: RunEvent = {
    type: "run_complete",
    status: "completed",
    summary: { total: 2, succeeded: 1, failed: 1, pending: 0 },
  };

  it("encodes one data frame per event", () => {
    expect(encodeEvent(wait)).toBe('data: {"type":"throttle_wait","waitMs":4200}\n\n');
  });

  it("reassembles events split across chunks", () => {
    const parser = new SSEParser();
    const stream = encodeEvent(wait) + encodeEvent(done);

    expect(parser.push(stream.slice(0, 10))).toEqual([]);
    expect(parser.push(stream.slice(10, 50))).toEqual([wait]);
    expect(parser.push(stream.slice(50))).toEqual([done]);
  });

  it("drops malformed and unknown frames", () => {
    const parser = new SSEParser();
    const events = parser.push(': ping\n\ndata: {oops\n\ndata: {"type":"other"}\n\n' + encodeEvent(wait));
    expect(events).toEqual([wait]);
  });

  it("guards event shapes", () => {
    expect(isRunEvent({ type: "run_error", error: "x" })).toBe(true);
    expect(isRunEvent({ type: 3 })).toBe(false);
    expect(isRunEvent(null)).toBe(false);
  });
});
