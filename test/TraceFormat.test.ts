import { describe, it, expect } from "vitest";
import {
  formatMicros,
  serializeProfileResult,
  TRACE_FOOTER,
  TRACE_HEADER,
} from "../src/TraceFormat.js";
import { createProfileResult } from "../src/ProfileResult.js";

describe("formatMicros", () => {
  it("always renders three fractional digits", () => {
    expect(formatMicros(50)).toBe("50.000");
    expect(formatMicros(0)).toBe("0.000");
    expect(formatMicros(1234.5)).toBe("1234.500");
  });

  it("rounds beyond the third digit", () => {
    expect(formatMicros(1.23456)).toBe("1.235");
    expect(formatMicros(99.9999)).toBe("100.000");
  });
});

describe("serializeProfileResult", () => {
  it("renders a complete event with a leading comma", () => {
    const result = createProfileResult("load", 1000.25, 50, 3);

    expect(serializeProfileResult(result)).toBe(
      ',{"cat":"function","dur":50.000,"name":"load","ph":"X","pid":0,"tid":3,"ts":1000.250}'
    );
  });

  it("writes the name as given", () => {
    const result = createProfileResult("Parser::parse(const Token&)", 0, 1, 0);

    expect(serializeProfileResult(result)).toContain(
      '"name":"Parser::parse(const Token&)"'
    );
  });
});

describe("framing", () => {
  it("produces a parseable document around serialized events", () => {
    const body = [
      createProfileResult("a", 10, 5, 0),
      createProfileResult("b", 20, 7, 1),
    ]
      .map(serializeProfileResult)
      .join("");

    const parsed = JSON.parse(TRACE_HEADER + body + TRACE_FOOTER);

    expect(parsed.otherData).toEqual({});
    expect(parsed.traceEvents).toEqual([
      {},
      { cat: "function", dur: 5, name: "a", ph: "X", pid: 0, tid: 0, ts: 10 },
      { cat: "function", dur: 7, name: "b", ph: "X", pid: 0, tid: 1, ts: 20 },
    ]);
  });

  it("is valid with no events at all", () => {
    expect(JSON.parse(TRACE_HEADER + TRACE_FOOTER)).toEqual({
      otherData: {},
      traceEvents: [{}],
    });
  });
});

describe("createProfileResult", () => {
  it("returns a frozen value", () => {
    const result = createProfileResult("x", 1, 2, 3);

    expect(Object.isFrozen(result)).toBe(true);
    expect(result).toEqual({ name: "x", start: 1, elapsed: 2, threadId: 3 });
  });
});
