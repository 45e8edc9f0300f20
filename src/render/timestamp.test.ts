import { describe, expect, it } from "vitest";

import { detectTimestampUnit, formatTimestamp } from "./timestamp.js";

const num = (raw: string) => ({ kind: "number", raw }) as const;

describe("detectTimestampUnit", () => {
  it("switches unit at the year 3000 in each scale", () => {
    expect(detectTimestampUnit(32_503_679_999)).toBe("seconds");
    expect(detectTimestampUnit(32_503_680_000)).toBe("millis");
    expect(detectTimestampUnit(32_503_680_000_000)).toBe("micros");
    expect(detectTimestampUnit(32_503_680_000_000_000)).toBe("nanos");
  });
});

describe("formatTimestamp", () => {
  it("detects epoch milliseconds", () => {
    expect(formatTimestamp(num("1729811012050"), "auto")).toBe("2024-10-24T23:03:32.050Z");
  });

  it("prints whole seconds without a fraction", () => {
    expect(formatTimestamp(num("1700000000"), "auto")).toBe("2023-11-14T22:13:20Z");
    expect(formatTimestamp(num("-1"), "auto")).toBe("1969-12-31T23:59:59Z");
  });

  it("keeps the fraction of fractional seconds", () => {
    expect(formatTimestamp(num("1700000000.25"), "auto")).toBe("2023-11-14T22:13:20.250Z");
  });

  it("detects micros and nanos", () => {
    expect(formatTimestamp(num("1700000000000000"), "auto")).toBe("2023-11-14T22:13:20.000Z");
    expect(formatTimestamp(num("1700000000123456789"), "auto")).toBe("2023-11-14T22:13:20.123Z");
  });

  it("keeps the exact millisecond of large nanosecond values", () => {
    expect(formatTimestamp(num("1729811012050999999"), "auto")).toBe("2024-10-24T23:03:32.050Z");
    expect(formatTimestamp(num("1729811012050999"), "auto")).toBe("2024-10-24T23:03:32.050Z");
  });

  it("rounds negative sub-millisecond values towards the past", () => {
    expect(formatTimestamp(num("-1500"), "micros")).toBe("1969-12-31T23:59:59.998Z");
  });

  it("honours an explicit unit", () => {
    expect(formatTimestamp(num("1700000000"), "millis")).toBe("1970-01-20T16:13:20.000Z");
    expect(formatTimestamp(num("1700000000000"), "micros")).toBe("1970-01-20T16:13:20.000Z");
  });

  it("falls back to the raw token outside the date range", () => {
    expect(formatTimestamp(num("10000000000000"), "seconds")).toBe("10000000000000");
    expect(formatTimestamp(num("1e400"), "auto")).toBe("1e400");
  });

  it("passes strings and raw mode through", () => {
    expect(formatTimestamp({ kind: "string", value: "2024-10-24 23:03" }, "auto")).toBe(
      "2024-10-24 23:03",
    );
    expect(formatTimestamp(num("1729811012050"), "raw")).toBe("1729811012050");
  });
});
