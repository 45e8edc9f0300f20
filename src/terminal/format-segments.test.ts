import { Chalk } from "chalk";
import { describe, expect, it } from "vitest";

import { parseRecord } from "../record/parse-record.js";
import { DEFAULT_RENDER_OPTIONS, renderRecord } from "../render/render-record.js";
import { applyStyle, createSegmentFormatter } from "./format-segments.js";
import { createStylePolicy } from "./theme.js";

function format(line: string, color: boolean): string {
  const formatter = createSegmentFormatter(createStylePolicy({ color }));
  return formatter.formatLines(renderRecord(parseRecord(line), DEFAULT_RENDER_OPTIONS));
}

describe("applyStyle", () => {
  const chalk = new Chalk({ level: 1 });

  it("emits basic ANSI codes", () => {
    expect(applyStyle(chalk, { color: "red" }, "x")).toBe("\u001b[31mx\u001b[39m");
    expect(applyStyle(chalk, { color: "red", bold: true }, "x")).toBe(
      "\u001b[31m\u001b[1mx\u001b[22m\u001b[39m",
    );
    expect(applyStyle(chalk, { dim: true }, "x")).toBe("\u001b[2mx\u001b[22m");
  });

  it("leaves empty styles and empty text alone", () => {
    expect(applyStyle(chalk, {}, "x")).toBe("x");
    expect(applyStyle(chalk, { color: "red" }, "")).toBe("");
  });
});

describe("createSegmentFormatter", () => {
  it("colors the level by severity", () => {
    expect(format('{"level":"error","msg":"boom"}', true)).toBe("\u001b[31merror\u001b[39m boom");
  });

  it("styles keys, punctuation and values", () => {
    expect(format('{"msg":"m","k":1}', true)).toBe(
      "m \u001b[34mk\u001b[39m\u001b[2m=\u001b[22m\u001b[35m1\u001b[39m",
    );
  });

  it("writes no escape codes without color", () => {
    expect(format('{"level":"fatal","msg":"down","ctx":{"a":{"b":null}}}', false)).toBe(
      "fatal down\n  ctx:\n    a:\n      b=null",
    );
  });

  it("leaves unrecognized lines untouched", () => {
    expect(format("plain \u001b[1mtext", true)).toBe("plain \u001b[1mtext");
  });
});
