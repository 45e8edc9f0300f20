import { Writable } from "node:stream";
import { describe, expect, it, vi } from "vitest";

import {
  BrokenPipeStream,
  brokenPipeError,
  captureOutput,
  inputFrom,
} from "../../test/helpers/streams.js";
import { DEFAULT_RENDER_OPTIONS } from "../render/render-record.js";
import { createStylePolicy } from "../terminal/theme.js";
import { transformLines } from "./transform-lines.js";

const plainPolicy = createStylePolicy({ color: false });

describe("transformLines", () => {
  it("renders every line, passing malformed ones through", async () => {
    const output = captureOutput();
    const result = await transformLines({
      input: inputFrom('{"level":"info","msg":"a"}\nnot json\n\n{"level":"warn","msg":"b"}\r\n[1]'),
      output: output.stream,
      render: DEFAULT_RENDER_OPTIONS,
      policy: plainPolicy,
    });

    expect(output.text()).toBe("info  a\nnot json\n\nwarn  b\n[1]\n");
    expect(result).toEqual({ lines: 5, malformed: 2, outputClosed: false });
  });

  it("writes multi-line renderings as one block per record", async () => {
    const output = captureOutput();
    await transformLines({
      input: inputFrom('{"msg":"x","ctx":{"a":{"b":1}}}\n{"msg":"y"}\n'),
      output: output.stream,
      render: { ...DEFAULT_RENDER_OPTIONS, indent: 1 },
      policy: plainPolicy,
    });

    expect(output.text()).toBe("x\n ctx:\n  a:\n   b=1\ny\n");
  });

  it("produces nothing for empty input", async () => {
    const output = captureOutput();
    const result = await transformLines({
      input: inputFrom(""),
      output: output.stream,
      render: DEFAULT_RENDER_OPTIONS,
      policy: plainPolicy,
    });
    expect(output.text()).toBe("");
    expect(result.lines).toBe(0);
  });

  it("stops at the first write to a closed pipe", async () => {
    const onBrokenPipe = vi.fn();
    const output = new BrokenPipeStream();
    const result = await transformLines({
      input: inputFrom("{}\n{}\n{}\n"),
      output,
      render: DEFAULT_RENDER_OPTIONS,
      policy: plainPolicy,
      onBrokenPipe,
    });

    expect(result).toEqual({ lines: 1, malformed: 0, outputClosed: true });
    expect(output.writes).toBe(1);
    expect(onBrokenPipe).toHaveBeenCalledTimes(1);
  });

  it("renders level names that shadow object builtins with color on", async () => {
    const output = captureOutput();
    const result = await transformLines({
      input: inputFrom('{"level":"constructor","msg":"a"}\n{"level":"__proto__","msg":"b"}\n'),
      output: output.stream,
      render: DEFAULT_RENDER_OPTIONS,
      policy: createStylePolicy({ color: true }),
    });

    expect(output.text()).toBe("constructor a\n__proto__ b\n");
    expect(result).toEqual({ lines: 2, malformed: 0, outputClosed: false });
  });

  it("rejects when the last write fails with an error other than a closed pipe", async () => {
    const output = new Writable({
      write(_chunk, _encoding, callback) {
        callback(brokenPipeError("ENOSPC"));
      },
    });

    await expect(
      transformLines({
        input: inputFrom('{"msg":"only"}\n'),
        output,
        render: DEFAULT_RENDER_OPTIONS,
        policy: plainPolicy,
      }),
    ).rejects.toThrow("write ENOSPC");
  });
});
