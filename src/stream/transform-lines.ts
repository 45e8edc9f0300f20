import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";

import { createSubsystemLogger } from "../logging/subsystem.js";
import { parseRecord } from "../record/parse-record.js";
import { renderRecord, type RenderOptions } from "../render/render-record.js";
import { createSegmentFormatter } from "../terminal/format-segments.js";
import { createSafeStreamWriter } from "../terminal/stream-writer.js";
import type { StylePolicy } from "../terminal/theme.js";

export type TransformLinesOptions = {
  input: Readable;
  output: Writable;
  render: RenderOptions;
  policy: StylePolicy;
  onBrokenPipe?: (err: Error) => void;
};

export type TransformLinesResult = {
  lines: number;
  malformed: number;
  /** True when the output closed before the input ended. */
  outputClosed: boolean;
};

const log = createSubsystemLogger("stream");

/**
 * Reads newline-delimited records and writes one rendered block per line.
 * Each line is written (and drained, when the output asks for it) before the
 * next one is read.
 */
export async function transformLines(opts: TransformLinesOptions): Promise<TransformLinesResult> {
  const formatter = createSegmentFormatter(opts.policy);
  const writer = createSafeStreamWriter(opts.output, {
    onBrokenPipe: (err) => opts.onBrokenPipe?.(err),
  });
  const reader = createInterface({ input: opts.input, crlfDelay: Infinity });

  let lines = 0;
  let malformed = 0;
  try {
    for await (const raw of reader) {
      lines += 1;
      const record = parseRecord(raw);
      if (record.kind === "malformed") malformed += 1;
      const text = formatter.formatLines(renderRecord(record, opts.render));
      if (!(await writer.writeLine(text))) {
        log.debug("Output closed; stopping", { lines });
        break;
      }
    }
    await writer.finish();
  } finally {
    reader.close();
  }

  log.debug("Input finished", { lines, malformed });
  return { lines, malformed, outputClosed: writer.isClosed() };
}
