import { Readable, Writable } from "node:stream";

export function inputFrom(text: string): Readable {
  return Readable.from([text]);
}

export type CapturedOutput = {
  stream: Writable;
  text: () => string;
};

export function captureOutput(): CapturedOutput {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { stream, text: () => chunks.join("") };
}

export function brokenPipeError(code = "EPIPE"): NodeJS.ErrnoException {
  const err: NodeJS.ErrnoException = new Error(`write ${code}`);
  err.code = code;
  return err;
}

/** A stream whose writes fail synchronously, as a closed pipe does under some runtimes. */
export class BrokenPipeStream extends Writable {
  writes = 0;

  override write(_chunk: unknown): boolean {
    this.writes += 1;
    throw brokenPipeError();
  }
}
