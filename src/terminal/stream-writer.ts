import type { Writable } from "node:stream";

import { isBrokenPipeError } from "../infra/errors.js";

export type SafeStreamWriterOptions = {
  onBrokenPipe?: (err: Error, stream: Writable) => void;
};

export type SafeStreamWriter = {
  /** Resolves `false` once the stream is closed; waits for `drain` when the buffer is full. */
  write: (text: string) => Promise<boolean>;
  writeLine: (text: string) => Promise<boolean>;
  /** Waits for the last accepted write, then throws any error the stream reported. */
  finish: () => Promise<void>;
  isClosed: () => boolean;
};

export function createSafeStreamWriter(
  stream: Writable,
  options: SafeStreamWriterOptions = {},
): SafeStreamWriter {
  let closed = false;
  let notified = false;
  let failure: unknown;
  let lastWrite: Promise<void> = Promise.resolve();

  const noteBrokenPipe = (err: Error) => {
    if (notified) return;
    notified = true;
    options.onBrokenPipe?.(err, stream);
  };

  const handleError = (err: unknown): boolean => {
    if (!(err instanceof Error) || !isBrokenPipeError(err)) {
      throw err;
    }
    closed = true;
    noteBrokenPipe(err);
    return false;
  };

  const noteError = (err: Error) => {
    if (isBrokenPipeError(err)) {
      closed = true;
      noteBrokenPipe(err);
      return;
    }
    // Writes queued behind a broken pipe fail with ERR_STREAM_DESTROYED.
    if (!closed) failure ??= err;
  };

  // EPIPE on a pipe usually arrives as an 'error' event after write() returned.
  stream.on("error", noteError);

  const rethrowFailure = () => {
    if (failure !== undefined) throw failure;
  };

  const waitForDrain = () =>
    new Promise<void>((resolve) => {
      const done = () => {
        stream.off("drain", done);
        stream.off("close", done);
        stream.off("error", done);
        resolve();
      };
      stream.on("drain", done);
      stream.on("close", done);
      stream.on("error", done);
    });

  const write = async (text: string): Promise<boolean> => {
    rethrowFailure();
    if (closed) return false;
    let settle = () => {};
    const written = new Promise<void>((resolve) => {
      settle = resolve;
    });
    try {
      stream.write(text, (err) => {
        if (err) noteError(err);
        settle();
      });
    } catch (err) {
      return handleError(err);
    }
    lastWrite = written;
    if (!closed && stream.writableNeedDrain) {
      await waitForDrain();
    }
    rethrowFailure();
    return !closed;
  };

  const finish = async () => {
    if (!closed) await lastWrite;
    rethrowFailure();
  };

  return {
    write,
    finish,
    writeLine: (text) => write(`${text}\n`),
    isClosed: () => closed,
  };
}
