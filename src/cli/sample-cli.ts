import { InvalidArgumentError, type Command } from "commander";

import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { DEFAULT_SAMPLE_COUNT, generateSampleLines } from "../sample/generate-lines.js";
import { createSafeStreamWriter } from "../terminal/stream-writer.js";
import { runCommandWithRuntime } from "./cli-utils.js";
import { defaultCliIo, formatBrokenPipeMessage, type CliIo } from "./pretty-cli.js";

export type SampleCliDeps = {
  random?: () => number;
  now?: () => number;
};

export function parseSampleCount(value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return Number.parseInt(trimmed, 10);
}

export async function sampleCommand(
  count: number,
  runtime: RuntimeEnv = defaultRuntime,
  io: CliIo = defaultCliIo(),
  deps: SampleCliDeps = {},
): Promise<number> {
  const writer = createSafeStreamWriter(io.output, {
    onBrokenPipe: (err) => runtime.error(formatBrokenPipeMessage(io.outputName, err)),
  });
  for (const line of generateSampleLines({ count, random: deps.random, now: deps.now })) {
    if (!(await writer.writeLine(line))) return 1;
  }
  return 0;
}

export function registerSampleCli(
  program: Command,
  runtime: RuntimeEnv = defaultRuntime,
  io?: CliIo,
  deps: SampleCliDeps = {},
) {
  program
    .command("sample")
    .description("Write synthetic log lines to stdout for trying the renderer")
    .argument("[count]", "Number of lines", parseSampleCount, DEFAULT_SAMPLE_COUNT)
    .action(async (count: number) => {
      let code = 0;
      await runCommandWithRuntime(runtime, async () => {
        code = await sampleCommand(count, runtime, io, deps);
      });
      if (code !== 0) runtime.exit(code);
    });
}
