import { Command } from "commander";

import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { VERSION } from "../version.js";
import { runCommandWithRuntime } from "./cli-utils.js";
import { prettyCommand, type CliIo, type PrettyCliOptions } from "./pretty-cli.js";
import { registerSampleCli, type SampleCliDeps } from "./sample-cli.js";

export type BuildProgramDeps = {
  runtime?: RuntimeEnv;
  io?: CliIo;
  sample?: SampleCliDeps;
};

export function buildProgram(deps: BuildProgramDeps = {}): Command {
  const runtime = deps.runtime ?? defaultRuntime;
  const program = new Command();

  program
    .name("loglens")
    .description("Pretty-print newline-delimited JSON logs read from stdin")
    .version(VERSION)
    .option("--color <mode>", "Color output: auto, on, off (also always, never)")
    .option("--no-color", "Disable ANSI colors")
    .option(
      "--timestamp-format <format>",
      "Numeric timestamp unit: auto, seconds, millis, micros, nanos, raw",
    )
    .option("--known-timestamp-keys <keys>", "Comma-separated timestamp keys, highest priority first")
    .option("--known-level-keys <keys>", "Comma-separated level keys, highest priority first")
    .option("--known-message-keys <keys>", "Comma-separated message keys, highest priority first")
    .option("--indent <n>", "Spaces per nesting level (1-8)")
    .option("--config <path>", "Configuration file (json5)")
    .option("--verbose", "Diagnostic logging on stderr", false)
    .action(async (opts: PrettyCliOptions) => {
      let code = 0;
      await runCommandWithRuntime(runtime, async () => {
        code = await prettyCommand(opts, runtime, deps.io);
      });
      if (code !== 0) runtime.exit(code);
    });

  registerSampleCli(program, runtime, deps.io, deps.sample);
  return program;
}
