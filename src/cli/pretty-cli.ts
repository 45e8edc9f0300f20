import type { Readable, Writable } from "node:stream";

import { resolveConfig, type ConfigOverrides } from "../config/config.js";
import type { ConfigIoDeps } from "../config/io.js";
import { setVerbose } from "../globals.js";
import { extractErrorCode } from "../infra/errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { transformLines } from "../stream/transform-lines.js";
import { createStylePolicy, resolveColorEnabled } from "../terminal/theme.js";

export type PrettyCliOptions = {
  /** `false` comes from `--no-color`. */
  color?: string | false;
  timestampFormat?: string;
  indent?: string;
  knownTimestampKeys?: string;
  knownLevelKeys?: string;
  knownMessageKeys?: string;
  config?: string;
  verbose?: boolean;
};

export type CliIo = {
  input: Readable;
  output: Writable & { isTTY?: boolean };
  outputName: string;
  env: NodeJS.ProcessEnv;
  configDeps?: ConfigIoDeps;
};

export function defaultCliIo(): CliIo {
  return { input: process.stdin, output: process.stdout, outputName: "stdout", env: process.env };
}

export function formatBrokenPipeMessage(outputName: string, err: Error): string {
  return `loglens: output ${outputName} closed (${extractErrorCode(err) ?? "EPIPE"}).`;
}

export function toConfigOverrides(opts: PrettyCliOptions): ConfigOverrides {
  return {
    configPath: opts.config,
    color: opts.color,
    timestampFormat: opts.timestampFormat,
    indent: opts.indent,
    timestampKeys: opts.knownTimestampKeys,
    levelKeys: opts.knownLevelKeys,
    messageKeys: opts.knownMessageKeys,
  };
}

const log = createSubsystemLogger("cli");

/** Resolves the exit code: 1 when the output closed early. */
export async function prettyCommand(
  opts: PrettyCliOptions,
  runtime: RuntimeEnv = defaultRuntime,
  io: CliIo = defaultCliIo(),
): Promise<number> {
  setVerbose(Boolean(opts.verbose));
  const config = resolveConfig(toConfigOverrides(opts), { env: io.env, ...io.configDeps });
  const color = resolveColorEnabled(config.color, { isTTY: Boolean(io.output.isTTY), env: io.env });
  log.debug("Resolved settings", {
    configPath: config.configPath ?? null,
    color,
    timestampFormat: config.timestampFormat,
    indent: config.indent,
  });

  const result = await transformLines({
    input: io.input,
    output: io.output,
    render: {
      timestampFormat: config.timestampFormat,
      indent: config.indent,
      candidates: config.candidates,
    },
    policy: createStylePolicy({ color, theme: config.theme }),
    onBrokenPipe: (err) => runtime.error(formatBrokenPipeMessage(io.outputName, err)),
  });
  return result.outputClosed ? 1 : 0;
}
