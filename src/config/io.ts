import fs from "node:fs";
import os from "node:os";

import JSON5 from "json5";

import { ConfigError, formatErrorMessage } from "../infra/errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { resolveConfigPath } from "./paths.js";
import type { ConfigFileSnapshot } from "./types.js";
import { validateConfigObject } from "./validation.js";

export type ConfigIoDeps = {
  fs?: Pick<typeof fs, "existsSync" | "readFileSync">;
  json5?: { parse: (value: string) => unknown };
  env?: NodeJS.ProcessEnv;
  homedir?: () => string;
};

export type ParseConfigJson5Result = { ok: true; parsed: unknown } | { ok: false; error: string };

const log = createSubsystemLogger("config");

export function parseConfigJson5(
  raw: string,
  json5: { parse: (value: string) => unknown } = JSON5,
): ParseConfigJson5Result {
  try {
    return { ok: true, parsed: json5.parse(raw) };
  } catch (err) {
    return { ok: false, error: formatErrorMessage(err) };
  }
}

/**
 * Reads and validates the configuration file. A missing file at the default
 * location yields an empty config; anything else that goes wrong is a
 * ConfigError.
 */
export function readConfigFile(
  requestedPath?: string,
  overrides: ConfigIoDeps = {},
): ConfigFileSnapshot {
  const ioFs = overrides.fs ?? fs;
  const env = overrides.env ?? process.env;
  const choice = resolveConfigPath(requestedPath, env, overrides.homedir ?? os.homedir);
  const configPath = choice.path;

  if (!ioFs.existsSync(configPath)) {
    if (choice.explicit) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    log.debug("No config file", { path: configPath });
    return { path: configPath, exists: false, config: {} };
  }

  let raw: string;
  try {
    raw = ioFs.readFileSync(configPath, "utf-8");
  } catch (err) {
    throw new ConfigError(`Failed to read config at ${configPath}`, [
      { path: "", message: formatErrorMessage(err) },
    ]);
  }

  const parsed = parseConfigJson5(raw, overrides.json5);
  if (!parsed.ok) {
    throw new ConfigError(`Invalid config at ${configPath}`, [
      { path: "", message: `JSON5 parse failed: ${parsed.error}` },
    ]);
  }

  const validated = validateConfigObject(parsed.parsed);
  if (!validated.ok) {
    throw new ConfigError(`Invalid config at ${configPath}`, validated.issues);
  }
  log.debug("Loaded config", { path: configPath });
  return { path: configPath, exists: true, config: validated.config };
}
