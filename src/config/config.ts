import { ConfigError } from "../infra/errors.js";
import type { FieldCandidates, FieldRole } from "../record/classify.js";
import { DEFAULT_CONFIG, normalizeColorMode } from "./defaults.js";
import { readConfigFile, type ConfigIoDeps } from "./io.js";
import type { ConfigOverrides, LoglensConfig, ResolvedConfig } from "./types.js";
import { validateConfigObject } from "./validation.js";

export { readConfigFile, parseConfigJson5 } from "./io.js";
export { resolveConfigPath, resolveDefaultConfigPath, CONFIG_PATH_ENV } from "./paths.js";
export { validateConfigObject } from "./validation.js";
export { LoglensSchema } from "./zod-schema.js";
export * from "./types.js";

// config path -> flag, for issues found in command-line values
const FLAG_NAMES: Record<string, string> = {
  color: "--color",
  timestampFormat: "--timestamp-format",
  indent: "--indent",
  "keys.timestamp": "--known-timestamp-keys",
  "keys.level": "--known-level-keys",
  "keys.message": "--known-message-keys",
};

export function splitKeyList(value: string): string[] {
  return value
    .split(",")
    .map((key) => key.trim())
    .filter(Boolean);
}

function flagLayer(overrides: ConfigOverrides): Record<string, unknown> {
  const layer: Record<string, unknown> = {};
  if (overrides.color === false) {
    layer.color = "off";
  } else if (overrides.color !== undefined) {
    layer.color = overrides.color.trim().toLowerCase();
  }
  if (overrides.timestampFormat !== undefined) {
    layer.timestampFormat = overrides.timestampFormat.trim().toLowerCase();
  }
  if (overrides.indent !== undefined) {
    const trimmed = overrides.indent.trim();
    layer.indent = trimmed ? Number(trimmed) : Number.NaN;
  }
  const keys: Record<string, string[]> = {};
  if (overrides.timestampKeys !== undefined) keys.timestamp = splitKeyList(overrides.timestampKeys);
  if (overrides.levelKeys !== undefined) keys.level = splitKeyList(overrides.levelKeys);
  if (overrides.messageKeys !== undefined) keys.message = splitKeyList(overrides.messageKeys);
  if (Object.keys(keys).length > 0) layer.keys = keys;
  return layer;
}

/** Validates command-line values with the file schema, reporting issues by flag name. */
export function parseConfigOverrides(overrides: ConfigOverrides): LoglensConfig {
  const validated = validateConfigObject(flagLayer(overrides));
  if (!validated.ok) {
    throw new ConfigError(
      "Invalid options",
      validated.issues.map((iss) => ({
        path: FLAG_NAMES[iss.path] ?? iss.path,
        message: iss.message,
      })),
    );
  }
  return validated.config;
}

function mergeCandidates(file: LoglensConfig, flags: LoglensConfig): FieldCandidates {
  const pick = (role: FieldRole) =>
    flags.keys?.[role] ?? file.keys?.[role] ?? DEFAULT_CONFIG.candidates[role];
  return {
    timestamp: pick("timestamp"),
    level: pick("level"),
    message: pick("message"),
  };
}

/**
 * Resolves the effective settings: built-in defaults, then the config file,
 * then command-line flags. Flags are checked before the file is read.
 */
export function resolveConfig(
  overrides: ConfigOverrides = {},
  deps: ConfigIoDeps = {},
): ResolvedConfig {
  const flags = parseConfigOverrides(overrides);
  const snapshot = readConfigFile(overrides.configPath, deps);
  const file = snapshot.config;
  const color = flags.color ?? file.color;

  return {
    color: color ? normalizeColorMode(color) : DEFAULT_CONFIG.color,
    timestampFormat: flags.timestampFormat ?? file.timestampFormat ?? DEFAULT_CONFIG.timestampFormat,
    indent: flags.indent ?? file.indent ?? DEFAULT_CONFIG.indent,
    candidates: mergeCandidates(file, flags),
    theme: { roles: file.theme, keys: file.keyColors },
    configPath: snapshot.exists ? snapshot.path : undefined,
  };
}
