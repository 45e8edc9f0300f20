import os from "node:os";
import path from "node:path";

export const CONFIG_PATH_ENV = "LOGLENS_CONFIG";
const CONFIG_DIRNAME = "loglens";
const CONFIG_FILENAME = "config.json5";

export function resolveUserPath(input: string, homedir: () => string = os.homedir): string {
  const trimmed = input.trim();
  if (!trimmed) return trimmed;
  if (trimmed.startsWith("~")) {
    const expanded = trimmed.replace(/^~(?=$|[\\/])/, homedir());
    return path.resolve(expanded);
  }
  return path.resolve(trimmed);
}

/**
 * `$XDG_CONFIG_HOME/loglens/config.json5`, falling back to
 * `~/.config/loglens/config.json5`.
 */
export function resolveDefaultConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const xdg = env.XDG_CONFIG_HOME?.trim();
  const base = xdg ? resolveUserPath(xdg, homedir) : path.join(homedir(), ".config");
  return path.join(base, CONFIG_DIRNAME, CONFIG_FILENAME);
}

export type ConfigPathChoice = {
  path: string;
  /** Explicit paths must exist; the default location may be absent. */
  explicit: boolean;
};

export function resolveConfigPath(
  requested: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): ConfigPathChoice {
  const explicit = requested?.trim() || env[CONFIG_PATH_ENV]?.trim();
  if (explicit) return { path: resolveUserPath(explicit, homedir), explicit: true };
  return { path: resolveDefaultConfigPath(env, homedir), explicit: false };
}
