import type { StyledSegment } from "../render/segments.js";
import {
  DEFAULT_THEME,
  LEVEL_THEME_ROLES,
  type StyleDescriptor,
  type Theme,
  type ThemeRole,
} from "./palette.js";

export type ColorMode = "auto" | "on" | "off";

export type ThemeOverrides = {
  roles?: Partial<Record<ThemeRole, StyleDescriptor>>;
  keys?: StyleDescriptor[];
};

export type StylePolicy = {
  readonly colorEnabled: boolean;
  resolve: (segment: StyledSegment) => StyleDescriptor;
};

const NO_STYLE: StyleDescriptor = Object.freeze({});

function hasForceColor(env: NodeJS.ProcessEnv): boolean {
  const value = env.FORCE_COLOR?.trim();
  return typeof value === "string" && value.length > 0 && value !== "0";
}

/**
 * `auto` colors a terminal, or anything under `FORCE_COLOR` or `CI`;
 * `NO_COLOR` turns it off unless `FORCE_COLOR` is also set.
 */
export function resolveColorEnabled(
  mode: ColorMode,
  opts: { isTTY?: boolean; env?: NodeJS.ProcessEnv } = {},
): boolean {
  if (mode === "on") return true;
  if (mode === "off") return false;
  const env = opts.env ?? process.env;
  if (hasForceColor(env)) return true;
  if (env.NO_COLOR) return false;
  return Boolean(opts.isTTY) || Boolean(env.CI);
}

export function mergeTheme(overrides: ThemeOverrides = {}): Theme {
  const keys = overrides.keys && overrides.keys.length > 0 ? overrides.keys : DEFAULT_THEME.keys;
  return {
    roles: { ...DEFAULT_THEME.roles, ...overrides.roles },
    keys: [...keys],
  };
}

function themeRoleFor(segment: Exclude<StyledSegment, { role: "key" }>): ThemeRole {
  return segment.role === "level" ? LEVEL_THEME_ROLES[segment.severity] : segment.role;
}

export function createStylePolicy(opts: { color: boolean; theme?: ThemeOverrides }): StylePolicy {
  const theme = mergeTheme(opts.theme);
  const resolve = (segment: StyledSegment): StyleDescriptor => {
    if (!opts.color) return NO_STYLE;
    if (segment.role === "key") {
      return theme.keys[segment.depth % theme.keys.length] ?? NO_STYLE;
    }
    return theme.roles[themeRoleFor(segment)];
  };
  return Object.freeze({ colorEnabled: opts.color, resolve });
}
