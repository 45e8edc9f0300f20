import type { ForegroundColorName } from "chalk";

import type { Severity } from "../record/severity.js";

export const COLOR_NAMES = [
  "black",
  "red",
  "green",
  "yellow",
  "blue",
  "magenta",
  "cyan",
  "white",
  "gray",
  "redBright",
  "greenBright",
  "yellowBright",
  "blueBright",
  "magentaBright",
  "cyanBright",
  "whiteBright",
] as const satisfies readonly ForegroundColorName[];

export type ColorName = (typeof COLOR_NAMES)[number];

export type StyleDescriptor = {
  color?: ColorName;
  bold?: boolean;
  dim?: boolean;
  italic?: boolean;
  underline?: boolean;
};

export const THEME_ROLES = [
  "plain",
  "unrecognized",
  "timestamp",
  "level.trace",
  "level.debug",
  "level.info",
  "level.warn",
  "level.error",
  "level.fatal",
  "level.unknown",
  "message",
  "string",
  "number",
  "boolean",
  "null",
  "punctuation",
  "long-text",
] as const;

export type ThemeRole = (typeof THEME_ROLES)[number];

export type Theme = {
  roles: Record<ThemeRole, StyleDescriptor>;
  /** Key styles, cycled by nesting depth. */
  keys: readonly StyleDescriptor[];
};

export const LEVEL_THEME_ROLES: Record<Severity, ThemeRole> = {
  TRACE: "level.trace",
  DEBUG: "level.debug",
  INFO: "level.info",
  WARN: "level.warn",
  ERROR: "level.error",
  FATAL: "level.fatal",
  UNKNOWN: "level.unknown",
};

export const DEFAULT_THEME: Theme = {
  roles: {
    plain: {},
    unrecognized: {},
    timestamp: { dim: true },
    "level.trace": { dim: true },
    "level.debug": { color: "blue", dim: true },
    "level.info": { color: "cyan" },
    "level.warn": { color: "yellow" },
    "level.error": { color: "red" },
    "level.fatal": { color: "red", bold: true },
    "level.unknown": {},
    message: {},
    string: {},
    number: { color: "magenta" },
    boolean: { color: "magenta" },
    null: { color: "gray" },
    punctuation: { dim: true },
    "long-text": {},
  },
  keys: [
    { color: "blue" },
    { color: "cyan" },
    { color: "green" },
    { color: "blue", dim: true },
    { color: "cyan", dim: true },
    { color: "green", dim: true },
  ],
};
