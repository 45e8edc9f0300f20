import type { z } from "zod";

import type { FieldCandidates } from "../record/classify.js";
import type { TimestampFormat } from "../render/timestamp.js";
import type { ColorMode, ThemeOverrides } from "../terminal/theme.js";
import type { ConfigIssue } from "../infra/errors.js";
import type { COLOR_MODE_INPUTS, LoglensSchema } from "./zod-schema.js";

/** Contents of the configuration file, after validation. */
export type LoglensConfig = z.infer<typeof LoglensSchema>;

export type ColorModeInput = (typeof COLOR_MODE_INPUTS)[number];

export type ConfigValidationIssue = ConfigIssue;

export type ConfigFileSnapshot = {
  path: string;
  exists: boolean;
  config: LoglensConfig;
};

/** Raw option values as commander hands them over. */
export type ConfigOverrides = {
  configPath?: string;
  /** `false` comes from `--no-color`. */
  color?: string | false;
  timestampFormat?: string;
  indent?: string;
  timestampKeys?: string;
  levelKeys?: string;
  messageKeys?: string;
};

export type ResolvedConfig = {
  color: ColorMode;
  timestampFormat: TimestampFormat;
  indent: number;
  candidates: FieldCandidates;
  theme: ThemeOverrides;
  /** Set when a configuration file was read. */
  configPath?: string;
};
