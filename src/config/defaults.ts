import { DEFAULT_FIELD_CANDIDATES } from "../record/classify.js";
import { DEFAULT_INDENT } from "../render/render-record.js";
import type { ColorMode } from "../terminal/theme.js";
import type { ColorModeInput, ResolvedConfig } from "./types.js";

export const DEFAULT_CONFIG: ResolvedConfig = {
  color: "auto",
  timestampFormat: "auto",
  indent: DEFAULT_INDENT,
  candidates: DEFAULT_FIELD_CANDIDATES,
  theme: {},
};

export function normalizeColorMode(input: ColorModeInput): ColorMode {
  switch (input) {
    case "always":
      return "on";
    case "never":
      return "off";
    default:
      return input;
  }
}
