import { Chalk, type ChalkInstance } from "chalk";

import type { StyledLine } from "../render/segments.js";
import type { StyleDescriptor } from "./palette.js";
import type { StylePolicy } from "./theme.js";

export type SegmentFormatter = {
  formatLine: (line: StyledLine) => string;
  formatLines: (lines: StyledLine[]) => string;
};

export function applyStyle(chalk: ChalkInstance, style: StyleDescriptor, text: string): string {
  if (!text) return text;
  let styler = chalk;
  let styled = false;
  if (style.color) {
    styler = styler[style.color];
    styled = true;
  }
  if (style.bold) {
    styler = styler.bold;
    styled = true;
  }
  if (style.dim) {
    styler = styler.dim;
    styled = true;
  }
  if (style.italic) {
    styler = styler.italic;
    styled = true;
  }
  if (style.underline) {
    styler = styler.underline;
    styled = true;
  }
  return styled ? styler(text) : text;
}

/** Turns styled lines into terminal text; a policy without color yields plain text. */
export function createSegmentFormatter(policy: StylePolicy): SegmentFormatter {
  // Named colors only, so basic 16-color output covers every style.
  const chalk = new Chalk({ level: policy.colorEnabled ? 1 : 0 });
  const formatLine = (line: StyledLine) =>
    line.map((segment) => applyStyle(chalk, policy.resolve(segment), segment.text)).join("");
  return {
    formatLine,
    formatLines: (lines) => lines.map(formatLine).join("\n"),
  };
}
