import type { Severity } from "../record/severity.js";

export type SegmentRole =
  | "plain"
  | "unrecognized"
  | "timestamp"
  | "level"
  | "message"
  | "key"
  | "string"
  | "number"
  | "boolean"
  | "null"
  | "punctuation"
  | "long-text";

export type StyledSegment =
  | { role: "level"; text: string; severity: Severity }
  | { role: "key"; text: string; depth: number }
  | { role: Exclude<SegmentRole, "level" | "key">; text: string };

/** One output line; a rendered record is a list of these. */
export type StyledLine = StyledSegment[];

export const plain = (text: string): StyledSegment => ({ role: "plain", text });

export const punctuation = (text: string): StyledSegment => ({ role: "punctuation", text });

export function indentSegment(depth: number, width: number): StyledSegment[] {
  return depth > 0 && width > 0 ? [plain(" ".repeat(depth * width))] : [];
}

export function lineText(line: StyledLine): string {
  return line.map((segment) => segment.text).join("");
}

/** Unstyled text of a rendered record, lines joined with `\n`. */
export function linesText(lines: StyledLine[]): string {
  return lines.map(lineText).join("\n");
}
