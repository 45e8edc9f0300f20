import {
  containerEntries,
  isContainer,
  isEmptyContainer,
  type JsonContainer,
  type JsonEntry,
  type JsonValue,
} from "../record/json-value.js";
import { isLongText } from "../record/classify.js";
import { plain, punctuation, type StyledSegment } from "./segments.js";

const NEEDS_QUOTES = /[\s"\\=]/;

/** Bare unless empty or holding whitespace, quotes, backslashes or `=`; then JSON-quoted. */
export function formatStringValue(text: string): string {
  return text === "" || NEEDS_QUOTES.test(text) ? JSON.stringify(text) : text;
}

/** Unquoted text of a value, as shown for timestamps, levels and messages. */
export function scalarText(value: JsonValue): string {
  switch (value.kind) {
    case "string":
      return value.value;
    case "number":
      return value.raw;
    case "boolean":
      return String(value.value);
    case "null":
      return "null";
    case "object":
      return value.entries.length === 0 ? "{}" : "{…}";
    case "array":
      return value.items.length === 0 ? "[]" : "[…]";
  }
}

/**
 * A container is large when it holds a non-empty container or a multi-line
 * string; large values get their own block below the main line.
 */
export function isLargeValue(value: JsonValue): boolean {
  if (!isContainer(value)) return false;
  return containerEntries(value).some(
    ({ value: child }) => (isContainer(child) && !isEmptyContainer(child)) || isLongText(child),
  );
}

function containerBrackets(value: JsonContainer): [string, string] {
  return value.kind === "object" ? ["{", "}"] : ["[", "]"];
}

function scalarSegments(value: JsonValue): StyledSegment[] {
  switch (value.kind) {
    case "string":
      return [{ role: "string", text: formatStringValue(value.value) }];
    case "number":
      return [{ role: "number", text: value.raw }];
    case "boolean":
      return [{ role: "boolean", text: String(value.value) }];
    case "null":
      return [{ role: "null", text: "null" }];
    case "object":
    case "array": {
      const [open, close] = containerBrackets(value);
      return [punctuation(`${open}${close}`)];
    }
  }
}

/**
 * Single-line rendering of a value that is not large: scalars, empty
 * containers, and flat containers as `{a=1 b=x}` or `[1 2 3]`.
 */
export function inlineValueSegments(value: JsonValue, depth: number): StyledSegment[] {
  if (!isContainer(value) || isEmptyContainer(value)) return scalarSegments(value);
  const [open, close] = containerBrackets(value);
  const segments: StyledSegment[] = [punctuation(open)];
  if (value.kind === "object") {
    value.entries.forEach((entry, index) => {
      if (index > 0) segments.push(plain(" "));
      segments.push(...fieldSegments(entry, depth + 1));
    });
  } else {
    value.items.forEach((item, index) => {
      if (index > 0) segments.push(plain(" "));
      segments.push(...scalarSegments(item));
    });
  }
  segments.push(punctuation(close));
  return segments;
}

/** `key=value` for a field that fits on one line. */
export function fieldSegments(entry: JsonEntry, depth: number): StyledSegment[] {
  return [
    { role: "key", text: entry.key, depth },
    punctuation("="),
    ...inlineValueSegments(entry.value, depth),
  ];
}
