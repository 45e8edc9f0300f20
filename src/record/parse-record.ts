import { formatErrorMessage } from "../infra/errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { parseJson } from "./json-scanner.js";
import type { JsonObject, JsonValue } from "./json-value.js";

export type LogRecord =
  | { kind: "object"; raw: string; value: JsonObject }
  | { kind: "other"; raw: string; value: JsonValue }
  | { kind: "malformed"; raw: string; error: string };

const log = createSubsystemLogger("parse");

/**
 * Classifies one input line. Never throws: text that is not exactly one JSON
 * value comes back as `malformed` with the raw line intact.
 */
export function parseRecord(raw: string): LogRecord {
  if (!raw.trim()) {
    return { kind: "malformed", raw, error: "empty line" };
  }
  let value: JsonValue;
  try {
    value = parseJson(raw);
  } catch (err) {
    const error = formatErrorMessage(err);
    if (log.isEnabled("debug")) {
      log.debug("Failed to parse line as JSON", { error, line: raw });
    }
    return { kind: "malformed", raw, error };
  }
  if (value.kind === "object") {
    return { kind: "object", raw, value };
  }
  log.trace("Line is JSON but not an object", { kind: value.kind });
  return { kind: "other", raw, value };
}
