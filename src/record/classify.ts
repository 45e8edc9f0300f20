import type { JsonEntry, JsonObject, JsonValue } from "./json-value.js";
import { normalizeSeverity, type Severity } from "./severity.js";

export type FieldRole = "timestamp" | "level" | "message";

/** Candidate keys per role, in priority order. */
export type FieldCandidates = Record<FieldRole, readonly string[]>;

export const DEFAULT_FIELD_CANDIDATES: FieldCandidates = {
  timestamp: ["timestamp", "time", "ts", "@timestamp", "datetime"],
  level: ["level", "lvl", "severity", "loglevel"],
  message: ["message", "msg", "@message"],
};

export type LevelField = JsonEntry & { severity: Severity };

export type ClassifiedFields = {
  timestamp?: JsonEntry;
  level?: LevelField;
  message?: JsonEntry;
  longText: JsonEntry[];
  remaining: JsonEntry[];
};

const ELIGIBLE_KINDS: Record<FieldRole, ReadonlySet<JsonValue["kind"]>> = {
  timestamp: new Set(["string", "number"]),
  level: new Set(["string", "number", "boolean"]),
  message: new Set(["string", "number", "boolean"]),
};

export function isLongText(value: JsonValue): boolean {
  return value.kind === "string" && value.value.includes("\n");
}

function claimRole(
  object: JsonObject,
  role: FieldRole,
  candidates: readonly string[],
  claimed: Set<string>,
): JsonEntry | undefined {
  const eligible = ELIGIBLE_KINDS[role];
  for (const key of candidates) {
    if (claimed.has(key)) continue;
    const entry = object.entries.find((candidate) => candidate.key === key);
    if (!entry || !eligible.has(entry.value.kind)) continue;
    claimed.add(key);
    return entry;
  }
  return undefined;
}

/**
 * Partitions an object's fields into roles. Roles are claimed in the order
 * timestamp, level, message; a key is claimed at most once. Unclaimed string
 * fields containing a newline become long text, the rest stay in source order.
 */
export function classifyFields(
  object: JsonObject,
  candidates: FieldCandidates = DEFAULT_FIELD_CANDIDATES,
): ClassifiedFields {
  const claimed = new Set<string>();
  const timestamp = claimRole(object, "timestamp", candidates.timestamp, claimed);
  const levelEntry = claimRole(object, "level", candidates.level, claimed);
  const message = claimRole(object, "message", candidates.message, claimed);

  const longText: JsonEntry[] = [];
  const remaining: JsonEntry[] = [];
  for (const entry of object.entries) {
    if (claimed.has(entry.key)) continue;
    if (isLongText(entry.value)) {
      longText.push(entry);
    } else {
      remaining.push(entry);
    }
  }

  return {
    timestamp,
    level: levelEntry ? { ...levelEntry, severity: normalizeSeverity(levelEntry.value) } : undefined,
    message,
    longText,
    remaining,
  };
}
