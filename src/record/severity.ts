import type { JsonValue } from "./json-value.js";

export const SEVERITIES = ["TRACE", "DEBUG", "INFO", "WARN", "ERROR", "FATAL", "UNKNOWN"] as const;

export type Severity = (typeof SEVERITIES)[number];

type KnownSeverity = Exclude<Severity, "UNKNOWN">;

const CANONICAL_SEVERITIES: readonly KnownSeverity[] = [
  "TRACE",
  "DEBUG",
  "INFO",
  "WARN",
  "ERROR",
  "FATAL",
];

// Spellings that are neither a canonical name, an extension of one, nor a prefix of one.
const SEVERITY_ALIASES = new Map<string, KnownSeverity>(Object.entries({
  trc: "TRACE",
  trce: "TRACE",
  verbose: "TRACE",
  dbg: "DEBUG",
  dbug: "DEBUG",
  notice: "INFO",
  wrn: "WARN",
  eror: "ERROR",
  crit: "FATAL",
  critical: "FATAL",
  alert: "FATAL",
  emerg: "FATAL",
  emergency: "FATAL",
  panic: "FATAL",
  ftl: "FATAL",
} satisfies Record<string, KnownSeverity>));

/**
 * Maps a level string to a canonical severity, ignoring case.
 *
 * Accepts the canonical names, the aliases above, values that start with a
 * canonical name (`warning`, `information`) and non-empty prefixes of one
 * (`w`, `inf`). Everything else is `UNKNOWN`.
 */
export function normalizeSeverityName(text: string): Severity {
  const lower = text.trim().toLowerCase();
  if (!lower) return "UNKNOWN";
  const alias = SEVERITY_ALIASES.get(lower);
  if (alias) return alias;
  for (const severity of CANONICAL_SEVERITIES) {
    const name = severity.toLowerCase();
    if (lower.startsWith(name) || name.startsWith(lower)) return severity;
  }
  return "UNKNOWN";
}

export function normalizeSeverity(value: JsonValue): Severity {
  return value.kind === "string" ? normalizeSeverityName(value.value) : "UNKNOWN";
}
