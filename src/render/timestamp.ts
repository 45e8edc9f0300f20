import type { JsonValue } from "../record/json-value.js";
import { scalarText } from "./values.js";

export const TIMESTAMP_FORMATS = ["auto", "seconds", "millis", "micros", "nanos", "raw"] as const;

export type TimestampFormat = (typeof TIMESTAMP_FORMATS)[number];

export type TimestampUnit = Exclude<TimestampFormat, "auto" | "raw">;

// 3000-01-01T00:00:00Z
const YEAR_3000_SECONDS = 32_503_680_000;

/** Guesses the epoch unit of a numeric timestamp from its magnitude. */
export function detectTimestampUnit(magnitude: number): TimestampUnit {
  if (magnitude < YEAR_3000_SECONDS) return "seconds";
  if (magnitude < YEAR_3000_SECONDS * 1e3) return "millis";
  if (magnitude < YEAR_3000_SECONDS * 1e6) return "micros";
  return "nanos";
}

const INTEGER_TOKEN = /^-?\d+$/;

const SUBMILLI_DIVISORS = { micros: 1_000n, nanos: 1_000_000n } as const;

// Exact for integer tokens past 2^53.
function floorDivide(raw: string, divisor: bigint): number {
  const value = BigInt(raw);
  const quotient = value / divisor;
  return Number(value % divisor < 0n ? quotient - 1n : quotient);
}

function toEpochMillis(raw: string, value: number, unit: TimestampUnit): number {
  switch (unit) {
    case "seconds":
      return Math.round(value * 1000);
    case "millis":
      return Math.round(value);
    case "micros":
    case "nanos":
      if (INTEGER_TOKEN.test(raw)) return floorDivide(raw, SUBMILLI_DIVISORS[unit]);
      return Math.floor(value / (unit === "micros" ? 1_000 : 1_000_000));
  }
}

/**
 * Numbers become ISO-8601 UTC; whole seconds drop the millisecond part.
 * Strings, `raw` and anything outside the representable date range print as-is.
 */
export function formatTimestamp(value: JsonValue, format: TimestampFormat): string {
  if (value.kind !== "number" || format === "raw") return scalarText(value);
  const numeric = Number(value.raw);
  if (!Number.isFinite(numeric)) return value.raw;
  const unit = format === "auto" ? detectTimestampUnit(Math.abs(numeric)) : format;
  const date = new Date(toEpochMillis(value.raw, numeric, unit));
  if (Number.isNaN(date.getTime())) return value.raw;
  const iso = date.toISOString();
  return unit === "seconds" && iso.endsWith(".000Z") ? `${iso.slice(0, -5)}Z` : iso;
}
