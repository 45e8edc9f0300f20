export const ALLOWED_LOG_LEVELS = [
  "silent",
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
] as const;

export type LogLevel = (typeof ALLOWED_LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return ALLOWED_LOG_LEVELS.some((level) => level === value);
}

export function normalizeLogLevel(level?: string, fallback: LogLevel = "warn"): LogLevel {
  const candidate = (level ?? "").trim().toLowerCase();
  return isLogLevel(candidate) ? candidate : fallback;
}

export function levelToMinLevel(level: LogLevel): number {
  // tslog level ids: silly=0, trace=1, debug=2, info=3, warn=4, error=5, fatal=6
  const map: Record<LogLevel, number> = {
    trace: 1,
    debug: 2,
    info: 3,
    warn: 4,
    error: 5,
    fatal: 6,
    silent: Number.POSITIVE_INFINITY,
  };
  return map[level];
}
