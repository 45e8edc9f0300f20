import { Chalk, type ChalkInstance } from "chalk";
import { Logger as TsLogger } from "tslog";

import { isVerbose } from "../globals.js";
import { resolveColorEnabled } from "../terminal/theme.js";
import { type LogLevel, levelToMinLevel, normalizeLogLevel } from "./levels.js";
import { loggingState } from "./state.js";

export const LOG_LEVEL_ENV = "LOGLENS_LOG_LEVEL";

export type LogSink = (line: string) => void;

export type LoggerSettings = {
  level?: LogLevel;
  sink?: LogSink;
  color?: boolean;
};

export type ResolvedLoggerSettings = {
  level: LogLevel;
  sink: LogSink;
  color: boolean;
};

export type LogObj = Record<string, unknown>;

const defaultSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

function resolveLevel(): LogLevel {
  const override = loggingState.overrideSettings?.level;
  if (override) return override;
  return isVerbose() ? "debug" : normalizeLogLevel(process.env[LOG_LEVEL_ENV]);
}

function resolveSettings(): ResolvedLoggerSettings {
  const override = loggingState.overrideSettings;
  return {
    level: resolveLevel(),
    sink: override?.sink ?? defaultSink,
    color:
      override?.color ?? resolveColorEnabled("auto", { isTTY: Boolean(process.stderr.isTTY) }),
  };
}

function settingsChanged(a: ResolvedLoggerSettings | null, b: ResolvedLoggerSettings) {
  if (!a) return true;
  return a.level !== b.level || a.sink !== b.sink || a.color !== b.color;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value && typeof value === "object" && !Array.isArray(value));
}

// tslog stores positional arguments under "0", "1", ...
function extractMessage(logObj: LogObj): string {
  const parts: string[] = [];
  for (const key of Object.keys(logObj)) {
    if (!/^\d+$/.test(key)) continue;
    const item = logObj[key];
    if (typeof item === "string") {
      parts.push(item);
    } else if (item != null) {
      parts.push(JSON.stringify(item));
    }
  }
  return parts.join(" ");
}

function parseSubsystem(name: unknown): string {
  if (typeof name !== "string") return "loglens";
  try {
    const parsed: unknown = JSON.parse(name);
    if (isRecord(parsed) && typeof parsed.subsystem === "string") return parsed.subsystem;
  } catch {
    // plain logger name
  }
  return name;
}

const SUBSYSTEM_COLORS = ["cyan", "green", "yellow", "blue", "magenta"] as const;

function pickSubsystemColor(color: ChalkInstance, subsystem: string): ChalkInstance {
  let hash = 0;
  for (let i = 0; i < subsystem.length; i += 1) {
    hash = (hash * 31 + subsystem.charCodeAt(i)) | 0;
  }
  const name = SUBSYSTEM_COLORS[Math.abs(hash) % SUBSYSTEM_COLORS.length] ?? "cyan";
  return color[name];
}

export function formatDiagnosticLine(logObj: LogObj, rich: boolean): string {
  const color = new Chalk({ level: rich ? 1 : 0 });
  const rawMeta = logObj._meta;
  const meta: Record<string, unknown> = isRecord(rawMeta) ? rawMeta : {};
  const level = typeof meta.logLevelName === "string" ? meta.logLevelName.toLowerCase() : "info";
  const date = meta.date instanceof Date ? meta.date : new Date();
  const subsystem = parseSubsystem(meta.name);
  const levelColor =
    level === "error" || level === "fatal"
      ? color.red
      : level === "warn"
        ? color.yellow
        : level === "debug" || level === "trace"
          ? color.gray
          : color.cyan;
  const head = [
    color.gray(date.toISOString()),
    pickSubsystemColor(color, subsystem)(`[${subsystem}]`),
  ];
  return `${head.join(" ")} ${levelColor(`${level}: ${extractMessage(logObj)}`)}`;
}

function buildLogger(settings: ResolvedLoggerSettings): TsLogger<LogObj> {
  const logger = new TsLogger<LogObj>({
    name: "loglens",
    minLevel: levelToMinLevel(settings.level),
    type: "hidden", // formatting happens in the transport
  });
  logger.attachTransport((logObj: LogObj) => {
    try {
      settings.sink(formatDiagnosticLine(logObj, settings.color));
    } catch {
      // never block on logging failures
    }
  });
  return logger;
}

export function getLogger(): TsLogger<LogObj> {
  const settings = resolveSettings();
  const cachedLogger = loggingState.cachedLogger;
  if (!cachedLogger || settingsChanged(loggingState.cachedSettings, settings)) {
    const logger = buildLogger(settings);
    loggingState.cachedLogger = logger;
    loggingState.cachedSettings = settings;
    loggingState.childLoggers.clear();
    return logger;
  }
  return cachedLogger;
}

export function getChildLogger(bindings: Record<string, unknown>): TsLogger<LogObj> {
  const base = getLogger();
  const name = JSON.stringify(bindings);
  const cached = loggingState.childLoggers.get(name);
  if (cached) return cached;
  const child = base.getSubLogger({ name });
  loggingState.childLoggers.set(name, child);
  return child;
}

export function isLogLevelEnabled(level: LogLevel): boolean {
  const current = resolveLevel();
  if (current === "silent" || level === "silent") return false;
  return levelToMinLevel(level) >= levelToMinLevel(current);
}

export function getResolvedLoggerSettings(): ResolvedLoggerSettings {
  return resolveSettings();
}

// Test helpers
export function setLoggerOverride(settings: LoggerSettings | null) {
  loggingState.overrideSettings = settings;
  loggingState.cachedLogger = null;
  loggingState.cachedSettings = null;
  loggingState.childLoggers.clear();
}

export function resetLogger() {
  setLoggerOverride(null);
}
