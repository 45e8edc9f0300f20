import type { Logger as TsLogger } from "tslog";

import type { LogLevel } from "./levels.js";
import { getChildLogger, isLogLevelEnabled, type LogObj } from "./logger.js";

type EmitLevel = Exclude<LogLevel, "silent">;

export type SubsystemLogger = {
  subsystem: string;
  isEnabled: (level: EmitLevel) => boolean;
  trace: (message: string, meta?: Record<string, unknown>) => void;
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
  fatal: (message: string, meta?: Record<string, unknown>) => void;
  child: (name: string) => SubsystemLogger;
};

function logTo(
  logger: TsLogger<LogObj>,
  level: EmitLevel,
  message: string,
  meta?: Record<string, unknown>,
) {
  const args: unknown[] = meta && Object.keys(meta).length > 0 ? [message, meta] : [message];
  switch (level) {
    case "trace":
      logger.trace(...args);
      return;
    case "debug":
      logger.debug(...args);
      return;
    case "info":
      logger.info(...args);
      return;
    case "warn":
      logger.warn(...args);
      return;
    case "error":
      logger.error(...args);
      return;
    case "fatal":
      logger.fatal(...args);
      return;
  }
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const emit = (level: EmitLevel, message: string, meta?: Record<string, unknown>) => {
    // Per-line diagnostics are common and usually disabled; skip building the logger.
    if (!isLogLevelEnabled(level)) return;
    logTo(getChildLogger({ subsystem }), level, message, meta);
  };

  return {
    subsystem,
    isEnabled: (level) => isLogLevelEnabled(level),
    trace: (message, meta) => emit("trace", message, meta),
    debug: (message, meta) => emit("debug", message, meta),
    info: (message, meta) => emit("info", message, meta),
    warn: (message, meta) => emit("warn", message, meta),
    error: (message, meta) => emit("error", message, meta),
    fatal: (message, meta) => emit("fatal", message, meta),
    child: (name) => createSubsystemLogger(`${subsystem}/${name}`),
  };
}
