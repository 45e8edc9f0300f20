import type { Logger as TsLogger } from "tslog";

import type { LogObj, LoggerSettings, ResolvedLoggerSettings } from "./logger.js";

type LoggingState = {
  cachedLogger: TsLogger<LogObj> | null;
  cachedSettings: ResolvedLoggerSettings | null;
  overrideSettings: LoggerSettings | null;
  childLoggers: Map<string, TsLogger<LogObj>>;
};

export const loggingState: LoggingState = {
  cachedLogger: null,
  cachedSettings: null,
  overrideSettings: null,
  childLoggers: new Map(),
};
