export const INVALID_CONFIG = "INVALID_CONFIG";

export type ConfigIssue = {
  path: string;
  message: string;
};

export function formatConfigIssues(issues: ConfigIssue[]): string {
  return issues.map((iss) => `- ${iss.path || "<root>"}: ${iss.message}`).join("\n");
}

/** Raised before any input is read when options or the config file are invalid. */
export class ConfigError extends Error {
  readonly code = INVALID_CONFIG;
  readonly issues: ConfigIssue[];

  constructor(summary: string, issues: ConfigIssue[] = []) {
    super(issues.length > 0 ? `${summary}:\n${formatConfigIssues(issues)}` : summary);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function extractErrorCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object") return undefined;
  const code = "code" in err ? err.code : undefined;
  if (typeof code === "string") return code;
  if (typeof code === "number") return String(code);
  return undefined;
}

export function isBrokenPipeError(err: unknown): boolean {
  const code = extractErrorCode(err);
  return code === "EPIPE" || code === "EIO";
}

export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message || err.name || "Error";
  }
  if (typeof err === "string") return err;
  if (typeof err === "number" || typeof err === "boolean" || typeof err === "bigint") {
    return String(err);
  }
  try {
    return JSON.stringify(err);
  } catch {
    return Object.prototype.toString.call(err);
  }
}

export function formatUncaughtError(err: unknown): string {
  if (extractErrorCode(err) === INVALID_CONFIG) {
    return formatErrorMessage(err);
  }
  if (err instanceof Error) {
    return err.stack ?? err.message ?? err.name;
  }
  return formatErrorMessage(err);
}
