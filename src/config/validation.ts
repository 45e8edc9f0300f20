import type { LoglensConfig, ConfigValidationIssue } from "./types.js";
import { LoglensSchema } from "./zod-schema.js";

export function validateConfigObject(
  raw: unknown,
): { ok: true; config: LoglensConfig } | { ok: false; issues: ConfigValidationIssue[] } {
  const validated = LoglensSchema.safeParse(raw);
  if (!validated.success) {
    return {
      ok: false,
      issues: validated.error.issues.map((iss) => ({
        path: iss.path.join("."),
        message: iss.message,
      })),
    };
  }
  return { ok: true, config: validated.data };
}
