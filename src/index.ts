export { parseJson, JsonSyntaxError } from "./record/json-scanner.js";
export type {
  JsonArray,
  JsonBoolean,
  JsonEntry,
  JsonNull,
  JsonNumber,
  JsonObject,
  JsonString,
  JsonValue,
} from "./record/json-value.js";
export { parseRecord, type LogRecord } from "./record/parse-record.js";
export {
  classifyFields,
  DEFAULT_FIELD_CANDIDATES,
  type ClassifiedFields,
  type FieldCandidates,
  type FieldRole,
} from "./record/classify.js";
export {
  normalizeSeverity,
  normalizeSeverityName,
  SEVERITIES,
  type Severity,
} from "./record/severity.js";
export {
  DEFAULT_RENDER_OPTIONS,
  renderFields,
  renderRecord,
  type RenderOptions,
} from "./render/render-record.js";
export { formatTimestamp, TIMESTAMP_FORMATS, type TimestampFormat } from "./render/timestamp.js";
export { lineText, linesText, type StyledLine, type StyledSegment } from "./render/segments.js";
export { DEFAULT_THEME, type StyleDescriptor, type ThemeRole } from "./terminal/palette.js";
export {
  createStylePolicy,
  resolveColorEnabled,
  type ColorMode,
  type StylePolicy,
  type ThemeOverrides,
} from "./terminal/theme.js";
export { createSegmentFormatter } from "./terminal/format-segments.js";
export { transformLines, type TransformLinesOptions } from "./stream/transform-lines.js";
export { resolveConfig, type ResolvedConfig } from "./config/config.js";
export { ConfigError } from "./infra/errors.js";
export { generateSampleLines } from "./sample/generate-lines.js";
