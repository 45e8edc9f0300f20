import {
  classifyFields,
  DEFAULT_FIELD_CANDIDATES,
  type ClassifiedFields,
  type FieldCandidates,
} from "../record/classify.js";
import type { LogRecord } from "../record/parse-record.js";
import { renderFieldBlock, splitTextLines } from "./blocks.js";
import { indentSegment, plain, type StyledLine, type StyledSegment } from "./segments.js";
import { formatTimestamp, type TimestampFormat } from "./timestamp.js";
import { fieldSegments, isLargeValue, scalarText } from "./values.js";

export type RenderOptions = {
  timestampFormat: TimestampFormat;
  /** Spaces per nesting level. */
  indent: number;
  candidates: FieldCandidates;
};

export const DEFAULT_INDENT = 2;
export const LEVEL_COLUMN_WIDTH = 5;

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  timestampFormat: "auto",
  indent: DEFAULT_INDENT,
  candidates: DEFAULT_FIELD_CANDIDATES,
};

/**
 * Lays out classified fields: a main line of timestamp, level, message and
 * small fields, then blocks for large fields, then long text.
 */
export function renderFields(fields: ClassifiedFields, options: RenderOptions): StyledLine[] {
  const groups: StyledSegment[][] = [];
  const trailing: StyledLine[] = [];

  if (fields.timestamp) {
    groups.push([
      { role: "timestamp", text: formatTimestamp(fields.timestamp.value, options.timestampFormat) },
    ]);
  }

  let levelGroup: StyledSegment[] | undefined;
  let levelWidth = 0;
  if (fields.level) {
    const text = scalarText(fields.level.value);
    levelWidth = text.length;
    levelGroup = [{ role: "level", text, severity: fields.level.severity }];
    groups.push(levelGroup);
  }

  const messageText = fields.message ? scalarText(fields.message.value) : "";
  if (fields.message && !messageText) {
    // An empty message still shows that the field was there.
    groups.push(fieldSegments(fields.message, 0));
  } else if (fields.message) {
    const [first = "", ...rest] = splitTextLines(messageText);
    if (first) groups.push([{ role: "message", text: first }]);
    const body = indentSegment(1, options.indent);
    for (const text of rest) {
      trailing.push([...body, { role: "message", text }]);
    }
  }

  for (const entry of fields.remaining) {
    if (isLargeValue(entry.value)) {
      trailing.push(...renderFieldBlock(entry, 1, options.indent));
    } else {
      groups.push(fieldSegments(entry, 0));
    }
  }
  for (const entry of fields.longText) {
    trailing.push(...renderFieldBlock(entry, 1, options.indent));
  }

  if (levelGroup && groups[groups.length - 1] !== levelGroup) {
    if (levelWidth < LEVEL_COLUMN_WIDTH) {
      levelGroup.push(plain(" ".repeat(LEVEL_COLUMN_WIDTH - levelWidth)));
    }
  }

  const main: StyledLine = groups.flatMap((group, index) =>
    index === 0 ? group : [plain(" "), ...group],
  );
  if (main.length === 0 && trailing.length > 0) return trailing;
  return [main, ...trailing];
}

export function renderRecord(
  record: LogRecord,
  options: RenderOptions = DEFAULT_RENDER_OPTIONS,
): StyledLine[] {
  switch (record.kind) {
    case "malformed":
      return [[{ role: "unrecognized", text: record.raw }]];
    case "other":
      return [[{ role: "plain", text: record.raw }]];
    case "object":
      return renderFields(classifyFields(record.value, options.candidates), options);
  }
}
