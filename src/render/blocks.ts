import { containerEntries, isContainer, isEmptyContainer, type JsonEntry } from "../record/json-value.js";
import { indentSegment, punctuation, type StyledLine, type StyledSegment } from "./segments.js";
import { fieldSegments } from "./values.js";

type BlockTask = {
  entry: JsonEntry;
  // nesting below the field itself; 0 for the field's own heading
  level: number;
};

/** Lines of a multi-line value; one trailing newline does not add a blank line. */
export function splitTextLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines.length > 1 && lines[lines.length - 1] === "") lines.pop();
  return lines;
}

function heading(entry: JsonEntry, prefix: StyledSegment[], level: number): StyledLine {
  return [...prefix, { role: "key", text: entry.key, depth: level }, punctuation(":")];
}

/**
 * Expands a field into a `key:` heading followed by its children, one indent
 * level deeper per nesting boundary. Containers are always expanded here;
 * multi-line strings print verbatim below their heading.
 */
export function renderFieldBlock(entry: JsonEntry, baseDepth: number, indent: number): StyledLine[] {
  const lines: StyledLine[] = [];
  const stack: BlockTask[] = [{ entry, level: 0 }];
  for (let task = stack.pop(); task; task = stack.pop()) {
    const { entry: current, level } = task;
    const depth = baseDepth + level;
    const prefix = indentSegment(depth, indent);
    const value = current.value;

    if (value.kind === "string" && value.value.includes("\n")) {
      lines.push(heading(current, prefix, level));
      const body = indentSegment(depth + 1, indent);
      for (const text of splitTextLines(value.value)) {
        lines.push([...body, { role: "long-text", text }]);
      }
      continue;
    }

    if (isContainer(value) && !isEmptyContainer(value)) {
      lines.push(heading(current, prefix, level));
      const children = containerEntries(value);
      for (let i = children.length - 1; i >= 0; i -= 1) {
        const child = children[i];
        if (child) stack.push({ entry: child, level: level + 1 });
      }
      continue;
    }

    lines.push([...prefix, ...fieldSegments(current, level)]);
  }
  return lines;
}
