import type { JsonEntry, JsonScalar, JsonValue } from "./json-value.js";

export class JsonSyntaxError extends Error {
  readonly position: number;

  constructor(message: string, position: number) {
    super(`${message} at position ${position}`);
    this.name = "JsonSyntaxError";
    this.position = position;
  }
}

type ObjectFrame = {
  kind: "object";
  entries: JsonEntry[];
  // key -> index of its first appearance in `entries`
  positions: Map<string, number>;
  key: string;
};

type ArrayFrame = { kind: "array"; items: JsonValue[] };

type Frame = ObjectFrame | ArrayFrame;

const NUMBER_PATTERN = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y;
const HEX4_PATTERN = /^[0-9a-fA-F]{4}$/;

const SIMPLE_ESCAPES: Record<string, string> = {
  '"': '"',
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t",
};

function describeChar(ch: string): string {
  return ch === "" ? "end of input" : JSON.stringify(ch);
}

class Scanner {
  pos = 0;

  constructor(private readonly text: string) {}

  done(): boolean {
    return this.pos >= this.text.length;
  }

  peek(): string {
    return this.text.charAt(this.pos);
  }

  next(): string {
    const ch = this.text.charAt(this.pos);
    this.pos += 1;
    return ch;
  }

  error(message: string, position = this.pos): JsonSyntaxError {
    return new JsonSyntaxError(message, position);
  }

  skipWhitespace(): void {
    while (this.pos < this.text.length) {
      const code = this.text.charCodeAt(this.pos);
      if (code !== 0x20 && code !== 0x09 && code !== 0x0a && code !== 0x0d) return;
      this.pos += 1;
    }
  }

  expect(ch: string): void {
    const actual = this.peek();
    if (actual !== ch) {
      throw this.error(`Expected ${JSON.stringify(ch)} but found ${describeChar(actual)}`);
    }
    this.pos += 1;
  }

  readKey(): string {
    this.skipWhitespace();
    if (this.peek() !== '"') {
      throw this.error(`Expected object key but found ${describeChar(this.peek())}`);
    }
    const key = this.readString();
    this.skipWhitespace();
    this.expect(":");
    return key;
  }

  readString(): string {
    const open = this.pos;
    this.pos += 1;
    let out = "";
    let start = this.pos;
    while (true) {
      if (this.pos >= this.text.length) {
        throw this.error("Unterminated string", open);
      }
      const code = this.text.charCodeAt(this.pos);
      if (code === 0x22) {
        out += this.text.slice(start, this.pos);
        this.pos += 1;
        return out;
      }
      if (code === 0x5c) {
        out += this.text.slice(start, this.pos);
        out += this.readEscape();
        start = this.pos;
        continue;
      }
      if (code < 0x20) {
        throw this.error("Unescaped control character in string");
      }
      this.pos += 1;
    }
  }

  private readEscape(): string {
    const escape = this.text.charAt(this.pos + 1);
    const simple = SIMPLE_ESCAPES[escape];
    if (simple !== undefined) {
      this.pos += 2;
      return simple;
    }
    if (escape === "u") {
      const hex = this.text.slice(this.pos + 2, this.pos + 6);
      if (!HEX4_PATTERN.test(hex)) {
        throw this.error("Invalid unicode escape");
      }
      this.pos += 6;
      return String.fromCharCode(Number.parseInt(hex, 16));
    }
    throw this.error(`Invalid escape ${describeChar(escape)}`);
  }

  readScalar(): JsonScalar {
    const ch = this.peek();
    if (ch === '"') {
      return { kind: "string", value: this.readString() };
    }
    if (ch === "t") return this.readLiteral("true", { kind: "boolean", value: true });
    if (ch === "f") return this.readLiteral("false", { kind: "boolean", value: false });
    if (ch === "n") return this.readLiteral("null", { kind: "null" });
    if (ch === "-" || (ch >= "0" && ch <= "9")) {
      NUMBER_PATTERN.lastIndex = this.pos;
      const match = NUMBER_PATTERN.exec(this.text);
      if (!match) {
        throw this.error("Invalid number");
      }
      this.pos += match[0].length;
      return { kind: "number", raw: match[0] };
    }
    throw this.error(`Unexpected ${describeChar(ch)}`);
  }

  private readLiteral(word: string, value: JsonScalar): JsonScalar {
    if (!this.text.startsWith(word, this.pos)) {
      throw this.error(`Unexpected ${describeChar(this.peek())}`);
    }
    this.pos += word.length;
    return value;
  }
}

function appendToFrame(frame: Frame, value: JsonValue): void {
  if (frame.kind === "array") {
    frame.items.push(value);
    return;
  }
  const existing = frame.positions.get(frame.key);
  if (existing !== undefined) {
    frame.entries[existing] = { key: frame.key, value };
    return;
  }
  frame.positions.set(frame.key, frame.entries.length);
  frame.entries.push({ key: frame.key, value });
}

/**
 * Parses exactly one JSON value, keeping object key order and number tokens.
 *
 * Nesting is tracked on an explicit stack, so depth is limited by memory
 * rather than the call stack. A repeated object key keeps the position of its
 * first appearance and takes the value of its last.
 */
export function parseJson(text: string): JsonValue {
  const scanner = new Scanner(text);
  const stack: Frame[] = [];

  while (true) {
    scanner.skipWhitespace();
    let value: JsonValue;
    const ch = scanner.peek();
    if (ch === "{") {
      scanner.next();
      scanner.skipWhitespace();
      if (scanner.peek() === "}") {
        scanner.next();
        value = { kind: "object", entries: [] };
      } else {
        stack.push({ kind: "object", entries: [], positions: new Map(), key: scanner.readKey() });
        continue;
      }
    } else if (ch === "[") {
      scanner.next();
      scanner.skipWhitespace();
      if (scanner.peek() === "]") {
        scanner.next();
        value = { kind: "array", items: [] };
      } else {
        stack.push({ kind: "array", items: [] });
        continue;
      }
    } else {
      value = scanner.readScalar();
    }

    let frame: Frame | undefined = stack[stack.length - 1];
    while (frame) {
      appendToFrame(frame, value);
      scanner.skipWhitespace();
      const separator = scanner.next();
      if (separator === ",") break;
      const closer = frame.kind === "object" ? "}" : "]";
      if (separator !== closer) {
        throw scanner.error(
          `Expected "," or ${JSON.stringify(closer)} but found ${describeChar(separator)}`,
          scanner.pos - 1,
        );
      }
      stack.pop();
      value =
        frame.kind === "object"
          ? { kind: "object", entries: frame.entries }
          : { kind: "array", items: frame.items };
      frame = stack[stack.length - 1];
    }

    if (!frame) {
      scanner.skipWhitespace();
      if (!scanner.done()) {
        throw scanner.error(`Unexpected ${describeChar(scanner.peek())} after JSON value`);
      }
      return value;
    }
    if (frame.kind === "object") {
      frame.key = scanner.readKey();
    }
  }
}
