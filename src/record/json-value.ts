export type JsonEntry = {
  key: string;
  value: JsonValue;
};

export type JsonObject = { kind: "object"; entries: JsonEntry[] };
export type JsonArray = { kind: "array"; items: JsonValue[] };
export type JsonString = { kind: "string"; value: string };
/** `raw` is the exact source token; it is never converted for display. */
export type JsonNumber = { kind: "number"; raw: string };
export type JsonBoolean = { kind: "boolean"; value: boolean };
export type JsonNull = { kind: "null" };

export type JsonContainer = JsonObject | JsonArray;
export type JsonScalar = JsonString | JsonNumber | JsonBoolean | JsonNull;
export type JsonValue = JsonContainer | JsonScalar;

export function isContainer(value: JsonValue): value is JsonContainer {
  return value.kind === "object" || value.kind === "array";
}

export function isEmptyContainer(value: JsonContainer): boolean {
  return value.kind === "object" ? value.entries.length === 0 : value.items.length === 0;
}

/** Children of a container as entries; array items are labelled `[index]`. */
export function containerEntries(value: JsonContainer): JsonEntry[] {
  if (value.kind === "object") return value.entries;
  return value.items.map((item, index) => ({ key: `[${index}]`, value: item }));
}

export function findEntry(object: JsonObject, key: string): JsonEntry | undefined {
  return object.entries.find((entry) => entry.key === key);
}
