// Recursive JSON types — defined via interface to avoid circular type alias errors.
// A JsonValue is both the record-shaped and the document-shaped payload that
// flows through the transforms; it owns its children (no sharing, no cycles).
export type JsonPrimitive = string | number | boolean | null;

// Declared as an interface to break the circular type alias restriction.
export interface JsonObject {
  [key: string]: JsonValue;
}

export interface JsonArray extends Array<JsonValue> {}

export type JsonValue = JsonPrimitive | JsonObject | JsonArray;

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return value !== null && value !== undefined && typeof value === 'object' && !Array.isArray(value);
}
