export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | {
      [key: string]: JsonValue;
    };

export type JsonObject = { [key: string]: JsonValue };

const MAX_JSON_DEPTH = 32;

/**
 * Copies an arbitrary value into plain JSON data. `undefined` becomes null,
 * non-finite numbers and anything unrepresentable become strings.
 */
export function toJsonValue(value: unknown, depth = 0): JsonValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : String(value);
  }
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (depth >= MAX_JSON_DEPTH) {
    return "[Truncated depth]";
  }
  if (Array.isArray(value)) {
    return value.map((entry) => toJsonValue(entry, depth + 1));
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (typeof value === "object") {
    const record: JsonObject = {};
    for (const [key, entry] of Object.entries(value)) {
      if (entry === undefined || typeof entry === "function") {
        continue;
      }
      record[key] = toJsonValue(entry, depth + 1);
    }
    return record;
  }
  return String(value);
}

export function isJsonObject(value: unknown): value is JsonObject {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
