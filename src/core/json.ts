export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value) && isJsonSafe(value);
}

// Walks the value and rejects anything JSON.stringify would drop or mangle.
export function isJsonSafe(value: unknown): value is JsonValue {
  const seen = new Set<unknown>();

  const walk = (v: unknown): boolean => {
    if (v === null) return true;
    if (typeof v === "string" || typeof v === "boolean") return true;
    if (typeof v === "number") return Number.isFinite(v);
    if (typeof v !== "object") return false;

    if (seen.has(v)) return false;
    seen.add(v);

    if (Array.isArray(v)) return v.every(walk);

    const proto: unknown = Object.getPrototypeOf(v);
    if (proto !== Object.prototype && proto !== null) return false;
    return Object.values(v).every(walk);
  };

  return walk(value);
}
