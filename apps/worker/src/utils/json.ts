export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Convert bigint values to decimal strings so a value can go through JSON
 */
export function toJsonSafe(value: unknown): JsonValue {
  return JSON.parse(
    JSON.stringify(value, (_, v: unknown) => (typeof v === "bigint" ? v.toString() : v))
  );
}
