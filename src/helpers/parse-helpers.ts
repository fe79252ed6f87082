/**
 * Normalizes a list-of-names parameter into a string array.
 * MCP clients sometimes serialize arrays as JSON strings instead of passing
 * them as structured data, or pass a single name as a plain string.
 * Returns null if `value` is null/undefined; non-string entries are dropped.
 */
export function parseStringArrayParam(value: unknown): string[] | null {
  if (value == null) return null;
  if (Array.isArray(value)) return value.filter((v): v is string => typeof v === "string");
  if (typeof value === "string") {
    try {
      const parsed: unknown = JSON.parse(value);
      if (Array.isArray(parsed)) return parsed.filter((v): v is string => typeof v === "string");
      return typeof parsed === "string" ? [parsed] : [value];
    } catch {
      // Plain string that's not JSON - wrap in array
      return [value];
    }
  }
  return null;
}
