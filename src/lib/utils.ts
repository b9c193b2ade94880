/**
 * Utility functions used across reckon
 */

/**
 * Normalize whitespace in a string
 */
export function normalize(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Check if value is a plain object (object literal or parsed JSON object)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Stable JSON stringification for consistent output.
 * Sets render as arrays and bigints as decimal strings.
 */
export function stableStringify(value: unknown): string {
  const text = JSON.stringify(value, (_key, val: unknown) => {
    if (val instanceof Set) {
      return Array.from(val);
    }
    if (val instanceof Map) {
      return Object.fromEntries(val);
    }
    if (typeof val === "bigint") {
      return val.toString();
    }
    if (typeof val === "function" || typeof val === "symbol") {
      return null;
    }
    if (typeof val === "object" && val !== null && !Array.isArray(val)) {
      const source: Record<string, unknown> = { ...val };
      return Object.keys(source)
        .sort()
        .reduce<Record<string, unknown>>((result, k) => {
          result[k] = source[k];
          return result;
        }, {});
    }
    return val;
  });
  return text ?? "null";
}

/**
 * Remove a surrounding markdown code fence, if present
 */
export function stripCodeFence(text: string): string {
  const cleaned = text.trim();
  if (!cleaned.startsWith("```")) {
    return cleaned;
  }
  return cleaned.replace(/^```[A-Za-z]*\s*/, "").replace(/```$/, "").trim();
}

/**
 * Describe the runtime shape of a value for diagnostics
 */
export function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (value instanceof Set) return "set";
  if (typeof value === "object") {
    return isPlainObject(value) ? "object" : value.constructor.name;
  }
  return typeof value;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
