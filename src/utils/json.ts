/**
 * JSON utilities for deterministic serialization
 *
 * Tag exports go through stableStringify so that writing the same registry
 * twice produces byte-identical files.
 */

/**
 * Produces a deterministic JSON string by sorting object keys recursively.
 * Array order is preserved.
 *
 * @param obj - The value to stringify
 * @param space - Indentation passed through to JSON.stringify
 *
 * @example
 * stableStringify({ b: 2, a: 1 }) === stableStringify({ a: 1, b: 2 }) // true
 */
export function stableStringify(obj: unknown, space?: number): string {
  return JSON.stringify(obj, stableReplacer, space);
}

/**
 * JSON replacer function that sorts object keys for deterministic output.
 */
function stableReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    return value;
  }

  const sorted: Record<string, unknown> = {};
  const entries = Object.entries(value).sort(([a], [b]) =>
    a < b ? -1 : a > b ? 1 : 0,
  );

  for (const [key, entry] of entries) {
    sorted[key] = entry;
  }

  return sorted;
}
