/**
 * Canonical JSON encoding for deterministic hashing.
 * Object keys are sorted, undefined values dropped, bigints written as
 * decimal strings, no whitespace.
 */
export function canonicalEncode(obj: unknown): string {
  return JSON.stringify(obj, (_key, value: unknown) => {
    if (typeof value === "bigint") {
      return value.toString();
    }
    if (value instanceof Map) {
      return sortKeys(Object.fromEntries(value));
    }
    if (value && typeof value === "object" && !Array.isArray(value)) {
      return sortKeys(value);
    }
    return value;
  });
}

function sortKeys(value: object): Record<string, unknown> {
  const sorted: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    if (entry !== undefined) {
      sorted[key] = entry;
    }
  }
  return sorted;
}

/**
 * Flatten a record for structured logging: bigints become strings so the
 * logger's JSON serializer never sees them.
 */
export function toLogFields(record: object): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    if (typeof value === "bigint") {
      fields[key] = value.toString();
    } else if (Array.isArray(value)) {
      fields[key] = value.map((v: unknown) => (typeof v === "bigint" ? v.toString() : v));
    } else {
      fields[key] = value;
    }
  }
  return fields;
}
