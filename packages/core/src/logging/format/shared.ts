/**
 * Value conversion shared by the formatters.
 */

/** Text form of a field value for the line-oriented formats. */
export function stringifyValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value instanceof Error) return value.message;
  if (value === null || typeof value !== 'object') return String(value);
  return JSON.stringify(toJsonValue(value));
}

/** Convert a field value into something JSON.stringify renders faithfully. */
export function toJsonValue(value: unknown): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Error) return value.message;
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map(toJsonValue);
  if (value !== null && typeof value === 'object') {
    return jsonFields(Object.entries(value));
  }
  return value;
}

/** Build a JSON object from field entries, dropping undefined values. */
export function jsonFields(entries: Iterable<[string, unknown]>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of entries) {
    if (value === undefined) continue;
    out[key] = toJsonValue(value);
  }
  return out;
}

export function definedEntries(fields: Record<string, unknown>): Array<[string, unknown]> {
  return Object.entries(fields).filter(([, value]) => value !== undefined);
}
