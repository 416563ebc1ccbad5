/**
 * Serialize a report, dependency file or plan to a deterministic JSON string.
 * Keys are sorted for stable diffing.
 */
export function toJson(value: unknown, pretty: boolean): string {
  const sorted = sortKeysDeep(value);
  return pretty
    ? JSON.stringify(sorted, null, 2)
    : JSON.stringify(sorted);
}

/** Recursively sort object keys for deterministic output. */
function sortKeysDeep(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeysDeep);
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const sorted: Record<string, unknown> = {};
    for (const [key, entry] of entries) {
      sorted[key] = sortKeysDeep(entry);
    }
    return sorted;
  }
  return value;
}
