/**
 * Canonical JSON for hashing: object keys sorted, `undefined` members dropped,
 * no whitespace. Arrays keep their order, so boards encode row by row.
 */
export function canonicalEncode(value: unknown): string {
  return JSON.stringify(value, (_key, current: unknown) => {
    if (!isPlainRecord(current)) {
      return current;
    }
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(current).sort()) {
      if (current[key] !== undefined) {
        sorted[key] = current[key];
      }
    }
    return sorted;
  });
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
