/**
 * Deterministic JSON formatting for persisted indexes
 */

/**
 * Code-unit ordering, independent of the host locale
 */
export function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Stable, deterministic JSON stringification with guaranteed key ordering
 * @param value - Value to stringify
 * @param indent - Number of spaces for indentation (default: 0, compact)
 * @returns JSON string with trailing newline
 */
export function stableStringify(value: unknown, indent = 0): string {
  const seen = new WeakSet<object>();

  const normalize = (v: unknown): unknown => {
    if (v && typeof v === "object") {
      // Detect cycles
      if (seen.has(v)) {
        throw new Error("Circular reference detected in object");
      }
      seen.add(v);

      try {
        // Arrays: preserve order but normalize contents
        if (Array.isArray(v)) {
          return v.map(normalize);
        }

        // Objects: sort keys and normalize values
        const record: Record<string, unknown> = { ...v };
        const out: Record<string, unknown> = {};
        for (const k of Object.keys(record).sort(compareKeys)) {
          out[k] = normalize(record[k]);
        }
        return out;
      } finally {
        seen.delete(v);
      }
    }
    return v;
  };

  return JSON.stringify(normalize(value), null, indent) + "\n";
}
