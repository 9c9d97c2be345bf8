/**
 * Timing metrics on stderr, enabled by LEXICON_CLI_DEBUG=1
 */

import { isVerbose } from "./env.js";
import { writeStderr } from "./io.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Format one metric line: `metric <key> k=v k=v`
 */
export function formatMetric(key: string, fields: Record<string, unknown>): string {
  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    if (v === undefined) continue;
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }
  return parts.join(" ");
}

/**
 * Emit a metric to stderr if verbose mode is enabled
 */
export function emitMetric(key: string, fields: Record<string, unknown>): void {
  if (!isVerbose()) {
    return;
  }
  writeStderr(formatMetric(key, fields) + "\n");
}

/**
 * Run `fn` and emit its duration, plus any fields `describe` derives from the result
 */
export async function withTiming<T>(
  label: string,
  fn: () => Promise<T>,
  describe?: (result: T) => Record<string, unknown>
): Promise<T> {
  const start = performance.now();
  let fields: Record<string, unknown> = { success: false };

  try {
    const result = await fn();
    fields = { success: true, ...describe?.(result) };
    return result;
  } finally {
    emitMetric(label, { duration_ms: (performance.now() - start).toFixed(2), ...fields });
  }
}
