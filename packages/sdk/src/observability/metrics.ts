/**
 * Metrics tracking for lookups and index builds
 */

/** Stage that produced the non-empty list of a lookup, or "none" */
export type LookupStage = "prefix" | "fullText" | "fuzzy" | "none";

export interface LookupMetrics {
  stageCounts: Record<LookupStage, number>;
  lookupTimeMs: number[];
  buildTimeMs: number[];
  loadTimeMs: number[];
}

const MAX_SAMPLES = 100;

function pushSample(samples: number[], ms: number): void {
  samples.push(ms);

  // Keep only the last samples to avoid unbounded memory growth
  if (samples.length > MAX_SAMPLES) {
    samples.shift();
  }
}

function emptyMetrics(): LookupMetrics {
  return {
    stageCounts: { prefix: 0, fullText: 0, fuzzy: 0, none: 0 },
    lookupTimeMs: [],
    buildTimeMs: [],
    loadTimeMs: [],
  };
}

export class MetricsCollector {
  #metrics = emptyMetrics();

  /**
   * Record a completed lookup and the stage that answered it
   */
  recordLookup(stage: LookupStage, ms: number): void {
    this.#metrics.stageCounts[stage]++;
    pushSample(this.#metrics.lookupTimeMs, ms);
  }

  /**
   * Record a full index build
   */
  recordBuildTime(ms: number): void {
    pushSample(this.#metrics.buildTimeMs, ms);
  }

  /**
   * Record a snapshot restored from the cache file
   */
  recordLoadTime(ms: number): void {
    pushSample(this.#metrics.loadTimeMs, ms);
  }

  /**
   * Copy of the current metrics
   */
  getMetrics(): LookupMetrics {
    const m = this.#metrics;
    return {
      stageCounts: { ...m.stageCounts },
      lookupTimeMs: [...m.lookupTimeMs],
      buildTimeMs: [...m.buildTimeMs],
      loadTimeMs: [...m.loadTimeMs],
    };
  }

  /**
   * Calculate p95 for a metric
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)] ?? 0;
  }

  /**
   * Get p95 lookup time
   */
  getP95LookupTime(): number {
    return this.getP95(this.#metrics.lookupTimeMs);
  }

  reset(): void {
    this.#metrics = emptyMetrics();
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
