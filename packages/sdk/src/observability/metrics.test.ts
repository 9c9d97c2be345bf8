import { describe, it, expect } from "vitest";
import { MetricsCollector } from "./metrics.js";

describe("MetricsCollector", () => {
  it("should count lookups per stage", () => {
    const metrics = new MetricsCollector();
    metrics.recordLookup("prefix", 1);
    metrics.recordLookup("prefix", 2);
    metrics.recordLookup("none", 0.5);

    const recorded = metrics.getMetrics();
    expect(recorded.stageCounts).toEqual({ prefix: 2, fullText: 0, fuzzy: 0, none: 1 });
    expect(recorded.lookupTimeMs).toEqual([1, 2, 0.5]);
  });

  it("should keep only the last 100 samples", () => {
    const metrics = new MetricsCollector();
    for (let i = 0; i < 150; i++) {
      metrics.recordLookup("fuzzy", i);
    }

    const samples = metrics.getMetrics().lookupTimeMs;
    expect(samples).toHaveLength(100);
    expect(samples[0]).toBe(50);
    expect(metrics.getMetrics().stageCounts.fuzzy).toBe(150);
  });

  it("should compute p95", () => {
    const metrics = new MetricsCollector();
    expect(metrics.getP95LookupTime()).toBe(0);

    for (let i = 1; i <= 20; i++) {
      metrics.recordLookup("prefix", i);
    }
    expect(metrics.getP95LookupTime()).toBe(19);
  });

  it("should return copies and reset", () => {
    const metrics = new MetricsCollector();
    metrics.recordBuildTime(12);
    metrics.recordLoadTime(3);

    const copy = metrics.getMetrics();
    copy.buildTimeMs.push(99);
    expect(metrics.getMetrics().buildTimeMs).toEqual([12]);
    expect(metrics.getMetrics().loadTimeMs).toEqual([3]);

    metrics.reset();
    expect(metrics.getMetrics().buildTimeMs).toEqual([]);
  });
});
