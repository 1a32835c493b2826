import { describe, it, expect, beforeEach } from "vitest";
import { metrics } from "./metrics.js";

describe("metrics", () => {
  beforeEach(() => {
    metrics.reset();
  });

  it("should collect samples per file", () => {
    metrics.recordWriteTime("/a.json", 5);
    metrics.recordWriteTime("/a.json", 7);
    metrics.recordLockTimeout("/b.json");

    expect(metrics.getMetrics("/a.json")).toMatchObject({ writes: 2, writeTimeMs: [5, 7] });
    expect(metrics.getMetrics("/b.json")?.lockTimeouts).toBe(1);
    expect(metrics.getAllMetrics().size).toBe(2);
  });

  it("should keep only the most recent 100 samples", () => {
    for (let i = 0; i < 150; i++) {
      metrics.recordLockWait("/a.json", i);
    }

    const samples = metrics.getMetrics("/a.json")?.lockWaitMs ?? [];
    expect(samples).toHaveLength(100);
    expect(samples[0]).toBe(50);
  });

  it("should compute p95", () => {
    const values = Array.from({ length: 20 }, (_, i) => i + 1);
    expect(metrics.getP95(values)).toBe(19);
    expect(metrics.getP95([])).toBe(0);
  });

  it("should reset one file or everything", () => {
    metrics.recordReadTime("/a.json", 1);
    metrics.recordReadTime("/b.json", 1);

    metrics.reset("/a.json");
    expect(metrics.getMetrics("/a.json")).toBeUndefined();
    expect(metrics.getMetrics("/b.json")).toBeDefined();

    metrics.reset();
    expect(metrics.getAllMetrics().size).toBe(0);
  });
});
