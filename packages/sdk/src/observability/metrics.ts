/**
 * Metrics tracking for lock and settings file operations
 */

export interface FileMetrics {
  lockWaitMs: number[];
  readTimeMs: number[];
  writeTimeMs: number[];
  lockTimeouts: number;
  writes: number;
}

const MAX_SAMPLES = 100;

function pushSample(samples: number[], ms: number): void {
  samples.push(ms);

  // Keep only the most recent samples
  if (samples.length > MAX_SAMPLES) {
    samples.shift();
  }
}

class MetricsCollector {
  #metrics = new Map<string, FileMetrics>();

  /**
   * Get or create metrics for a file
   */
  #getMetrics(file: string): FileMetrics {
    let metrics = this.#metrics.get(file);
    if (!metrics) {
      metrics = {
        lockWaitMs: [],
        readTimeMs: [],
        writeTimeMs: [],
        lockTimeouts: 0,
        writes: 0,
      };
      this.#metrics.set(file, metrics);
    }
    return metrics;
  }

  /**
   * Record time spent waiting for a lock
   */
  recordLockWait(file: string, ms: number): void {
    pushSample(this.#getMetrics(file).lockWaitMs, ms);
  }

  /**
   * Record a lock acquisition that gave up
   */
  recordLockTimeout(file: string): void {
    this.#getMetrics(file).lockTimeouts++;
  }

  /**
   * Record time spent loading a settings file
   */
  recordReadTime(file: string, ms: number): void {
    pushSample(this.#getMetrics(file).readTimeMs, ms);
  }

  /**
   * Record time spent persisting a settings file
   */
  recordWriteTime(file: string, ms: number): void {
    const metrics = this.#getMetrics(file);
    metrics.writes++;
    pushSample(metrics.writeTimeMs, ms);
  }

  /**
   * Get metrics for a file
   */
  getMetrics(file: string): FileMetrics | undefined {
    return this.#metrics.get(file);
  }

  /**
   * Get all metrics
   */
  getAllMetrics(): Map<string, FileMetrics> {
    return new Map(this.#metrics);
  }

  /**
   * Calculate p95 for a metric
   */
  getP95(values: readonly number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)] ?? 0;
  }

  /**
   * Reset metrics for one file, or all of them
   */
  reset(file?: string): void {
    if (file) {
      this.#metrics.delete(file);
    } else {
      this.#metrics.clear();
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
