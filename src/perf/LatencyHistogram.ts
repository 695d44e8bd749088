import type { HistogramSnapshot } from '../types';

export const DEFAULT_HISTOGRAM_THRESHOLDS_MS: readonly number[] = [
  1, 2, 5, 10, 20, 50, 100, 200, 500, 1000
];

/**
 * Fixed upper-bound buckets. A sample lands in the first bucket whose threshold it does not
 * exceed; a sample above the last threshold only counts towards `total`.
 */
export class LatencyHistogram {
  private readonly thresholds: number[];
  private readonly buckets: number[];
  private total = 0;

  public constructor(thresholds: readonly number[] = DEFAULT_HISTOGRAM_THRESHOLDS_MS) {
    if (thresholds.length === 0) {
      throw new RangeError('Histogram needs at least one threshold');
    }

    thresholds.forEach((threshold, index) => {
      if (!Number.isInteger(threshold) || threshold <= 0) {
        throw new RangeError(`Histogram threshold must be a positive integer: ${threshold}`);
      }

      if (index > 0 && threshold <= thresholds[index - 1]) {
        throw new RangeError(`Histogram thresholds must be strictly ascending: ${thresholds.join(',')}`);
      }
    });

    this.thresholds = [...thresholds];
    this.buckets = thresholds.map(() => 0);
  }

  public update(durationMs: number): void {
    const index = this.thresholds.findIndex((threshold) => durationMs <= threshold);
    if (index !== -1) {
      this.buckets[index] += 1;
    }

    this.total += 1;
  }

  public snapshot(): HistogramSnapshot {
    const bucketed = this.buckets.reduce((sum, count) => sum + count, 0);

    return {
      buckets: this.thresholds.map((thresholdMs, index) => ({
        thresholdMs,
        count: this.buckets[index]
      })),
      total: this.total,
      overflow: this.total - bucketed
    };
  }
}
