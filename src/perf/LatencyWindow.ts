import type { WindowStats } from '../types';

export class LatencyWindow {
  private min = 0;
  private max = 0;
  private sum = 0;
  private count = 0;

  public update(durationMs: number): void {
    if (this.count === 0) {
      this.min = durationMs;
      this.max = durationMs;
      this.sum = durationMs;
      this.count = 1;
      return;
    }

    this.min = Math.min(this.min, durationMs);
    this.max = Math.max(this.max, durationMs);
    this.sum += durationMs;
    this.count += 1;
  }

  public reset(): void {
    this.min = 0;
    this.max = 0;
    this.sum = 0;
    this.count = 0;
  }

  /** Whole-millisecond mean; an empty window averages to 0. */
  public average(): number {
    if (this.count === 0) {
      return 0;
    }

    return Math.floor(this.sum / this.count);
  }

  public clone(): LatencyWindow {
    const copy = new LatencyWindow();
    copy.min = this.min;
    copy.max = this.max;
    copy.sum = this.sum;
    copy.count = this.count;
    return copy;
  }

  public stats(): WindowStats {
    return {
      min: this.min,
      max: this.max,
      avg: this.average(),
      sum: this.sum,
      count: this.count
    };
  }
}
