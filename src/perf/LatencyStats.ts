import type { StatsSnapshot, WindowStats } from '../types';
import { LatencyHistogram } from './LatencyHistogram';
import { LatencyWindow } from './LatencyWindow';

export interface LatencyStatsOptions {
  windowSpanMs: number;
  thresholdsMs?: readonly number[];
  now?: () => number;
}

/**
 * Rolling window, lifetime totals and histogram over the sample stream.
 *
 * Not safe to share: the measurement loop is the only caller of `update`. A window only rolls
 * over when a sample arrives after its span has elapsed, so an idle link keeps showing the
 * last window that saw traffic.
 */
export class LatencyStats {
  private readonly now: () => number;
  private readonly window = new LatencyWindow();
  private readonly totals = new LatencyWindow();
  private readonly histogram: LatencyHistogram;
  private lastWindow = new LatencyWindow();
  private windowStart: number;
  private windowsCompleted = 0;

  public constructor(private readonly options: LatencyStatsOptions) {
    if (!(options.windowSpanMs > 0)) {
      throw new RangeError(`Window span must be positive: ${options.windowSpanMs}`);
    }

    this.now = options.now ?? Date.now;
    this.histogram = new LatencyHistogram(options.thresholdsMs);
    this.windowStart = this.now();
  }

  /** Records one sample; returns true when it closed the current window. */
  public update(latencyMs: number): boolean {
    if (!Number.isFinite(latencyMs) || latencyMs < 0) {
      throw new RangeError(`Latency sample must be a finite, non-negative number: ${latencyMs}`);
    }

    const wholeMs = Math.trunc(latencyMs);

    this.window.update(wholeMs);
    this.totals.update(wholeMs);
    this.histogram.update(wholeMs);

    const timestamp = this.now();
    if (timestamp - this.windowStart <= this.options.windowSpanMs) {
      return false;
    }

    this.lastWindow = this.window.clone();
    this.window.reset();
    this.windowStart = timestamp;
    this.windowsCompleted += 1;
    return true;
  }

  public currentWindow(): WindowStats {
    return this.window.stats();
  }

  public snapshot(): StatsSnapshot {
    return {
      lastWindow: this.lastWindow.stats(),
      totals: this.totals.stats(),
      histogram: this.histogram.snapshot(),
      windowsCompleted: this.windowsCompleted
    };
  }
}
