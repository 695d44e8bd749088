import type { LogLevel } from './logging/StructuredLogger';

export interface AppConfig {
  host: string;
  intervalSeconds: number;
  windowSeconds: number;
  histogramThresholdsMs: number[];
  pingBin: string;
  stopTimeoutMs: number;
  logDir: string;
  logLevel: LogLevel;
}

export type ProbeOutcome =
  | { kind: 'cancelled' }
  | { kind: 'start-failed'; error: Error }
  | { kind: 'stream-failed'; error: Error }
  | { kind: 'exit-failed'; code: number | null; signal: NodeJS.Signals | null; detail: string }
  | { kind: 'exited' };

export type PipelineEvent =
  | { type: 'sample'; latencyMs: number }
  | { type: 'outcome'; outcome: ProbeOutcome }
  | { type: 'cancel' };

export interface WindowStats {
  min: number;
  max: number;
  avg: number;
  sum: number;
  count: number;
}

export interface HistogramBucket {
  thresholdMs: number;
  count: number;
}

export interface HistogramSnapshot {
  buckets: HistogramBucket[];
  total: number;
  overflow: number;
}

export interface StatsSnapshot {
  lastWindow: WindowStats;
  totals: WindowStats;
  histogram: HistogramSnapshot;
  windowsCompleted: number;
}
