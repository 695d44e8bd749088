import os from 'node:os';
import path from 'node:path';
import { LOG_LEVELS } from './logging/StructuredLogger';
import type { LogLevel } from './logging/StructuredLogger';
import { DEFAULT_HISTOGRAM_THRESHOLDS_MS } from './perf/LatencyHistogram';
import type { AppConfig } from './types';

export const DEFAULT_HOST = 'google.co.uk';
export const DEFAULT_INTERVAL_SECONDS = 1;
export const DEFAULT_WINDOW_SECONDS = 5;
export const DEFAULT_STOP_TIMEOUT_MS = 1500;

/** Raw string values from the command line; they win over the environment. */
export interface ConfigOverrides {
  host?: string;
  intervalSeconds?: string;
  windowSeconds?: string;
  thresholds?: string;
  pingBin?: string;
  logDir?: string;
  logLevel?: string;
}

const parseIntOrDefault = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

// Entries that do not parse are kept as NaN so validateConfig can report them.
const parseThresholds = (value: string | undefined): number[] => {
  if (!value || !value.trim()) {
    return [...DEFAULT_HISTOGRAM_THRESHOLDS_MS];
  }

  return value
    .split(',')
    .map((item) => item.trim())
    .map((item) => (/^\d+$/.test(item) ? Number.parseInt(item, 10) : Number.NaN));
};

const resolveLogLevel = (value: string | undefined): LogLevel => {
  const normalized = value?.trim().toLowerCase();
  const match = LOG_LEVELS.find((level) => level === normalized);

  return match ?? 'info';
};

export const resolveConfig = (
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): AppConfig => ({
  host: (overrides.host ?? env.PINGWATCH_HOST ?? DEFAULT_HOST).trim(),
  intervalSeconds: parseIntOrDefault(
    overrides.intervalSeconds ?? env.PINGWATCH_INTERVAL_SECONDS,
    DEFAULT_INTERVAL_SECONDS
  ),
  windowSeconds: parseIntOrDefault(
    overrides.windowSeconds ?? env.PINGWATCH_WINDOW_SECONDS,
    DEFAULT_WINDOW_SECONDS
  ),
  histogramThresholdsMs: parseThresholds(
    overrides.thresholds ?? env.PINGWATCH_HISTOGRAM_THRESHOLDS
  ),
  pingBin: overrides.pingBin ?? env.PINGWATCH_PING_BIN ?? 'ping',
  stopTimeoutMs: parseIntOrDefault(env.PINGWATCH_STOP_TIMEOUT_MS, DEFAULT_STOP_TIMEOUT_MS),
  logDir:
    overrides.logDir ?? env.PINGWATCH_LOG_DIR ?? path.join(os.homedir(), '.pingwatch', 'logs'),
  logLevel: resolveLogLevel(overrides.logLevel ?? env.PINGWATCH_LOG_LEVEL)
});

export const validateConfig = (config: AppConfig): string[] => {
  const errors: string[] = [];

  if (!config.host) {
    errors.push('PINGWATCH_HOST must not be empty.');
  } else if (/\s/.test(config.host) || config.host.startsWith('-')) {
    errors.push('PINGWATCH_HOST must be a hostname or address without spaces or a leading dash.');
  }

  if (config.intervalSeconds < 1 || config.intervalSeconds > 3600) {
    errors.push('PINGWATCH_INTERVAL_SECONDS must be between 1 and 3600 seconds.');
  }

  if (config.windowSeconds < 1 || config.windowSeconds > 86400) {
    errors.push('PINGWATCH_WINDOW_SECONDS must be between 1 and 86400 seconds.');
  }

  if (config.histogramThresholdsMs.length === 0) {
    errors.push('PINGWATCH_HISTOGRAM_THRESHOLDS must list at least one threshold.');
  } else if (
    !config.histogramThresholdsMs.every(
      (threshold, index, all) =>
        Number.isInteger(threshold) && threshold > 0 && (index === 0 || threshold > all[index - 1])
    )
  ) {
    errors.push(
      'PINGWATCH_HISTOGRAM_THRESHOLDS must be positive whole milliseconds in ascending order, e.g. 1,2,5,10.'
    );
  }

  if (!config.pingBin.trim()) {
    errors.push('PINGWATCH_PING_BIN must not be empty.');
  }

  if (config.stopTimeoutMs < 100 || config.stopTimeoutMs > 30000) {
    errors.push('PINGWATCH_STOP_TIMEOUT_MS must be between 100 and 30000 milliseconds.');
  }

  if (!config.logDir.trim()) {
    errors.push('PINGWATCH_LOG_DIR must not be empty.');
  }

  return errors;
};
