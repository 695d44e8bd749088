import chalk from 'chalk';
import type { HistogramSnapshot, StatsSnapshot, WindowStats } from '../types';

const BAR_WIDTH = 50;
const BAR_CHAR = '█';

export interface DashboardView {
  host: string;
  intervalSeconds: number;
  snapshot: StatsSnapshot;
  status?: string;
}

export const formatWindow = (stats: WindowStats): string =>
  `Min: ${stats.min}ms, Max: ${stats.max}ms, Avg: ${stats.avg}ms`;

export const renderHistogram = (histogram: HistogramSnapshot): string[] => {
  const maxCount = histogram.buckets.reduce((max, bucket) => Math.max(max, bucket.count), 0);
  const lines = [`Histogram, Total: ${histogram.total}`];

  for (const bucket of histogram.buckets) {
    const length = maxCount > 0 ? Math.trunc((bucket.count / maxCount) * BAR_WIDTH) : 0;
    lines.push(`${String(bucket.thresholdMs).padStart(5)}ms : ${BAR_CHAR.repeat(length)}`);
  }

  return lines;
};

export const renderDashboard = (view: DashboardView): string => {
  const { snapshot } = view;
  const lines = [
    chalk.bold(`PING: ${view.host} (interval: ${view.intervalSeconds}s)`),
    '',
    `Window - ${formatWindow(snapshot.lastWindow)}`,
    `Totals - ${formatWindow(snapshot.totals)}`,
    '',
    ...renderHistogram(snapshot.histogram),
    ''
  ];

  if (view.status) {
    lines.push(chalk.yellow(view.status));
  }

  lines.push(chalk.gray('q / esc / ctrl+c to quit'));

  return lines.join('\n');
};
