#!/usr/bin/env node
import { Command } from 'commander';
import { runLiveTerminal } from './cli/liveTerminal';
import { resolveConfig, validateConfig } from './config';
import type { ConfigOverrides } from './config';
import { StructuredLogger } from './logging/StructuredLogger';
import { describeOutcome } from './services/probe/PingProbe';

type CliOptions = {
  host?: string;
  interval?: string;
  window?: string;
  thresholds?: string;
  pingBin?: string;
  logDir?: string;
  logLevel?: string;
};

const toOverrides = (options: CliOptions): ConfigOverrides => ({
  host: options.host,
  intervalSeconds: options.interval,
  windowSeconds: options.window,
  thresholds: options.thresholds,
  pingBin: options.pingBin,
  logDir: options.logDir,
  logLevel: options.logLevel
});

const main = async (): Promise<void> => {
  const program = new Command()
    .name('pingwatch')
    .description('Live round-trip latency dashboard for one host')
    .option('--host <host>', 'hostname or address to ping (default: google.co.uk)')
    .option('-d, --interval <seconds>', 'seconds between probes (default: 1)')
    .option('-w, --window <seconds>', 'length of the stats window in seconds (default: 5)')
    .option('--thresholds <list>', 'comma-separated histogram bucket bounds in ms')
    .option('--ping-bin <path>', 'ping executable (default: ping)')
    .option('--log-dir <dir>', 'directory for the JSON-lines log')
    .option('--log-level <level>', 'debug | info | warn | error')
    .parse(process.argv);

  const config = resolveConfig(toOverrides(program.opts<CliOptions>()));
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new Error(`Invalid configuration:\n- ${errors.join('\n- ')}`);
  }

  const logger = await StructuredLogger.create(config.logDir, { level: config.logLevel });
  const outcome = await runLiveTerminal(config, logger);
  await logger.flush();

  if (outcome.kind !== 'cancelled') {
    throw new Error(describeOutcome(outcome));
  }
};

main().catch((error) => {
  const detail = error instanceof Error ? error.message : String(error);
  process.stderr.write(`${detail}\n`);
  process.exit(1);
});
