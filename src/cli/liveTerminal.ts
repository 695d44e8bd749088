import readline from 'node:readline';
import type { Key } from 'node:readline';
import { MeasurementSession } from '../core/MeasurementSession';
import type { StructuredLogger } from '../logging/StructuredLogger';
import { LatencyStats } from '../perf/LatencyStats';
import { PingProbe } from '../services/probe/PingProbe';
import type { AppConfig, ProbeOutcome, StatsSnapshot } from '../types';
import { renderDashboard } from './dashboard';

const QUIT_KEYS = new Set(['q', 'escape']);

const isQuitKey = (key: Key | undefined): boolean => {
  if (!key?.name) {
    return false;
  }

  return QUIT_KEYS.has(key.name) || (key.ctrl === true && key.name === 'c');
};

/**
 * Runs the dashboard until the user quits or the probe stops. Resolves with the probe outcome;
 * the final frame stays on screen.
 */
export const runLiveTerminal = async (
  config: AppConfig,
  logger: StructuredLogger
): Promise<ProbeOutcome> => {
  const controller = new AbortController();
  const stdin = process.stdin;
  const stdout = process.stdout;

  const probe = new PingProbe({
    host: config.host,
    intervalSeconds: config.intervalSeconds,
    command: config.pingBin,
    stopTimeoutMs: config.stopTimeoutMs,
    logger
  });

  const session = new MeasurementSession(
    {
      probe,
      stats: new LatencyStats({
        windowSpanMs: config.windowSeconds * 1000,
        thresholdsMs: config.histogramThresholdsMs
      })
    },
    logger
  );

  const draw = (snapshot: StatsSnapshot, status?: string): void => {
    if (stdout.isTTY) {
      readline.cursorTo(stdout, 0, 0);
      readline.clearScreenDown(stdout);
    }

    stdout.write(
      `${renderDashboard({
        host: config.host,
        intervalSeconds: config.intervalSeconds,
        snapshot,
        status
      })}\n`
    );
  };

  const onKeypress = (_input: string | undefined, key: Key | undefined): void => {
    if (isQuitKey(key)) {
      controller.abort();
    }
  };

  const onSignal = (): void => {
    controller.abort();
  };

  session.on('sample', (_latencyMs, snapshot) => {
    const dropped = probe.getDroppedLineCount();
    draw(snapshot, dropped > 0 ? `${dropped} unrecognized probe lines skipped` : undefined);
  });

  const rawMode = stdin.isTTY === true;
  readline.emitKeypressEvents(stdin);
  if (rawMode) {
    stdin.setRawMode(true);
  }
  stdin.on('keypress', onKeypress);
  stdin.resume();
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  logger.setEcho(false);
  logger.info('Measurement started', {
    host: config.host,
    intervalSeconds: config.intervalSeconds,
    windowSeconds: config.windowSeconds,
    command: config.pingBin,
    args: probe.buildArgs()
  });
  draw(session.getSnapshot(), 'Waiting for replies...');

  try {
    const outcome = await session.run(controller.signal);
    logger.info('Measurement finished', {
      outcome: outcome.kind,
      samples: session.getSamplesApplied(),
      droppedLines: probe.getDroppedLineCount()
    });
    return outcome;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    stdin.off('keypress', onKeypress);
    if (rawMode) {
      stdin.setRawMode(false);
    }
    stdin.pause();
    logger.setEcho(true);
  }
};
