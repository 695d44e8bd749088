import { EventEmitter } from 'node:events';
import type { StructuredLogger } from '../logging/StructuredLogger';
import type { LatencyStats } from '../perf/LatencyStats';
import type { ProbeRun } from '../services/probe/PingProbe';
import type { ProbeOutcome, StatsSnapshot } from '../types';

export interface ProbeSource {
  start(signal: AbortSignal): ProbeRun;
}

export interface MeasurementSessionDependencies {
  probe: ProbeSource;
  stats: LatencyStats;
}

export declare interface MeasurementSession {
  on(event: 'sample', listener: (latencyMs: number, snapshot: StatsSnapshot) => void): this;
  on(event: 'rollover', listener: (snapshot: StatsSnapshot) => void): this;
}

/**
 * The one loop that owns the statistics engine. Samples and the probe outcome arrive through
 * the probe's event channel in order; once cancelled, no further sample is applied.
 */
export class MeasurementSession extends EventEmitter {
  private running = false;
  private samplesApplied = 0;

  public constructor(
    private readonly deps: MeasurementSessionDependencies,
    private readonly logger?: StructuredLogger
  ) {
    super();
  }

  public getSnapshot(): StatsSnapshot {
    return this.deps.stats.snapshot();
  }

  public getSamplesApplied(): number {
    return this.samplesApplied;
  }

  public async run(signal: AbortSignal): Promise<ProbeOutcome> {
    if (this.running) {
      throw new Error('Measurement session is already running');
    }

    this.running = true;

    // The probe follows this controller so a failing loop can stop it too.
    const controller = new AbortController();
    const forwardAbort = (): void => {
      controller.abort();
    };

    if (signal.aborted) {
      controller.abort();
    } else {
      signal.addEventListener('abort', forwardAbort, { once: true });
    }

    const run = this.deps.probe.start(controller.signal);
    const onCancel = (): void => {
      run.events.push({ type: 'cancel' });
    };

    if (controller.signal.aborted) {
      onCancel();
    } else {
      controller.signal.addEventListener('abort', onCancel, { once: true });
    }

    try {
      for await (const event of run.events) {
        // Samples queued ahead of the cancel marker are dropped too.
        if (controller.signal.aborted || event.type === 'cancel') {
          this.logger?.info('Measurement cancelled; waiting for probe to stop', {
            samplesApplied: this.samplesApplied
          });
          break;
        }

        if (event.type === 'outcome') {
          return event.outcome;
        }

        this.applySample(event.latencyMs);
      }

      return await run.outcome;
    } catch (error) {
      this.logger?.error('Measurement loop failed; stopping probe', {
        error: error instanceof Error ? error.message : String(error),
        samplesApplied: this.samplesApplied
      });
      controller.signal.removeEventListener('abort', onCancel);
      controller.abort();
      await run.outcome;
      throw error;
    } finally {
      signal.removeEventListener('abort', forwardAbort);
      controller.signal.removeEventListener('abort', onCancel);
      this.running = false;
    }
  }

  private applySample(latencyMs: number): void {
    const rolledOver = this.deps.stats.update(latencyMs);
    this.samplesApplied += 1;

    const snapshot = this.deps.stats.snapshot();
    if (rolledOver) {
      this.logger?.debug('Latency window rolled over', {
        window: snapshot.lastWindow,
        windowsCompleted: snapshot.windowsCompleted
      });
      this.emit('rollover', snapshot);
    }

    this.emit('sample', latencyMs, snapshot);
  }
}
