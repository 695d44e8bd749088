import { spawn } from 'node:child_process';
import type { EventEmitter } from 'node:events';
import type { Readable } from 'node:stream';
import { EventChannel } from '../../core/EventChannel';
import type { StructuredLogger } from '../../logging/StructuredLogger';
import type { PipelineEvent, ProbeOutcome } from '../../types';
import { pingLineParser } from './ProbeLineParser';
import type { ProbeLineParser } from './ProbeLineParser';

const STDERR_TAIL_LIMIT = 4000;

/** The slice of a child process the probe relies on. */
export interface ProbeProcess extends EventEmitter {
  readonly stdout: Readable;
  readonly stderr: Readable;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnProbe = (command: string, args: string[]) => ProbeProcess;

export interface PingProbeOptions {
  host: string;
  intervalSeconds: number;
  command?: string;
  parser?: ProbeLineParser;
  stopTimeoutMs?: number;
  spawnProcess?: SpawnProbe;
  logger?: StructuredLogger;
}

export interface ProbeRun {
  /** Samples in arrival order, then exactly one outcome; closed after the outcome. */
  events: EventChannel<PipelineEvent>;
  outcome: Promise<ProbeOutcome>;
}

const spawnPing: SpawnProbe = (command, args) =>
  spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

export const describeOutcome = (outcome: ProbeOutcome): string => {
  switch (outcome.kind) {
    case 'cancelled':
      return 'Probe cancelled';
    case 'start-failed':
      return `Failed to start probe: ${outcome.error.message}`;
    case 'stream-failed':
      return `Probe output stream failed: ${outcome.error.message}`;
    case 'exit-failed': {
      const status = `code=${outcome.code ?? 'none'}, signal=${outcome.signal ?? 'none'}`;
      const suffix = outcome.detail ? `\n${outcome.detail}` : '';
      return `Probe exited unexpectedly (${status})${suffix}`;
    }
    case 'exited':
      return 'Probe exited before it was stopped';
  }
};

/**
 * Supervises one ping subprocess. Each instance runs once: the outcome is decided by
 * whichever of cancellation, stream failure or process exit happens first.
 */
export class PingProbe {
  private child: ProbeProcess | undefined;
  private started = false;
  private settled = false;
  private spawned = false;
  private cancelRequested = false;
  private streamError: Error | undefined;
  private killTimer: NodeJS.Timeout | undefined;
  private stdoutBuffer = '';
  private stderrBuffer = '';
  private droppedLines = 0;
  private readonly events = new EventChannel<PipelineEvent>();
  private resolveOutcome: (outcome: ProbeOutcome) => void = () => undefined;
  private readonly parser: ProbeLineParser;

  public constructor(private readonly options: PingProbeOptions) {
    this.parser = options.parser ?? pingLineParser;
  }

  public buildArgs(): string[] {
    return ['-n', '-i', String(this.options.intervalSeconds), this.options.host];
  }

  public getDroppedLineCount(): number {
    return this.droppedLines;
  }

  public start(signal: AbortSignal): ProbeRun {
    if (this.started) {
      throw new Error('Probe has already been started');
    }

    this.started = true;

    const outcome = new Promise<ProbeOutcome>((resolve) => {
      this.resolveOutcome = resolve;
    });
    const run: ProbeRun = { events: this.events, outcome };

    if (signal.aborted) {
      this.cancelRequested = true;
      this.finish({ kind: 'cancelled' });
      return run;
    }

    const onAbort = (): void => {
      this.cancelRequested = true;
      if (this.settled) {
        return;
      }

      this.options.logger?.info('Probe cancellation requested');
      this.terminate();
    };

    signal.addEventListener('abort', onAbort, { once: true });
    void outcome.then(() => {
      signal.removeEventListener('abort', onAbort);
    });

    this.spawnChild();
    return run;
  }

  private spawnChild(): void {
    const command = this.options.command ?? 'ping';
    const args = this.buildArgs();
    const spawnProcess = this.options.spawnProcess ?? spawnPing;

    let child: ProbeProcess;

    try {
      child = spawnProcess(command, args);
    } catch (error) {
      this.finish({ kind: 'start-failed', error: toError(error) });
      return;
    }

    this.child = child;

    child.on('error', (error: Error) => {
      if (!this.spawned) {
        this.finish({ kind: 'start-failed', error });
        return;
      }

      this.options.logger?.warn('Probe process error', { detail: error.message });
    });

    child.once('spawn', () => {
      this.spawned = true;
      this.options.logger?.info('Probe started', { command, args });
    });

    child.stdout.on('data', (chunk: Buffer | string) => {
      this.handleStdoutChunk(chunk.toString());
    });

    child.stdout.on('end', () => {
      this.flushStdoutTail();
    });

    child.stdout.on('error', (error: Error) => {
      if (this.settled || this.streamError) {
        return;
      }

      this.streamError = error;
      this.options.logger?.error('Probe output stream failed', { detail: error.message });
      this.terminate();
    });

    child.stderr.on('data', (chunk: Buffer | string) => {
      this.stderrBuffer = tailString(`${this.stderrBuffer}${chunk.toString()}`, STDERR_TAIL_LIMIT);
    });

    child.once('close', (code: number | null, closeSignal: NodeJS.Signals | null) => {
      this.clearKillTimer();
      this.child = undefined;

      if (this.cancelRequested) {
        this.finish({ kind: 'cancelled' });
        return;
      }

      if (this.streamError) {
        this.finish({ kind: 'stream-failed', error: this.streamError });
        return;
      }

      if (code === 0) {
        this.finish({ kind: 'exited' });
        return;
      }

      this.finish({
        kind: 'exit-failed',
        code,
        signal: closeSignal,
        detail: this.stderrBuffer.trim()
      });
    });
  }

  private handleStdoutChunk(chunk: string): void {
    this.stdoutBuffer += chunk;

    while (true) {
      const newlineIndex = this.stdoutBuffer.indexOf('\n');
      if (newlineIndex === -1) {
        break;
      }

      const line = this.stdoutBuffer.slice(0, newlineIndex);
      this.stdoutBuffer = this.stdoutBuffer.slice(newlineIndex + 1);
      this.handleLine(line);
    }
  }

  private flushStdoutTail(): void {
    const tail = this.stdoutBuffer;
    this.stdoutBuffer = '';

    if (tail) {
      this.handleLine(tail);
    }
  }

  private handleLine(line: string): void {
    if (this.settled || this.cancelRequested) {
      return;
    }

    const result = this.parser.parse(line);

    if (result.kind === 'unrecognized') {
      this.droppedLines += 1;
      this.options.logger?.debug('Dropped unrecognized probe line', {
        parser: this.parser.name,
        line: line.trim(),
        droppedLines: this.droppedLines
      });
      return;
    }

    if (result.kind === 'sample') {
      this.events.push({ type: 'sample', latencyMs: result.latencyMs });
    }
  }

  private terminate(): void {
    const current = this.child;
    if (!current || this.killTimer) {
      return;
    }

    this.killTimer = setTimeout(() => {
      this.options.logger?.warn('Probe ignored SIGTERM; sending SIGKILL');
      current.kill('SIGKILL');
    }, this.options.stopTimeoutMs ?? 1500);

    current.kill('SIGTERM');
  }

  private clearKillTimer(): void {
    if (this.killTimer) {
      clearTimeout(this.killTimer);
      this.killTimer = undefined;
    }
  }

  private finish(outcome: ProbeOutcome): void {
    if (this.settled) {
      return;
    }

    this.settled = true;
    this.events.push({ type: 'outcome', outcome });
    this.events.close();
    this.resolveOutcome(outcome);

    const context = { outcome: outcome.kind, droppedLines: this.droppedLines };
    if (outcome.kind === 'cancelled') {
      this.options.logger?.info('Probe stopped', context);
    } else {
      this.options.logger?.error(describeOutcome(outcome), context);
    }
  }
}

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

const tailString = (text: string, limit: number): string => {
  if (text.length <= limit) {
    return text;
  }

  return text.slice(text.length - limit);
};
