import { describe, expect, it, vi } from 'vitest';
import { collect, FakeProbeProcess, nextTurn } from '../../testing/FakeProbeProcess';
import { describeOutcome, PingProbe } from './PingProbe';
import type { ProbeLineParser } from './ProbeLineParser';

const reply = (seq: number, time: string): string =>
  `64 bytes from 10.0.0.1: icmp_seq=${seq} ttl=64 time=${time} ms`;

const createProbe = (overrides: { stopTimeoutMs?: number; parser?: ProbeLineParser } = {}) => {
  const fake = new FakeProbeProcess();
  const spawnProcess = vi.fn((_command: string, _args: string[]) => fake);
  const probe = new PingProbe({
    host: '10.0.0.1',
    intervalSeconds: 2,
    spawnProcess,
    ...overrides
  });
  return { fake, spawnProcess, probe };
};

describe('PingProbe', () => {
  it('spawns ping with numeric output, the interval and the host', () => {
    const { probe, spawnProcess } = createProbe();
    probe.start(new AbortController().signal);

    expect(spawnProcess).toHaveBeenCalledWith('ping', ['-n', '-i', '2', '10.0.0.1']);
  });

  it('emits samples in arrival order and finishes with the exit outcome', async () => {
    const { fake, probe } = createProbe();
    const run = probe.start(new AbortController().signal);

    fake.emit('spawn');
    fake.writeLines(
      'PING 10.0.0.1 (10.0.0.1) 56(84) bytes of data.',
      '',
      reply(1, '23.4'),
      'Request timeout for icmp_seq 2',
      reply(3, '7.25')
    );
    fake.exit(0, null);

    await expect(collect(run.events)).resolves.toEqual([
      { type: 'sample', latencyMs: 23.4 },
      { type: 'sample', latencyMs: 7.25 },
      { type: 'outcome', outcome: { kind: 'exited' } }
    ]);
    await expect(run.outcome).resolves.toEqual({ kind: 'exited' });
    expect(probe.getDroppedLineCount()).toBe(1);
  });

  it('reassembles lines split across chunks and flushes an unterminated last line', async () => {
    const { fake, probe } = createProbe();
    const run = probe.start(new AbortController().signal);

    fake.emit('spawn');
    fake.stdout.write('64 bytes from 10.0.0.1: icmp_se');
    fake.stdout.write('q=1 ttl=64 time=1.5 ms\n');
    fake.stdout.write(reply(2, '9.0'));
    fake.exit(0, null);

    await expect(collect(run.events)).resolves.toEqual([
      { type: 'sample', latencyMs: 1.5 },
      { type: 'sample', latencyMs: 9 },
      { type: 'outcome', outcome: { kind: 'exited' } }
    ]);
  });

  it('reports a failing exit with the stderr tail', async () => {
    const { fake, probe } = createProbe();
    const run = probe.start(new AbortController().signal);

    fake.emit('spawn');
    fake.stderr.write('ping: nowhere.invalid: Name or service not known\n');
    fake.exit(2, null);

    const outcome = await run.outcome;
    expect(outcome).toEqual({
      kind: 'exit-failed',
      code: 2,
      signal: null,
      detail: 'ping: nowhere.invalid: Name or service not known'
    });
    expect(describeOutcome(outcome)).toBe(
      'Probe exited unexpectedly (code=2, signal=none)\nping: nowhere.invalid: Name or service not known'
    );
  });

  it('terminates the process and reports cancellation', async () => {
    const { fake, probe } = createProbe();
    const controller = new AbortController();
    const run = probe.start(controller.signal);

    fake.emit('spawn');
    controller.abort();

    await expect(collect(run.events)).resolves.toEqual([
      { type: 'outcome', outcome: { kind: 'cancelled' } }
    ]);
    expect(fake.killSignals).toEqual(['SIGTERM']);
    expect(fake.hasExited()).toBe(true);
  });

  it('drops output that arrives after cancellation', async () => {
    const { fake, probe } = createProbe({ stopTimeoutMs: 10_000 });
    fake.ignoreSigterm = true;
    const controller = new AbortController();
    const run = probe.start(controller.signal);

    fake.emit('spawn');
    fake.writeLines(reply(1, '4.0'));
    await nextTurn();
    controller.abort();
    fake.writeLines(reply(2, '5.0'));
    await nextTurn();
    fake.exit(null, 'SIGTERM');

    await expect(collect(run.events)).resolves.toEqual([
      { type: 'sample', latencyMs: 4 },
      { type: 'outcome', outcome: { kind: 'cancelled' } }
    ]);
  });

  it('escalates to SIGKILL when the process ignores SIGTERM', async () => {
    const { fake, probe } = createProbe({ stopTimeoutMs: 20 });
    fake.ignoreSigterm = true;
    const controller = new AbortController();
    const run = probe.start(controller.signal);

    fake.emit('spawn');
    controller.abort();

    await expect(run.outcome).resolves.toEqual({ kind: 'cancelled' });
    expect(fake.killSignals).toEqual(['SIGTERM', 'SIGKILL']);
  });

  it('does not spawn when the signal is already aborted', async () => {
    const { probe, spawnProcess } = createProbe();
    const controller = new AbortController();
    controller.abort();

    const run = probe.start(controller.signal);

    await expect(run.outcome).resolves.toEqual({ kind: 'cancelled' });
    expect(spawnProcess).not.toHaveBeenCalled();
  });

  it('keeps the exit outcome when cancellation comes after the close', async () => {
    const { fake, probe } = createProbe();
    const controller = new AbortController();
    const run = probe.start(controller.signal);

    fake.emit('spawn');
    fake.exit(0, null);
    await expect(run.outcome).resolves.toEqual({ kind: 'exited' });

    controller.abort();
    expect(fake.killSignals).toEqual([]);
  });

  it('lets a cancellation seen before the close event win', async () => {
    const { fake, probe } = createProbe();
    const controller = new AbortController();
    const run = probe.start(controller.signal);

    fake.emit('spawn');
    fake.exit(1, null);
    controller.abort();

    await expect(collect(run.events)).resolves.toEqual([
      { type: 'outcome', outcome: { kind: 'cancelled' } }
    ]);
  });

  it('reports a start failure when the process cannot be launched', async () => {
    const { fake, probe } = createProbe();
    const run = probe.start(new AbortController().signal);

    fake.emit('error', new Error('spawn ping ENOENT'));
    fake.exit(-2, null);

    const events = await collect(run.events);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ type: 'outcome', outcome: { kind: 'start-failed' } });
    expect(describeOutcome(await run.outcome)).toBe('Failed to start probe: spawn ping ENOENT');
  });

  it('reports a start failure when spawning throws', async () => {
    const probe = new PingProbe({
      host: '10.0.0.1',
      intervalSeconds: 1,
      spawnProcess: () => {
        throw new TypeError('bad arguments');
      }
    });

    const outcome = await probe.start(new AbortController().signal).outcome;
    expect(outcome.kind).toBe('start-failed');
    expect(describeOutcome(outcome)).toBe('Failed to start probe: bad arguments');
  });

  it('reports a start failure for a missing executable', async () => {
    const probe = new PingProbe({
      host: '127.0.0.1',
      intervalSeconds: 1,
      command: 'pingwatch-missing-probe-binary'
    });

    const run = probe.start(new AbortController().signal);
    const events = await collect(run.events);
    const outcome = await run.outcome;

    expect(events).toEqual([{ type: 'outcome', outcome }]);
    expect(outcome.kind).toBe('start-failed');
    expect(describeOutcome(outcome)).toContain('ENOENT');
  });

  it('terminates the process when its output stream fails', async () => {
    const { fake, probe } = createProbe();
    const run = probe.start(new AbortController().signal);

    fake.emit('spawn');
    fake.stdout.destroy(new Error('pipe broken'));

    const outcome = await run.outcome;
    expect(fake.killSignals).toEqual(['SIGTERM']);
    expect(outcome.kind).toBe('stream-failed');
    expect(describeOutcome(outcome)).toBe('Probe output stream failed: pipe broken');
  });

  it('hands every line to a custom parser', async () => {
    const parse = vi.fn((line: string) =>
      line.startsWith('rtt ')
        ? { kind: 'sample' as const, latencyMs: Number.parseFloat(line.slice(4)) }
        : { kind: 'unrecognized' as const }
    );
    const { fake, probe } = createProbe({ parser: { name: 'custom', parse } });
    const run = probe.start(new AbortController().signal);

    fake.emit('spawn');
    fake.writeLines('rtt 12.5', 'noise');
    fake.exit(0, null);

    await expect(collect(run.events)).resolves.toEqual([
      { type: 'sample', latencyMs: 12.5 },
      { type: 'outcome', outcome: { kind: 'exited' } }
    ]);
    expect(parse).toHaveBeenCalledTimes(2);
    expect(probe.getDroppedLineCount()).toBe(1);
  });

  it('cannot be started twice', () => {
    const { probe } = createProbe();
    probe.start(new AbortController().signal);

    expect(() => probe.start(new AbortController().signal)).toThrow('Probe has already been started');
  });
});
