export type ProbeLineResult =
  | { kind: 'sample'; latencyMs: number }
  | { kind: 'ignored' }
  | { kind: 'unrecognized' };

/** One ping output dialect. The producer only sees classified lines. */
export interface ProbeLineParser {
  readonly name: string;
  parse(line: string): ProbeLineResult;
}

// `64 bytes from 1.2.3.4: icmp_seq=1 ttl=64 time=23.4 ms`; ping drops the fraction on large values.
const REPLY_LINE = /^\d+ bytes from \d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}: icmp_seq=\d+ ttl=\d+ time=(\d+(?:\.\d+)?) ms$/;

export const parsePingLine = (line: string): ProbeLineResult => {
  const trimmed = line.trim();

  if (!trimmed || trimmed.startsWith('PING')) {
    return { kind: 'ignored' };
  }

  const match = REPLY_LINE.exec(trimmed);
  if (!match) {
    return { kind: 'unrecognized' };
  }

  const latencyMs = Number.parseFloat(match[1]);
  if (!Number.isFinite(latencyMs)) {
    return { kind: 'unrecognized' };
  }

  return { kind: 'sample', latencyMs };
};

export const pingLineParser: ProbeLineParser = {
  name: 'ping',
  parse: parsePingLine
};
