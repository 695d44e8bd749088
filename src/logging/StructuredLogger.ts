import fs from 'node:fs/promises';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogContext {
  [key: string]: unknown;
}

interface LogEntry extends LogContext {
  ts: string;
  level: LogLevel;
  message: string;
}

export interface StructuredLoggerOptions {
  level?: LogLevel;
  echo?: boolean;
}

export class StructuredLogger {
  private writeQueue: Promise<void> = Promise.resolve();
  private echo: boolean;
  private readonly minLevelIndex: number;

  private constructor(
    private readonly filePath: string,
    options: StructuredLoggerOptions
  ) {
    this.echo = options.echo ?? true;
    this.minLevelIndex = LOG_LEVELS.indexOf(options.level ?? 'info');
  }

  public static async create(
    logDir: string,
    options: StructuredLoggerOptions = {}
  ): Promise<StructuredLogger> {
    await fs.mkdir(logDir, { recursive: true });

    const datePrefix = new Date().toISOString().slice(0, 10);
    const filePath = path.join(logDir, `pingwatch-${datePrefix}.log`);

    return new StructuredLogger(filePath, options);
  }

  public getLogPath(): string {
    return this.filePath;
  }

  /** Console mirroring is switched off while the dashboard owns the terminal. */
  public setEcho(echo: boolean): void {
    this.echo = echo;
  }

  public debug(message: string, context: LogContext = {}): void {
    this.write('debug', message, context);
  }

  public info(message: string, context: LogContext = {}): void {
    this.write('info', message, context);
  }

  public warn(message: string, context: LogContext = {}): void {
    this.write('warn', message, context);
  }

  public error(message: string, context: LogContext = {}): void {
    this.write('error', message, context);
  }

  public async flush(): Promise<void> {
    await this.writeQueue;
  }

  private write(level: LogLevel, message: string, context: LogContext): void {
    if (LOG_LEVELS.indexOf(level) < this.minLevelIndex) {
      return;
    }

    const entry: LogEntry = {
      ...context,
      ts: new Date().toISOString(),
      level,
      message
    };

    const line = `${JSON.stringify(entry)}\n`;

    this.writeQueue = this.writeQueue
      .then(async () => {
        await fs.appendFile(this.filePath, line, 'utf8');
      })
      .catch((error) => {
        const detail = error instanceof Error ? error.message : String(error);
        process.stderr.write(`[pingwatch] Failed to write log file: ${detail}\n`);
      });

    if (!this.echo) {
      return;
    }

    if (level === 'error') {
      console.error(`[pingwatch] ${message}`, context);
      return;
    }

    if (level === 'warn') {
      console.warn(`[pingwatch] ${message}`, context);
      return;
    }

    console.log(`[pingwatch] ${message}`, context);
  }
}
