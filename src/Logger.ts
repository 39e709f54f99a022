import { inspect } from 'node:util';
import { Clock, DateTimeFormatter, LocalTime } from '@js-joda/core';

const TIME_FORMAT = DateTimeFormatter.ofPattern('HH:mm:ss.SSS');

const resetStyle = '\x1B[0m';
const red = '\x1B[31m';

export type LogSink = (line: string) => void;

export interface LoggerOptions {
  /** Receives each finished line, without a trailing newline. Defaults to stderr. */
  sink?: LogSink;
  colors?: boolean;
  clock?: Clock;
}

export class Logger {
  private readonly sink: LogSink;
  private readonly colors: boolean;
  private readonly clock: Clock;

  public constructor(options: LoggerOptions = {}) {
    this.sink = options.sink ?? ((line) => process.stderr.write(`${line}\n`));
    this.colors = options.colors ?? false;
    this.clock = options.clock ?? Clock.systemDefaultZone();
  }

  private timestamp(): string {
    return LocalTime.now(this.clock).format(TIME_FORMAT);
  }

  private formatLogLine(message: string, ...args: unknown[]): string {
    let line = `${this.colors ? resetStyle : ''}[${this.timestamp()}] ${message}`;
    for (const a of args) {
      line += ' ';
      line += typeof a === 'string' ? a : inspect(a, { depth: null, colors: this.colors, breakLength: Infinity, compact: true });
    }
    return line;
  }

  /** Timestamped line; non-string arguments are inspected inline. */
  public log(message: string, ...args: unknown[]): void {
    this.sink(this.formatLogLine(message, ...args));
  }

  public error(message: string): void {
    this.sink(this.colors ? `${red}Error: ${message}${resetStyle}` : `Error: ${message}`);
  }
}
