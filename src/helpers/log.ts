export type LogLevel = 'normal' | 'verbose' | 'debug';

const LEVEL_ORDER: Record<LogLevel, number> = {
  normal: 0,
  verbose: 1,
  debug: 2
};

export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

const consoleSink: LogSink = {
  out: line => console.log(line),
  err: line => console.error(line)
};

export function levelFromFlags(flags: { debug?: boolean; verbose?: boolean }): LogLevel {
  if (flags.debug) return 'debug';
  if (flags.verbose) return 'verbose';
  return 'normal';
}

/**
 * Severity-prefixed console output. The level is fixed when the logger is
 * created; errors and warnings are always written.
 */
export class Logger {
  private readonly rank: number;

  constructor(
    public readonly level: LogLevel = 'normal',
    private readonly sink: LogSink = consoleSink
  ) {
    this.rank = LEVEL_ORDER[level];
  }

  error(message: string): void {
    this.sink.err(`❌ Error: ${message}`);
  }

  warn(message: string): void {
    this.sink.err(`⚠️  Warning: ${message}`);
  }

  success(message: string): void {
    this.sink.out(`✅ ${message}`);
  }

  info(message: string): void {
    this.sink.out(message);
  }

  verbose(message: string): void {
    if (this.rank >= LEVEL_ORDER.verbose) this.sink.out(`» ${message}`);
  }

  debug(message: string): void {
    if (this.rank >= LEVEL_ORDER.debug) this.sink.err(`🐛 Debug: ${message}`);
  }

  /** Raw engine output such as diff lines, written without a prefix. */
  line(text: string): void {
    this.sink.out(text);
  }
}

export function createMemorySink(): LogSink & { lines: string[]; errors: string[] } {
  const lines: string[] = [];
  const errors: string[] = [];
  return {
    lines,
    errors,
    out: line => { lines.push(line); },
    err: line => { errors.push(line); }
  };
}
