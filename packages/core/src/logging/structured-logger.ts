export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface StructuredLogEvent {
  readonly level: LogLevel;
  readonly name: string;
  readonly event: string;
  readonly elapsedMs?: number;
  readonly context?: Readonly<Record<string, unknown>>;
  readonly data?: Readonly<Record<string, unknown>>;
}

export interface StructuredLogger {
  log(entry: StructuredLogEvent): void;
}

export interface JsonLineLoggerOptions {
  readonly minimumLevel?: LogLevel;
  readonly now?: () => Date;
}

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = Object.freeze({
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
});

/**
 * Writes each entry as one JSON document followed by a newline. Entries below the configured
 * minimum level are dropped.
 */
export class JsonLineLogger implements StructuredLogger {
  private readonly threshold: number;
  private readonly now: () => Date;

  constructor(
    private readonly output: { write(line: string): void },
    options: JsonLineLoggerOptions = {},
  ) {
    this.threshold = LEVEL_ORDER[options.minimumLevel ?? 'debug'];
    this.now = options.now ?? (() => new Date());
  }

  log(entry: StructuredLogEvent): void {
    if (LEVEL_ORDER[entry.level] < this.threshold) {
      return;
    }

    const payload = JSON.stringify({
      ...entry,
      timestamp: this.now().toISOString(),
    });
    this.output.write(`${payload}\n`);
  }
}

export const noopLogger: StructuredLogger = {
  log() {
    // noop
  },
};
