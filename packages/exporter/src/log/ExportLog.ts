export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ExportLogOptions {
  /** Record debug entries. Default: false */
  debug?: boolean;
  /** Echo entries to the console. Default: true */
  echo?: boolean;
}

const consoleWriters: Record<LogLevel, (message: string) => void> = {
  debug: (message) => console.debug(message),
  info: (message) => console.info(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
};

/**
 * Progress and diagnostic log of an export run. Entries are kept for the
 * final summary and echoed to the console as they arrive.
 */
export class ExportLog implements Logger {
  private readonly recorded: LogEntry[] = [];

  constructor(private readonly options: ExportLogOptions = {}) {}

  get entries(): readonly LogEntry[] {
    return this.recorded;
  }

  count(level: LogLevel): number {
    return this.recorded.filter((entry) => entry.level === level).length;
  }

  debug(message: string): void {
    if (!this.options.debug) return;
    this.record("debug", message);
  }

  info(message: string): void {
    this.record("info", message);
  }

  warn(message: string): void {
    this.record("warn", message);
  }

  error(message: string): void {
    this.record("error", message);
  }

  private record(level: LogLevel, message: string): void {
    this.recorded.push({ level, message });
    if (this.options.echo ?? true) {
      consoleWriters[level](message);
    }
  }
}
