/** Severity of a log entry. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** A single structured log entry. */
export type LogEntry = Readonly<{
  level: LogLevel;
  message: string;
  context?: Readonly<Record<string, unknown>>;
}>;

/**
 * Logger the client reports to. Pass one to the client explicitly;
 * nothing is logged otherwise.
 */
export interface Logger {
  log(entry: LogEntry): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/** Logger dropping every entry, used when none is given. */
export const noopLogger: Logger = {
  log() {},
};

/** Destination of a {@link ConsoleLogger} line. */
export type LogWriter = (line: string) => void;

/**
 * Writes entries at or above `minLevel` as JSON lines.
 */
export class ConsoleLogger implements Logger {
  /** Lowest level written. */
  #minLevel: LogLevel;
  /** Destination of each line. */
  #write: LogWriter;

  /** Creates a logger writing to `write`, `console.log` by default */
  constructor(minLevel: LogLevel = 'info', write: LogWriter = (line) => console.log(line)) {
    this.#minLevel = minLevel;
    this.#write = write;
  }

  log(entry: LogEntry): void {
    if (LEVEL_PRIORITY[entry.level] < LEVEL_PRIORITY[this.#minLevel]) return;
    const line = entry.context ? { level: entry.level, message: entry.message, ...entry.context } : entry;
    this.#write(JSON.stringify(line));
  }
}
