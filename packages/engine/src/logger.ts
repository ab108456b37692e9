/**
 * Console-backed logger with per-source tags and subscribers.
 */

export const LogLevel = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  SILENT: 4,
} as const;

export type LogLevelName = "DEBUG" | "INFO" | "WARN" | "ERROR";
export type LogThreshold = LogLevelName | "SILENT";

export const LogSource = {
  LOADER: "loader",
  BUILDER: "builder",
  CLI: "cli",
} as const;

export type LogSourceName = (typeof LogSource)[keyof typeof LogSource];

export interface LogEntry {
  id: number;
  timestamp: number;
  level: LogLevelName;
  source: LogSourceName;
  message: string;
}

export type LogSubscriber = (entry: LogEntry) => void;

/** Where console output goes; tests pass a recording sink. */
export interface LogSink {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  level?: LogThreshold;
  sink?: LogSink;
}

export const LOG_LEVEL_ENV = "PBRTKIT_LOG_LEVEL";

/** Case-insensitive level name, or `undefined` if unrecognized. */
export function parseLogLevel(text: string | undefined): LogThreshold | undefined {
  switch (text?.trim().toUpperCase()) {
    case "DEBUG":
      return "DEBUG";
    case "INFO":
      return "INFO";
    case "WARN":
    case "WARNING":
      return "WARN";
    case "ERROR":
      return "ERROR";
    case "SILENT":
    case "OFF":
      return "SILENT";
    default:
      return undefined;
  }
}

export class Logger {
  level: LogThreshold;
  private readonly sink: LogSink;
  private readonly subscribers = new Set<LogSubscriber>();
  private nextId = 1;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? parseLogLevel(process.env[LOG_LEVEL_ENV]) ?? "WARN";
    this.sink = options.sink ?? console;
  }

  /** Subscribers see every entry regardless of level. Returns an unsubscribe function. */
  subscribe(subscriber: LogSubscriber): () => void {
    this.subscribers.add(subscriber);
    return () => {
      this.subscribers.delete(subscriber);
    };
  }

  isEnabled(level: LogLevelName): boolean {
    return LogLevel[level] >= LogLevel[this.level];
  }

  debug(source: LogSourceName, message: string): void {
    this.log("DEBUG", source, message);
  }

  info(source: LogSourceName, message: string): void {
    this.log("INFO", source, message);
  }

  warn(source: LogSourceName, message: string): void {
    this.log("WARN", source, message);
  }

  error(source: LogSourceName, message: string): void {
    this.log("ERROR", source, message);
  }

  private log(level: LogLevelName, source: LogSourceName, message: string): void {
    const entry: LogEntry = { id: this.nextId++, timestamp: Date.now(), level, source, message };
    for (const subscriber of this.subscribers) {
      subscriber(entry);
    }
    if (!this.isEnabled(level)) return;

    const line = `[${source.toUpperCase()}] ${message}`;
    switch (level) {
      case "DEBUG":
        this.sink.debug(line);
        break;
      case "INFO":
        this.sink.info(line);
        break;
      case "WARN":
        this.sink.warn(line);
        break;
      case "ERROR":
        this.sink.error(line);
        break;
    }
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}

/** Shared default logger; level from `PBRTKIT_LOG_LEVEL`, else WARN. */
export const logger = createLogger();
