/**
 * Logger.ts - Leveled Component Logger
 *
 * Writes "[LEVEL] [Component] message" lines to stderr so that stdout
 * stays clean for piped wordlists.
 *
 * @license MIT
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogSink = (line: string) => void;

const LEVEL_LABELS: Record<Exclude<LogLevel, LogLevel.SILENT>, string> = {
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.INFO]: "INFO",
  [LogLevel.WARN]: "WARN",
  [LogLevel.ERROR]: "ERROR",
};

const LEVEL_COLORS: Record<Exclude<LogLevel, LogLevel.SILENT>, string> = {
  [LogLevel.DEBUG]: "\x1b[90m",
  [LogLevel.INFO]: "\x1b[36m",
  [LogLevel.WARN]: "\x1b[33m",
  [LogLevel.ERROR]: "\x1b[31m",
};

const RESET = "\x1b[0m";

// Process-wide override set by --debug / --quiet
let globalLevel: LogLevel | null = null;

export function setGlobalLogLevel(level: LogLevel | null): void {
  globalLevel = level;
}

/**
 * Parse a level name ("debug", "WARN", ...) from the environment
 */
export function parseLogLevel(value: string | undefined): LogLevel | null {
  switch ((value || "").trim().toUpperCase()) {
    case "DEBUG":
      return LogLevel.DEBUG;
    case "INFO":
      return LogLevel.INFO;
    case "WARN":
    case "WARNING":
      return LogLevel.WARN;
    case "ERROR":
      return LogLevel.ERROR;
    case "SILENT":
      return LogLevel.SILENT;
    default:
      return null;
  }
}

export class Logger {
  private name: string;
  private level: LogLevel;
  private sink: LogSink;
  private colors: boolean;

  constructor(name: string, level: LogLevel = LogLevel.INFO, sink?: LogSink) {
    this.name = name;
    this.level = parseLogLevel(process.env.WORDFORGE_LOG_LEVEL) ?? level;
    this.sink = sink || ((line) => process.stderr.write(line + "\n"));
    this.colors = !sink && Boolean(process.stderr.isTTY);
  }

  private effectiveLevel(): LogLevel {
    return globalLevel ?? this.level;
  }

  isEnabled(level: LogLevel): boolean {
    return level !== LogLevel.SILENT && level >= this.effectiveLevel();
  }

  private write(level: Exclude<LogLevel, LogLevel.SILENT>, message: string): void {
    if (!this.isEnabled(level)) return;

    const label = this.colors
      ? `${LEVEL_COLORS[level]}[${LEVEL_LABELS[level]}]${RESET}`
      : `[${LEVEL_LABELS[level]}]`;
    this.sink(`${label} [${this.name}] ${message}`);
  }

  debug(message: string): void {
    this.write(LogLevel.DEBUG, message);
  }

  info(message: string): void {
    this.write(LogLevel.INFO, message);
  }

  warn(message: string): void {
    this.write(LogLevel.WARN, message);
  }

  error(message: string): void {
    this.write(LogLevel.ERROR, message);
  }
}
