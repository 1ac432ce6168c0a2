/**
 * WordforgeError.ts - Structured Errors for Wordforge
 *
 * Error codes are grouped by hundreds:
 *   1xx - configuration
 *   2xx - input (profiles, wordlist files, arguments)
 *   3xx - output / filesystem
 *   4xx - network
 *   9xx - internal
 *
 * @license MIT
 */

// =============================================================================
// Codes and Categories
// =============================================================================

export enum WordforgeErrorCode {
  CONFIG_INVALID = "WF-101",

  INPUT_MISSING = "WF-200",
  INPUT_INVALID = "WF-201",
  FILE_NOT_FOUND = "WF-202",
  FILE_UNREADABLE = "WF-203",
  PROFILE_INVALID = "WF-204",

  OUTPUT_WRITE_FAILED = "WF-300",

  DOWNLOAD_FAILED = "WF-400",
  DOWNLOAD_TIMEOUT = "WF-401",

  INTERNAL_ERROR = "WF-900",
}

export type ErrorCategory = "config" | "input" | "io" | "network" | "internal";

function categoryOf(code: WordforgeErrorCode): ErrorCategory {
  const n = parseInt(code.slice(3), 10);
  if (n < 200) return "config";
  if (n < 300) return "input";
  if (n < 400) return "io";
  if (n < 500) return "network";
  return "internal";
}

export interface WordforgeErrorOptions {
  source?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
  exitCode?: number;
}

export interface WordforgeErrorJson {
  error: true;
  code: WordforgeErrorCode;
  category: ErrorCategory;
  message: string;
  source?: string;
  details?: Record<string, unknown>;
  timestamp: string;
}

// =============================================================================
// Error Class
// =============================================================================

export class WordforgeError extends Error {
  readonly code: WordforgeErrorCode;
  readonly category: ErrorCategory;
  readonly source?: string;
  readonly details?: Record<string, unknown>;
  readonly timestamp: string;
  readonly exitCode: number;

  constructor(code: WordforgeErrorCode, message: string, options: WordforgeErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "WordforgeError";
    this.code = code;
    this.category = categoryOf(code);
    this.source = options.source;
    this.details = options.details;
    this.timestamp = new Date().toISOString();
    this.exitCode = options.exitCode ?? 1;
  }

  /**
   * Hint for the user, or null when there is nothing useful to say
   */
  getHelp(): string | null {
    switch (this.code) {
      case WordforgeErrorCode.CONFIG_INVALID:
        return "Fix the JSON in your config file or regenerate it with 'wordforge init-config'.";
      case WordforgeErrorCode.FILE_NOT_FOUND:
      case WordforgeErrorCode.FILE_UNREADABLE:
        return "Check the file path and permissions.";
      case WordforgeErrorCode.PROFILE_INVALID:
        return "Profile files are JSON objects, e.g. {\"name\": \"john\", \"birthdate\": \"15031990\"}.";
      case WordforgeErrorCode.OUTPUT_WRITE_FAILED:
        return "Check that the output directory is writable and the disk is not full.";
      case WordforgeErrorCode.DOWNLOAD_FAILED:
      case WordforgeErrorCode.DOWNLOAD_TIMEOUT:
        return "Check your network connection or set WORDFORGE_COMMON_URL to a reachable mirror.";
      default:
        return null;
    }
  }

  format(colors = true): string {
    const red = colors ? "\x1b[31m" : "";
    const dim = colors ? "\x1b[90m" : "";
    const reset = colors ? "\x1b[0m" : "";
    const source = this.source ? ` [${this.source}]` : "";
    return `${red}[ERROR]${reset}${source} ${dim}${this.code}:${reset} ${this.message}`;
  }

  toJSON(): WordforgeErrorJson {
    return {
      error: true,
      code: this.code,
      category: this.category,
      message: this.message,
      source: this.source,
      details: this.details,
      timestamp: this.timestamp,
    };
  }
}

// =============================================================================
// Factories
// =============================================================================

export function configError(
  message: string,
  code: WordforgeErrorCode = WordforgeErrorCode.CONFIG_INVALID,
  details?: Record<string, unknown>
): WordforgeError {
  return new WordforgeError(code, message, { source: "Config", details });
}

export function inputError(
  message: string,
  code: WordforgeErrorCode = WordforgeErrorCode.INPUT_INVALID,
  details?: Record<string, unknown>
): WordforgeError {
  return new WordforgeError(code, message, { source: "Input", details });
}

export function ioError(message: string, cause?: unknown, details?: Record<string, unknown>): WordforgeError {
  return new WordforgeError(WordforgeErrorCode.OUTPUT_WRITE_FAILED, message, {
    source: "Output",
    cause,
    details,
  });
}

export function networkError(
  message: string,
  code: WordforgeErrorCode = WordforgeErrorCode.DOWNLOAD_FAILED,
  cause?: unknown
): WordforgeError {
  return new WordforgeError(code, message, { source: "Network", cause });
}

// =============================================================================
// Utilities
// =============================================================================

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatError(error: unknown, colors = true): string {
  if (error instanceof WordforgeError) {
    return error.format(colors);
  }
  const red = colors ? "\x1b[31m" : "";
  const reset = colors ? "\x1b[0m" : "";
  return `${red}[ERROR]${reset} ${errorMessage(error)}`;
}
