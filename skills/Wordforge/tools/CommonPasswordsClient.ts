/**
 * CommonPasswordsClient.ts - Reference common-password list download
 *
 * Fetches a plain-text top-N password list to use as improve/merge input.
 * The URL can be pointed at a mirror with WORDFORGE_COMMON_URL.
 *
 * @license MIT
 */

import { Logger, LogLevel } from "./Logger";
import { parseWordlist } from "./WordlistFiles";
import { writeExport } from "./Exporters";
import { WordforgeError, WordforgeErrorCode, errorMessage, networkError } from "./WordforgeError";

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_COMMON_PASSWORDS_URL =
  "https://raw.githubusercontent.com/danielmiessler/SecLists/master/Passwords/Common-Credentials/10-million-password-list-top-1000.txt";

export const DEFAULT_OUTPUT_FILE = "common_passwords.txt";

const REQUEST_TIMEOUT_MS = 30000; // 30 seconds

export type FetchLike = (input: string, init?: { signal?: AbortSignal; headers?: Record<string, string> }) => Promise<{
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
}>;

export interface CommonPasswordsClientOptions {
  url?: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

export interface DownloadResult {
  path: string;
  url: string;
  count: number;
}

// =============================================================================
// Client
// =============================================================================

export class CommonPasswordsClient {
  private url: string;
  private timeoutMs: number;
  private fetchImpl: FetchLike;
  private logger: Logger;

  constructor(options: CommonPasswordsClientOptions = {}) {
    this.url = options.url || process.env.WORDFORGE_COMMON_URL || DEFAULT_COMMON_PASSWORDS_URL;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl || fetch;
    this.logger = options.logger || new Logger("CommonPasswordsClient", LogLevel.INFO);
  }

  getUrl(): string {
    return this.url;
  }

  /**
   * Fetch the list and return its non-empty lines
   */
  async fetchList(): Promise<string[]> {
    this.logger.debug(`Fetching ${this.url}`);

    let body: string;
    try {
      const response = await this.fetchImpl(this.url, {
        signal: AbortSignal.timeout(this.timeoutMs),
        headers: { "User-Agent": "Wordforge/1.0" },
      });

      if (!response.ok) {
        throw networkError(`Download failed: HTTP ${response.status} ${response.statusText}`);
      }
      body = await response.text();
    } catch (error) {
      if (error instanceof WordforgeError) throw error;
      if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
        throw networkError(`Download timed out after ${this.timeoutMs}ms`, WordforgeErrorCode.DOWNLOAD_TIMEOUT, error);
      }
      throw networkError(`Download failed: ${errorMessage(error)}`, WordforgeErrorCode.DOWNLOAD_FAILED, error);
    }

    return parseWordlist(body);
  }

  /**
   * Download the list to outputPath, one password per line
   */
  async download(outputPath: string = DEFAULT_OUTPUT_FILE): Promise<DownloadResult> {
    const words = await this.fetchList();
    writeExport(outputPath, words.length === 0 ? "" : words.join("\n") + "\n");
    this.logger.info(`Downloaded ${words.length} passwords to ${outputPath}`);
    return { path: outputPath, url: this.url, count: words.length };
  }
}
