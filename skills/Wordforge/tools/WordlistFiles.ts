/**
 * WordlistFiles.ts - Line-delimited wordlist reading
 *
 * Files are decoded as UTF-8; byte sequences that are not valid UTF-8
 * are dropped rather than failing the read (wordlists in the wild mix
 * encodings).
 *
 * @license MIT
 */

import { existsSync, readFileSync, statSync } from "node:fs";
import { Logger, LogLevel } from "./Logger";
import { WordforgeError, WordforgeErrorCode, errorMessage, inputError } from "./WordforgeError";


const logger = new Logger("WordlistFiles", LogLevel.INFO);

export interface WordlistReadResult {
  collections: string[][];
  loaded: Array<{ path: string; count: number }>;
  skipped: Array<{ path: string; reason: string }>;
}

/**
 * Split decoded text into trimmed, non-empty lines
 */
export function parseWordlist(content: string): string[] {
  const words: string[] = [];
  for (const line of content.split(/\r?\n/)) {
    const word = line.trim();
    if (word) words.push(word);
  }
  return words;
}

function isContinuation(byte: number | undefined, low = 0x80, high = 0xbf): boolean {
  return byte !== undefined && byte >= low && byte <= high;
}

/**
 * Length of the well-formed UTF-8 sequence starting at i, or 0 when the
 * byte at i cannot start one
 */
function sequenceLength(bytes: Uint8Array, i: number): number {
  const lead = bytes[i];
  const next = i + 1 < bytes.length ? bytes[i + 1] : undefined;
  const rest = (from: number, to: number): boolean => {
    for (let j = from; j < to; j++) {
      if (j >= bytes.length || !isContinuation(bytes[j])) return false;
    }
    return true;
  };

  if (lead < 0x80) return 1;
  if (lead >= 0xc2 && lead <= 0xdf) return isContinuation(next) ? 2 : 0;
  if (lead >= 0xe0 && lead <= 0xef) {
    const ok = lead === 0xe0 ? isContinuation(next, 0xa0) : lead === 0xed ? isContinuation(next, 0x80, 0x9f) : isContinuation(next);
    return ok && rest(i + 2, i + 3) ? 3 : 0;
  }
  if (lead >= 0xf0 && lead <= 0xf4) {
    const ok = lead === 0xf0 ? isContinuation(next, 0x90) : lead === 0xf4 ? isContinuation(next, 0x80, 0x8f) : isContinuation(next);
    return ok && rest(i + 2, i + 4) ? 4 : 0;
  }
  return 0;
}

/**
 * Decode UTF-8, dropping bytes that are not part of a well-formed sequence.
 * U+FFFD encoded in the input is kept.
 */
export function decodeWordlist(buffer: Uint8Array): string {
  const kept = new Uint8Array(buffer.length);
  let size = 0;
  let i = 0;
  while (i < buffer.length) {
    const length = sequenceLength(buffer, i);
    if (length === 0) {
      i++;
      continue;
    }
    kept.set(buffer.subarray(i, i + length), size);
    size += length;
    i += length;
  }
  return new TextDecoder("utf-8").decode(kept.subarray(0, size));
}

export function readWordlistFile(path: string): string[] {
  if (!existsSync(path) || !statSync(path).isFile()) {
    throw inputError(`File not found: ${path}`, WordforgeErrorCode.FILE_NOT_FOUND, { path });
  }

  let buffer: Buffer;
  try {
    buffer = readFileSync(path);
  } catch (error) {
    throw inputError(`Cannot read ${path}: ${errorMessage(error)}`, WordforgeErrorCode.FILE_UNREADABLE, { path });
  }

  return parseWordlist(decodeWordlist(buffer));
}

/**
 * Read several wordlists. Missing or unreadable files are skipped with a
 * warning; the rest still load.
 */
export function readWordlists(paths: readonly string[], log: Logger = logger): WordlistReadResult {
  const result: WordlistReadResult = { collections: [], loaded: [], skipped: [] };

  for (const path of paths) {
    try {
      const words = readWordlistFile(path);
      result.collections.push(words);
      result.loaded.push({ path, count: words.length });
      log.debug(`Loaded ${words.length} words from ${path}`);
    } catch (error) {
      if (!(error instanceof WordforgeError)) throw error;
      log.warn(`${error.message}, skipping`);
      result.skipped.push({ path, reason: error.message });
    }
  }

  return result;
}
