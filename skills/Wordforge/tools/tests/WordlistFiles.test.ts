/**
 * WordlistFiles.test.ts - Wordlist reading tests
 *
 * @license MIT
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { Logger, LogLevel } from "../Logger";
import { WordforgeError, WordforgeErrorCode } from "../WordforgeError";
import { decodeWordlist, parseWordlist, readWordlistFile, readWordlists } from "../WordlistFiles";

describe("parseWordlist", () => {
  test("trims lines and drops blanks", () => {
    expect(parseWordlist("a\r\n  b \n\n\nc")).toEqual(["a", "b", "c"]);
  });

  test("empty content", () => {
    expect(parseWordlist("")).toEqual([]);
  });
});

describe("decodeWordlist", () => {
  test("drops invalid UTF-8 bytes", () => {
    expect(decodeWordlist(new Uint8Array([0x61, 0xff, 0x62]))).toBe("ab");
  });

  test("drops truncated and surrogate sequences", () => {
    expect(decodeWordlist(new Uint8Array([0x61, 0xe2, 0x82, 0x62, 0xe2, 0x82]))).toBe("ab");
    expect(decodeWordlist(new Uint8Array([0x78, 0xed, 0xa0, 0x80, 0x79]))).toBe("xy");
    expect(decodeWordlist(new Uint8Array([0xc0, 0xaf, 0x7a]))).toBe("z");
  });

  test("keeps an encoded replacement character", () => {
    expect(decodeWordlist(new Uint8Array([0x61, 0xef, 0xbf, 0xbd, 0xff, 0x62]))).toBe("a\uFFFDb");
  });

  test("keeps four-byte characters", () => {
    expect(decodeWordlist(new TextEncoder().encode("pass🔑"))).toBe("pass🔑");
  });

  test("keeps valid multi-byte characters", () => {
    expect(decodeWordlist(new TextEncoder().encode("pässwörd"))).toBe("pässwörd");
  });
});

describe("file reading", () => {
  let dir: string;
  let lines: string[];
  let log: Logger;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "wordforge-lists-"));
    lines = [];
    log = new Logger("Test", LogLevel.INFO, (line) => lines.push(line));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("readWordlistFile", () => {
    const path = join(dir, "list.txt");
    writeFileSync(path, "alpha1\nbravo2\n");
    expect(readWordlistFile(path)).toEqual(["alpha1", "bravo2"]);
  });

  test("missing file", () => {
    const path = join(dir, "missing.txt");
    expect(() => readWordlistFile(path)).toThrow(`File not found: ${path}`);
    try {
      readWordlistFile(path);
    } catch (error) {
      expect(error instanceof WordforgeError && error.code).toBe(WordforgeErrorCode.FILE_NOT_FOUND);
    }
  });

  test("a directory is not a wordlist", () => {
    expect(() => readWordlistFile(dir)).toThrow(`File not found: ${dir}`);
  });

  test("readWordlists skips unreadable inputs", () => {
    const good = join(dir, "good.txt");
    const missing = join(dir, "missing.txt");
    writeFileSync(good, "x\ny\n");

    const result = readWordlists([good, missing], log);

    expect(result.collections).toEqual([["x", "y"]]);
    expect(result.loaded).toEqual([{ path: good, count: 2 }]);
    expect(result.skipped).toEqual([{ path: missing, reason: `File not found: ${missing}` }]);
    expect(lines).toEqual([`[WARN] [Test] File not found: ${missing}, skipping`]);
  });
});
