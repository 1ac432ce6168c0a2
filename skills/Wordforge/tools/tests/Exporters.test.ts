/**
 * Exporters.test.ts - txt / json / csv rendering and output tests
 *
 * @license MIT
 */

import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { DEFAULT_SPECIAL_CHARS } from "../config";
import { escapeCsv, isExportFormat, renderCsv, renderJson, renderText, writeExport } from "../Exporters";
import { createProfile } from "../ProfileValidator";
import { aggregateStatistics } from "../Statistics";
import { fixedClock } from "../types";
import { WordforgeError, WordforgeErrorCode } from "../WordforgeError";

const clock = fixedClock("2026-10-18T12:00:00.000Z");

describe("renderText", () => {
  test("sorted, one per line, trailing newline", () => {
    expect(renderText(new Set(["b", "a", "C"]))).toBe("C\na\nb\n");
  });

  test("empty input renders nothing", () => {
    expect(renderText([])).toBe("");
  });
});

describe("renderCsv", () => {
  test("header plus one analyzed row per password", () => {
    expect(renderCsv(["aaaa1111", "Password1!"], DEFAULT_SPECIAL_CHARS)).toBe(
      [
        "Password,Length,Strength,Has_Upper,Has_Lower,Has_Digit,Has_Special",
        "Password1!,10,strong,true,true,true,true",
        "aaaa1111,8,weak,false,true,true,false",
        "",
      ].join("\n")
    );
  });

  test("quotes passwords containing commas", () => {
    expect(renderCsv(["x,y"], [])).toBe(
      "Password,Length,Strength,Has_Upper,Has_Lower,Has_Digit,Has_Special\n" + '"x,y",3,weak,false,true,false,false\n'
    );
  });
});

describe("escapeCsv", () => {
  test("RFC 4180 quoting", () => {
    expect(escapeCsv("plain")).toBe("plain");
    expect(escapeCsv("a,b")).toBe('"a,b"');
    expect(escapeCsv('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsv("two\nlines")).toBe('"two\nlines"');
  });
});

describe("renderJson", () => {
  const profile = createProfile({ name: "john", surname: "doe" });
  const tokens = new Set(["johndoe", "Password1!"]);
  const stats = aggregateStatistics(tokens, DEFAULT_SPECIAL_CHARS, clock);
  const output = renderJson(tokens, stats, profile, clock);

  test("metadata, statistics and sorted passwords", () => {
    const data = JSON.parse(output);

    expect(data.metadata).toEqual({
      tool: "Wordforge v1.0.0",
      generated_at: "2026-10-18T12:00:00.000Z",
      target_name: "john",
      profile: JSON.parse(JSON.stringify(profile)),
    });
    expect(data.statistics.totalPasswords).toBe(2);
    expect(data.passwords).toEqual(["Password1!", "johndoe"]);
  });

  test("two-space indent and trailing newline", () => {
    expect(output.startsWith('{\n  "metadata": {\n    "tool": "Wordforge v1.0.0"')).toBe(true);
    expect(output.endsWith("}\n")).toBe(true);
  });
});

describe("isExportFormat", () => {
  test("known formats", () => {
    expect(isExportFormat("txt")).toBe(true);
    expect(isExportFormat("csv")).toBe(true);
    expect(isExportFormat("xml")).toBe(false);
  });
});

describe("writeExport", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "wordforge-export-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("creates missing parent directories", () => {
    const path = join(dir, "nested", "deeper", "out.txt");
    writeExport(path, "alpha1\n");

    expect(existsSync(path)).toBe(true);
    expect(readFileSync(path, "utf-8")).toBe("alpha1\n");
  });

  test("failure is an OUTPUT_WRITE_FAILED error", () => {
    const blocker = join(dir, "file.txt");
    writeFileSync(blocker, "");
    const path = join(blocker, "out.txt");

    expect(() => writeExport(path, "x")).toThrow(WordforgeError);
    try {
      writeExport(path, "x");
    } catch (error) {
      expect(error).toBeInstanceOf(WordforgeError);
      if (error instanceof WordforgeError) {
        expect(error.code).toBe(WordforgeErrorCode.OUTPUT_WRITE_FAILED);
        expect(error.message).toBe(`Cannot write ${path}`);
      }
    }
  });
});
