/**
 * WordforgeCLI.test.ts - Command-level tests over temp files
 *
 * Commands run in-process through runCli() with captured output, a fixed
 * clock, scripted prompts and a stub fetch.
 *
 * @license MIT
 */

import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import type { FetchLike } from "../CommonPasswordsClient";
import { fixedClock } from "../types";
import { runCli } from "../WordforgeCLI";
import type { CliIO } from "../WordforgeCLI";

interface Harness {
  io: CliIO;
  out: string[];
  err: string[];
}

function harness(answers?: string[], fetchImpl?: FetchLike): Harness {
  const out: string[] = [];
  const err: string[] = [];
  const queue = answers ? [...answers] : undefined;
  const io: CliIO = {
    out: (line) => out.push(line),
    err: (line) => err.push(line),
    colors: false,
    clock: fixedClock("2026-10-18T12:00:00.000Z"),
    fetchImpl,
    prompt: queue
      ? () => ({
          ask: async () => queue.shift() ?? "",
          close: () => {},
        })
      : undefined,
  };
  return { io, out, err };
}

function lines(path: string): string[] {
  return readFileSync(path, "utf-8").split("\n").filter((line) => line.length > 0);
}

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "wordforge-cli-"));
  vi.stubEnv("WORDFORGE_CONFIG", join(dir, "absent.config.json"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
  vi.unstubAllEnvs();
});

// =============================================================================
// Global flags
// =============================================================================

describe("global flags", () => {
  test("--version", async () => {
    const h = harness();
    expect(await runCli(["--version"], h.io)).toBe(0);
    expect(h.out).toEqual(["Wordforge v1.0.0"]);
  });

  test("--help and no command print usage", async () => {
    const h = harness();
    expect(await runCli([], h.io)).toBe(0);
    expect(h.out[0]).toContain("Usage: wordforge <command> [options]");
  });

  test("unknown command", async () => {
    const h = harness();
    expect(await runCli(["bogus"], h.io)).toBe(1);
    expect(h.err).toEqual(["Error: Unknown command: bogus"]);
  });

  test("object prototype names are unknown commands", async () => {
    for (const name of ["constructor", "toString", "__proto__"]) {
      const h = harness();
      expect(await runCli([name], h.io)).toBe(1);
      expect(h.err).toEqual([`Error: Unknown command: ${name}`]);
    }
  });

  test("unknown option", async () => {
    const h = harness();
    expect(await runCli(["generate", "--bogus"], h.io)).toBe(2);
    expect(h.err).toHaveLength(1);
    expect(h.err[0].startsWith("Error: ")).toBe(true);
  });

  test("non-numeric length", async () => {
    const profile = join(dir, "profile.json");
    writeFileSync(profile, JSON.stringify({ name: "john" }));
    const h = harness();

    expect(await runCli(["generate", "--profile", profile, "--min-len", "abc"], h.io)).toBe(1);
    expect(h.err).toEqual(['[ERROR] [Input] WF-201: --min-len must be a positive integer, got "abc"']);
  });

  test("minimum above maximum", async () => {
    const profile = join(dir, "profile.json");
    writeFileSync(profile, JSON.stringify({ name: "john" }));
    const h = harness();

    expect(await runCli(["generate", "--profile", profile, "--min-len", "12", "--max-len", "8"], h.io)).toBe(1);
    expect(h.err).toEqual(["[ERROR] [Input] WF-201: Minimum length 12 exceeds maximum length 8"]);
  });
});

// =============================================================================
// generate
// =============================================================================

describe("generate", () => {
  let profile: string;

  beforeEach(() => {
    profile = join(dir, "john.json");
    writeFileSync(profile, JSON.stringify({ name: "john", surname: "doe", birthdate: "15031990" }));
  });

  test("writes every requested format", async () => {
    const h = harness();
    const base = join(dir, "out", "john");

    const code = await runCli(["generate", "--profile", profile, "--output", base, "--format", "txt,json,csv", "-q"], h.io);

    expect(code).toBe(0);
    const words = lines(`${base}.txt`);
    expect(words).toContain("johndoe");
    expect(words).toContain("john1503");
    expect(words).toEqual([...words].sort());

    const json = JSON.parse(readFileSync(`${base}.json`, "utf-8"));
    expect(json.metadata.target_name).toBe("john");
    expect(json.metadata.generated_at).toBe("2026-10-18T12:00:00.000Z");
    expect(json.passwords).toEqual(words);
    expect(json.statistics.totalPasswords).toBe(words.length);

    const csv = lines(`${base}.csv`);
    expect(csv[0]).toBe("Password,Length,Strength,Has_Upper,Has_Lower,Has_Digit,Has_Special");
    expect(csv).toHaveLength(words.length + 1);

    expect(h.out).toEqual([
      `✓ Saved to ${base}.txt (${words.length} passwords)`,
      `✓ Saved to ${base}.json (${words.length} passwords)`,
      `✓ Saved to ${base}.csv (${words.length} passwords)`,
    ]);
  });

  test("a format extension on --output is not doubled", async () => {
    const h = harness();
    const base = join(dir, "list");

    expect(await runCli(["generate", "-p", profile, "-o", `${base}.txt`, "-q"], h.io)).toBe(0);
    expect(existsSync(`${base}.txt`)).toBe(true);
    expect(existsSync(`${base}.txt.txt`)).toBe(false);
  });

  test("flags narrow the output", async () => {
    const h = harness();
    const base = join(dir, "narrow");

    await runCli(["generate", "-p", profile, "-o", base, "--min-len", "8", "--no-leet", "--no-modern", "-q"], h.io);
    const words = lines(`${base}.txt`);

    expect(words.every((word) => word.length >= 8)).toBe(true);
    expect(words).not.toContain("j0hnd03");
    expect(words).not.toContain("johnchatgpt");
    expect(words).toContain("john1503");
  });

  test("config file settings apply", async () => {
    const config = join(dir, "custom.json");
    writeFileSync(config, JSON.stringify({ useNumbers: false }));
    const h = harness();
    const base = join(dir, "configured");

    await runCli(["generate", "-p", profile, "-o", base, "--config", config, "-q"], h.io);
    expect(lines(`${base}.txt`)).not.toContain("john11");
  });

  test("progress and statistics without --quiet", async () => {
    const h = harness();
    await runCli(["generate", "-p", profile, "-o", join(dir, "verbose")], h.io);

    expect(h.out).toContain("ℹ Base words: 17");
    expect(h.out).toContain("ℹ Date variations: 17");
    expect(h.out).toContain(`║${" ".repeat(19)}GENERATION STATISTICS${" ".repeat(20)}║`);
  });

  test("interactive profile", async () => {
    const answers = ["Amy", "Pond", "", "01012000", "", "", "", "", "", "", "", "", "", "", "", ""];
    const h = harness(answers);
    const base = join(dir, "amy");

    expect(await runCli(["generate", "-o", base, "-q"], h.io)).toBe(0);
    expect(lines(`${base}.txt`)).toContain("amypond");
  });

  test("unexpected prompt failure is an internal error", async () => {
    const h = harness();
    h.io.prompt = () => ({
      ask: async () => {
        throw new Error("stdin closed");
      },
      close: () => {},
    });

    expect(await runCli(["generate", "-q"], h.io)).toBe(1);
    expect(h.err).toEqual(["[ERROR] [generate] WF-900: stdin closed"]);
  });

  test("no profile and no terminal", async () => {
    const h = harness();
    expect(await runCli(["generate", "-q"], h.io)).toBe(1);
    expect(h.err).toEqual(["[ERROR] [Input] WF-200: No interactive terminal available; pass --profile FILE"]);
  });

  test("profile validation warnings are shown", async () => {
    writeFileSync(profile, JSON.stringify({ name: "john", birthdate: "1990" }));
    const h = harness();

    expect(await runCli(["generate", "-p", profile, "-o", join(dir, "warned"), "-q"], h.io)).toBe(0);
    expect(h.out[0]).toBe("⚠ Birthdate must be in DDMMYYYY format");
  });

  test("missing profile file", async () => {
    const h = harness();
    const missing = join(dir, "nobody.json");

    expect(await runCli(["generate", "-p", missing], h.io)).toBe(1);
    expect(h.err).toEqual([
      `[ERROR] [Input] WF-202: File not found: ${missing}`,
      "  Check the file path and permissions.",
    ]);
  });

  test("unknown export format", async () => {
    const h = harness();
    expect(await runCli(["generate", "-p", profile, "--format", "xml"], h.io)).toBe(1);
    expect(h.err).toEqual(['[ERROR] [Input] WF-201: Unknown format "xml" (expected txt, json, csv)']);
  });
});

// =============================================================================
// improve / merge / stats
// =============================================================================

describe("improve", () => {
  test("writes <file>.enhanced.txt by default", async () => {
    const input = join(dir, "seed.txt");
    writeFileSync(input, "password\n");
    const h = harness();

    expect(await runCli(["improve", input, "-q"], h.io)).toBe(0);
    expect(lines(`${input}.enhanced.txt`)).toHaveLength(24);
    expect(h.out).toContain("✓ Enhanced: 1 → 24 passwords");
  });

  test("large input asks first", async () => {
    const config = join(dir, "small-threshold.json");
    writeFileSync(config, JSON.stringify({ threshold: 1 }));
    const input = join(dir, "big.txt");
    writeFileSync(input, "password\nletmein\n");
    const output = join(dir, "big-out.txt");

    const declined = harness(["n"]);
    expect(await runCli(["improve", input, "-o", output, "-c", config], declined.io)).toBe(0);
    expect(declined.out).toContain("⚠ Improvement cancelled");
    expect(existsSync(output)).toBe(false);

    const forced = harness();
    expect(await runCli(["improve", input, "-o", output, "-c", config, "--yes"], forced.io)).toBe(0);
    expect(existsSync(output)).toBe(true);
  });

  test("missing input", async () => {
    const h = harness();
    expect(await runCli(["improve", join(dir, "none.txt")], h.io)).toBe(1);
    expect(h.err[0]).toBe(`[ERROR] [Input] WF-202: File not found: ${join(dir, "none.txt")}`);
  });
});

describe("merge", () => {
  test("requires --output", async () => {
    const h = harness();
    expect(await runCli(["merge", "a.txt"], h.io)).toBe(1);
    expect(h.err).toEqual(["[ERROR] [Input] WF-200: --output required for merge operation"]);
  });

  test("unions readable lists and skips missing ones", async () => {
    const a = join(dir, "a.txt");
    const b = join(dir, "b.txt");
    writeFileSync(a, "alpha1\nabc\n");
    writeFileSync(b, "alpha1\nbravo22\n");
    const output = join(dir, "merged.txt");
    const h = harness();

    expect(await runCli(["merge", a, b, join(dir, "missing.txt"), "-o", output, "-q"], h.io)).toBe(0);
    expect(readFileSync(output, "utf-8")).toBe("alpha1\nbravo22\n");
    expect(h.out).toEqual([`✓ Merged 2 wordlists into ${output} (2 passwords)`]);
  });

  test("fails when nothing could be read", async () => {
    const h = harness();
    expect(await runCli(["merge", join(dir, "x.txt"), "-o", join(dir, "out.txt"), "-q"], h.io)).toBe(1);
    expect(h.err[0]).toBe("[ERROR] [Input] WF-202: None of the input wordlists could be read");
  });
});

describe("stats", () => {
  test("JSON record", async () => {
    const input = join(dir, "list.txt");
    writeFileSync(input, "aaaa1111\nPassword1!\nabcdef\n");
    const h = harness();

    expect(await runCli(["stats", input, "--format", "json"], h.io)).toBe(0);
    expect(h.out).toHaveLength(1);
    const record = JSON.parse(h.out[0]);
    expect(record.totalPasswords).toBe(3);
    expect(record.strengthDistribution).toEqual({ weak: 2, medium: 0, strong: 1 });
    expect(record.generationTimestamp).toBe("2026-10-18T12:00:00.000Z");
  });

  test("table", async () => {
    const input = join(dir, "list.txt");
    writeFileSync(input, "aaaa1111\n");
    const h = harness();

    expect(await runCli(["stats", input, "-q"], h.io)).toBe(0);
    expect(h.out).toContain("Total Passwords: 1");
    expect(h.out).toContain("  Weak:   100% (1 passwords)");
  });
});

// =============================================================================
// download / init-config
// =============================================================================

describe("download", () => {
  test("saves the fetched list", async () => {
    const fetchImpl: FetchLike = async () => ({
      ok: true,
      status: 200,
      statusText: "OK",
      text: async () => "123456\npassword\n",
    });
    const output = join(dir, "common.txt");
    const h = harness(undefined, fetchImpl);

    expect(await runCli(["download", "-o", output, "-q"], h.io)).toBe(0);
    expect(readFileSync(output, "utf-8")).toBe("123456\npassword\n");
    expect(h.out).toEqual([`✓ Downloaded to ${output} (2 passwords)`]);
  });

  test("network failure exits 1 with a hint", async () => {
    const fetchImpl: FetchLike = async () => {
      throw new Error("ECONNREFUSED");
    };
    const h = harness(undefined, fetchImpl);

    expect(await runCli(["download", "-o", join(dir, "common.txt"), "-q"], h.io)).toBe(1);
    expect(h.err).toEqual([
      "[ERROR] [Network] WF-400: Download failed: ECONNREFUSED",
      "  Check your network connection or set WORDFORGE_COMMON_URL to a reachable mirror.",
    ]);
  });
});

describe("init-config", () => {
  test("writes a config that loads cleanly and refuses to overwrite", async () => {
    const path = join(dir, "wordforge.config.json");

    const first = harness();
    expect(await runCli(["init-config", "-o", path], first.io)).toBe(0);
    expect(JSON.parse(readFileSync(path, "utf-8")).minLength).toBe(6);

    const second = harness();
    expect(await runCli(["init-config", "-o", path], second.io)).toBe(1);
    expect(second.err).toEqual([`[ERROR] [Input] WF-201: ${path} already exists; pass --yes to overwrite`]);

    const forced = harness();
    expect(await runCli(["init-config", "-o", path, "--yes"], forced.io)).toBe(0);
  });
});
