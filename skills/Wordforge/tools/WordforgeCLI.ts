/**
 * WordforgeCLI.ts - Wordforge command line
 *
 * Commands:
 *   generate     Build a wordlist from a profile (JSON file or interactive)
 *   improve      Add case, leet, year and suffix variants to a wordlist
 *   merge        Union several wordlists into one
 *   download     Fetch a reference common-password list
 *   stats        Strength statistics for an existing wordlist
 *   init-config  Write a starter wordforge.config.json
 *
 * Usage:
 *   wordforge generate --profile target.json --format txt,json
 *   wordforge generate                       # interactive
 *   wordforge improve rockyou-top.txt --yes
 *   wordforge merge a.txt b.txt --output merged.txt
 *
 * All I/O goes through a CliIO so the commands run in-process under test.
 *
 * @license MIT
 */

import { existsSync, readFileSync, statSync } from "node:fs";
import { parseArgs } from "node:util";
import { generateCombinations } from "./CombinationEngine";
import type { GenerationStage } from "./CombinationEngine";
import { CommonPasswordsClient, DEFAULT_OUTPUT_FILE } from "./CommonPasswordsClient";
import type { FetchLike } from "./CommonPasswordsClient";
import { DEFAULT_CONFIG_FILE, loadConfig, renderDefaultConfig } from "./ConfigLoader";
import { withOverrides } from "./config";
import type { ConfigOverrides } from "./config";
import { EXPORT_FORMATS, TOOL_NAME, TOOL_VERSION, isExportFormat, renderCsv, renderJson, renderText, writeExport } from "./Exporters";
import type { ExportFormat } from "./Exporters";
import { LogLevel, setGlobalLogLevel } from "./Logger";
import { createTerminalAsk, promptProfile } from "./ProfilePrompt";
import type { Ask } from "./ProfilePrompt";
import { parseProfileJson, validateProfile } from "./ProfileValidator";
import { aggregateStatistics } from "./Statistics";
import type { Clock, GenerationConfig, Profile, StatisticsRecord } from "./types";
import { systemClock } from "./types";
import { readWordlistFile, readWordlists } from "./WordlistFiles";
import { improveWordlist, mergeWordlists, shouldWarnImprove } from "./WordlistImprover";
import { WordforgeError, WordforgeErrorCode, errorMessage, inputError } from "./WordforgeError";

// =============================================================================
// I/O
// =============================================================================

export interface PromptSession {
  ask: Ask;
  close: () => void;
}

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
  colors: boolean;
  clock: Clock;
  /** Opens an interactive prompt; absent when stdin is not a terminal */
  prompt?: () => PromptSession;
  fetchImpl?: FetchLike;
}

export function createProcessIO(): CliIO {
  return {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
    colors: Boolean(process.stdout.isTTY),
    clock: systemClock,
    prompt: process.stdin.isTTY ? createTerminalAsk : undefined,
  };
}

interface Printer {
  line(message: string): void;
  error(message: string): void;
  success(message: string): void;
  info(message: string): void;
  warning(message: string): void;
  banner(title: string): void;
}

const BOX_WIDTH = 60;

function createPrinter(io: CliIO, quiet: boolean): Printer {
  const paint = (code: string, text: string): string => (io.colors ? `\x1b[${code}m${text}\x1b[0m` : text);

  return {
    line: (message) => io.out(message),
    error: (message) => io.err(`${paint("31", "Error:")} ${message}`),
    success: (message) => io.out(`${paint("32", "✓")} ${message}`),
    info: (message) => {
      if (!quiet) io.out(`${paint("36", "ℹ")} ${message}`);
    },
    warning: (message) => io.out(`${paint("33", "⚠")} ${message}`),
    banner: (title) => {
      if (quiet) return;
      const left = Math.floor((BOX_WIDTH - title.length) / 2);
      const right = BOX_WIDTH - title.length - left;
      io.out("");
      io.out(`╔${"═".repeat(BOX_WIDTH)}╗`);
      io.out(`║${" ".repeat(left)}${title}${" ".repeat(right)}║`);
      io.out(`╚${"═".repeat(BOX_WIDTH)}╝`);
      io.out("");
    },
  };
}

// =============================================================================
// Arguments
// =============================================================================

const OPTIONS = {
  config: { type: "string", short: "c" },
  profile: { type: "string", short: "p" },
  output: { type: "string", short: "o" },
  format: { type: "string", short: "f" },
  "min-len": { type: "string" },
  "max-len": { type: "string" },
  "no-leet": { type: "boolean" },
  "no-special": { type: "boolean" },
  "no-numbers": { type: "boolean" },
  "no-modern": { type: "boolean" },
  yes: { type: "boolean", short: "y" },
  quiet: { type: "boolean", short: "q" },
  debug: { type: "boolean" },
  version: { type: "boolean", short: "v" },
  help: { type: "boolean", short: "h" },
} as const;

function parseCli(argv: string[]) {
  return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
}

type CliValues = ReturnType<typeof parseCli>["values"];

export const HELP_TEXT = `
${TOOL_NAME} v${TOOL_VERSION} - targeted password wordlist generator

Usage: wordforge <command> [options]

Commands:
  generate              Build a wordlist from a profile
    --profile, -p FILE  Profile JSON (interactive when omitted)
    --output, -o BASE   Output base name (default: <name>_passwords)
    --format, -f LIST   Comma-separated formats: txt,json,csv (default: txt)
  improve <file>        Enhance an existing wordlist
    --output, -o FILE   Output file (default: <file>.enhanced.txt)
    --yes, -y           Skip the large-input confirmation
  merge <files...>      Merge wordlists (requires --output)
  download              Download a common-password list
    --output, -o FILE   Output file (default: ${DEFAULT_OUTPUT_FILE})
  stats <file>          Show strength statistics for a wordlist
    --format json       Print the statistics record as JSON
  init-config           Write a starter config file
    --output, -o FILE   Output file (default: ${DEFAULT_CONFIG_FILE})

Options:
  --config, -c FILE     Config file (default: ${DEFAULT_CONFIG_FILE} or $WORDFORGE_CONFIG)
  --min-len N           Minimum password length
  --max-len N           Maximum password length
  --no-leet             Disable leet speak variants
  --no-special          Disable special character variants
  --no-numbers          Disable numeric suffixes
  --no-modern           Disable modern terms
  --quiet, -q           Only print results and warnings
  --debug               Verbose logging and stack traces
  --version, -v         Print version
  --help, -h            Show this help
`;

function parseLength(flag: string, value: string): number {
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw inputError(`${flag} must be a positive integer, got "${value}"`);
  }
  return Number(value);
}

function overridesFromFlags(values: CliValues): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (values["min-len"] !== undefined) overrides.minLength = parseLength("--min-len", values["min-len"]);
  if (values["max-len"] !== undefined) overrides.maxLength = parseLength("--max-len", values["max-len"]);
  if (values["no-leet"]) overrides.useLeet = false;
  if (values["no-special"]) overrides.useSpecialChars = false;
  if (values["no-numbers"]) overrides.useNumbers = false;
  if (values["no-modern"]) overrides.useModernTerms = false;
  return overrides;
}

function parseFormats(value: string | undefined): ExportFormat[] {
  const formats: ExportFormat[] = [];
  for (const raw of (value ?? "txt").split(",")) {
    const name = raw.trim().toLowerCase();
    if (!name) continue;
    if (!isExportFormat(name)) {
      throw inputError(`Unknown format "${name}" (expected ${EXPORT_FORMATS.join(", ")})`);
    }
    if (!formats.includes(name)) formats.push(name);
  }
  return formats.length > 0 ? formats : ["txt"];
}

// =============================================================================
// Shared Helpers
// =============================================================================

interface CommandContext {
  values: CliValues;
  args: string[];
  io: CliIO;
  print: Printer;
}

function resolveConfig(ctx: CommandContext): GenerationConfig {
  const { config } = loadConfig(ctx.values.config, ctx.io.clock);
  const merged = withOverrides(config, overridesFromFlags(ctx.values));
  if (merged.minLength > merged.maxLength) {
    throw inputError(`Minimum length ${merged.minLength} exceeds maximum length ${merged.maxLength}`);
  }
  return merged;
}

function readTextFile(path: string): string {
  if (!existsSync(path) || !statSync(path).isFile()) {
    throw inputError(`File not found: ${path}`, WordforgeErrorCode.FILE_NOT_FOUND, { path });
  }
  try {
    return readFileSync(path, "utf-8");
  } catch (error) {
    throw inputError(`Cannot read ${path}: ${errorMessage(error)}`, WordforgeErrorCode.FILE_UNREADABLE, { path });
  }
}

async function withPrompt<T>(io: CliIO, fn: (ask: Ask) => Promise<T>): Promise<T> {
  if (!io.prompt) {
    throw inputError("No interactive terminal available; pass --profile FILE", WordforgeErrorCode.INPUT_MISSING);
  }
  const session = io.prompt();
  try {
    return await fn(session.ask);
  } finally {
    session.close();
  }
}

function printStatistics(print: Printer, stats: StatisticsRecord): void {
  print.banner("GENERATION STATISTICS");
  print.line(`Total Passwords: ${stats.totalPasswords}`);
  print.line(`Average Length:  ${stats.averageLength}`);
  print.line(`Length Range:    ${stats.minLength} - ${stats.maxLength}`);
  print.line("");
  print.line("Strength Distribution:");
  print.line(`  Weak:   ${stats.weakPercentage}% (${stats.strengthDistribution.weak} passwords)`);
  print.line(`  Medium: ${stats.mediumPercentage}% (${stats.strengthDistribution.medium} passwords)`);
  print.line(`  Strong: ${stats.strongPercentage}% (${stats.strengthDistribution.strong} passwords)`);
  print.line("");
  print.line("Character Type Distribution:");
  print.line(`  Uppercase: ${stats.charTypeDistribution.upper}`);
  print.line(`  Lowercase: ${stats.charTypeDistribution.lower}`);
  print.line(`  Digits:    ${stats.charTypeDistribution.digit}`);
  print.line(`  Special:   ${stats.charTypeDistribution.special}`);
}

const STAGE_LABELS: Record<GenerationStage, string> = {
  "base-words": "Base words",
  dates: "Date variations",
  "date-combinations": "After date combinations",
  "year-combinations": "After year combinations",
  numbers: "After number suffixes",
  "special-chars": "After special characters",
  "modern-terms": "After modern terms",
  email: "After email patterns",
  phone: "After phone patterns",
  leet: "After leet variants",
  filter: "Within length bounds",
};

// =============================================================================
// Commands
// =============================================================================

async function generate(ctx: CommandContext): Promise<number> {
  const { values, io, print } = ctx;
  const config = resolveConfig(ctx);
  const formats = parseFormats(values.format);

  let profile: Profile;
  if (values.profile) {
    profile = parseProfileJson(readTextFile(values.profile));
  } else {
    print.banner("PROFILE INFORMATION");
    const result = await withPrompt(io, (ask) =>
      promptProfile(ask, print.warning, (section) => print.line(`\n--- ${section} ---`))
    );
    profile = result.profile;
  }

  for (const warning of validateProfile(profile)) {
    print.warning(warning);
  }

  print.info("Generating passwords...");
  const { tokens } = generateCombinations(profile, config, {
    onStage: (stage, count) => print.info(`${STAGE_LABELS[stage]}: ${count}`),
  });

  const stats = aggregateStatistics(tokens, config.specialChars, io.clock);
  if (!values.quiet) printStatistics(print, stats);

  let base = values.output ?? `${profile.name || "wordlist"}_passwords`;
  for (const format of EXPORT_FORMATS) {
    if (base.endsWith(`.${format}`)) base = base.slice(0, -(format.length + 1));
  }

  for (const format of formats) {
    const path = `${base}.${format}`;
    switch (format) {
      case "txt":
        writeExport(path, renderText(tokens));
        break;
      case "json":
        writeExport(path, renderJson(tokens, stats, profile, io.clock));
        break;
      case "csv":
        writeExport(path, renderCsv(tokens, config.specialChars));
        break;
    }
    print.success(`Saved to ${path} (${tokens.size} passwords)`);
  }

  return 0;
}

async function improve(ctx: CommandContext): Promise<number> {
  const { values, args, io, print } = ctx;
  const input = args[0];
  if (!input) {
    throw inputError("Usage: wordforge improve <file> [--output FILE] [--yes]", WordforgeErrorCode.INPUT_MISSING);
  }

  const config = resolveConfig(ctx);
  const words = readWordlistFile(input);
  print.info(`Loaded ${words.length} words from ${input}`);

  if (shouldWarnImprove(words.length, config) && !values.yes) {
    print.warning(`Large wordlist (${words.length} words). This may take a while.`);
    const answer = await withPrompt(io, (ask) => ask("Continue? (y/n): "));
    if (answer.trim().toLowerCase() !== "y") {
      print.warning("Improvement cancelled");
      return 0;
    }
  }

  const enhanced = improveWordlist(words, config);
  const output = values.output ?? `${input}.enhanced.txt`;
  writeExport(output, renderText(enhanced));
  print.success(`Enhanced: ${words.length} → ${enhanced.size} passwords`);
  print.success(`Saved to ${output} (${enhanced.size} passwords)`);
  return 0;
}

async function merge(ctx: CommandContext): Promise<number> {
  const { values, args, print } = ctx;
  if (args.length === 0) {
    throw inputError("Usage: wordforge merge <files...> --output FILE", WordforgeErrorCode.INPUT_MISSING);
  }
  if (!values.output) {
    throw inputError("--output required for merge operation", WordforgeErrorCode.INPUT_MISSING);
  }

  const config = resolveConfig(ctx);
  const result = readWordlists(args);
  for (const { path, count } of result.loaded) {
    print.info(`Loaded ${count} words from ${path}`);
  }
  if (result.loaded.length === 0) {
    throw inputError("None of the input wordlists could be read", WordforgeErrorCode.FILE_NOT_FOUND);
  }

  const merged = mergeWordlists(result.collections, config);
  writeExport(values.output, renderText(merged));
  print.success(`Merged ${result.loaded.length} wordlists into ${values.output} (${merged.size} passwords)`);
  return 0;
}

async function download(ctx: CommandContext): Promise<number> {
  const { values, io, print } = ctx;
  const client = new CommonPasswordsClient({ fetchImpl: io.fetchImpl });
  print.info(`Downloading ${client.getUrl()}`);
  const result = await client.download(values.output ?? DEFAULT_OUTPUT_FILE);
  print.success(`Downloaded to ${result.path} (${result.count} passwords)`);
  return 0;
}

async function stats(ctx: CommandContext): Promise<number> {
  const { values, args, io, print } = ctx;
  const input = args[0];
  if (!input) {
    throw inputError("Usage: wordforge stats <file>", WordforgeErrorCode.INPUT_MISSING);
  }

  const config = resolveConfig(ctx);
  const record = aggregateStatistics(readWordlistFile(input), config.specialChars, io.clock);

  if (values.format === "json") {
    print.line(JSON.stringify(record, null, 2));
  } else {
    printStatistics(print, record);
  }
  return 0;
}

async function initConfig(ctx: CommandContext): Promise<number> {
  const { values, io, print } = ctx;
  const path = values.output ?? DEFAULT_CONFIG_FILE;
  if (existsSync(path) && !values.yes) {
    throw inputError(`${path} already exists; pass --yes to overwrite`);
  }
  writeExport(path, renderDefaultConfig(io.clock));
  print.success(`Wrote ${path}`);
  return 0;
}

const COMMANDS = new Map<string, (ctx: CommandContext) => Promise<number>>([
  ["generate", generate],
  ["improve", improve],
  ["merge", merge],
  ["download", download],
  ["stats", stats],
  ["init-config", initConfig],
]);

// =============================================================================
// Main
// =============================================================================

/**
 * Run one command and resolve to its exit code. Never rejects.
 */
export async function runCli(argv: string[], io: CliIO = createProcessIO()): Promise<number> {
  let parsed: ReturnType<typeof parseCli>;
  try {
    parsed = parseCli(argv);
  } catch (error) {
    createPrinter(io, false).error(errorMessage(error));
    io.out(HELP_TEXT);
    return 2;
  }

  const { values, positionals } = parsed;
  const print = createPrinter(io, Boolean(values.quiet));

  if (values.version) {
    print.line(`${TOOL_NAME} v${TOOL_VERSION}`);
    return 0;
  }

  const [command, ...args] = positionals;
  if (values.help || !command || command === "help") {
    print.line(HELP_TEXT);
    return 0;
  }

  const run = COMMANDS.get(command);
  if (!run) {
    print.error(`Unknown command: ${command}`);
    print.line(HELP_TEXT);
    return 1;
  }

  if (values.debug) {
    setGlobalLogLevel(LogLevel.DEBUG);
  } else if (values.quiet) {
    setGlobalLogLevel(LogLevel.WARN);
  }

  try {
    return await run({ values, args, io, print });
  } catch (error) {
    const failure =
      error instanceof WordforgeError
        ? error
        : new WordforgeError(WordforgeErrorCode.INTERNAL_ERROR, errorMessage(error), { source: command, cause: error });
    io.err(failure.format(io.colors));
    const help = failure.getHelp();
    if (help) io.err(`  ${help}`);
    if (values.debug && error instanceof Error && error.stack) {
      io.err(error.stack);
    }
    return failure.exitCode;
  } finally {
    setGlobalLogLevel(null);
  }
}
