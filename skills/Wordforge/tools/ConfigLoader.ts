/**
 * ConfigLoader.ts - GenerationConfig from a JSON config file
 *
 * Lookup order: explicit path, then WORDFORGE_CONFIG, then
 * ./wordforge.config.json. A broken file never stops a run: bad fields
 * fall back to their defaults one by one, and unparseable JSON falls back
 * to the defaults wholesale, with a warning either way.
 *
 * Example:
 *   {
 *     "minLength": 8,
 *     "specialChars": ["!", "@", "#"],
 *     "years": { "from": 1980, "to": 2026 },
 *     "leetMap": { "a": "@", "o": "0" },
 *     "limits": { "leetSample": 10000 }
 *   }
 *
 * @license MIT
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import {
  createDefaultConfig,
  withOverrides,
  yearSpan,
  DEFAULT_IMPROVE_LIMITS,
  DEFAULT_LIMITS,
  DEFAULT_MAX_LENGTH,
  DEFAULT_MIN_LENGTH,
} from "./config";
import type { ConfigOverrides } from "./config";
import { DEFAULT_LEET_MAP } from "./LeetTransformer";
import { Logger, LogLevel } from "./Logger";
import type { Clock, EngineLimits, GenerationConfig, ImproveLimits } from "./types";
import { systemClock } from "./types";
import { configError, errorMessage } from "./WordforgeError";

export const DEFAULT_CONFIG_FILE = "wordforge.config.json";

const logger = new Logger("ConfigLoader", LogLevel.INFO);
const LEET_LETTER = /^[a-z]$/i;

export type ConfigSource = "file" | "defaults";

export interface LoadedConfig {
  config: GenerationConfig;
  source: ConfigSource;
  path: string;
  warnings: string[];
}

// =============================================================================
// Field Readers
// =============================================================================

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

class FieldReader {
  readonly warnings: string[] = [];

  constructor(private data: Json, private prefix = "") {}

  private warn(key: string, expected: string): void {
    this.warnings.push(`Ignoring "${this.prefix}${key}": expected ${expected}`);
  }

  has(key: string): boolean {
    return this.data[key] !== undefined;
  }

  int(key: string, min = 0): number | undefined {
    const value = this.data[key];
    if (value === undefined) return undefined;
    if (typeof value === "number" && Number.isInteger(value) && value >= min) return value;
    this.warn(key, `an integer >= ${min}`);
    return undefined;
  }

  bool(key: string): boolean | undefined {
    const value = this.data[key];
    if (value === undefined) return undefined;
    if (typeof value === "boolean") return value;
    this.warn(key, "true or false");
    return undefined;
  }

  strings(key: string): string[] | undefined {
    const value = this.data[key];
    if (value === undefined) return undefined;
    if (typeof value === "string") {
      return value.split(",").map((s) => s.trim()).filter((s) => s.length > 0);
    }
    if (Array.isArray(value) && value.every((v) => typeof v === "string")) {
      return value.filter((v): v is string => typeof v === "string");
    }
    this.warn(key, "an array of strings or a comma-separated string");
    return undefined;
  }

  leetMap(key: string): Record<string, string> | undefined {
    const value = this.data[key];
    if (value === undefined) return undefined;
    if (!isRecord(value)) {
      this.warn(key, "an object of letter -> replacement");
      return undefined;
    }
    // Letters the file leaves out keep their default replacement and position.
    const map: Record<string, string> = { ...DEFAULT_LEET_MAP };
    for (const [letter, replacement] of Object.entries(value)) {
      if (LEET_LETTER.test(letter) && typeof replacement === "string" && replacement.length === 1) {
        map[letter.toLowerCase()] = replacement;
      } else {
        this.warn(`${key}.${letter}`, "a single-character replacement for a single letter");
      }
    }
    return map;
  }

  child(key: string): FieldReader | undefined {
    const value = this.data[key];
    if (value === undefined) return undefined;
    if (!isRecord(value)) {
      this.warn(key, "an object");
      return undefined;
    }
    return new FieldReader(value, `${this.prefix}${key}.`);
  }
}

const LIMIT_KEYS = [
  "separatorCount",
  "recentYears",
  "numberWords",
  "numberStep",
  "numberCeiling",
  "specialWords",
  "specialChars",
  "specialYears",
  "modernWords",
  "modernTerms",
  "leetSample",
] as const satisfies ReadonlyArray<keyof EngineLimits>;

function readLimits(reader: FieldReader | undefined): Partial<EngineLimits> {
  const limits: Partial<EngineLimits> = {};
  if (!reader) return limits;
  for (const key of LIMIT_KEYS) {
    const value = reader.int(key, key === "numberStep" ? 1 : 0);
    if (value !== undefined) limits[key] = value;
  }
  return limits;
}

function readImproveLimits(reader: FieldReader | undefined): Partial<ImproveLimits> {
  const limits: Partial<ImproveLimits> = {};
  if (!reader) return limits;
  for (const key of ["caseVariants", "leet", "years", "special", "numbers", "specialChars"] as const) {
    const value = reader.int(key);
    if (value !== undefined) limits[key] = value;
  }
  const improveYears = reader.strings("improveYears");
  if (improveYears) limits.improveYears = improveYears;
  const numberSuffixes = reader.strings("numberSuffixes");
  if (numberSuffixes) limits.numberSuffixes = numberSuffixes;
  return limits;
}

/**
 * Validate a parsed config object into overrides plus per-field warnings
 */
export function parseConfigObject(data: unknown, clock: Clock = systemClock): { overrides: ConfigOverrides; warnings: string[] } {
  if (!isRecord(data)) {
    return { overrides: {}, warnings: ["Config must be a JSON object; using defaults"] };
  }

  const reader = new FieldReader(data);
  const overrides: ConfigOverrides = {};

  const minLength = reader.int("minLength", 1);
  if (minLength !== undefined) overrides.minLength = minLength;
  const maxLength = reader.int("maxLength", 1);
  if (maxLength !== undefined) overrides.maxLength = maxLength;

  for (const key of ["useLeet", "useSpecialChars", "useNumbers", "useModernTerms"] as const) {
    const value = reader.bool(key);
    if (value !== undefined) overrides[key] = value;
  }

  const specialChars = reader.strings("specialChars");
  if (specialChars) overrides.specialChars = specialChars;
  const modernTerms = reader.strings("modernTerms");
  if (modernTerms) overrides.modernTerms = modernTerms;

  const numFrom = reader.int("numFrom");
  if (numFrom !== undefined) overrides.numFrom = numFrom;
  const numTo = reader.int("numTo");
  if (numTo !== undefined) overrides.numTo = numTo;

  const leetMap = reader.leetMap("leetMap");
  if (leetMap) overrides.leetMap = leetMap;

  const threshold = reader.int("threshold");
  if (threshold !== undefined) overrides.threshold = threshold;

  const years = reader.child("years");
  if (years) {
    const from = years.int("from");
    const to = years.int("to") ?? clock.now().getFullYear();
    if (from !== undefined && from <= to) {
      overrides.yearRange = yearSpan(from, to);
    }
    reader.warnings.push(...years.warnings);
  } else if (reader.has("yearRange")) {
    const yearRange = reader.strings("yearRange");
    if (yearRange) overrides.yearRange = yearRange;
  }

  const limitsReader = reader.child("limits");
  overrides.limits = readLimits(limitsReader);
  const improveReader = reader.child("improveLimits");
  overrides.improveLimits = readImproveLimits(improveReader);

  const warnings = [...reader.warnings, ...(limitsReader?.warnings ?? []), ...(improveReader?.warnings ?? [])];

  const min = overrides.minLength ?? DEFAULT_MIN_LENGTH;
  const max = overrides.maxLength ?? DEFAULT_MAX_LENGTH;
  if (min > max) {
    warnings.push(`minLength ${min} is greater than maxLength ${max}; ignoring both`);
    delete overrides.minLength;
    delete overrides.maxLength;
  }

  return { overrides, warnings };
}

// =============================================================================
// Loading
// =============================================================================

export function resolveConfigPath(explicit?: string): string {
  return resolve(explicit || process.env.WORDFORGE_CONFIG || DEFAULT_CONFIG_FILE);
}

export function loadConfig(explicitPath?: string, clock: Clock = systemClock, log: Logger = logger): LoadedConfig {
  const path = resolveConfigPath(explicitPath);
  const defaults = createDefaultConfig(clock);

  if (!existsSync(path)) {
    if (explicitPath) {
      log.warn(`Config file ${path} not found; using defaults`);
    } else {
      log.debug(`No config file at ${path}; using defaults`);
    }
    return { config: defaults, source: "defaults", path, warnings: [] };
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    const err = configError(`Error reading config ${path}: ${errorMessage(error)}`, undefined, { path });
    log.warn(`${err.message}; using defaults`);
    return { config: defaults, source: "defaults", path, warnings: [err.message] };
  }

  const { overrides, warnings } = parseConfigObject(data, clock);
  for (const warning of warnings) {
    log.warn(warning);
  }
  log.debug(`Configuration loaded from ${path}`);

  return { config: withOverrides(defaults, overrides), source: "file", path, warnings };
}

/**
 * Starter config file contents, matching the compiled-in defaults
 */
export function renderDefaultConfig(clock: Clock = systemClock): string {
  const defaults = createDefaultConfig(clock);
  const file = {
    minLength: defaults.minLength,
    maxLength: defaults.maxLength,
    useLeet: defaults.useLeet,
    useSpecialChars: defaults.useSpecialChars,
    useNumbers: defaults.useNumbers,
    useModernTerms: defaults.useModernTerms,
    specialChars: defaults.specialChars,
    modernTerms: defaults.modernTerms,
    numFrom: defaults.numFrom,
    numTo: defaults.numTo,
    years: { from: Number(defaults.yearRange[0]) },
    threshold: defaults.threshold,
    leetMap: defaults.leetMap,
    limits: DEFAULT_LIMITS,
    improveLimits: DEFAULT_IMPROVE_LIMITS,
  };
  return JSON.stringify(file, null, 2) + "\n";
}
