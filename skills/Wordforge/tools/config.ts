/**
 * config.ts - Compiled-in defaults for GenerationConfig
 *
 * @license MIT
 */

import { DEFAULT_LEET_MAP } from "./LeetTransformer";
import type { Clock, EngineLimits, GenerationConfig, ImproveLimits } from "./types";
import { systemClock } from "./types";

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_MIN_LENGTH = 6;
export const DEFAULT_MAX_LENGTH = 20;
export const DEFAULT_FIRST_YEAR = 1950;
export const DEFAULT_THRESHOLD = 1000;

export const DEFAULT_SPECIAL_CHARS: readonly string[] = ["!", "@", "#", "$", "%", "&", "*", "_", "-", "+", "="];

export const DEFAULT_MODERN_TERMS: readonly string[] = [
  "ai",
  "crypto",
  "bitcoin",
  "nft",
  "meta",
  "chatgpt",
  "web3",
  "defi",
  "blockchain",
  "covid",
  "vaccine",
  "zoom",
  "tiktok",
  "2025",
  "2024",
  "2023",
  "gaming",
  "streaming",
  "cloud",
];

/**
 * Output-size caps. Each one bounds a cross-product that would
 * otherwise grow with the profile.
 */
export const DEFAULT_LIMITS: Readonly<EngineLimits> = Object.freeze({
  separatorCount: 3,
  recentYears: 10,
  numberWords: 50,
  numberStep: 11,
  numberCeiling: 100,
  specialWords: 50,
  specialChars: 5,
  specialYears: 3,
  modernWords: 20,
  modernTerms: 15,
  leetSample: 5000,
});

export const DEFAULT_IMPROVE_LIMITS: Readonly<ImproveLimits> = Object.freeze({
  caseVariants: 1000,
  leet: 500,
  years: 500,
  special: 300,
  numbers: 300,
  specialChars: 3,
  improveYears: ["2020", "2021", "2022", "2023", "2024", "2025"],
  numberSuffixes: ["123", "1", "12", "01", "007"],
});

/**
 * Years from `from` through `to`, inclusive, as strings
 */
export function yearSpan(from: number, to: number): string[] {
  const years: string[] = [];
  for (let y = from; y <= to; y++) {
    years.push(String(y));
  }
  return years;
}

// =============================================================================
// Construction
// =============================================================================

export type ConfigOverrides = {
  -readonly [K in Exclude<keyof GenerationConfig, "limits" | "improveLimits">]?: GenerationConfig[K];
} & {
  limits?: Partial<EngineLimits>;
  improveLimits?: Partial<ImproveLimits>;
};

/**
 * Freeze a config so nothing mutates it mid-run
 */
export function freezeConfig(config: GenerationConfig): GenerationConfig {
  return Object.freeze({
    ...config,
    specialChars: Object.freeze([...config.specialChars]),
    modernTerms: Object.freeze([...config.modernTerms]),
    yearRange: Object.freeze([...config.yearRange]),
    leetMap: Object.freeze({ ...config.leetMap }),
    limits: Object.freeze({ ...config.limits }),
    improveLimits: Object.freeze({
      ...config.improveLimits,
      improveYears: Object.freeze([...config.improveLimits.improveYears]),
      numberSuffixes: Object.freeze([...config.improveLimits.numberSuffixes]),
    }),
  });
}

export function createDefaultConfig(clock: Clock = systemClock): GenerationConfig {
  return freezeConfig({
    minLength: DEFAULT_MIN_LENGTH,
    maxLength: DEFAULT_MAX_LENGTH,
    useLeet: true,
    useSpecialChars: true,
    useNumbers: true,
    useModernTerms: true,
    specialChars: DEFAULT_SPECIAL_CHARS,
    modernTerms: DEFAULT_MODERN_TERMS,
    numFrom: 0,
    numTo: 99,
    leetMap: DEFAULT_LEET_MAP,
    yearRange: yearSpan(DEFAULT_FIRST_YEAR, clock.now().getFullYear()),
    threshold: DEFAULT_THRESHOLD,
    limits: DEFAULT_LIMITS,
    improveLimits: DEFAULT_IMPROVE_LIMITS,
  });
}

/**
 * New config with the given fields replaced. Limits merge field by field.
 * Callers leave a key out rather than setting it to undefined.
 */
export function withOverrides(base: GenerationConfig, overrides: ConfigOverrides): GenerationConfig {
  const { limits, improveLimits, ...rest } = overrides;

  return freezeConfig({
    ...base,
    ...rest,
    limits: { ...base.limits, ...limits },
    improveLimits: { ...base.improveLimits, ...improveLimits },
  });
}
