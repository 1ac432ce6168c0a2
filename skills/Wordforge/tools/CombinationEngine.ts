/**
 * CombinationEngine.ts - Profile-driven wordlist generation
 *
 * Expands a profile's base words into a bounded, deduplicated candidate
 * set. Every step adds to one accumulator; the length filter runs once
 * at the end.
 *
 * Pipeline:
 *   base words -> dates x separators -> recent years x separators
 *   -> numbers -> special chars -> modern terms -> email providers
 *   -> phone digits -> leet sample -> length filter
 *
 * Base words are sorted before any "first N" cap, and the leet pass
 * samples the sorted accumulator, so the same profile and config always
 * produce the same set.
 *
 * @license MIT
 */

import { generateBaseWords, emailLocalPart } from "./BaseWords";
import { expandDates } from "./DateVariations";
import { makeLeet } from "./LeetTransformer";
import { validateProfile } from "./ProfileValidator";
import { capitalize, filterByLength, sortedTokens } from "./TokenUtils";
import type { GenerationConfig, Profile } from "./types";

// =============================================================================
// Types
// =============================================================================

export const SEPARATORS: readonly string[] = ["", "_", "-", ".", "@", "!"];

export const EMAIL_PROVIDERS: readonly string[] = ["gmail.com", "yahoo.com", "hotmail.com", "outlook.com"];

export const PHONE_SUFFIX_LENGTHS: readonly number[] = [4, 6, 8];

export type GenerationStage =
  | "base-words"
  | "dates"
  | "date-combinations"
  | "year-combinations"
  | "numbers"
  | "special-chars"
  | "modern-terms"
  | "email"
  | "phone"
  | "leet"
  | "filter";

/**
 * Called after each stage with the stage's own count (words or
 * variations for the first two, accumulator size afterwards)
 */
export type StageListener = (stage: GenerationStage, count: number) => void;

export interface GenerationOptions {
  onStage?: StageListener;
}

export interface GenerationDiagnostics {
  warnings: string[];
  baseWordCount: number;
  dateVariationCount: number;
  leetVariantCount: number;
  beforeFilterCount: number;
  finalCount: number;
}

export interface GenerationResult {
  tokens: Set<string>;
  diagnostics: GenerationDiagnostics;
}

// =============================================================================
// Steps
// =============================================================================

function addAffixed(into: Set<string>, words: readonly string[], affixes: Iterable<string>, separators: readonly string[]): void {
  const affixList = Array.from(affixes);
  for (const word of words) {
    for (const affix of affixList) {
      for (const sep of separators) {
        into.add(`${word}${sep}${affix}`);
        into.add(`${affix}${sep}${word}`);
      }
    }
  }
}

/**
 * Numeric suffixes: numFrom, numFrom + step, ... below min(numTo, ceiling)
 */
export function numberSuffixes(config: GenerationConfig): string[] {
  const { numberStep, numberCeiling } = config.limits;
  const end = Math.min(config.numTo, numberCeiling);
  const numbers: string[] = [];
  if (numberStep <= 0) return numbers;
  for (let n = config.numFrom; n < end; n += numberStep) {
    numbers.push(String(n));
  }
  return numbers;
}

/**
 * Last 4, 6 and 8 digits of a phone number, where that many exist
 */
export function phoneFragments(phone: string): string[] {
  const digits = phone.replace(/\D/g, "");
  if (digits.length < PHONE_SUFFIX_LENGTHS[0]) return [];
  return PHONE_SUFFIX_LENGTHS.filter((n) => digits.length >= n).map((n) => digits.slice(-n));
}

export function recentYears(config: GenerationConfig): string[] {
  const count = config.limits.recentYears;
  return count > 0 ? config.yearRange.slice(-count) : [];
}

// =============================================================================
// Engine
// =============================================================================

export function generateCombinations(
  profile: Profile,
  config: GenerationConfig,
  options: GenerationOptions = {}
): GenerationResult {
  const notify: StageListener = options.onStage ?? (() => {});
  const limits = config.limits;
  const passwords = new Set<string>();

  const baseWords = sortedTokens(generateBaseWords(profile));
  notify("base-words", baseWords.length);

  const dates = expandDates([profile.birthdate, profile.partnerBirthdate, profile.childBirthdate]);
  notify("dates", dates.size);

  for (const word of baseWords) {
    passwords.add(word);
  }

  const separators = SEPARATORS.slice(0, limits.separatorCount);
  addAffixed(passwords, baseWords, dates, separators);
  notify("date-combinations", passwords.size);

  const years = recentYears(config);
  addAffixed(passwords, baseWords, years, separators);
  notify("year-combinations", passwords.size);

  if (config.useNumbers) {
    const numbers = numberSuffixes(config);
    for (const word of baseWords.slice(0, limits.numberWords)) {
      for (const num of numbers) {
        passwords.add(`${word}${num}`);
        passwords.add(`${num}${word}`);
      }
    }
    notify("numbers", passwords.size);
  }

  if (config.useSpecialChars) {
    const chars = config.specialChars.slice(0, limits.specialChars);
    const lastYears = limits.specialYears > 0 ? years.slice(-limits.specialYears) : [];
    for (const word of baseWords.slice(0, limits.specialWords)) {
      for (const char of chars) {
        passwords.add(`${word}${char}`);
        passwords.add(`${char}${word}`);
        for (const year of lastYears) {
          passwords.add(`${word}${char}${year}`);
        }
      }
    }
    notify("special-chars", passwords.size);
  }

  if (config.useModernTerms) {
    const terms = config.modernTerms.slice(0, limits.modernTerms);
    for (const word of baseWords.slice(0, limits.modernWords)) {
      for (const term of terms) {
        passwords.add(`${word}${term}`);
        passwords.add(`${term}${word}`);
        passwords.add(`${word}${capitalize(term)}`);
      }
    }
    notify("modern-terms", passwords.size);
  }

  const username = emailLocalPart(profile.email);
  if (username) {
    for (const provider of EMAIL_PROVIDERS) {
      passwords.add(`${username}@${provider}`);
    }
    notify("email", passwords.size);
  }

  if (profile.phone) {
    for (const fragment of phoneFragments(profile.phone)) {
      passwords.add(fragment);
    }
    notify("phone", passwords.size);
  }

  let leetVariantCount = 0;
  if (config.useLeet) {
    const sample = sortedTokens(passwords).slice(0, limits.leetSample);
    const before = passwords.size;
    for (const pwd of sample) {
      passwords.add(makeLeet(pwd, config.leetMap));
    }
    leetVariantCount = passwords.size - before;
    notify("leet", passwords.size);
  }

  const beforeFilterCount = passwords.size;
  const tokens = filterByLength(passwords, config);
  notify("filter", tokens.size);

  return {
    tokens,
    diagnostics: {
      warnings: validateProfile(profile),
      baseWordCount: baseWords.length,
      dateVariationCount: dates.size,
      leetVariantCount,
      beforeFilterCount,
      finalCount: tokens.size,
    },
  };
}
