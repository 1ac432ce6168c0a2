/**
 * WordlistImprover.ts - Enhance and merge existing wordlists
 *
 * improveWordlist() reapplies a subset of the generation transforms to
 * someone else's list (case variants, leet, year and number suffixes,
 * special characters). Caps apply to the list in its given order, since
 * wordlists are usually ranked most-likely first.
 *
 * @license MIT
 */

import { createDefaultConfig, DEFAULT_MAX_LENGTH, DEFAULT_MIN_LENGTH } from "./config";
import { makeLeet } from "./LeetTransformer";
import { capitalize, filterByLength } from "./TokenUtils";
import type { GenerationConfig, LengthBounds } from "./types";

export const DEFAULT_BOUNDS: Readonly<LengthBounds> = Object.freeze({
  minLength: DEFAULT_MIN_LENGTH,
  maxLength: DEFAULT_MAX_LENGTH,
});

/**
 * Whether an input list is large enough to ask before improving it
 */
export function shouldWarnImprove(wordCount: number, config: GenerationConfig): boolean {
  return wordCount > config.threshold;
}

export function improveWordlist(tokens: Iterable<string>, config: GenerationConfig = createDefaultConfig()): Set<string> {
  const words = Array.from(new Set(tokens));
  const limits = config.improveLimits;
  const enhanced = new Set(words);

  for (const word of words.slice(0, limits.caseVariants)) {
    enhanced.add(capitalize(word));
    enhanced.add(word.toUpperCase());
    enhanced.add(word.toLowerCase());
  }

  if (config.useLeet) {
    for (const word of words.slice(0, limits.leet)) {
      enhanced.add(makeLeet(word, config.leetMap));
    }
  }

  for (const word of words.slice(0, limits.years)) {
    for (const year of limits.improveYears) {
      enhanced.add(`${word}${year}`);
      enhanced.add(`${year}${word}`);
    }
  }

  if (config.useSpecialChars) {
    const chars = config.specialChars.slice(0, limits.specialChars);
    for (const word of words.slice(0, limits.special)) {
      for (const char of chars) {
        enhanced.add(`${word}${char}`);
      }
    }
  }

  for (const word of words.slice(0, limits.numbers)) {
    for (const num of limits.numberSuffixes) {
      enhanced.add(`${word}${num}`);
    }
  }

  return filterByLength(enhanced, config);
}

/**
 * Union of every collection, then the length filter
 */
export function mergeWordlists(
  collections: Iterable<Iterable<string>>,
  bounds: LengthBounds = DEFAULT_BOUNDS
): Set<string> {
  const merged = new Set<string>();
  for (const collection of collections) {
    for (const token of collection) {
      merged.add(token);
    }
  }
  return filterByLength(merged, bounds);
}
