/**
 * TokenUtils.ts - Small string helpers shared by the generators
 *
 * @license MIT
 */

import type { LengthBounds } from "./types";

/**
 * Length in code points, so "ü" and emoji count once
 */
export function charLength(token: string): number {
  let count = 0;
  for (const _ of token) count++;
  return count;
}

/**
 * First code point upper-cased, the rest lower-cased ("jOHN" -> "John")
 */
export function capitalize(word: string): string {
  if (!word) return word;
  const first = word.codePointAt(0);
  if (first === undefined) return word;
  const head = String.fromCodePoint(first);
  return head.toUpperCase() + word.slice(head.length).toLowerCase();
}

export function reverse(word: string): string {
  return Array.from(word).reverse().join("");
}

/**
 * Keep tokens with minLength <= length <= maxLength
 */
export function filterByLength(tokens: Iterable<string>, bounds: LengthBounds): Set<string> {
  const kept = new Set<string>();
  for (const token of tokens) {
    const len = charLength(token);
    if (len >= bounds.minLength && len <= bounds.maxLength) {
      kept.add(token);
    }
  }
  return kept;
}

/**
 * Deterministic ordering used before any "first N" cap
 */
export function sortedTokens(tokens: Iterable<string>): string[] {
  return Array.from(tokens).sort();
}
