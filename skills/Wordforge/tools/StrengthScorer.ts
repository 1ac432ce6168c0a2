/**
 * StrengthScorer.ts - Coarse password strength heuristic
 *
 * Points:
 *   +1 length >= 8, +1 length >= 12, +1 length >= 16
 *   +1 uppercase, +1 lowercase, +1 digit
 *   +2 any configured special character
 *   +1 distinct characters > 70% of length
 *
 *   0-3 weak, 4-6 medium, 7+ strong
 *
 * This is a bucket for wordlist statistics, not an entropy estimate.
 *
 * @license MIT
 */

import { charLength } from "./TokenUtils";
import type { Strength } from "./types";

export interface PasswordAnalysis {
  password: string;
  length: number;
  score: number;
  strength: Strength;
  hasUpper: boolean;
  hasLower: boolean;
  hasDigit: boolean;
  hasSpecial: boolean;
}

const UPPER = /\p{Lu}/u;
const LOWER = /\p{Ll}/u;
const DIGIT = /\p{Nd}/u;

const WEAK_MAX = 3;
const MEDIUM_MAX = 6;
const UNIQUENESS_RATIO = 0.7;

export function hasUpper(password: string): boolean {
  return UPPER.test(password);
}

export function hasLower(password: string): boolean {
  return LOWER.test(password);
}

export function hasDigit(password: string): boolean {
  return DIGIT.test(password);
}

export function hasSpecial(password: string, specialChars: readonly string[]): boolean {
  for (const char of password) {
    if (specialChars.includes(char)) return true;
  }
  return false;
}

export function strengthFromScore(score: number): Strength {
  if (score <= WEAK_MAX) return "weak";
  if (score <= MEDIUM_MAX) return "medium";
  return "strong";
}

export function analyzePassword(password: string, specialChars: readonly string[]): PasswordAnalysis {
  const length = charLength(password);
  const upper = hasUpper(password);
  const lower = hasLower(password);
  const digit = hasDigit(password);
  const special = hasSpecial(password, specialChars);

  let score = 0;
  if (length >= 8) score++;
  if (length >= 12) score++;
  if (length >= 16) score++;
  if (upper) score++;
  if (lower) score++;
  if (digit) score++;
  if (special) score += 2;
  if (new Set(password).size > length * UNIQUENESS_RATIO) score++;

  return {
    password,
    length,
    score,
    strength: strengthFromScore(score),
    hasUpper: upper,
    hasLower: lower,
    hasDigit: digit,
    hasSpecial: special,
  };
}

export function scorePassword(password: string, specialChars: readonly string[]): Strength {
  return analyzePassword(password, specialChars).strength;
}
