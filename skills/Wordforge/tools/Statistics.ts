/**
 * Statistics.ts - Aggregate statistics over a token set
 *
 * @license MIT
 */

import { analyzePassword } from "./StrengthScorer";
import type { CharTypeDistribution, Clock, StatisticsRecord, Strength } from "./types";
import { systemClock } from "./types";

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function percentage(count: number, total: number): number {
  return total === 0 ? 0 : round2((count / total) * 100);
}

/**
 * Single pass over the tokens. An empty input gives an all-zero record.
 */
export function aggregateStatistics(
  tokens: Iterable<string>,
  specialChars: readonly string[],
  clock: Clock = systemClock
): StatisticsRecord {
  const strength: Record<Strength, number> = { weak: 0, medium: 0, strong: 0 };
  const charTypes: CharTypeDistribution = { upper: 0, lower: 0, digit: 0, special: 0 };

  let total = 0;
  let lengthSum = 0;
  let minLength = Number.POSITIVE_INFINITY;
  let maxLength = 0;

  for (const token of tokens) {
    const analysis = analyzePassword(token, specialChars);
    total++;
    lengthSum += analysis.length;
    minLength = Math.min(minLength, analysis.length);
    maxLength = Math.max(maxLength, analysis.length);
    strength[analysis.strength]++;
    if (analysis.hasUpper) charTypes.upper++;
    if (analysis.hasLower) charTypes.lower++;
    if (analysis.hasDigit) charTypes.digit++;
    if (analysis.hasSpecial) charTypes.special++;
  }

  return Object.freeze({
    totalPasswords: total,
    averageLength: total === 0 ? 0 : round2(lengthSum / total),
    minLength: total === 0 ? 0 : minLength,
    maxLength,
    strengthDistribution: Object.freeze(strength),
    weakPercentage: percentage(strength.weak, total),
    mediumPercentage: percentage(strength.medium, total),
    strongPercentage: percentage(strength.strong, total),
    charTypeDistribution: Object.freeze(charTypes),
    generationTimestamp: clock.now().toISOString(),
  });
}
