/**
 * types.ts - Shared Wordforge Types
 *
 * Profile, configuration and statistics shapes passed between the
 * generation core and the CLI collaborators.
 *
 * @license MIT
 */

// =============================================================================
// Profile
// =============================================================================

/**
 * Target identity data. Empty strings mean "absent".
 * Dates are DDMMYYYY.
 */
export interface Profile {
  readonly name: string;
  readonly surname: string;
  readonly nickname: string;
  readonly birthdate: string;
  readonly partnerName: string;
  readonly partnerNickname: string;
  readonly partnerBirthdate: string;
  readonly childName: string;
  readonly childNickname: string;
  readonly childBirthdate: string;
  readonly petName: string;
  readonly company: string;
  readonly email: string;
  readonly phone: string;
  readonly keywords: readonly string[];
}

export type ProfileField = Exclude<keyof Profile, "keywords">;

// =============================================================================
// Configuration
// =============================================================================

/**
 * Caps on the combination engine's cross-products.
 */
export interface EngineLimits {
  separatorCount: number;
  recentYears: number;
  numberWords: number;
  numberStep: number;
  numberCeiling: number;
  specialWords: number;
  specialChars: number;
  specialYears: number;
  modernWords: number;
  modernTerms: number;
  leetSample: number;
}

/**
 * Caps and fixed suffix lists used when improving an existing wordlist.
 */
export interface ImproveLimits {
  caseVariants: number;
  leet: number;
  years: number;
  special: number;
  numbers: number;
  specialChars: number;
  improveYears: readonly string[];
  numberSuffixes: readonly string[];
}

export interface GenerationConfig {
  readonly minLength: number;
  readonly maxLength: number;
  readonly useLeet: boolean;
  readonly useSpecialChars: boolean;
  readonly useNumbers: boolean;
  readonly useModernTerms: boolean;
  readonly specialChars: readonly string[];
  readonly modernTerms: readonly string[];
  readonly numFrom: number;
  readonly numTo: number;
  /** letter -> replacement, applied in key order */
  readonly leetMap: Readonly<Record<string, string>>;
  readonly yearRange: readonly string[];
  /** improve warns above this many input words */
  readonly threshold: number;
  readonly limits: Readonly<EngineLimits>;
  readonly improveLimits: Readonly<ImproveLimits>;
}

export interface LengthBounds {
  minLength: number;
  maxLength: number;
}

// =============================================================================
// Scoring and Statistics
// =============================================================================

export type Strength = "weak" | "medium" | "strong";

export interface CharTypeDistribution {
  upper: number;
  lower: number;
  digit: number;
  special: number;
}

export interface StatisticsRecord {
  readonly totalPasswords: number;
  readonly averageLength: number;
  readonly minLength: number;
  readonly maxLength: number;
  readonly strengthDistribution: Readonly<Record<Strength, number>>;
  readonly weakPercentage: number;
  readonly mediumPercentage: number;
  readonly strongPercentage: number;
  readonly charTypeDistribution: Readonly<CharTypeDistribution>;
  readonly generationTimestamp: string;
}

// =============================================================================
// Clock
// =============================================================================

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * Clock pinned to one instant (tests, reproducible runs)
 */
export function fixedClock(iso: string): Clock {
  const instant = new Date(iso);
  return { now: () => new Date(instant.getTime()) };
}
