/**
 * index.ts - Wordforge library surface
 *
 * @license MIT
 */

export { generateCombinations, SEPARATORS, EMAIL_PROVIDERS } from "./CombinationEngine";
export type { GenerationDiagnostics, GenerationOptions, GenerationResult, GenerationStage } from "./CombinationEngine";
export { improveWordlist, mergeWordlists, shouldWarnImprove } from "./WordlistImprover";
export { aggregateStatistics } from "./Statistics";
export { scorePassword, analyzePassword } from "./StrengthScorer";
export { makeLeet, DEFAULT_LEET_MAP } from "./LeetTransformer";
export { expandDate, expandDates } from "./DateVariations";
export { generateBaseWords } from "./BaseWords";
export { createProfile, validateProfile, parseProfileJson } from "./ProfileValidator";
export { createDefaultConfig, withOverrides, DEFAULT_LIMITS, DEFAULT_IMPROVE_LIMITS } from "./config";
export { loadConfig } from "./ConfigLoader";
export { filterByLength } from "./TokenUtils";
export { WordforgeError, WordforgeErrorCode } from "./WordforgeError";
export { systemClock, fixedClock } from "./types";
export type { Clock, GenerationConfig, Profile, StatisticsRecord, Strength } from "./types";
