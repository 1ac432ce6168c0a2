/**
 * Exporters.ts - Wordlist export formats
 *
 * Formats:
 * - txt:  sorted, one password per line
 * - json: metadata + statistics + sorted passwords
 * - csv:  one row per password with its strength analysis
 *
 * Rendering is pure; writeExport() is the only function touching disk.
 *
 * @license MIT
 */

import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { analyzePassword } from "./StrengthScorer";
import { sortedTokens } from "./TokenUtils";
import type { Clock, Profile, StatisticsRecord } from "./types";
import { systemClock } from "./types";
import { ioError } from "./WordforgeError";

export const TOOL_NAME = "Wordforge";
export const TOOL_VERSION = "1.0.0";

export type ExportFormat = "txt" | "json" | "csv";

export const EXPORT_FORMATS: readonly ExportFormat[] = ["txt", "json", "csv"];

export const CSV_HEADER = ["Password", "Length", "Strength", "Has_Upper", "Has_Lower", "Has_Digit", "Has_Special"];

export interface JsonExport {
  metadata: {
    tool: string;
    generated_at: string;
    target_name: string;
    profile: Profile;
  };
  statistics: StatisticsRecord;
  passwords: string[];
}

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

// =============================================================================
// Renderers
// =============================================================================

export function renderText(tokens: Iterable<string>): string {
  const passwords = sortedTokens(tokens);
  return passwords.length === 0 ? "" : passwords.join("\n") + "\n";
}

export function buildJsonExport(
  tokens: Iterable<string>,
  statistics: StatisticsRecord,
  profile: Profile,
  clock: Clock = systemClock
): JsonExport {
  return {
    metadata: {
      tool: `${TOOL_NAME} v${TOOL_VERSION}`,
      generated_at: clock.now().toISOString(),
      target_name: profile.name,
      profile,
    },
    statistics,
    passwords: sortedTokens(tokens),
  };
}

export function renderJson(
  tokens: Iterable<string>,
  statistics: StatisticsRecord,
  profile: Profile,
  clock: Clock = systemClock
): string {
  return JSON.stringify(buildJsonExport(tokens, statistics, profile, clock), null, 2) + "\n";
}

/**
 * Quote a CSV field when it contains a comma, quote or line break
 */
export function escapeCsv(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function renderCsv(tokens: Iterable<string>, specialChars: readonly string[]): string {
  const lines = [CSV_HEADER.join(",")];

  for (const password of sortedTokens(tokens)) {
    const a = analyzePassword(password, specialChars);
    lines.push(
      [
        escapeCsv(password),
        String(a.length),
        a.strength,
        String(a.hasUpper),
        String(a.hasLower),
        String(a.hasDigit),
        String(a.hasSpecial),
      ].join(",")
    );
  }

  return lines.join("\n") + "\n";
}

// =============================================================================
// Output
// =============================================================================

/**
 * Write an export, creating the parent directory. Failures are fatal.
 */
export function writeExport(outputPath: string, content: string): void {
  try {
    const dir = dirname(outputPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
    writeFileSync(outputPath, content, "utf-8");
  } catch (error) {
    throw ioError(`Cannot write ${outputPath}`, error, { path: outputPath });
  }
}
