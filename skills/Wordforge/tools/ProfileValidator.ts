/**
 * ProfileValidator.ts - Profile construction, normalization and checks
 *
 * Validation never blocks generation: it returns a list of warnings that
 * the caller shows and then carries on.
 *
 * @license MIT
 */

import { isValidDate } from "./DateVariations";
import type { Profile, ProfileField } from "./types";
import { WordforgeErrorCode, errorMessage, inputError } from "./WordforgeError";

// =============================================================================
// Construction
// =============================================================================

export const PROFILE_FIELDS: readonly ProfileField[] = [
  "name",
  "surname",
  "nickname",
  "birthdate",
  "partnerName",
  "partnerNickname",
  "partnerBirthdate",
  "childName",
  "childNickname",
  "childBirthdate",
  "petName",
  "company",
  "email",
  "phone",
];

// Kept verbatim (trimmed only); everything else is lower-cased
const CASE_PRESERVING: ReadonlySet<ProfileField> = new Set<ProfileField>([
  "birthdate",
  "partnerBirthdate",
  "childBirthdate",
  "phone",
]);

const DATE_FIELDS: ReadonlyArray<[ProfileField, string]> = [
  ["birthdate", "Birthdate"],
  ["partnerBirthdate", "Partner's birthdate"],
  ["childBirthdate", "Child's birthdate"],
];

export type ProfileInput = Partial<Record<ProfileField, string>> & {
  keywords?: readonly string[];
};

/**
 * Build a frozen, normalized profile from partial input
 */
export function createProfile(input: ProfileInput = {}): Profile {
  const read = (field: ProfileField): string => {
    const raw = (input[field] ?? "").trim();
    return CASE_PRESERVING.has(field) ? raw : raw.toLowerCase();
  };

  const keywords = (input.keywords ?? []).map((k) => k.trim().toLowerCase()).filter((k) => k.length > 0);

  return Object.freeze({
    name: read("name"),
    surname: read("surname"),
    nickname: read("nickname"),
    birthdate: read("birthdate"),
    partnerName: read("partnerName"),
    partnerNickname: read("partnerNickname"),
    partnerBirthdate: read("partnerBirthdate"),
    childName: read("childName"),
    childNickname: read("childNickname"),
    childBirthdate: read("childBirthdate"),
    petName: read("petName"),
    company: read("company"),
    email: read("email"),
    phone: read("phone"),
    keywords: Object.freeze(keywords),
  });
}

/**
 * Split "a, b,c" into ["a", "b", "c"]
 */
export function parseKeywords(text: string): string[] {
  return text
    .split(",")
    .map((k) => k.trim().toLowerCase())
    .filter((k) => k.length > 0);
}

// =============================================================================
// Validation
// =============================================================================

export function isValidEmail(email: string): boolean {
  const at = email.indexOf("@");
  if (at === -1) return false;
  return email.slice(at + 1).includes(".");
}

/**
 * Warnings for a profile; an empty array means it is clean
 */
export function validateProfile(profile: Profile): string[] {
  const errors: string[] = [];

  if (!profile.name) {
    errors.push("Name is required");
  }

  for (const [field, label] of DATE_FIELDS) {
    const value = profile[field];
    if (value && !isValidDate(value)) {
      errors.push(`${label} must be in DDMMYYYY format`);
    }
  }

  if (profile.email) {
    if (!profile.email.includes("@")) {
      errors.push("Invalid email format");
    } else if (!isValidEmail(profile.email)) {
      errors.push("Email domain must contain a dot");
    }
  }

  return errors;
}

// =============================================================================
// JSON Profiles
// =============================================================================

function snakeCase(field: string): string {
  return field.replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringValue(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

/**
 * Parse a profile file. Keys may be camelCase ("partnerName") or
 * snake_case ("partner_name"); keywords may be an array or "a,b,c".
 */
export function parseProfileJson(text: string): Profile {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw inputError(`Profile is not valid JSON: ${errorMessage(error)}`, WordforgeErrorCode.PROFILE_INVALID);
  }

  if (!isRecord(data)) {
    throw inputError("Profile must be a JSON object", WordforgeErrorCode.PROFILE_INVALID);
  }

  const input: ProfileInput = {};
  for (const field of PROFILE_FIELDS) {
    const value = stringValue(data[field] ?? data[snakeCase(field)]);
    if (value !== undefined) {
      input[field] = value;
    }
  }

  const keywords = data.keywords;
  if (typeof keywords === "string") {
    input.keywords = parseKeywords(keywords);
  } else if (Array.isArray(keywords)) {
    input.keywords = keywords.filter((k): k is string => typeof k === "string");
  }

  return createProfile(input);
}
