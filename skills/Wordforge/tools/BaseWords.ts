/**
 * BaseWords.ts - Seed tokens from a profile
 *
 * Produces the words every later combination step builds on: the
 * profile's names and their case variants, name/surname combinations,
 * company and keyword variants, the email local part, and the
 * reversal of everything longer than three characters.
 *
 * @license MIT
 */

import type { Profile, ProfileField } from "./types";
import { capitalize, charLength, reverse } from "./TokenUtils";

// Fields that get as-is + capitalized variants
const NAME_FIELDS: readonly ProfileField[] = [
  "name",
  "surname",
  "nickname",
  "partnerName",
  "partnerNickname",
  "childName",
  "childNickname",
  "petName",
  "company",
];

// Subset that also gets an all-uppercase variant
const UPPERCASE_FIELDS: ReadonlySet<ProfileField> = new Set<ProfileField>(["name", "surname", "company"]);

const REVERSE_MIN_LENGTH = 4;

/**
 * Local part of an email address, or "" when there is no "@"
 */
export function emailLocalPart(email: string): string {
  const at = email.indexOf("@");
  return at === -1 ? "" : email.slice(0, at);
}

export function generateBaseWords(profile: Profile): Set<string> {
  const words: string[] = [];

  for (const field of NAME_FIELDS) {
    const value = profile[field];
    if (!value) continue;

    words.push(value, capitalize(value));
    if (UPPERCASE_FIELDS.has(field)) {
      words.push(value.toUpperCase());
    }
  }

  if (profile.name && profile.surname) {
    words.push(
      profile.name + profile.surname,
      profile.surname + profile.name,
      capitalize(profile.name) + capitalize(profile.surname),
      Array.from(profile.name)[0] + profile.surname
    );
  }

  if (profile.company) {
    words.push(profile.company.replace(/ /g, ""));
  }

  for (const keyword of profile.keywords) {
    if (!keyword) continue;
    words.push(keyword, capitalize(keyword), keyword.toUpperCase());
  }

  const username = emailLocalPart(profile.email);
  if (username) {
    words.push(username, capitalize(username), username.replace(/\./g, ""), username.replace(/_/g, ""));
  }

  const reversed = words.filter((w) => charLength(w) >= REVERSE_MIN_LENGTH).map(reverse);

  // Stripping "." from a local part like "..." can leave ""
  return new Set([...words, ...reversed].filter((w) => w.length > 0));
}
