/**
 * ProfilePrompt.ts - Interactive profile capture
 *
 * Questions go through an injected ask() so the CLI can back it with
 * readline and tests with a scripted answer list.
 *
 * @license MIT
 */

import { createInterface } from "node:readline/promises";
import { isValidDate } from "./DateVariations";
import { createProfile, isValidEmail, parseKeywords, validateProfile } from "./ProfileValidator";
import type { ProfileInput } from "./ProfileValidator";
import type { Profile } from "./types";

export type Ask = (question: string) => Promise<string>;
export type Notice = (message: string) => void;

export interface PromptResult {
  profile: Profile;
  warnings: string[];
}

async function askRequired(ask: Ask, question: string, onInvalid: Notice): Promise<string> {
  for (;;) {
    const answer = (await ask(question)).trim();
    if (answer) return answer;
    onInvalid("Name is required!");
  }
}

async function askDate(ask: Ask, label: string, onInvalid: Notice): Promise<string> {
  for (;;) {
    const answer = (await ask(`${label} (DDMMYYYY): `)).trim();
    if (!answer || isValidDate(answer)) return answer;
    onInvalid("Invalid format! Use DDMMYYYY (e.g., 15031990)");
  }
}

async function askEmail(ask: Ask, onInvalid: Notice): Promise<string> {
  for (;;) {
    const answer = (await ask("Email: ")).trim();
    if (!answer || isValidEmail(answer)) return answer;
    onInvalid("Invalid email format! Use format: user@example.com");
  }
}

/**
 * Walk through every profile field. Empty answers skip a field.
 */
export async function promptProfile(ask: Ask, onInvalid: Notice = () => {}, onSection: Notice = () => {}): Promise<PromptResult> {
  const input: ProfileInput = {};

  input.name = await askRequired(ask, "First Name: ", onInvalid);
  input.surname = await ask("Surname: ");
  input.nickname = await ask("Nickname: ");
  input.birthdate = await askDate(ask, "Birthdate", onInvalid);
  input.email = await askEmail(ask, onInvalid);
  input.phone = await ask("Phone Number: ");

  onSection("Partner Information");
  input.partnerName = await ask("Partner's Name: ");
  input.partnerNickname = await ask("Partner's Nickname: ");
  input.partnerBirthdate = await askDate(ask, "Partner's Birthdate", onInvalid);

  onSection("Child Information");
  input.childName = await ask("Child's Name: ");
  input.childNickname = await ask("Child's Nickname: ");
  input.childBirthdate = await askDate(ask, "Child's Birthdate", onInvalid);

  onSection("Other Information");
  input.petName = await ask("Pet's Name: ");
  input.company = await ask("Company Name: ");
  input.keywords = parseKeywords(await ask("Keywords (comma-separated): "));

  const profile = createProfile(input);
  return { profile, warnings: validateProfile(profile) };
}

/**
 * readline-backed ask() on stdin/stdout; call close() when done
 */
export function createTerminalAsk(): { ask: Ask; close: () => void } {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  return {
    ask: (question) => rl.question(question),
    close: () => rl.close(),
  };
}
