/**
 * LeetTransformer.ts - Leet-speak substitution
 *
 * Substitutions run one after another over the evolving string, in the
 * map's key order, so a cyclic map (a->e, e->3) is order-sensitive.
 *
 * @license MIT
 */

export const DEFAULT_LEET_MAP: Readonly<Record<string, string>> = Object.freeze({
  a: "4",
  e: "3",
  i: "1",
  o: "0",
  s: "5",
  t: "7",
  g: "9",
  b: "8",
});

export function makeLeet(token: string, leetMap: Readonly<Record<string, string>> = DEFAULT_LEET_MAP): string {
  let leet = token.toLowerCase();
  for (const [letter, replacement] of Object.entries(leetMap)) {
    if (!letter) continue;
    leet = leet.split(letter).join(replacement);
  }
  return leet;
}
