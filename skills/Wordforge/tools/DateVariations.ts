/**
 * DateVariations.ts - Password fragments from a DDMMYYYY date
 *
 * The variant list is fixed:
 *   dd, mm, yyyy, yy, yyy,
 *   ddmm, mmdd, ddmmyyyy, mmddyyyy, ddmmyy, mmddyy,
 *   yyyymmdd, yyyyddmm, yymmdd, yyddmm,
 *   second digit of dd, second digit of mm
 *
 * @license MIT
 */

const DATE_PATTERN = /^\d{8}$/;

export function isValidDate(date: string | undefined): boolean {
  return Boolean(date) && DATE_PATTERN.test(date ?? "");
}

/**
 * Expand one date. Anything that is not exactly 8 digits yields an empty set.
 */
export function expandDate(date: string | undefined): Set<string> {
  if (!date || !DATE_PATTERN.test(date)) {
    return new Set();
  }

  const dd = date.slice(0, 2);
  const mm = date.slice(2, 4);
  const yyyy = date.slice(4);
  const yy = yyyy.slice(2);
  const yyy = yyyy.slice(1);

  return new Set([
    dd,
    mm,
    yyyy,
    yy,
    yyy,
    dd + mm,
    mm + dd,
    dd + mm + yyyy,
    mm + dd + yyyy,
    dd + mm + yy,
    mm + dd + yy,
    yyyy + mm + dd,
    yyyy + dd + mm,
    yy + mm + dd,
    yy + dd + mm,
    dd[1],
    mm[1],
  ]);
}

/**
 * Union of the variations of several dates; absent dates contribute nothing
 */
export function expandDates(dates: Iterable<string | undefined>): Set<string> {
  const all = new Set<string>();
  for (const date of dates) {
    for (const variant of expandDate(date)) {
      all.add(variant);
    }
  }
  return all;
}
