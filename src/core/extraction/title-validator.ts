/**
 * Rejects promotional banners and price fragments that sit in the same
 * heading positions as real product titles.
 */

export const MIN_TITLE_LENGTH = 10;

/**
 * "Vihdoin arki" is a storewide campaign slogan, "myyty tänään" means
 * "sold today", "osta" is the "buy" call to action.
 */
export const PROMO_PHRASES: RegExp[] = [
  /vihdoin arki/i,
  /myyty tänään/i,
  /€/,
  /\bosta\b/i,
];

/**
 * @param candidate - Text taken from a heading or title element
 * @param promoPhrases - Patterns that mark the text as marketing copy
 */
export function isValidTitle(
  candidate: string,
  promoPhrases: readonly RegExp[] = PROMO_PHRASES,
): boolean {
  if (candidate.length < MIN_TITLE_LENGTH) return false;
  if (promoPhrases.some((re) => re.test(candidate))) return false;
  if (candidate.endsWith("%")) return false;

  // only digits and separators, e.g. "1 234 567,89"
  const letters = candidate.replace(/[\d\s\p{P}\p{S}]/gu, "");
  return letters.length > 0;
}
