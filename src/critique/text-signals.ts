/**
 * Keyword, numeric and bounding helpers shared by every detector.
 *
 * All matching is case-insensitive substring matching. Curly apostrophes are
 * folded to `'` so "can’t fail" and "can't fail" match the same keyword.
 */

const CURLY_APOSTROPHES = /[‘’ʼ]/g;
const NUMERIC_TOKEN = /\d+(?:\.\d+)?/g;

/**
 * Lower-case the text and fold apostrophe variants.
 */
export function normalizeText(text: string | null | undefined): string {
  return (text ?? "").toLowerCase().replace(CURLY_APOSTROPHES, "'");
}

/**
 * Keywords that occur in `text`, in keyword-list order.
 */
export function matchedKeywords(
  text: string | null | undefined,
  keywords: readonly string[]
): string[] {
  const haystack = normalizeText(text);
  if (haystack.length === 0) return [];
  return keywords.filter((keyword) => haystack.includes(normalizeText(keyword)));
}

export function containsAny(text: string | null | undefined, keywords: readonly string[]): boolean {
  return matchedKeywords(text, keywords).length > 0;
}

/**
 * Number of integer or decimal tokens; "$1.5m over 3 quarters" counts 2.
 */
export function countNumbers(text: string | null | undefined): number {
  return (text ?? "").match(NUMERIC_TOKEN)?.length ?? 0;
}

export function clamp(n: number, lo: number, hi: number): number {
  return Math.min(hi, Math.max(lo, n));
}
