/**
 * Edit Distance Calculators for the Name Matching Engine
 *
 * - Plain Levenshtein distance (unit costs) for close-match checks
 * - A vowel-aware Levenshtein used on vowel patterns, which makes
 *   Saira/Sarah/Saara drift apart instead of collapsing together
 * - Damerau-Levenshtein similarity (adjacent transpositions cost one edit)
 */

import natural from 'natural';
import { PATTERN_VOWELS } from './constants';

/**
 * Levenshtein distance with unit insert/delete/substitute costs.
 * Case-sensitive; callers fold case.
 *
 * @example
 * levenshteinDistance("jonson", "johnson") // 1
 */
export function levenshteinDistance(a: string, b: string): number {
  if (!a) return b ? b.length : 0;
  if (!b) return a.length;

  return natural.LevenshteinDistance(a, b);
}

const isPatternVowel = (char: string): boolean =>
  char.length === 1 && PATTERN_VOWELS.includes(char);

/**
 * Substitution cost at s[i-1] against t[j-1] (both uppercase).
 *
 * 2 when either side shows a vowel followed by H there,
 * 3 when one side shows "AI" and the other "AA" or "AH".
 */
function vowelAwareSubstitutionCost(s: string, t: string, i: number, j: number): number {
  if (s.charAt(i - 1) === t.charAt(j - 1)) return 0;
  if (i < 2 || j < 2) return 1;

  const sPair = s.slice(i - 2, i);
  const tPair = t.slice(j - 2, j);

  const isAi = (pair: string) => pair === 'AI';
  const isAaOrAh = (pair: string) => pair === 'AA' || pair === 'AH';

  if ((isAi(sPair) && isAaOrAh(tPair)) || (isAi(tPair) && isAaOrAh(sPair))) {
    return 3;
  }

  const sVowelH = s.charAt(i - 1) === 'H' && isPatternVowel(s.charAt(i - 2));
  const tVowelH = t.charAt(j - 1) === 'H' && isPatternVowel(t.charAt(j - 2));

  return sVowelH || tVowelH ? 2 : 1;
}

/**
 * Levenshtein distance with raised substitution costs around vowel + H and
 * AI/AA/AH positions. Case-insensitive.
 *
 * @example
 * vowelAwareLevenshtein("AI", "AA") // 2 (delete + insert beats the cost-3 substitution)
 */
export function vowelAwareLevenshtein(source: string, target: string): number {
  const s = (source || '').toUpperCase();
  const t = (target || '').toUpperCase();

  if (s.length === 0) return t.length;
  if (t.length === 0) return s.length;

  let previousRow = Array.from({ length: t.length + 1 }, (_, j) => j);

  for (let i = 1; i <= s.length; i++) {
    const currentRow = [i];

    for (let j = 1; j <= t.length; j++) {
      const cost = vowelAwareSubstitutionCost(s, t, i, j);
      currentRow[j] = Math.min(
        currentRow[j - 1] + 1,
        previousRow[j] + 1,
        previousRow[j - 1] + cost
      );
    }

    previousRow = currentRow;
  }

  return previousRow[t.length];
}

/**
 * Damerau-Levenshtein similarity: `1 - distance / max(len1, len2)`, where the
 * distance is the optimal-string-alignment one (no substring edited twice).
 * Two empty strings are identical (1); one empty string scores 0.
 *
 * @example
 * damerauLevenshteinSimilarity("jonh", "john") // 0.75
 */
export function damerauLevenshteinSimilarity(s1: string, s2: string): number {
  if (!s1 && !s2) return 1;
  if (!s1 || !s2) return 0;

  const distance = natural.DamerauLevenshteinDistance(s1, s2, { restricted: true });

  return 1 - distance / Math.max(s1.length, s2.length);
}
