/**
 * Regional Heuristics for the Name Matching Engine
 *
 * Some name families drift in ways generic string metrics miss:
 * - Hispanic names swap G and H (Miguel/Mihel)
 * - Arabic names swap vowels and vowel + H (Ahmad/Ahmed, Saara/Sarah)
 * - Y and I trade places in many romanizations (Sayra/Saira)
 *
 * Every check here is case-insensitive.
 */

import {
  ARABIC_INFIXES,
  ARABIC_PREFIXES,
  HISPANIC_INFIXES,
  HISPANIC_PREFIXES,
  HISPANIC_SUFFIXES,
  KNOWN_TRANSLITERATIONS,
  PATTERN_VOWELS,
  REGIONAL_SCORES,
} from './constants';
import { damerauLevenshteinSimilarity } from './editDistance';
import {
  consonantStructureSimilarity,
  extractConsonantPattern,
  extractVowelPattern,
  vowelPatternSimilarity,
} from './patterns';
import type { NameFamily } from './types';

const isVowel = (char: string): boolean => char.length === 1 && PATTERN_VOWELS.includes(char);

// ============================================
// TRANSLITERATION EQUIVALENCE
// ============================================

/**
 * Same consonants, vowels differing by a Y/I swap, and vowel patterns
 * still close (> 0.7) once Y is read as I.
 *
 * @example
 * hasYiSubstitutionPattern("Sayra", "Saira") // true
 */
export function hasYiSubstitutionPattern(word1: string, word2: string): boolean {
  if (Math.abs(word1.length - word2.length) > 1) return false;

  if (extractConsonantPattern(word1) !== extractConsonantPattern(word2)) return false;

  const vowels1 = extractVowelPattern(word1);
  const vowels2 = extractVowelPattern(word2);

  const hasYi =
    (vowels1.includes('Y') && vowels2.includes('I')) ||
    (vowels1.includes('I') && vowels2.includes('Y'));
  if (!hasYi) return false;

  const similarity = vowelPatternSimilarity(vowels1.replace(/Y/g, 'I'), vowels2.replace(/Y/g, 'I'));

  return similarity > 0.7;
}

/**
 * Whether two words are known romanizations of the same name.
 */
export function isTransliterationEquivalent(word1: string, word2: string): boolean {
  const a = (word1 || '').toLowerCase();
  const b = (word2 || '').toLowerCase();

  const known = KNOWN_TRANSLITERATIONS.some(
    ([left, right]) => (a === left && b === right) || (a === right && b === left)
  );

  return known || hasYiSubstitutionPattern(a, b);
}

// ============================================
// HISPANIC NAMES
// ============================================

/**
 * Whether a name looks Hispanic: a known opening, consonant cluster or
 * ending. Names shorter than three characters never do.
 *
 * @example
 * isHispanicName("Fernandez") // true (NZ, EZ)
 * isHispanicName("Smith") // false
 */
export function isHispanicName(name: string): boolean {
  if (!name || name.length < 3) return false;

  const upper = name.toUpperCase();

  return (
    HISPANIC_PREFIXES.some((prefix) => upper.startsWith(prefix)) ||
    HISPANIC_INFIXES.some((infix) => upper.includes(infix)) ||
    HISPANIC_SUFFIXES.some((suffix) => upper.endsWith(suffix))
  );
}

/**
 * Scores the Miguel/Mihel family: both names open with MI and one has a G
 * where the other has an H. 0.9 when the rest (G and H removed) is close,
 * 0.7 otherwise, 0 when the pattern does not apply.
 */
export function hispanicNameSimilarity(name1: string, name2: string): number {
  const a = (name1 || '').toUpperCase();
  const b = (name2 || '').toUpperCase();

  if (!a.startsWith('MI') || !b.startsWith('MI')) return 0;

  const interchange = (a.includes('G') && b.includes('H')) || (a.includes('H') && b.includes('G'));
  if (!interchange) return 0;

  const rest = damerauLevenshteinSimilarity(a.replace(/[GH]/g, ''), b.replace(/[GH]/g, ''));

  return rest > REGIONAL_SCORES.HISPANIC_REST_THRESHOLD
    ? REGIONAL_SCORES.HISPANIC_G_H_STRONG
    : REGIONAL_SCORES.HISPANIC_G_H_WEAK;
}

// ============================================
// ARABIC NAMES
// ============================================

/**
 * Whether a name carries an Arabic article or patronymic marker
 * ("al-", "el-" anywhere, "bin "/"ibn " at the start).
 *
 * Hyphens matter here, so pass the text before normalization.
 */
export function isLikelyArabicName(name: string): boolean {
  const lower = (name || '').toLowerCase();

  return (
    ARABIC_INFIXES.some((infix) => lower.includes(infix)) ||
    ARABIC_PREFIXES.some((prefix) => lower.startsWith(prefix))
  );
}

function hasVowelH(text: string): boolean {
  for (let i = 0; i < text.length - 1; i++) {
    if (isVowel(text[i]) && text[i + 1] === 'H') return true;
  }
  return false;
}

function hasDoubleVowel(text: string): boolean {
  for (let i = 0; i < text.length - 1; i++) {
    if (isVowel(text[i]) && text[i] === text[i + 1]) return true;
  }
  return false;
}

/**
 * A doubled vowel in `doubled` whose vowel appears followed by H in `other`.
 */
function doubledVowelMeetsVowelH(doubled: string, other: string): boolean {
  for (let i = 0; i < doubled.length - 1; i++) {
    if (!isVowel(doubled[i]) || doubled[i] !== doubled[i + 1]) continue;
    for (let j = 0; j < other.length - 1; j++) {
      if (other[j] === doubled[i] && other[j + 1] === 'H') return true;
    }
  }
  return false;
}

/** A/E/I -> 1, O/U -> 2 */
function normalizeArabicVowels(vowels: string): string {
  return vowels.replace(/[AEI]/g, '1').replace(/[OU]/g, '2');
}

/**
 * Similarity of two Arabic-looking names in [0, 1].
 *
 * - length difference above 3: 0
 * - doubled vowel against the same vowel + H (Saara/Sarah): 0.85
 * - vowel + H on one side only, vowel counts (A aside) differing: 0.1
 * - consonant skeletons close (> 0.7): 0.9 on equal grouped vowels,
 *   0.7 on vowel counts within one
 * - otherwise half the consonant-structure similarity
 */
export function arabicNameSimilarity(name1: string, name2: string): number {
  const a = (name1 || '').toUpperCase();
  const b = (name2 || '').toUpperCase();

  if (Math.abs(a.length - b.length) > REGIONAL_SCORES.ARABIC_MAX_LENGTH_DIFF) return 0;

  const vowelH1 = hasVowelH(a);
  const vowelH2 = hasVowelH(b);

  if ((vowelH1 && hasDoubleVowel(b)) || (hasDoubleVowel(a) && vowelH2)) {
    if (doubledVowelMeetsVowelH(a, b) || doubledVowelMeetsVowelH(b, a)) {
      return REGIONAL_SCORES.ARABIC_DOUBLE_VOWEL_TO_H;
    }
  }

  const vowels1 = extractVowelPattern(a);
  const vowels2 = extractVowelPattern(b);

  if (vowelH1 !== vowelH2 && vowels1.replace(/A/g, '').length !== vowels2.replace(/A/g, '').length) {
    return REGIONAL_SCORES.ARABIC_VOWEL_H_MISMATCH;
  }

  const consonants1 = extractConsonantPattern(a);
  const consonants2 = extractConsonantPattern(b);

  if (
    consonants1.length === 0 ||
    consonants2.length === 0 ||
    Math.abs(consonants1.length - consonants2.length) > REGIONAL_SCORES.ARABIC_MAX_CONSONANT_DIFF
  ) {
    return 0;
  }

  const consonantScore = consonantStructureSimilarity(consonants1, consonants2);

  if (consonantScore > REGIONAL_SCORES.ARABIC_CONSONANT_THRESHOLD) {
    const grouped1 = normalizeArabicVowels(vowels1);
    const grouped2 = normalizeArabicVowels(vowels2);

    if (grouped1.length > 0 && grouped1 === grouped2) return REGIONAL_SCORES.ARABIC_VOWELS_EQUAL;

    if (Math.abs(vowels1.length - vowels2.length) <= 1) return REGIONAL_SCORES.ARABIC_VOWEL_COUNT_CLOSE;
  }

  return consonantScore * 0.5;
}

// ============================================
// ROUTING
// ============================================

/**
 * Picks the scoring route for a multi-part comparison. Hispanic takes
 * precedence over Arabic; both sides must agree.
 *
 * @param query - Title-stripped query text
 * @param candidate - Title-stripped candidate text
 * @param rawQuery - Query as typed (Arabic markers need the hyphen)
 * @param rawCandidate - Candidate as supplied
 */
export function detectNameFamily(
  query: string,
  candidate: string,
  rawQuery: string,
  rawCandidate: string
): NameFamily {
  if (isHispanicName(query) && isHispanicName(candidate)) return 'hispanic';
  if (isLikelyArabicName(rawQuery) && isLikelyArabicName(rawCandidate)) return 'arabic';
  return 'generic';
}
