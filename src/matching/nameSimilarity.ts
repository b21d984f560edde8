/**
 * Name Similarity Calculators for the Name Matching Engine
 *
 * Jaro-Winkler works well for names because it:
 * - Handles short strings
 * - Tolerates typos and small transpositions
 * - Rewards a shared prefix
 *
 * The phonetic score layers Soundex and the metaphone codes on top of it,
 * so that spellings heard alike (Chloe/Kloe, Sara/Sarah, Miguel/Mihel)
 * still score high when their letters differ.
 */

import natural from 'natural';
import { PATTERN_SCORES, PHONETIC_BONUSES, PHONETIC_EQUIVALENT_GROUPS } from './constants';
import { damerauLevenshteinSimilarity } from './editDistance';
import { detectTransliterationPattern } from './patterns';
import { doubleMetaphone, soundex } from './phonetic';

// ============================================
// JARO-WINKLER
// ============================================

/**
 * Jaro-Winkler similarity in [0, 1]: the Jaro score raised by 0.1 per
 * shared leading character (at most four). Case-sensitive.
 *
 * @example
 * jaroWinklerSimilarity("martha", "marhta") // ~0.961
 * jaroWinklerSimilarity("abc", "xyz") // 0
 */
export function jaroWinklerSimilarity(s1: string, s2: string): number {
  // Exact match
  if (s1 === s2) return 1;

  if (!s1 || !s2) return 0;

  // natural caches the Jaro score on the options object, so each call gets its own
  return natural.JaroWinklerDistance(s1, s2, {});
}

// ============================================
// PHONETIC EQUIVALENCE
// ============================================

/**
 * Whether two letters are heard alike at the start of a name
 * ({K,C}, {F,P}, {J,G}, {S,Z}, {A,E}). Case-insensitive.
 */
export function arePhoneticEquivalents(c1: string, c2: string): boolean {
  const a = c1.toUpperCase();
  const b = c2.toUpperCase();

  return PHONETIC_EQUIVALENT_GROUPS.some((group) => group.has(a) && group.has(b));
}

/**
 * Whether two strings open with equivalent sounds: a CH prefix against a
 * K prefix, or phonetically equivalent first letters.
 *
 * @example
 * hasPhoneticEquivalentStart("Chloe", "Kloe") // true
 */
export function hasPhoneticEquivalentStart(s1: string, s2: string): boolean {
  if (!s1 || !s2) return false;

  const a = s1.toUpperCase();
  const b = s2.toUpperCase();

  if ((a.startsWith('CH') && b.startsWith('K')) || (a.startsWith('K') && b.startsWith('CH'))) {
    return true;
  }

  return arePhoneticEquivalents(a.charAt(0), b.charAt(0));
}

const stripH = (code: string): string => code.replace(/H/g, '');

/**
 * Phonetic similarity of two words in [0, 1].
 *
 * Bonuses are summed and then clamped:
 * - Soundex: +0.6 for a full match, otherwise +0.4 for equal digits and
 *   +0.2 for an equal first letter (+0.15 for equivalent first letters)
 * - Metaphone: +0.6 when any primary/alternate pair is equal, otherwise
 *   0.4 x the best pairwise Damerau-Levenshtein similarity, +0.2 for an
 *   equivalent start and +0.25 for the M...G / M...H interchange
 * - +0.3 when only one side carries an H and the codes agree without it
 *
 * @example
 * phoneticSimilarity("Sara", "Sarah") // 1
 */
export function phoneticSimilarity(word1: string, word2: string): number {
  if (!word1 || !word2) return 0;

  const soundex1 = soundex(word1);
  const soundex2 = soundex(word2);
  const codes1 = doubleMetaphone(word1);
  const codes2 = doubleMetaphone(word2);

  let score = 0;

  const hasH1 = codes1.primary.includes('H') || codes1.alternate.includes('H');
  const hasH2 = codes2.primary.includes('H') || codes2.alternate.includes('H');
  if (
    hasH1 !== hasH2 &&
    (stripH(codes1.primary) === stripH(codes2.primary) ||
      stripH(codes1.alternate) === stripH(codes2.alternate))
  ) {
    score += PHONETIC_BONUSES.SILENT_H;
  }

  if (soundex1 === soundex2) {
    score += PHONETIC_BONUSES.SOUNDEX_FULL;
  } else if (soundex1.length > 1 && soundex2.length > 1) {
    if (soundex1.slice(1) === soundex2.slice(1)) {
      score += PHONETIC_BONUSES.SOUNDEX_DIGITS;
    }

    if (soundex1[0] === soundex2[0]) {
      score += PHONETIC_BONUSES.SOUNDEX_FIRST_LETTER;
    } else if (arePhoneticEquivalents(soundex1[0], soundex2[0])) {
      score += PHONETIC_BONUSES.SOUNDEX_EQUIVALENT_LETTER;
    }
  }

  const fullMetaphoneMatch =
    codes1.primary === codes2.primary ||
    codes1.primary === codes2.alternate ||
    codes1.alternate === codes2.primary ||
    codes1.alternate === codes2.alternate;

  if (fullMetaphoneMatch) {
    score += PHONETIC_BONUSES.METAPHONE_FULL;
  } else {
    const best = Math.max(
      damerauLevenshteinSimilarity(codes1.primary, codes2.primary),
      damerauLevenshteinSimilarity(codes1.alternate, codes2.alternate),
      damerauLevenshteinSimilarity(codes1.primary, codes2.alternate),
      damerauLevenshteinSimilarity(codes1.alternate, codes2.primary)
    );
    score += PHONETIC_BONUSES.METAPHONE_PARTIAL_WEIGHT * best;

    if (hasPhoneticEquivalentStart(codes1.primary, codes2.primary)) {
      score += PHONETIC_BONUSES.EQUIVALENT_START;
    }

    // G is always coded as K, so the interchange is read off the words
    const upper1 = word1.toUpperCase();
    const upper2 = word2.toUpperCase();
    if (
      codes1.primary.length > 2 &&
      codes2.primary.length > 2 &&
      codes1.primary[0] === 'M' &&
      codes2.primary[0] === 'M' &&
      ((upper1.includes('G') && upper2.includes('H')) ||
        (upper1.includes('H') && upper2.includes('G')))
    ) {
      score += PHONETIC_BONUSES.G_H_INTERCHANGE;
    }
  }

  return Math.min(1, Math.max(0, score));
}

// ============================================
// TRANSLITERATION-AWARE SIMILARITY
// ============================================

/**
 * Jaro-Winkler similarity plus 0.1 when the pair shows a transliteration
 * pattern (Saara/Sarah), capped at 1.
 */
export function transliterationAwareSimilarity(word1: string, word2: string): number {
  let score = jaroWinklerSimilarity(word1, word2);

  if (detectTransliterationPattern(word1, word2)) {
    score += PATTERN_SCORES.TRANSLITERATION_BONUS;
  }

  return Math.min(1, score);
}
