/**
 * Vowel/Consonant Pattern Analysis for the Name Matching Engine
 *
 * Transliterated names keep their consonant skeleton while the vowels drift
 * (Ahmad/Ahmed, Saara/Sarah). These helpers extract both skeletons and
 * compare them with rules tuned for those drifts.
 */

import {
  CONSONANT_SCORES,
  PATTERN_VOWELS,
  VOWEL_SCORES,
} from './constants';
import { vowelAwareLevenshtein } from './editDistance';

const isVowel = (char: string): boolean => char.length === 1 && PATTERN_VOWELS.includes(char);

/**
 * Ordered vowels of a word, uppercase (Y counts as a vowel).
 *
 * @example
 * extractVowelPattern("Olyvia") // "OYIA"
 */
export function extractVowelPattern(word: string): string {
  return Array.from((word || '').toUpperCase())
    .filter(isVowel)
    .join('');
}

/**
 * Ordered consonant letters of a word, uppercase. An H right after a vowel
 * is emitted twice.
 *
 * @example
 * extractConsonantPattern("Sarah") // "SRHH"
 * extractConsonantPattern("Saira") // "SR"
 */
export function extractConsonantPattern(word: string): string {
  const upper = Array.from((word || '').toUpperCase());

  return upper
    .map((char, i) => {
      if (isVowel(char) || !/\p{L}/u.test(char)) return '';
      if (char === 'H' && i > 0 && isVowel(upper[i - 1])) return 'HH';
      return char;
    })
    .join('');
}

/**
 * Whether a doubled letter in one sequence lines up with the same letter
 * followed by H in the other, in either direction (AA against AH).
 */
export function hasDoubleVowelToHPattern(pattern1: string, pattern2: string): boolean {
  const p1 = (pattern1 || '').toUpperCase();
  const p2 = (pattern2 || '').toUpperCase();

  const oneWay = (doubled: string, other: string): boolean => {
    for (let i = 0; i < doubled.length - 1; i++) {
      if (doubled[i] !== doubled[i + 1]) continue;
      for (let j = 0; j < other.length - 1; j++) {
        if (other[j] === doubled[i] && other[j + 1] === 'H') return true;
      }
    }
    return false;
  };

  return oneWay(p1, p2) || oneWay(p2, p1);
}

/**
 * Groups acoustically close vowels: a doubled vowel becomes vowel + H,
 * then A/E -> 1, I/Y -> 2, O/U -> 3.
 *
 * @example
 * normalizeVowelPattern("AAI") // "1H2"
 */
export function normalizeVowelPattern(pattern: string): string {
  const chars = Array.from(pattern.toUpperCase());

  for (let i = 0; i < chars.length - 1; i++) {
    if (chars[i] === chars[i + 1]) chars[i + 1] = 'H';
  }

  return chars
    .join('')
    .replace(/[AE]/g, '1')
    .replace(/[IY]/g, '2')
    .replace(/[OU]/g, '3');
}

/**
 * Similarity of two vowel patterns in [0, 1].
 *
 * - identical patterns: 1
 * - doubled vowel against the same vowel + H: 0.9
 * - AH against AI: 0.3
 * - patterns of two vowels or fewer: set overlap
 * - longer patterns: 40% raw / 60% grouped Levenshtein similarity
 */
export function vowelPatternSimilarity(pattern1: string, pattern2: string): number {
  const p1 = (pattern1 || '').toUpperCase();
  const p2 = (pattern2 || '').toUpperCase();

  if (p1 === p2) return 1;

  if (hasDoubleVowelToHPattern(p1, p2)) return VOWEL_SCORES.DOUBLE_VOWEL_TO_H;

  if ((p1.includes('AH') && p2.includes('AI')) || (p1.includes('AI') && p2.includes('AH'))) {
    return VOWEL_SCORES.AH_AI_PENALTY;
  }

  if (p1.length <= 2 || p2.length <= 2) {
    const set1 = new Set(p1);
    const set2 = new Set(p2);
    const common = [...set1].filter((char) => set2.has(char)).length;
    const total = new Set([...set1, ...set2]).size;

    return total > 0 ? common / total : 0;
  }

  const raw = 1 - vowelAwareLevenshtein(p1, p2) / Math.max(p1.length, p2.length);

  const n1 = normalizeVowelPattern(p1);
  const n2 = normalizeVowelPattern(p2);
  const normalized = 1 - vowelAwareLevenshtein(n1, n2) / Math.max(n1.length, n2.length);

  const score = raw * VOWEL_SCORES.RAW_WEIGHT + normalized * VOWEL_SCORES.NORMALIZED_WEIGHT;

  return Math.min(1, Math.max(0, score));
}

function hasRhPattern(pattern: string): boolean {
  return pattern.includes('RH');
}

/**
 * Similarity of two consonant patterns in [0, 1].
 *
 * Short patterns (two letters or fewer on either side) compare position by
 * position. Longer ones use an alignment where a match early in the pattern
 * costs less than a late one; an insert plus a delete costs 2, so this branch
 * never scores below 0.8. When both contain R, an RH on one side only caps
 * the score at 0.6 (the RH-on-both floor of 0.8 is therefore always met).
 */
export function consonantStructureSimilarity(pattern1: string, pattern2: string): number {
  const p1 = (pattern1 || '').toUpperCase();
  const p2 = (pattern2 || '').toUpperCase();
  const maxLen = Math.max(p1.length, p2.length);

  if (p1.length <= 2 || p2.length <= 2) {
    let matches = 0;
    for (let i = 0; i < Math.min(p1.length, p2.length); i++) {
      if (p1[i] === p2[i]) matches++;
    }
    return maxLen > 0 ? matches / maxLen : 0;
  }

  const matrix: number[][] = Array.from({ length: p1.length + 1 }, (_, i) =>
    Array.from({ length: p2.length + 1 }, (_, j) => (i === 0 ? j : j === 0 ? i : 0))
  );

  for (let i = 1; i <= p1.length; i++) {
    for (let j = 1; j <= p2.length; j++) {
      let matchCost = 10;
      if (p1[i - 1] === p2[j - 1]) {
        const positionWeight = 1 - (0.7 * Math.min(i, j)) / maxLen;
        matchCost = Math.trunc(10 * positionWeight);
      }

      matrix[i][j] = Math.min(
        matrix[i - 1][j] + 1,
        matrix[i][j - 1] + 1,
        matrix[i - 1][j - 1] + matchCost
      );
    }
  }

  let similarity = 1 - matrix[p1.length][p2.length] / (maxLen * 10);

  if (p1.includes('R') && p2.includes('R')) {
    const rh1 = hasRhPattern(p1);
    const rh2 = hasRhPattern(p2);

    if (rh1 && rh2) {
      similarity = Math.max(similarity, CONSONANT_SCORES.RH_BOTH_FLOOR);
    } else if (rh1 !== rh2) {
      similarity = Math.min(similarity, CONSONANT_SCORES.RH_ONE_CAP);
    }
  }

  return Math.min(1, Math.max(0, similarity));
}

/**
 * Coarse signal that two spellings are transliteration variants.
 *
 * True when a doubled vowel in one string lines up with the same vowel
 * followed by H, or followed by a different vowel, in the other string
 * (Saara/Sarah, Saara/Saira), in either direction.
 */
export function detectTransliterationPattern(text1: string, text2: string): boolean {
  const t1 = (text1 || '').toUpperCase();
  const t2 = (text2 || '').toUpperCase();

  const oneWay = (doubled: string, other: string): boolean => {
    for (let i = 0; i < doubled.length - 1; i++) {
      if (!isVowel(doubled[i]) || doubled[i] !== doubled[i + 1]) continue;

      for (let j = 0; j < other.length - 1; j++) {
        if (other[j] !== doubled[i]) continue;
        const next = other[j + 1];
        if (next === 'H' || (isVowel(next) && next !== other[j])) return true;
      }
    }
    return false;
  };

  return oneWay(t1, t2) || oneWay(t2, t1);
}
