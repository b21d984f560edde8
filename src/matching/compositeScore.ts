/**
 * Composite Scores for the Name Matching Engine
 *
 * Two scores decide the fuzzy stages of the pipeline:
 *
 * 1. Single-part score (a query term against each candidate part)
 *    score = phonetic × 0.25 + edit × 0.20 + jaroWinkler × 0.20
 *          + vowelPattern × 0.15 [+ hispanic × 0.20]
 *
 * 2. Multi-part score (every query part against the candidate parts),
 *    routed to the Hispanic or Arabic heuristic when both sides belong to
 *    that family, averaged part by part otherwise.
 */

import {
  INCOMPLETE_COVERAGE_FACTOR,
  PART_MATCH_THRESHOLD,
  PATTERN_SCORES,
  SCORE_WEIGHTS,
  UNRELATED_FLOORS,
} from './constants';
import { damerauLevenshteinSimilarity } from './editDistance';
import { jaroWinklerSimilarity, phoneticSimilarity, transliterationAwareSimilarity } from './nameSimilarity';
import { stripTitles } from './normalizeName';
import { extractVowelPattern, vowelPatternSimilarity } from './patterns';
import {
  arabicNameSimilarity,
  detectNameFamily,
  hispanicNameSimilarity,
  isHispanicName,
  isTransliterationEquivalent,
} from './regionalHeuristics';
import type { ParsedName } from './types';

const clamp = (value: number): number => Math.min(1, Math.max(0, value));

/**
 * Scores a query term against the best-fitting part of a candidate.
 *
 * A known transliteration of any part short-circuits to 0.95. Parts where
 * every sub-score sits below its floor are skipped as unrelated.
 *
 * @param searchTerm - Normalized query text
 * @param candidate - Parsed candidate
 * @returns Score from 0 to 1
 *
 * @example
 * calculateMatchScore("sayra", parseName("Saira Khan")) // 0.95
 */
export function calculateMatchScore(searchTerm: string, candidate: ParsedName): number {
  const term = (searchTerm || '').toLowerCase();
  const parts = candidate.parts;

  if (!term || parts.length === 0) return 0;

  if (parts.some((part) => isTransliterationEquivalent(term, part))) {
    return PATTERN_SCORES.TRANSLITERATION_EQUIVALENT;
  }

  const hispanic = isHispanicName(term) || parts.some(isHispanicName);
  const termVowels = extractVowelPattern(term);

  let bestScore = 0;

  for (const part of parts) {
    const phonetic = phoneticSimilarity(term, part);
    const edit = damerauLevenshteinSimilarity(term, part);
    const jaroWinkler = jaroWinklerSimilarity(term, part);
    const vowel = vowelPatternSimilarity(termVowels, extractVowelPattern(part));
    const regional = hispanic ? hispanicNameSimilarity(term, part) : 0;

    if (
      phonetic < UNRELATED_FLOORS.PHONETIC &&
      edit < UNRELATED_FLOORS.EDIT_DISTANCE &&
      jaroWinkler < UNRELATED_FLOORS.JARO_WINKLER &&
      regional < UNRELATED_FLOORS.REGIONAL &&
      vowel < UNRELATED_FLOORS.VOWEL_PATTERN
    ) {
      continue;
    }

    let combined =
      phonetic * SCORE_WEIGHTS.PHONETIC +
      edit * SCORE_WEIGHTS.EDIT_DISTANCE +
      jaroWinkler * SCORE_WEIGHTS.JARO_WINKLER +
      vowel * SCORE_WEIGHTS.VOWEL_PATTERN;

    if (hispanic) {
      combined += regional * SCORE_WEIGHTS.REGIONAL;
    }

    bestScore = Math.max(bestScore, combined);
  }

  return clamp(bestScore);
}

/**
 * Scores a multi-part query against a candidate.
 *
 * Titles are stripped from both sides first; nothing left means 0. Query
 * parts whose best transliteration-aware score is above 0.75 count as
 * matched. The matched sum is divided by the query part count, or by
 * 1.5 × that count when some part went unmatched.
 *
 * @example
 * calculateCompositeNameScore(parseName("Wei Zhang"), parseName("Dr. Wei Zhang")) // 1
 */
export function calculateCompositeNameScore(query: ParsedName, candidate: ParsedName): number {
  const queryParts = stripTitles(query.parts);
  const candidateParts = stripTitles(candidate.parts);

  if (queryParts.length === 0 || candidateParts.length === 0) return 0;

  const queryText = queryParts.join(' ');
  const candidateText = candidateParts.join(' ');

  switch (detectNameFamily(queryText, candidateText, query.raw, candidate.raw)) {
    case 'hispanic':
      return hispanicNameSimilarity(queryText, candidateText);
    case 'arabic':
      return arabicNameSimilarity(queryText, candidateText);
    case 'generic':
      break;
  }

  let total = 0;
  let matched = 0;

  for (const queryPart of queryParts) {
    const best = Math.max(
      0,
      ...candidateParts.map((candidatePart) => transliterationAwareSimilarity(queryPart, candidatePart))
    );

    if (best > PART_MATCH_THRESHOLD) {
      total += best;
      matched++;
    }
  }

  const divisor =
    matched < queryParts.length ? queryParts.length * INCOMPLETE_COVERAGE_FACTOR : queryParts.length;

  return clamp(total / divisor);
}
