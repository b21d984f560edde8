/**
 * Name Matching Engine
 *
 * Pure, deterministic functions that find which of a list of names a
 * (possibly misspelled, partial or transliterated) query refers to:
 * - Lookup tables for known variants and canonical forms
 * - Exact, structural and edit-distance matches
 * - Phonetic, pattern and regional similarity scores
 *
 * Usage:
 * ```typescript
 * import { search } from './matching';
 *
 * search(['Michael Johnson', 'Jane Doe'], 'Mikael Jonson'); // 'Michael Johnson'
 * ```
 */

// Main functions
export { search, searchWithDetails, describeStage } from './searchName';
export { MATCH_STRATEGIES, runMatchers } from './matchers';
export type { MatchStrategy } from './matchers';

// Tables
export {
  parseNameTables,
  loadNameTables,
  getTableStats,
  nameTablesSchema,
  EMPTY_NAME_TABLES,
  DEFAULT_NAME_TABLES,
  NameTablesReadError,
} from './nameTables';

// Individual scoring functions (for testing/debugging)
export { normalizeName, parseName, splitNameParts, isHonorific, stripTitles } from './normalizeName';
export { soundex, doubleMetaphone } from './phonetic';
export { levenshteinDistance, vowelAwareLevenshtein, damerauLevenshteinSimilarity } from './editDistance';
export {
  extractVowelPattern,
  extractConsonantPattern,
  normalizeVowelPattern,
  vowelPatternSimilarity,
  consonantStructureSimilarity,
  detectTransliterationPattern,
  hasDoubleVowelToHPattern,
} from './patterns';
export {
  jaroWinklerSimilarity,
  arePhoneticEquivalents,
  hasPhoneticEquivalentStart,
  phoneticSimilarity,
  transliterationAwareSimilarity,
} from './nameSimilarity';
export {
  isTransliterationEquivalent,
  hasYiSubstitutionPattern,
  isHispanicName,
  hispanicNameSimilarity,
  isLikelyArabicName,
  arabicNameSimilarity,
  detectNameFamily,
} from './regionalHeuristics';
export { calculateMatchScore, calculateCompositeNameScore } from './compositeScore';

// Constants
export {
  MIN_SCORE_THRESHOLD,
  PART_MATCH_THRESHOLD,
  CLOSE_MATCH_MAX_DISTANCE,
  SCORE_WEIGHTS,
  PATTERN_SCORES,
} from './constants';

// Types
export type {
  NameTables,
  NameTablesInput,
  NameTableStats,
  ParsedName,
  MatchStage,
  MatcherHit,
  MatchContext,
  NameMatcher,
  NameMatch,
  MetaphoneCodes,
  NameFamily,
} from './types';
