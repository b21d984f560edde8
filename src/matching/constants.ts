/**
 * Constants for the Name Matching Engine
 *
 * These values define the behavior of the matching pipeline.
 * They are calibration points tuned against known name families
 * (Sarah/Saara/Saira, Miguel/Mihel, Ahmad/Ahmed, ...), not derived
 * values. Change them together with the tests that pin them.
 */

// ============================================
// ACCEPTANCE THRESHOLDS
// ============================================

/**
 * Minimum composite score for the two scoring stages.
 * A candidate must score strictly above this value to be returned.
 */
export const MIN_SCORE_THRESHOLD = 0.4;

/**
 * A query part counts as matched in multi-part scoring only when its best
 * transliteration-aware score is strictly above this value.
 */
export const PART_MATCH_THRESHOLD = 0.75;

/**
 * Coverage penalty divisor factor: when fewer parts matched than the query
 * has, the summed score is divided by `queryPartCount * 1.5`.
 */
export const INCOMPLETE_COVERAGE_FACTOR = 1.5;

/**
 * Maximum per-part Levenshtein distance for the close-match stage.
 */
export const CLOSE_MATCH_MAX_DISTANCE = 2;

// ============================================
// SCORING WEIGHTS
// ============================================

/**
 * Weights of the single-part composite score.
 * The regional weight only applies when a Hispanic pattern is detected.
 */
export const SCORE_WEIGHTS = {
  PHONETIC: 0.25,
  EDIT_DISTANCE: 0.2,
  JARO_WINKLER: 0.2,
  VOWEL_PATTERN: 0.15,
  REGIONAL: 0.2,
} as const;

/**
 * Floors below which every sub-score must sit for a part comparison to be
 * discarded as unrelated.
 */
export const UNRELATED_FLOORS = {
  PHONETIC: 0.1,
  EDIT_DISTANCE: 0.1,
  JARO_WINKLER: 0.3,
  REGIONAL: 0.2,
  VOWEL_PATTERN: 0.3,
} as const;

/**
 * Fixed scores handed out by the pattern heuristics.
 */
export const PATTERN_SCORES = {
  /** Known transliteration equivalents (Saira/Sayra, y/i swaps) */
  TRANSLITERATION_EQUIVALENT: 0.95,
  /** Single-token query found inside a candidate through the name remap table */
  REMAP_BOOST: 0.9,
  /** Bonus added to Jaro-Winkler when a transliteration pattern is detected */
  TRANSLITERATION_BONUS: 0.1,
} as const;

/**
 * Phonetic similarity bonuses.
 */
export const PHONETIC_BONUSES = {
  SOUNDEX_FULL: 0.6,
  SOUNDEX_DIGITS: 0.4,
  SOUNDEX_FIRST_LETTER: 0.2,
  SOUNDEX_EQUIVALENT_LETTER: 0.15,
  METAPHONE_FULL: 0.6,
  METAPHONE_PARTIAL_WEIGHT: 0.4,
  EQUIVALENT_START: 0.2,
  G_H_INTERCHANGE: 0.25,
  SILENT_H: 0.3,
} as const;

/**
 * Vowel pattern similarity scores.
 */
export const VOWEL_SCORES = {
  /** Doubled vowel aligned with vowel + H (Saara/Sarah) */
  DOUBLE_VOWEL_TO_H: 0.9,
  /** AH against AI (Sarah/Saira) */
  AH_AI_PENALTY: 0.3,
  RAW_WEIGHT: 0.4,
  NORMALIZED_WEIGHT: 0.6,
} as const;

/**
 * Consonant structure adjustments for the R+H pattern.
 */
export const CONSONANT_SCORES = {
  RH_BOTH_FLOOR: 0.8,
  RH_ONE_CAP: 0.6,
} as const;

/**
 * Regional heuristic scores.
 */
export const REGIONAL_SCORES = {
  HISPANIC_G_H_STRONG: 0.9,
  HISPANIC_G_H_WEAK: 0.7,
  HISPANIC_REST_THRESHOLD: 0.7,
  ARABIC_DOUBLE_VOWEL_TO_H: 0.85,
  ARABIC_VOWEL_H_MISMATCH: 0.1,
  ARABIC_VOWELS_EQUAL: 0.9,
  ARABIC_VOWEL_COUNT_CLOSE: 0.7,
  ARABIC_CONSONANT_THRESHOLD: 0.7,
  ARABIC_MAX_LENGTH_DIFF: 3,
  ARABIC_MAX_CONSONANT_DIFF: 2,
} as const;

// ============================================
// LETTER SETS
// ============================================

/** Vowels for pattern analysis (Y counts as a vowel) */
export const PATTERN_VOWELS = 'AEIOUY';

/** Vowels for the phonetic encoder (Y is a consonant there) */
export const PHONETIC_VOWELS = 'AEIOU';

/**
 * Soundex digit classes for A..Z.
 */
export const SOUNDEX_DIGITS = '01230120022455012623010202';

/**
 * First letters that are heard alike at the start of a name.
 */
export const PHONETIC_EQUIVALENT_GROUPS: ReadonlyArray<ReadonlySet<string>> = [
  new Set(['K', 'C']),
  new Set(['F', 'P']),
  new Set(['J', 'G']),
  new Set(['S', 'Z']),
  new Set(['A', 'E']),
];

// ============================================
// NAME WORD LISTS
// ============================================

/**
 * Honorifics stripped during multi-part composite scoring.
 * Matched case-insensitively with a trailing period ignored.
 */
export const HONORIFIC_TITLES: ReadonlySet<string> = new Set([
  'DR',
  'MR',
  'MRS',
  'MS',
  'MISS',
  'PROF',
  'REV',
  'HON',
  'SIR',
  'DAME',
]);

/**
 * Word pairs known to be romanizations of the same name.
 */
export const KNOWN_TRANSLITERATIONS: ReadonlyArray<readonly [string, string]> = [['sayra', 'saira']];

/**
 * Hispanic name markers.
 */
export const HISPANIC_PREFIXES = ['MI', 'MA', 'JO', 'JU', 'CA', 'LU', 'RO', 'RA'] as const;
export const HISPANIC_INFIXES = ['GL', 'GU', 'RR', 'LL', 'NZ', 'CH'] as const;
export const HISPANIC_SUFFIXES = ['EZ', 'ES', 'OS', 'AS', 'IO', 'IA', 'EL'] as const;

/**
 * Arabic name markers.
 */
export const ARABIC_INFIXES = ['al-', 'el-'] as const;
export const ARABIC_PREFIXES = ['bin ', 'ibn '] as const;
