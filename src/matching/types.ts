/**
 * Type Definitions for the Name Matching Engine
 *
 * These types define the input/output contracts for the matching engine.
 * The engine is pure and deterministic - no I/O, no shared mutable state.
 */

// ============================================
// CONFIGURATION TYPES
// ============================================

/**
 * Read-only lookup tables consulted by the pipeline.
 * Keys are folded to lowercase; values keep their original spelling.
 * Map insertion order is significant for reverse lookups.
 */
export interface NameTables {
  /** Given-name variant -> equivalent variants */
  readonly givenNames: ReadonlyMap<string, readonly string[]>;
  /** Family-name variant -> equivalent variants */
  readonly surnames: ReadonlyMap<string, readonly string[]>;
  /** Variant full name -> canonical full name */
  readonly fullNames: ReadonlyMap<string, string>;
  /** Literal partial name or prefix -> canonical full name */
  readonly partialNames: ReadonlyMap<string, string>;
  /** Single name token -> preferred full name */
  readonly singleNamePriorities: ReadonlyMap<string, string>;
}

/**
 * Raw table input, in the JSON file format.
 */
export interface NameTablesInput {
  givenNames?: Record<string, string[]>;
  surnames?: Record<string, string[]>;
  fullNames?: Record<string, string>;
  partialNames?: Record<string, string>;
  singleNamePriorities?: Record<string, string>;
}

/**
 * Entry counts of a tables snapshot.
 */
export interface NameTableStats {
  givenNames: number;
  surnames: number;
  fullNames: number;
  partialNames: number;
  singleNamePriorities: number;
  total: number;
}

// ============================================
// PIPELINE TYPES
// ============================================

/**
 * A name (query or candidate) with its derived comparison forms.
 */
export interface ParsedName {
  /** Text exactly as supplied */
  raw: string;
  /** Separators folded to single spaces, trimmed */
  normalized: string;
  /** Lowercased normalized text, the case-insensitive comparison key */
  key: string;
  /** Lowercased space-delimited parts, in order */
  parts: string[];
}

/**
 * Identifies the pipeline stage that produced a match.
 */
export type MatchStage =
  | 'partial-name-map'
  | 'full-name-map'
  | 'hyphenated-name'
  | 'single-name-priority'
  | 'exact'
  | 'partial-compound'
  | 'single-name'
  | 'initial-surname'
  | 'remapped-full-name'
  | 'partial-surname'
  | 'close-edit-distance'
  | 'composite-multi-part'
  | 'composite-single-part';

/**
 * What a matcher returns when it decides.
 */
export interface MatcherHit {
  /** Position of the winning candidate in the input list */
  index: number;
  /** Confidence in [0, 1]; deterministic stages report 1 */
  score: number;
}

/**
 * Context handed to every matcher.
 */
export interface MatchContext {
  query: ParsedName;
  candidates: readonly ParsedName[];
  tables: NameTables;
}

/**
 * A single strategy of the pipeline. Returns null to fall through.
 */
export type NameMatcher = (context: MatchContext) => MatcherHit | null;

/**
 * Result of a successful search.
 */
export interface NameMatch {
  /** The matched candidate, verbatim */
  candidate: string;
  /** Position of the candidate in the input list */
  index: number;
  /** Stage that decided */
  stage: MatchStage;
  /** Confidence in [0, 1] */
  score: number;
}

// ============================================
// SCORING TYPES
// ============================================

/**
 * Primary and alternate codes of the Double-Metaphone-like encoder.
 */
export interface MetaphoneCodes {
  primary: string;
  alternate: string;
}

/**
 * Specialized scoring route chosen once per multi-part comparison.
 */
export type NameFamily = 'hispanic' | 'arabic' | 'generic';
