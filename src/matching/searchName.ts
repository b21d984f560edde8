/**
 * Name Search - Main Entry Point
 *
 * Finds the candidate a (possibly misspelled, partial or transliterated)
 * query refers to.
 *
 * Pipeline:
 * 1. Parse the query and every candidate once
 * 2. Run the match strategies in priority order
 * 3. Return the first decision, or null when none clears the bar
 *
 * The function is pure: the tables snapshot is read once per call and
 * never mutated, so concurrent searches cannot observe each other.
 */

import { DEFAULT_NAME_TABLES } from './nameTables';
import { MATCH_STRATEGIES, runMatchers } from './matchers';
import { parseName } from './normalizeName';
import type { MatchContext, MatchStage, NameMatch, NameTables } from './types';

const STAGE_DESCRIPTIONS: Readonly<Record<MatchStage, string>> = {
  'partial-name-map': 'Query found in the partial-name table',
  'full-name-map': 'Query found in the full-name table',
  'hyphenated-name': 'Hyphenated query found inside the candidate',
  'single-name-priority': 'Single name resolved through the priority table',
  exact: 'Exact match (case and separators ignored)',
  'partial-compound': 'First name plus the start of a compound surname',
  'single-name': 'Single name matched a name part, directly or through a variant',
  'initial-surname': 'Initial and surname matched',
  'remapped-full-name': 'First and last name matched through the variant tables',
  'partial-surname': 'First name matched and surname starts with the query',
  'close-edit-distance': 'Both name parts within two edits',
  'composite-multi-part': 'Best multi-part similarity score',
  'composite-single-part': 'Best single-part similarity score',
};

/**
 * Human-readable explanation of a pipeline stage.
 *
 * @example
 * describeStage('initial-surname') // "Initial and surname matched"
 */
export function describeStage(stage: MatchStage): string {
  return STAGE_DESCRIPTIONS[stage];
}

/**
 * Searches the candidates and reports how the match was made.
 *
 * @param candidates - Names to search, in priority order for ties
 * @param query - Name as typed by the user
 * @param tables - Lookup tables (the shipped defaults when omitted)
 * @returns The match with its index, stage and score, or null
 *
 * @example
 * searchWithDetails(["Jon Richardson", "John Hamilton"], "Jon R")
 * // { candidate: "Jon Richardson", index: 0, stage: "partial-name-map", score: 1 }
 */
export function searchWithDetails(
  candidates: readonly string[],
  query: string,
  tables: NameTables = DEFAULT_NAME_TABLES
): NameMatch | null {
  const parsedQuery = parseName(query);

  if (!parsedQuery.key || candidates.length === 0) {
    return null;
  }

  const context: MatchContext = {
    query: parsedQuery,
    candidates: candidates.map((candidate) => parseName(candidate)),
    tables,
  };

  const decision = runMatchers(context, MATCH_STRATEGIES);
  if (!decision) {
    return null;
  }

  return {
    candidate: candidates[decision.hit.index],
    index: decision.hit.index,
    stage: decision.stage,
    score: decision.hit.score,
  };
}

/**
 * Returns the candidate the query refers to, verbatim, or null.
 *
 * @example
 * search(["Dr. Ayesha Khan", "Dr. John Smith"], "Aysha") // "Dr. Ayesha Khan"
 * search(["Jane Doe"], "") // null
 */
export function search(
  candidates: readonly string[],
  query: string,
  tables: NameTables = DEFAULT_NAME_TABLES
): string | null {
  return searchWithDetails(candidates, query, tables)?.candidate ?? null;
}

export default search;
