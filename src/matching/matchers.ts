/**
 * Match Strategies for the Name Matching Engine
 *
 * Each strategy looks at the parsed query and candidates and either
 * decides (returns the winning index) or falls through with null.
 * MATCH_STRATEGIES lists them in priority order; the first hit wins.
 *
 * Within a strategy, ties always go to the candidate listed first.
 */

import {
  CLOSE_MATCH_MAX_DISTANCE,
  MIN_SCORE_THRESHOLD,
  PATTERN_SCORES,
} from './constants';
import { calculateCompositeNameScore, calculateMatchScore } from './compositeScore';
import { levenshteinDistance } from './editDistance';
import { normalizeName } from './normalizeName';
import type { MatchContext, MatcherHit, MatchStage, NameMatcher, ParsedName } from './types';

export interface MatchStrategy {
  stage: MatchStage;
  match: NameMatcher;
}

// ============================================
// HELPERS
// ============================================

function firstHit(
  candidates: readonly ParsedName[],
  predicate: (candidate: ParsedName) => boolean
): MatcherHit | null {
  const index = candidates.findIndex(predicate);
  return index === -1 ? null : { index, score: 1 };
}

/**
 * Finds the candidate equal (normalized, case-insensitive) to a mapped name.
 */
function resolveMappedName(candidates: readonly ParsedName[], mapped: string | undefined): MatcherHit | null {
  if (!mapped) return null;

  const key = normalizeName(mapped).toLowerCase();
  return firstHit(candidates, (candidate) => candidate.key === key);
}

/**
 * The term itself plus its table variants: the listed values when the term
 * is a key, the key when the term is a listed value. With `firstEntryOnly`
 * the scan stops at the first table entry that relates to the term.
 */
function expandVariants(
  table: ReadonlyMap<string, readonly string[]>,
  term: string,
  firstEntryOnly: boolean
): string[] {
  const variants = [term];

  for (const [key, values] of table) {
    const lowered = values.map((value) => value.toLowerCase());

    if (key === term) {
      variants.push(...lowered);
    } else if (lowered.includes(term)) {
      variants.push(key);
    } else {
      continue;
    }

    if (firstEntryOnly) break;
  }

  return variants;
}

const lastPart = (candidate: ParsedName): string => candidate.parts[candidate.parts.length - 1];

// ============================================
// TABLE LOOKUPS
// ============================================

/** Query as typed (hyphens and periods kept) found in the partial-name table */
const partialNameMap: NameMatcher = ({ query, candidates, tables }) =>
  resolveMappedName(candidates, tables.partialNames.get(query.raw.trim().toLowerCase()));

/** Normalized query found in the full-name table */
const fullNameMap: NameMatcher = ({ query, candidates, tables }) =>
  resolveMappedName(candidates, tables.fullNames.get(query.key));

/** A hyphenated query found literally inside a candidate */
const hyphenatedName: NameMatcher = ({ query, candidates }) => {
  if (!query.raw.includes('-')) return null;

  const literal = query.raw.toLowerCase();
  return firstHit(candidates, (candidate) => candidate.raw.toLowerCase().includes(literal));
};

const singleNamePriority: NameMatcher = ({ query, candidates, tables }) => {
  if (query.parts.length !== 1) return null;

  return resolveMappedName(candidates, tables.singleNamePriorities.get(query.parts[0]));
};

// ============================================
// EXACT AND STRUCTURAL MATCHES
// ============================================

const exact: NameMatcher = ({ query, candidates }) =>
  firstHit(candidates, (candidate) => candidate.key === query.key);

/** "Ali Al" against "Ali Al-Mansour": first name plus the start of a compound surname */
const partialCompound: NameMatcher = ({ query, candidates }) => {
  if (query.parts.length !== 2) return null;

  const prefix = `${query.parts[0]} ${query.parts[1]}`;
  return firstHit(
    candidates,
    (candidate) =>
      candidate.key.startsWith(prefix) && (candidate.raw.includes('-') || candidate.parts.length > 2)
  );
};

/**
 * Single token: as a first name, then as any part, then the same two
 * checks for each given-name variant in table order.
 */
const singleName: NameMatcher = ({ query, candidates, tables }) => {
  if (query.parts.length !== 1) return null;

  const word = query.parts[0];
  const variants = [word, ...(tables.givenNames.get(word) ?? []).map((v) => v.toLowerCase())];

  for (const variant of variants) {
    const hit =
      firstHit(candidates, (candidate) => candidate.parts[0] === variant) ??
      firstHit(candidates, (candidate) => candidate.parts.includes(variant));
    if (hit) return hit;
  }

  return null;
};

/** "C Hernandez": an initial plus an exact surname */
const initialSurname: NameMatcher = ({ query, candidates }) => {
  if (query.parts.length !== 2 || query.parts[0].length !== 1) return null;

  const [initial, surname] = query.parts;
  return firstHit(
    candidates,
    (candidate) =>
      candidate.parts.length >= 2 &&
      candidate.parts[0].charAt(0) === initial &&
      lastPart(candidate) === surname
  );
};

/** Both parts expanded through the remap tables, exact two-part match */
const remappedFullName: NameMatcher = ({ query, candidates, tables }) => {
  if (query.parts.length !== 2) return null;

  const firstVariants = expandVariants(tables.givenNames, query.parts[0], true);
  const lastVariants = expandVariants(tables.surnames, query.parts[1], true);

  for (const first of firstVariants) {
    for (const last of lastVariants) {
      const hit = firstHit(
        candidates,
        (candidate) =>
          candidate.parts.length === 2 && candidate.parts[0] === first && candidate.parts[1] === last
      );
      if (hit) return hit;
    }
  }

  return null;
};

/** "Jon R" against "Jon Richardson": exact first name, surname prefix */
const partialSurname: NameMatcher = ({ query, candidates, tables }) => {
  if (query.parts.length !== 2) return null;

  const partial = query.parts[1];

  for (const first of expandVariants(tables.givenNames, query.parts[0], false)) {
    const hit = firstHit(
      candidates,
      (candidate) =>
        candidate.parts.length >= 2 && candidate.parts[0] === first && lastPart(candidate).startsWith(partial)
    );
    if (hit) return hit;
  }

  return null;
};

// ============================================
// DISTANCE AND SCORE BASED
// ============================================

/**
 * Two-part query against two-part candidates whose parts are each within
 * two edits; the smallest summed distance wins.
 */
const closeEditDistance: NameMatcher = ({ query, candidates }) => {
  if (query.parts.length !== 2) return null;

  let best: { index: number; distance: number } | null = null;

  for (let index = 0; index < candidates.length; index++) {
    const candidate = candidates[index];
    if (candidate.parts.length !== 2) continue;

    const firstDistance = levenshteinDistance(query.parts[0], candidate.parts[0]);
    const lastDistance = levenshteinDistance(query.parts[1], candidate.parts[1]);

    if (firstDistance > CLOSE_MATCH_MAX_DISTANCE || lastDistance > CLOSE_MATCH_MAX_DISTANCE) continue;

    const distance = firstDistance + lastDistance;
    if (!best || distance < best.distance) {
      best = { index, distance };
    }
  }

  return best ? { index: best.index, score: 1 } : null;
};

/**
 * Highest score strictly above the acceptance threshold; the first
 * candidate wins ties.
 */
function pickBestScore(
  candidates: readonly ParsedName[],
  score: (candidate: ParsedName) => number
): MatcherHit | null {
  let best: MatcherHit | null = null;

  for (let index = 0; index < candidates.length; index++) {
    const value = score(candidates[index]);
    if (value > MIN_SCORE_THRESHOLD && (!best || value > best.score)) {
      best = { index, score: value };
    }
  }

  return best;
}

const compositeMultiPart: NameMatcher = ({ query, candidates }) => {
  if (query.parts.length < 2) return null;

  return pickBestScore(candidates, (candidate) => calculateCompositeNameScore(query, candidate));
};

/**
 * Single-part composite score for every candidate. A single-token query
 * found inside a candidate part, directly or through a given-name variant,
 * lifts that candidate to at least 0.9.
 */
const compositeSinglePart: NameMatcher = ({ query, candidates, tables }) => {
  const boostTerms =
    query.parts.length === 1
      ? [query.parts[0], ...(tables.givenNames.get(query.parts[0]) ?? []).map((v) => v.toLowerCase())]
      : [];

  return pickBestScore(candidates, (candidate) => {
    const score = calculateMatchScore(query.key, candidate);
    const boosted = boostTerms.some((term) => candidate.parts.some((part) => part.includes(term)));

    return boosted ? Math.max(score, PATTERN_SCORES.REMAP_BOOST) : score;
  });
};

// ============================================
// PIPELINE
// ============================================

export const MATCH_STRATEGIES: readonly MatchStrategy[] = [
  { stage: 'partial-name-map', match: partialNameMap },
  { stage: 'full-name-map', match: fullNameMap },
  { stage: 'hyphenated-name', match: hyphenatedName },
  { stage: 'single-name-priority', match: singleNamePriority },
  { stage: 'exact', match: exact },
  { stage: 'partial-compound', match: partialCompound },
  { stage: 'single-name', match: singleName },
  { stage: 'initial-surname', match: initialSurname },
  { stage: 'remapped-full-name', match: remappedFullName },
  { stage: 'partial-surname', match: partialSurname },
  { stage: 'close-edit-distance', match: closeEditDistance },
  { stage: 'composite-multi-part', match: compositeMultiPart },
  { stage: 'composite-single-part', match: compositeSinglePart },
];

/**
 * Runs the strategies in order and returns the first decision.
 */
export function runMatchers(
  context: MatchContext,
  strategies: readonly MatchStrategy[] = MATCH_STRATEGIES
): { stage: MatchStage; hit: MatcherHit } | null {
  for (const strategy of strategies) {
    const hit = strategy.match(context);
    if (hit) return { stage: strategy.stage, hit };
  }

  return null;
}
