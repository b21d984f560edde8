/**
 * Name Normalization for the Name Matching Engine
 *
 * Users type names with all kinds of separators. This module folds them
 * so that "Jin-ho Kim", "Jin_ho  Kim" and "jin.ho kim" compare equal.
 *
 * Example transformations:
 * - "Dr. Ayesha Khan" → "Dr Ayesha Khan"
 * - "Ali Al-Mansour" → "Ali Al Mansour"
 * - "  Smith,John " → "Smith John"
 */

import { HONORIFIC_TITLES } from './constants';
import type { ParsedName } from './types';

/**
 * Normalizes a name by:
 * 1. Replacing hyphens, underscores, periods and commas with spaces
 * 2. Collapsing runs of whitespace into single spaces
 * 3. Trimming leading/trailing whitespace
 *
 * Casing is kept; comparisons fold case separately. The function is
 * idempotent.
 *
 * @example
 * normalizeName("Dr. Ayesha Khan") // Returns: "Dr Ayesha Khan"
 * normalizeName("Saira-Raza") // Returns: "Saira Raza"
 */
export function normalizeName(input: string): string {
  if (!input || typeof input !== 'string') {
    return '';
  }

  return input.replace(/[-_.,]/g, ' ').replace(/\s+/g, ' ').trim();
}

/**
 * Splits a normalized name into lowercased parts.
 */
export function splitNameParts(normalized: string): string[] {
  return normalized
    .toLowerCase()
    .split(' ')
    .filter((part) => part.length > 0);
}

/**
 * Derives every comparison form of a name once.
 *
 * @example
 * parseName("Dr. Ayesha Khan")
 * // Returns: { raw: "Dr. Ayesha Khan", normalized: "Dr Ayesha Khan",
 * //            key: "dr ayesha khan", parts: ["dr", "ayesha", "khan"] }
 */
export function parseName(raw: string): ParsedName {
  const text = typeof raw === 'string' ? raw : '';
  const normalized = normalizeName(text);
  const key = normalized.toLowerCase();

  return {
    raw: text,
    normalized,
    key,
    parts: splitNameParts(normalized),
  };
}

/**
 * Whether a single token is an honorific ("Dr", "dr.", "PROF", ...).
 */
export function isHonorific(token: string): boolean {
  return HONORIFIC_TITLES.has(token.replace(/\.+$/, '').toUpperCase());
}

/**
 * Removes honorific titles from a list of name parts.
 *
 * @example
 * stripTitles(["Dr.", "Sarah", "Taylor"]) // Returns: ["Sarah", "Taylor"]
 */
export function stripTitles(parts: readonly string[]): string[] {
  return parts.filter((part) => !isHonorific(part));
}

export default normalizeName;
