/**
 * Lookup Tables for the Name Matching Engine
 *
 * Raw tables (JSON file format) are validated with zod and turned into an
 * immutable NameTables value. Invalid input surfaces as the ZodError itself;
 * mapping it onto an HTTP status is left to the caller. Keys are folded to lowercase so lookups are
 * case-insensitive; the first spelling of a key wins. Map insertion order
 * follows the input, which the reverse lookups of the remap stage rely on.
 */

import fs from 'fs';
import { z } from 'zod';
import defaultTablesData from '../data/name-tables.json';
import { normalizeName } from './normalizeName';
import type { NameTables, NameTablesInput, NameTableStats } from './types';

// ============================================
// SCHEMA
// ============================================

const variantTableSchema = z.record(z.string().min(1), z.array(z.string().min(1)));
const canonicalTableSchema = z.record(z.string().min(1), z.string().min(1));

export const nameTablesSchema = z
  .object({
    givenNames: variantTableSchema.default({}),
    surnames: variantTableSchema.default({}),
    fullNames: canonicalTableSchema.default({}),
    partialNames: canonicalTableSchema.default({}),
    singleNamePriorities: canonicalTableSchema.default({}),
  })
  .strict();

/**
 * A tables file that could not be read or is not JSON
 */
export class NameTablesReadError extends Error {
  public readonly filePath: string;

  constructor(filePath: string, reason: string) {
    super(`Unable to read name tables from ${filePath}: ${reason}`);
    this.name = 'NameTablesReadError';
    this.filePath = filePath;

    Object.setPrototypeOf(this, NameTablesReadError.prototype);
  }
}

// ============================================
// BUILDING
// ============================================

function foldKeys<T>(
  record: Record<string, T>,
  foldKey: (key: string) => string
): ReadonlyMap<string, T> {
  const map = new Map<string, T>();

  for (const [key, value] of Object.entries(record)) {
    const folded = foldKey(key);
    if (folded && !map.has(folded)) {
      map.set(folded, value);
    }
  }

  return map;
}

const lowerKey = (key: string): string => key.trim().toLowerCase();

// Full names are looked up with the normalized query
const normalizedKey = (key: string): string => normalizeName(key).toLowerCase();

function buildNameTables(input: z.output<typeof nameTablesSchema>): NameTables {
  return Object.freeze({
    givenNames: foldKeys(input.givenNames, lowerKey),
    surnames: foldKeys(input.surnames, lowerKey),
    fullNames: foldKeys(input.fullNames, normalizedKey),
    partialNames: foldKeys(input.partialNames, lowerKey),
    singleNamePriorities: foldKeys(input.singleNamePriorities, lowerKey),
  });
}

/**
 * Validates raw table input and builds an immutable tables value.
 * Missing sections default to empty.
 *
 * @throws ZodError when the input does not follow the file format
 *
 * @example
 * const tables = parseNameTables({ givenNames: { Miguel: ['mihel'] } });
 * tables.givenNames.get('miguel') // ['mihel']
 */
export function parseNameTables(input: unknown): NameTables {
  return buildNameTables(nameTablesSchema.parse(input));
}

/**
 * Reads and validates a tables file.
 *
 * @throws NameTablesReadError when the file cannot be read or is not JSON
 * @throws ZodError when its content does not follow the file format
 */
export function loadNameTables(filePath: string): NameTables {
  let raw: unknown;

  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new NameTablesReadError(filePath, reason);
  }

  return parseNameTables(raw);
}

// ============================================
// SNAPSHOTS
// ============================================

/** Tables with no entries; only the fuzzy stages can decide */
export const EMPTY_NAME_TABLES: NameTables = parseNameTables({});

const shippedTables: NameTablesInput = defaultTablesData;

/** Tables shipped with the engine */
export const DEFAULT_NAME_TABLES: NameTables = parseNameTables(shippedTables);

/**
 * Entry counts per section.
 */
export function getTableStats(tables: NameTables): NameTableStats {
  const stats = {
    givenNames: tables.givenNames.size,
    surnames: tables.surnames.size,
    fullNames: tables.fullNames.size,
    partialNames: tables.partialNames.size,
    singleNamePriorities: tables.singleNamePriorities.size,
  };

  return {
    ...stats,
    total:
      stats.givenNames +
      stats.surnames +
      stats.fullNames +
      stats.partialNames +
      stats.singleNamePriorities,
  };
}

export default parseNameTables;
