/**
 * Name Search Service
 *
 * Holds the active lookup tables and runs searches against them.
 *
 * CONSISTENCY:
 * - Every search reads the tables reference once, at call start
 * - Replacing the tables swaps the whole reference; a snapshot is never
 *   mutated, so a search in flight keeps the tables it started with
 */

import { ZodError } from 'zod';
import { env } from '../config';
import {
  DEFAULT_NAME_TABLES,
  describeStage,
  getTableStats,
  loadNameTables,
  parseNameTables,
  searchWithDetails,
} from '../matching';
import type { NameTables, NameTableStats } from '../matching';
import { NameSearchResponse } from '../types';
import { AppError, logger } from '../utils';

// ============================================
// Types
// ============================================

/**
 * Where the startup tables came from
 */
export type NameTablesSource = 'defaults' | 'file';

export interface NameSearchServiceOptions {
  /** Tables used at startup and restored by resetTables() */
  tables: NameTables;
  source: NameTablesSource;
  /** Set when a configured tables file could not be loaded */
  loadError?: string;
}

const NO_MATCH_EXPLANATION = 'No candidate cleared the acceptance threshold';

/**
 * Maps table validation failures onto a 400; anything else is passed on
 */
const toTablesError = (error: unknown): unknown =>
  error instanceof ZodError ? AppError.fromZodError('Invalid name tables', error) : error;

// ============================================
// Service
// ============================================

export class NameSearchService {
  private readonly startupTables: NameTables;
  private readonly source: NameTablesSource;
  private readonly loadError?: string;
  private tables: NameTables;

  constructor(options: NameSearchServiceOptions) {
    this.startupTables = options.tables;
    this.source = options.source;
    this.loadError = options.loadError;
    this.tables = options.tables;
  }

  /**
   * Finds the candidate the query refers to.
   * "No match" is a regular result with `match: null`.
   */
  search(candidates: readonly string[], query: string): NameSearchResponse {
    const tables = this.tables;
    const result = searchWithDetails(candidates, query, tables);

    if (!result) {
      logger.debug(`No match for "${query}" among ${candidates.length} candidates`);
      return {
        match: null,
        index: null,
        stage: null,
        score: 0,
        explanation: NO_MATCH_EXPLANATION,
      };
    }

    logger.debug(
      `Matched "${query}" to "${result.candidate}" (stage: ${result.stage}, score: ${result.score.toFixed(3)})`
    );

    return {
      match: result.candidate,
      index: result.index,
      stage: result.stage,
      score: result.score,
      explanation: describeStage(result.stage),
    };
  }

  getTables(): NameTables {
    return this.tables;
  }

  getTableStats(): NameTableStats {
    return getTableStats(this.tables);
  }

  /**
   * Validates raw tables (JSON file format) and makes them active.
   *
   * @throws AppError (400) when the input is invalid; the active tables stay
   */
  replaceTables(raw: unknown): NameTableStats {
    let tables: NameTables;
    try {
      tables = parseNameTables(raw);
    } catch (error) {
      throw toTablesError(error);
    }
    this.tables = tables;

    const stats = getTableStats(tables);
    logger.info(`Name tables replaced (${stats.total} entries)`);
    return stats;
  }

  /**
   * Restores the startup tables.
   */
  resetTables(): NameTableStats {
    this.tables = this.startupTables;

    const stats = getTableStats(this.tables);
    logger.info(`Name tables reset to ${this.source} (${stats.total} entries)`);
    return stats;
  }

  /**
   * False when a configured tables file failed to load and the shipped
   * defaults are serving instead.
   */
  isReady(): boolean {
    return this.loadError === undefined;
  }

  getLoadError(): string | undefined {
    return this.loadError;
  }

  getSource(): NameTablesSource {
    return this.source;
  }
}

/**
 * Builds the service from a tables file, or from the shipped defaults when
 * no path is given. A file that cannot be loaded is logged and replaced by
 * the defaults.
 */
export const createNameSearchService = (tablesPath?: string): NameSearchService => {
  if (!tablesPath) {
    return new NameSearchService({ tables: DEFAULT_NAME_TABLES, source: 'defaults' });
  }

  try {
    const tables = loadNameTables(tablesPath);
    logger.info(`Name tables loaded from ${tablesPath} (${getTableStats(tables).total} entries)`);
    return new NameSearchService({ tables, source: 'file' });
  } catch (error) {
    const mapped = toTablesError(error);
    const reason = mapped instanceof Error ? mapped.message : String(mapped);
    logger.error(`Falling back to default name tables: ${reason}`);
    return new NameSearchService({
      tables: DEFAULT_NAME_TABLES,
      source: 'defaults',
      loadError: reason,
    });
  }
};

// Singleton instance
export const nameSearchService = createNameSearchService(env.NAME_TABLES_PATH);

export default nameSearchService;
