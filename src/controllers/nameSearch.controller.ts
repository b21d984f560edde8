import { Request, Response } from 'express';
import { nameSearchService } from '../services';
import { NameSearchRequest } from '../types';
import { sendSuccess, asyncHandler } from '../utils';

/**
 * Name search controller
 * Request bodies are validated by the routes before they get here.
 */
export class NameSearchController {
  /**
   * POST /names/search
   * Find the candidate a query refers to
   */
  search = asyncHandler<NameSearchRequest>(async (req, res): Promise<void> => {
    const { candidates, query } = req.body;
    const result = nameSearchService.search(candidates, query);

    sendSuccess(res, result, result.match === null ? 'No match found' : 'Match found');
  });

  /**
   * GET /names/tables
   * Entry counts of the active lookup tables
   */
  getTables = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    sendSuccess(res, nameSearchService.getTableStats(), 'Name tables retrieved');
  });

  /**
   * PUT /names/tables
   * Replace the active lookup tables
   */
  replaceTables = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const stats = nameSearchService.replaceTables(req.body);
    sendSuccess(res, stats, 'Name tables replaced');
  });

  /**
   * DELETE /names/tables
   * Restore the startup lookup tables
   */
  resetTables = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    const stats = nameSearchService.resetTables();
    sendSuccess(res, stats, 'Name tables reset');
  });
}

export const nameSearchController = new NameSearchController();

export default nameSearchController;
