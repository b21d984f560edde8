/**
 * Name Matching API Routes
 *
 * Endpoints:
 * - POST /search - Find the candidate a query refers to
 * - GET /tables - Entry counts of the active lookup tables
 * - PUT /tables - Replace the active lookup tables
 * - DELETE /tables - Restore the startup lookup tables
 */

import { Router } from 'express';
import { z } from 'zod';
import { env } from '../config';
import { nameSearchController } from '../controllers';
import { nameTablesSchema } from '../matching';
import { validateRequest } from '../middlewares';

const router = Router();

// ============================================
// Validation Schemas
// ============================================

export const searchRequestSchema = z.object({
  candidates: z
    .array(z.string(), { required_error: 'candidates is required' })
    .max(env.MAX_CANDIDATES, `At most ${env.MAX_CANDIDATES} candidates are allowed`),
  // An empty query is valid and never matches
  query: z.string({ required_error: 'query is required' }),
});

// ============================================
// Routes
// ============================================

/**
 * @route   POST /names/search
 * @desc    Find the candidate a query refers to
 * @access  Public
 *
 * Response:
 * - 200 OK: { match, index, stage, score, explanation } (match is null when nothing matched)
 * - 400 Bad Request: Invalid body
 */
router.post('/search', validateRequest({ body: searchRequestSchema }), nameSearchController.search);

/**
 * @route   GET /names/tables
 * @desc    Entry counts of the active lookup tables
 * @access  Public
 */
router.get('/tables', nameSearchController.getTables);

/**
 * @route   PUT /names/tables
 * @desc    Replace the active lookup tables
 * @access  Public
 *
 * Body: { givenNames?, surnames?, fullNames?, partialNames?, singleNamePriorities? }
 */
router.put('/tables', validateRequest({ body: nameTablesSchema }), nameSearchController.replaceTables);

/**
 * @route   DELETE /names/tables
 * @desc    Restore the startup lookup tables
 * @access  Public
 */
router.delete('/tables', nameSearchController.resetTables);

export default router;
