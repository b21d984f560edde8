/**
 * Health API Routes
 *
 * Endpoints:
 * - GET / - Uptime, environment and version
 * - GET /ready - Whether the configured name tables are serving
 * - GET /live - Process liveness (not request-logged)
 */

import { Router } from 'express';
import { healthController } from '../controllers';

const router = Router();

/**
 * @route   GET /health
 * @desc    Basic health check
 * @access  Public
 */
router.get('/', healthController.getHealth);

/**
 * @route   GET /health/ready
 * @desc    Readiness check
 * @access  Public
 *
 * Response:
 * - 200 OK: { ready: true, checks }
 * - 503 Service Unavailable: { ready: false, checks, reason } when the
 *   tables file failed to load and the shipped defaults are serving
 */
router.get('/ready', healthController.getReadiness);

/**
 * @route   GET /health/live
 * @desc    Liveness check
 * @access  Public
 */
router.get('/live', healthController.getLiveness);

export default router;
