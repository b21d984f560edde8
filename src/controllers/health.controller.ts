import { Request, Response } from 'express';
import { healthService } from '../services';
import { sendSuccess, sendError, asyncHandler } from '../utils';

/**
 * Health check controller
 */
export class HealthController {
  /**
   * GET /health
   * Basic health check endpoint
   */
  getHealth = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    const health = healthService.getHealthStatus();
    sendSuccess(res, health, 'Service is healthy');
  });

  /**
   * GET /health/ready
   * Ready once the configured name tables are serving.
   * A 503 still reports which check failed.
   */
  getReadiness = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    const readiness = await healthService.checkReadiness();

    if (readiness.ready) {
      sendSuccess(res, readiness, 'Service is ready');
    } else {
      sendError(res, 'Service is not ready', 503, readiness.reason, readiness);
    }
  });

  /**
   * GET /health/live
   * Liveness check endpoint
   */
  getLiveness = (_req: Request, res: Response): void => {
    sendSuccess(res, { alive: true }, 'Service is alive');
  };
}

export const healthController = new HealthController();

export default healthController;
