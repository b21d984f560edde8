import { HealthCheckResponse, ReadinessResponse } from '../types';
import { env } from '../config';
import { nameSearchService } from './nameSearch.service';

/**
 * Health check service
 */
export class HealthService {
  private readonly startTime: number;
  private readonly version: string;

  constructor() {
    this.startTime = Date.now();
    this.version = process.env.npm_package_version || '1.0.0';
  }

  /**
   * Get health status
   */
  getHealthStatus(): HealthCheckResponse {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      environment: env.NODE_ENV,
      version: this.version,
    };
  }

  /**
   * Check if the service is ready
   * The configured name tables must have loaded
   */
  async checkReadiness(): Promise<ReadinessResponse> {
    const checks: Record<string, boolean> = {
      server: true,
      nameTables: nameSearchService.isReady(),
    };

    const ready = Object.values(checks).every((check) => check);
    const reason = nameSearchService.getLoadError();

    return reason === undefined ? { ready, checks } : { ready, checks, reason };
  }
}

// Singleton instance
export const healthService = new HealthService();

export default healthService;
