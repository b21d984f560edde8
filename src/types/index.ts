import type { MatchStage } from '../matching/types';

// Environment configuration type
export interface EnvConfig {
  NODE_ENV: 'development' | 'production' | 'test';
  PORT: number;
  HOST: string;
  API_PREFIX: string;
  CORS_ORIGIN: string[];
  RATE_LIMIT_WINDOW_MS: number;
  RATE_LIMIT_MAX_REQUESTS: number;
  LOG_LEVEL: 'error' | 'warn' | 'info' | 'http' | 'debug';
  // Tables file (OPTIONAL - shipped defaults are used without it)
  NAME_TABLES_PATH?: string;
  MAX_CANDIDATES: number;
  JSON_BODY_LIMIT: string;
}

// API Response types
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  message?: string;
  error?: string;
  timestamp: string;
}

// Health check response
export interface HealthCheckResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  environment: string;
  version: string;
}

// Readiness check response
export interface ReadinessResponse {
  ready: boolean;
  checks: Record<string, boolean>;
  // Why the configured name tables did not load
  reason?: string;
}

// Name search request, as checked by the search route
export interface NameSearchRequest {
  candidates: string[];
  query: string;
}

// Name search response
export interface NameSearchResponse {
  match: string | null;
  index: number | null;
  stage: MatchStage | null;
  score: number;
  explanation: string;
}
