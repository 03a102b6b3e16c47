/**
 * Health check result for system diagnostics
 */

/**
 * Health status levels, best first
 */
export type HealthStatus = 'healthy' | 'warning' | 'unhealthy';

/**
 * Individual component status
 */
export interface HealthCheck {
  name: string;
  status: HealthStatus;
  message: string;
  details?: Record<string, unknown>;
  checkDurationMs: number;
}

export interface HealthReport {
  overall: HealthStatus;
  timestamp: number;
  checks: HealthCheck[];
  summary: string;
}

/**
 * Body of `GET /api/health`
 */
export interface ApiHealthPayload {
  status: 'ok';
  backend: string;
  ai_status: 'Ready' | 'Missing API Key';
  vector_store: 'Configured' | 'Disabled';
  models: string;
}
