/**
 * Health checking service for the tutor backend
 * Verifies credentials, vector store connectivity, and model discovery
 */

import { maskApiKey, type TutorConfig } from '../lib/env-config.js';
import { errorMessage } from '../lib/errors/UpstreamErrors.js';
import { candidateLabel } from '../models/model-candidate.js';
import type { ApiHealthPayload, HealthCheck, HealthReport, HealthStatus } from '../models/health-check.js';
import type { VectorStore } from './retrieval/VectorStore.js';
import type { ModelDiscovery } from './generation/ModelDiscovery.js';

export interface HealthCheckerOptions {
  config: Readonly<TutorConfig>;
  vectorStore: VectorStore | null;
  discovery: ModelDiscovery | null;
}

type CheckBody = Omit<HealthCheck, 'checkDurationMs'>;

/**
 * Performs connectivity checks against every remote collaborator
 */
export class HealthChecker {
  constructor(private readonly options: HealthCheckerOptions) {}

  /**
   * Run all health checks and generate a report
   */
  async checkHealth(): Promise<HealthReport> {
    // Run all checks in parallel
    const checks = await Promise.all([
      this.timed(() => this.checkCredentials()),
      this.timed(() => this.checkVectorStore()),
      this.timed(() => this.checkModelDiscovery())
    ]);

    const unhealthyCount = checks.filter((c) => c.status === 'unhealthy').length;
    const warningCount = checks.filter((c) => c.status === 'warning').length;

    let overall: HealthStatus;
    let summary: string;

    if (unhealthyCount > 0) {
      overall = 'unhealthy';
      summary = `${unhealthyCount} critical issue(s) detected`;
    } else if (warningCount > 0) {
      overall = 'warning';
      summary = `${warningCount} warning(s) detected`;
    } else {
      overall = 'healthy';
      summary = 'All systems operational';
    }

    return { overall, timestamp: Date.now(), checks, summary };
  }

  /**
   * Static status served by the HTTP health route (no network calls)
   */
  apiStatus(): ApiHealthPayload {
    const { config } = this.options;
    return {
      status: 'ok',
      backend: 'express',
      ai_status: config.apiKey ? 'Ready' : 'Missing API Key',
      vector_store: this.options.vectorStore ? 'Configured' : 'Disabled',
      models: config.generation.mode
    };
  }

  private async timed(check: () => Promise<CheckBody>): Promise<HealthCheck> {
    const start = Date.now();
    const body = await check();
    return { ...body, checkDurationMs: Date.now() - start };
  }

  private async checkCredentials(): Promise<CheckBody> {
    const { apiKey } = this.options.config;
    if (!apiKey) {
      return {
        name: 'Credentials',
        status: 'unhealthy',
        message: 'AI_API_KEY is not set; every question will be answered with an error message'
      };
    }
    return {
      name: 'Credentials',
      status: 'healthy',
      message: 'API key configured',
      details: { api_key: maskApiKey(apiKey) }
    };
  }

  private async checkVectorStore(): Promise<CheckBody> {
    const { vectorStore } = this.options;
    const { collection } = this.options.config.vectorStore;

    if (!vectorStore) {
      return {
        name: 'Vector store',
        status: 'warning',
        message: 'QDRANT_URL is not set; answers are generated without textbook context'
      };
    }

    try {
      const info = await vectorStore.describe();
      return {
        name: 'Vector store',
        status: 'healthy',
        message: `Collection "${info.collection}" reachable`,
        details: { points: info.points, status: info.status }
      };
    } catch (error) {
      return {
        name: 'Vector store',
        status: 'unhealthy',
        message: `Collection "${collection}" unreachable: ${errorMessage(error)}`
      };
    }
  }

  private async checkModelDiscovery(): Promise<CheckBody> {
    const { generation, apiKey } = this.options.config;
    const fallback = generation.staticCandidates.map(candidateLabel);

    if (generation.mode === 'static') {
      return {
        name: 'Models',
        status: fallback.length > 0 ? 'healthy' : 'unhealthy',
        message: `Static mode with ${fallback.length} candidate(s)`,
        details: { candidates: fallback }
      };
    }

    const { discovery } = this.options;
    if (!apiKey || !discovery) {
      return {
        name: 'Models',
        status: 'warning',
        message: 'Discovery skipped without an API key'
      };
    }

    const discovered = await discovery.discover();
    // Degraded but answering when the static list remains
    const degraded: HealthStatus = fallback.length > 0 ? 'warning' : 'unhealthy';

    if (discovered.isErr()) {
      return {
        name: 'Models',
        status: degraded,
        message: `Discovery failed (${discovered.error.message}); ${fallback.length} static candidate(s) remain`
      };
    }
    if (discovered.value.length === 0) {
      return {
        name: 'Models',
        status: degraded,
        message: `Discovery found no answer models; ${fallback.length} static candidate(s) remain`
      };
    }

    return {
      name: 'Models',
      status: 'healthy',
      message: `${discovered.value.length} model(s) discovered`,
      details: { top: discovered.value.slice(0, 3).map(candidateLabel) }
    };
  }
}
