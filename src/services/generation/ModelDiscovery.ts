/**
 * Model Discovery
 *
 * Lists the models the configured key can reach and turns the ones offering
 * `generateContent` into a ranked candidate list.
 */

import { GENERATION_DEFAULTS } from '../../constants/pipeline-constants.js';
import { requestJson, type FetchFn } from '../../lib/http-client.js';
import { Result, ok, err } from '../../lib/result-types.js';
import { UpstreamError, UpstreamResponseError } from '../../lib/errors/UpstreamErrors.js';
import { ListModelsResponseSchema, type ModelInfo } from '../../models/api-types.js';
import type { ModelCandidate } from '../../models/model-candidate.js';
import { Logger, logger as defaultLogger } from '../../cli/utils/logger.js';
import { rankCandidates } from './candidate-ranking.js';

const GENERATE_CONTENT_METHOD = 'generateContent';

export interface ModelDiscoveryOptions {
  apiKey: string;
  apiBaseUrl: string;
  /** Tier queried for the listing; discovered candidates use it as well */
  apiVersion: string;
  timeoutMs: number;
  pageSize?: number;
  maxPages?: number;
  fetchFn?: FetchFn;
  logger?: Logger;
}

/**
 * Whether a listed model can serve as a text answer candidate
 */
export function isAnswerModel(model: ModelInfo): boolean {
  if (!model.supportedGenerationMethods.includes(GENERATE_CONTENT_METHOD)) {
    return false;
  }
  const id = toModelId(model.name);
  if (!id.startsWith(GENERATION_DEFAULTS.DISCOVERY_MODEL_PREFIX)) {
    return false;
  }
  const tokens = id.toLowerCase().split(/[-_]/);
  return !tokens.some((token) =>
    GENERATION_DEFAULTS.DISCOVERY_EXCLUDED_TOKENS.some((excluded) => excluded === token)
  );
}

/**
 * "models/gemini-2.0-flash" -> "gemini-2.0-flash"
 */
export function toModelId(name: string): string {
  return name.replace(/^models\//, '');
}

export class ModelDiscovery {
  private readonly logger: Logger;

  constructor(private readonly options: ModelDiscoveryOptions) {
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Fetch every listing page and rank the answer-capable models
   *
   * @returns Ranked candidates (possibly empty) or the listing failure
   */
  async discover(signal?: AbortSignal): Promise<Result<ModelCandidate[], UpstreamError>> {
    const maxPages = this.options.maxPages ?? GENERATION_DEFAULTS.DISCOVERY_MAX_PAGES;
    const models: ModelInfo[] = [];
    let pageToken: string | undefined;
    let pages = 0;

    do {
      const page = await this.fetchPage(pageToken, signal);
      if (page.isErr()) {
        return err(page.error);
      }
      models.push(...page.value.models);
      pageToken = page.value.nextPageToken || undefined;
      pages++;
    } while (pageToken !== undefined && pages < maxPages);

    if (pageToken !== undefined) {
      this.logger.warn('Model listing truncated at page limit', { pages });
    }

    const seen = new Set<string>();
    const candidates: ModelCandidate[] = [];
    for (const model of models) {
      if (!isAnswerModel(model)) continue;
      const id = toModelId(model.name);
      if (seen.has(id)) continue;
      seen.add(id);
      candidates.push({ id, apiVersion: this.options.apiVersion });
    }

    const ranked = rankCandidates(candidates);
    this.logger.debug('Model discovery completed', {
      listed: models.length,
      candidates: ranked.length,
      pages
    });
    return ok(ranked);
  }

  private async fetchPage(
    pageToken: string | undefined,
    signal?: AbortSignal
  ): Promise<Result<{ models: ModelInfo[]; nextPageToken?: string }, UpstreamError>> {
    const { apiBaseUrl, apiVersion, apiKey, timeoutMs, fetchFn } = this.options;
    const params = new URLSearchParams({
      pageSize: String(this.options.pageSize ?? GENERATION_DEFAULTS.DISCOVERY_PAGE_SIZE)
    });
    if (pageToken) params.set('pageToken', pageToken);

    const response = await requestJson(
      `${apiBaseUrl}/${apiVersion}/models?${params.toString()}`,
      { method: 'GET', headers: { 'x-goog-api-key': apiKey } },
      { service: 'discovery', timeoutMs, fetchFn, signal }
    );
    if (response.isErr()) {
      return err(response.error);
    }

    const parsed = ListModelsResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      return err(
        new UpstreamResponseError(
          `Unexpected model listing shape: ${parsed.error.issues[0]?.message ?? 'invalid body'}`,
          'discovery'
        )
      );
    }
    return ok(parsed.data);
  }
}
