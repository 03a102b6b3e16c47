import { Result, ok, err } from '../../lib/result-types.js';
import { requestJson, type FetchFn } from '../../lib/http-client.js';
import { fitDimensions, isUsableVector } from '../../lib/embedding-utils.js';
import { UpstreamError, UpstreamHttpError, UpstreamResponseError } from '../../lib/errors/UpstreamErrors.js';
import type { EmbeddingSettings } from '../../lib/env-config.js';
import type { EmbeddingVector } from '../../models/embedding-vector.js';
import { EmbedContentResponseSchema } from '../../models/api-types.js';
import { Logger, logger as defaultLogger } from '../../cli/utils/logger.js';

/**
 * Turns a query into a vector the retrieval index can search with
 */
export interface Embedder {
  /**
   * @returns Vector of exactly the index dimensionality, or null on any failure
   */
  embed(query: string, signal?: AbortSignal): Promise<EmbeddingVector | null>;
}

export interface GeminiEmbedderOptions {
  apiKey: string;
  apiBaseUrl: string;
  settings: EmbeddingSettings;
  fetchFn?: FetchFn;
  logger?: Logger;
}

/**
 * Embedder backed by the Gemini `embedContent` REST method
 *
 * Requests the index dimensionality with a query-side task hint; the hint has
 * to match the one the corpus was indexed with or relevance silently drops.
 * Nothing is cached: every call is an independent request.
 */
export class GeminiEmbedder implements Embedder {
  private readonly logger: Logger;

  constructor(private readonly options: GeminiEmbedderOptions) {
    this.logger = options.logger ?? defaultLogger;
  }

  async embed(query: string, signal?: AbortSignal): Promise<EmbeddingVector | null> {
    const result = await this.tryEmbed(query, signal);

    return result.match(
      (vector) => vector,
      (error) => {
        this.logger.warn('Embedding failed; continuing without retrieval context', {
          code: error.code,
          status: error instanceof UpstreamHttpError ? error.status : undefined,
          error: error.message
        });
        return null;
      }
    );
  }

  /**
   * Same request as `embed`, reporting the failure instead of swallowing it
   */
  async tryEmbed(query: string, signal?: AbortSignal): Promise<Result<EmbeddingVector, UpstreamError>> {
    const { apiKey, apiBaseUrl, settings } = this.options;
    const url = `${apiBaseUrl}/${settings.apiVersion}/models/${encodeURIComponent(settings.model)}:embedContent`;

    const response = await requestJson(
      url,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-goog-api-key': apiKey
        },
        body: JSON.stringify({
          model: `models/${settings.model}`,
          content: { parts: [{ text: query }] },
          taskType: settings.taskType,
          outputDimensionality: settings.dimensions
        })
      },
      {
        service: 'embedding',
        timeoutMs: settings.timeoutMs,
        fetchFn: this.options.fetchFn,
        signal
      }
    );

    return response.andThen((body) => this.toVector(body));
  }

  private toVector(body: unknown): Result<EmbeddingVector, UpstreamError> {
    const parsed = EmbedContentResponseSchema.safeParse(body);
    if (!parsed.success) {
      return err(
        new UpstreamResponseError(
          `Embedding response missing embedding.values: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`,
          'embedding'
        )
      );
    }

    const values = parsed.data.embedding.values;
    if (!isUsableVector(values)) {
      return err(new UpstreamResponseError('Embedding response contained an empty or non-finite vector', 'embedding'));
    }

    const fitted = fitDimensions(values, this.options.settings.dimensions);
    if (fitted.adjustment === 'truncated') {
      this.logger.warn('Embedding longer than index dimensionality; truncated', {
        returned: fitted.originalDimensions,
        dimensions: this.options.settings.dimensions
      });
    } else if (fitted.adjustment === 'padded') {
      this.logger.debug('Embedding zero-padded to index dimensionality', {
        returned: fitted.originalDimensions,
        dimensions: this.options.settings.dimensions
      });
    }

    return ok(fitted.vector);
  }
}
