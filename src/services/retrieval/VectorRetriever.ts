import { tryAsync } from '../../lib/result-types.js';
import { errorMessage } from '../../lib/errors/UpstreamErrors.js';
import type { EmbeddingVector } from '../../models/embedding-vector.js';
import type { RetrievedPassage } from '../../models/passage.js';
import { Logger, logger as defaultLogger } from '../../cli/utils/logger.js';
import { DEFAULT_TEXT_FIELDS, toPassage } from './passage-extractor.js';
import type { VectorStore } from './VectorStore.js';

export interface VectorRetrieverOptions {
  /** Default result count */
  topK: number;

  /** Payload fields holding passage text, in priority order */
  textFields?: readonly string[];

  logger?: Logger;
}

/**
 * Retrieves the top-K passages nearest a query embedding
 *
 * Retrieval never fails the query: a missing vector, an unconfigured store
 * and every store error all produce an empty passage list.
 */
export class VectorRetriever {
  private readonly logger: Logger;
  private readonly textFields: readonly string[];

  constructor(
    private readonly store: VectorStore | null,
    private readonly options: VectorRetrieverOptions
  ) {
    this.logger = options.logger ?? defaultLogger;
    this.textFields = options.textFields ?? DEFAULT_TEXT_FIELDS;
  }

  /**
   * @returns At most `topK` passages in store rank order; hits without usable
   * text are skipped, so the list may be shorter; an aborted signal yields []
   */
  async retrieve(
    vector: EmbeddingVector | null,
    topK: number = this.options.topK,
    signal?: AbortSignal
  ): Promise<RetrievedPassage[]> {
    if (vector === null) {
      this.logger.debug('No query vector; skipping retrieval');
      return [];
    }

    const store = this.store;
    if (!store) {
      this.logger.debug('Vector store not configured; skipping retrieval');
      return [];
    }

    const result = await tryAsync(() => store.search(vector, topK, signal), (error) => error);

    if (result.isErr()) {
      if (signal?.aborted) {
        this.logger.info('Retrieval cancelled by caller', { top_k: topK });
        return [];
      }

      this.logger.warn('Vector store query failed; continuing with empty context', {
        error: errorMessage(result.error),
        top_k: topK
      });
      return [];
    }

    const passages: RetrievedPassage[] = [];
    let skipped = 0;

    for (const hit of result.value.slice(0, topK)) {
      const passage = toPassage(hit, this.textFields);
      if (passage) {
        passages.push(passage);
      } else {
        skipped++;
      }
    }

    this.logger.debug('Retrieved passages', {
      hits: result.value.length,
      passages: passages.length,
      skipped
    });

    return passages;
  }
}
