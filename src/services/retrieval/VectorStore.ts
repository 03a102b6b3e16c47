import { QdrantClient } from '@qdrant/js-client-rest';
import type { VectorStoreSettings } from '../../lib/env-config.js';
import type { EmbeddingVector } from '../../models/embedding-vector.js';
import type { VectorHit } from '../../models/passage.js';

/**
 * Collection summary used by health checks
 */
export interface CollectionStatus {
  collection: string;
  points?: number;
  status?: string;
}

/**
 * Nearest-neighbour search over the indexed corpus
 */
export interface VectorStore {
  /**
   * @returns Up to `limit` hits, best first. Throws on store errors and
   * rejects with the signal's reason once it aborts.
   */
  search(vector: EmbeddingVector, limit: number, signal?: AbortSignal): Promise<VectorHit[]>;

  /**
   * Fetch collection info; throws when the store or collection is unreachable
   */
  describe(): Promise<CollectionStatus>;
}

/**
 * Qdrant-backed vector store
 */
export class QdrantVectorStore implements VectorStore {
  private readonly client: QdrantClient;

  constructor(
    private readonly settings: VectorStoreSettings & { url: string }
  ) {
    this.client = new QdrantClient({
      url: settings.url,
      apiKey: settings.apiKey,
      timeout: settings.timeoutMs,
      // Version probe on construction would hit the store before any query
      checkCompatibility: false
    });
  }

  async search(vector: EmbeddingVector, limit: number, signal?: AbortSignal): Promise<VectorHit[]> {
    const points = await abortable(
      () =>
        this.client.search(this.settings.collection, {
          vector,
          limit,
          with_payload: true
        }),
      signal
    );

    return points.map((point) => ({
      id: point.id,
      score: point.score,
      payload: point.payload ?? null
    }));
  }

  async describe(): Promise<CollectionStatus> {
    const info = await this.client.getCollection(this.settings.collection);
    return {
      collection: this.settings.collection,
      points: info.points_count ?? undefined,
      status: info.status
    };
  }
}

/**
 * Run `work` unless the signal has already aborted, and reject with the
 * signal's reason as soon as it aborts
 *
 * The Qdrant client takes no signal, so an abandoned request still runs to
 * completion in the background; only the caller stops waiting.
 */
export function abortable<T>(work: () => Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return work();

  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    work().then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Build the configured store, or null when no URL is set
 */
export function createVectorStore(settings: VectorStoreSettings): VectorStore | null {
  const { url } = settings;
  if (!url) return null;
  return new QdrantVectorStore({ ...settings, url });
}
