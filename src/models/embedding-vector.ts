/**
 * Embedding Vector Model
 *
 * A query embedding sized for the vector store's index. Created per query and
 * discarded after retrieval.
 */

export type EmbeddingVector = number[];

/**
 * What dimension repair did to a vector returned by the embedding service
 */
export type DimensionAdjustment = 'none' | 'padded' | 'truncated';

export interface FittedVector {
  vector: EmbeddingVector;
  adjustment: DimensionAdjustment;
  originalDimensions: number;
}

/**
 * Embedding task hints understood by the embedding service. Queries must use
 * the counterpart of the hint the corpus was indexed with.
 */
export type EmbeddingTaskType =
  | 'RETRIEVAL_QUERY'
  | 'RETRIEVAL_DOCUMENT'
  | 'SEMANTIC_SIMILARITY'
  | 'CLASSIFICATION'
  | 'CLUSTERING'
  | 'QUESTION_ANSWERING';

export const EMBEDDING_TASK_TYPES: readonly EmbeddingTaskType[] = [
  'RETRIEVAL_QUERY',
  'RETRIEVAL_DOCUMENT',
  'SEMANTIC_SIMILARITY',
  'CLASSIFICATION',
  'CLUSTERING',
  'QUESTION_ANSWERING',
];
