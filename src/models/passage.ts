/**
 * Retrieved Passage Model
 *
 * A textbook passage returned by the vector store, reduced to its text. The
 * remaining payload is kept as metadata but nothing downstream reads it.
 */

export interface RetrievedPassage {
  /** Point id in the vector store */
  id: string | number;

  /** Passage text extracted from the hit payload */
  text: string;

  /** Similarity score reported by the store */
  score: number;

  /** Remaining payload fields */
  metadata: Record<string, unknown>;
}

/**
 * A raw nearest-neighbour hit as returned by a vector store
 */
export interface VectorHit {
  id: string | number;
  score: number;
  payload?: Record<string, unknown> | null;
}
