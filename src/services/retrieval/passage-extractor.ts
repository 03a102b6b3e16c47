/**
 * Passage text extraction from vector store payloads
 *
 * Corpora indexed by different loaders store the passage under different
 * keys; the first non-blank string among the candidate fields wins.
 */

import { RETRIEVAL_DEFAULTS } from '../../constants/pipeline-constants.js';
import type { RetrievedPassage, VectorHit } from '../../models/passage.js';

export const DEFAULT_TEXT_FIELDS: readonly string[] = RETRIEVAL_DEFAULTS.TEXT_FIELDS;

/**
 * First present, non-blank string value among `fields`, in order
 */
export function extractPassageText(
  payload: Record<string, unknown> | null | undefined,
  fields: readonly string[] = DEFAULT_TEXT_FIELDS
): string | null {
  if (!payload) return null;

  for (const field of fields) {
    const value = payload[field];
    if (typeof value === 'string' && value.trim().length > 0) {
      return value;
    }
  }

  return null;
}

/**
 * Convert a hit to a passage, or null when it carries no usable text
 */
export function toPassage(
  hit: VectorHit,
  fields: readonly string[] = DEFAULT_TEXT_FIELDS
): RetrievedPassage | null {
  const text = extractPassageText(hit.payload, fields);
  if (text === null) return null;

  const metadata: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(hit.payload ?? {})) {
    if (!fields.includes(key)) metadata[key] = value;
  }

  return { id: hit.id, text, score: hit.score, metadata };
}
