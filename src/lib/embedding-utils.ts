/**
 * Embedding Utilities
 *
 * Dimension repair for query embeddings. The retrieval index is built at a
 * fixed dimensionality, so every query vector is brought to that length
 * before it reaches the vector store.
 */

import type { EmbeddingVector, FittedVector } from '../models/embedding-vector.js';

/**
 * Bring a vector to exactly `dimensions` components
 *
 * Shorter vectors are right-padded with zeros. Zero padding keeps the vector
 * structurally compatible with the index; it is not a faithful upscale.
 * Longer vectors keep their leading components (the embedding service orders
 * components by importance when a smaller output size is requested).
 *
 * @param values - Vector returned by the embedding service
 * @param dimensions - Target dimensionality of the index
 *
 * @example
 * ```typescript
 * fitDimensions([0.1, 0.2], 4);
 * // { vector: [0.1, 0.2, 0, 0], adjustment: 'padded', originalDimensions: 2 }
 * ```
 */
export function fitDimensions(values: readonly number[], dimensions: number): FittedVector {
	const originalDimensions = values.length;

	if (originalDimensions === dimensions) {
		return { vector: [...values], adjustment: 'none', originalDimensions };
	}

	if (originalDimensions < dimensions) {
		const vector: EmbeddingVector = new Array<number>(dimensions).fill(0);
		for (let i = 0; i < originalDimensions; i++) {
			vector[i] = values[i] ?? 0;
		}
		return { vector, adjustment: 'padded', originalDimensions };
	}

	return {
		vector: values.slice(0, dimensions),
		adjustment: 'truncated',
		originalDimensions,
	};
}

/**
 * A vector is usable when it is non-empty and every component is finite
 */
export function isUsableVector(values: readonly number[]): boolean {
	return values.length > 0 && values.every((value) => Number.isFinite(value));
}
