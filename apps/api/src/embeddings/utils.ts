/**
 * Vector helpers used by the index
 */

/**
 * Length shared by every vector, or null when the lengths differ.
 * An empty list has dimensionality 0.
 */
export function uniformDimensions(vectors: ReadonlyArray<ArrayLike<number>>): number | null {
  if (vectors.length === 0) {
    return 0;
  }
  const dimensions = vectors[0].length;
  return vectors.every((vector) => vector.length === dimensions) ? dimensions : null;
}

