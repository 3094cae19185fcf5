/**
 * Cosine similarity between two embeddings, in [-1, 1]
 * (1 = same direction, 0 = orthogonal, -1 = opposite).
 * A zero vector, or vectors of different dimension, score 0.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    return 0;
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  normA = Math.sqrt(normA);
  normB = Math.sqrt(normB);

  if (normA === 0 || normB === 0) {
    return 0;
  }

  // Rounding can push parallel vectors just past 1
  return Math.max(-1, Math.min(1, dotProduct / (normA * normB)));
}
