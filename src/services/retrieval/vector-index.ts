/**
 * Flat in-memory cosine index. Entries keep insertion order so scores
 * line up with the chunks they were added for.
 */

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  return denominator > 0 ? dot / denominator : 0;
}

export class VectorIndex {
  private readonly vectors: number[][] = [];

  add(vector: readonly number[]): number {
    this.vectors.push([...vector]);
    return this.vectors.length - 1;
  }

  get size(): number {
    return this.vectors.length;
  }

  /**
   * Best similarity of every entry against any of the query vectors
   */
  maxSimilarity(queries: readonly (readonly number[])[]): number[] {
    return this.vectors.map(vector => {
      let best = -1;
      for (const query of queries) {
        best = Math.max(best, cosineSimilarity(vector, query));
      }
      return queries.length === 0 ? 0 : best;
    });
  }
}
