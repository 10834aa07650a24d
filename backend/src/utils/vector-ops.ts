export function cosineSimilarity(vectorA: readonly number[], vectorB: readonly number[]): number {
  if (vectorA.length !== vectorB.length || vectorA.length === 0) {
    return 0;
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let index = 0; index < vectorA.length; index += 1) {
    const a = vectorA[index];
    const b = vectorB[index];

    dotProduct += a * b;
    normA += a * a;
    normB += b * b;
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  if (denominator === 0) {
    return 0;
  }

  return dotProduct / denominator;
}

/** Similarity of `query` against every candidate, in candidate order. */
export function cosineScores(query: readonly number[], candidates: ReadonlyArray<readonly number[]>): number[] {
  return candidates.map((candidate) => cosineSimilarity(query, candidate));
}
