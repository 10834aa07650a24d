export type FusionMethod = 'rrf' | 'weighted';

export interface FusionOptions {
  method: FusionMethod;
  semanticWeight: number;
  lexicalWeight: number;
  /** RRF constant, ignored by weighted fusion. */
  k: number;
}

export interface RankingCandidate {
  id: string;
  /** Position in fetch order; the final tie-breaker. */
  order: number;
  /** Null when semantic ranking is unavailable for this call. */
  semantic: number | null;
  lexical: number;
}

export interface FusedCandidate extends RankingCandidate {
  semanticRank: number | null;
  lexicalRank: number;
  fused: number;
}

/** 1-based rank of each score, highest first, ties broken by position. */
export function rankDescending(scores: readonly number[]): number[] {
  const order = scores
    .map((score, index) => ({ score, index }))
    .sort((a, b) => b.score - a.score || a.index - b.index);
  const ranks = new Array<number>(scores.length);
  order.forEach((entry, position) => {
    ranks[entry.index] = position + 1;
  });
  return ranks;
}

export function minMaxNormalize(scores: readonly number[]): number[] {
  if (scores.length === 0) {
    return [];
  }
  const min = Math.min(...scores);
  const max = Math.max(...scores);
  const range = max - min;
  if (range === 0) {
    return scores.map(() => (max > 0 ? 1 : 0));
  }
  return scores.map((score) => (score - min) / range);
}

export function reciprocalRankFusion(
  ranks: ReadonlyArray<{ rank: number | null; weight: number }>,
  k: number = 60
): number {
  return ranks.reduce((sum, entry) => (entry.rank === null ? sum : sum + entry.weight / (k + entry.rank)), 0);
}

/**
 * Fuses the semantic and lexical rankings of one retrieval call. The result is
 * sorted by fused score with ties resolved by fetch order, so identical inputs
 * always yield the identical sequence.
 */
export function fuseRankings(candidates: readonly RankingCandidate[], options: FusionOptions): FusedCandidate[] {
  const ordered = [...candidates].sort((a, b) => a.order - b.order);
  const semanticAvailable = ordered.length > 0 && ordered.every((candidate) => candidate.semantic !== null);

  const semanticScores = ordered.map((candidate) => candidate.semantic ?? 0);
  const lexicalScores = ordered.map((candidate) => candidate.lexical);
  const semanticRanks = semanticAvailable ? rankDescending(semanticScores) : null;
  const lexicalRanks = rankDescending(lexicalScores);
  const semanticNormalized = semanticAvailable ? minMaxNormalize(semanticScores) : null;
  const lexicalNormalized = minMaxNormalize(lexicalScores);

  const fused = ordered.map((candidate, index): FusedCandidate => {
    const semanticRank = semanticRanks ? semanticRanks[index] : null;
    const lexicalRank = lexicalRanks[index];

    let score: number;
    if (options.method === 'rrf') {
      score = reciprocalRankFusion(
        [
          { rank: semanticRank, weight: options.semanticWeight },
          { rank: lexicalRank, weight: options.lexicalWeight }
        ],
        options.k
      );
    } else {
      const semanticPart = semanticNormalized ? options.semanticWeight * semanticNormalized[index] : 0;
      score = semanticPart + options.lexicalWeight * lexicalNormalized[index];
    }

    return {
      ...candidate,
      semantic: semanticAvailable ? candidate.semantic : null,
      semanticRank,
      lexicalRank,
      fused: score
    };
  });

  return fused.sort((a, b) => b.fused - a.fused || a.order - b.order);
}
