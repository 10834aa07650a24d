import { describe, expect, it } from 'vitest';
import {
  fuseRankings,
  minMaxNormalize,
  rankDescending,
  reciprocalRankFusion,
  type FusionOptions,
  type RankingCandidate
} from '../orchestrator/reranker.js';

const rrf: FusionOptions = { method: 'rrf', semanticWeight: 0.5, lexicalWeight: 0.5, k: 60 };

describe('rankDescending', () => {
  it('ranks highest first and breaks ties by position', () => {
    expect(rankDescending([0.2, 0.9, 0.2])).toEqual([2, 1, 3]);
  });
});

describe('minMaxNormalize', () => {
  it('scales scores to [0, 1]', () => {
    expect(minMaxNormalize([1, 3, 2])).toEqual([0, 1, 0.5]);
  });

  it('handles flat and empty inputs', () => {
    expect(minMaxNormalize([2, 2])).toEqual([1, 1]);
    expect(minMaxNormalize([0, 0])).toEqual([0, 0]);
    expect(minMaxNormalize([])).toEqual([]);
  });
});

describe('reciprocalRankFusion', () => {
  it('sums weighted reciprocal ranks and skips missing ones', () => {
    expect(
      reciprocalRankFusion(
        [
          { rank: 1, weight: 0.5 },
          { rank: 2, weight: 0.5 }
        ],
        60
      )
    ).toBeCloseTo(0.5 / 61 + 0.5 / 62);
    expect(
      reciprocalRankFusion(
        [
          { rank: null, weight: 0.5 },
          { rank: 3, weight: 0.5 }
        ],
        60
      )
    ).toBeCloseTo(0.5 / 63);
  });
});

describe('fuseRankings', () => {
  const candidates: RankingCandidate[] = [
    { id: 'a', order: 0, semantic: 0.9, lexical: 0 },
    { id: 'b', order: 1, semantic: 0.1, lexical: 3 },
    { id: 'c', order: 2, semantic: 0.5, lexical: 1 }
  ];

  it('fuses with reciprocal ranks and resolves ties by fetch order', () => {
    const fused = fuseRankings(candidates, rrf);

    // a and b swap ranks 1 and 3, so they tie just above c
    expect(fused.map((entry) => entry.id)).toEqual(['a', 'b', 'c']);
    expect(fused[0].fused).toBe(fused[1].fused);
    expect(fused[0].fused).toBeCloseTo(0.5 / 61 + 0.5 / 63);
    expect(fused[2].fused).toBeCloseTo(1 / 62);
    expect(fused.map((entry) => [entry.semanticRank, entry.lexicalRank])).toEqual([
      [1, 3],
      [3, 1],
      [2, 2]
    ]);
  });

  it('is independent of input order', () => {
    const shuffled = [candidates[2], candidates[0], candidates[1]];
    expect(fuseRankings(shuffled, rrf)).toEqual(fuseRankings(candidates, rrf));
  });

  it('ranks lexically only when any semantic score is missing', () => {
    const partial: RankingCandidate[] = [
      { id: 'a', order: 0, semantic: 0.9, lexical: 1 },
      { id: 'b', order: 1, semantic: null, lexical: 2 }
    ];
    const fused = fuseRankings(partial, rrf);

    expect(fused.map((entry) => entry.id)).toEqual(['b', 'a']);
    expect(fused.every((entry) => entry.semantic === null && entry.semanticRank === null)).toBe(true);
    expect(fused[0].fused).toBeCloseTo(0.5 / 61);
  });

  it('supports weighted min-max fusion', () => {
    const fused = fuseRankings(
      [
        { id: 'a', order: 0, semantic: 1, lexical: 0 },
        { id: 'b', order: 1, semantic: 0, lexical: 2 }
      ],
      { method: 'weighted', semanticWeight: 0.7, lexicalWeight: 0.3, k: 60 }
    );

    expect(fused.map((entry) => entry.id)).toEqual(['a', 'b']);
    expect(fused[0].fused).toBeCloseTo(0.7);
    expect(fused[1].fused).toBeCloseTo(0.3);
  });
});
