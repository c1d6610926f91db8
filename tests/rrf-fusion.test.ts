import { describe, expect, it } from 'vitest';
import { gradedRelevance, reciprocalRankFusion } from '@/services/scoring/rrf-fusion';

describe('reciprocalRankFusion', () => {
  it('fuses lexical [A, B, C] with semantic [B, C, A] into [B, A, C]', () => {
    const fused = reciprocalRankFusion([
      ['A', 'B', 'C'],
      ['B', 'C', 'A'],
    ]);
    expect(fused.map((e) => e.id)).toEqual(['B', 'A', 'C']);
    expect(fused.map((e) => e.rank)).toEqual([1, 2, 3]);
    expect(fused[0].score).toBeCloseTo(1 / 61 + 1 / 62, 12);
  });

  it('returns the same ranking on repeated calls', () => {
    const rankings = [
      ['A', 'B', 'C'],
      ['B', 'C', 'A'],
    ];
    expect(reciprocalRankFusion(rankings)).toEqual(reciprocalRankFusion(rankings));
  });

  it('breaks score ties by position in the first ranking', () => {
    const fused = reciprocalRankFusion([
      ['A', 'B'],
      ['B', 'A'],
    ]);
    expect(fused.map((e) => e.id)).toEqual(['A', 'B']);
    expect(fused[0].score).toBe(fused[1].score);
  });

  it('breaks score ties by an explicit tie-break ranking when given', () => {
    const fused = reciprocalRankFusion(
      [
        ['B', 'A'],
        ['A', 'B'],
      ],
      { tieBreak: ['A', 'B'] },
    );
    expect(fused.map((e) => e.id)).toEqual(['A', 'B']);
  });

  it('lets ids absent from a ranking contribute nothing there', () => {
    const fused = reciprocalRankFusion([['A', 'B', 'C'], ['C']]);
    expect(fused.map((e) => e.id)).toEqual(['C', 'A', 'B']);
    expect(fused[1].score).toBeCloseTo(1 / 61, 12);
  });

  it('ranks ids seen only in later rankings after first-ranking ties', () => {
    const fused = reciprocalRankFusion([['A'], ['B']]);
    expect(fused.map((e) => e.id)).toEqual(['A', 'B']);
  });

  it('honours a custom k', () => {
    const [top] = reciprocalRankFusion([['A']], { k: 1 });
    expect(top.score).toBe(0.5);
  });

  it('ignores repeated ids within one ranking', () => {
    const fused = reciprocalRankFusion([['A', 'A', 'B']]);
    expect(fused.map((e) => [e.id, e.score])).toEqual([
      ['A', 1 / 61],
      ['B', 1 / 63],
    ]);
  });
});

describe('gradedRelevance', () => {
  it('gives the top entry 1 and blends rank decay with score ratio for the rest', () => {
    const relevance = gradedRelevance(
      reciprocalRankFusion([
        ['A', 'B', 'C'],
        ['B', 'C', 'A'],
      ]),
    );
    expect(relevance.get('B')).toBe(1);
    expect(relevance.get('A')).toBe(0.971);
    expect(relevance.get('C')).toBe(0.944);
  });

  it('is empty for an empty ranking', () => {
    expect(gradedRelevance([]).size).toBe(0);
  });
});
