import { describe, expect, it } from 'vitest';
import { EMPTY_TEXT_SCORE } from '../text/text-scorer.js';
import { breakdownByTopic } from './topics.js';

function evidence(topics: string[], score: number, coverage: number) {
  return { topics, score: { ...EMPTY_TEXT_SCORE, score, coverage } };
}

describe('breakdownByTopic', () => {
  it('groups documents by tag with a coverage-weighted score', () => {
    const result = breakdownByTopic([
      evidence(['health', 'budget'], 0.4, 0.5),
      evidence(['budget'], -0.2, 0.25),
      evidence(['budget'], 0.9, 0),
    ]);

    expect(result.map(t => t.topic)).toEqual(['budget', 'health']);
    expect(result[0]?.documents).toBe(3);
    expect(result[0]?.value).toBeCloseTo(0.2, 12);
    expect(result[0]?.confidence).toBe(0.625);
    expect(result[1]).toEqual({ topic: 'health', documents: 1, value: 0.4, confidence: 0.5 });
  });

  it('counts unmatched documents but gives them no signal', () => {
    expect(breakdownByTopic([evidence(['defense'], 0, 0)])).toEqual([
      { topic: 'defense', documents: 1, value: 0, confidence: 0 },
    ]);
  });

  it('ignores blank and repeated tags', () => {
    const result = breakdownByTopic([evidence([' energy ', 'energy', '', '  '], 0.5, 1)]);
    expect(result).toEqual([{ topic: 'energy', documents: 1, value: 0.5, confidence: 1 }]);
  });

  it('is empty without evidence', () => {
    expect(breakdownByTopic([])).toEqual([]);
  });
});
