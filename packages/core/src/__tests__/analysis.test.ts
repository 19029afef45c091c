import { describe, expect, it } from 'vitest';

import { compareTestTypes, summarizeCounts } from '../analysis.js';

describe('summarizeCounts', () => {
  it('returns null for an empty sample', () => {
    expect(summarizeCounts([])).toBeNull();
  });

  it('uses the integer floor of the mean', () => {
    const summary = summarizeCounts([10, 11, 13]);
    expect(summary?.mean).toBe(11);
  });

  it('reports count, range and median', () => {
    const summary = summarizeCounts([120, 80, 100, 140]);
    expect(summary).toMatchObject({ n: 4, mean: 110, min: 80, max: 140, median: 110 });
  });

  it('reports zero spread for a single iteration', () => {
    expect(summarizeCounts([7])).toEqual({ n: 1, mean: 7, min: 7, max: 7, median: 7, stddev: 0 });
  });

  it('does not bound large counts', () => {
    const summary = summarizeCounts([10148, 9980]);
    expect(summary?.max).toBe(10148);
    expect(summary?.mean).toBe(10064);
  });
});

describe('compareTestTypes', () => {
  it('needs at least two values on each side', () => {
    expect(compareTestTypes('traditional', [1], 'proactive_sdn', [2, 3])).toBeNull();
  });

  it('reports a tie for overlapping samples', () => {
    const result = compareTestTypes('traditional', [100, 110, 90, 105], 'proactive_sdn', [102, 98, 108, 95]);
    expect(result?.significant).toBe(false);
    expect(result?.winner).toBe('tie');
  });

  it('names the test type with more alerts when the gap is significant', () => {
    const result = compareTestTypes(
      'traditional',
      [500, 510, 495, 505, 502],
      'proactive_sdn',
      [100, 104, 98, 101, 99],
    );
    expect(result?.significant).toBe(true);
    expect(result?.winner).toBe('traditional');
    expect(result?.difference).toBeCloseTo(402, 5);
  });

  it('treats identical constant samples as a tie', () => {
    const result = compareTestTypes('a', [5, 5, 5], 'b', [5, 5, 5]);
    expect(result?.pValue).toBe(1);
    expect(result?.winner).toBe('tie');
  });
});
