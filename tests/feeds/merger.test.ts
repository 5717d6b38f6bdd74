/**
 * Tests for round-robin candidate merging
 */

import { describe, it, expect } from 'vitest';
import { interleave } from '../../src/feeds/merger';

describe('interleave', () => {
  it('should take one element per stream per round', () => {
    expect(interleave([['a1', 'a2', 'a3'], ['b1'], ['c1', 'c2']])).toEqual([
      'a1',
      'b1',
      'c1',
      'a2',
      'c2',
      'a3',
    ]);
  });

  it('should return an empty list for no streams', () => {
    expect(interleave([])).toEqual([]);
  });

  it('should skip empty streams', () => {
    expect(interleave([[], [1, 2], []])).toEqual([1, 2]);
  });

  it('should keep every element exactly once', () => {
    const streams = [[1, 2, 3, 4], [5], [6, 7]];
    const merged = interleave(streams);
    expect(merged).toHaveLength(7);
    expect([...merged].sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6, 7]);
  });
});
