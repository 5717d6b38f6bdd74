/**
 * Tests for the feed aggregator and the source base class
 */

import { describe, it, expect } from 'vitest';
import { aggregateFeeds } from '../../src/feeds/aggregator';
import { StaticSource, createMockCandidate } from '../helpers';

const candidate = (source: string, n: number) =>
  createMockCandidate({ sourceName: source, url: `https://example.com/${source}/${n}`, title: `${source}${n}` });

describe('aggregateFeeds', () => {
  it('should interleave sources and pair each candidate with its source', async () => {
    const a = new StaticSource('a', [candidate('a', 1), candidate('a', 2)]);
    const b = new StaticSource('b', [candidate('b', 1)]);

    const result = await aggregateFeeds([a, b]);

    expect(result.candidates.map(c => c.candidate.title)).toEqual(['a1', 'b1', 'a2']);
    expect(result.candidates[1].source).toBe(b);
    expect(result.errors).toEqual([]);
  });

  it('should record a failing source without aborting the others', async () => {
    const broken = new StaticSource('broken', async () => {
      throw new Error('Failed to fetch feed: 500');
    });
    const ok = new StaticSource('ok', [candidate('ok', 1)]);

    const result = await aggregateFeeds([broken, ok]);

    expect(result.errors).toEqual(['broken: Failed to fetch feed: 500']);
    expect(result.candidates.map(c => c.candidate.title)).toEqual(['ok1']);
    expect(result.sourceResults).toHaveLength(2);
  });

  it('should time out a hanging source', async () => {
    const hanging = new StaticSource('slow', () => new Promise(() => {}));

    const result = await aggregateFeeds([hanging], { sourceTimeoutMs: 10 });

    expect(result.errors).toEqual(['slow: Timeout after 10ms']);
    expect(result.candidates).toEqual([]);
  });

  it('should cap each source at maxItems', async () => {
    const many = new StaticSource(
      'many',
      [1, 2, 3, 4].map(n => candidate('many', n)),
      { maxItems: 2 }
    );

    const result = await aggregateFeeds([many]);

    expect(result.candidates.map(c => c.candidate.title)).toEqual(['many1', 'many2']);
  });
});

describe('FeedSource.prefilter', () => {
  it('should reject candidates without media when media is required', () => {
    const source = new StaticSource('s', [], { requireMedia: true });
    expect(source.prefilter(createMockCandidate({ mediaUrl: undefined }))).toBe('no media');
  });

  it('should reject candidates below the minimum score', () => {
    const source = new StaticSource('s', [], { minScore: 100 });
    expect(source.prefilter(createMockCandidate({ score: 99 }))).toBe('low score');
    expect(source.prefilter(createMockCandidate({ score: undefined }))).toBe('low score');
    expect(source.prefilter(createMockCandidate({ score: 100 }))).toBeNull();
  });

  it('should pass candidates when no filter applies', () => {
    const source = new StaticSource('s', []);
    expect(source.prefilter(createMockCandidate({ mediaUrl: undefined }))).toBeNull();
  });
});
