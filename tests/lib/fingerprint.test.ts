/**
 * Tests for content fingerprinting and title similarity
 */

import { describe, it, expect } from 'vitest';
import { fingerprint, fingerprintInput, titleSimilarity } from '../../src/lib/fingerprint';

describe('fingerprint', () => {
  it('should be a 32 character hex string', () => {
    expect(fingerprint('Title', 'Body')).toMatch(/^[0-9a-f]{32}$/);
  });

  it('should be deterministic', () => {
    expect(fingerprint('Title', 'Body')).toBe(fingerprint('Title', 'Body'));
  });

  it('should ignore case and whitespace differences', () => {
    expect(fingerprint('Hello  World', 'Body\n\ntext')).toBe(fingerprint('hello world', 'body text'));
    expect(fingerprintInput('Hello  World', 'Body\n\ntext')).toBe('hello world body text');
  });

  it('should only look at the start of the body', () => {
    const prefix = 'a'.repeat(500);
    expect(fingerprint('T', `${prefix}X`)).toBe(fingerprint('T', `${prefix}Y`));
  });

  it('should differ for different content', () => {
    expect(fingerprint('Title', 'one body')).not.toBe(fingerprint('Title', 'another body'));
  });

  it('should trim when the body is empty', () => {
    expect(fingerprintInput('Title', '')).toBe('title');
  });
});

describe('titleSimilarity', () => {
  it('should be 1 for identical titles regardless of case', () => {
    expect(titleSimilarity('Same Title', 'same title')).toBe(1);
  });

  it('should be 1 for two empty titles', () => {
    expect(titleSimilarity('', '')).toBe(1);
  });

  it('should be 0 when nothing matches', () => {
    expect(titleSimilarity('abc', 'xyz')).toBe(0);
  });

  it('should count matched characters over combined length', () => {
    expect(titleSimilarity('abcd', 'bcde')).toBe(0.75);
  });

  it('should score reworded headlines above the duplicate threshold', () => {
    const score = titleSimilarity(
      'Scientists Discover New Species in Amazon',
      'Scientists Discover a New Species in the Amazon,'
    );
    expect(score).toBeCloseTo(0.9213, 4);
  });

  it('should score unrelated headlines low', () => {
    expect(titleSimilarity('Rust 2.0 released', 'Python 4 announced')).toBeLessThan(0.5);
  });
});
