/**
 * Feedgate — Content Fingerprinting
 *
 * Coarse duplicate-content signal (hash of title + body excerpt)
 * and fuzzy title similarity for near-duplicate detection.
 */

import { createHash } from 'crypto';

export const EXCERPT_LENGTH = 500;
export const FINGERPRINT_LENGTH = 32;

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Normalized text the fingerprint is computed from.
 */
export function fingerprintInput(title: string, body: string): string {
  const excerpt = collapseWhitespace(body).slice(0, EXCERPT_LENGTH);
  return collapseWhitespace(`${title.toLowerCase()} ${excerpt.toLowerCase()}`);
}

export function fingerprint(title: string, body: string): string {
  return createHash('sha256')
    .update(fingerprintInput(title, body))
    .digest('hex')
    .slice(0, FINGERPRINT_LENGTH);
}

// ============================================================
// TITLE SIMILARITY
// ============================================================

interface Match {
  a: number;
  b: number;
  size: number;
}

/**
 * Longest common substring of a[aLo:aHi] and b[bLo:bHi].
 * Earliest match in `a` wins ties.
 */
function longestMatch(
  a: string,
  b: string,
  aLo: number,
  aHi: number,
  bLo: number,
  bHi: number
): Match {
  let best: Match = { a: aLo, b: bLo, size: 0 };
  let prev = new Map<number, number>();

  for (let i = aLo; i < aHi; i++) {
    const next = new Map<number, number>();
    for (let j = bLo; j < bHi; j++) {
      if (a[i] !== b[j]) continue;
      const k = (prev.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > best.size) {
        best = { a: i - k + 1, b: j - k + 1, size: k };
      }
    }
    prev = next;
  }

  return best;
}

function matchingCharacters(a: string, b: string): number {
  let total = 0;
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];

  while (queue.length > 0) {
    const range = queue.pop();
    if (!range) break;
    const [aLo, aHi, bLo, bHi] = range;
    const match = longestMatch(a, b, aLo, aHi, bLo, bHi);
    if (match.size === 0) continue;

    total += match.size;
    if (aLo < match.a && bLo < match.b) {
      queue.push([aLo, match.a, bLo, match.b]);
    }
    if (match.a + match.size < aHi && match.b + match.size < bHi) {
      queue.push([match.a + match.size, aHi, match.b + match.size, bHi]);
    }
  }

  return total;
}

/**
 * Ratcliff/Obershelp similarity of two titles in [0, 1]:
 * twice the matched characters over the combined length.
 */
export function titleSimilarity(first: string, second: string): number {
  const a = first.toLowerCase().trim();
  const b = second.toLowerCase().trim();
  const length = a.length + b.length;
  if (length === 0) return 1;
  return (2 * matchingCharacters(a, b)) / length;
}
