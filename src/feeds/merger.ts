/**
 * Feedgate — Candidate Merger
 *
 * Round-robin interleaving so that one prolific source cannot
 * monopolise the per-cycle cap.
 */

/**
 * Take one element from each stream in turn, in fixed stream order,
 * dropping streams as they run out.
 */
export function interleave<T>(streams: ReadonlyArray<ReadonlyArray<T>>): T[] {
  const merged: T[] = [];
  const longest = streams.reduce((max, stream) => Math.max(max, stream.length), 0);

  for (let round = 0; round < longest; round++) {
    for (const stream of streams) {
      if (round < stream.length) {
        merged.push(stream[round]);
      }
    }
  }

  return merged;
}
