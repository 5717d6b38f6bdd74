/**
 * Feedgate — Feed Aggregator
 *
 * Fetches every source in order with a per-source timeout, then
 * interleaves the results into one candidate stream. A failing source
 * is reported and skipped; it never aborts the others.
 */

import type { CandidateItem } from '../types';
import type { FeedSource, SourceFetchResult } from './base';
import { interleave } from './merger';
import { logger, errorMessage } from '../lib/logger';

// ============================================================
// TYPES
// ============================================================

export interface AggregatorConfig {
  /** Timeout per source in ms */
  sourceTimeoutMs?: number;
}

export interface AggregatedCandidate {
  candidate: CandidateItem;
  source: FeedSource;
}

export interface AggregatorResult {
  /** Interleaved candidates, each paired with the source that produced it */
  candidates: AggregatedCandidate[];
  sourceResults: SourceFetchResult[];
  /** "<source>: <message>" for every failed source */
  errors: string[];
  durationMs: number;
}

const DEFAULT_CONFIG: Required<AggregatorConfig> = {
  sourceTimeoutMs: 60_000,
};

// ============================================================
// FETCH HELPERS
// ============================================================

/**
 * Fetch from a single source with timeout.
 */
async function fetchFromSource(
  source: FeedSource,
  config: Required<AggregatorConfig>
): Promise<SourceFetchResult> {
  const startTime = Date.now();
  let timer: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<SourceFetchResult>(resolve => {
    timer = setTimeout(
      () =>
        resolve({
          sourceName: source.name,
          items: [],
          durationMs: Date.now() - startTime,
          error: `Timeout after ${config.sourceTimeoutMs}ms`,
        }),
      config.sourceTimeoutMs
    );
  });

  try {
    return await Promise.race([source.safeFetch(), timeoutPromise]);
  } catch (error) {
    return {
      sourceName: source.name,
      items: [],
      durationMs: Date.now() - startTime,
      error: errorMessage(error),
    };
  } finally {
    clearTimeout(timer);
  }
}

// ============================================================
// MAIN AGGREGATOR
// ============================================================

export async function aggregateFeeds(
  sources: FeedSource[],
  config: AggregatorConfig = {}
): Promise<AggregatorResult> {
  const startTime = Date.now();
  const mergedConfig: Required<AggregatorConfig> = {
    sourceTimeoutMs: config.sourceTimeoutMs ?? DEFAULT_CONFIG.sourceTimeoutMs,
  };

  if (sources.length === 0) {
    logger.warn('No sources to fetch from');
  }

  const sourceResults: SourceFetchResult[] = [];
  const streams: AggregatedCandidate[][] = [];
  const errors: string[] = [];

  for (const source of sources) {
    const result = await fetchFromSource(source, mergedConfig);
    sourceResults.push(result);

    if (result.error) {
      errors.push(`${source.name}: ${result.error}`);
      continue;
    }
    streams.push(result.items.map(candidate => ({ candidate, source })));
  }

  const candidates = interleave(streams);
  const durationMs = Date.now() - startTime;

  logger.info('Feed fetch phase completed', {
    sources: sources.length,
    failedSources: errors.length,
    candidates: candidates.length,
    durationMs,
  });

  return { candidates, sourceResults, errors, durationMs };
}
