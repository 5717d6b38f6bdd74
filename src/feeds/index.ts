/**
 * Feedgate — Feeds Module
 *
 * Source adapters, normalization, merging and duplicate resolution.
 */

export { FeedSource, type SourceFetchResult } from './base';

export { createSource, createSources, RssSource, RedditSource } from './sources';

export { stripHtml, decodeEntities, extractImageFromHtml, detectMediaKind, truncate } from './normalizer';

export { interleave } from './merger';

export { DuplicateResolver } from './dedup';

export {
  aggregateFeeds,
  type AggregatorConfig,
  type AggregatorResult,
  type AggregatedCandidate,
} from './aggregator';
