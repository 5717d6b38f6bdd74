/**
 * Feedgate — Ingestion Cycle
 *
 * One pass over every source:
 * 1. Fetch sources sequentially and interleave their candidates
 * 2. Resolve duplicates and apply source pre-filters
 * 3. Classify and rewrite through the retry wrapper
 * 4. Cache media, create the pending item, request approval
 *
 * Stops creating items once the per-cycle cap is reached; whatever is
 * left is reported as `remaining` and picked up by a later cycle.
 */

import type {
  CandidateItem,
  CycleUsage,
  IngestionReport,
  MediaKind,
  SeenStatus,
  TrackedItem,
} from '../types';
import type { ItemStore } from '../db/store';
import type { FeedSource } from '../feeds/base';
import type { ContentAnalyzer } from '../enrichment/analyzer';
import type { OperatorChannel } from '../delivery';
import type { DedupConfig } from '../lib/config';
import { aggregateFeeds } from '../feeds/aggregator';
import { DuplicateResolver } from '../feeds/dedup';
import { materializeMedia, type MediaResult } from '../media/cache';
import { withRetry, type RetryOptions } from '../lib/retry';
import { canonicalizeUrl } from '../lib/url';
import { fingerprint as contentFingerprint } from '../lib/fingerprint';
import { DuplicateItemError } from '../lib/errors';
import { logger, errorMessage } from '../lib/logger';

const SUMMARY_LENGTH = 2000;

const log = logger.child({ component: 'ingest' });

// ============================================================
// TYPES
// ============================================================

export interface IngestionDeps {
  store: ItemStore;
  sources: FeedSource[];
  analyzer: ContentAnalyzer;
  operator: OperatorChannel;
  dedup: DedupConfig;
  dataDir: string;
  materialize?: (url: string, kind: MediaKind) => Promise<MediaResult>;
  retry?: RetryOptions;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export interface IngestionOptions {
  maxNewItems: number;
  pacingMs: number;
  sourceTimeoutMs?: number;
}

type CandidateOutcome = 'new' | 'duplicate' | 'irrelevant';

const defaultSleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

function emptyUsage(): CycleUsage {
  return { classifyCalls: 0, rewriteCalls: 0, inputTokens: 0, outputTokens: 0 };
}

// ============================================================
// CYCLE
// ============================================================

class IngestionCycle {
  readonly usage = emptyUsage();
  private readonly resolver: DuplicateResolver;
  private readonly now: () => Date;
  private readonly materialize: (url: string, kind: MediaKind) => Promise<MediaResult>;

  constructor(private readonly deps: IngestionDeps) {
    this.now = deps.now ?? (() => new Date());
    this.resolver = new DuplicateResolver(deps.store, deps.dedup, this.now);
    this.materialize =
      deps.materialize ?? ((url, kind) => materializeMedia(url, kind, deps.dataDir));
  }

  async process(candidate: CandidateItem, source: FeedSource): Promise<CandidateOutcome> {
    const resolution = await this.resolver.resolve(candidate);

    if (resolution.outcome === 'failed_previously') {
      log.debug('Skipped (failed before)', { url: candidate.url, reason: resolution.reason });
      return 'duplicate';
    }
    if (resolution.outcome === 'duplicate') {
      log.debug('Skipped (duplicate)', { title: candidate.title.slice(0, 50), reason: resolution.reason });
      await this.resolver.recordOutcome(candidate, resolution);
      return 'duplicate';
    }

    const { canonicalUrl, fingerprint } = resolution;

    const prefiltered = source.prefilter(candidate);
    if (prefiltered) {
      log.debug(`Skipped (${prefiltered})`, { title: candidate.title.slice(0, 50), score: candidate.score });
      await this.markSeen(candidate, canonicalUrl, fingerprint, 'irrelevant', prefiltered);
      return 'irrelevant';
    }

    const classification = await withRetry(
      () => this.deps.analyzer.classify({
        title: candidate.title,
        body: candidate.body,
        mediaUrl: candidate.mediaUrl,
        sourceType: candidate.sourceType,
      }),
      { ...this.deps.retry, label: 'classify' }
    );
    this.usage.classifyCalls++;
    this.usage.inputTokens += classification.usage.inputTokens;
    this.usage.outputTokens += classification.usage.outputTokens;

    if (!classification.value.relevant) {
      log.debug('Skipped (not relevant)', {
        title: candidate.title.slice(0, 50),
        reason: classification.value.reason,
      });
      await this.markSeen(candidate, canonicalUrl, fingerprint, 'irrelevant', classification.value.reason);
      return 'irrelevant';
    }

    const rewrite = await withRetry(
      () => this.deps.analyzer.rewrite({
        title: candidate.title,
        body: candidate.body,
        sourceUrl: candidate.url,
        sourceName: candidate.sourceName,
        mediaKind: candidate.mediaKind,
      }),
      { ...this.deps.retry, label: 'rewrite' }
    );
    this.usage.rewriteCalls++;
    this.usage.inputTokens += rewrite.usage.inputTokens;
    this.usage.outputTokens += rewrite.usage.outputTokens;

    let localMediaPath: string | null = null;
    if (candidate.mediaUrl) {
      const media = await this.materialize(candidate.mediaUrl, candidate.mediaKind);
      if (media.success) {
        localMediaPath = media.localPath;
      } else {
        log.warn('Media download failed', { url: candidate.mediaUrl, error: media.error });
        await this.deps.operator.notify(
          `Media download failed for "${candidate.title.slice(0, 100)}": ${media.error}. Continuing without a cached file.`
        );
      }
    }

    // Another writer may have claimed the URL while we were enriching.
    if (await this.deps.store.findItemByCanonicalUrl(canonicalUrl)) {
      await this.resolver.recordOutcome(candidate, {
        outcome: 'duplicate',
        reason: 'url seen',
        canonicalUrl,
        fingerprint,
      });
      return 'duplicate';
    }

    let item: TrackedItem;
    try {
      item = await this.deps.store.createItem(
        {
          sourceName: candidate.sourceName,
          originalUrl: candidate.url,
          canonicalUrl,
          title: candidate.title,
          summary: candidate.body.slice(0, SUMMARY_LENGTH),
          fingerprint,
          mediaUrl: candidate.mediaUrl ?? null,
          localMediaPath,
          mediaKind: candidate.mediaKind,
          rewrittenContent: rewrite.value,
        },
        this.now().toISOString()
      );
    } catch (error) {
      if (error instanceof DuplicateItemError) {
        log.info('Lost race on canonical URL', { canonicalUrl });
        await this.resolver.recordOutcome(candidate, {
          outcome: 'duplicate',
          reason: 'url seen',
          canonicalUrl,
          fingerprint,
        });
        return 'duplicate';
      }
      throw error;
    }

    await this.deps.operator.requestApproval(item);
    log.info('New item', { itemId: item.id, title: item.title.slice(0, 50) });
    return 'new';
  }

  async markFailed(candidate: CandidateItem, error: unknown): Promise<void> {
    try {
      await this.markSeen(
        candidate,
        canonicalizeUrl(candidate.url),
        contentFingerprint(candidate.title, candidate.body),
        'failed',
        errorMessage(error)
      );
    } catch (writeError) {
      log.error('Could not record failure', { url: candidate.url, error: errorMessage(writeError) });
    }
  }

  private async markSeen(
    candidate: CandidateItem,
    canonicalUrl: string,
    fingerprint: string | null,
    status: SeenStatus,
    reason: string
  ): Promise<void> {
    await this.deps.store.upsertSeenRecord(
      { canonicalUrl, originalUrl: candidate.url, fingerprint, status, reason },
      this.now().toISOString()
    );
  }
}

/**
 * Run one ingestion cycle and report what happened.
 */
export async function runIngestionCycle(
  deps: IngestionDeps,
  options: IngestionOptions
): Promise<IngestionReport> {
  const startTime = Date.now();
  const sleep = deps.sleep ?? defaultSleep;
  const cycle = new IngestionCycle(deps);

  log.info('Starting ingestion cycle', { sources: deps.sources.length, maxNewItems: options.maxNewItems });

  const aggregated = await aggregateFeeds(deps.sources, { sourceTimeoutMs: options.sourceTimeoutMs });
  const total = aggregated.candidates.length;

  let newItems = 0;
  let duplicates = 0;
  let irrelevant = 0;
  let failed = 0;
  let processed = 0;

  for (const { candidate, source } of aggregated.candidates) {
    if (newItems >= options.maxNewItems) {
      log.info('Hit per-cycle limit', { limit: options.maxNewItems, remaining: total - processed });
      break;
    }

    processed++;

    try {
      const outcome = await cycle.process(candidate, source);
      if (outcome === 'new') {
        newItems++;
        if (options.pacingMs > 0) await sleep(options.pacingMs);
      } else if (outcome === 'duplicate') {
        duplicates++;
      } else {
        irrelevant++;
      }
    } catch (error) {
      log.error('Error processing candidate', { url: candidate.url, error: errorMessage(error) });
      await cycle.markFailed(candidate, error);
      failed++;
    }
  }

  const report: IngestionReport = {
    newItems,
    duplicates,
    irrelevant,
    failed,
    remaining: Math.max(0, total - processed),
    processed,
    totalCandidates: total,
    sourceErrors: aggregated.errors,
    usage: cycle.usage,
    durationMs: Date.now() - startTime,
    completedAt: new Date().toISOString(),
  };

  log.info('Ingestion cycle complete', {
    newItems,
    duplicates,
    irrelevant,
    failed,
    remaining: report.remaining,
  });
  log.info('Analyzer usage', { ...report.usage });

  await deps.operator.sendCycleSummary(report);
  if (report.sourceErrors.length > 0) {
    await deps.operator.notify(`Source errors:\n${report.sourceErrors.join('\n')}`);
  }

  return report;
}
