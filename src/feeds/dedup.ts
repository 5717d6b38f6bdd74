/**
 * Feedgate — Duplicate Resolution
 *
 * Decides whether a candidate is new, a duplicate of something already
 * tracked or screened, or a URL that failed before. Checks run cheapest
 * first: canonical URL, content fingerprint, then fuzzy title match
 * against a bounded window of recent items.
 */

import type { CandidateItem, Resolution, SeenRecord } from '../types';
import type { ItemStore } from '../db/store';
import type { DedupConfig } from '../lib/config';
import { canonicalizeUrl } from '../lib/url';
import { fingerprint, titleSimilarity } from '../lib/fingerprint';
import { logger } from '../lib/logger';

const DAY_MS = 24 * 60 * 60 * 1000;

const log = logger.child({ component: 'dedup' });

export class DuplicateResolver {
  constructor(
    private readonly store: ItemStore,
    private readonly config: DedupConfig,
    private readonly now: () => Date = () => new Date()
  ) {}

  async resolve(candidate: CandidateItem): Promise<Resolution> {
    const canonicalUrl = canonicalizeUrl(candidate.url);
    const contentHash = fingerprint(candidate.title, candidate.body);

    // 1. Canonical URL
    const seen = await this.store.findSeenRecord(canonicalUrl);
    if (seen?.status === 'failed') {
      return {
        outcome: 'failed_previously',
        reason: seen.reason,
        canonicalUrl,
        fingerprint: contentHash,
      };
    }
    if (seen || (await this.store.findItemByCanonicalUrl(canonicalUrl))) {
      return { outcome: 'duplicate', reason: 'url seen', canonicalUrl, fingerprint: contentHash };
    }

    // 2. Content fingerprint
    if (await this.store.fingerprintExists(contentHash)) {
      return {
        outcome: 'duplicate',
        reason: 'content hash match',
        canonicalUrl,
        fingerprint: contentHash,
      };
    }

    // 3. Similar title within the recent window
    const since = new Date(this.now().getTime() - this.config.windowDays * DAY_MS).toISOString();
    const recent = await this.store.listRecentItems({
      statuses: this.config.statuses,
      since,
      limit: this.config.windowSize,
    });

    for (const item of recent) {
      const similarity = titleSimilarity(candidate.title, item.title);
      if (similarity >= this.config.similarityThreshold) {
        log.debug('Similar title found', {
          title: candidate.title.slice(0, 50),
          similarTo: item.id,
          similarity: Math.round(similarity * 1000) / 1000,
        });
        return {
          outcome: 'duplicate',
          reason: `similar to item ${item.id}`,
          canonicalUrl,
          fingerprint: contentHash,
        };
      }
    }

    return { outcome: 'new', canonicalUrl, fingerprint: contentHash };
  }

  /**
   * Persist a non-new verdict so the URL is skipped cheaply next time.
   * An existing SeenRecord for the URL is left as it is.
   */
  async recordOutcome(candidate: CandidateItem, resolution: Resolution): Promise<SeenRecord | null> {
    if (resolution.outcome !== 'duplicate') return null;

    const existing = await this.store.findSeenRecord(resolution.canonicalUrl);
    if (existing) return existing;

    return this.store.upsertSeenRecord(
      {
        canonicalUrl: resolution.canonicalUrl,
        originalUrl: candidate.url,
        fingerprint: resolution.fingerprint,
        status: 'duplicate',
        reason: resolution.reason,
      },
      this.now().toISOString()
    );
  }
}
