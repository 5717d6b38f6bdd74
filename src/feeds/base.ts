/**
 * Feedgate — Feed Source Base
 *
 * Abstract base class for all feed sources.
 * Each source implements `fetch` and is built from a source descriptor.
 */

import type { CandidateItem, SourceType } from '../types';
import type { SourceDescriptor } from '../lib/config';
import { logger, errorMessage, type Logger } from '../lib/logger';

export const USER_AGENT = 'feedgate/1.0';
export const DEFAULT_MAX_ITEMS = 20;

export interface SourceFetchResult {
  sourceName: string;
  items: CandidateItem[];
  durationMs: number;
  error?: string;
}

/**
 * Abstract base class for feed sources.
 */
export abstract class FeedSource {
  abstract readonly type: SourceType;

  readonly name: string;
  readonly maxItems: number;
  readonly minScore?: number;
  readonly requireMedia: boolean;

  protected readonly logger: Logger;

  constructor(descriptor: Pick<SourceDescriptor, 'name' | 'maxItems' | 'minScore' | 'requireMedia'>) {
    this.name = descriptor.name;
    this.maxItems = descriptor.maxItems ?? DEFAULT_MAX_ITEMS;
    this.minScore = descriptor.minScore;
    this.requireMedia = descriptor.requireMedia;
    this.logger = logger.child({ source: descriptor.name });
  }

  /**
   * Fetch candidates from the source, newest or hottest first.
   * Must be implemented by each source.
   */
  abstract fetch(): Promise<CandidateItem[]>;

  /**
   * Source-level pre-filter applied before any paid call.
   * Returns the irrelevance reason, or null when the candidate may proceed.
   */
  prefilter(candidate: CandidateItem): string | null {
    if (this.requireMedia && !candidate.mediaUrl) return 'no media';
    if (this.minScore !== undefined && (candidate.score ?? 0) < this.minScore) {
      return 'low score';
    }
    return null;
  }

  /**
   * Execute fetch with error handling and logging.
   */
  async safeFetch(): Promise<SourceFetchResult> {
    const startTime = Date.now();
    this.logger.debug('Starting fetch');

    try {
      const items = (await this.fetch()).slice(0, this.maxItems);
      const durationMs = Date.now() - startTime;

      this.logger.info('Fetch completed', { itemsFound: items.length, durationMs });

      return { sourceName: this.name, items, durationMs };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error('Fetch failed', { error: message });

      return {
        sourceName: this.name,
        items: [],
        durationMs: Date.now() - startTime,
        error: message,
      };
    }
  }
}
