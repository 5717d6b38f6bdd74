/**
 * Shared test factories and fakes.
 */

import { vi } from 'vitest';
import type { CandidateItem, IngestionReport, TrackedItem } from '../src/types';
import { FeedSource } from '../src/feeds/base';
import type { OperatorChannel } from '../src/delivery';

export const createMockCandidate = (overrides: Partial<CandidateItem> = {}): CandidateItem => ({
  sourceName: 'Test Feed',
  sourceType: 'rss',
  url: 'https://example.com/story',
  title: 'A story worth sharing',
  body: 'Story body text.',
  mediaUrl: 'https://cdn.example.com/images/story.jpg',
  mediaKind: 'image',
  ...overrides,
});

export const createMockItem = (overrides: Partial<TrackedItem> = {}): TrackedItem => ({
  id: 'item-1',
  sourceName: 'Test Feed',
  originalUrl: 'https://example.com/story',
  canonicalUrl: 'https://example.com/story',
  title: 'A story worth sharing',
  summary: 'Story body text.',
  fingerprint: 'fp-1',
  mediaUrl: null,
  localMediaPath: null,
  mediaKind: 'image',
  rewrittenContent: 'Rewritten story.',
  status: 'pending',
  createdAt: '2026-01-01T00:00:00.000Z',
  publishedAt: null,
  ...overrides,
});

export const createMockReport = (overrides: Partial<IngestionReport> = {}): IngestionReport => ({
  newItems: 0,
  duplicates: 0,
  irrelevant: 0,
  failed: 0,
  remaining: 0,
  processed: 0,
  totalCandidates: 0,
  sourceErrors: [],
  usage: { classifyCalls: 0, rewriteCalls: 0, inputTokens: 0, outputTokens: 0 },
  durationMs: 0,
  completedAt: '2026-01-01T00:00:00.000Z',
  ...overrides,
});

/**
 * Source that returns fixed candidates, or fails.
 */
export class StaticSource extends FeedSource {
  readonly type = 'rss' as const;

  constructor(
    name: string,
    private readonly items: CandidateItem[] | (() => Promise<CandidateItem[]>),
    options: { maxItems?: number; minScore?: number; requireMedia?: boolean } = {}
  ) {
    super({ ...options, name, requireMedia: options.requireMedia ?? false });
  }

  async fetch(): Promise<CandidateItem[]> {
    return typeof this.items === 'function' ? this.items() : this.items;
  }
}

export function createMockOperator() {
  return {
    requestApproval: vi.fn<OperatorChannel['requestApproval']>().mockResolvedValue(undefined),
    notify: vi.fn<OperatorChannel['notify']>().mockResolvedValue(undefined),
    sendCycleSummary: vi.fn<OperatorChannel['sendCycleSummary']>().mockResolvedValue(undefined),
  } satisfies OperatorChannel;
}
