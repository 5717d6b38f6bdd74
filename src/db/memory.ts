/**
 * Feedgate — In-Memory Item Store
 *
 * Process-local ItemStore used for dry runs and tests.
 * Enforces the same unique canonical-URL constraint as the database.
 */

import { nanoid } from 'nanoid';
import type {
  TrackedItem,
  CreateTrackedItemInput,
  SeenRecord,
  UpsertSeenRecordInput,
  ItemStatus,
} from '../types';
import { DuplicateItemError } from '../lib/errors';
import type { ItemStore, RecentItemsQuery, StatusUpdate } from './store';

function byCreation(a: TrackedItem, b: TrackedItem): number {
  const diff = Date.parse(a.createdAt) - Date.parse(b.createdAt);
  if (diff !== 0) return diff;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export class MemoryItemStore implements ItemStore {
  private readonly items = new Map<string, TrackedItem>();
  private readonly seen = new Map<string, SeenRecord>();
  private readonly generateId: () => string;

  constructor(options: { generateId?: () => string } = {}) {
    this.generateId = options.generateId ?? (() => nanoid());
  }

  /** Seed an item as-is (tests and fixtures). */
  insertItem(item: TrackedItem): void {
    this.items.set(item.id, { ...item });
  }

  allItems(): TrackedItem[] {
    return [...this.items.values()].sort(byCreation).map(item => ({ ...item }));
  }

  allSeenRecords(): SeenRecord[] {
    return [...this.seen.values()].map(record => ({ ...record }));
  }

  async getItem(id: string): Promise<TrackedItem | null> {
    const item = this.items.get(id);
    return item ? { ...item } : null;
  }

  async findItemByCanonicalUrl(canonicalUrl: string): Promise<TrackedItem | null> {
    for (const item of this.items.values()) {
      if (item.canonicalUrl === canonicalUrl) return { ...item };
    }
    return null;
  }

  async createItem(input: CreateTrackedItemInput, createdAt: string): Promise<TrackedItem> {
    if (await this.findItemByCanonicalUrl(input.canonicalUrl)) {
      throw new DuplicateItemError(input.canonicalUrl);
    }

    const item: TrackedItem = {
      ...input,
      id: this.generateId(),
      status: 'pending',
      createdAt,
      publishedAt: null,
    };
    this.items.set(item.id, item);
    return { ...item };
  }

  async updateStatus(update: StatusUpdate): Promise<TrackedItem | null> {
    const item = this.items.get(update.id);
    if (!item || item.status !== update.from) return null;

    const updated: TrackedItem = {
      ...item,
      status: update.to,
      publishedAt: update.to === 'published' ? update.publishedAt ?? null : item.publishedAt,
    };
    this.items.set(updated.id, updated);
    return { ...updated };
  }

  async listRecentItems(query: RecentItemsQuery): Promise<TrackedItem[]> {
    const since = Date.parse(query.since);
    const statuses = new Set(query.statuses);

    return [...this.items.values()]
      .filter(item => statuses.has(item.status) && Date.parse(item.createdAt) >= since)
      .sort((a, b) => byCreation(b, a))
      .slice(0, query.limit)
      .map(item => ({ ...item }));
  }

  async listItemsByStatus(status: ItemStatus): Promise<TrackedItem[]> {
    return [...this.items.values()]
      .filter(item => item.status === status)
      .sort(byCreation)
      .map(item => ({ ...item }));
  }

  async countByStatus(status: ItemStatus): Promise<number> {
    let count = 0;
    for (const item of this.items.values()) {
      if (item.status === status) count++;
    }
    return count;
  }

  async nextApproved(): Promise<TrackedItem | null> {
    const [first] = await this.listItemsByStatus('approved');
    return first ?? null;
  }

  async lastPublishedAt(): Promise<string | null> {
    let latest: string | null = null;
    for (const item of this.items.values()) {
      if (item.status !== 'published' || !item.publishedAt) continue;
      if (latest === null || Date.parse(item.publishedAt) > Date.parse(latest)) {
        latest = item.publishedAt;
      }
    }
    return latest;
  }

  async findSeenRecord(canonicalUrl: string): Promise<SeenRecord | null> {
    const record = this.seen.get(canonicalUrl);
    return record ? { ...record } : null;
  }

  async upsertSeenRecord(input: UpsertSeenRecordInput, createdAt: string): Promise<SeenRecord> {
    const existing = this.seen.get(input.canonicalUrl);
    const record: SeenRecord = existing
      ? { ...existing, status: input.status, reason: input.reason, fingerprint: input.fingerprint }
      : { ...input, createdAt };
    this.seen.set(record.canonicalUrl, record);
    return { ...record };
  }

  async pruneSeenRecords(before: string): Promise<number> {
    const cutoff = Date.parse(before);
    let removed = 0;
    for (const [key, record] of this.seen) {
      if (Date.parse(record.createdAt) < cutoff) {
        this.seen.delete(key);
        removed++;
      }
    }
    return removed;
  }

  async fingerprintExists(fingerprint: string): Promise<boolean> {
    for (const item of this.items.values()) {
      if (item.fingerprint === fingerprint) return true;
    }
    for (const record of this.seen.values()) {
      if (record.fingerprint === fingerprint) return true;
    }
    return false;
  }
}
