/**
 * Feedgate — Item Store
 *
 * Persisted-state surface of the pipeline: tracked items keyed by id
 * with a unique canonical URL, and seen records keyed by canonical URL.
 */

import type {
  TrackedItem,
  CreateTrackedItemInput,
  SeenRecord,
  UpsertSeenRecordInput,
  ItemStatus,
} from '../types';

export interface RecentItemsQuery {
  statuses: ItemStatus[];
  /** ISO timestamp; only items created at or after it. */
  since: string;
  limit: number;
}

export interface StatusUpdate {
  id: string;
  /** Compare-and-set: the update only applies while the item has this status. */
  from: ItemStatus;
  to: ItemStatus;
  publishedAt?: string;
}

export interface ItemStore {
  // Tracked items
  getItem(id: string): Promise<TrackedItem | null>;
  findItemByCanonicalUrl(canonicalUrl: string): Promise<TrackedItem | null>;
  /** Throws DuplicateItemError when the canonical URL is taken. */
  createItem(input: CreateTrackedItemInput, createdAt: string): Promise<TrackedItem>;
  /** Returns null when the item is missing or no longer has `from` status. */
  updateStatus(update: StatusUpdate): Promise<TrackedItem | null>;
  /** Newest first. */
  listRecentItems(query: RecentItemsQuery): Promise<TrackedItem[]>;
  /** Oldest first (created_at, then id). */
  listItemsByStatus(status: ItemStatus): Promise<TrackedItem[]>;
  countByStatus(status: ItemStatus): Promise<number>;
  /** Oldest approved item by created_at, ties broken by id. */
  nextApproved(): Promise<TrackedItem | null>;
  lastPublishedAt(): Promise<string | null>;

  // Seen records
  findSeenRecord(canonicalUrl: string): Promise<SeenRecord | null>;
  /** Inserts, or updates status/reason/fingerprint of the existing record. */
  upsertSeenRecord(input: UpsertSeenRecordInput, createdAt: string): Promise<SeenRecord>;
  /** Deletes seen records created before `before`; returns how many. */
  pruneSeenRecords(before: string): Promise<number>;

  /** True when any tracked item or seen record carries the fingerprint. */
  fingerprintExists(fingerprint: string): Promise<boolean>;
}
