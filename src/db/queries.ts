/**
 * Feedgate — Database Queries
 *
 * ItemStore backed by the `tracked_items` and `seen_records` tables.
 * Rows are validated with zod on the way out of the database.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { nanoid } from 'nanoid';
import { z } from 'zod';
import {
  TrackedItemRowSchema,
  SeenRecordRowSchema,
  type TrackedItem,
  type TrackedItemRow,
  type CreateTrackedItemInput,
  type SeenRecord,
  type SeenRecordRow,
  type UpsertSeenRecordInput,
  type ItemStatus,
} from '../types';
import { DuplicateItemError } from '../lib/errors';
import { handleSupabaseError, isUniqueViolation } from './client';
import type { ItemStore, RecentItemsQuery, StatusUpdate } from './store';

const ITEMS = 'tracked_items';
const SEEN = 'seen_records';

// ============================================================
// ROW MAPPING
// ============================================================

export function toTrackedItem(row: TrackedItemRow): TrackedItem {
  return {
    id: row.id,
    sourceName: row.source_name,
    originalUrl: row.original_url,
    canonicalUrl: row.canonical_url,
    title: row.title,
    summary: row.summary,
    fingerprint: row.fingerprint,
    mediaUrl: row.media_url,
    localMediaPath: row.local_media_path,
    mediaKind: row.media_kind,
    rewrittenContent: row.rewritten_content,
    status: row.status,
    createdAt: row.created_at,
    publishedAt: row.published_at,
  };
}

export function toTrackedItemRow(item: TrackedItem): TrackedItemRow {
  return {
    id: item.id,
    source_name: item.sourceName,
    original_url: item.originalUrl,
    canonical_url: item.canonicalUrl,
    title: item.title,
    summary: item.summary,
    fingerprint: item.fingerprint,
    media_url: item.mediaUrl,
    local_media_path: item.localMediaPath,
    media_kind: item.mediaKind,
    rewritten_content: item.rewrittenContent,
    status: item.status,
    created_at: item.createdAt,
    published_at: item.publishedAt,
  };
}

export function toSeenRecord(row: SeenRecordRow): SeenRecord {
  return {
    canonicalUrl: row.canonical_url,
    originalUrl: row.original_url,
    fingerprint: row.fingerprint,
    status: row.status,
    reason: row.reason,
    createdAt: row.created_at,
  };
}

function parseItem(data: unknown): TrackedItem {
  return toTrackedItem(TrackedItemRowSchema.parse(data));
}

function parseItems(data: unknown): TrackedItem[] {
  return z.array(TrackedItemRowSchema).parse(data ?? []).map(toTrackedItem);
}

function parseSeen(data: unknown): SeenRecord {
  return toSeenRecord(SeenRecordRowSchema.parse(data));
}

// ============================================================
// STORE
// ============================================================

export class SupabaseItemStore implements ItemStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly generateId: () => string = () => nanoid()
  ) {}

  // ---------- tracked items ----------

  async getItem(id: string): Promise<TrackedItem | null> {
    const { data, error } = await this.client
      .from(ITEMS)
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) throw handleSupabaseError(error);
    return data ? parseItem(data) : null;
  }

  async findItemByCanonicalUrl(canonicalUrl: string): Promise<TrackedItem | null> {
    const { data, error } = await this.client
      .from(ITEMS)
      .select('*')
      .eq('canonical_url', canonicalUrl)
      .maybeSingle();

    if (error) throw handleSupabaseError(error);
    return data ? parseItem(data) : null;
  }

  async createItem(input: CreateTrackedItemInput, createdAt: string): Promise<TrackedItem> {
    const row = toTrackedItemRow({
      ...input,
      id: this.generateId(),
      status: 'pending',
      createdAt,
      publishedAt: null,
    });

    const { data, error } = await this.client
      .from(ITEMS)
      .insert(row)
      .select()
      .single();

    if (error) {
      if (isUniqueViolation(error)) throw new DuplicateItemError(input.canonicalUrl);
      throw handleSupabaseError(error);
    }
    return parseItem(data);
  }

  async updateStatus(update: StatusUpdate): Promise<TrackedItem | null> {
    const changes: Partial<TrackedItemRow> = { status: update.to };
    if (update.to === 'published') {
      changes.published_at = update.publishedAt ?? new Date().toISOString();
    }

    const { data, error } = await this.client
      .from(ITEMS)
      .update(changes)
      .eq('id', update.id)
      .eq('status', update.from)
      .select()
      .maybeSingle();

    if (error) throw handleSupabaseError(error);
    return data ? parseItem(data) : null;
  }

  async listRecentItems(query: RecentItemsQuery): Promise<TrackedItem[]> {
    if (query.statuses.length === 0 || query.limit <= 0) return [];

    const { data, error } = await this.client
      .from(ITEMS)
      .select('*')
      .in('status', query.statuses)
      .gte('created_at', query.since)
      .order('created_at', { ascending: false })
      .order('id', { ascending: false })
      .limit(query.limit);

    if (error) throw handleSupabaseError(error);
    return parseItems(data);
  }

  async listItemsByStatus(status: ItemStatus): Promise<TrackedItem[]> {
    const { data, error } = await this.client
      .from(ITEMS)
      .select('*')
      .eq('status', status)
      .order('created_at', { ascending: true })
      .order('id', { ascending: true });

    if (error) throw handleSupabaseError(error);
    return parseItems(data);
  }

  async countByStatus(status: ItemStatus): Promise<number> {
    const { count, error } = await this.client
      .from(ITEMS)
      .select('id', { count: 'exact', head: true })
      .eq('status', status);

    if (error) throw handleSupabaseError(error);
    return count ?? 0;
  }

  async nextApproved(): Promise<TrackedItem | null> {
    const { data, error } = await this.client
      .from(ITEMS)
      .select('*')
      .eq('status', 'approved')
      .order('created_at', { ascending: true })
      .order('id', { ascending: true })
      .limit(1);

    if (error) throw handleSupabaseError(error);
    const [first] = parseItems(data);
    return first ?? null;
  }

  async lastPublishedAt(): Promise<string | null> {
    const { data, error } = await this.client
      .from(ITEMS)
      .select('published_at')
      .eq('status', 'published')
      .not('published_at', 'is', null)
      .order('published_at', { ascending: false })
      .limit(1);

    if (error) throw handleSupabaseError(error);
    const rows = z.array(z.object({ published_at: z.string() })).parse(data ?? []);
    return rows[0]?.published_at ?? null;
  }

  // ---------- seen records ----------

  async findSeenRecord(canonicalUrl: string): Promise<SeenRecord | null> {
    const { data, error } = await this.client
      .from(SEEN)
      .select('*')
      .eq('canonical_url', canonicalUrl)
      .maybeSingle();

    if (error) throw handleSupabaseError(error);
    return data ? parseSeen(data) : null;
  }

  async upsertSeenRecord(input: UpsertSeenRecordInput, createdAt: string): Promise<SeenRecord> {
    const inserted = await this.client
      .from(SEEN)
      .insert({
        canonical_url: input.canonicalUrl,
        original_url: input.originalUrl,
        fingerprint: input.fingerprint,
        status: input.status,
        reason: input.reason,
        created_at: createdAt,
      })
      .select()
      .single();

    if (!inserted.error) return parseSeen(inserted.data);
    if (!isUniqueViolation(inserted.error)) throw handleSupabaseError(inserted.error);

    // Already screened: keep created_at, refresh the verdict.
    const { data, error } = await this.client
      .from(SEEN)
      .update({
        status: input.status,
        reason: input.reason,
        fingerprint: input.fingerprint,
      })
      .eq('canonical_url', input.canonicalUrl)
      .select()
      .single();

    if (error) throw handleSupabaseError(error);
    return parseSeen(data);
  }

  async pruneSeenRecords(before: string): Promise<number> {
    const { count, error } = await this.client
      .from(SEEN)
      .delete({ count: 'exact' })
      .lt('created_at', before);

    if (error) throw handleSupabaseError(error);
    return count ?? 0;
  }

  async fingerprintExists(fingerprint: string): Promise<boolean> {
    for (const table of [ITEMS, SEEN]) {
      const { count, error } = await this.client
        .from(table)
        .select('fingerprint', { count: 'exact', head: true })
        .eq('fingerprint', fingerprint);

      if (error) throw handleSupabaseError(error);
      if ((count ?? 0) > 0) return true;
    }
    return false;
  }
}
