/**
 * Feedgate — Item Types
 *
 * Candidates produced by feed sources, items tracked through the
 * moderation/publish lifecycle, and records of every URL ever screened.
 */

import { z } from 'zod';

// ============================================================
// ENUMS
// ============================================================

export const SourceTypeSchema = z.enum(['rss', 'reddit']);
export type SourceType = z.infer<typeof SourceTypeSchema>;

export const MediaKindSchema = z.enum(['image', 'video']);
export type MediaKind = z.infer<typeof MediaKindSchema>;

export const ItemStatusSchema = z.enum(['pending', 'approved', 'rejected', 'published']);
export type ItemStatus = z.infer<typeof ItemStatusSchema>;

export const SeenStatusSchema = z.enum(['duplicate', 'irrelevant', 'failed']);
export type SeenStatus = z.infer<typeof SeenStatusSchema>;

// ============================================================
// CANDIDATE ITEM
// ============================================================

/**
 * Item as produced by a source adapter. Never persisted.
 */
export interface CandidateItem {
  sourceName: string;
  sourceType: SourceType;
  url: string;
  title: string;
  body: string;
  mediaUrl?: string;
  /** Popularity signal (upvotes for Reddit). */
  score?: number;
  mediaKind: MediaKind;
}

// ============================================================
// TRACKED ITEM
// ============================================================

export interface TrackedItem {
  id: string;
  sourceName: string;
  originalUrl: string;
  canonicalUrl: string;
  title: string;
  summary: string;
  fingerprint: string;
  mediaUrl: string | null;
  localMediaPath: string | null;
  mediaKind: MediaKind;
  rewrittenContent: string;
  status: ItemStatus;
  createdAt: string;
  /** Set if and only if status is 'published'. */
  publishedAt: string | null;
}

export type CreateTrackedItemInput = Omit<
  TrackedItem,
  'id' | 'status' | 'createdAt' | 'publishedAt'
>;

// ============================================================
// SEEN RECORD
// ============================================================

export interface SeenRecord {
  canonicalUrl: string;
  originalUrl: string;
  fingerprint: string | null;
  status: SeenStatus;
  reason: string;
  createdAt: string;
}

export type UpsertSeenRecordInput = Omit<SeenRecord, 'createdAt'>;

// ============================================================
// DATABASE ROWS
// ============================================================

export const TrackedItemRowSchema = z.object({
  id: z.string(),
  source_name: z.string(),
  original_url: z.string(),
  canonical_url: z.string(),
  title: z.string(),
  summary: z.string(),
  fingerprint: z.string(),
  media_url: z.string().nullable(),
  local_media_path: z.string().nullable(),
  media_kind: MediaKindSchema,
  rewritten_content: z.string(),
  status: ItemStatusSchema,
  created_at: z.string(),
  published_at: z.string().nullable(),
});
export type TrackedItemRow = z.infer<typeof TrackedItemRowSchema>;

export const SeenRecordRowSchema = z.object({
  canonical_url: z.string(),
  original_url: z.string(),
  fingerprint: z.string().nullable(),
  status: SeenStatusSchema,
  reason: z.string(),
  created_at: z.string(),
});
export type SeenRecordRow = z.infer<typeof SeenRecordRowSchema>;
