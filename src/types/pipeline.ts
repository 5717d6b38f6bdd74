/**
 * Feedgate — Pipeline Types
 *
 * Outcomes and reports exchanged between the ingestion cycle,
 * the publish gate and the scheduler.
 */

import type { TrackedItem } from './item';

// ============================================================
// DUPLICATE RESOLUTION
// ============================================================

export type Resolution =
  | { outcome: 'new'; canonicalUrl: string; fingerprint: string }
  | { outcome: 'duplicate'; reason: string; canonicalUrl: string; fingerprint: string }
  | { outcome: 'failed_previously'; reason: string; canonicalUrl: string; fingerprint: string };

export type ResolutionOutcome = Resolution['outcome'];

// ============================================================
// INGESTION
// ============================================================

/**
 * Token and call counters for one ingestion cycle.
 */
export interface CycleUsage {
  classifyCalls: number;
  rewriteCalls: number;
  inputTokens: number;
  outputTokens: number;
}

export interface IngestionReport {
  newItems: number;
  duplicates: number;
  irrelevant: number;
  failed: number;
  /** Candidates left unprocessed after the per-cycle cap was hit. */
  remaining: number;
  processed: number;
  totalCandidates: number;
  sourceErrors: string[];
  usage: CycleUsage;
  durationMs: number;
  completedAt: string;
}

// ============================================================
// PUBLISHING
// ============================================================

export type PublishOutcome =
  | { status: 'throttled'; nextAllowedAt: string }
  | { status: 'idle' }
  | { status: 'delivery_failed'; itemId: string; error: string }
  | { status: 'published'; item: TrackedItem };

// ============================================================
// MODERATION
// ============================================================

export type ModerationDecision = 'approve' | 'reject';

export type ModerationResult =
  | { status: 'ok'; item: TrackedItem }
  | { status: 'not_found'; itemId: string }
  | { status: 'invalid_transition'; item: TrackedItem };

// ============================================================
// SCHEDULER COMMANDS
// ============================================================

export type SchedulerCommand =
  | { type: 'fetch_now'; requestedBy?: string }
  | { type: 'resend_pending'; requestedBy?: string };
