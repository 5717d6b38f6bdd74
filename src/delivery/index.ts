/**
 * Feedgate — Delivery
 *
 * Outbound surfaces: the broadcast channel that receives published
 * posts, and the operator channel that receives approval requests,
 * notices and cycle summaries.
 */

import type { TrackedItem, IngestionReport } from '../types';

export type DeliveryResult =
  | { success: true; mediaError?: string }
  | { success: false; error: string };

export interface Broadcaster {
  /** Publish one item. Never throws; failures are returned. */
  deliver(item: TrackedItem): Promise<DeliveryResult>;
}

/**
 * Best effort: implementations log failures and never throw.
 */
export interface OperatorChannel {
  requestApproval(item: TrackedItem): Promise<void>;
  notify(text: string): Promise<void>;
  sendCycleSummary(report: IngestionReport): Promise<void>;
}

export * from './slack';
