/**
 * Feedgate — Moderation
 *
 * Applies an operator's approve/reject decision to a pending item.
 */

import type { ModerationDecision, ModerationResult } from '../types';
import type { ItemStore } from '../db/store';
import { canTransition } from './lifecycle';
import { logger } from '../lib/logger';

const TARGET_STATUS = {
  approve: 'approved',
  reject: 'rejected',
} as const;

export async function applyModeration(
  store: ItemStore,
  itemId: string,
  decision: ModerationDecision,
  moderator?: string
): Promise<ModerationResult> {
  const item = await store.getItem(itemId);
  if (!item) {
    return { status: 'not_found', itemId };
  }

  const to = TARGET_STATUS[decision];
  if (!canTransition(item.status, to)) {
    return { status: 'invalid_transition', item };
  }

  const updated = await store.updateStatus({ id: itemId, from: item.status, to });
  if (!updated) {
    // Someone else moved it between the read and the write.
    const current = await store.getItem(itemId);
    return current ? { status: 'invalid_transition', item: current } : { status: 'not_found', itemId };
  }

  logger.info('Moderation applied', { itemId, decision, moderator, title: updated.title.slice(0, 50) });
  return { status: 'ok', item: updated };
}
