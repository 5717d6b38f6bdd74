/**
 * Feedgate — Publish Gate
 *
 * At most one publication per evaluation, spaced by a minimum gap.
 * Approved items go out in approval-queue order (oldest first).
 */

import type { PublishOutcome } from '../types';
import type { ItemStore } from '../db/store';
import type { Broadcaster } from '../delivery';
import { assertTransition } from './lifecycle';
import { logger } from '../lib/logger';

const log = logger.child({ component: 'publish-gate' });

/**
 * True when nothing was ever published or the gap has fully elapsed.
 */
export function mayPublishNow(lastPublishedAt: Date | null, minGapMs: number, now: Date): boolean {
  if (!lastPublishedAt) return true;
  return now.getTime() - lastPublishedAt.getTime() >= minGapMs;
}

export interface PublishDeps {
  store: ItemStore;
  broadcaster: Broadcaster;
  minGapMs: number;
  now?: () => Date;
}

/**
 * Evaluate the gate once and publish the next approved item if allowed.
 */
export async function publishNext(deps: PublishDeps): Promise<PublishOutcome> {
  const now = (deps.now ?? (() => new Date()))();

  const last = await deps.store.lastPublishedAt();
  const lastDate = last ? new Date(last) : null;
  if (!mayPublishNow(lastDate, deps.minGapMs, now)) {
    const nextAllowedAt = new Date((lastDate?.getTime() ?? now.getTime()) + deps.minGapMs);
    return { status: 'throttled', nextAllowedAt: nextAllowedAt.toISOString() };
  }

  const item = await deps.store.nextApproved();
  if (!item) return { status: 'idle' };

  assertTransition(item.status, 'published');

  const delivery = await deps.broadcaster.deliver(item);
  if (!delivery.success) {
    log.error('Failed to publish item', { itemId: item.id, error: delivery.error });
    return { status: 'delivery_failed', itemId: item.id, error: delivery.error };
  }

  // publishedAt never goes backwards, even if the clock does.
  const publishedAt = new Date(Math.max(now.getTime(), lastDate?.getTime() ?? 0)).toISOString();
  const published = await deps.store.updateStatus({
    id: item.id,
    from: 'approved',
    to: 'published',
    publishedAt,
  });

  if (!published) {
    log.warn('Item changed status during publish', { itemId: item.id });
    return { status: 'delivery_failed', itemId: item.id, error: 'Item no longer approved' };
  }

  log.info('Published', { itemId: published.id, title: published.title.slice(0, 50), publishedAt });
  return { status: 'published', item: published };
}
