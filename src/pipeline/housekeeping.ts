/**
 * Feedgate — Housekeeping
 *
 * Daily pruning of old seen records and cached media.
 */

import type { ItemStore } from '../db/store';
import { evictMedia } from '../media/cache';
import { logger } from '../lib/logger';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface HousekeepingDeps {
  store: ItemStore;
  dataDir: string;
  seenRetentionDays: number;
  mediaRetentionDays: number;
  now?: () => Date;
}

export interface HousekeepingResult {
  seenRecordsPruned: number;
  mediaEvicted: number;
}

export async function runHousekeeping(deps: HousekeepingDeps): Promise<HousekeepingResult> {
  const now = (deps.now ?? (() => new Date()))();
  const cutoff = new Date(now.getTime() - deps.seenRetentionDays * DAY_MS).toISOString();

  const seenRecordsPruned = await deps.store.pruneSeenRecords(cutoff);
  const mediaEvicted = await evictMedia(deps.dataDir, deps.mediaRetentionDays, now);

  logger.info('Housekeeping done', { seenRecordsPruned, mediaEvicted, cutoff });
  return { seenRecordsPruned, mediaEvicted };
}
