/**
 * Tests for applying moderation decisions
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { applyModeration } from '../../src/pipeline/moderation';
import { MemoryItemStore } from '../../src/db/memory';
import type { StatusUpdate } from '../../src/db/store';
import type { TrackedItem } from '../../src/types';
import { createMockItem } from '../helpers';

/**
 * Store where another moderator always wins the race.
 */
class RacingStore extends MemoryItemStore {
  async updateStatus(update: StatusUpdate): Promise<TrackedItem | null> {
    await super.updateStatus({ ...update, to: 'rejected' });
    return null;
  }
}

describe('applyModeration', () => {
  let store: MemoryItemStore;

  beforeEach(() => {
    store = new MemoryItemStore();
    store.insertItem(createMockItem({ id: 'p1', status: 'pending' }));
  });

  it('should approve a pending item', async () => {
    const result = await applyModeration(store, 'p1', 'approve', 'U123');

    expect(result.status).toBe('ok');
    expect((await store.getItem('p1'))?.status).toBe('approved');
  });

  it('should reject a pending item', async () => {
    const result = await applyModeration(store, 'p1', 'reject');

    expect(result).toMatchObject({ status: 'ok', item: { id: 'p1', status: 'rejected' } });
  });

  it('should report unknown items', async () => {
    expect(await applyModeration(store, 'missing', 'approve')).toEqual({
      status: 'not_found',
      itemId: 'missing',
    });
  });

  it('should refuse to decide twice', async () => {
    await applyModeration(store, 'p1', 'approve');

    const result = await applyModeration(store, 'p1', 'reject');

    expect(result).toMatchObject({ status: 'invalid_transition', item: { status: 'approved' } });
    expect((await store.getItem('p1'))?.status).toBe('approved');
  });

  it('should report the winning status when another moderator got there first', async () => {
    const racing = new RacingStore();
    racing.insertItem(createMockItem({ id: 'p1', status: 'pending' }));

    const result = await applyModeration(racing, 'p1', 'approve');

    expect(result).toMatchObject({ status: 'invalid_transition', item: { status: 'rejected' } });
  });
});
