/**
 * Tests for the in-memory item store
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { MemoryItemStore } from '../../src/db/memory';
import { DuplicateItemError } from '../../src/lib/errors';
import type { CreateTrackedItemInput } from '../../src/types';
import { createMockItem } from '../helpers';

const input = (overrides: Partial<CreateTrackedItemInput> = {}): CreateTrackedItemInput => ({
  sourceName: 'Test Feed',
  originalUrl: 'https://example.com/a?utm_source=x',
  canonicalUrl: 'https://example.com/a',
  title: 'Title',
  summary: 'Summary',
  fingerprint: 'fp-a',
  mediaUrl: null,
  localMediaPath: null,
  mediaKind: 'image',
  rewrittenContent: 'Post',
  ...overrides,
});

describe('MemoryItemStore', () => {
  let store: MemoryItemStore;
  let nextId: number;

  beforeEach(() => {
    nextId = 0;
    store = new MemoryItemStore({ generateId: () => `id-${++nextId}` });
  });

  describe('createItem', () => {
    it('should create pending items with generated ids', async () => {
      const item = await store.createItem(input(), '2026-01-01T00:00:00.000Z');

      expect(item).toMatchObject({
        id: 'id-1',
        status: 'pending',
        createdAt: '2026-01-01T00:00:00.000Z',
        publishedAt: null,
      });
      expect(await store.getItem('id-1')).toEqual(item);
    });

    it('should enforce a unique canonical URL', async () => {
      await store.createItem(input(), '2026-01-01T00:00:00.000Z');

      await expect(
        store.createItem(input({ originalUrl: 'https://example.com/a' }), '2026-01-02T00:00:00.000Z')
      ).rejects.toBeInstanceOf(DuplicateItemError);
    });

    it('should return copies', async () => {
      const item = await store.createItem(input(), '2026-01-01T00:00:00.000Z');
      item.title = 'Changed';

      expect((await store.getItem(item.id))?.title).toBe('Title');
    });
  });

  describe('updateStatus', () => {
    it('should apply when the current status matches', async () => {
      store.insertItem(createMockItem({ id: 'x', status: 'pending' }));

      const updated = await store.updateStatus({ id: 'x', from: 'pending', to: 'approved' });

      expect(updated?.status).toBe('approved');
      expect(updated?.publishedAt).toBeNull();
    });

    it('should return null when the status has moved on', async () => {
      store.insertItem(createMockItem({ id: 'x', status: 'rejected' }));

      expect(await store.updateStatus({ id: 'x', from: 'pending', to: 'approved' })).toBeNull();
      expect((await store.getItem('x'))?.status).toBe('rejected');
    });

    it('should set publishedAt when publishing', async () => {
      store.insertItem(createMockItem({ id: 'x', status: 'approved' }));

      const updated = await store.updateStatus({
        id: 'x',
        from: 'approved',
        to: 'published',
        publishedAt: '2026-01-05T00:00:00.000Z',
      });

      expect(updated?.publishedAt).toBe('2026-01-05T00:00:00.000Z');
      expect(await store.lastPublishedAt()).toBe('2026-01-05T00:00:00.000Z');
    });

    it('should return null for unknown ids', async () => {
      expect(await store.updateStatus({ id: 'nope', from: 'pending', to: 'approved' })).toBeNull();
    });
  });

  describe('queries', () => {
    beforeEach(() => {
      store.insertItem(createMockItem({ id: 'b', canonicalUrl: 'u-b', status: 'approved', createdAt: '2026-01-02T00:00:00.000Z' }));
      store.insertItem(createMockItem({ id: 'a', canonicalUrl: 'u-a', status: 'approved', createdAt: '2026-01-02T00:00:00.000Z' }));
      store.insertItem(createMockItem({ id: 'c', canonicalUrl: 'u-c', status: 'approved', createdAt: '2026-01-01T00:00:00.000Z' }));
      store.insertItem(createMockItem({ id: 'd', canonicalUrl: 'u-d', status: 'pending', createdAt: '2026-01-03T00:00:00.000Z' }));
    });

    it('should return the oldest approved item, ties broken by id', async () => {
      expect((await store.nextApproved())?.id).toBe('c');
      expect((await store.listItemsByStatus('approved')).map(i => i.id)).toEqual(['c', 'a', 'b']);
    });

    it('should count by status', async () => {
      expect(await store.countByStatus('approved')).toBe(3);
      expect(await store.countByStatus('pending')).toBe(1);
      expect(await store.countByStatus('published')).toBe(0);
    });

    it('should list recent items newest first within the window', async () => {
      const recent = await store.listRecentItems({
        statuses: ['approved', 'pending'],
        since: '2026-01-02T00:00:00.000Z',
        limit: 2,
      });
      expect(recent.map(i => i.id)).toEqual(['d', 'b']);
    });

    it('should return null when nothing was published', async () => {
      expect(await store.lastPublishedAt()).toBeNull();
    });
  });

  describe('seen records', () => {
    const seen = {
      canonicalUrl: 'https://example.com/s',
      originalUrl: 'https://example.com/s',
      fingerprint: 'fp-s',
      status: 'irrelevant' as const,
      reason: 'off topic',
    };

    it('should keep the first createdAt on update', async () => {
      await store.upsertSeenRecord(seen, '2026-01-01T00:00:00.000Z');
      const updated = await store.upsertSeenRecord(
        { ...seen, status: 'failed', reason: 'boom' },
        '2026-02-01T00:00:00.000Z'
      );

      expect(updated).toEqual({ ...seen, status: 'failed', reason: 'boom', createdAt: '2026-01-01T00:00:00.000Z' });
      expect(store.allSeenRecords()).toHaveLength(1);
    });

    it('should prune records created before the cutoff', async () => {
      await store.upsertSeenRecord(seen, '2026-01-01T00:00:00.000Z');
      await store.upsertSeenRecord({ ...seen, canonicalUrl: 'https://example.com/t' }, '2026-03-01T00:00:00.000Z');

      expect(await store.pruneSeenRecords('2026-02-01T00:00:00.000Z')).toBe(1);
      expect(store.allSeenRecords().map(r => r.canonicalUrl)).toEqual(['https://example.com/t']);
    });

    it('should find fingerprints in either table', async () => {
      store.insertItem(createMockItem({ fingerprint: 'fp-item' }));
      await store.upsertSeenRecord(seen, '2026-01-01T00:00:00.000Z');

      expect(await store.fingerprintExists('fp-item')).toBe(true);
      expect(await store.fingerprintExists('fp-s')).toBe(true);
      expect(await store.fingerprintExists('fp-none')).toBe(false);
    });
  });
});
