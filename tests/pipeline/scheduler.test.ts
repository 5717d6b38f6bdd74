/**
 * Tests for the scheduler loop
 */

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { CommandQueue, Scheduler, type SchedulerDeps } from '../../src/pipeline/scheduler';
import { MemoryItemStore } from '../../src/db/memory';
import type { IngestionReport, PublishOutcome } from '../../src/types';
import { createMockItem, createMockOperator, createMockReport } from '../helpers';

const MINUTE = 60_000;
const HOUR = 60 * MINUTE;
const T0 = Date.parse('2026-03-01T12:00:00.000Z');

describe('CommandQueue', () => {
  it('should hand out queued commands once', () => {
    const queue = new CommandQueue();
    queue.enqueue({ type: 'fetch_now', requestedBy: 'U1' });
    queue.enqueue({ type: 'resend_pending' });

    expect(queue.size).toBe(2);
    expect(queue.drain().map(c => c.type)).toEqual(['fetch_now', 'resend_pending']);
    expect(queue.size).toBe(0);
    expect(queue.drain()).toEqual([]);
  });
});

describe('Scheduler', () => {
  let store: MemoryItemStore;
  let operator: ReturnType<typeof createMockOperator>;
  let commands: CommandQueue;
  let runIngestion: Mock<() => Promise<IngestionReport>>;
  let publish: Mock<() => Promise<PublishOutcome>>;
  let housekeeping: Mock<() => Promise<unknown>>;
  let sleep: Mock<(ms: number) => Promise<void>>;
  let clock: number;

  const createScheduler = (overrides: Partial<SchedulerDeps> = {}) =>
    new Scheduler({
      store,
      operator,
      commands,
      runIngestion,
      publish,
      housekeeping,
      now: () => clock,
      sleep,
      ...overrides,
    });

  beforeEach(() => {
    store = new MemoryItemStore();
    operator = createMockOperator();
    commands = new CommandQueue();
    runIngestion = vi.fn<() => Promise<IngestionReport>>().mockResolvedValue(createMockReport());
    publish = vi.fn<() => Promise<PublishOutcome>>().mockResolvedValue({ status: 'idle' });
    housekeeping = vi.fn<() => Promise<unknown>>().mockResolvedValue({});
    sleep = vi.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined);
    clock = T0;
  });

  describe('first tick', () => {
    it('should ingest, evaluate the publish gate and run housekeeping', async () => {
      const scheduler = createScheduler();

      await scheduler.tick();

      expect(runIngestion).toHaveBeenCalledTimes(1);
      expect(publish).toHaveBeenCalledTimes(1);
      expect(housekeeping).toHaveBeenCalledTimes(1);
    });
  });

  describe('ingestion triggers', () => {
    it('should wait for the fetch interval after a complete cycle', async () => {
      const scheduler = createScheduler();
      await scheduler.tick();

      clock = T0 + 2 * HOUR;
      await scheduler.tick();
      expect(runIngestion).toHaveBeenCalledTimes(1);

      clock = T0 + 3 * HOUR;
      expect(scheduler.ingestionTrigger(clock, true, false)).toBe('interval');
      await scheduler.tick();
      expect(runIngestion).toHaveBeenCalledTimes(2);
    });

    it('should come back sooner when candidates were left over', async () => {
      runIngestion.mockResolvedValueOnce(createMockReport({ remaining: 4 }));
      const scheduler = createScheduler();
      await scheduler.tick();

      clock = T0 + 4 * MINUTE;
      await scheduler.tick();
      expect(runIngestion).toHaveBeenCalledTimes(1);

      clock = T0 + 5 * MINUTE;
      expect(scheduler.ingestionTrigger(clock, true, false)).toBe('remaining');
      await scheduler.tick();
      expect(runIngestion).toHaveBeenCalledTimes(2);
    });

    it('should not ingest while items await review', async () => {
      store.insertItem(createMockItem({ id: 'waiting', status: 'pending' }));
      const scheduler = createScheduler();

      await scheduler.tick();
      clock = T0 + 4 * HOUR;
      await scheduler.tick();

      expect(runIngestion).not.toHaveBeenCalled();
      expect(publish).toHaveBeenCalledTimes(2);
      expect(scheduler.ingestionTrigger(clock, false, true)).toBeNull();
    });

    it('should ingest as soon as the review queue empties', async () => {
      store.insertItem(createMockItem({ id: 'waiting', status: 'pending' }));
      const scheduler = createScheduler();
      await scheduler.tick();

      await store.updateStatus({ id: 'waiting', from: 'pending', to: 'rejected' });
      clock = T0 + MINUTE;
      expect(scheduler.ingestionTrigger(clock, true, false)).toBe('queue_emptied');
      await scheduler.tick();

      expect(runIngestion).toHaveBeenCalledTimes(1);
    });
  });

  describe('commands', () => {
    it('should run a manual fetch when nothing awaits review', async () => {
      const scheduler = createScheduler();
      await scheduler.tick();

      commands.enqueue({ type: 'fetch_now', requestedBy: 'U1' });
      clock = T0 + MINUTE;
      await scheduler.tick();

      expect(runIngestion).toHaveBeenCalledTimes(2);
      expect(commands.size).toBe(0);
    });

    it('should skip a manual fetch and tell the operator when items await review', async () => {
      store.insertItem(createMockItem({ id: 'a', status: 'pending' }));
      store.insertItem(createMockItem({ id: 'b', status: 'pending', canonicalUrl: 'https://example.com/b' }));
      commands.enqueue({ type: 'fetch_now', requestedBy: 'U1' });
      const scheduler = createScheduler();

      await scheduler.tick();

      expect(runIngestion).not.toHaveBeenCalled();
      expect(operator.notify).toHaveBeenCalledWith('Manual fetch skipped: 2 item(s) still awaiting review.');
    });

    it('should resend every pending item with pacing between them', async () => {
      store.insertItem(createMockItem({ id: 'a', status: 'pending', createdAt: '2026-03-01T10:00:00.000Z' }));
      store.insertItem(createMockItem({ id: 'b', status: 'pending', createdAt: '2026-03-01T10:01:00.000Z' }));
      store.insertItem(createMockItem({ id: 'c', status: 'pending', createdAt: '2026-03-01T10:02:00.000Z' }));
      commands.enqueue({ type: 'resend_pending' });
      const scheduler = createScheduler();

      await scheduler.tick();

      expect(operator.requestApproval.mock.calls.map(([item]) => item.id)).toEqual(['a', 'b', 'c']);
      expect(sleep.mock.calls).toEqual([[500], [500]]);
    });

    it('should tell the operator when there is nothing to resend', async () => {
      commands.enqueue({ type: 'resend_pending' });
      const scheduler = createScheduler();

      await scheduler.tick();

      expect(operator.notify).toHaveBeenCalledWith('No items awaiting review.');
      expect(operator.requestApproval).not.toHaveBeenCalled();
    });
  });

  describe('isolation', () => {
    it('should keep publishing when ingestion fails', async () => {
      runIngestion.mockRejectedValueOnce(new Error('Source exploded'));
      const scheduler = createScheduler();

      await expect(scheduler.tick()).resolves.toBeUndefined();

      expect(publish).toHaveBeenCalledTimes(1);
      expect(housekeeping).toHaveBeenCalledTimes(1);
    });

    it('should keep ticking when housekeeping fails', async () => {
      housekeeping.mockRejectedValueOnce(new Error('Disk full'));
      const scheduler = createScheduler();

      await scheduler.tick();
      clock = T0 + MINUTE;
      await scheduler.tick();

      expect(publish).toHaveBeenCalledTimes(2);
    });
  });

  describe('housekeeping', () => {
    it('should run once a day', async () => {
      const scheduler = createScheduler();

      await scheduler.tick();
      clock = T0 + 12 * HOUR;
      await scheduler.tick();
      expect(housekeeping).toHaveBeenCalledTimes(1);

      clock = T0 + 24 * HOUR;
      await scheduler.tick();
      expect(housekeeping).toHaveBeenCalledTimes(2);
    });
  });

  describe('start/stop', () => {
    it('should tick right away and stop cleanly', async () => {
      const scheduler = createScheduler();

      scheduler.start();
      expect(scheduler.isRunning).toBe(true);
      await vi.waitFor(() => expect(publish).toHaveBeenCalledTimes(1));

      await scheduler.stop();
      expect(scheduler.isRunning).toBe(false);
      expect(runIngestion).toHaveBeenCalledTimes(1);
    });
  });
});
