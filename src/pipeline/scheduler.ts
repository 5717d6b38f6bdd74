/**
 * Feedgate — Scheduler
 *
 * One tick a minute. Each tick:
 *   (a) drains operator commands and decides whether to ingest
 *   (b) re-runs ingestion every few minutes while candidates remain
 *   (c) evaluates the publish gate once
 *   (d) runs daily housekeeping and an hourly heartbeat
 * Every responsibility is caught on its own, so one failing step never
 * stops the others or the loop.
 */

import type { IngestionReport, PublishOutcome, SchedulerCommand } from '../types';
import type { ItemStore } from '../db/store';
import type { OperatorChannel } from '../delivery';
import { logger, errorMessage } from '../lib/logger';

const log = logger.child({ component: 'scheduler' });

// ============================================================
// COMMAND QUEUE
// ============================================================

/**
 * Commands submitted from outside the loop (the moderation webhook),
 * consumed on the next tick.
 */
export class CommandQueue {
  private commands: SchedulerCommand[] = [];

  enqueue(command: SchedulerCommand): void {
    this.commands.push(command);
    log.info('Command queued', { type: command.type, requestedBy: command.requestedBy });
  }

  drain(): SchedulerCommand[] {
    const drained = this.commands;
    this.commands = [];
    return drained;
  }

  get size(): number {
    return this.commands.length;
  }
}

// ============================================================
// CONFIG
// ============================================================

export interface SchedulerOptions {
  tickIntervalMs?: number;
  fetchIntervalMs?: number;
  remainingIntervalMs?: number;
  housekeepingIntervalMs?: number;
  heartbeatIntervalMs?: number;
  resendPacingMs?: number;
}

const DEFAULT_OPTIONS: Required<SchedulerOptions> = {
  tickIntervalMs: 60_000,
  fetchIntervalMs: 3 * 60 * 60 * 1000,
  remainingIntervalMs: 5 * 60 * 1000,
  housekeepingIntervalMs: 24 * 60 * 60 * 1000,
  heartbeatIntervalMs: 60 * 60 * 1000,
  resendPacingMs: 500,
};

export interface SchedulerDeps {
  store: ItemStore;
  operator: OperatorChannel;
  commands: CommandQueue;
  runIngestion: () => Promise<IngestionReport>;
  publish: () => Promise<PublishOutcome>;
  housekeeping: () => Promise<unknown>;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export type IngestionTrigger = 'manual' | 'queue_emptied' | 'remaining' | 'interval';

// ============================================================
// SCHEDULER
// ============================================================

export class Scheduler {
  private readonly options: Required<SchedulerOptions>;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  // Starts as though the queue had just emptied.
  private wasPending = true;
  private lastCycleAt: number | null = null;
  private lastRemaining = 0;
  private lastHousekeepingAt: number | null = null;
  private lastHeartbeatAt: number | null = null;

  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(
    private readonly deps: SchedulerDeps,
    options: SchedulerOptions = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    log.info('Scheduler started', { tickIntervalMs: this.options.tickIntervalMs });
    this.scheduleNext(0);
  }

  /**
   * Stop ticking. Resolves once the in-flight tick, if any, has finished.
   */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
    log.info('Scheduler stopped');
  }

  get isRunning(): boolean {
    return this.running;
  }

  private scheduleNext(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.tick().finally(() => {
        this.inFlight = null;
        if (this.running) this.scheduleNext(this.options.tickIntervalMs);
      });
    }, delayMs);
  }

  /**
   * One pass over every responsibility.
   */
  async tick(): Promise<void> {
    const now = this.now();

    await this.unit('ingestion', () => this.ingestionStep(now));
    await this.unit('publish', () => this.publishStep());

    if (this.lastHousekeepingAt === null || now - this.lastHousekeepingAt >= this.options.housekeepingIntervalMs) {
      this.lastHousekeepingAt = now;
      await this.unit('housekeeping', () => this.deps.housekeeping());
    }

    if (this.lastHeartbeatAt === null || now - this.lastHeartbeatAt >= this.options.heartbeatIntervalMs) {
      this.lastHeartbeatAt = now;
      log.info('Heartbeat: scheduler is running');
    }
  }

  private async unit(name: string, step: () => Promise<unknown>): Promise<void> {
    try {
      await step();
    } catch (error) {
      log.error('Scheduler step failed', { step: name, error: errorMessage(error) });
    }
  }

  // ---------- (a) + (b) ingestion ----------

  private async ingestionStep(now: number): Promise<void> {
    const commands = this.deps.commands.drain();

    if (commands.some(c => c.type === 'resend_pending')) {
      await this.unit('resend', () => this.resendPending());
    }

    const pending = await this.deps.store.countByStatus('pending');
    const queueEmpty = pending === 0;
    const manual = commands.some(c => c.type === 'fetch_now');

    if (manual && !queueEmpty) {
      log.info('Manual fetch skipped', { pending });
      await this.deps.operator.notify(`Manual fetch skipped: ${pending} item(s) still awaiting review.`);
    }

    const trigger = this.ingestionTrigger(now, queueEmpty, manual);
    this.wasPending = !queueEmpty;

    if (!trigger) return;

    log.info('Running ingestion', { trigger });
    this.lastCycleAt = now;
    const report = await this.deps.runIngestion();
    this.lastRemaining = report.remaining;
  }

  /**
   * Why ingestion should run now, or null.
   */
  ingestionTrigger(now: number, queueEmpty: boolean, manual: boolean): IngestionTrigger | null {
    if (!queueEmpty) return null;
    if (manual) return 'manual';
    if (this.wasPending) return 'queue_emptied';
    if (this.lastCycleAt === null) return null;

    const sinceLast = now - this.lastCycleAt;
    if (this.lastRemaining > 0 && sinceLast >= this.options.remainingIntervalMs) return 'remaining';
    if (sinceLast >= this.options.fetchIntervalMs) return 'interval';
    return null;
  }

  private async resendPending(): Promise<void> {
    const pending = await this.deps.store.listItemsByStatus('pending');
    if (pending.length === 0) {
      await this.deps.operator.notify('No items awaiting review.');
      return;
    }

    for (const [index, item] of pending.entries()) {
      await this.deps.operator.requestApproval(item);
      if (index < pending.length - 1) await this.sleep(this.options.resendPacingMs);
    }
    log.info('Resent pending items', { count: pending.length });
  }

  // ---------- (c) publish ----------

  private async publishStep(): Promise<void> {
    const outcome = await this.deps.publish();
    if (outcome.status === 'delivery_failed') {
      log.warn('Publish attempt failed', { itemId: outcome.itemId, error: outcome.error });
    }
  }
}
