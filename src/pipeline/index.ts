/**
 * Feedgate — Pipeline
 *
 * Ingestion, moderation, publishing and the scheduler that drives them.
 */

export { INITIAL_STATUS, TRANSITIONS, canTransition, assertTransition, isTerminal } from './lifecycle';
export { applyModeration } from './moderation';
export { mayPublishNow, publishNext, type PublishDeps } from './publish-gate';
export { runIngestionCycle, type IngestionDeps, type IngestionOptions } from './ingest';
export { runHousekeeping, type HousekeepingDeps, type HousekeepingResult } from './housekeeping';
export {
  CommandQueue,
  Scheduler,
  type SchedulerDeps,
  type SchedulerOptions,
  type IngestionTrigger,
} from './scheduler';
