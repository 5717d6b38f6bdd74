/**
 * Feedgate — Type Exports
 *
 * Re-exports all types from the types module.
 */

export type {
  SourceType,
  MediaKind,
  ItemStatus,
  SeenStatus,
  CandidateItem,
  TrackedItem,
  CreateTrackedItemInput,
  SeenRecord,
  UpsertSeenRecordInput,
  TrackedItemRow,
  SeenRecordRow,
} from './item';
export {
  SourceTypeSchema,
  MediaKindSchema,
  ItemStatusSchema,
  SeenStatusSchema,
  TrackedItemRowSchema,
  SeenRecordRowSchema,
} from './item';

export type {
  Resolution,
  ResolutionOutcome,
  CycleUsage,
  IngestionReport,
  PublishOutcome,
  ModerationDecision,
  ModerationResult,
  SchedulerCommand,
} from './pipeline';
