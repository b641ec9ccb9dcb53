// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * @creditcore/scheduler
 *
 * Windowed, retry-bounded dispatch of recurring work on top of the credit
 * ledger: daily digests, one-shot follow-ups, account fetches and the
 * monthly credit reset.
 */

export {
  SCHEDULE_STATUSES,
  DailyTriggerSchema,
  DigestTaskSchema,
  FollowUpTaskSchema,
  NewScheduleEntrySchema,
  OnceTriggerSchema,
  ScheduleTaskSchema,
  ScheduleTriggerSchema,
  TimeOfDaySchema,
  createScheduleEntry,
  tenantOf,
} from './types.js';
export type {
  DailyTrigger,
  DigestTask,
  FollowUpTask,
  NewScheduleEntry,
  OnceTrigger,
  ScheduleEntry,
  ScheduleStatus,
  ScheduleTask,
  ScheduleTrigger,
  TaskKind,
} from './types.js';

export { AccountNotFoundError, DispatchTimeoutError, ScheduleDispatchError } from './errors.js';

export { SchedulerConfigSchema, parseSchedulerConfig, schedulerConfigFromEnv } from './config.js';
export type { SchedulerConfig } from './config.js';

export { isValidTimeZone, toZonedParts, zoneOffsetMs, zonedTimeToUtc } from './timezone.js';
export type { ZonedDateTime } from './timezone.js';

export { computeNextRunAt, isDue, mostRecentOccurrence, nextOccurrence } from './due.js';
export type { DuePolicy } from './due.js';

export {
  EVENT_CANCELLED,
  EVENT_DEFERRED,
  EVENT_DISPATCHED,
  EVENT_FAILED,
  EVENT_JOB_COMPLETED,
  SchedulerEventEmitter,
} from './events.js';
export type {
  JobCompletedEventPayload,
  ScheduleCancelledEventPayload,
  ScheduleDeferredEventPayload,
  ScheduleDispatchedEventPayload,
  ScheduleFailedEventPayload,
  SchedulerEventPayloadMap,
} from './events.js';

export type {
  AccountDirectory,
  ConnectedAccount,
  DigestRequest,
  EmailFetcher,
  FetchRequest,
  FetchedMessage,
  FollowUpRequest,
  MessageClassifier,
  MessageComposer,
  MessageDrafter,
  MessageSender,
  OutgoingMessage,
} from './collaborators.js';

export * from './handlers/index.js';

export { ScheduleDispatcher } from './dispatcher.js';
export type { DispatchOutcome, DispatchStatus, DispatchSummary, ScheduleDispatcherOptions } from './dispatcher.js';

export * from './jobs/index.js';

export { TaskScheduler } from './scheduler.js';
export type { JobRunResult, TaskSchedulerOptions } from './scheduler.js';

export * from './storage/index.js';
