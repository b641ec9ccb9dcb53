// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { TypedEventEmitter } from '@creditcore/ledger';
import type { Timestamp } from '@creditcore/ledger';
import type { TaskKind } from './types.js';

export const EVENT_DISPATCHED = 'schedule:dispatched' as const;
export const EVENT_DEFERRED = 'schedule:deferred' as const;
export const EVENT_FAILED = 'schedule:failed' as const;
export const EVENT_CANCELLED = 'schedule:cancelled' as const;
export const EVENT_JOB_COMPLETED = 'job:completed' as const;

interface ScheduleEventBase {
  readonly entryId: string;
  readonly kind: TaskKind;
  readonly userId: string;
  readonly orgId: string;
  readonly timestamp: Timestamp;
}

export interface ScheduleDispatchedEventPayload extends ScheduleEventBase {
  readonly creditsUsed: number;
  readonly nextRunAt: Timestamp | null;
}

export interface ScheduleDeferredEventPayload extends ScheduleEventBase {
  readonly creditsRequired: number;
  readonly availableCredits: number;
}

export interface ScheduleFailedEventPayload extends ScheduleEventBase {
  readonly retryCount: number;
  readonly maxRetries: number;
  readonly error: string;
}

export interface ScheduleCancelledEventPayload extends ScheduleEventBase {
  readonly reason: string;
  readonly retryCount: number;
}

export interface JobCompletedEventPayload {
  readonly job: string;
  readonly startedAt: Timestamp;
  readonly durationMs: number;
  readonly summary: Readonly<Record<string, number>>;
}

export interface SchedulerEventPayloadMap {
  [EVENT_DISPATCHED]: ScheduleDispatchedEventPayload;
  [EVENT_DEFERRED]: ScheduleDeferredEventPayload;
  [EVENT_FAILED]: ScheduleFailedEventPayload;
  [EVENT_CANCELLED]: ScheduleCancelledEventPayload;
  [EVENT_JOB_COMPLETED]: JobCompletedEventPayload;
}

export class SchedulerEventEmitter extends TypedEventEmitter<SchedulerEventPayloadMap> {}
